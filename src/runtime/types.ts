/**
 * Runtime abstraction layer types
 *
 * This module defines the interfaces plaindav uses for local file system
 * access and process control, so commands can be exercised against a mock
 * runtime in tests.
 */

import type { Readable } from "node:stream";

// ===== File System Types =====

/**
 * File information returned by stat operations
 */
export interface FileInfo {
  isFile: boolean;
  isDirectory: boolean;
  size: number;
}

/**
 * Directory entry returned by readDir operations
 */
export interface DirEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
  isSymlink: boolean;
}

/**
 * Runtime file system interface
 */
export interface RuntimeFS {
  /**
   * Open a file for streaming reads. Open errors reject the promise.
   */
  openRead(path: string): Promise<Readable>;

  /**
   * Stream `source` into a file, replacing any existing content
   */
  writeStream(path: string, source: Readable): Promise<void>;

  /**
   * Create a single directory; fails if it already exists
   */
  mkdir(path: string): Promise<void>;

  /**
   * Get file/directory information, following symlinks
   */
  stat(path: string): Promise<FileInfo>;

  /**
   * Read directory entries
   */
  readDir(path: string): AsyncIterable<DirEntry>;

  /**
   * Resolve symlinks and return the real path
   */
  realPath(path: string): Promise<string>;
}

// ===== Process Control Types =====

/**
 * Runtime process control interface
 */
export interface RuntimeControl {
  /**
   * Exit the process with the given code
   */
  exit(code: number): never;

  /**
   * Get the current working directory
   */
  cwd(): string;

  /**
   * Command-line arguments (excluding runtime and script name)
   */
  readonly args: readonly string[];
}

// ===== Error Types =====

/**
 * Runtime-specific error classification
 */
export interface RuntimeErrors {
  /**
   * Check if error is NotFound
   */
  isNotFound(error: unknown): boolean;

  /**
   * Check if error is AlreadyExists
   */
  isAlreadyExists(error: unknown): boolean;

  /**
   * Check if error is PermissionDenied
   */
  isPermissionDenied(error: unknown): boolean;

  /**
   * Check if a path component was not a directory
   */
  isNotADirectory(error: unknown): boolean;
}

// ===== Unified Runtime Interface =====

/**
 * Unified runtime interface providing platform-agnostic access to
 * file system and process control.
 */
export interface Runtime {
  /** File system operations */
  readonly fs: RuntimeFS;

  /** Process control (exit, cwd, args) */
  readonly control: RuntimeControl;

  /** Runtime-specific errors */
  readonly errors: RuntimeErrors;
}
