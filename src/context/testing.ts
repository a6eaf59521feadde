/**
 * Testing utilities for AppContext
 *
 * This module provides mock factories for testing components
 * that depend on AppContext without requiring the full runtime.
 */

import { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";
import type { AppContext } from "./index.ts";
import type { FileInfo, Runtime, RuntimeControl, RuntimeErrors, RuntimeFS } from "../runtime/types.ts";

/**
 * Options for creating a mock runtime
 */
export interface MockRuntimeOptions {
  fs?: Partial<RuntimeFS>;
  control?: Partial<RuntimeControl>;
  errors?: Partial<RuntimeErrors>;
}

const MOCK_FILE_INFO: FileInfo = {
  isFile: true,
  isDirectory: false,
  size: 0,
};

/**
 * Create a mock RuntimeFS
 */
function createMockFS(overrides: Partial<RuntimeFS> = {}): RuntimeFS {
  return {
    openRead: () => Promise.resolve(Readable.from([])),
    writeStream: async (_path, source) => {
      await buffer(source);
    },
    mkdir: () => Promise.resolve(),
    stat: () => Promise.resolve(MOCK_FILE_INFO),
    readDir: async function* () {},
    realPath: (path) => Promise.resolve(path),
    ...overrides,
  };
}

/**
 * Create a mock RuntimeControl
 */
function createMockControl(overrides: Partial<RuntimeControl> = {}): RuntimeControl {
  return {
    exit: (code: number): never => {
      throw new Error(`exit called with ${code}`);
    },
    cwd: () => "/mock/cwd",
    args: [],
    ...overrides,
  };
}

/**
 * Error carrying a Node.js-style code, for driving RuntimeErrors in tests
 */
export class MockSystemError extends Error {
  readonly code: string;

  constructor(code: string, message?: string) {
    super(message ?? code);
    this.code = code;
    this.name = "MockSystemError";
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof MockSystemError && error.code === code;
}

/**
 * Create a mock RuntimeErrors
 */
function createMockErrors(overrides: Partial<RuntimeErrors> = {}): RuntimeErrors {
  return {
    isNotFound: (error) => hasCode(error, "ENOENT"),
    isAlreadyExists: (error) => hasCode(error, "EEXIST"),
    isPermissionDenied: (error) => hasCode(error, "EACCES"),
    isNotADirectory: (error) => hasCode(error, "ENOTDIR"),
    ...overrides,
  };
}

/**
 * Create a mock Runtime for testing
 */
export function createMockRuntime(options: MockRuntimeOptions = {}): Runtime {
  return {
    fs: createMockFS(options.fs),
    control: createMockControl(options.control),
    errors: createMockErrors(options.errors),
  };
}

/**
 * Create a mock AppContext for testing
 */
export function createMockContext(options: MockRuntimeOptions = {}): AppContext {
  return {
    runtime: createMockRuntime(options),
  };
}
