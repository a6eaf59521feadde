/**
 * Node.js file system implementation
 */

import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import type * as nodeFs from "node:fs";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { DirEntry, FileInfo, RuntimeFS } from "../types.ts";

function toFileInfo(stat: nodeFs.Stats): FileInfo {
  return {
    isFile: stat.isFile(),
    isDirectory: stat.isDirectory(),
    size: stat.size,
  };
}

export const nodeFS: RuntimeFS = {
  async openRead(filePath: string): Promise<Readable> {
    const handle = await fs.open(filePath, "r");
    return handle.createReadStream();
  },

  async writeStream(filePath: string, source: Readable): Promise<void> {
    await pipeline(source, createWriteStream(filePath));
  },

  async mkdir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath);
  },

  async stat(filePath: string): Promise<FileInfo> {
    const stat = await fs.stat(filePath);
    return toFileInfo(stat);
  },

  async *readDir(dirPath: string): AsyncIterable<DirEntry> {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    for (const entry of entries) {
      yield {
        name: entry.name,
        isFile: entry.isFile(),
        isDirectory: entry.isDirectory(),
        isSymlink: entry.isSymbolicLink(),
      };
    }
  },

  async realPath(filePath: string): Promise<string> {
    return await fs.realpath(filePath);
  },
};
