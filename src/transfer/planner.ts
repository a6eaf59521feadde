/**
 * Action planner
 *
 * Walks a local or remote tree and produces the ordered action list a
 * transfer needs. Planning only reads metadata (stat, readDir, PROPFIND);
 * nothing is created or copied.
 *
 * Both walks use an explicit stack of frames instead of recursion. Each
 * frame holds one directory's sorted children and a cursor, so a directory's
 * whole subtree is emitted before its next sibling and every make-directory
 * precedes the actions beneath it.
 */

import { isAbsolute, join as joinLocal, relative, resolve, sep } from "node:path";
import { type AppContext, getGlobalContext } from "../context/index.ts";
import { InvalidPathError } from "../errors/index.ts";
import { join, type PathToken, ROOT, segment } from "../path/token.ts";
import type { DirectoryEntry, RemoteDirectoryLister } from "../remote/lister.ts";
import type { DirEntry, FileInfo } from "../runtime/types.ts";
import { mapLocalError } from "../utils/local-errors.ts";
import { type Action, copyFile, createPlan, makeDirectory, type Plan } from "./types.ts";

interface LocalFrame {
  relative: PathToken;
  entries: DirEntry[];
  index: number;
}

interface RemoteFrame {
  remote: PathToken;
  local: PathToken;
  entries: DirectoryEntry[];
  index: number;
}

function byName<T extends { name: string }>(a: T, b: T): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Whether `target` is strictly inside `root` (both real paths)
 */
function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel !== "" && rel.split(sep)[0] !== ".." && !isAbsolute(rel);
}

export class ActionPlanner {
  private readonly lister: RemoteDirectoryLister;
  private readonly ctx: AppContext;

  constructor(lister: RemoteDirectoryLister, ctx: AppContext = getGlobalContext()) {
    this.lister = lister;
    this.ctx = ctx;
  }

  /**
   * Plan uploading a local file or directory to `remoteDestRoot`.
   *
   * A file becomes a single copy-file. A directory becomes a make-directory
   * for the destination followed by every child, sorted by name, files and
   * directories interleaved.
   *
   * Symbolic links below the root are followed only when they resolve to a
   * regular file inside the root; everything else is recorded in
   * `plan.skipped`.
   *
   * @throws NotFoundError if `localRoot` does not exist
   * @throws PermissionError if it or a directory below it cannot be read
   * @throws InvalidPathError if it is neither a file nor a directory
   */
  async planUpload(localRoot: string, remoteDestRoot: PathToken): Promise<Plan> {
    const { fs } = this.ctx.runtime;
    const root = resolve(this.ctx.runtime.control.cwd(), localRoot);

    let rootInfo: FileInfo;
    try {
      rootInfo = await fs.stat(root);
    } catch (error) {
      throw mapLocalError(error, "stat", root, this.ctx);
    }

    if (rootInfo.isFile) {
      return createPlan("upload", root, [copyFile(ROOT, remoteDestRoot, rootInfo.size)]);
    }
    if (!rootInfo.isDirectory) {
      throw new InvalidPathError(localRoot, "not a regular file or directory");
    }

    let realRoot: string;
    try {
      realRoot = await fs.realPath(root);
    } catch (error) {
      throw mapLocalError(error, "resolve", root, this.ctx);
    }

    const actions: Action[] = [makeDirectory(remoteDestRoot)];
    const skipped: PathToken[] = [];
    const stack: LocalFrame[] = [{ relative: ROOT, entries: await this.readLocalDirectory(root), index: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const isExhausted = frame.index >= frame.entries.length;
      if (isExhausted) {
        stack.pop();
        continue;
      }

      const entry = frame.entries[frame.index++];
      const childRelative = join(frame.relative, segment(entry.name));
      const childPath = joinLocal(root, ...childRelative.segments);
      const childRemote = join(remoteDestRoot, childRelative);

      if (entry.isSymlink) {
        const size = await this.resolveLinkedFileSize(childPath, realRoot);
        if (size === undefined) {
          skipped.push(childRelative);
        } else {
          actions.push(copyFile(childRelative, childRemote, size));
        }
        continue;
      }

      if (entry.isDirectory) {
        actions.push(makeDirectory(childRemote));
        stack.push({ relative: childRelative, entries: await this.readLocalDirectory(childPath), index: 0 });
        continue;
      }

      if (entry.isFile) {
        const size = await this.localFileSize(childPath);
        actions.push(copyFile(childRelative, childRemote, size));
        continue;
      }

      // Sockets, FIFOs and devices
      skipped.push(childRelative);
    }

    return createPlan("upload", root, actions, skipped);
  }

  /**
   * Plan downloading a remote file or directory to `localDestRoot`.
   *
   * The root is probed with one listing query; a file answer yields a single
   * copy-file. A directory yields a make-directory for the local root and
   * then every child, sorted by name, with one listing per subdirectory.
   *
   * @throws NotFoundError if nothing exists at `remoteRoot`
   * @throws TransportError on network failures and unexpected statuses
   */
  async planDownload(remoteRoot: PathToken, localDestRoot: string): Promise<Plan> {
    const root = resolve(this.ctx.runtime.control.cwd(), localDestRoot);
    const rootStat = await this.lister.stat(remoteRoot);

    if (rootStat.kind === "file") {
      return createPlan("download", root, [copyFile(remoteRoot, ROOT, rootStat.size)]);
    }

    const actions: Action[] = [makeDirectory(ROOT)];
    const stack: RemoteFrame[] = [{ remote: remoteRoot, local: ROOT, entries: rootStat.entries, index: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const isExhausted = frame.index >= frame.entries.length;
      if (isExhausted) {
        stack.pop();
        continue;
      }

      const entry = frame.entries[frame.index++];
      const name = segment(entry.name);
      const childRemote = join(frame.remote, name);
      const childLocal = join(frame.local, name);

      if (entry.kind === "file") {
        actions.push(copyFile(childRemote, childLocal, entry.size));
        continue;
      }

      actions.push(makeDirectory(childLocal));
      const entries = await this.lister.list(childRemote);
      stack.push({ remote: childRemote, local: childLocal, entries, index: 0 });
    }

    return createPlan("download", root, actions);
  }

  private async readLocalDirectory(path: string): Promise<DirEntry[]> {
    const entries: DirEntry[] = [];
    try {
      for await (const entry of this.ctx.runtime.fs.readDir(path)) {
        entries.push(entry);
      }
    } catch (error) {
      throw mapLocalError(error, "read directory", path, this.ctx);
    }
    return entries.sort(byName);
  }

  private async localFileSize(path: string): Promise<number> {
    try {
      const info = await this.ctx.runtime.fs.stat(path);
      return info.size;
    } catch (error) {
      throw mapLocalError(error, "stat", path, this.ctx);
    }
  }

  /**
   * Size of the regular file a link points to, or undefined when the link is
   * broken, leaves the root, or points to anything but a file.
   */
  private async resolveLinkedFileSize(path: string, realRoot: string): Promise<number | undefined> {
    const { fs, errors } = this.ctx.runtime;
    try {
      const target = await fs.realPath(path);
      if (!isInside(realRoot, target)) return undefined;
      const info = await fs.stat(target);
      return info.isFile ? info.size : undefined;
    } catch (error) {
      const isBrokenLink = errors.isNotFound(error);
      if (isBrokenLink) return undefined;
      throw mapLocalError(error, "resolve link", path, this.ctx);
    }
  }
}
