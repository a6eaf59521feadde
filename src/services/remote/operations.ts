/**
 * Remote remove and mkdir operations
 *
 * These run directly against the server without a transfer plan.
 */

import {
  ActionFailedError,
  AlreadyExistsError,
  type DavError,
  InvalidPathError,
  NotADirectoryError,
  NotEmptyOrDirectoryError,
  toDavError,
  TransportError,
} from "../../errors/index.ts";
import { ancestors, isRoot, join, type PathToken, segment, toDisplayString } from "../../path/token.ts";
import type { MakeDirectoryOutcome, RemoteFiles } from "../../remote/files.ts";
import type { DirectoryEntry, EntryKind, RemoteDirectoryLister } from "../../remote/lister.ts";

/**
 * Options for removing a remote path
 */
export interface RemoveRemoteOptions {
  /** The remote path to remove */
  path: PathToken;
  /** Remove directories and their contents */
  recursive?: boolean;
  /** Called after each successful DELETE */
  onRemoved?: (target: RemovalTarget) => void;
}

/**
 * Options for creating a remote directory
 */
export interface MakeRemoteDirectoryOptions {
  /** The remote directory to create */
  path: PathToken;
  /** Create missing ancestors; an existing directory is not an error */
  parents?: boolean;
}

export interface RemovalTarget {
  path: PathToken;
  kind: EntryKind;
}

interface RemovalFrame {
  path: PathToken;
  entries: DirectoryEntry[];
  index: number;
}

/**
 * Work out what to delete, deepest first, using listings only.
 *
 * A file yields itself. A directory yields, in post-order, every file and
 * subdirectory below it and finally itself, so each directory is empty by the
 * time its own DELETE is sent.
 *
 * @throws InvalidPathError for the root
 * @throws NotEmptyOrDirectoryError for a directory without `recursive`
 */
export async function planRemoval(
  lister: RemoteDirectoryLister,
  path: PathToken,
  recursive: boolean,
): Promise<RemovalTarget[]> {
  if (isRoot(path)) {
    throw new InvalidPathError("/", "refusing to remove the root directory");
  }

  const rootStat = await lister.stat(path);
  if (rootStat.kind === "file") {
    return [{ path, kind: "file" }];
  }
  if (!recursive) {
    throw new NotEmptyOrDirectoryError(toDisplayString(path));
  }

  const targets: RemovalTarget[] = [];
  const stack: RemovalFrame[] = [{ path, entries: rootStat.entries, index: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const isExhausted = frame.index >= frame.entries.length;
    if (isExhausted) {
      stack.pop();
      targets.push({ path: frame.path, kind: "directory" });
      continue;
    }

    const entry = frame.entries[frame.index++];
    const childPath = join(frame.path, segment(entry.name));
    if (entry.kind === "file") {
      targets.push({ path: childPath, kind: "file" });
      continue;
    }
    stack.push({ path: childPath, entries: await lister.list(childPath), index: 0 });
  }

  return targets;
}

/**
 * Remove a remote file, or a directory tree with `recursive`.
 *
 * Listing happens before the first DELETE, so a refused or failed walk
 * deletes nothing. DELETEs are then sent one by one; the first failure stops
 * the run and is reported as an ActionFailedError naming the target.
 *
 * @returns The removed targets in the order they were deleted
 */
export async function removeRemote(
  options: RemoveRemoteOptions,
  lister: RemoteDirectoryLister,
  files: RemoteFiles,
): Promise<RemovalTarget[]> {
  const { path, recursive = false, onRemoved } = options;
  const targets = await planRemoval(lister, path, recursive);

  const removed: RemovalTarget[] = [];
  for (const target of targets) {
    try {
      await files.delete(target.path);
    } catch (error) {
      const cause: DavError = toDavError(error, (err) => new TransportError(err.message, { cause: err }));
      throw new ActionFailedError(`delete ${toDisplayString(target.path)}`, cause, removed.length);
    }
    removed.push(target);
    onRemoved?.(target);
  }
  return removed;
}

/**
 * Create a remote directory.
 *
 * With `parents`, one MKCOL is sent per ancestor from the shallowest down
 * and existing directories are accepted. Without it, a single MKCOL is
 * sent.
 *
 * @returns The directories this call created
 * @throws NotADirectoryError with `parents` when a file is in the way
 * @throws ParentNotFoundError without `parents` when the parent is missing
 * @throws AlreadyExistsError without `parents` when the path exists
 */
export async function makeRemoteDirectory(
  options: MakeRemoteDirectoryOptions,
  files: RemoteFiles,
): Promise<PathToken[]> {
  const { path, parents = false } = options;

  if (parents) {
    const created: PathToken[] = [];
    for (const ancestor of ancestors(path)) {
      const outcome = await files.makeDirectory(ancestor);
      if (outcome === "created") {
        created.push(ancestor);
      }
    }
    return created;
  }

  const rootAlwaysExists = isRoot(path);
  if (rootAlwaysExists) {
    throw new AlreadyExistsError("/");
  }

  let outcome: MakeDirectoryOutcome;
  try {
    outcome = await files.makeDirectory(path);
  } catch (error) {
    // A file at the path is "exists" too when no parents are requested
    if (error instanceof NotADirectoryError) {
      throw new AlreadyExistsError(toDisplayString(path));
    }
    throw error;
  }
  if (outcome === "exists") {
    throw new AlreadyExistsError(toDisplayString(path));
  }
  return [path];
}
