import { ArgumentError } from "../errors/index.ts";
import { toDisplayString, tokenize } from "../path/token.ts";
import { makeRemoteDirectory } from "../services/remote/operations.ts";
import type { DavSession } from "../services/remote/session.ts";
import { type OutputOptions, verboseLog } from "../utils/output.ts";

interface MkdirOptions extends OutputOptions {
  paths: string[];
  /** Create missing parents and accept existing directories (-p) */
  parents?: boolean;
}

/**
 * Mkdir command - creates remote directories
 */
export async function mkdirCommand(options: MkdirOptions, session: DavSession): Promise<void> {
  const { paths, parents = false } = options;

  const hasNoPaths = paths.length === 0;
  if (hasNoPaths) {
    throw new ArgumentError("mkdir: at least one remote path is required", "PATH");
  }

  for (const rawPath of paths) {
    const created = await makeRemoteDirectory({ path: tokenize(rawPath), parents }, session.files);
    for (const path of created) {
      verboseLog(`created ${toDisplayString(path)}`, options);
    }
  }
}
