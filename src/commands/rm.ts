import { ArgumentError } from "../errors/index.ts";
import { toDisplayString, tokenize } from "../path/token.ts";
import { removeRemote } from "../services/remote/operations.ts";
import type { DavSession } from "../services/remote/session.ts";
import { type OutputOptions, printResult, verboseLog } from "../utils/output.ts";

interface RmOptions extends OutputOptions {
  paths: string[];
  /** Remove directories and their contents (-r) */
  recursive?: boolean;
}

/**
 * Rm command - removes remote files, or directory trees with -r
 */
export async function rmCommand(options: RmOptions, session: DavSession): Promise<void> {
  const { paths, recursive = false } = options;

  const hasNoPaths = paths.length === 0;
  if (hasNoPaths) {
    throw new ArgumentError("rm: at least one remote path is required", "PATH");
  }

  for (const rawPath of paths) {
    const path = tokenize(rawPath);
    await removeRemote(
      {
        path,
        recursive,
        onRemoved: (target) => verboseLog(`deleted ${target.kind} ${toDisplayString(target.path)}`, options),
      },
      session.lister,
      session.files,
    );
    printResult(`removed ${toDisplayString(path)}`);
  }
}
