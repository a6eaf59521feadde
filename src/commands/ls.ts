import { basename, tokenize } from "../path/token.ts";
import type { DavSession } from "../services/remote/session.ts";
import { type OutputOptions, printResult, verboseLog } from "../utils/output.ts";

interface LsOptions extends OutputOptions {
  path?: string;
}

/**
 * List command - prints the children of a remote directory, or the name of
 * a remote file
 *
 * One name per line, sorted; directories carry a trailing slash.
 */
export async function lsCommand(options: LsOptions, session: DavSession): Promise<void> {
  const { path: rawPath = "/" } = options;
  const path = tokenize(rawPath);

  const stat = await session.lister.stat(path);
  if (stat.kind === "file") {
    printResult(basename(path) ?? "/");
    return;
  }

  verboseLog(`${stat.entries.length} entries in ${rawPath}`, options);
  for (const entry of stat.entries) {
    const suffix = entry.kind === "directory" ? "/" : "";
    printResult(`${entry.name}${suffix}`);
  }
}
