import { join as joinLocal } from "node:path";
import { ArgumentError } from "../errors/index.ts";
import { basename, tokenize } from "../path/token.ts";
import type { DavSession } from "../services/remote/session.ts";
import { type OutputOptions, successLog } from "../utils/output.ts";
import { runPlan } from "../utils/transfer-runner.ts";

interface GetOptions extends OutputOptions {
  /** Remote files or directories to download */
  sources: string[];
  /** Local directory to download into (default ".") */
  destination?: string;
  dryRun?: boolean;
}

/**
 * Get command - downloads each remote source to `<destination>/<last segment>`
 *
 * The remote root has no last segment and is downloaded into the
 * destination itself.
 */
export async function getCommand(options: GetOptions, session: DavSession): Promise<void> {
  const { sources, destination = ".", dryRun = false } = options;

  const hasNoSources = sources.length === 0;
  if (hasNoSources) {
    throw new ArgumentError("get: at least one remote path is required", "SRC");
  }

  for (const source of sources) {
    const remote = tokenize(source);
    const name = basename(remote);
    const localDest = name === undefined ? destination : joinLocal(destination, name);

    const plan = await session.planner.planDownload(remote, localDest);
    const completed = await runPlan(plan, session, { ...options, dryRun });

    if (!dryRun) {
      successLog(`Downloaded ${source} (${completed} action(s))`, options);
    }
  }
}
