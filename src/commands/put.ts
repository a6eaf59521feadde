import { basename as localBasename, resolve } from "node:path";
import { type AppContext, getGlobalContext } from "../context/index.ts";
import { ArgumentError, InvalidPathError } from "../errors/index.ts";
import { join, segment, tokenize } from "../path/token.ts";
import type { DavSession } from "../services/remote/session.ts";
import { type OutputOptions, successLog } from "../utils/output.ts";
import { runPlan } from "../utils/transfer-runner.ts";

interface PutOptions extends OutputOptions {
  /** Local files or directories to upload */
  sources: string[];
  /** Remote directory to upload into (default "/") */
  destination?: string;
  dryRun?: boolean;
}

/**
 * Put command - uploads each local source to `<destination>/<source name>`
 *
 * Sources are handled one after another; the first failure aborts the rest.
 */
export async function putCommand(
  options: PutOptions,
  session: DavSession,
  ctx: AppContext = getGlobalContext(),
): Promise<void> {
  const { sources, destination = "/", dryRun = false } = options;

  const hasNoSources = sources.length === 0;
  if (hasNoSources) {
    throw new ArgumentError("put: at least one local path is required", "SRC");
  }

  const remoteDirectory = tokenize(destination);

  for (const source of sources) {
    const name = localBasename(resolve(ctx.runtime.control.cwd(), source));
    if (name === "") {
      throw new InvalidPathError(source, "cannot upload the file system root");
    }

    const remoteDest = join(remoteDirectory, segment(name));
    const plan = await session.planner.planUpload(source, remoteDest);
    const completed = await runPlan(plan, session, { ...options, dryRun });

    if (!dryRun) {
      successLog(`Uploaded ${source} (${completed} action(s))`, options);
    }
  }
}
