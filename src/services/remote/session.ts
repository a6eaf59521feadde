/**
 * Wiring of the remote components around one transport
 */

import { type AppContext, getGlobalContext } from "../../context/index.ts";
import { RemoteFiles } from "../../remote/files.ts";
import { RemoteDirectoryLister } from "../../remote/lister.ts";
import { ActionExecutor } from "../../transfer/executor.ts";
import { ActionPlanner } from "../../transfer/planner.ts";
import type { TransportClient } from "../../transport/types.ts";
import { warnLog } from "../../utils/output.ts";

/**
 * Everything a command needs to talk to one server. Built per invocation
 * from an explicit transport, so independent sessions can coexist.
 */
export interface DavSession {
  readonly transport: TransportClient;
  readonly lister: RemoteDirectoryLister;
  readonly files: RemoteFiles;
  readonly planner: ActionPlanner;
  readonly executor: ActionExecutor;
}

export function createSession(
  transport: TransportClient,
  ctx: AppContext = getGlobalContext(),
): DavSession {
  const lister = new RemoteDirectoryLister(transport, {
    onUnusableHref: (href, error) => warnLog(`skipping listing entry ${href}: ${error.message}`),
  });
  const files = new RemoteFiles(transport, lister);
  return {
    transport,
    lister,
    files,
    planner: new ActionPlanner(lister, ctx),
    executor: new ActionExecutor(files, ctx),
  };
}
