import { ActionFailedError } from "../errors/index.ts";
import type { DavSession } from "../services/remote/session.ts";
import { describeAction, describeEndpoints, localPathOf, type Plan } from "../transfer/types.ts";
import { logDryRun, type OutputOptions, printResult, verboseLog, warnLog } from "./output.ts";

export interface RunPlanOptions extends OutputOptions {
  dryRun?: boolean;
}

/**
 * Execute a plan and report it.
 *
 * Prints `source -> destination` for each copied file. In dry-run mode the
 * actions are only listed.
 *
 * @returns Number of actions completed
 * @throws ActionFailedError naming the first action that failed
 */
export async function runPlan(plan: Plan, session: DavSession, options: RunPlanOptions = {}): Promise<number> {
  const { dryRun = false } = options;

  for (const skipped of plan.skipped) {
    warnLog(`not following ${localPathOf(plan, skipped)} (link or special file)`);
  }

  verboseLog(`Planned ${plan.actions.length} action(s) for ${plan.direction} via ${plan.localRoot}`, options);

  if (dryRun) {
    for (const action of plan.actions) {
      logDryRun(describeAction(plan, action));
    }
    return 0;
  }

  const result = await session.executor.execute(plan, {
    onActionCompleted: (action) => {
      if (action.kind === "copy-file") {
        const { source, destination } = describeEndpoints(plan, action);
        printResult(`${source} -> ${destination}`);
      } else {
        verboseLog(describeAction(plan, action), options);
      }
    },
  });

  if (result.failure) {
    const { action, cause } = result.failure;
    throw new ActionFailedError(describeAction(plan, action), cause, result.completed.length);
  }
  return result.completed.length;
}
