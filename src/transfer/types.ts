/**
 * Plan model for recursive transfers
 *
 * A plan is a flat, ordered list of actions. Order alone encodes the
 * hierarchy: a make-directory for a path always comes before any action
 * targeting something below it.
 */

import { join as joinLocal } from "node:path";
import type { DavError } from "../errors/index.ts";
import { type PathToken, toDisplayString } from "../path/token.ts";

export type TransferDirection = "upload" | "download";

export interface MakeDirectoryAction {
  readonly kind: "make-directory";
  readonly path: PathToken;
}

export interface CopyFileAction {
  readonly kind: "copy-file";
  readonly sourcePath: PathToken;
  readonly destPath: PathToken;
  readonly sizeHint?: number;
}

export type Action = MakeDirectoryAction | CopyFileAction;

/**
 * Ordered, immutable description of a transfer.
 *
 * Remote-side tokens are absolute. Local-side tokens are relative to
 * `localRoot`; the empty token is `localRoot` itself.
 */
export interface Plan {
  readonly direction: TransferDirection;
  readonly localRoot: string;
  readonly actions: readonly Action[];
  /** Local entries the upload walk did not follow, relative to `localRoot` */
  readonly skipped: readonly PathToken[];
}

export interface ActionFailure {
  readonly action: Action;
  readonly cause: DavError;
}

export interface TransferResult {
  readonly completed: readonly Action[];
  readonly failure?: ActionFailure;
}

export function makeDirectory(path: PathToken): MakeDirectoryAction {
  const action: MakeDirectoryAction = { kind: "make-directory", path };
  return Object.freeze(action);
}

export function copyFile(sourcePath: PathToken, destPath: PathToken, sizeHint?: number): CopyFileAction {
  const action: CopyFileAction = sizeHint === undefined
    ? { kind: "copy-file", sourcePath, destPath }
    : { kind: "copy-file", sourcePath, destPath, sizeHint };
  return Object.freeze(action);
}

export function createPlan(
  direction: TransferDirection,
  localRoot: string,
  actions: Action[],
  skipped: PathToken[] = [],
): Plan {
  return Object.freeze({
    direction,
    localRoot,
    actions: Object.freeze([...actions]),
    skipped: Object.freeze([...skipped]),
  });
}

/**
 * Absolute local path of a token relative to the plan's local root
 */
export function localPathOf(plan: Plan, token: PathToken): string {
  return joinLocal(plan.localRoot, ...token.segments);
}

/**
 * Display strings for where an action reads from and writes to
 */
export function describeEndpoints(plan: Plan, action: CopyFileAction): { source: string; destination: string } {
  const isUpload = plan.direction === "upload";
  return {
    source: isUpload ? localPathOf(plan, action.sourcePath) : toDisplayString(action.sourcePath),
    destination: isUpload ? toDisplayString(action.destPath) : localPathOf(plan, action.destPath),
  };
}

/**
 * One-line description naming the action kind and its target
 */
export function describeAction(plan: Plan, action: Action): string {
  switch (action.kind) {
    case "make-directory": {
      const target = plan.direction === "upload"
        ? toDisplayString(action.path)
        : localPathOf(plan, action.path);
      return `make-directory ${target}`;
    }
    case "copy-file": {
      const { source, destination } = describeEndpoints(plan, action);
      return `copy-file ${source} -> ${destination}`;
    }
  }
}
