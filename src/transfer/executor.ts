/**
 * Action executor
 *
 * Runs a plan strictly in order, one action at a time. Plan order is the
 * only thing guaranteeing parents exist before children, so no reordering
 * happens here. The first failure stops the run; finished actions are left
 * in place.
 */

import type { Readable } from "node:stream";
import { type AppContext, getGlobalContext } from "../context/index.ts";
import { FileSystemError, NotADirectoryError, toDavError } from "../errors/index.ts";
import type { RemoteFiles } from "../remote/files.ts";
import { mapLocalError } from "../utils/local-errors.ts";
import { type Action, type CopyFileAction, localPathOf, type MakeDirectoryAction, type Plan, type TransferResult } from "./types.ts";

export interface ExecuteOptions {
  /** Called after each action that succeeded, in plan order */
  onActionCompleted?: (action: Action) => void;
}

export class ActionExecutor {
  private readonly remote: RemoteFiles;
  private readonly ctx: AppContext;

  constructor(remote: RemoteFiles, ctx: AppContext = getGlobalContext()) {
    this.remote = remote;
    this.ctx = ctx;
  }

  async execute(plan: Plan, options: ExecuteOptions = {}): Promise<TransferResult> {
    const completed: Action[] = [];

    for (const action of plan.actions) {
      try {
        await this.perform(plan, action);
      } catch (error) {
        const cause = toDavError(error, (err) => new FileSystemError("run", describeTarget(action), err));
        return { completed, failure: { action, cause } };
      }
      completed.push(action);
      options.onActionCompleted?.(action);
    }

    return { completed };
  }

  private async perform(plan: Plan, action: Action): Promise<void> {
    switch (action.kind) {
      case "make-directory":
        return plan.direction === "upload"
          ? this.makeRemoteDirectory(action)
          : this.makeLocalDirectory(plan, action);
      case "copy-file":
        return plan.direction === "upload"
          ? this.uploadFile(plan, action)
          : this.downloadFile(plan, action);
    }
  }

  private async makeRemoteDirectory(action: MakeDirectoryAction): Promise<void> {
    // "exists" is as good as "created"
    await this.remote.makeDirectory(action.path);
  }

  private async makeLocalDirectory(plan: Plan, action: MakeDirectoryAction): Promise<void> {
    const { fs, errors } = this.ctx.runtime;
    const path = localPathOf(plan, action.path);
    try {
      await fs.mkdir(path);
    } catch (error) {
      if (!errors.isAlreadyExists(error)) {
        throw mapLocalError(error, "create directory", path, this.ctx);
      }
      const existing = await fs.stat(path).catch((statError: unknown) => {
        throw mapLocalError(statError, "stat", path, this.ctx);
      });
      if (!existing.isDirectory) {
        throw new NotADirectoryError(path);
      }
    }
  }

  private async uploadFile(plan: Plan, action: CopyFileAction): Promise<void> {
    const source = localPathOf(plan, action.sourcePath);
    let body: Readable;
    try {
      body = await this.ctx.runtime.fs.openRead(source);
    } catch (error) {
      throw mapLocalError(error, "read", source, this.ctx);
    }
    try {
      await this.remote.upload(action.destPath, body);
    } finally {
      // Closes the file when the request failed before reading it through
      body.destroy();
    }
  }

  private async downloadFile(plan: Plan, action: CopyFileAction): Promise<void> {
    const body = await this.remote.download(action.sourcePath);
    const destination = localPathOf(plan, action.destPath);
    try {
      await this.ctx.runtime.fs.writeStream(destination, body);
    } catch (error) {
      throw mapLocalError(error, "write", destination, this.ctx);
    }
  }
}

function describeTarget(action: Action): string {
  const segments = action.kind === "make-directory" ? action.path.segments : action.destPath.segments;
  return segments.join("/");
}
