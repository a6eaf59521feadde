/**
 * Remote file operations: MKCOL, PUT, GET and DELETE with their status codes
 * mapped onto error kinds.
 */

import type { Readable } from "node:stream";
import { NotADirectoryError, ParentNotFoundError } from "../errors/index.ts";
import { type PathToken, toDisplayString } from "../path/token.ts";
import type { TransportClient, TransportRequest } from "../transport/types.ts";
import { RemoteDirectoryLister } from "./lister.ts";
import { statusError } from "./status.ts";

export type MakeDirectoryOutcome = "created" | "exists";

export class RemoteFiles {
  private readonly lister: RemoteDirectoryLister;

  constructor(
    private readonly transport: TransportClient,
    lister?: RemoteDirectoryLister,
  ) {
    this.lister = lister ?? new RemoteDirectoryLister(transport);
  }

  /**
   * Create one directory level.
   *
   * A 405 only means something is already there, so the path is listed to
   * tell a directory from a file.
   *
   * @returns "exists" when a directory is already at the path
   * @throws NotADirectoryError when a file is at the path
   * @throws ParentNotFoundError on 409 (intermediate collection missing)
   */
  async makeDirectory(path: PathToken): Promise<MakeDirectoryOutcome> {
    const status = await this.send({ method: "MKCOL", path });
    switch (status) {
      case 201:
        return "created";
      case 405: {
        const existing = await this.lister.stat(path);
        if (existing.kind === "file") {
          throw new NotADirectoryError(toDisplayString(path), existing.size);
        }
        return "exists";
      }
      case 409:
        throw new ParentNotFoundError(toDisplayString(path));
      default:
        throw statusError("MKCOL", path, status, this.transport);
    }
  }

  /**
   * Store the body at the path, replacing an existing file. File contents
   * are passed as a stream and never held in memory whole.
   *
   * @throws ParentNotFoundError on 409
   */
  async upload(path: PathToken, body: Readable | Uint8Array): Promise<void> {
    const status = await this.send({ method: "PUT", path, body });
    const isStored = status === 200 || status === 201 || status === 204;
    if (isStored) return;

    if (status === 409) {
      throw new ParentNotFoundError(toDisplayString(path));
    }
    throw statusError("PUT", path, status, this.transport);
  }

  /**
   * Open the body of a remote file as a stream. The caller must consume it.
   */
  async download(path: PathToken): Promise<Readable> {
    const { status, body } = await this.transport.request({ method: "GET", path });
    if (status === 200) {
      return body;
    }
    body.destroy();
    throw statusError("GET", path, status, this.transport);
  }

  /**
   * Delete one resource.
   */
  async delete(path: PathToken): Promise<void> {
    const status = await this.send({ method: "DELETE", path });
    const isDeleted = status === 200 || status === 202 || status === 204;
    if (isDeleted) return;
    throw statusError("DELETE", path, status, this.transport);
  }

  /** Send a request whose response body carries nothing we read */
  private async send(request: TransportRequest): Promise<number> {
    const { status, body } = await this.transport.request(request);
    body.destroy();
    return status;
  }
}
