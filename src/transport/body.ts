import { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";

/**
 * Read a whole body into memory. Only for small bodies such as PROPFIND
 * responses and error pages.
 */
export async function readBody(body: Readable): Promise<Uint8Array> {
  return new Uint8Array(await buffer(body));
}

/**
 * Stream yielding the given bytes as a single chunk
 */
export function bodyOf(data: Uint8Array = new Uint8Array()): Readable {
  return Readable.from([data]);
}
