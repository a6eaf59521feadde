import { z } from "zod";
import { ArgumentError } from "../errors/index.ts";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 8080;
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Zod schema for the connection settings taken from the command line.
 *
 * Values arrive as strings from the argument parser, so numbers are coerced.
 */
export const ConnectionConfigSchema = z.object({
  /** Server hostname or address */
  host: z.string().trim().min(1, "must not be empty").default(DEFAULT_HOST),
  /**
   * TCP port of the server
   * @minimum 1
   * @maximum 65535
   * @default 8080
   */
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  /**
   * Per-request timeout in milliseconds
   * @default 30000
   */
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
}).strict();

export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;

/**
 * Validate and parse a ConnectionConfig from unknown data
 * @param data Unknown data to validate
 * @returns Validated ConnectionConfig
 * @throws ArgumentError if validation fails
 */
export function parseConnectionConfig(data: unknown): ConnectionConfig {
  const result = ConnectionConfigSchema.safeParse(data);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ArgumentError(`Invalid connection options:\n${errors}`);
  }
  return result.data;
}

/**
 * Base URL of the server, without a trailing slash
 */
export function baseUrlOf(config: ConnectionConfig): string {
  return `http://${config.host}:${config.port}`;
}
