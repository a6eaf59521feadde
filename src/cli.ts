import minimist from "minimist";
import { getCommand } from "./commands/get.ts";
import { lsCommand } from "./commands/ls.ts";
import { mkdirCommand } from "./commands/mkdir.ts";
import { putCommand } from "./commands/put.ts";
import { rmCommand } from "./commands/rm.ts";
import { type AppContext, getGlobalContext } from "./context/index.ts";
import { ArgumentError } from "./errors/index.ts";
import { createSession } from "./services/remote/session.ts";
import { HttpTransport } from "./transport/http.ts";
import type { TransportClient } from "./transport/types.ts";
import { type ConnectionConfig, parseConnectionConfig } from "./types/config.ts";
import { type OutputOptions, printResult, verboseLog } from "./utils/output.ts";
import { PROGRAM_NAME, VERSION } from "./version.ts";

export const HELP_TEXT = `${PROGRAM_NAME} - command-line client for WebDAV servers over plain HTTP

Usage:
  ${PROGRAM_NAME} [options] ls [PATH]                      List a remote directory (default /)
  ${PROGRAM_NAME} [options] put [-O DEST] [--dry-run] SRC...  Upload local files or directories into DEST (default /)
  ${PROGRAM_NAME} [options] get [-O DEST] [--dry-run] SRC...  Download remote files or directories into DEST (default .)
  ${PROGRAM_NAME} [options] mkdir [-p] PATH...             Create remote directories
  ${PROGRAM_NAME} [options] rm [-r] PATH...                Remove remote files or directories

Options:
  --host HOST      Server host (default: localhost)
  --port PORT      Server port (default: 8080)
  --timeout MS     Per-request timeout in milliseconds (default: 30000)
  -v, --verbose    Show requests and planned actions
  -q, --quiet      Only print results and errors
  -h, --help       Show this help message
  --version        Show version information

Command options:
  -O, --output DEST  Destination directory for put and get
  --dry-run          Print the planned actions of put or get without running them
  -p, --parents      mkdir: create missing parents, accept existing directories
  -r, --recursive    rm: remove directories and their contents

Examples:
  ${PROGRAM_NAME} ls /
  ${PROGRAM_NAME} --port 9000 put -O /backup ./photos
  ${PROGRAM_NAME} get -O ./restore /backup/photos
  ${PROGRAM_NAME} mkdir -p /a/b/c
  ${PROGRAM_NAME} rm -r /backup/photos
`;

const COMMAND_OPTIONS: Record<string, readonly string[]> = {
  ls: [],
  put: ["output", "dry-run"],
  get: ["output", "dry-run"],
  mkdir: ["parents"],
  rm: ["recursive"],
};

const COMMAND_OPTION_FLAGS = ["output", "dry-run", "parents", "recursive"] as const;

/**
 * Parsed command line
 */
export interface ParsedCli extends OutputOptions {
  command?: string;
  operands: string[];
  help: boolean;
  version: boolean;
  host?: string;
  port?: string;
  timeout?: string;
  output?: string;
  dryRun: boolean;
  parents: boolean;
  recursive: boolean;
  /** Command options given on the command line */
  givenCommandOptions: string[];
  unknownOptions: string[];
}

export interface CliDependencies {
  /** Build the transport for a validated connection config */
  createTransport?: (config: ConnectionConfig, output: OutputOptions) => TransportClient;
}

function lastString(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return lastString(value[value.length - 1]);
  }
  return typeof value === "string" ? value : undefined;
}

function isTrue(value: unknown): boolean {
  return value === true;
}

/**
 * Parse raw arguments. Never throws; problems are recorded and reported by
 * runCli so they go through the error handler.
 */
export function parseCli(argv: readonly string[]): ParsedCli {
  const unknownOptions: string[] = [];
  const args = minimist([...argv], {
    string: ["_", "host", "port", "timeout", "output"],
    boolean: ["help", "version", "verbose", "quiet", "dry-run", "parents", "recursive"],
    alias: { h: "help", v: "verbose", q: "quiet", O: "output", p: "parents", r: "recursive" },
    unknown: (arg) => {
      const isOption = arg.startsWith("-") && arg !== "-";
      if (isOption) {
        unknownOptions.push(arg);
        return false;
      }
      return true;
    },
  });

  const positional = args._.map(String);
  const givenCommandOptions = COMMAND_OPTION_FLAGS.filter((name) => {
    const value = args[name];
    return name === "output" ? value !== undefined : isTrue(value);
  });

  return {
    command: positional[0],
    operands: positional.slice(1),
    help: isTrue(args.help),
    version: isTrue(args.version),
    verbose: isTrue(args.verbose),
    quiet: isTrue(args.quiet),
    host: lastString(args.host),
    port: lastString(args.port),
    timeout: lastString(args.timeout),
    output: lastString(args.output),
    dryRun: isTrue(args["dry-run"]),
    parents: isTrue(args.parents),
    recursive: isTrue(args.recursive),
    givenCommandOptions,
    unknownOptions,
  };
}

function defaultTransport(config: ConnectionConfig, output: OutputOptions): TransportClient {
  return new HttpTransport(config, (line) => verboseLog(line, output));
}

/**
 * Run one parsed command line against the server
 *
 * @throws ArgumentError for usage errors (exit code 2)
 * @throws DavError subclasses for failed operations
 */
export async function runCli(
  cli: ParsedCli,
  deps: CliDependencies = {},
  ctx: AppContext = getGlobalContext(),
): Promise<void> {
  const hasUnknownOptions = cli.unknownOptions.length > 0;
  if (hasUnknownOptions) {
    throw new ArgumentError(`Unknown option: ${cli.unknownOptions[0]}`, cli.unknownOptions[0]);
  }

  if (cli.version) {
    printResult(`${PROGRAM_NAME} ${VERSION}`);
    return;
  }

  const showHelp = cli.help || cli.command === undefined;
  if (showHelp) {
    printResult(HELP_TEXT);
    return;
  }

  const command = cli.command ?? "";
  const allowedOptions = COMMAND_OPTIONS[command];
  if (allowedOptions === undefined) {
    throw new ArgumentError(`Unknown command: ${command}`, command);
  }
  const misplaced = cli.givenCommandOptions.find((name) => !allowedOptions.includes(name));
  if (misplaced !== undefined) {
    throw new ArgumentError(`Option --${misplaced} is not valid for ${command}`, misplaced);
  }

  const output: OutputOptions = { verbose: cli.verbose, quiet: cli.quiet };
  const config = parseConnectionConfig({ host: cli.host, port: cli.port, timeoutMs: cli.timeout });
  const transport = (deps.createTransport ?? defaultTransport)(config, output);
  const session = createSession(transport, ctx);
  verboseLog(`Server ${transport.baseUrl}`, output);

  switch (command) {
    case "ls": {
      if (cli.operands.length > 1) {
        throw new ArgumentError("ls: expected at most one path", "PATH");
      }
      await lsCommand({ ...output, path: cli.operands[0] }, session);
      break;
    }
    case "put":
      await putCommand(
        { ...output, sources: cli.operands, destination: cli.output, dryRun: cli.dryRun },
        session,
        ctx,
      );
      break;
    case "get":
      await getCommand({ ...output, sources: cli.operands, destination: cli.output, dryRun: cli.dryRun }, session);
      break;
    case "mkdir":
      await mkdirCommand({ ...output, paths: cli.operands, parents: cli.parents }, session);
      break;
    case "rm":
      await rmCommand({ ...output, paths: cli.operands, recursive: cli.recursive }, session);
      break;
  }
}
