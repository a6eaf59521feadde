#!/usr/bin/env node
import { parseCli, runCli } from "./src/cli.ts";
import { createAppContext, setGlobalContext } from "./src/context/index.ts";
import { withErrorHandler } from "./src/errors/handler.ts";
import { initRuntime } from "./src/runtime/index.ts";

async function main(): Promise<void> {
  const runtime = await initRuntime();
  const ctx = createAppContext(runtime);
  setGlobalContext(ctx);

  const cli = parseCli(runtime.control.args);
  await withErrorHandler(runCli, { verbose: cli.verbose }, ctx)(cli, {}, ctx);
}

await main();
