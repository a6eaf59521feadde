import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createMockContext } from "../context/testing.ts";
import { ActionFailedError, NotFoundError } from "../errors/index.ts";
import { ROOT, segment, tokenize } from "../path/token.ts";
import { createSession } from "../services/remote/session.ts";
import { copyFile, createPlan, makeDirectory } from "../transfer/types.ts";
import { MemoryDavServer } from "../transport/testing.ts";
import { resetColorDetection } from "./ansi.ts";
import { runPlan } from "./transfer-runner.ts";

describe("runPlan", () => {
  let stdout: string[];
  let stderr: string[];
  let warnings: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    warnings = [];
    vi.spyOn(console, "log").mockImplementation((line: string) => {
      stdout.push(line);
    });
    vi.spyOn(console, "error").mockImplementation((line: string) => {
      stderr.push(line);
    });
    vi.spyOn(console, "warn").mockImplementation((line: string) => {
      warnings.push(line);
    });
    vi.stubEnv("NO_COLOR", "1");
    delete process.env.FORCE_COLOR;
    resetColorDetection();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    resetColorDetection();
  });

  const files = new Map<string, Uint8Array>([
    ["/src/a.txt", new TextEncoder().encode("aaa")],
    ["/src/d/b.txt", new TextEncoder().encode("b")],
  ]);
  const ctx = createMockContext({
    fs: {
      openRead: (path) => {
        const data = files.get(path);
        return data ? Promise.resolve(Readable.from([data])) : Promise.reject(new Error(`unexpected read ${path}`));
      },
    },
  });

  const uploadPlan = createPlan("upload", "/src", [
    makeDirectory(tokenize("/dst")),
    copyFile(segment("a.txt"), tokenize("/dst/a.txt"), 3),
    makeDirectory(tokenize("/dst/d")),
    copyFile(tokenize("d/b.txt"), tokenize("/dst/d/b.txt"), 1),
  ], [segment("link")]);

  it("prints each copied file and returns the number of actions", async () => {
    const server = new MemoryDavServer();

    const completed = await runPlan(uploadPlan, createSession(server, ctx));

    expect(completed).toBe(4);
    expect(stdout).toEqual(["/src/a.txt -> /dst/a.txt", "/src/d/b.txt -> /dst/d/b.txt"]);
    expect(server.readText("/dst/d/b.txt")).toBe("b");
  });

  it("warns about skipped entries", async () => {
    await runPlan(uploadPlan, createSession(new MemoryDavServer(), ctx));
    expect(warnings).toEqual(["not following /src/link (link or special file)"]);
  });

  it("logs directory creation and the plan size in verbose mode", async () => {
    await runPlan(uploadPlan, createSession(new MemoryDavServer(), ctx), { verbose: true });
    expect(stderr).toEqual([
      "[verbose] Planned 4 action(s) for upload via /src",
      "[verbose] make-directory /dst",
      "[verbose] make-directory /dst/d",
    ]);
  });

  it("only lists actions in dry-run mode", async () => {
    const server = new MemoryDavServer();

    const completed = await runPlan(uploadPlan, createSession(server, ctx), { dryRun: true });

    expect(completed).toBe(0);
    expect(server.requests).toEqual([]);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      "[dry-run] make-directory /dst",
      "[dry-run] copy-file /src/a.txt -> /dst/a.txt",
      "[dry-run] make-directory /dst/d",
      "[dry-run] copy-file /src/d/b.txt -> /dst/d/b.txt",
    ]);
  });

  it("describes download actions with local paths", async () => {
    const plan = createPlan("download", "/out", [makeDirectory(ROOT), copyFile(tokenize("/r/x"), segment("x"), 1)]);
    await runPlan(plan, createSession(new MemoryDavServer(), ctx), { dryRun: true });
    expect(stderr).toEqual(["[dry-run] make-directory /out", "[dry-run] copy-file /r/x -> /out/x"]);
  });

  it("throws ActionFailedError naming the failed action", async () => {
    const plan = createPlan("download", "/out", [copyFile(tokenize("/missing.txt"), ROOT)]);

    const error = await runPlan(plan, createSession(new MemoryDavServer(), ctx)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ActionFailedError);
    expect(error instanceof ActionFailedError && error.message).toBe(
      "copy-file /missing.txt -> /out failed: No such file or directory: /missing.txt",
    );
    expect(error instanceof ActionFailedError && error.cause).toBeInstanceOf(NotFoundError);
  });
});
