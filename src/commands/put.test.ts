import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join as joinLocal } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type AppContext, createAppContext } from "../context/index.ts";
import { ActionFailedError, ArgumentError, NotFoundError } from "../errors/index.ts";
import { nodeRuntime } from "../runtime/node/index.ts";
import { createSession } from "../services/remote/session.ts";
import { MemoryDavServer } from "../transport/testing.ts";
import { putCommand } from "./put.ts";

describe("putCommand", () => {
  let tempDir: string;
  let ctx: AppContext;
  let stdout: string[];

  beforeEach(async () => {
    tempDir = await mkdtemp(joinLocal(tmpdir(), "plaindav-put-"));
    ctx = createAppContext({ ...nodeRuntime, control: { ...nodeRuntime.control, cwd: () => tempDir } });
    stdout = [];
    vi.spyOn(console, "log").mockImplementation((line: string) => {
      stdout.push(line);
    });
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it("uploads a local directory under its own name", async () => {
    await mkdir(joinLocal(tempDir, "local", "sub"), { recursive: true });
    await writeFile(joinLocal(tempDir, "local", "a.txt"), "hello");
    await writeFile(joinLocal(tempDir, "local", "sub", "b.txt"), "abc");
    const server = new MemoryDavServer().addDirectory("/remote");

    await putCommand({ sources: ["./local"], destination: "/remote" }, createSession(server, ctx), ctx);

    expect(server.paths()).toEqual([
      "/remote",
      "/remote/local",
      "/remote/local/a.txt",
      "/remote/local/sub",
      "/remote/local/sub/b.txt",
    ]);
    expect(server.readText("/remote/local/a.txt")).toBe("hello");
    expect(stdout).toEqual([
      `${joinLocal(tempDir, "local", "a.txt")} -> /remote/local/a.txt`,
      `${joinLocal(tempDir, "local", "sub", "b.txt")} -> /remote/local/sub/b.txt`,
    ]);
  });

  it("uploads several sources into the root by default", async () => {
    await writeFile(joinLocal(tempDir, "one.txt"), "1");
    await writeFile(joinLocal(tempDir, "two.txt"), "2");
    const server = new MemoryDavServer();

    await putCommand({ sources: ["one.txt", "two.txt"] }, createSession(server, ctx), ctx);

    expect(server.paths()).toEqual(["/one.txt", "/two.txt"]);
    expect(stdout).toEqual([
      `${joinLocal(tempDir, "one.txt")} -> /one.txt`,
      `${joinLocal(tempDir, "two.txt")} -> /two.txt`,
    ]);
  });

  it("sends nothing in dry-run mode", async () => {
    await writeFile(joinLocal(tempDir, "f.txt"), "f");
    const server = new MemoryDavServer();

    await putCommand({ sources: ["f.txt"], dryRun: true }, createSession(server, ctx), ctx);

    expect(server.requests).toEqual([]);
    expect(stdout).toEqual([]);
  });

  it("fails when the destination directory is missing", async () => {
    await writeFile(joinLocal(tempDir, "f.txt"), "f");
    const session = createSession(new MemoryDavServer(), ctx);

    await expect(putCommand({ sources: ["f.txt"], destination: "/nowhere" }, session, ctx)).rejects.toThrow(
      ActionFailedError,
    );
  });

  it("fails for a missing local source", async () => {
    const session = createSession(new MemoryDavServer(), ctx);
    await expect(putCommand({ sources: ["missing"] }, session, ctx)).rejects.toThrow(NotFoundError);
  });

  it("requires at least one source", async () => {
    const session = createSession(new MemoryDavServer(), ctx);
    await expect(putCommand({ sources: [] }, session, ctx)).rejects.toThrow(ArgumentError);
  });
});
