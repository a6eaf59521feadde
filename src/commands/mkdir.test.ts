import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createMockContext } from "../context/testing.ts";
import { AlreadyExistsError, ArgumentError, ParentNotFoundError } from "../errors/index.ts";
import { createSession } from "../services/remote/session.ts";
import { MemoryDavServer } from "../transport/testing.ts";
import { mkdirCommand } from "./mkdir.ts";

describe("mkdirCommand", () => {
  let stderr: string[];

  beforeEach(() => {
    stderr = [];
    vi.spyOn(console, "error").mockImplementation((line: string) => {
      stderr.push(line);
    });
    vi.stubEnv("NO_COLOR", "1");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("creates each path", async () => {
    const server = new MemoryDavServer();
    await mkdirCommand({ paths: ["/one", "/two"] }, createSession(server, createMockContext()));
    expect(server.paths()).toEqual(["/one", "/two"]);
  });

  it("creates missing parents with -p and logs what it created", async () => {
    const server = new MemoryDavServer().addDirectory("/a");
    const session = createSession(server, createMockContext());

    await mkdirCommand({ paths: ["/a/b/c"], parents: true, verbose: true }, session);

    expect(server.paths()).toEqual(["/a", "/a/b", "/a/b/c"]);
    expect(stderr.filter((line) => line.includes("created"))).toHaveLength(2);
  });

  it("fails without -p when the parent is missing", async () => {
    const session = createSession(new MemoryDavServer(), createMockContext());
    await expect(mkdirCommand({ paths: ["/a/b"] }, session)).rejects.toThrow(ParentNotFoundError);
  });

  it("fails without -p when the directory exists", async () => {
    const session = createSession(new MemoryDavServer().addDirectory("/a"), createMockContext());
    await expect(mkdirCommand({ paths: ["/a"] }, session)).rejects.toThrow(AlreadyExistsError);
  });

  it("requires at least one path", async () => {
    const session = createSession(new MemoryDavServer(), createMockContext());
    await expect(mkdirCommand({ paths: [] }, session)).rejects.toThrow(ArgumentError);
  });
});
