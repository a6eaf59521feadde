import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join as joinLocal } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type AppContext, createAppContext } from "../context/index.ts";
import { createMockContext } from "../context/testing.ts";
import { InvalidPathError, NotFoundError } from "../errors/index.ts";
import { isStrictAncestor, type PathToken, ROOT, segment, toDisplayString, tokenize, toRelativeDisplayString } from "../path/token.ts";
import { RemoteDirectoryLister } from "../remote/lister.ts";
import { nodeRuntime } from "../runtime/node/index.ts";
import { MemoryDavServer } from "../transport/testing.ts";
import { ActionPlanner } from "./planner.ts";
import { type Action, copyFile, makeDirectory, type Plan } from "./types.ts";

/**
 * Path an action creates or writes, on the side the plan writes to
 */
function targetOf(action: Action): PathToken {
  return action.kind === "make-directory" ? action.path : action.destPath;
}

/**
 * Every make-directory precedes the actions below the directory it creates
 */
function assertParentsFirst(plan: Plan): void {
  plan.actions.forEach((action, index) => {
    if (action.kind !== "make-directory") return;
    const earlier = plan.actions.slice(0, index);
    const violating = earlier.filter((other) => isStrictAncestor(action.path, targetOf(other)));
    expect(violating).toEqual([]);
  });
}

describe("ActionPlanner.planUpload", () => {
  let tempDir: string;
  let ctx: AppContext;
  let planner: ActionPlanner;

  beforeEach(async () => {
    tempDir = await mkdtemp(joinLocal(tmpdir(), "plaindav-planner-"));
    ctx = createAppContext(nodeRuntime);
    planner = new ActionPlanner(new RemoteDirectoryLister(new MemoryDavServer()), ctx);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("plans a directory as make-directory followed by its children by name", async () => {
    const local = joinLocal(tempDir, "local");
    await mkdir(joinLocal(local, "sub"), { recursive: true });
    await writeFile(joinLocal(local, "a.txt"), "hello");
    await writeFile(joinLocal(local, "sub", "b.txt"), "abc");

    const plan = await planner.planUpload(local, tokenize("/remote/local"));

    expect(plan.direction).toBe("upload");
    expect(plan.localRoot).toBe(local);
    expect(plan.skipped).toEqual([]);
    expect(plan.actions).toEqual([
      makeDirectory(tokenize("/remote/local")),
      copyFile(tokenize("a.txt"), tokenize("/remote/local/a.txt"), 5),
      makeDirectory(tokenize("/remote/local/sub")),
      copyFile(tokenize("sub/b.txt"), tokenize("/remote/local/sub/b.txt"), 3),
    ]);
  });

  it("interleaves files and directories in name order", async () => {
    await mkdir(joinLocal(tempDir, "b"));
    await writeFile(joinLocal(tempDir, "a.txt"), "");
    await writeFile(joinLocal(tempDir, "c.txt"), "");
    await writeFile(joinLocal(tempDir, "b", "inner.txt"), "");

    const plan = await planner.planUpload(tempDir, tokenize("/t"));

    const summary = plan.actions.map((action) =>
      action.kind === "make-directory"
        ? `mkdir ${toDisplayString(action.path)}`
        : `copy ${toRelativeDisplayString(action.sourcePath)}`
    );
    expect(summary).toEqual(["mkdir /t", "copy a.txt", "mkdir /t/b", "copy b/inner.txt", "copy c.txt"]);
  });

  it("keeps parents before children in a deeper tree", async () => {
    await mkdir(joinLocal(tempDir, "x", "y", "z"), { recursive: true });
    await mkdir(joinLocal(tempDir, "w"));
    await writeFile(joinLocal(tempDir, "x", "y", "z", "leaf.txt"), "leaf");
    await writeFile(joinLocal(tempDir, "x", "top.txt"), "top");
    await writeFile(joinLocal(tempDir, "w", "w.txt"), "w");

    const plan = await planner.planUpload(tempDir, tokenize("/deep"));

    expect(plan.actions).toHaveLength(8);
    assertParentsFirst(plan);
  });

  it("plans a single file as one copy-file from the local root", async () => {
    const file = joinLocal(tempDir, "one.bin");
    await writeFile(file, "1234567");

    const plan = await planner.planUpload(file, tokenize("/dest/one.bin"));

    expect(plan.localRoot).toBe(file);
    expect(plan.actions).toEqual([copyFile(ROOT, tokenize("/dest/one.bin"), 7)]);
  });

  it("plans an empty directory as a single make-directory", async () => {
    const plan = await planner.planUpload(tempDir, tokenize("/empty"));
    expect(plan.actions).toEqual([makeDirectory(tokenize("/empty"))]);
  });

  it("resolves relative roots against the working directory", async () => {
    await writeFile(joinLocal(tempDir, "rel.txt"), "r");
    const relativeCtx = createAppContext({
      ...nodeRuntime,
      control: { ...nodeRuntime.control, cwd: () => tempDir },
    });
    const relativePlanner = new ActionPlanner(new RemoteDirectoryLister(new MemoryDavServer()), relativeCtx);

    const plan = await relativePlanner.planUpload("rel.txt", tokenize("/rel.txt"));

    expect(plan.localRoot).toBe(joinLocal(tempDir, "rel.txt"));
  });

  it("throws NotFoundError for a missing root", async () => {
    const missing = joinLocal(tempDir, "missing");
    await expect(planner.planUpload(missing, tokenize("/x"))).rejects.toThrow(NotFoundError);
    await expect(planner.planUpload(missing, tokenize("/x"))).rejects.toThrow(`No such file or directory: ${missing}`);
  });

  it("follows links to files inside the root and skips every other link", async () => {
    const root = joinLocal(tempDir, "root");
    const outside = joinLocal(tempDir, "outside.txt");
    await mkdir(joinLocal(root, "dir"), { recursive: true });
    await writeFile(joinLocal(root, "real.txt"), "real!");
    await writeFile(outside, "outside");
    await symlink(joinLocal(root, "real.txt"), joinLocal(root, "link-file"));
    await symlink(joinLocal(root, "dir"), joinLocal(root, "link-dir"));
    await symlink(joinLocal(root, "gone.txt"), joinLocal(root, "link-broken"));
    await symlink(outside, joinLocal(root, "link-outside"));

    const plan = await planner.planUpload(root, tokenize("/r"));

    expect(plan.actions).toEqual([
      makeDirectory(tokenize("/r")),
      makeDirectory(tokenize("/r/dir")),
      copyFile(segment("link-file"), tokenize("/r/link-file"), 5),
      copyFile(segment("real.txt"), tokenize("/r/real.txt"), 5),
    ]);
    expect(plan.skipped.map(toRelativeDisplayString)).toEqual(["link-broken", "link-dir", "link-outside"]);
  });

  it("follows the root argument when it is a link", async () => {
    const real = joinLocal(tempDir, "real");
    await mkdir(real);
    await writeFile(joinLocal(real, "f.txt"), "f");
    await symlink(real, joinLocal(tempDir, "alias"));

    const plan = await planner.planUpload(joinLocal(tempDir, "alias"), tokenize("/a"));

    expect(plan.actions).toEqual([
      makeDirectory(tokenize("/a")),
      copyFile(segment("f.txt"), tokenize("/a/f.txt"), 1),
    ]);
  });

  it("rejects a root that is neither a file nor a directory", async () => {
    const mockCtx = createMockContext({
      fs: {
        stat: () => Promise.resolve({ isFile: false, isDirectory: false, size: 0 }),
      },
    });
    const mockPlanner = new ActionPlanner(new RemoteDirectoryLister(new MemoryDavServer()), mockCtx);

    await expect(mockPlanner.planUpload("/dev/fifo", tokenize("/f"))).rejects.toThrow(InvalidPathError);
  });
});

describe("ActionPlanner.planDownload", () => {
  const ctx = createMockContext({ control: { cwd: () => "/work" } });

  it("plans a directory tree with local tokens relative to the destination", async () => {
    const server = new MemoryDavServer()
      .addFile("/data/x.txt", "xx")
      .addFile("/data/sub/y.txt", "yyy");
    const planner = new ActionPlanner(new RemoteDirectoryLister(server), ctx);

    const plan = await planner.planDownload(tokenize("/data"), "out/data");

    expect(plan.direction).toBe("download");
    expect(plan.localRoot).toBe("/work/out/data");
    expect(plan.actions).toEqual([
      makeDirectory(ROOT),
      makeDirectory(tokenize("sub")),
      copyFile(tokenize("/data/sub/y.txt"), tokenize("sub/y.txt"), 3),
      copyFile(tokenize("/data/x.txt"), tokenize("x.txt"), 2),
    ]);
  });

  it("plans a file as a single copy-file to the local root", async () => {
    const server = new MemoryDavServer().addFile("/notes.md", "# notes");
    const planner = new ActionPlanner(new RemoteDirectoryLister(server), ctx);

    const plan = await planner.planDownload(tokenize("/notes.md"), "/abs/notes.md");

    expect(plan.localRoot).toBe("/abs/notes.md");
    expect(plan.actions).toEqual([copyFile(tokenize("/notes.md"), ROOT, 7)]);
  });

  it("lists each directory once and performs no writes", async () => {
    const server = new MemoryDavServer()
      .addFile("/t/a/1.txt", "1")
      .addFile("/t/a/b/2.txt", "2")
      .addDirectory("/t/c");
    const planner = new ActionPlanner(new RemoteDirectoryLister(server), ctx);

    const plan = await planner.planDownload(tokenize("/t"), "/dl");

    expect(server.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
      "PROPFIND /t",
      "PROPFIND /t/a",
      "PROPFIND /t/a/b",
      "PROPFIND /t/c",
    ]);
    assertParentsFirst(plan);
  });

  it("throws NotFoundError for a missing remote root", async () => {
    const planner = new ActionPlanner(new RemoteDirectoryLister(new MemoryDavServer()), ctx);
    await expect(planner.planDownload(tokenize("/missing"), "/dl")).rejects.toThrow(NotFoundError);
  });
});
