import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { captureLogs, listDir, makeTempDir, removeDir, silentLogger } from "../test/helpers";
import { ConversionError } from "./errors";
import { INPUT_FILE, OUTPUT_FILE, WORKSPACE_PREFIX, WorkspaceManager } from "./workspace";

describe("WorkspaceManager", () => {
  let base: string;
  let root: string;

  beforeEach(async () => {
    base = await makeTempDir("workspace");
    root = path.join(base, "root");
  });

  afterEach(async () => {
    await removeDir(base);
  });

  it("allocates distinct directories under the root, creating the root if needed", async () => {
    const manager = new WorkspaceManager(root, silentLogger());

    const first = await manager.acquire();
    const second = await manager.acquire();

    expect(first.dir).not.toBe(second.dir);
    expect(first.id).not.toBe(second.id);
    expect(path.dirname(first.dir)).toBe(root);
    expect(path.basename(first.dir).startsWith(`${WORKSPACE_PREFIX}${first.id}-`)).toBe(true);
    expect(first.inputPath).toBe(path.join(first.dir, INPUT_FILE));
    expect(first.outputPath).toBe(path.join(first.dir, OUTPUT_FILE));
    expect((await fs.stat(first.dir)).isDirectory()).toBe(true);
    expect(manager.liveCount()).toBe(2);
  });

  it("reports ResourceExhausted when the root cannot be created", async () => {
    const blocker = path.join(base, "not-a-dir");
    await fs.writeFile(blocker, "x");
    const manager = new WorkspaceManager(path.join(blocker, "root"), silentLogger());

    const error = await manager.acquire().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({ kind: "ResourceExhausted" });
    expect(manager.liveCount()).toBe(0);
  });

  it("writes the input under its fixed name", async () => {
    const manager = new WorkspaceManager(root, silentLogger());
    const workspace = await manager.acquire();

    await manager.writeInput(workspace, Buffer.from("OggS-payload"));

    expect(await fs.readFile(path.join(workspace.dir, INPUT_FILE), "utf8")).toBe("OggS-payload");
  });

  it("reports IOFailure when the input cannot be written", async () => {
    const manager = new WorkspaceManager(root, silentLogger());
    const workspace = await manager.acquire();
    await fs.rm(workspace.dir, { recursive: true });

    await expect(manager.writeInput(workspace, Buffer.from("x"))).rejects.toMatchObject({
      kind: "IOFailure",
    });
  });

  it("reads the output the encoder produced", async () => {
    const manager = new WorkspaceManager(root, silentLogger());
    const workspace = await manager.acquire();
    await fs.writeFile(workspace.outputPath, "ID3-audio");

    const output = await manager.readOutput(workspace);

    expect(output.toString()).toBe("ID3-audio");
  });

  it("reports NotFound when the output is missing or empty", async () => {
    const manager = new WorkspaceManager(root, silentLogger());
    const workspace = await manager.acquire();

    await expect(manager.readOutput(workspace)).rejects.toMatchObject({ kind: "NotFound" });

    await fs.writeFile(workspace.outputPath, "");
    await expect(manager.readOutput(workspace)).rejects.toMatchObject({
      kind: "NotFound",
      message: "Encoder produced an empty output file",
    });
  });

  it("reports IOFailure when the output path is unreadable", async () => {
    const manager = new WorkspaceManager(root, silentLogger());
    const workspace = await manager.acquire();
    await fs.mkdir(workspace.outputPath);

    await expect(manager.readOutput(workspace)).rejects.toMatchObject({ kind: "IOFailure" });
  });

  it("removes the workspace and all of its contents on release", async () => {
    const manager = new WorkspaceManager(root, silentLogger());
    const workspace = await manager.acquire();
    await manager.writeInput(workspace, Buffer.from("in"));
    await fs.writeFile(workspace.outputPath, "out");

    await manager.release(workspace);

    expect(await listDir(root)).toEqual([]);
    expect(manager.liveCount()).toBe(0);
  });

  it("treats a second release as a no-op", async () => {
    const { logger, lines } = captureLogs();
    const manager = new WorkspaceManager(root, logger);
    const workspace = await manager.acquire();

    await manager.release(workspace);
    await expect(manager.release(workspace)).resolves.toBeUndefined();

    expect(lines.filter((line) => line.includes("workspace cleanup failed"))).toEqual([]);
  });

  it("reports a failed cleanup through the logger passed for the call", async () => {
    const base = captureLogs();
    const perCall = captureLogs();
    const manager = new WorkspaceManager(root, base.logger);
    const workspace = await manager.acquire();
    vi.spyOn(fs, "rm").mockRejectedValueOnce(new Error("device busy"));

    await manager.release(workspace, perCall.logger.child({ requestId: "req-9" }));

    const line = perCall.lines.find((entry) => entry.includes("workspace cleanup failed"));
    expect(JSON.parse(line ?? "{}")).toMatchObject({
      requestId: "req-9",
      workspaceId: workspace.id,
      err: "device busy",
    });
    expect(base.lines).toEqual([]);
    vi.restoreAllMocks();
    await fs.rm(workspace.dir, { recursive: true, force: true });
  });

  it("removes workspaces left behind by an earlier process", async () => {
    await fs.mkdir(path.join(root, `${WORKSPACE_PREFIX}stale-1`), { recursive: true });
    await fs.writeFile(path.join(root, `${WORKSPACE_PREFIX}stale-1`, INPUT_FILE), "old");
    await fs.mkdir(path.join(root, `${WORKSPACE_PREFIX}stale-2`));
    await fs.mkdir(path.join(root, "unrelated"));

    const manager = new WorkspaceManager(root, silentLogger());
    const live = await manager.acquire();

    const removed = await manager.sweepStale();

    expect(removed).toBe(2);
    expect((await listDir(root)).sort()).toEqual([path.basename(live.dir), "unrelated"].sort());
  });

  it("sweeps nothing when the root does not exist yet", async () => {
    const manager = new WorkspaceManager(root, silentLogger());

    await expect(manager.sweepStale()).resolves.toBe(0);
  });
});
