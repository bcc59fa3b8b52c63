import { randomUUID } from "crypto";
import fs from "fs/promises";
import path from "path";
import type { Logger, Workspace } from "../types";
import { ConversionError, describeError, errnoCode } from "./errors";

export const WORKSPACE_PREFIX = "convert-";
export const INPUT_FILE = "input.ogg";
export const OUTPUT_FILE = "output.mp3";

export class WorkspaceManager {
  private readonly live = new Set<string>();

  constructor(
    private readonly root: string,
    private readonly logger: Logger,
  ) {}

  async acquire(): Promise<Workspace> {
    const id = randomUUID();
    let dir: string;
    try {
      await fs.mkdir(this.root, { recursive: true });
      dir = await fs.mkdtemp(path.join(this.root, `${WORKSPACE_PREFIX}${id}-`));
    } catch (error) {
      throw new ConversionError("ResourceExhausted", "Could not allocate workspace", {
        cause: error,
      });
    }

    this.live.add(dir);
    return {
      id,
      dir,
      inputPath: path.join(dir, INPUT_FILE),
      outputPath: path.join(dir, OUTPUT_FILE),
    };
  }

  async writeInput(workspace: Workspace, payload: Buffer): Promise<void> {
    try {
      await fs.writeFile(workspace.inputPath, payload, { flag: "wx" });
    } catch (error) {
      throw new ConversionError("IOFailure", "Could not stage input", { cause: error });
    }
  }

  async readOutput(workspace: Workspace): Promise<Buffer> {
    let output: Buffer;
    try {
      output = await fs.readFile(workspace.outputPath);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        throw new ConversionError("NotFound", "Encoder produced no output file", {
          cause: error,
        });
      }
      throw new ConversionError("IOFailure", "Could not read encoder output", {
        cause: error,
      });
    }

    if (output.length === 0) {
      throw new ConversionError("NotFound", "Encoder produced an empty output file");
    }
    return output;
  }

  /** Never throws: a failed cleanup must not mask the conversion result. */
  async release(workspace: Workspace, logger: Logger = this.logger): Promise<void> {
    if (!this.live.delete(workspace.dir)) return;
    try {
      await fs.rm(workspace.dir, { recursive: true, force: true });
    } catch (error) {
      logger.warn(
        { workspaceId: workspace.id, err: describeError(error) },
        "workspace cleanup failed",
      );
    }
  }

  liveCount(): number {
    return this.live.size;
  }

  // Removes workspaces a previous process left behind. Call before serving.
  async sweepStale(): Promise<number> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.root);
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        this.logger.warn({ root: this.root, err: describeError(error) }, "workspace sweep failed");
      }
      return 0;
    }

    let removed = 0;
    for (const entry of entries) {
      if (!entry.startsWith(WORKSPACE_PREFIX)) continue;
      const dir = path.join(this.root, entry);
      if (this.live.has(dir)) continue;
      try {
        await fs.rm(dir, { recursive: true, force: true });
        removed += 1;
      } catch (error) {
        this.logger.warn({ dir, err: describeError(error) }, "stale workspace removal failed");
      }
    }
    return removed;
  }
}
