import { spawn } from "child_process";
import type { InvocationOutcome, Logger, Transcoder } from "../types";
import { describeError } from "./errors";

export const STDERR_LIMIT_BYTES = 64 * 1024;
export const TRUNCATION_MARKER = "\n[stderr truncated]";

export interface FfmpegTranscoderOptions {
  binary: string;
  timeoutMs: number;
  bitrate: string;
  logger: Logger;
}

// Length of the UTF-8 sequence a lead byte starts, 0 for a continuation byte
const sequenceLength = (byte: number) => {
  if ((byte & 0b1100_0000) === 0b1000_0000) return 0;
  if ((byte & 0b1110_0000) === 0b1100_0000) return 2;
  if ((byte & 0b1111_0000) === 0b1110_0000) return 3;
  if ((byte & 0b1111_1000) === 0b1111_0000) return 4;
  return 1;
};

/** Drops a multi-byte character cut short at the end of `buf`. */
export const trimPartialUtf8 = (buf: Buffer): Buffer => {
  for (let back = 1; back <= Math.min(4, buf.length); back++) {
    const length = sequenceLength(buf[buf.length - back]);
    if (length === 0) continue;
    return length > back ? buf.subarray(0, buf.length - back) : buf;
  }
  return buf;
};

// Keeps the first `limit` bytes of a stream and drops the rest.
export class BoundedCapture {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer) {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    if (chunk.length > room) {
      this.chunks.push(chunk.subarray(0, room));
      this.size += room;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  text(): string {
    const captured = Buffer.concat(this.chunks);
    if (!this.truncated) return captured.toString("utf8").trim();
    return trimPartialUtf8(captured).toString("utf8").trim() + TRUNCATION_MARKER;
  }
}

interface RunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
  timedOut: boolean;
  spawnError?: Error;
}

export class FfmpegTranscoder implements Transcoder {
  constructor(private readonly options: FfmpegTranscoderOptions) {}

  encodeArgs(inputPath: string, outputPath: string): string[] {
    return [
      "-hide_banner",
      "-nostdin",
      "-loglevel", "error",
      "-y",
      "-i", inputPath,
      "-vn",
      "-codec:a", "libmp3lame",
      "-b:a", this.options.bitrate,
      "-f", "mp3",
      outputPath,
    ];
  }

  async convert(
    inputPath: string,
    outputPath: string,
    logger: Logger = this.options.logger,
  ): Promise<InvocationOutcome> {
    const startedAt = Date.now();
    const result = await this.run(this.encodeArgs(inputPath, outputPath), logger);
    const elapsedMs = Date.now() - startedAt;

    if (result.timedOut) {
      logger.warn(
        { timeoutMs: this.options.timeoutMs, elapsedMs },
        "encoder killed after timeout",
      );
      return { status: "timeout", timeoutMs: this.options.timeoutMs };
    }

    if (result.spawnError) {
      return {
        status: "failed",
        exitCode: null,
        signal: null,
        stderr: `could not start ${this.options.binary}: ${describeError(result.spawnError)}`,
      };
    }

    if (result.exitCode === 0) {
      logger.debug({ elapsedMs }, "encoder finished");
      return { status: "success" };
    }

    return {
      status: "failed",
      exitCode: result.exitCode,
      signal: result.signal,
      stderr: result.stderr,
    };
  }

  async isAvailable(): Promise<boolean> {
    const result = await this.run(["-hide_banner", "-version"], this.options.logger);
    return !result.timedOut && !result.spawnError && result.exitCode === 0;
  }

  private run(args: string[], logger: Logger): Promise<RunResult> {
    return new Promise((resolve) => {
      // Own process group, so a timeout takes down anything the encoder forked
      const child = spawn(this.options.binary, args, {
        stdio: ["ignore", "ignore", "pipe"],
        detached: true,
      });
      const stderr = new BoundedCapture(STDERR_LIMIT_BYTES);
      let timedOut = false;
      let settled = false;

      const killGroup = () => {
        if (child.pid === undefined) return;
        try {
          process.kill(-child.pid, "SIGKILL");
        } catch (error) {
          logger.debug({ err: describeError(error) }, "process group already gone");
          child.kill("SIGKILL");
        }
      };

      const timer = setTimeout(() => {
        timedOut = true;
        killGroup();
      }, this.options.timeoutMs);

      const settle = (result: RunResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (error) => {
        // No pid means the process never started, so no "close" will follow
        if (child.pid !== undefined) {
          logger.warn({ err: describeError(error) }, "encoder process error");
          return;
        }
        settle({
          exitCode: null,
          signal: null,
          stderr: "",
          timedOut: false,
          spawnError: error,
        });
      });

      // "exit" fires once the child is reaped. Past the deadline, do not wait
      // for "close": a process that left the group may still hold stderr.
      child.on("exit", (code, signal) => {
        if (!timedOut) return;
        child.stderr.destroy();
        settle({ exitCode: code, signal, stderr: stderr.text(), timedOut });
      });

      child.on("close", (code, signal) => {
        settle({
          exitCode: code,
          signal,
          stderr: stderr.text(),
          timedOut,
        });
      });
    });
  }
}
