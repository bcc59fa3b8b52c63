import { readFileSync } from "fs";
import fs from "fs/promises";
import os from "os";
import path from "path";
import pino from "pino";
import type { Logger } from "../types";

export type StubKind =
  | "success"
  | "slow-success"
  | "fail"
  | "sleep"
  | "silent"
  | "noisy";

// The success stubs write "ID3<workspace dir name>|<input bytes>" to the
// last argument, so a test can tell which workspace produced an output.
const COPY_INPUT = `
in=""; out=""; prev=""
for arg in "$@"; do
  if [ "$prev" = "-i" ]; then in="$arg"; fi
  prev="$arg"; out="$arg"
done
if [ "$out" = "-version" ]; then echo "stub-encoder version 1"; exit 0; fi
printf 'ID3%s|' "$(basename "$(dirname "$out")")" > "$out"
cat "$in" >> "$out"
`;

const scriptFor = (kind: StubKind, pidFile: string) => {
  switch (kind) {
    case "success":
      return COPY_INPUT;
    case "slow-success":
      return `sleep 0.3\n${COPY_INPUT}`;
    case "fail":
      return `echo "unsupported format" >&2\nexit 1\n`;
    case "sleep":
      // Forks, so the sleeper is a grandchild that also holds stderr open
      return `sleep 30 &\necho $! > "${pidFile}"\nwait\n`;
    case "silent":
      return "exit 0\n";
    case "noisy":
      return `head -c 70000 /dev/zero | tr '\\000' 'e' >&2\nexit 1\n`;
  }
};

export const makeTempDir = (label: string) =>
  fs.mkdtemp(path.join(os.tmpdir(), `ogg-to-mp3-test-${label}-`));

export const removeDir = (dir: string) => fs.rm(dir, { recursive: true, force: true });

export interface EncoderStub {
  path: string;
  pidFile: string;
}

export const writeEncoderStub = async (dir: string, kind: StubKind): Promise<EncoderStub> => {
  const stubPath = path.join(dir, `encoder-${kind}.sh`);
  const pidFile = path.join(dir, `encoder-${kind}.pid`);
  await fs.writeFile(stubPath, `#!/bin/sh\n${scriptFor(kind, pidFile)}`, { mode: 0o755 });
  return { path: stubPath, pidFile };
};

export const captureLogs = () => {
  const lines: string[] = [];
  const stream = {
    write: (line: string) => {
      lines.push(line);
    },
  };
  const logger: Logger = pino({ level: "debug" }, stream);
  return { lines, stream, logger, text: () => lines.join("") };
};

export const silentLogger = (): Logger => pino({ level: "silent" });

// A killed process nobody has reaped yet still answers kill(pid, 0); count it as gone
export const isRunning = (pid: number) => {
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, "utf8");
    const state = stat.slice(stat.lastIndexOf(")") + 2, stat.lastIndexOf(")") + 3);
    return state !== "Z" && state !== "X";
  } catch {
    try {
      process.kill(pid, 0);
      return true;
    } catch {
      return false;
    }
  }
};

export const waitUntilGone = async (pid: number, timeoutMs = 2000) => {
  const deadline = Date.now() + timeoutMs;
  while (isRunning(pid) && Date.now() < deadline) {
    await new Promise((resolve) => setTimeout(resolve, 25));
  }
  return !isRunning(pid);
};

export const readPid = async (pidFile: string) =>
  Number((await fs.readFile(pidFile, "utf8")).trim());

export const listDir = async (dir: string) => {
  try {
    return await fs.readdir(dir);
  } catch {
    return [];
  }
};

// Minimal Ogg first page: capture pattern followed by an Opus or Vorbis header
export const oggPayload = (codec: "opus" | "vorbis", extra = 0) => {
  const page = Buffer.alloc(28);
  page.write("OggS", 0, "latin1");
  const header = codec === "opus" ? Buffer.from("OpusHead", "latin1") : Buffer.from("\x01vorbis", "latin1");
  return Buffer.concat([page, header, Buffer.alloc(extra, 0x41)]);
};
