import dotenv from "dotenv";
import os from "os";
import path from "path";
dotenv.config();

type Env = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  corsOrigin: string;
  encoder: {
    path: string;
    timeoutMs: number;
    bitrate: string;
  };
  maxInputBytes: number;
  maxConcurrentConversions: number;
  workspaceRoot: string;
}

const DEFAULT_MAX_INPUT_BYTES = 20 * 1024 * 1024;

const checkEnv = (env: Env, key: string) => {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(`Missing environment variable: ${key}`);
  }
  return value;
};

// Largest delay setTimeout honours; anything above fires after 1ms
export const MAX_TIMEOUT_MS = 2_147_483_647;

const intFromEnv = (env: Env, key: string, fallback: number, max = Number.MAX_SAFE_INTEGER) => {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) return fallback;
  return Math.min(parsed, max);
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const rawPort = checkEnv(env, "PORT");
  const port = Number(rawPort);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${rawPort}`);
  }

  // ffmpeg takes bitrates like "128k"
  const bitrate = env.MP3_BITRATE?.trim() || "128k";
  if (!/^\d+k$/.test(bitrate)) {
    throw new Error(`Invalid MP3_BITRATE: ${bitrate}`);
  }

  return {
    port,
    host: env.HOST?.trim() || "0.0.0.0",
    logLevel: env.LOG_LEVEL?.trim() || "info",
    corsOrigin: env.CORS_ORIGIN?.trim() || "*",
    encoder: {
      path: env.ENCODER_PATH?.trim() || "ffmpeg",
      timeoutMs: intFromEnv(env, "ENCODER_TIMEOUT_MS", 60_000, MAX_TIMEOUT_MS),
      bitrate,
    },
    maxInputBytes: intFromEnv(env, "MAX_INPUT_BYTES", DEFAULT_MAX_INPUT_BYTES),
    maxConcurrentConversions: intFromEnv(env, "MAX_CONCURRENT_CONVERSIONS", 4),
    workspaceRoot: path.resolve(
      env.WORKSPACE_ROOT?.trim() || path.join(os.tmpdir(), "ogg-to-mp3"),
    ),
  };
};
