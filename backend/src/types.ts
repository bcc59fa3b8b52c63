import type { FastifyBaseLogger } from "fastify";

export type Logger = FastifyBaseLogger;

export type SourceFormat = "ogg" | "opus" | "unknown";

// 1. What the endpoint hands to the handler
export interface ConversionRequest {
  readonly id: string;
  readonly payload: Buffer;
  readonly sourceFormat: SourceFormat;
}

// 2. Scratch directory owned by one request
export interface Workspace {
  readonly id: string;
  readonly dir: string;
  readonly inputPath: string;
  readonly outputPath: string;
}

// 3. Result of one encoder run
export type InvocationOutcome =
  | { status: "success" }
  | {
      status: "failed";
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      stderr: string;
    }
  | { status: "timeout"; timeoutMs: number };

export interface Transcoder {
  convert(inputPath: string, outputPath: string, logger?: Logger): Promise<InvocationOutcome>;
  isAvailable(): Promise<boolean>;
}

// 4. Failure kinds surfaced by the handler
export type ConversionErrorKind =
  | "InvalidInput"
  | "PayloadTooLarge"
  | "ResourceExhausted"
  | "IOFailure"
  | "NotFound"
  | "ConversionTimeout"
  | "ConversionFailed"
  | "ServiceBusy";

export type ConversionResult =
  | { ok: true; audio: Buffer; byteLength: number }
  | { ok: false; kind: ConversionErrorKind; detail: string };
