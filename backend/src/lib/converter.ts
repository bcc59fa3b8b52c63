import type {
  ConversionErrorKind,
  ConversionRequest,
  ConversionResult,
  InvocationOutcome,
  Logger,
  Transcoder,
  Workspace,
} from "../types";
import { ConversionError, describeError } from "./errors";
import type { ConcurrencyGate } from "./gate";
import type { WorkspaceManager } from "./workspace";

export interface ConversionHandlerDeps {
  workspaces: WorkspaceManager;
  transcoder: Transcoder;
  gate: ConcurrencyGate;
  maxInputBytes: number;
  logger: Logger;
}

const failure = (kind: ConversionErrorKind, detail: string): ConversionResult => ({
  ok: false,
  kind,
  detail,
});

const outcomeToError = (outcome: InvocationOutcome): ConversionError | undefined => {
  switch (outcome.status) {
    case "success":
      return undefined;
    case "timeout":
      return new ConversionError(
        "ConversionTimeout",
        `encoder exceeded ${outcome.timeoutMs}ms and was killed`,
      );
    case "failed": {
      const exit = outcome.signal ? `signal ${outcome.signal}` : `exit code ${outcome.exitCode}`;
      const stderr = outcome.stderr || "(no stderr)";
      return new ConversionError("ConversionFailed", `encoder failed with ${exit}: ${stderr}`);
    }
  }
};

export class ConversionHandler {
  constructor(private readonly deps: ConversionHandlerDeps) {}

  /**
   * Runs one request through validate → stage → convert → read. Resolves with
   * a failure result instead of rejecting; the workspace and the gate slot are
   * released on every path.
   */
  async handle(request: ConversionRequest): Promise<ConversionResult> {
    const log = this.deps.logger.child({ requestId: request.id });

    if (request.payload.length === 0) {
      return failure("InvalidInput", "empty payload");
    }
    if (request.payload.length > this.deps.maxInputBytes) {
      return failure(
        "PayloadTooLarge",
        `payload of ${request.payload.length} bytes exceeds limit of ${this.deps.maxInputBytes}`,
      );
    }
    log.debug({ bytes: request.payload.length, sourceFormat: request.sourceFormat }, "validated");

    if (!this.deps.gate.tryAcquire()) {
      return failure(
        "ServiceBusy",
        `${this.deps.gate.inFlight} of ${this.deps.gate.limit} conversion slots in use`,
      );
    }

    try {
      return await this.run(request, log);
    } finally {
      this.deps.gate.release();
    }
  }

  private async run(request: ConversionRequest, log: Logger): Promise<ConversionResult> {
    const { workspaces, transcoder } = this.deps;
    let workspace: Workspace | undefined;

    try {
      // 1. Staging
      workspace = await workspaces.acquire();
      await workspaces.writeInput(workspace, request.payload);
      log.debug({ workspaceId: workspace.id }, "staged");

      // 2. Encoding
      const outcome = await transcoder.convert(workspace.inputPath, workspace.outputPath, log);
      const encoderError = outcomeToError(outcome);
      if (encoderError) throw encoderError;
      log.debug({ workspaceId: workspace.id }, "converted");

      // 3. Reading the artifact
      const audio = await workspaces.readOutput(workspace);
      return { ok: true, audio, byteLength: audio.byteLength };
    } catch (error) {
      if (error instanceof ConversionError) {
        return failure(error.kind, describeError(error));
      }
      return failure("IOFailure", `unexpected error: ${describeError(error)}`);
    } finally {
      if (workspace) await workspaces.release(workspace, log);
    }
  }
}
