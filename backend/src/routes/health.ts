import type { FastifyInstance } from "fastify";
import type { Transcoder } from "../types";
import type { AppContext } from "./context";

export const SERVICE_NAME = "ogg-to-mp3";
export const ENCODER_CHECK_TTL_MS = 10_000;

/**
 * Remembers the encoder check for `ttlMs`; callers arriving while a check
 * runs share it, so health polling spawns at most one process per window.
 */
export const cachedEncoderCheck = (transcoder: Transcoder, ttlMs = ENCODER_CHECK_TTL_MS) => {
  let pending: Promise<boolean> | undefined;
  let checkedAt = 0;

  return () => {
    if (pending && Date.now() - checkedAt < ttlMs) return pending;
    checkedAt = Date.now();
    pending = transcoder.isAvailable();
    return pending;
  };
};

export const registerHealthRoutes = (server: FastifyInstance, ctx: AppContext) => {
  const encoderAvailable = cachedEncoderCheck(ctx.transcoder);

  server.get("/", async () => {
    return { status: "OK", service: SERVICE_NAME };
  });

  server.get("/health", async (_req, reply) => {
    const available = await encoderAvailable();
    return reply.code(available ? 200 : 503).send({
      status: available ? "ok" : "degraded",
      encoder: { available },
      conversions: { inFlight: ctx.gate.inFlight, limit: ctx.gate.limit },
      workspaces: { live: ctx.workspaces.liveCount() },
    });
  });
};
