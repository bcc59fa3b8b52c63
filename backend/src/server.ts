import { randomUUID } from "crypto";
import Fastify, { FastifyInstance, FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import type { AppConfig } from "./config";
import { ConversionHandler } from "./lib/converter";
import { ConcurrencyGate } from "./lib/gate";
import { FfmpegTranscoder } from "./lib/transcoder";
import { WorkspaceManager } from "./lib/workspace";
import type { AppContext } from "./routes/context";
import { registerConvertRoute, sendFailure } from "./routes/convert";
import { registerHealthRoutes } from "./routes/health";

export const AUDIO_CONTENT_TYPES = ["audio/ogg", "audio/opus", "application/octet-stream"];

export interface BuildServerOptions {
  logger?: FastifyServerOptions["logger"];
}

export const buildServer = async (
  config: AppConfig,
  options: BuildServerOptions = {},
): Promise<{ server: FastifyInstance; ctx: AppContext }> => {
  // One byte over the limit still reaches the handler, which reports it
  const bodyLimit = config.maxInputBytes + 1;

  const server = Fastify({
    logger: options.logger ?? { level: config.logLevel },
    bodyLimit,
    requestIdHeader: "x-request-id",
    genReqId: () => randomUUID(),
  });

  await server.register(cors, {
    origin: config.corsOrigin,
    methods: ["GET", "POST"],
    exposedHeaders: ["x-request-id", "content-disposition"],
  });

  const workspaces = new WorkspaceManager(config.workspaceRoot, server.log);
  const transcoder = new FfmpegTranscoder({
    binary: config.encoder.path,
    timeoutMs: config.encoder.timeoutMs,
    bitrate: config.encoder.bitrate,
    logger: server.log,
  });
  const gate = new ConcurrencyGate(config.maxConcurrentConversions);
  const handler = new ConversionHandler({
    workspaces,
    transcoder,
    gate,
    maxInputBytes: config.maxInputBytes,
    logger: server.log,
  });
  const ctx: AppContext = { handler, transcoder, workspaces, gate };

  // Only raw audio bodies are accepted; anything else gets 415
  server.removeAllContentTypeParsers();
  server.addContentTypeParser(
    AUDIO_CONTENT_TYPES,
    { parseAs: "buffer", bodyLimit },
    (_req, body, done) => {
      done(null, body);
    },
  );

  server.addHook("onRequest", async (req, reply) => {
    reply.header("x-request-id", req.id);
  });

  server.setErrorHandler((error, req, reply) => {
    if (error.code === "FST_ERR_CTP_BODY_TOO_LARGE") {
      return sendFailure(req, reply, "PayloadTooLarge", error.message);
    }

    const status = error.statusCode ?? 500;
    if (status < 500) {
      req.log.warn({ code: error.code, err: error.message }, "request rejected");
      return reply.code(status).send({
        error: { code: error.code ?? "BAD_REQUEST", message: error.message },
      });
    }

    req.log.error(error);
    return reply.code(500).send({
      error: { code: "INTERNAL_ERROR", message: "Internal Server Error" },
    });
  });

  server.setNotFoundHandler((req, reply) => {
    return reply.code(404).send({
      error: { code: "NOT_FOUND", message: `Route ${req.method} ${req.url} not found` },
    });
  });

  registerHealthRoutes(server, ctx);
  registerConvertRoute(server, ctx);

  return { server, ctx };
};
