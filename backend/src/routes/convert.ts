import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { resolveSourceFormat } from "../lib/format";
import type { ConversionErrorKind, ConversionRequest } from "../types";
import type { AppContext } from "./context";

interface HttpFailure {
  status: number;
  code: string;
  message: string;
}

// Messages are fixed so that paths and encoder output never reach the caller
export const HTTP_FAILURES: Record<ConversionErrorKind, HttpFailure> = {
  InvalidInput: {
    status: 400,
    code: "INVALID_INPUT",
    message: "Request body must contain audio data",
  },
  PayloadTooLarge: {
    status: 400,
    code: "PAYLOAD_TOO_LARGE",
    message: "Audio payload exceeds the size limit",
  },
  ConversionTimeout: {
    status: 504,
    code: "CONVERSION_TIMEOUT",
    message: "Conversion did not finish in time",
  },
  ServiceBusy: {
    status: 503,
    code: "SERVICE_BUSY",
    message: "Too many conversions in progress, retry later",
  },
  ConversionFailed: {
    status: 500,
    code: "CONVERSION_FAILED",
    message: "Audio could not be converted",
  },
  ResourceExhausted: {
    status: 500,
    code: "RESOURCE_EXHAUSTED",
    message: "Server could not allocate storage for the conversion",
  },
  IOFailure: {
    status: 500,
    code: "IO_FAILURE",
    message: "Internal storage error",
  },
  NotFound: {
    status: 500,
    code: "OUTPUT_NOT_FOUND",
    message: "Converter produced no output",
  },
};

export const sendFailure = (
  req: FastifyRequest,
  reply: FastifyReply,
  kind: ConversionErrorKind,
  detail: string,
) => {
  const failure = HTTP_FAILURES[kind];
  if (failure.status >= 500 && failure.status !== 503) {
    req.log.error({ kind, detail }, "conversion failed");
  } else {
    req.log.warn({ kind, detail }, "conversion rejected");
  }
  return reply.code(failure.status).send({
    error: { code: failure.code, message: failure.message },
  });
};

const attachmentName = (requestId: string) => {
  const safe = requestId.replace(/[^A-Za-z0-9._-]/g, "");
  return `${safe || "converted"}.mp3`;
};

export const registerConvertRoute = (server: FastifyInstance, ctx: AppContext) => {
  server.post("/convert", async (req, reply) => {
    const payload = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const request: ConversionRequest = {
      id: req.id,
      payload,
      sourceFormat: resolveSourceFormat(req.headers["content-type"], payload),
    };

    const result = await ctx.handler.handle(request);
    if (!result.ok) {
      return sendFailure(req, reply, result.kind, result.detail);
    }

    req.log.info(
      {
        sourceFormat: request.sourceFormat,
        bytesIn: payload.length,
        bytesOut: result.byteLength,
      },
      "conversion completed",
    );

    return reply
      .code(200)
      .header("content-type", "audio/mpeg")
      .header("content-length", result.byteLength)
      .header("content-disposition", `attachment; filename="${attachmentName(req.id)}"`)
      .send(result.audio);
  });
};
