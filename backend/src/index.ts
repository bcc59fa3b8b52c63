import { loadConfig } from "./config";
import { buildServer } from "./server";

const start = async () => {
  const config = loadConfig();
  const { server, ctx } = await buildServer(config);

  const shutdown = (signal: string) => {
    server.log.info(`${signal} received, closing server`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        server.log.error(err);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  try {
    const swept = await ctx.workspaces.sweepStale();
    if (swept > 0) {
      server.log.info({ swept }, "removed stale workspaces");
    }

    await server.listen({ port: config.port, host: config.host });
    server.log.info(
      {
        encoder: config.encoder.path,
        timeoutMs: config.encoder.timeoutMs,
        maxInputBytes: config.maxInputBytes,
        maxConcurrentConversions: config.maxConcurrentConversions,
        workspaceRoot: config.workspaceRoot,
      },
      "conversion service ready",
    );
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  console.error("Fatal startup error", err);
  process.exit(1);
});
