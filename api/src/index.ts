import buildFastifyServer from "./build-server.js";
import { engineConfigFromEnv, serverLoggerOptions } from "./config.js";
import { env } from "./env.js";

const startServer = async () => {
  const server = await buildFastifyServer(
    { config: engineConfigFromEnv(env) },
    {
      logger: serverLoggerOptions(env),
      trustProxy: true,
      disableRequestLogging: true,
    },
  );

  const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down`);
    try {
      await server.close();
      process.exit(0);
    } catch (err) {
      server.log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  try {
    await server.listen({ port: env.PORT, host: env.HOST });
  } catch (err) {
    server.log.error({ err }, "Failed to start server");
    process.exit(1);
  }
};

startServer().catch((err: unknown) => {
  console.error("Failed to start server", err);
  process.exit(1);
});
