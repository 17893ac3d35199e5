import fastifyCors from "@fastify/cors";
import fastifySensible from "@fastify/sensible";
import fastify, { FastifyServerOptions } from "fastify";
import sessionsRoutes from "./modules/sessions/sessions.routes.js";
import schemaPlugin from "./plugins/schemas.js";
import sessionEnginePlugin, { SessionEngineOptions } from "./plugins/session-engine.js";

export default async function buildFastifyServer(
  engine: SessionEngineOptions,
  options?: FastifyServerOptions,
) {
  const server = fastify(options);

  // Plugins
  await server.register(fastifySensible);
  await server.register(fastifyCors, { origin: true });
  await server.register(schemaPlugin);
  await server.register(sessionEnginePlugin, engine);

  // Routes
  await server.register(sessionsRoutes, { prefix: "/v1" });

  return server;
}
