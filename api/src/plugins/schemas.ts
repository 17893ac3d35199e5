import { FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import sessionSchemas from "../modules/sessions/sessions.schema.js";
import { buildJsonSchemas } from "../utils/schema.js";

const SCHEMAS = {
  ...sessionSchemas,
};

export const { schemas, $ref } = buildJsonSchemas(SCHEMAS);

const schemaPlugin: FastifyPluginAsync = async (fastify) => {
  for (const schema of schemas) {
    fastify.addSchema(schema);
  }
};

export default fp(schemaPlugin, { name: "schemas", fastify: "5.x" });
