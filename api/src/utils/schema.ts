import { ZodTypeAny } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

/**
 * Turns a map of zod models into JSON schemas registered by name, plus a
 * `$ref` helper routes use to point at them.
 */
export function buildJsonSchemas<M extends Record<string, ZodTypeAny>>(models: M) {
  const schemas = Object.entries(models).map(([key, model]) => ({
    ...zodToJsonSchema(model, { target: "jsonSchema7", $refStrategy: "none" }),
    $id: key,
  }));

  const $ref = (key: keyof M & string) => ({ $ref: `${key}#` });

  return { schemas, $ref };
}
