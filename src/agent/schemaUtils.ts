/**
 * Helpers that translate Zod schemas into JSON Schema metadata, so the
 * planner prompt describes each tool's arguments from the same schemas the
 * validator enforces.
 */
import { z } from "zod";

export function zodToJson(schema: z.ZodTypeAny) {
  const jsonSchema = schemaToOpenAPI(schema);
  return {
    type: "object",
    ...jsonSchema,
  };
}

export function schemaToOpenAPI(schema: z.ZodTypeAny): Record<string, unknown> {
  if (schema instanceof z.ZodObject) {
    const shape: Record<string, z.ZodTypeAny> = schema.shape;
    const properties: Record<string, unknown> = {};
    const required: string[] = [];
    for (const [key, value] of Object.entries(shape)) {
      properties[key] = schemaToOpenAPI(value);
      if (!value.isOptional()) {
        required.push(key);
      }
    }
    return {
      type: "object",
      properties,
      ...(required.length ? { required } : {}),
      ...(schema._def.unknownKeys === "strict" ? { additionalProperties: false } : {}),
    };
  }
  if (schema instanceof z.ZodEffects) {
    return schemaToOpenAPI(schema.innerType());
  }
  if (schema instanceof z.ZodEnum) {
    return { type: "string", enum: [...schema.options] };
  }
  if (schema instanceof z.ZodArray) {
    const minLength = schema._def.minLength?.value;
    const maxLength = schema._def.maxLength?.value;
    return {
      type: "array",
      items: schemaToOpenAPI(schema.element),
      ...(minLength !== undefined ? { minItems: minLength } : {}),
      ...(maxLength !== undefined ? { maxItems: maxLength } : {}),
    };
  }
  if (schema instanceof z.ZodString) {
    const result: Record<string, unknown> = { type: "string" };
    for (const check of schema._def.checks) {
      if (check.kind === "regex") {
        result.pattern = check.regex.source;
      }
      if (check.kind === "min") {
        result.minLength = check.value;
      }
    }
    return result;
  }
  if (schema instanceof z.ZodOptional) {
    return schemaToOpenAPI(schema.unwrap());
  }
  return {};
}
