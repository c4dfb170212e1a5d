import * as z from "zod";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function unionOf(members: z.ZodType[]): z.ZodType {
  const [first, second, ...rest] = members;
  if (!first) return z.unknown();
  if (!second) return first;
  return z.union([first, second, ...rest]);
}

function forType(type: string, node: Record<string, unknown>): z.ZodType {
  switch (type) {
    case "string":
      return isStringArray(node.enum) && node.enum.length > 0 ? z.enum(node.enum) : z.string();
    case "integer":
      return z.number().int();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
    case "null":
      return z.null();
    case "array":
      return z.array(jsonSchemaToZod(node.items));
    case "object":
      return objectSchema(node);
    default:
      return z.unknown();
  }
}

function objectSchema(node: Record<string, unknown>): z.ZodObject {
  const properties = isRecord(node.properties) ? node.properties : {};
  const required = new Set(isStringArray(node.required) ? node.required : []);

  const shape: Record<string, z.ZodType> = {};
  for (const [key, child] of Object.entries(properties)) {
    const schema = jsonSchemaToZod(child);
    shape[key] = required.has(key) ? schema : schema.optional();
  }

  // Strict unless the schema explicitly allows additional properties
  const allowsExtra = node.additionalProperties === true || isRecord(node.additionalProperties);
  return allowsExtra ? z.looseObject(shape) : z.strictObject(shape);
}

/**
 * Converts the subset of JSON Schema that tool servers publish (types,
 * enums, objects, arrays, anyOf/oneOf) into a zod schema for argument
 * validation. Unsupported constructs accept any value.
 */
export function jsonSchemaToZod(schema: unknown): z.ZodType {
  if (!isRecord(schema)) {
    return z.unknown();
  }

  const alternatives = schema.anyOf ?? schema.oneOf;
  if (Array.isArray(alternatives)) {
    return unionOf(alternatives.map((alternative) => jsonSchemaToZod(alternative)));
  }

  if (isStringArray(schema.type)) {
    return unionOf(schema.type.map((type) => forType(type, schema)));
  }
  if (typeof schema.type === "string") {
    return forType(schema.type, schema);
  }
  if (isRecord(schema.properties)) {
    return objectSchema(schema);
  }
  return z.unknown();
}

/**
 * Top-level tool argument schema: always an object.
 */
export function toolArgumentsSchema(inputSchema: unknown): z.ZodObject {
  return objectSchema(isRecord(inputSchema) ? inputSchema : {});
}
