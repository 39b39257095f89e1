/**
 * Schema-driven record coercion.
 *
 * Values are coerced to the first JSON Schema type that accepts them, in the
 * order the schema lists its types. Properties the schema does not declare,
 * or that catalog metadata deselects, are dropped.
 */

import { formatTimestamp, parseTimestamp } from "./timestamps.js";
import type {
  JsonSchema,
  JsonValue,
  MetadataEntry,
  RawRecord,
  Transformer,
} from "./types.js";

export class TransformError extends Error {
  readonly paths: string[];

  constructor(paths: string[]) {
    super(`Record does not match schema at: ${paths.join(", ")}`);
    this.name = "TransformError";
    this.paths = paths;
  }
}

const NO_MATCH = Symbol("no-match");
type Coerced = JsonValue | typeof NO_MATCH;

function typesOf(schema: JsonSchema): string[] {
  if (Array.isArray(schema.type)) return schema.type;
  if (typeof schema.type === "string") return [schema.type];
  if (schema.properties) return ["object"];
  return [];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item) ?? null);
  }
  if (isPlainObject(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, inner] of Object.entries(value)) {
      const converted = toJsonValue(inner);
      if (converted !== undefined) out[key] = converted;
    }
    return out;
  }
  return undefined;
}

function isSelected(
  field: string,
  metadata: ReadonlyMap<string, Record<string, unknown>>,
): boolean {
  const entry = metadata.get(field);
  if (!entry) return true;
  if (entry.inclusion === "unsupported") return false;
  if (entry.inclusion === "automatic") return true;
  return entry.selected !== false;
}

export class SchemaTransformer implements Transformer {
  transform(
    record: RawRecord,
    schema: JsonSchema,
    metadata: readonly MetadataEntry[] = [],
  ): Record<string, JsonValue> {
    const fieldMetadata = new Map<string, Record<string, unknown>>();
    for (const entry of metadata) {
      const [kind, field] = entry.breadcrumb;
      if (kind === "properties" && field !== undefined) {
        fieldMetadata.set(field, entry.metadata);
      }
    }

    const errors: string[] = [];
    const properties = schema.properties ?? {};
    const out: Record<string, JsonValue> = {};

    for (const [field, value] of Object.entries(record)) {
      const fieldSchema = properties[field];
      if (!fieldSchema || !isSelected(field, fieldMetadata)) continue;
      const coerced = this.coerce(value, fieldSchema, field, errors);
      if (coerced !== NO_MATCH) out[field] = coerced;
    }

    if (errors.length > 0) throw new TransformError(errors);
    return out;
  }

  private coerce(
    value: unknown,
    schema: JsonSchema,
    path: string,
    errors: string[],
  ): Coerced {
    const types = typesOf(schema);
    if (types.length === 0) return toJsonValue(value) ?? null;

    if (value === undefined || value === null) {
      if (types.includes("null")) return null;
      errors.push(path);
      return NO_MATCH;
    }

    for (const type of types) {
      const result = this.coerceAs(type, value, schema, path, errors);
      if (result !== NO_MATCH) return result;
    }

    // Blank cells in exported files stand for missing values
    if (value === "" && types.includes("null")) return null;

    errors.push(path);
    return NO_MATCH;
  }

  private coerceAs(
    type: string,
    value: unknown,
    schema: JsonSchema,
    path: string,
    errors: string[],
  ): Coerced {
    switch (type) {
      case "null":
        return NO_MATCH;
      case "string":
        return this.coerceString(value, schema);
      case "integer": {
        const n = toNumber(value);
        return n !== null && Number.isInteger(n) ? n : NO_MATCH;
      }
      case "number": {
        const n = toNumber(value);
        return n === null ? NO_MATCH : n;
      }
      case "boolean":
        return toBoolean(value);
      case "array": {
        if (!Array.isArray(value)) return NO_MATCH;
        const itemSchema = schema.items ?? {};
        const items: JsonValue[] = [];
        value.forEach((item, index) => {
          const coerced = this.coerce(item, itemSchema, `${path}[${index}]`, errors);
          items.push(coerced === NO_MATCH ? null : coerced);
        });
        return items;
      }
      case "object": {
        if (!isPlainObject(value)) return NO_MATCH;
        if (!schema.properties) return toJsonValue(value) ?? NO_MATCH;
        const out: { [key: string]: JsonValue } = {};
        for (const [key, inner] of Object.entries(value)) {
          const innerSchema = schema.properties[key];
          if (!innerSchema) continue;
          const coerced = this.coerce(inner, innerSchema, `${path}.${key}`, errors);
          if (coerced !== NO_MATCH) out[key] = coerced;
        }
        return out;
      }
      default:
        return NO_MATCH;
    }
  }

  private coerceString(value: unknown, schema: JsonSchema): Coerced {
    if (schema.format === "date-time") {
      if (typeof value !== "string" && !(value instanceof Date)) return NO_MATCH;
      try {
        return formatTimestamp(parseTimestamp(value));
      } catch {
        return NO_MATCH;
      }
    }
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    return NO_MATCH;
  }
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toBoolean(value: unknown): Coerced {
  if (typeof value === "boolean") return value;
  if (value === 1 || value === "1" || value === "true" || value === "True") {
    return true;
  }
  if (value === 0 || value === "0" || value === "false" || value === "False") {
    return false;
  }
  return NO_MATCH;
}
