import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import type {
  Catalog,
  CatalogEntry,
  JsonSchema,
  MetadataEntry,
  StreamDefinition,
} from "./types.js";

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

const jsonSchemaShape: z.ZodType<JsonSchema> = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    format: z.string().optional(),
    properties: z.record(z.lazy(() => jsonSchemaShape)).optional(),
    items: z.lazy(() => jsonSchemaShape).optional(),
  })
  .passthrough();

const catalogShape = z.object({
  streams: z.array(
    z.object({
      stream: z.string(),
      tap_stream_id: z.string(),
      schema: jsonSchemaShape,
      key_properties: z.array(z.string()).default([]),
      replication_method: z.enum(["FULL_TABLE", "INCREMENTAL"]),
      replication_key: z.string().nullable().default(null),
      metadata: z
        .array(
          z.object({
            breadcrumb: z.array(z.string()),
            metadata: z.record(z.unknown()),
          }),
        )
        .default([]),
    }),
  ),
});

export function loadSchema(schemasDir: string, streamId: string): JsonSchema {
  const schemaPath = path.join(schemasDir, `${streamId}.json`);
  let raw: string;
  try {
    raw = fs.readFileSync(schemaPath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`No schema for stream "${streamId}": ${reason}`);
  }
  const parsed = jsonSchemaShape.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new CatalogError(`Invalid schema for stream "${streamId}"`);
  }
  return parsed.data;
}

export function buildMetadata(
  definition: StreamDefinition,
  schema: JsonSchema,
): MetadataEntry[] {
  const replicationKey =
    definition.replicationMode === "INCREMENTAL"
      ? definition.replicationKey
      : null;

  const root: MetadataEntry = {
    breadcrumb: [],
    metadata: {
      "table-key-properties": [...definition.keyProperties],
      "forced-replication-method": definition.replicationMode,
      ...(replicationKey ? { "valid-replication-keys": [replicationKey] } : {}),
      inclusion: "available",
    },
  };

  const fields = Object.keys(schema.properties ?? {}).map(
    (field): MetadataEntry => ({
      breadcrumb: ["properties", field],
      metadata: {
        inclusion:
          definition.keyProperties.includes(field) || field === replicationKey
            ? "automatic"
            : "available",
      },
    }),
  );

  return [root, ...fields];
}

export function buildCatalog(
  definitions: Iterable<StreamDefinition>,
  schemasDir: string,
): Catalog {
  const streams: CatalogEntry[] = [];
  for (const definition of definitions) {
    const schema = loadSchema(schemasDir, definition.id);
    streams.push({
      stream: definition.id,
      tap_stream_id: definition.id,
      schema,
      key_properties: [...definition.keyProperties],
      replication_method: definition.replicationMode,
      replication_key:
        definition.replicationMode === "INCREMENTAL"
          ? definition.replicationKey
          : null,
      metadata: buildMetadata(definition, schema),
    });
  }
  return { streams };
}

export function parseCatalog(raw: unknown): Catalog {
  const parsed = catalogShape.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new CatalogError(`Invalid catalog: ${issues}`);
  }
  return parsed.data;
}

export function rootMetadata(entry: CatalogEntry): Record<string, unknown> {
  return entry.metadata.find((m) => m.breadcrumb.length === 0)?.metadata ?? {};
}

export function isStreamSelected(entry: CatalogEntry): boolean {
  return rootMetadata(entry).selected === true;
}

/** Marks every stream, and every field of it, as selected. */
export function selectAll(catalog: Catalog): Catalog {
  return {
    streams: catalog.streams.map((entry) => ({
      ...entry,
      metadata: entry.metadata.map((m) => ({
        breadcrumb: m.breadcrumb,
        metadata: { ...m.metadata, selected: true },
      })),
    })),
  };
}
