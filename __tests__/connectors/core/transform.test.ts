import { describe, expect, it } from "vitest";
import { SchemaTransformer, TransformError } from "../../../src/connectors/core/transform.js";
import type { JsonSchema, MetadataEntry } from "../../../src/connectors/core/types.js";

const schema: JsonSchema = {
  type: ["null", "object"],
  properties: {
    blast_id: { type: ["null", "integer"] },
    name: { type: ["null", "string"] },
    price: { type: ["null", "number"] },
    primary: { type: ["null", "boolean"] },
    modify_time: { type: ["null", "string"], format: "date-time" },
    labels: { type: ["null", "array"], items: { type: ["null", "string"] } },
    stats: {
      type: ["null", "object"],
      properties: { total: { type: ["null", "object"] } },
    },
    count: { type: "integer" },
  },
};

describe("SchemaTransformer", () => {
  const transformer = new SchemaTransformer();

  it("coerces values to the schema types", () => {
    expect(
      transformer.transform(
        {
          blast_id: "42",
          name: "Spring sale",
          price: "19.5",
          primary: "true",
          modify_time: "Wed, 31 Mar 2021 22:15:07 -0400",
          labels: ["a", 3],
        },
        schema,
      ),
    ).toEqual({
      blast_id: 42,
      name: "Spring sale",
      price: 19.5,
      primary: true,
      modify_time: "2021-04-01T02:15:07Z",
      labels: ["a", "3"],
    });
  });

  it("turns blank cells into null for nullable fields", () => {
    expect(transformer.transform({ blast_id: "", price: "" }, schema)).toEqual({
      blast_id: null,
      price: null,
    });
  });

  it("drops fields the schema does not declare", () => {
    expect(transformer.transform({ name: "x", extra: 1 }, schema)).toEqual({
      name: "x",
    });
  });

  it("keeps nested objects declared by the schema", () => {
    expect(
      transformer.transform(
        { stats: { total: { count: 3 }, ignored: true } },
        schema,
      ),
    ).toEqual({ stats: { total: { count: 3 } } });
  });

  it("honours field selection in metadata", () => {
    const metadata: MetadataEntry[] = [
      { breadcrumb: ["properties", "blast_id"], metadata: { inclusion: "automatic", selected: false } },
      { breadcrumb: ["properties", "name"], metadata: { inclusion: "available", selected: false } },
      { breadcrumb: ["properties", "price"], metadata: { inclusion: "unsupported" } },
    ];
    expect(
      transformer.transform({ blast_id: 1, name: "x", price: 2, primary: false }, schema, metadata),
    ).toEqual({ blast_id: 1, primary: false });
  });

  it("reports every path that cannot be coerced", () => {
    let caught: unknown;
    try {
      transformer.transform(
        { blast_id: "1.5", count: null, modify_time: "soon" },
        schema,
      );
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TransformError);
    expect(caught instanceof TransformError ? caught.paths : []).toEqual([
      "blast_id",
      "count",
      "modify_time",
    ]);
  });
});
