import { describe, expect, it } from "vitest";

import { createNamingEngine } from "@/utils/naming";
import {
  buildModelDefs,
  convertSchema,
  createBuildContext,
  inferEnumBaseKind,
  inlineContext,
  refName,
  syntheticName,
} from "./schema";

import type { ApiDocument, SchemaNode } from "@/adapters/openapi/types";

function documentWith(schemas: Record<string, SchemaNode>): ApiDocument {
  return { openapi: "3.0.3", components: { schemas } };
}

function convertTopLevel(node: SchemaNode, name = "Model") {
  const ctx = createBuildContext();
  const schema = convertSchema(node, name, "", false, ctx);
  return { schema, ctx };
}

describe("SchemaConverter", () => {
  describe("objects", () => {
    it("marks required fields from the required list", () => {
      const models = buildModelDefs(
        documentWith({
          CreateResourceTypeDto: {
            type: "object",
            required: ["name"],
            properties: {
              parentResourceTypeId: { type: "string" },
              name: { type: "string" },
            },
          },
        }),
        createBuildContext(),
      );

      expect(models).toHaveLength(1);
      expect(models[0]?.schema).toEqual({
        kind: "object",
        nullable: false,
        properties: [
          {
            name: "name",
            type: { kind: "string", nullable: false },
            required: true,
            annotations: {},
          },
          {
            name: "parentResourceTypeId",
            type: { kind: "string", nullable: false },
            required: false,
            annotations: {},
          },
        ],
      });
    });

    it("hoists nested objects, enums and array items under synthetic names", () => {
      const models = buildModelDefs(
        documentWith({
          User: {
            type: "object",
            properties: {
              tags: {
                type: "array",
                items: {
                  type: "object",
                  properties: { label: { type: "string" } },
                },
              },
              status: { type: "string", enum: ["active", "disabled"] },
              address: {
                type: "object",
                properties: { city: { type: "string" } },
              },
            },
          },
        }),
        createBuildContext(),
      );

      expect(models.map((m) => m.name)).toEqual([
        "User_Address",
        "User_Status",
        "User_Tags_Item",
        "User",
      ]);
      expect(models[1]?.schema).toEqual({
        kind: "enum",
        nullable: false,
        values: ["active", "disabled"],
        rawValues: ["active", "disabled"],
        baseKind: "string",
      });
      expect(models[3]?.schema).toEqual({
        kind: "object",
        nullable: false,
        properties: [
          {
            name: "address",
            type: { kind: "ref", nullable: false, name: "User_Address" },
            required: false,
            annotations: {},
          },
          {
            name: "status",
            type: { kind: "ref", nullable: false, name: "User_Status" },
            required: false,
            annotations: {},
          },
          {
            name: "tags",
            type: {
              kind: "array",
              nullable: false,
              items: { kind: "ref", nullable: false, name: "User_Tags_Item" },
            },
            required: false,
            annotations: {},
          },
        ],
      });
    });

    it("names deeper objects after their owning synthetic model", () => {
      const models = buildModelDefs(
        documentWith({
          Order: {
            type: "object",
            properties: {
              shipping: {
                type: "object",
                properties: {
                  address: {
                    type: "object",
                    properties: { zip: { type: "string" } },
                  },
                },
              },
            },
          },
        }),
        createBuildContext(),
      );

      expect(models.map((m) => m.name)).toEqual([
        "Order_Shipping_Address",
        "Order_Shipping",
        "Order",
      ]);
    });

    it("keeps nullability on the ref and registers a non-nullable model", () => {
      const ctx = createBuildContext();
      const ref = convertSchema(
        { type: "string", enum: ["a", "b"], nullable: true },
        "Pet",
        "mood",
        false,
        ctx,
      );

      expect(ref).toEqual({ kind: "ref", nullable: true, name: "Pet_Mood" });
      expect(ctx.models[0]?.schema.nullable).toBe(false);
    });

    it("merges additionalProperties that declare their own properties", () => {
      const { schema } = convertTopLevel({
        type: "object",
        properties: { id: { type: "string" } },
        additionalProperties: {
          type: "object",
          required: ["extra"],
          properties: { extra: { type: "integer" } },
        },
      });

      expect(schema).toEqual({
        kind: "object",
        nullable: false,
        properties: [
          {
            name: "id",
            type: { kind: "string", nullable: false },
            required: false,
            annotations: {},
          },
          {
            name: "extra",
            type: { kind: "integer", nullable: false },
            required: true,
            annotations: {},
          },
        ],
      });
    });

    it("keeps open maps as typed additionalProperties", () => {
      expect(
        convertTopLevel({ type: "object", additionalProperties: true }).schema,
      ).toEqual({
        kind: "object",
        nullable: false,
        properties: [],
        additionalProperties: { kind: "unknown", nullable: false },
      });

      const { schema, ctx } = convertTopLevel(
        {
          type: "object",
          additionalProperties: {
            type: "object",
            additionalProperties: { type: "integer" },
          },
        },
        "Counters",
      );
      expect(schema).toEqual({
        kind: "object",
        nullable: false,
        properties: [],
        additionalProperties: {
          kind: "ref",
          nullable: false,
          name: "Counters_Properties",
        },
      });
      expect(ctx.models.map((m) => m.name)).toEqual(["Counters_Properties"]);
    });

    it("treats a schema with properties and no type as an object", () => {
      const { schema } = convertTopLevel({
        properties: { a: { type: "boolean" } },
      });
      expect(schema.kind).toBe("object");
    });
  });

  describe("synthetic name collisions", () => {
    it("reuses a name when the shapes are equal", () => {
      const ctx = createBuildContext();
      const models = buildModelDefs(
        documentWith({
          A: {
            type: "object",
            properties: {
              X: { type: "object", properties: { p: { type: "string" } } },
              x: { type: "object", properties: { p: { type: "string" } } },
            },
          },
        }),
        ctx,
      );

      expect(models.map((m) => m.name)).toEqual(["A_X", "A"]);
      expect(ctx.warnings).toEqual([]);
    });

    it("disambiguates a different shape with a numeric suffix", () => {
      const ctx = createBuildContext();
      const models = buildModelDefs(
        documentWith({
          A: {
            type: "object",
            properties: {
              X: { type: "object", properties: { q: { type: "integer" } } },
              x: { type: "object", properties: { p: { type: "string" } } },
            },
          },
        }),
        ctx,
      );

      expect(models.map((m) => m.name)).toEqual(["A_X", "A_X_2", "A"]);
      expect(ctx.warnings).toEqual([
        'Synthetic model name "A_X" is already used by a different shape; using "A_X_2"',
      ]);
    });

    it("never gives a component's name to a hoisted shape", () => {
      const ctx = createBuildContext();
      const models = buildModelDefs(
        documentWith({
          Pet: {
            type: "object",
            properties: {
              owner: {
                type: "object",
                properties: { nickname: { type: "string" } },
              },
            },
          },
          Pet_Owner: {
            type: "object",
            properties: { licenseId: { type: "integer" } },
          },
        }),
        ctx,
      );

      expect(models.map((m) => m.name)).toEqual([
        "Pet_Owner_2",
        "Pet",
        "Pet_Owner",
      ]);
      expect(models[2]?.schema).toEqual({
        kind: "object",
        nullable: false,
        properties: [
          {
            name: "licenseId",
            type: { kind: "integer", nullable: false },
            required: false,
            annotations: {},
          },
        ],
      });
      expect(ctx.warnings).toEqual([
        'Synthetic model name "Pet_Owner" is already used by a different shape; using "Pet_Owner_2"',
      ]);
    });
  });

  describe("references", () => {
    it("converts a $ref to a ref named by its last segment", () => {
      const { schema } = convertTopLevel({
        $ref: "#/components/schemas/OrganizationDto",
      });
      expect(schema).toEqual({
        kind: "ref",
        nullable: false,
        name: "OrganizationDto",
      });
    });

    it("unescapes JSON pointer segments", () => {
      expect(refName("#/components/schemas/a~1b~0c")).toBe("a/b~c");
    });

    it("does not dereference recursive schemas", () => {
      const models = buildModelDefs(
        documentWith({
          Node: {
            type: "object",
            properties: {
              children: {
                type: "array",
                items: { $ref: "#/components/schemas/Node" },
              },
            },
          },
        }),
        createBuildContext(),
      );

      expect(models).toHaveLength(1);
      expect(models[0]?.schema).toMatchObject({
        properties: [
          {
            name: "children",
            type: { kind: "array", items: { kind: "ref", name: "Node" } },
          },
        ],
      });
    });
  });

  describe("compositions", () => {
    it("hoists anonymous members with positional names", () => {
      const ctx = createBuildContext();
      const models = buildModelDefs(
        documentWith({
          Shape: {
            oneOf: [
              { $ref: "#/components/schemas/Circle" },
              { type: "object", properties: { side: { type: "number" } } },
            ],
            discriminator: {
              propertyName: "kind",
              mapping: { circle: "#/components/schemas/Circle" },
            },
          },
        }),
        ctx,
      );

      expect(models.map((m) => m.name)).toEqual(["Shape_Option2", "Shape"]);
      expect(models[1]?.schema).toEqual({
        kind: "oneOf",
        nullable: false,
        members: [
          { kind: "ref", nullable: false, name: "Circle" },
          { kind: "ref", nullable: false, name: "Shape_Option2" },
        ],
        discriminator: { propertyName: "kind", mapping: { circle: "Circle" } },
      });
    });

    it("names allOf parts and keeps primitive members inline", () => {
      const { schema, ctx } = convertTopLevel(
        {
          allOf: [
            { $ref: "#/components/schemas/Base" },
            { type: "object", properties: { extra: { type: "string" } } },
            { type: "string" },
          ],
        },
        "Extended",
      );

      expect(schema).toEqual({
        kind: "allOf",
        nullable: false,
        members: [
          { kind: "ref", nullable: false, name: "Base" },
          { kind: "ref", nullable: false, name: "Extended_Part2" },
          { kind: "string", nullable: false },
        ],
      });
      expect(ctx.models.map((m) => m.name)).toEqual(["Extended_Part2"]);
    });
  });

  describe("OpenAPI 3.1 types", () => {
    it("reads null in a type array as nullable", () => {
      expect(convertTopLevel({ type: ["string", "null"] }).schema).toEqual({
        kind: "string",
        nullable: true,
      });
    });

    it("turns several non-null types into a oneOf", () => {
      expect(convertTopLevel({ type: ["string", "integer"] }).schema).toEqual({
        kind: "oneOf",
        nullable: false,
        members: [
          { kind: "string", nullable: false },
          { kind: "integer", nullable: false },
        ],
      });
    });

    it("converts const to a single-value enum", () => {
      expect(convertTopLevel({ const: "fixed" }).schema).toEqual({
        kind: "enum",
        nullable: false,
        values: ["fixed"],
        rawValues: ["fixed"],
        baseKind: "string",
      });
    });
  });

  describe("primitives", () => {
    it("keeps numeric formats", () => {
      expect(
        convertTopLevel({ type: "integer", format: "int64" }).schema,
      ).toEqual({ kind: "integer", nullable: false, format: "int64" });
      expect(
        convertTopLevel({ type: "number", format: "float" }).schema,
      ).toEqual({ kind: "number", nullable: false, format: "float" });
      expect(convertTopLevel({ type: "number" }).schema).toEqual({
        kind: "number",
        nullable: false,
      });
    });
  });

  describe("enums", () => {
    it("stringifies values and keeps the raw ones", () => {
      expect(convertTopLevel({ enum: [1, 2] }).schema).toEqual({
        kind: "enum",
        nullable: false,
        values: ["1", "2"],
        rawValues: [1, 2],
        baseKind: "integer",
      });
    });

    it("moves a null literal into nullability", () => {
      expect(convertTopLevel({ enum: ["a", null] }).schema).toEqual({
        kind: "enum",
        nullable: true,
        values: ["a"],
        rawValues: ["a"],
        baseKind: "string",
      });
    });

    it("infers the base kind from the declared type first", () => {
      expect(inferEnumBaseKind(["number"], [1, 2])).toBe("number");
      expect(inferEnumBaseKind([], [1.5])).toBe("number");
      expect(inferEnumBaseKind([], [3])).toBe("integer");
      expect(inferEnumBaseKind([], [true])).toBe("boolean");
      expect(inferEnumBaseKind([], [{ a: 1 }])).toBe("unknown");
    });
  });

  describe("diagnostics and modes", () => {
    it("warns about declared types it does not know", () => {
      const ctx = createBuildContext();
      const models = buildModelDefs(
        documentWith({ Upload: { type: "file" } }),
        ctx,
      );

      expect(models[0]?.schema).toEqual({ kind: "unknown", nullable: false });
      expect(ctx.warnings).toEqual([
        'Unsupported schema type "file" at "Upload"; treating it as unknown',
      ]);
    });

    it("keeps nested shapes inline when hoisting is off", () => {
      const ctx = createBuildContext();
      const schema = convertSchema(
        {
          type: "object",
          properties: {
            inner: { type: "object", properties: { n: { type: "number" } } },
          },
        },
        "",
        "",
        false,
        inlineContext(ctx),
      );

      expect(schema).toMatchObject({
        kind: "object",
        properties: [{ name: "inner", type: { kind: "object" } }],
      });
      expect(ctx.models).toEqual([]);
    });

    it("builds identical models for identical input", () => {
      const document = documentWith({
        Pet: {
          type: "object",
          properties: {
            kind: { type: "string", enum: ["dog", "cat"] },
            owner: {
              type: "object",
              properties: { name: { type: "string" } },
            },
          },
        },
      });

      const first = buildModelDefs(document, createBuildContext());
      const second = buildModelDefs(document, createBuildContext());

      expect(second).toEqual(first);
      expect(first.map((m) => m.name)).toEqual([
        "Pet_Kind",
        "Pet_Owner",
        "Pet",
      ]);
    });

    it("copies schema annotations onto fields", () => {
      const { schema } = convertTopLevel({
        type: "object",
        properties: {
          createdAt: {
            type: "string",
            format: "date-time",
            description: "Creation time",
            readOnly: true,
            example: "2024-01-01T00:00:00Z",
          },
        },
      });

      expect(schema).toMatchObject({
        properties: [
          {
            name: "createdAt",
            type: { kind: "string", format: "date-time" },
            annotations: {
              description: "Creation time",
              readOnly: true,
              examples: ["2024-01-01T00:00:00Z"],
            },
          },
        ],
      });
    });
  });
});

describe("syntheticName", () => {
  it("joins parent, property and item suffix", () => {
    const naming = createNamingEngine();
    expect(
      syntheticName(
        { parentName: "User", propertyName: "home_address", isArrayItem: true },
        naming,
      ),
    ).toBe("User_HomeAddress_Item");
    expect(
      syntheticName(
        { parentName: "User", propertyName: "", isArrayItem: false },
        naming,
      ),
    ).toBe("User");
  });

  it("follows the configured word-split policy", () => {
    const position = {
      parentName: "Doc",
      propertyName: "XMLData",
      isArrayItem: false,
    };

    expect(syntheticName(position, createNamingEngine("acronym"))).toBe(
      "Doc_XmlData",
    );
    expect(syntheticName(position, createNamingEngine("lower-upper"))).toBe(
      "Doc_Xmldata",
    );
  });
});
