/**
 * IR utilities
 *
 * Reference extraction and convenience builders for SchemaIR nodes.
 */

import type {
  AllOfSchemaIR,
  AnyOfSchemaIR,
  ArraySchemaIR,
  EnumBaseKind,
  EnumSchemaIR,
  FieldIR,
  NotSchemaIR,
  ObjectSchemaIR,
  OneOfSchemaIR,
  OperationIR,
  RefSchemaIR,
  SchemaIR,
} from "./types";

// ============================================================================
// Reference Extraction
// ============================================================================

/**
 * Collect the names of every model a schema references, in visit order
 */
export function collectRefs(schema: SchemaIR, into = new Set<string>()) {
  function visit(s: SchemaIR): void {
    switch (s.kind) {
      case "ref":
        into.add(s.name);
        break;

      case "object":
        for (const field of s.properties) {
          visit(field.type);
        }
        if (s.additionalProperties) {
          visit(s.additionalProperties);
        }
        break;

      case "array":
        visit(s.items);
        break;

      case "oneOf":
      case "anyOf":
      case "allOf":
        for (const member of s.members) {
          visit(member);
        }
        break;

      case "not":
        visit(s.inner);
        break;

      default:
        break;
    }
  }

  visit(schema);
  return into;
}

/**
 * Every schema an operation carries: path params, query params, body, response
 */
export function operationSchemas(op: OperationIR): SchemaIR[] {
  const schemas = [
    ...op.pathParams.map((p) => p.schema),
    ...op.queryParams.map((p) => p.schema),
  ];
  if (op.requestBody) {
    schemas.push(op.requestBody.schema);
  }
  schemas.push(op.response.schema);
  return schemas;
}

// ============================================================================
// Schema IR Builders
// ============================================================================

/**
 * Convenience builders for creating non-nullable SchemaIR nodes
 */
export const ir = {
  unknown: (): SchemaIR => ({ kind: "unknown", nullable: false }),

  string: (format?: string): SchemaIR =>
    format === undefined
      ? { kind: "string", nullable: false }
      : { kind: "string", nullable: false, format },

  number: (format?: string): SchemaIR =>
    format === undefined
      ? { kind: "number", nullable: false }
      : { kind: "number", nullable: false, format },

  integer: (format?: string): SchemaIR =>
    format === undefined
      ? { kind: "integer", nullable: false }
      : { kind: "integer", nullable: false, format },

  boolean: (): SchemaIR => ({ kind: "boolean", nullable: false }),

  null: (): SchemaIR => ({ kind: "null", nullable: false }),

  array: (items: SchemaIR): ArraySchemaIR => ({
    kind: "array",
    nullable: false,
    items,
  }),

  object: (
    properties: FieldIR[],
    additionalProperties?: SchemaIR,
  ): ObjectSchemaIR =>
    additionalProperties === undefined
      ? { kind: "object", nullable: false, properties }
      : { kind: "object", nullable: false, properties, additionalProperties },

  enum: (rawValues: unknown[], baseKind: EnumBaseKind): EnumSchemaIR => ({
    kind: "enum",
    nullable: false,
    values: rawValues.map(stringifyEnumValue),
    rawValues,
    baseKind,
  }),

  ref: (name: string): RefSchemaIR => ({ kind: "ref", nullable: false, name }),

  oneOf: (members: SchemaIR[]): OneOfSchemaIR => ({
    kind: "oneOf",
    nullable: false,
    members,
  }),

  anyOf: (members: SchemaIR[]): AnyOfSchemaIR => ({
    kind: "anyOf",
    nullable: false,
    members,
  }),

  allOf: (members: SchemaIR[]): AllOfSchemaIR => ({
    kind: "allOf",
    nullable: false,
    members,
  }),

  not: (inner: SchemaIR): NotSchemaIR => ({
    kind: "not",
    nullable: false,
    inner,
  }),

  field: (name: string, type: SchemaIR, required = false): FieldIR => ({
    name,
    type,
    required,
    annotations: {},
  }),
};

/**
 * Return a copy of the schema with `nullable` set
 */
export function withNullable<T extends SchemaIR>(schema: T, nullable = true) {
  return { ...schema, nullable };
}

/**
 * Stringify an enum literal for targets that only carry text
 */
export function stringifyEnumValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null) return "null";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Code-unit string comparison, independent of the host locale
 */
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
