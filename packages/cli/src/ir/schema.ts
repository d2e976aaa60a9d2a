/**
 * OpenAPI schema to IR converter
 *
 * Converts component and inline schemas into SchemaIR nodes. Nested anonymous
 * objects and enums are hoisted into their own model definitions under
 * synthetic names derived from their position, and replaced by refs.
 */

import { isDeepStrictEqual } from "node:util";

import { createNamingEngine } from "@/utils/naming";
import { ir, withNullable } from "./utils";

import type { ApiDocument, SchemaNode } from "@/adapters/openapi/types";
import type { NamingEngine } from "@/utils/naming";
import type {
  AnnotationsIR,
  DiscriminatorIR,
  EnumBaseKind,
  FieldIR,
  ModelDefIR,
  ObjectSchemaIR,
  RefSchemaIR,
  SchemaIR,
} from "./types";

// ============================================================================
// Build Context
// ============================================================================

/**
 * State owned by a single IR build. Never share one between builds.
 */
export interface BuildContext {
  /** Model definitions registered so far, in registration order */
  models: ModelDefIR[];
  /** Registered names and the (non-nullable) shape registered under each */
  seenNames: Map<string, SchemaIR>;
  /** Component names, never given to a hoisted shape */
  reserved: Set<string>;
  naming: NamingEngine;
  warnings: string[];
  /** When false, nested shapes stay inline and nothing is registered */
  hoist: boolean;
}

export function createBuildContext(
  naming: NamingEngine = createNamingEngine(),
): BuildContext {
  return {
    models: [],
    seenNames: new Map(),
    reserved: new Set(),
    naming,
    warnings: [],
    hoist: true,
  };
}

/**
 * A view of the context that converts schemas inline, sharing diagnostics
 */
export function inlineContext(ctx: BuildContext): BuildContext {
  return { ...ctx, hoist: false };
}

// ============================================================================
// Component Models
// ============================================================================

/**
 * Convert every component schema (sorted by name) into a model definition.
 * Hoisted nested models are registered ahead of the component that owns them
 * and never take a component's name.
 */
export function buildModelDefs(
  document: ApiDocument,
  ctx: BuildContext,
): ModelDefIR[] {
  const schemas = document.components?.schemas ?? {};
  const names = Object.keys(schemas).sort();
  for (const name of names) {
    ctx.reserved.add(name);
  }

  for (const name of names) {
    const node = schemas[name];
    if (!node) continue;

    const schema = convertSchema(node, name, "", false, ctx);
    ctx.models.push({ name, schema, annotations: extractAnnotations(node) });
    ctx.seenNames.set(name, withNullable(schema, false));
  }

  return ctx.models;
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Convert a schema node to IR.
 *
 * A node is nested when it has a property name or is an array item; nested
 * objects and enums are hoisted under `parent[_Property][_Item]`.
 */
export function convertSchema(
  node: SchemaNode | undefined,
  parentName: string,
  propertyName: string,
  isArrayItem: boolean,
  ctx: BuildContext,
): SchemaIR {
  if (!node) return ir.unknown();

  if (node.$ref !== undefined) {
    return convertRef(node.$ref, node.nullable === true, ctx);
  }

  const position: Position = { parentName, propertyName, isArrayItem };
  const ownName = syntheticName(position, ctx.naming);
  const schema = convertShape(node, position, ownName, ctx);

  const nested = propertyName !== "" || isArrayItem;
  if (
    nested &&
    ctx.hoist &&
    (schema.kind === "object" || schema.kind === "enum")
  ) {
    return hoistModel(ownName, schema, extractAnnotations(node), ctx);
  }

  return schema;
}

interface Position {
  parentName: string;
  propertyName: string;
  isArrayItem: boolean;
}

/**
 * `parent[_Property][_Item]`
 */
export function syntheticName(
  position: Position,
  naming: NamingEngine,
): string {
  const parts = [position.parentName];
  if (position.propertyName !== "") {
    parts.push(naming.toPascalCase(position.propertyName));
  }
  if (position.isArrayItem) {
    parts.push("Item");
  }
  return parts.filter((part) => part !== "").join("_");
}

function convertShape(
  node: SchemaNode,
  position: Position,
  ownName: string,
  ctx: BuildContext,
): SchemaIR {
  const types = declaredTypes(node);
  const nonNullTypes = types.filter((t) => t !== "null");
  const nullable = node.nullable === true || types.includes("null");
  const discriminator = convertDiscriminator(node, ctx);

  const finish = (schema: SchemaIR): SchemaIR => {
    const result = { ...schema, nullable: schema.nullable || nullable };
    return discriminator ? { ...result, discriminator } : result;
  };

  // Compositions
  if (node.oneOf && node.oneOf.length > 0) {
    return finish(
      ir.oneOf(convertMembers(node.oneOf, "Option", position, ownName, ctx)),
    );
  }
  if (node.anyOf && node.anyOf.length > 0) {
    return finish(
      ir.anyOf(convertMembers(node.anyOf, "Option", position, ownName, ctx)),
    );
  }
  if (node.allOf && node.allOf.length > 0) {
    return finish(
      ir.allOf(convertMembers(node.allOf, "Part", position, ownName, ctx)),
    );
  }
  if (node.not) {
    return finish(
      ir.not(convertMember(node.not, `${ownName}_Not`, position, ctx)),
    );
  }

  // Enum and const
  const literals = enumLiterals(node);
  if (literals) {
    const values = literals.filter((value) => value !== null);
    if (values.length === 0) return finish(ir.null());
    const schema = ir.enum(values, inferEnumBaseKind(nonNullTypes, values));
    return finish(
      values.length < literals.length ? withNullable(schema) : schema,
    );
  }

  // Several non-null types (3.1): a union of each single-typed variant
  if (nonNullTypes.length > 1) {
    const members = nonNullTypes.map((type) =>
      convertSchema(
        { ...node, type, nullable: false },
        position.parentName,
        position.propertyName,
        position.isArrayItem,
        ctx,
      ),
    );
    return finish(ir.oneOf(members));
  }

  const type = nonNullTypes[0];
  if (type === undefined) {
    if (types.includes("null")) return ir.null();
    if (node.properties || node.additionalProperties !== undefined) {
      return finish(convertObject(node, ownName, ctx));
    }
    if (node.items) {
      return finish(convertArray(node, position, ctx));
    }
    return finish(ir.unknown());
  }

  switch (type) {
    case "string":
      return finish(ir.string(node.format));
    case "number":
      return finish(ir.number(node.format));
    case "integer":
      return finish(ir.integer(node.format));
    case "boolean":
      return finish(ir.boolean());
    case "array":
      return finish(convertArray(node, position, ctx));
    case "object":
      return finish(convertObject(node, ownName, ctx));
    default:
      ctx.warnings.push(
        `Unsupported schema type "${type}" at ${describePosition(ownName)}; treating it as unknown`,
      );
      return finish(ir.unknown());
  }
}

function convertRef(
  ref: string,
  nullable: boolean,
  ctx: BuildContext,
): SchemaIR {
  const name = refName(ref);
  if (name === "") {
    ctx.warnings.push(`Cannot derive a model name from $ref "${ref}"`);
    return withNullable(ir.unknown(), nullable);
  }
  return withNullable(ir.ref(name), nullable);
}

function convertMembers(
  members: SchemaNode[],
  suffix: "Option" | "Part",
  position: Position,
  ownName: string,
  ctx: BuildContext,
): SchemaIR[] {
  return members.map((member, index) =>
    convertMember(member, `${ownName}_${suffix}${index + 1}`, position, ctx),
  );
}

/**
 * Members keep the composition's naming context, except anonymous objects and
 * enums, which are hoisted under a positional name.
 */
function convertMember(
  member: SchemaNode,
  memberName: string,
  position: Position,
  ctx: BuildContext,
): SchemaIR {
  if (ctx.hoist && member.$ref === undefined && isModelShape(member)) {
    const schema = convertSchema(member, memberName, "", false, ctx);
    if (schema.kind === "object" || schema.kind === "enum") {
      return hoistModel(memberName, schema, extractAnnotations(member), ctx);
    }
    return schema;
  }

  return convertSchema(
    member,
    position.parentName,
    position.propertyName,
    position.isArrayItem,
    ctx,
  );
}

function convertObject(
  node: SchemaNode,
  ownName: string,
  ctx: BuildContext,
): ObjectSchemaIR {
  const fields = convertFields(node, ownName, ctx);
  const additional = node.additionalProperties;

  if (additional === undefined || additional === false) {
    return ir.object(fields);
  }
  if (additional === true) {
    return ir.object(fields, ir.unknown());
  }

  // Extra named fields are merged rather than wrapped in a throwaway type
  if (additional.$ref === undefined && hasProperties(additional)) {
    return ir.object([...fields, ...convertFields(additional, ownName, ctx)]);
  }

  return ir.object(
    fields,
    convertSchema(additional, ownName, "Properties", false, ctx),
  );
}

function convertFields(
  node: SchemaNode,
  ownName: string,
  ctx: BuildContext,
): FieldIR[] {
  const properties = node.properties ?? {};
  const required = new Set(node.required ?? []);

  return Object.keys(properties)
    .sort()
    .map((name) => {
      const property = properties[name];
      return {
        name,
        type: convertSchema(property, ownName, name, false, ctx),
        required: required.has(name),
        annotations: property ? extractAnnotations(property) : {},
      };
    });
}

function convertArray(
  node: SchemaNode,
  position: Position,
  ctx: BuildContext,
): SchemaIR {
  const items = convertSchema(
    node.items,
    position.parentName,
    position.propertyName,
    true,
    ctx,
  );
  return ir.array(items);
}

// ============================================================================
// Hoisting
// ============================================================================

/**
 * Register a nested shape under a synthetic name and return a ref to it.
 *
 * A name already taken by an equal shape is reused; a different shape, or a
 * component not converted yet, gets the first free numeric suffix (`_2`, ...).
 */
function hoistModel(
  name: string,
  schema: SchemaIR,
  annotations: AnnotationsIR,
  ctx: BuildContext,
): RefSchemaIR {
  const shape = withNullable(schema, false);

  let candidate = name;
  let suffix = 1;
  for (;;) {
    const existing = ctx.seenNames.get(candidate);
    if (existing === undefined && !ctx.reserved.has(candidate)) {
      ctx.models.push({ name: candidate, schema: shape, annotations });
      ctx.seenNames.set(candidate, shape);
      break;
    }
    if (existing !== undefined && isDeepStrictEqual(existing, shape)) break;
    suffix += 1;
    candidate = `${name}_${suffix}`;
  }

  if (candidate !== name) {
    ctx.warnings.push(
      `Synthetic model name "${name}" is already used by a different shape; using "${candidate}"`,
    );
  }

  return withNullable(ir.ref(candidate), schema.nullable);
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Model name of a `$ref`: its last JSON pointer segment, unescaped
 */
export function refName(ref: string): string {
  const segment = ref.split("/").pop() ?? "";
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

function declaredTypes(node: SchemaNode): string[] {
  if (node.type === undefined) return [];
  return typeof node.type === "string" ? [node.type] : node.type;
}

function enumLiterals(node: SchemaNode): unknown[] | undefined {
  if (node.enum && node.enum.length > 0) return node.enum;
  if (node.const !== undefined) return [node.const];
  return undefined;
}

function hasProperties(node: SchemaNode): boolean {
  return Object.keys(node.properties ?? {}).length > 0;
}

function isModelShape(node: SchemaNode): boolean {
  if (enumLiterals(node)) return true;
  const types = declaredTypes(node).filter((t) => t !== "null");
  if (types.length === 1) return types[0] === "object";
  return (
    types.length === 0 &&
    !node.oneOf &&
    !node.anyOf &&
    !node.allOf &&
    !node.not &&
    (node.properties !== undefined || node.additionalProperties !== undefined)
  );
}

/**
 * Explicit declared type first, else the native type of the first literal
 */
export function inferEnumBaseKind(
  declared: string[],
  values: unknown[],
): EnumBaseKind {
  const type = declared[0];
  switch (type) {
    case "string":
    case "number":
    case "integer":
    case "boolean":
      return type;
    default:
      break;
  }

  const first = values[0];
  if (typeof first === "string") return "string";
  if (typeof first === "number") {
    return Number.isInteger(first) ? "integer" : "number";
  }
  if (typeof first === "boolean") return "boolean";
  return "unknown";
}

function convertDiscriminator(
  node: SchemaNode,
  ctx: BuildContext,
): DiscriminatorIR | undefined {
  if (!node.discriminator) return undefined;

  const mapping: Record<string, string> = {};
  for (const [value, target] of Object.entries(
    node.discriminator.mapping ?? {},
  )) {
    const name = refName(target);
    if (name === "") {
      ctx.warnings.push(
        `Discriminator mapping "${value}" points at "${target}", which names no model`,
      );
      continue;
    }
    mapping[value] = name;
  }

  return { propertyName: node.discriminator.propertyName, mapping };
}

export function extractAnnotations(node: SchemaNode): AnnotationsIR {
  const annotations: AnnotationsIR = {};
  if (node.title !== undefined) annotations.title = node.title;
  if (node.description !== undefined) {
    annotations.description = node.description;
  }
  if (node.deprecated !== undefined) annotations.deprecated = node.deprecated;
  if (node.readOnly !== undefined) annotations.readOnly = node.readOnly;
  if (node.writeOnly !== undefined) annotations.writeOnly = node.writeOnly;
  if (node.default !== undefined) annotations.default = node.default;

  if (Array.isArray(node.examples)) {
    annotations.examples = node.examples;
  } else if (node.example !== undefined) {
    annotations.examples = [node.example];
  }

  return annotations;
}

function describePosition(ownName: string): string {
  return ownName === "" ? "an operation schema" : `"${ownName}"`;
}
