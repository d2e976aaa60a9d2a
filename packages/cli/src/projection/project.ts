/**
 * Type projection
 *
 * Maps a SchemaIR node to an abstract type expression in a target
 * vocabulary. Anything the vocabulary cannot express is approximated and
 * marked, never dropped.
 */

import type { SchemaIR } from "@/ir/types";
import type {
  Approximation,
  LiteralValue,
  ProjectOptions,
  ScalarExpr,
  ScalarKind,
  TypeExpr,
  TypeVocabulary,
} from "./types";

export function scalar(kind: ScalarKind): ScalarExpr {
  return { kind: "scalar", scalar: kind };
}

export function projectType(
  schema: SchemaIR,
  vocabulary: TypeVocabulary,
  options: ProjectOptions = {},
): TypeExpr {
  const projected = projectShape(schema, vocabulary, options);
  return schema.nullable ? nullable(projected) : projected;
}

/**
 * Wrap in `nullable` unless the type already is the null literal or is
 * already nullable
 */
export function nullable(type: TypeExpr): TypeExpr {
  if (type.kind === "nullable") return type;
  if (type.kind === "scalar" && type.scalar === "null") return type;
  return { kind: "nullable", inner: type };
}

function projectShape(
  schema: SchemaIR,
  vocabulary: TypeVocabulary,
  options: ProjectOptions,
): TypeExpr {
  const project = (member: SchemaIR) =>
    projectType(member, vocabulary, options);

  switch (schema.kind) {
    case "unknown":
    case "boolean":
    case "null":
      return scalar(schema.kind);

    case "number":
    case "integer":
      return schema.format === undefined
        ? scalar(schema.kind)
        : { ...scalar(schema.kind), format: schema.format };

    case "string":
      if (schema.format === "binary") return scalar("bytes");
      return schema.format === undefined
        ? scalar("string")
        : { ...scalar("string"), format: schema.format };

    case "array":
      return { kind: "sequence", items: project(schema.items) };

    case "object": {
      const additional = schema.additionalProperties
        ? project(schema.additionalProperties)
        : undefined;
      if (schema.properties.length === 0) {
        return { kind: "map", values: additional ?? scalar("unknown") };
      }
      if (!vocabulary.inlineStructs) {
        return approximate(
          { kind: "map", values: scalar("unknown") },
          "struct",
          vocabulary,
          options,
        );
      }
      const fields = schema.properties.map((field) => ({
        name: field.name,
        type: project(field.type),
        required: field.required,
      }));
      return additional
        ? { kind: "struct", fields, additional }
        : { kind: "struct", fields };
    }

    case "enum": {
      if (!vocabulary.literalKinds.includes(schema.baseKind)) {
        return scalar(schema.baseKind);
      }
      const values = schema.rawValues.filter(isLiteralValue);
      return { kind: "literal", values, baseKind: schema.baseKind };
    }

    case "ref":
      if (options.knownModels && !options.knownModels.has(schema.name)) {
        options.warnings?.push(
          `Unresolved model reference "${schema.name}"; projected as unknown`,
        );
        return { ...scalar("unknown"), approximated: "unresolved" };
      }
      return { kind: "named", name: schema.name };

    case "oneOf":
    case "anyOf":
      if (!vocabulary.unions) {
        return approximate(scalar("unknown"), "union", vocabulary, options);
      }
      return { kind: "union", members: schema.members.map(project) };

    case "allOf": {
      if (vocabulary.intersections) {
        return { kind: "intersection", members: schema.members.map(project) };
      }
      const [first] = schema.members;
      const base = first ? project(first) : scalar("unknown");
      return approximate(base, "intersection", vocabulary, options);
    }

    case "not":
      return approximate(scalar("unknown"), "not", vocabulary, options);

    default: {
      const unexpected: never = schema;
      throw new Error(
        `Unhandled schema kind: ${JSON.stringify(unexpected)}`,
      );
    }
  }
}

function approximate(
  type: TypeExpr,
  reason: Approximation,
  vocabulary: TypeVocabulary,
  options: ProjectOptions,
): TypeExpr {
  options.warnings?.push(
    `${vocabulary.name} cannot express ${describeApproximation(reason)}`,
  );
  return { ...type, approximated: reason };
}

function describeApproximation(reason: Approximation): string {
  switch (reason) {
    case "union":
      return "a union; using unknown";
    case "intersection":
      return "an intersection; using its first member";
    case "struct":
      return "an inline struct; using an open map";
    case "not":
      return "a negated type; using unknown";
    case "unresolved":
      return "an unresolved reference; using unknown";
  }
}

export function isLiteralValue(value: unknown): value is LiteralValue {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}
