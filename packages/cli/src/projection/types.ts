/**
 * Abstract type expressions
 *
 * A target-independent description of a type in some output ecosystem.
 * Emitters render these into concrete syntax.
 */

import type { EnumBaseKind } from "@/ir/types";

export type ScalarKind =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "bytes"
  | "null"
  | "unknown";

/**
 * Why a projection is not exact:
 * - "union" - the target has no union type
 * - "intersection" - the target has no intersection; the first member is used
 * - "struct" - the target cannot inline a struct; an open map is used
 * - "not" - negated types cannot be expressed
 * - "unresolved" - the ref names no known model
 */
export type Approximation =
  | "union"
  | "intersection"
  | "struct"
  | "not"
  | "unresolved";

interface TypeExprBase {
  approximated?: Approximation;
}

export interface ScalarExpr extends TypeExprBase {
  kind: "scalar";
  scalar: ScalarKind;
  format?: string;
}

export interface SequenceExpr extends TypeExprBase {
  kind: "sequence";
  items: TypeExpr;
}

export interface MapExpr extends TypeExprBase {
  kind: "map";
  values: TypeExpr;
}

export interface NamedExpr extends TypeExprBase {
  kind: "named";
  name: string;
}

export interface UnionExpr extends TypeExprBase {
  kind: "union";
  members: TypeExpr[];
}

export interface IntersectionExpr extends TypeExprBase {
  kind: "intersection";
  members: TypeExpr[];
}

export type LiteralValue = string | number | boolean;

export interface LiteralExpr extends TypeExprBase {
  kind: "literal";
  values: LiteralValue[];
  baseKind: EnumBaseKind;
}

export interface StructFieldExpr {
  name: string;
  type: TypeExpr;
  required: boolean;
}

export interface StructExpr extends TypeExprBase {
  kind: "struct";
  fields: StructFieldExpr[];
  additional?: TypeExpr;
}

export interface NullableExpr extends TypeExprBase {
  kind: "nullable";
  inner: TypeExpr;
}

export type TypeExpr =
  | ScalarExpr
  | SequenceExpr
  | MapExpr
  | NamedExpr
  | UnionExpr
  | IntersectionExpr
  | LiteralExpr
  | StructExpr
  | NullableExpr;

/**
 * What a target's type system can express
 */
export interface TypeVocabulary {
  name: string;
  /** Sum types for oneOf/anyOf */
  unions: boolean;
  /** Structural intersections for allOf */
  intersections: boolean;
  /** Enum base kinds that can be written as closed literal types */
  literalKinds: readonly EnumBaseKind[];
  /** Anonymous object types written in place */
  inlineStructs: boolean;
}

export interface ProjectOptions {
  /** Model names in scope; refs to other names project to unknown */
  knownModels?: ReadonlySet<string>;
  /** Receives a diagnostic for every approximation */
  warnings?: string[];
}
