/**
 * Intermediate Representation (IR) types
 *
 * The IR is a language-agnostic model of an API description. Parsers build it
 * from OpenAPI documents; emitters project it into target type vocabularies.
 */

// ============================================================================
// Schema IR
// ============================================================================

export type SchemaIRKind =
  | "unknown"
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "null"
  | "array"
  | "object"
  | "enum"
  | "ref"
  | "oneOf"
  | "anyOf"
  | "allOf"
  | "not";

/**
 * Underlying scalar kind of an enum
 */
export type EnumBaseKind =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "unknown";

export interface DiscriminatorIR {
  propertyName: string;
  /** Discriminator value -> model name */
  mapping: Record<string, string>;
}

export interface SchemaIRBase {
  nullable: boolean;
  /** Format hint, e.g. "date-time", "uuid", "binary" */
  format?: string;
  discriminator?: DiscriminatorIR;
}

export interface UnknownSchemaIR extends SchemaIRBase {
  kind: "unknown";
}

export interface StringSchemaIR extends SchemaIRBase {
  kind: "string";
}

export interface NumberSchemaIR extends SchemaIRBase {
  kind: "number";
}

export interface IntegerSchemaIR extends SchemaIRBase {
  kind: "integer";
}

export interface BooleanSchemaIR extends SchemaIRBase {
  kind: "boolean";
}

export interface NullSchemaIR extends SchemaIRBase {
  kind: "null";
}

export interface ArraySchemaIR extends SchemaIRBase {
  kind: "array";
  items: SchemaIR;
}

export interface ObjectSchemaIR extends SchemaIRBase {
  kind: "object";
  properties: FieldIR[];
  /** Typed map for extra keys; absent when the object is closed */
  additionalProperties?: SchemaIR;
}

export interface EnumSchemaIR extends SchemaIRBase {
  kind: "enum";
  /** Stringified values */
  values: string[];
  /** Values as declared */
  rawValues: unknown[];
  baseKind: EnumBaseKind;
}

export interface RefSchemaIR extends SchemaIRBase {
  kind: "ref";
  name: string;
}

export interface OneOfSchemaIR extends SchemaIRBase {
  kind: "oneOf";
  members: SchemaIR[];
}

export interface AnyOfSchemaIR extends SchemaIRBase {
  kind: "anyOf";
  members: SchemaIR[];
}

export interface AllOfSchemaIR extends SchemaIRBase {
  kind: "allOf";
  members: SchemaIR[];
}

export interface NotSchemaIR extends SchemaIRBase {
  kind: "not";
  inner: SchemaIR;
}

export type SchemaIR =
  | UnknownSchemaIR
  | StringSchemaIR
  | NumberSchemaIR
  | IntegerSchemaIR
  | BooleanSchemaIR
  | NullSchemaIR
  | ArraySchemaIR
  | ObjectSchemaIR
  | EnumSchemaIR
  | RefSchemaIR
  | OneOfSchemaIR
  | AnyOfSchemaIR
  | AllOfSchemaIR
  | NotSchemaIR;

export type CompositionSchemaIR = OneOfSchemaIR | AnyOfSchemaIR | AllOfSchemaIR;

// ============================================================================
// Models
// ============================================================================

export interface AnnotationsIR {
  title?: string;
  description?: string;
  deprecated?: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
  default?: unknown;
  examples?: unknown[];
}

export interface FieldIR {
  name: string;
  type: SchemaIR;
  required: boolean;
  annotations: AnnotationsIR;
}

export interface ModelDefIR {
  name: string;
  schema: SchemaIR;
  annotations: AnnotationsIR;
}

// ============================================================================
// Operations
// ============================================================================

export interface ParamIR {
  name: string;
  required: boolean;
  schema: SchemaIR;
  description: string;
}

export interface RequestBodyIR {
  contentType: string;
  schema: SchemaIR;
  required: boolean;
}

/**
 * - "content" - a success response with a body
 * - "empty" - a success response that declares no content
 * - "unknown" - no success response could be found
 */
export type ResponseKind = "content" | "empty" | "unknown";

export interface ResponseIR {
  kind: ResponseKind;
  contentType?: string;
  schema: SchemaIR;
  description: string;
}

export interface OperationIR {
  /** Declared operationId; empty when the document has none */
  operationId: string;
  /** Upper-case HTTP method */
  method: string;
  path: string;
  /** Grouping tag */
  tag: string;
  /** Every declared tag, used by tag filters */
  originalTags: string[];
  summary: string;
  description: string;
  deprecated: boolean;
  /** Ordered as they appear in the path template */
  pathParams: ParamIR[];
  /** Sorted by name */
  queryParams: ParamIR[];
  requestBody?: RequestBodyIR;
  response: ResponseIR;
}

export interface ServiceIR {
  tag: string;
  operations: OperationIR[];
}

export interface SecuritySchemeIR {
  key: string;
  type: string;
  scheme?: string;
  bearerFormat?: string;
  in?: string;
  name?: string;
  openIdConnectUrl?: string;
}

export interface ApiIR {
  services: ServiceIR[];
  modelDefs: ModelDefIR[];
  securitySchemes: SecuritySchemeIR[];
}

// ============================================================================
// Type Guards
// ============================================================================

export function isObjectSchema(schema: SchemaIR): schema is ObjectSchemaIR {
  return schema.kind === "object";
}

export function isEnumSchema(schema: SchemaIR): schema is EnumSchemaIR {
  return schema.kind === "enum";
}

export function isRefSchema(schema: SchemaIR): schema is RefSchemaIR {
  return schema.kind === "ref";
}

export function isArraySchema(schema: SchemaIR): schema is ArraySchemaIR {
  return schema.kind === "array";
}

export function isCompositionSchema(
  schema: SchemaIR,
): schema is CompositionSchemaIR {
  return (
    schema.kind === "oneOf" ||
    schema.kind === "anyOf" ||
    schema.kind === "allOf"
  );
}
