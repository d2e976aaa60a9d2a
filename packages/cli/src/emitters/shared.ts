/**
 * Helpers shared by every emitter
 */

import { isLiteralValue, projectType } from "@/projection/project";
import { resolveMethodName } from "@/utils/method-names";

import type {
  ApiIR,
  EnumBaseKind,
  ModelDefIR,
  OperationIR,
  ParamIR,
} from "@/ir/types";
import type {
  LiteralValue,
  ProjectOptions,
  StructFieldExpr,
  TypeExpr,
  TypeVocabulary,
} from "@/projection/types";
import type { EmitterOptions, GeneratedFile } from "./types";

export const IR_FILENAME = "ir.json";

// ============================================================================
// ir.json
// ============================================================================

export interface EmittedOperation extends OperationIR {
  methodName: string;
}

export interface IRDocument {
  client: string;
  target: string;
  packageName: string;
  moduleName?: string;
  services: { tag: string; operations: EmittedOperation[] }[];
  modelDefs: ApiIR["modelDefs"];
  securitySchemes: ApiIR["securitySchemes"];
}

/**
 * The derived IR as written to `ir.json`, with a resolved method name on
 * every operation
 */
export function toIRDocument(
  ir: ApiIR,
  target: string,
  options: EmitterOptions,
): IRDocument {
  return {
    client: options.clientName,
    target,
    packageName: options.packageName,
    moduleName: options.moduleName,
    services: ir.services.map((service) => ({
      tag: service.tag,
      operations: service.operations.map((op) => ({
        ...op,
        methodName: resolveMethodName(op, {
          operationIdParser: options.operationIdParser,
          naming: options.naming,
        }),
      })),
    })),
    modelDefs: ir.modelDefs,
    securitySchemes: ir.securitySchemes,
  };
}

export function irFile(document: IRDocument): GeneratedFile {
  return {
    filename: IR_FILENAME,
    content: `${JSON.stringify(document, null, 2)}\n`,
  };
}

// ============================================================================
// Model Shapes
// ============================================================================

/**
 * How a model is declared in a target language
 *
 * - record - a class/struct/interface with named fields
 * - enum - a closed set of non-null literals
 * - alias - anything else, declared as a type alias
 */
export type ModelShape =
  | {
      kind: "record";
      name: string;
      fields: StructFieldExpr[];
      additional?: TypeExpr;
    }
  | {
      kind: "enum";
      name: string;
      values: LiteralValue[];
      baseKind: EnumBaseKind;
    }
  | { kind: "alias"; name: string; type: TypeExpr };

/**
 * Project a model definition for a vocabulary. Fields of a record are
 * projected one by one so top-level models stay declarations even where the
 * vocabulary has no inline structs.
 */
export function projectModel(
  model: ModelDefIR,
  vocabulary: TypeVocabulary,
  options: ProjectOptions,
): ModelShape {
  const { name, schema } = model;

  if (
    schema.kind === "object" &&
    !schema.nullable &&
    schema.properties.length > 0
  ) {
    const fields = schema.properties.map((field) => ({
      name: field.name,
      type: projectType(field.type, vocabulary, options),
      required: field.required,
    }));
    return schema.additionalProperties
      ? {
          kind: "record",
          name,
          fields,
          additional: projectType(
            schema.additionalProperties,
            vocabulary,
            options,
          ),
        }
      : { kind: "record", name, fields };
  }

  if (schema.kind === "enum" && !schema.nullable) {
    return {
      kind: "enum",
      name,
      values: schema.rawValues.filter(isLiteralValue),
      baseKind: schema.baseKind,
    };
  }

  return { kind: "alias", name, type: projectType(schema, vocabulary, options) };
}

/**
 * Project every model of a derived IR. Refs to names outside the IR are
 * projected as unknown.
 */
export function projectModels(
  ir: ApiIR,
  vocabulary: TypeVocabulary,
  warnings: string[],
): ModelShape[] {
  const knownModels = new Set(ir.modelDefs.map((model) => model.name));
  return ir.modelDefs.map((model) =>
    projectModel(model, vocabulary, { knownModels, warnings }),
  );
}

// ============================================================================
// Service Shapes
// ============================================================================

export type ParamLocation = "path" | "query" | "body";

export interface MethodParamShape {
  /** Declared name; a request body is called "body" */
  name: string;
  location: ParamLocation;
  type: TypeExpr;
  required: boolean;
}

export interface MethodShape {
  name: string;
  httpMethod: string;
  path: string;
  summary: string;
  deprecated: boolean;
  /** Required parameters first, each group in path, body, query order */
  params: MethodParamShape[];
  /** Absent when the operation returns no body */
  response?: TypeExpr;
}

export interface ServiceShape {
  tag: string;
  methods: MethodShape[];
}

/**
 * Project every operation of an `ir.json` document into a method signature,
 * one service per tag
 */
export function projectServices(
  document: IRDocument,
  vocabulary: TypeVocabulary,
  options: ProjectOptions,
): ServiceShape[] {
  return document.services.map((service) => ({
    tag: service.tag,
    methods: service.operations.map((op) =>
      projectMethod(op, vocabulary, options),
    ),
  }));
}

function projectMethod(
  op: EmittedOperation,
  vocabulary: TypeVocabulary,
  options: ProjectOptions,
): MethodShape {
  const toParam =
    (location: ParamLocation) =>
    (param: ParamIR): MethodParamShape => ({
      name: param.name,
      location,
      type: projectType(param.schema, vocabulary, options),
      required: location === "path" || param.required,
    });

  const params = [
    ...op.pathParams.map(toParam("path")),
    ...(op.requestBody
      ? [
          {
            name: "body",
            location: "body" as const,
            type: projectType(op.requestBody.schema, vocabulary, options),
            required: op.requestBody.required,
          },
        ]
      : []),
    ...op.queryParams.map(toParam("query")),
  ];

  const method: MethodShape = {
    name: op.methodName,
    httpMethod: op.method,
    path: op.path,
    summary: op.summary,
    deprecated: op.deprecated,
    params: [
      ...params.filter((param) => param.required),
      ...params.filter((param) => !param.required),
    ],
  };
  if (op.response.kind === "content") {
    method.response = projectType(op.response.schema, vocabulary, options);
  }
  return method;
}

/**
 * One-line description of a method: its summary and HTTP route
 */
export function describeMethod(method: MethodShape): string {
  const route = `${method.httpMethod} ${method.path}`;
  return method.summary === "" ? route : `${method.summary} (${route})`;
}

/**
 * Model names a type expression mentions
 */
export function collectNamedTypes(
  type: TypeExpr,
  into: Set<string> = new Set(),
): Set<string> {
  switch (type.kind) {
    case "named":
      into.add(type.name);
      break;
    case "sequence":
      collectNamedTypes(type.items, into);
      break;
    case "map":
      collectNamedTypes(type.values, into);
      break;
    case "nullable":
      collectNamedTypes(type.inner, into);
      break;
    case "union":
    case "intersection":
      for (const member of type.members) collectNamedTypes(member, into);
      break;
    case "struct":
      for (const field of type.fields) collectNamedTypes(field.type, into);
      if (type.additional) collectNamedTypes(type.additional, into);
      break;
    case "scalar":
    case "literal":
      break;
  }
  return into;
}

/**
 * Model names used anywhere in a service's signatures
 */
export function serviceModelNames(services: ServiceShape[]): Set<string> {
  const names = new Set<string>();
  for (const service of services) {
    for (const method of service.methods) {
      for (const param of method.params) collectNamedTypes(param.type, names);
      if (method.response) collectNamedTypes(method.response, names);
    }
  }
  return names;
}

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Give every model a distinct identifier, in registry order
 */
export function assignTypeNames(
  modelNames: string[],
  toIdentifier: (name: string) => string,
): Map<string, string> {
  const used = new Set<string>();
  const names = new Map<string, string>();
  for (const name of modelNames) {
    if (names.has(name)) continue;
    names.set(name, claimName(toIdentifier(name), used));
  }
  return names;
}

/**
 * Replace characters that cannot appear in an identifier and guard against
 * a leading digit
 */
export function toTypeIdentifier(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_]/g, "_");
  if (cleaned === "") return "_";
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

/**
 * Make `name` unique within `used` by appending 2, 3, ...
 */
export function claimName(name: string, used: Set<string>): string {
  let candidate = name;
  for (let i = 2; used.has(candidate); i++) {
    candidate = `${name}${i}`;
  }
  used.add(candidate);
  return candidate;
}

export function uniqueWarnings(warnings: string[]): string[] {
  return [...new Set(warnings)];
}
