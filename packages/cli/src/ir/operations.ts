/**
 * Operation collection
 *
 * Walks every path and method of an OpenAPI document and builds services
 * (operations grouped by tag) with resolved parameters, request bodies and
 * responses. Operation-level schemas are converted inline.
 */

import { httpMethods } from "@/adapters/openapi/types";
import { convertSchema, inlineContext, refName } from "./schema";
import { compareStrings, ir } from "./utils";

import type {
  ApiDocument,
  MediaTypeNode,
  OperationNode,
  ParameterNode,
  PathItemNode,
  ReferenceNode,
  ResponseNode,
} from "@/adapters/openapi/types";
import type { BuildContext } from "./schema";
import type {
  OperationIR,
  ParamIR,
  RequestBodyIR,
  ResponseIR,
  SecuritySchemeIR,
  ServiceIR,
} from "./types";

/** Grouping tag for operations that declare no tags */
export const FALLBACK_TAG = "misc";

const JSON_MEDIA_TYPE = "application/json";
const FORM_MEDIA_TYPE = "application/x-www-form-urlencoded";
const BINARY_MEDIA_TYPES = ["multipart/form-data", "application/octet-stream"];

// ============================================================================
// Services
// ============================================================================

/**
 * Build services from every operation in the document.
 *
 * The grouping tag is the first declared tag in `allowedTags` (every tag when
 * omitted). Tagged operations with no allowed tag are skipped.
 */
export function collectServices(
  document: ApiDocument,
  allowedTags: ReadonlySet<string> | undefined,
  ctx: BuildContext,
): ServiceIR[] {
  const inline = inlineContext(ctx);
  const grouped = new Map<string, OperationIR[]>();

  const paths = document.paths ?? {};
  for (const path of Object.keys(paths).sort()) {
    const item = paths[path];
    if (!item) continue;

    for (const method of httpMethods) {
      const operation = item[method];
      if (!operation) continue;

      const tag = groupingTag(operation.tags ?? [], allowedTags);
      if (tag === undefined) continue;

      const op = buildOperation(
        document,
        path,
        method,
        item,
        operation,
        tag,
        inline,
      );
      const operations = grouped.get(tag) ?? [];
      operations.push(op);
      grouped.set(tag, operations);
    }
  }

  return groupServices(grouped);
}

/**
 * Turn a tag -> operations map into services sorted by tag, with operations
 * sorted by path then method. Empty groups are dropped.
 */
export function groupServices(
  grouped: ReadonlyMap<string, OperationIR[]>,
): ServiceIR[] {
  return [...grouped.keys()]
    .sort(compareStrings)
    .map((tag) => ({
      tag,
      operations: [...(grouped.get(tag) ?? [])].sort(compareOperations),
    }))
    .filter((service) => service.operations.length > 0);
}

function compareOperations(a: OperationIR, b: OperationIR): number {
  return compareStrings(a.path, b.path) || compareStrings(a.method, b.method);
}

function groupingTag(
  tags: string[],
  allowedTags: ReadonlySet<string> | undefined,
): string | undefined {
  if (tags.length === 0) {
    return !allowedTags || allowedTags.has(FALLBACK_TAG)
      ? FALLBACK_TAG
      : undefined;
  }
  return tags.find((tag) => !allowedTags || allowedTags.has(tag));
}

function buildOperation(
  document: ApiDocument,
  path: string,
  method: string,
  item: PathItemNode,
  operation: OperationNode,
  tag: string,
  ctx: BuildContext,
): OperationIR {
  const label = `${method.toUpperCase()} ${path}`;
  const { pathParams, queryParams } = collectParams(
    document,
    path,
    item,
    operation,
    label,
    ctx,
  );
  const requestBody = extractRequestBody(document, operation, label, ctx);

  const op: OperationIR = {
    operationId: operation.operationId ?? "",
    method: method.toUpperCase(),
    path,
    tag,
    originalTags: [...(operation.tags ?? [])],
    summary: operation.summary ?? "",
    description: operation.description ?? "",
    deprecated: operation.deprecated ?? false,
    pathParams,
    queryParams,
    response: extractResponse(document, operation, label, ctx),
  };
  if (requestBody) {
    op.requestBody = requestBody;
  }
  return op;
}

// ============================================================================
// Parameters
// ============================================================================

/**
 * Merge path-item and operation parameters (the operation wins on name and
 * location), then split them into path and query parameters.
 *
 * Path parameters follow the order of the path template; any not named in the
 * template come after, sorted by name. Query parameters are sorted by name.
 */
export function collectParams(
  document: ApiDocument,
  path: string,
  item: PathItemNode,
  operation: OperationNode,
  label: string,
  ctx: BuildContext,
): { pathParams: ParamIR[]; queryParams: ParamIR[] } {
  const merged = new Map<string, ParameterNode>();

  const declared = [
    ...(item.parameters ?? []),
    ...(operation.parameters ?? []),
  ];
  for (const raw of declared) {
    const param = resolveComponent(
      raw,
      document.components?.parameters,
      "parameters",
    );
    if (!param) {
      ctx.warnings.push(
        `${label}: cannot resolve parameter ${describeReference(raw)}`,
      );
      continue;
    }
    merged.set(`${param.in}:${param.name}`, param);
  }

  const pathParams: ParamIR[] = [];
  const queryParams: ParamIR[] = [];
  for (const param of merged.values()) {
    const converted: ParamIR = {
      name: param.name,
      required: param.in === "path" ? true : (param.required ?? false),
      schema: convertSchema(param.schema, "", "", false, ctx),
      description: param.description ?? "",
    };
    if (param.in === "path") {
      pathParams.push(converted);
    } else if (param.in === "query") {
      queryParams.push(converted);
    }
  }

  const order = pathTemplateNames(path);
  const position = (name: string) => {
    const index = order.indexOf(name);
    return index === -1 ? order.length : index;
  };
  pathParams.sort(
    (a, b) =>
      position(a.name) - position(b.name) || compareStrings(a.name, b.name),
  );
  queryParams.sort((a, b) => compareStrings(a.name, b.name));

  return { pathParams, queryParams };
}

/**
 * Parameter names in the order they first appear in a path template
 */
export function pathTemplateNames(path: string): string[] {
  const names: string[] = [];
  for (const match of path.matchAll(/\{([^}]+)\}/g)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

// ============================================================================
// Request Bodies
// ============================================================================

/**
 * Pick the request body media type: JSON, then `+json`, then form-encoded,
 * then multipart or octet-stream (not modeled), then the first declared.
 */
export function extractRequestBody(
  document: ApiDocument,
  operation: OperationNode,
  label: string,
  ctx: BuildContext,
): RequestBodyIR | undefined {
  if (!operation.requestBody) return undefined;

  const body = resolveComponent(
    operation.requestBody,
    document.components?.requestBodies,
    "requestBodies",
  );
  if (!body) {
    ctx.warnings.push(
      `${label}: cannot resolve request body ${describeReference(operation.requestBody)}`,
    );
    return undefined;
  }

  const content = body.content;
  const required = body.required ?? false;

  const structured =
    findMediaType(content, (base) => base === JSON_MEDIA_TYPE) ??
    findMediaType(content, (base) => base.endsWith("+json")) ??
    findMediaType(content, (base) => base === FORM_MEDIA_TYPE);
  if (structured) {
    return {
      contentType: structured.contentType,
      schema: convertSchema(structured.media.schema, "", "", false, ctx),
      required,
    };
  }

  const binary = findMediaType(content, (base) =>
    BINARY_MEDIA_TYPES.includes(base),
  );
  if (binary) {
    return { contentType: binary.contentType, schema: ir.unknown(), required };
  }

  const first = findMediaType(content, () => true);
  if (!first) return undefined;
  return {
    contentType: first.contentType,
    schema: convertSchema(first.media.schema, "", "", false, ctx),
    required,
  };
}

// ============================================================================
// Responses
// ============================================================================

/**
 * Pick the success response: `200`, then `201`, then any other 2xx status in
 * sorted order. Without one, the response is marked unknown.
 */
export function extractResponse(
  document: ApiDocument,
  operation: OperationNode,
  label: string,
  ctx: BuildContext,
): ResponseIR {
  const responses = operation.responses ?? {};
  const others = Object.keys(responses)
    .filter((code) => /^2(\d\d|XX)$/i.test(code))
    .filter((code) => code !== "200" && code !== "201")
    .sort(compareStrings);

  for (const code of ["200", "201", ...others]) {
    const raw = responses[code];
    if (!raw) continue;

    const response = resolveComponent(
      raw,
      document.components?.responses,
      "responses",
    );
    if (!response) {
      ctx.warnings.push(
        `${label}: cannot resolve response ${code} ${describeReference(raw)}`,
      );
      continue;
    }
    return convertResponse(response, ctx);
  }

  return { kind: "unknown", schema: ir.unknown(), description: "" };
}

function convertResponse(
  response: ResponseNode,
  ctx: BuildContext,
): ResponseIR {
  const description = response.description ?? "";
  const content = response.content ?? {};

  const selected =
    findMediaType(content, (base) => base === JSON_MEDIA_TYPE) ??
    findMediaType(content, (base) => base.endsWith("+json")) ??
    findMediaType(content, () => true);
  if (!selected) {
    return { kind: "empty", schema: ir.unknown(), description };
  }

  return {
    kind: "content",
    contentType: selected.contentType,
    schema: convertSchema(selected.media.schema, "", "", false, ctx),
    description,
  };
}

function findMediaType(
  content: Record<string, MediaTypeNode>,
  matches: (base: string) => boolean,
): { contentType: string; media: MediaTypeNode } | undefined {
  for (const [contentType, media] of Object.entries(content)) {
    if (matches(mediaTypeBase(contentType))) {
      return { contentType, media };
    }
  }
  return undefined;
}

/**
 * `application/json; charset=utf-8` -> `application/json`
 */
function mediaTypeBase(contentType: string): string {
  return (contentType.split(";")[0] ?? "").trim().toLowerCase();
}

// ============================================================================
// Security Schemes
// ============================================================================

/**
 * Collect security schemes sorted by key, keeping the fields of each type
 */
export function collectSecuritySchemes(
  document: ApiDocument,
): SecuritySchemeIR[] {
  const schemes = document.components?.securitySchemes ?? {};
  const out: SecuritySchemeIR[] = [];

  for (const key of Object.keys(schemes).sort(compareStrings)) {
    const scheme = resolveComponent(schemes[key], schemes, "securitySchemes");
    if (!scheme) continue;

    const entry: SecuritySchemeIR = { key, type: scheme.type };
    switch (scheme.type) {
      case "http":
        if (scheme.scheme !== undefined) entry.scheme = scheme.scheme;
        if (scheme.bearerFormat !== undefined) {
          entry.bearerFormat = scheme.bearerFormat;
        }
        break;
      case "apiKey":
        if (scheme.in !== undefined) entry.in = scheme.in;
        if (scheme.name !== undefined) entry.name = scheme.name;
        break;
      case "openIdConnect":
        if (scheme.openIdConnectUrl !== undefined) {
          entry.openIdConnectUrl = scheme.openIdConnectUrl;
        }
        break;
      default:
        break;
    }
    out.push(entry);
  }

  return out;
}

// ============================================================================
// Reference Resolution
// ============================================================================

export function isReference(node: object): node is ReferenceNode {
  return "$ref" in node && typeof node.$ref === "string";
}

/**
 * Follow `#/components/<section>/<name>` references until a concrete node.
 * Returns undefined for refs outside the section, missing targets and cycles.
 */
export function resolveComponent<T extends object>(
  value: ReferenceNode | T | undefined,
  registry: Record<string, ReferenceNode | T> | undefined,
  section: string,
): T | undefined {
  const prefix = `#/components/${section}/`;
  const visited = new Set<string>();

  let current = value;
  while (current !== undefined) {
    if (!isReference(current)) return current;
    if (!current.$ref.startsWith(prefix) || visited.has(current.$ref)) {
      return undefined;
    }
    visited.add(current.$ref);
    current = registry?.[refName(current.$ref)];
  }
  return undefined;
}

function describeReference(node: object): string {
  return isReference(node) ? `"${node.$ref}"` : "(inline)";
}
