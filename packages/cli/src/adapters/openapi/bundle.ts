/**
 * Component hoisting for bundled multi-file documents
 *
 * Bundling inlines the first use of every external schema and points later
 * uses at that inline copy through path-shaped `$ref`s
 * (`#/paths/~1pets/get/...`). The IR names a model after the last segment of
 * its `$ref`, so those schemas are moved into `components.schemas` under
 * their name in the source file, and every ref to them is rewritten.
 */

import { basename } from "node:path";

import { isValidIdentifier, toPascalCase } from "@/utils/naming";

type JsonRecord = Record<string, unknown>;
type Holder = JsonRecord | unknown[];

/** What the values under a key are */
type Role = "schema" | "schemaMap" | "schemaList" | "other";

const schemaMapKeys = new Set([
  "properties",
  "patternProperties",
  "$defs",
  "definitions",
  "dependentSchemas",
]);

const schemaListKeys = new Set(["allOf", "anyOf", "oneOf", "prefixItems"]);

const schemaKeys = new Set([
  "items",
  "not",
  "additionalProperties",
  "if",
  "then",
  "else",
  "contains",
  "propertyNames",
  "unevaluatedItems",
  "unevaluatedProperties",
]);

// Literal values, never walked
const valueKeys = new Set(["default", "example", "examples", "enum", "const"]);

const schemaMarkerKeys = [
  "$ref",
  "type",
  "properties",
  "items",
  "allOf",
  "anyOf",
  "oneOf",
  "enum",
  "const",
  "additionalProperties",
];

const namedContainerKeys = new Set(["schemas", "$defs", "definitions"]);

const ignoredPointerTokens = new Set([
  "paths",
  "components",
  "schemas",
  "schema",
  "properties",
  "items",
  "content",
  "requestBody",
  "responses",
  "parameters",
  "allOf",
  "anyOf",
  "oneOf",
  "get",
  "put",
  "post",
  "delete",
  "options",
  "head",
  "patch",
  "trace",
]);

const COMPONENT_ROOT = /^#\/components\/[^/]+\/[^/]+$/;
const SCHEMA_PREFIX = "#/components/schemas/";

// ============================================================================
// Walking
// ============================================================================

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function childRole(role: Role, key: string): Role {
  switch (role) {
    case "schemaMap":
    case "schemaList":
      return "schema";
    case "schema":
      if (schemaMapKeys.has(key)) return "schemaMap";
      if (schemaListKeys.has(key)) return "schemaList";
      if (schemaKeys.has(key) || key === "schema") return "schema";
      return "other";
    case "other":
      if (key === "schema") return "schema";
      if (key === "schemas") return "schemaMap";
      return "other";
  }
}

interface Visit {
  value: JsonRecord;
  pointer: string;
  role: Role;
  parent: Holder | undefined;
  key: string;
}

/**
 * Depth-first walk over every record, skipping literal values.
 * A record shared by several parents is visited once per parent; cycles stop.
 */
function walk(root: unknown, visitor: (visit: Visit) => void): void {
  const active = new WeakSet<object>();

  const visit = (
    value: unknown,
    pointer: string,
    role: Role,
    parent: Holder | undefined,
    key: string,
  ): void => {
    if (typeof value !== "object" || value === null || active.has(value)) {
      return;
    }

    if (Array.isArray(value)) {
      active.add(value);
      const itemRole = role === "schemaList" ? "schema" : role;
      value.forEach((item, index) => {
        visit(item, `${pointer}/${index}`, itemRole, value, String(index));
      });
      active.delete(value);
      return;
    }

    if (!isRecord(value)) return;
    const record: JsonRecord = value;
    visitor({ value: record, pointer, role, parent, key });

    active.add(record);
    for (const [childKey, child] of Object.entries(record)) {
      if (role === "schema" && valueKeys.has(childKey)) continue;
      visit(
        child,
        `${pointer}/${encodePointerToken(childKey)}`,
        childRole(role, childKey),
        record,
        childKey,
      );
    }
    active.delete(record);
  };

  visit(root, "#", "other", undefined, "");
}

function replaceChild(parent: Holder, key: string, value: unknown): void {
  if (Array.isArray(parent)) {
    parent[Number(key)] = value;
  } else {
    parent[key] = value;
  }
}

// ============================================================================
// Pointers
// ============================================================================

function encodePointerToken(token: string): string {
  return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

function decodePointerToken(token: string): string {
  let decoded = token;
  try {
    decoded = decodeURIComponent(token);
  } catch (error) {
    if (!(error instanceof URIError)) throw error;
  }
  return decoded.replace(/~1/g, "/").replace(/~0/g, "~");
}

function pointerTokens(pointer: string): string[] {
  return pointer.slice(2).split("/").map(decodePointerToken);
}

/**
 * Resolve a local `#/...` pointer against a root value
 */
export function resolvePointer(root: unknown, pointer: string): unknown {
  if (pointer === "#") return root;
  if (!pointer.startsWith("#/")) return undefined;

  let current: unknown = root;
  for (const token of pointerTokens(pointer)) {
    if (Array.isArray(current)) {
      current = current[Number(token)];
    } else if (isRecord(current)) {
      current = current[token];
    } else {
      return undefined;
    }
  }
  return current;
}

// ============================================================================
// Names
// ============================================================================

function componentName(raw: string): string {
  if (isValidIdentifier(raw)) return raw;
  const pascal = toPascalCase(raw);
  return pascal === "" ? "Schema" : pascal;
}

function looksLikeSchema(value: JsonRecord): boolean {
  return schemaMarkerKeys.some((key) => key in value);
}

/**
 * Name of every object the external files define: a file's root by its file
 * name, top-level entries of a file that is not itself a schema and
 * `schemas`/`$defs`/`definitions` entries by their key.
 */
function collectSourceNames(
  sources: Record<string, unknown>,
): WeakMap<object, string> {
  const names = new WeakMap<object, string>();
  const seen = new WeakSet<object>();

  const nameEntries = (container: JsonRecord): void => {
    for (const [key, value] of Object.entries(container)) {
      if (isRecord(value) && !names.has(value)) {
        names.set(value, componentName(key));
      }
    }
  };

  const visit = (value: unknown): void => {
    if (!isRecord(value) || seen.has(value)) return;
    seen.add(value);
    for (const [key, child] of Object.entries(value)) {
      if (namedContainerKeys.has(key) && isRecord(child)) nameEntries(child);
      if (Array.isArray(child)) child.forEach(visit);
      else visit(child);
    }
  };

  for (const [path, root] of Object.entries(sources)) {
    if (!isRecord(root)) continue;
    if (!names.has(root)) {
      const stem = basename(path).replace(/\.[^.]*$/, "");
      names.set(root, componentName(toPascalCase(stem)));
    }
    if (!looksLikeSchema(root)) nameEntries(root);
  }
  for (const root of Object.values(sources)) {
    visit(root);
  }

  return names;
}

function nameFromPointer(pointer: string): string {
  const tokens = pointerTokens(pointer);
  for (let i = tokens.length - 1; i >= 0; i -= 1) {
    const token = tokens[i];
    if (
      token === undefined ||
      token === "" ||
      token.includes("/") ||
      /^\d+$/.test(token) ||
      ignoredPointerTokens.has(token)
    ) {
      continue;
    }
    return componentName(token);
  }
  return "Schema";
}

// ============================================================================
// Registry
// ============================================================================

interface Registry {
  schemas: JsonRecord;
  taken: Set<string>;
  pointers: WeakMap<object, string>;
  sourceNames: WeakMap<object, string>;
}

function createRegistry(
  document: JsonRecord,
  sourceNames: WeakMap<object, string>,
): Registry {
  const components = isRecord(document.components) ? document.components : {};
  document.components = components;
  const schemas = isRecord(components.schemas) ? components.schemas : {};
  components.schemas = schemas;

  const pointers = new WeakMap<object, string>();
  for (const [name, value] of Object.entries(schemas)) {
    if (isRecord(value)) {
      pointers.set(value, `${SCHEMA_PREFIX}${encodePointerToken(name)}`);
    }
  }

  return {
    schemas,
    taken: new Set(Object.keys(schemas)),
    pointers,
    sourceNames,
  };
}

/**
 * Pointer of the component holding `schema`, registering it under the first
 * free variant of `preferred` when it has none yet
 */
function register(
  registry: Registry,
  schema: JsonRecord,
  preferred: string,
): string {
  const existing = registry.pointers.get(schema);
  if (existing !== undefined) return existing;

  const base = registry.sourceNames.get(schema) ?? preferred;
  let name = base;
  for (let suffix = 2; registry.taken.has(name); suffix += 1) {
    name = `${base}_${suffix}`;
  }

  registry.taken.add(name);
  registry.schemas[name] = schema;
  const pointer = `${SCHEMA_PREFIX}${encodePointerToken(name)}`;
  registry.pointers.set(schema, pointer);
  return pointer;
}

// ============================================================================
// Hoisting
// ============================================================================

interface RefSite {
  holder: JsonRecord;
  role: Role;
  parent: Holder | undefined;
  key: string;
  ref: string;
  target: unknown;
}

function collectRefSites(document: JsonRecord): RefSite[] {
  const sites: RefSite[] = [];
  walk(document, ({ value, role, parent, key }) => {
    const ref = value.$ref;
    if (typeof ref !== "string" || !ref.startsWith("#/")) return;
    if (COMPONENT_ROOT.test(ref)) return;
    sites.push({ holder: value, role, parent, key, ref, target: undefined });
  });

  // Targets resolve before anything moves
  for (const site of sites) {
    site.target = resolvePointer(document, site.ref);
  }
  return sites;
}

function rewriteRefSites(sites: RefSite[], registry: Registry): void {
  for (const site of sites) {
    if (!isRecord(site.target)) continue;

    if (site.role === "schema") {
      site.holder.$ref = register(
        registry,
        site.target,
        nameFromPointer(site.ref),
      );
    } else if (site.parent !== undefined) {
      replaceChild(site.parent, site.key, site.target);
    }
  }
}

/**
 * Replace every inline schema that has a component with a ref to it
 */
function replaceInlineSchemas(document: JsonRecord, registry: Registry): void {
  walk(document, ({ value, pointer, role, parent, key }) => {
    if (role !== "schema" || parent === undefined) return;
    if (COMPONENT_ROOT.test(pointer)) return;
    if (typeof value.$ref === "string") return;

    const known = registry.pointers.get(value);
    const sourceName = registry.sourceNames.get(value);
    if (known === undefined && sourceName === undefined) return;

    const target = known ?? register(registry, value, sourceName ?? "Schema");
    replaceChild(parent, key, { $ref: target });
  });
}

function externalTarget(
  mappingValue: string,
  sources: Record<string, unknown>,
): unknown {
  const [file = "", fragment = ""] = mappingValue.split("#", 2);
  if (file === "") return undefined;

  const path = Object.keys(sources).find(
    (source) => basename(source) === basename(file),
  );
  if (path === undefined) return undefined;
  return fragment === ""
    ? sources[path]
    : resolvePointer(sources[path], `#${fragment}`);
}

function rewriteDiscriminatorMappings(
  document: JsonRecord,
  sources: Record<string, unknown>,
  registry: Registry,
): void {
  walk(document, ({ value, role }) => {
    if (role !== "schema" || !isRecord(value.discriminator)) return;
    const mapping = value.discriminator.mapping;
    if (!isRecord(mapping)) return;

    for (const [tag, target] of Object.entries(mapping)) {
      if (typeof target !== "string" || COMPONENT_ROOT.test(target)) continue;

      const schema = target.startsWith("#/")
        ? resolvePointer(document, target)
        : externalTarget(target, sources);
      if (isRecord(schema)) {
        mapping[tag] = register(registry, schema, nameFromPointer(target));
      }
    }
  });
}

/**
 * Move schemas that bundling inlined from other files into
 * `components.schemas` and point every use at them.
 *
 * @param document the bundled document, rewritten in place
 * @param sources parsed external files by path, as the bundler resolved them
 */
export function hoistBundledSchemas(
  document: unknown,
  sources: Record<string, unknown>,
): void {
  if (!isRecord(document)) return;

  const registry = createRegistry(document, collectSourceNames(sources));

  rewriteDiscriminatorMappings(document, sources, registry);
  rewriteRefSites(collectRefSites(document), registry);
  replaceInlineSchemas(document, registry);
}
