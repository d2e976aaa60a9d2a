/**
 * Tag filtering
 *
 * Include/exclude regular expressions evaluated against every tag an
 * operation declares. Exclusion always wins over inclusion.
 */

import { FALLBACK_TAG, groupServices } from "./operations";

import type { ApiIR, OperationIR } from "./types";

export interface TagFilters {
  include: RegExp[];
  exclude: RegExp[];
}

/**
 * Compile include/exclude tag patterns
 */
export function compileTagFilters(
  include: readonly string[] = [],
  exclude: readonly string[] = [],
): TagFilters {
  return {
    include: include.map((pattern) => compilePattern(pattern, "includeTags")),
    exclude: exclude.map((pattern) => compilePattern(pattern, "excludeTags")),
  };
}

function compilePattern(pattern: string, option: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`invalid ${option} pattern "${pattern}": ${reason}`);
  }
}

function matchesAny(tag: string, patterns: RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(tag));
}

/**
 * An operation is included when the include list is empty or any of its tags
 * matches an include pattern, and none of its tags matches an exclude pattern.
 */
export function shouldIncludeOperation(
  tags: readonly string[],
  filters: TagFilters,
): boolean {
  const included =
    filters.include.length === 0 ||
    tags.some((tag) => matchesAny(tag, filters.include));
  if (!included) return false;

  return !tags.some((tag) => matchesAny(tag, filters.exclude));
}

/**
 * Tags an operation is filtered by; untagged operations use the fallback tag
 */
export function effectiveTags(op: OperationIR): string[] {
  return op.originalTags.length > 0 ? op.originalTags : [FALLBACK_TAG];
}

/**
 * Keep the operations that pass the filters, regrouped under their first tag
 * the filters allow. Services left without operations are dropped. Models and
 * security schemes are carried over untouched.
 */
export function filterIR(ir: ApiIR, filters: TagFilters): ApiIR {
  const grouped = new Map<string, OperationIR[]>();

  for (const service of ir.services) {
    for (const op of service.operations) {
      const tags = effectiveTags(op);
      if (!shouldIncludeOperation(tags, filters)) continue;

      const tag =
        tags.find(
          (candidate) =>
            filters.include.length === 0 ||
            matchesAny(candidate, filters.include),
        ) ?? service.tag;
      const operations = grouped.get(tag) ?? [];
      operations.push(tag === op.tag ? op : { ...op, tag });
      grouped.set(tag, operations);
    }
  }

  return {
    services: groupServices(grouped),
    modelDefs: ir.modelDefs,
    securitySchemes: ir.securitySchemes,
  };
}
