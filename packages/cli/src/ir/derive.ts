import { dedupeModelDefs } from "./dedupe";
import { filterIR } from "./filter";
import { pruneModels } from "./prune";

import type { TagFilters } from "./filter";
import type { ApiIR } from "./types";

export interface DeriveIRResult {
  ir: ApiIR;
  /** Sorted ref names that resolve to no model */
  unresolved: string[];
  warnings: string[];
}

/**
 * Narrow a full IR for one client: filter operations by tag, prune models the
 * surviving operations cannot reach, then dedupe model names.
 * The full IR is not modified.
 */
export function deriveIR(full: ApiIR, filters: TagFilters): DeriveIRResult {
  const filtered = filterIR(full, filters);
  const { ir: pruned, unresolved } = pruneModels(filtered);

  return {
    ir: { ...pruned, modelDefs: dedupeModelDefs(pruned.modelDefs) },
    unresolved,
    warnings: unresolved.map(
      (name) => `Unresolved model reference "${name}"; projected as unknown`,
    ),
  };
}
