/**
 * Reachability pruning
 *
 * Tree-shakes the model registry down to the models the surviving operations
 * reach through refs.
 */

import { collectRefs, compareStrings, operationSchemas } from "./utils";

import type { ApiIR, ModelDefIR } from "./types";

export interface PruneResult {
  ir: ApiIR;
  /** Ref names reached from operations or models that name no model */
  unresolved: string[];
}

/**
 * Names of every model reachable from the IR's operations
 */
export function reachableModelNames(ir: ApiIR): {
  reachable: Set<string>;
  unresolved: Set<string>;
} {
  const byName = new Map<string, ModelDefIR[]>();
  for (const model of ir.modelDefs) {
    const entries = byName.get(model.name) ?? [];
    entries.push(model);
    byName.set(model.name, entries);
  }

  const pending: string[] = [];
  for (const service of ir.services) {
    for (const op of service.operations) {
      for (const schema of operationSchemas(op)) {
        pending.push(...collectRefs(schema));
      }
    }
  }

  const reachable = new Set<string>();
  const unresolved = new Set<string>();
  for (let name = pending.pop(); name !== undefined; name = pending.pop()) {
    if (reachable.has(name) || unresolved.has(name)) continue;

    const models = byName.get(name);
    if (!models) {
      unresolved.add(name);
      continue;
    }

    reachable.add(name);
    // A name may still be registered twice before dedup; follow both
    for (const model of models) {
      pending.push(...collectRefs(model.schema));
    }
  }

  return { reachable, unresolved };
}

/**
 * Drop every model the operations cannot reach. Registry order is kept.
 */
export function pruneModels(ir: ApiIR): PruneResult {
  const { reachable, unresolved } = reachableModelNames(ir);

  return {
    ir: {
      services: ir.services,
      modelDefs: ir.modelDefs.filter((model) => reachable.has(model.name)),
      securitySchemes: ir.securitySchemes,
    },
    unresolved: [...unresolved].sort(compareStrings),
  };
}
