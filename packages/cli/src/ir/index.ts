/**
 * Intermediate Representation (IR) module
 *
 * Converts OpenAPI documents into a language-agnostic IR and narrows it per
 * client: tag filtering, reachability pruning and model deduplication.
 */

export * from "./types";
export { collectRefs, compareStrings, ir, operationSchemas } from "./utils";
export {
  buildModelDefs,
  convertSchema,
  createBuildContext,
  refName,
} from "./schema";
export type { BuildContext } from "./schema";
export {
  collectSecuritySchemes,
  collectServices,
  FALLBACK_TAG,
} from "./operations";
export {
  compileTagFilters,
  filterIR,
  shouldIncludeOperation,
} from "./filter";
export type { TagFilters } from "./filter";
export { pruneModels } from "./prune";
export type { PruneResult } from "./prune";
export { dedupeModelDefs } from "./dedupe";
export { buildIR } from "./builder";
export type { BuildIROptions, BuildIRResult } from "./builder";
export { deriveIR } from "./derive";
export type { DeriveIRResult } from "./derive";
