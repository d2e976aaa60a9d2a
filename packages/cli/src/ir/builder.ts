/**
 * IR builder
 *
 * Builds the full IR for one document: every component model and every
 * operation. Per-client narrowing happens in `deriveIR`.
 */

import { collectSecuritySchemes, collectServices } from "./operations";
import { buildModelDefs, createBuildContext } from "./schema";

import type { ApiDocument } from "@/adapters/openapi/types";
import type { NamingEngine } from "@/utils/naming";
import type { ApiIR } from "./types";

export interface BuildIROptions {
  /** Naming engine used for synthetic model names */
  naming?: NamingEngine;
}

export interface BuildIRResult {
  ir: ApiIR;
  /** Diagnostics collected while converting schemas and operations */
  warnings: string[];
}

/**
 * Build the full IR. Each call owns its own build context.
 */
export function buildIR(
  document: ApiDocument,
  options: BuildIROptions = {},
): BuildIRResult {
  const ctx = createBuildContext(options.naming);

  const modelDefs = buildModelDefs(document, ctx);
  const services = collectServices(document, undefined, ctx);
  const securitySchemes = collectSecuritySchemes(document);

  return {
    ir: { services, modelDefs, securitySchemes },
    warnings: ctx.warnings,
  };
}
