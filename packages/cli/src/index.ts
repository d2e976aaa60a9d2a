// Public API for sdkloom

// =============================================================================
// Config Helpers
// =============================================================================

export { defineConfig } from "./core/config";

// =============================================================================
// Programmatic Generation
// =============================================================================

export { generate } from "./core/generator";

// =============================================================================
// Config Loading (for advanced usage)
// =============================================================================

export {
  configFromOptions,
  configSchema,
  loadSdkloomConfig,
  parseConfig,
} from "./core/config";

// =============================================================================
// Document Loading and IR
// =============================================================================

export { loadOpenAPIDocument } from "./adapters/openapi/schema";
export { buildIR, compileTagFilters, deriveIR } from "./ir";
export { projectType, vocabularies } from "./projection";
export { createNamingEngine } from "./utils/naming";
export { resolveMethodName } from "./utils/method-names";

// =============================================================================
// Emitters
// =============================================================================

export {
  getEmitter,
  getRegisteredEmitterTypes,
  registerEmitter,
} from "./emitters";

// =============================================================================
// Logger Utilities (for custom integrations)
// =============================================================================

export {
  createConsolaLogger,
  createRecordingLogger,
  createSilentLogger,
} from "./utils/logger";

// =============================================================================
// Types
// =============================================================================

export type {
  ClientConfig,
  SdkloomConfig,
  SdkloomConfigInput,
  TargetType,
} from "./core/config";
export type {
  GeneratedClientInfo,
  GenerateOptions,
  GenerateResult,
} from "./core/generator";
export type { ApiDocument } from "./adapters/openapi/types";
export type { OpenAPIDocument } from "./adapters/openapi/schema";
export type * from "./ir/types";
export type { TypeExpr, TypeVocabulary } from "./projection";
export type { NamingEngine, WordSplitPolicy } from "./utils/naming";
export type {
  Emitter,
  EmitterOptions,
  EmitterResult,
  GeneratedFile,
  IRDocument,
} from "./emitters";
export type {
  ConsolaLoggerOptions,
  LogEntry,
  LogLevel,
  RecordingLogger,
  SdkLogger,
} from "./utils/logger";
