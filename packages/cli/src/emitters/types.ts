import type { ApiIR } from "@/ir/types";
import type { TypeVocabulary } from "@/projection/types";
import type { NamingEngine } from "@/utils/naming";

/**
 * Result of generating a file
 */
export interface GeneratedFile {
  /** Path relative to the client output directory */
  filename: string;
  /** The generated content */
  content: string;
}

/**
 * Per-client settings an emitter reads
 */
export interface EmitterOptions {
  /** Client name from the config */
  clientName: string;
  packageName: string;
  moduleName?: string;
  /** Executable used to turn operationIds into method names */
  operationIdParser?: string;
  naming: NamingEngine;
}

export interface EmitterResult {
  files: GeneratedFile[];
  /** Approximations made while projecting types, deduplicated */
  warnings: string[];
}

/**
 * A target language backend. Emitters read the derived IR and never
 * modify it.
 */
export interface Emitter {
  /** Target type used in the config (e.g., "typescript") */
  type: string;
  vocabulary: TypeVocabulary;
  emit(ir: ApiIR, options: EmitterOptions): EmitterResult;
}
