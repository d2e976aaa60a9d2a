import { goEmitter } from "./go";
import { pythonEmitter } from "./python";
import { typescriptEmitter } from "./typescript";

import type { Emitter } from "./types";

/**
 * Registry of available emitters, keyed by target type
 */
const emitters: Map<string, Emitter> = new Map();

/**
 * Register an emitter
 * @throws Error if an emitter is already registered for the type
 */
export function registerEmitter(emitter: Emitter): void {
  if (emitters.has(emitter.type)) {
    throw new Error(`Emitter for type "${emitter.type}" is already registered`);
  }
  emitters.set(emitter.type, emitter);
}

/**
 * Get the emitter for a target type
 * @throws Error if no emitter is registered for the type
 */
export function getEmitter(type: string): Emitter {
  const emitter = emitters.get(type);
  if (!emitter) {
    throw new Error(
      `No emitter registered for type "${type}". ` +
        `Available types: ${[...emitters.keys()].join(", ") || "none"}`,
    );
  }
  return emitter;
}

export function hasEmitter(type: string): boolean {
  return emitters.has(type);
}

export function getRegisteredEmitterTypes(): string[] {
  return [...emitters.keys()];
}

// Register built-in emitters
registerEmitter(typescriptEmitter);
registerEmitter(pythonEmitter);
registerEmitter(goEmitter);

export { goEmitter, pythonEmitter, typescriptEmitter };
export * from "./types";
export { IR_FILENAME, projectModel, toIRDocument } from "./shared";
export type { EmittedOperation, IRDocument, ModelShape } from "./shared";
