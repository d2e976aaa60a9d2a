import type { ModelDefIR } from "./types";

/**
 * Collapse model definitions that share a name.
 *
 * Each name keeps the position of its first occurrence. When an enum and a
 * non-enum share a name the first enum wins; otherwise the first entry wins.
 */
export function dedupeModelDefs(models: readonly ModelDefIR[]): ModelDefIR[] {
  const order: string[] = [];
  const chosen = new Map<string, ModelDefIR>();

  for (const model of models) {
    const current = chosen.get(model.name);
    if (current === undefined) {
      order.push(model.name);
      chosen.set(model.name, model);
    } else if (
      model.schema.kind === "enum" &&
      current.schema.kind !== "enum"
    ) {
      chosen.set(model.name, model);
    }
  }

  return order.flatMap((name) => {
    const model = chosen.get(name);
    return model ? [model] : [];
  });
}
