import { defineCommand } from "citty";
import consola from "consola";

import { loadOpenAPIDocument } from "@/adapters/openapi/schema";
import { buildIR } from "@/ir";
import { createNamingEngine, wordSplitPolicies } from "@/utils/naming";

import type { WordSplitPolicy } from "@/utils/naming";

export interface ValidateSummary {
  title: string;
  version: string;
  services: number;
  operations: number;
  models: number;
  warnings: string[];
}

function isWordSplitPolicy(value: string): value is WordSplitPolicy {
  return wordSplitPolicies.some((policy) => policy === value);
}

/**
 * Load a document and build its full IR without writing anything
 */
export async function validateDocument(
  input: string,
  wordSplit: WordSplitPolicy = "acronym",
): Promise<ValidateSummary> {
  const document = await loadOpenAPIDocument(input);
  const { ir, warnings } = buildIR(document, {
    naming: createNamingEngine(wordSplit),
  });

  return {
    title: document.info.title,
    version: document.info.version,
    services: ir.services.length,
    operations: ir.services.reduce(
      (count, service) => count + service.operations.length,
      0,
    ),
    models: ir.modelDefs.length,
    warnings,
  };
}

export const validateCommand = defineCommand({
  meta: {
    name: "validate",
    description: "Validate an OpenAPI document and report IR diagnostics",
  },
  args: {
    input: {
      type: "positional",
      description: "OpenAPI document path or URL",
      required: true,
    },
    "word-split": {
      type: "string",
      description: "Word split policy: acronym or lower-upper",
      default: "acronym",
    },
    strict: {
      type: "boolean",
      description: "Exit non-zero when the IR build reports warnings",
      default: false,
    },
  },
  async run({ args }) {
    try {
      const wordSplit = args["word-split"];
      if (!isWordSplitPolicy(wordSplit)) {
        throw new Error(
          `Unknown word split policy "${wordSplit}". Available policies: ${wordSplitPolicies.join(", ")}`,
        );
      }

      const summary = await validateDocument(args.input, wordSplit);
      for (const warning of summary.warnings) {
        consola.warn(warning);
      }

      consola.box({
        title: `${summary.title} ${summary.version}`,
        message: [
          `Services: ${summary.services}`,
          `Operations: ${summary.operations}`,
          `Models: ${summary.models}`,
          `Warnings: ${summary.warnings.length}`,
        ].join("\n"),
      });

      if (args.strict && summary.warnings.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      if (error instanceof Error) {
        consola.error(error.message);
      } else {
        consola.error("An unexpected error occurred");
      }
      process.exit(1);
    }
  },
});
