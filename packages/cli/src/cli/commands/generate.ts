import { defineCommand } from "citty";
import consola from "consola";

import { configFromOptions, loadSdkloomConfig } from "@/core/config";
import { generate } from "@/core/generator";
import { createConsolaLogger, defaultLogger } from "@/utils/logger";

import type { DotenvOptions } from "c12";
import type { SdkloomConfig } from "@/core/config";
import type { SdkLogger } from "@/utils/logger";

interface GenerateArgs {
  config?: string;
  input?: string;
  type?: string;
  out?: string;
  "package-name"?: string;
  name?: string;
  "include-tags"?: string;
  "exclude-tags"?: string;
  "no-dotenv"?: boolean;
  "env-file"?: string | string[];
  quiet?: boolean;
}

/**
 * Determine dotenv options based on CLI arguments
 */
export function getDotenvOptions(
  args: Pick<GenerateArgs, "no-dotenv" | "env-file">,
): boolean | DotenvOptions {
  if (args["no-dotenv"]) {
    return false;
  }

  if (args["env-file"]) {
    const envFiles = Array.isArray(args["env-file"])
      ? args["env-file"]
      : [args["env-file"]];
    return { fileName: envFiles };
  }

  return true;
}

/**
 * Split a comma-separated flag value, dropping empty entries
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function hasFallbackFlags(args: GenerateArgs): boolean {
  return [
    args.input,
    args.type,
    args.out,
    args["package-name"],
    args.name,
  ].some((value) => value !== undefined);
}

/**
 * Resolve the config from --config, the fallback flags, or the config file
 * found in the working directory
 */
export async function resolveGenerateConfig(
  args: GenerateArgs,
  cwd: string = process.cwd(),
  logger: SdkLogger = defaultLogger,
): Promise<SdkloomConfig> {
  if (!args.config && hasFallbackFlags(args)) {
    return configFromOptions(
      {
        spec: args.input,
        type: args.type,
        outDir: args.out,
        packageName: args["package-name"],
        name: args.name,
        includeTags: splitList(args["include-tags"]),
        excludeTags: splitList(args["exclude-tags"]),
      },
      cwd,
    );
  }

  const { config, configPath } = await loadSdkloomConfig({
    configPath: args.config,
    cwd,
    dotenv: getDotenvOptions(args),
  });
  logger.info(`Using config: ${configPath}`);
  return config;
}

export const generateCommand = defineCommand({
  meta: {
    name: "generate",
    description: "Generate clients from an OpenAPI document",
  },
  args: {
    config: {
      type: "string",
      alias: "c",
      description: "Path to config file",
    },
    client: {
      type: "string",
      description: "Only generate the client with this name",
    },
    input: {
      type: "string",
      alias: "i",
      description: "OpenAPI document path or URL (without a config file)",
    },
    type: {
      type: "string",
      alias: "t",
      description: "Target type: typescript, python or go",
    },
    out: {
      type: "string",
      alias: "o",
      description: "Output directory",
    },
    "package-name": {
      type: "string",
      description: "Package name of the generated client",
    },
    name: {
      type: "string",
      description: "Client name",
    },
    "include-tags": {
      type: "string",
      description: "Comma-separated tag patterns to include",
    },
    "exclude-tags": {
      type: "string",
      description: "Comma-separated tag patterns to exclude",
    },
    "env-file": {
      type: "string",
      description: "Path to env file (can be specified multiple times)",
    },
    "no-dotenv": {
      type: "boolean",
      description: "Disable automatic .env file loading",
      default: false,
    },
    quiet: {
      type: "boolean",
      alias: "q",
      description: "Only print warnings and errors",
      default: false,
    },
  },
  async run({ args }) {
    try {
      const logger = createConsolaLogger({ quiet: args.quiet });
      logger.start("Loading configuration...");
      const config = await resolveGenerateConfig(args, process.cwd(), logger);
      await generate({ config, onlyClient: args.client, logger });
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
