import { dirname, isAbsolute, relative, resolve, sep } from "node:path";

import { loadConfig } from "c12";
import * as z from "zod";

import { isUrl } from "@/adapters/openapi/schema";
import { wordSplitPolicies } from "@/utils/naming";

import type { DotenvOptions } from "c12";

/**
 * Options for loading the sdkloom config
 */
export interface LoadConfigOptions {
  /** Path to the config file */
  configPath?: string;
  /** Directory to search for a config file (default: process.cwd()) */
  cwd?: string;
  /** Dotenv configuration - true to load .env, false to disable, or DotenvOptions object */
  dotenv?: boolean | DotenvOptions;
}

/**
 * Result of loading the sdkloom config
 */
export interface LoadConfigResult {
  /** The validated configuration, with local paths made absolute */
  config: SdkloomConfig;
  /** The resolved path to the config file */
  configPath: string;
}

// =============================================================================
// Client Schema
// =============================================================================

/**
 * Target types with a built-in emitter
 */
export const targetTypes = ["typescript", "python", "go"] as const;

export const targetTypeSchema = z.enum(targetTypes, {
  error: (issue) =>
    issue.input === undefined
      ? "Target type is required"
      : `Unsupported target type ${JSON.stringify(issue.input)}. Available types: ${targetTypes.join(", ")}`,
});

export type TargetType = z.infer<typeof targetTypeSchema>;

/**
 * Command in array form, e.g. ["gofmt", "-w", "."]
 */
const commandSchema = z
  .array(z.string().min(1))
  .min(1, "Command must name an executable");

/**
 * Name pattern for clients - lowercase alphanumeric with hyphens
 */
const clientNameSchema = z
  .string()
  .min(1, "Client name is required")
  .regex(
    /^[a-z][a-z0-9-]*$/,
    "Client name must be lowercase alphanumeric with hyphens, starting with a letter",
  );

/**
 * One generated client
 */
export const clientSchema = z.object({
  /** Unique name for this client (used by --client) */
  name: clientNameSchema,
  /** Target language */
  type: targetTypeSchema,
  /** Output directory, relative to the config file */
  outDir: z.string().min(1, "Output directory is required"),
  /** Package name of the generated client */
  packageName: z.string().min(1, "Package name is required"),
  /** Module name (Go package clause, defaults to the last packageName segment) */
  moduleName: z.string().optional(),
  /** Regex patterns; operations with a matching tag are kept */
  includeTags: z.array(z.string()).default([]),
  /** Regex patterns; operations with a matching tag are dropped */
  excludeTags: z.array(z.string()).default([]),
  /** Executable run as `<parser> <operationId> <METHOD> <path>` */
  operationIdParser: z.string().optional(),
  /** Command run in outDir before any file is written */
  preCommand: commandSchema.optional(),
  /** Command run in outDir after every file is written */
  postCommand: commandSchema.optional(),
  /** Paths relative to outDir that are never written (a directory excludes everything under it) */
  exclude: z.array(z.string()).default([]),
});

export type ClientConfig = z.output<typeof clientSchema>;

// =============================================================================
// Main Config Schema
// =============================================================================

/**
 * Main sdkloom configuration schema
 */
export const sdkloomConfigSchema = z.object({
  /** OpenAPI document path or URL */
  spec: z.string().min(1, "OpenAPI spec path or URL is required"),
  /** Display name of the API */
  name: z.string().optional(),
  /** Headers to send when fetching a remote spec */
  headers: z.record(z.string(), z.string()).optional(),
  /** Word split policy for every derived name */
  wordSplit: z.enum(wordSplitPolicies).default("acronym"),
  /** Treat build and derivation warnings as errors */
  strict: z.boolean().default(false),
  /** Clients to generate */
  clients: z
    .array(clientSchema)
    .min(1, "At least one client is required")
    .refine(
      (clients) => new Set(clients.map((c) => c.name)).size === clients.length,
      "Client names must be unique",
    ),
});

/**
 * The normalized configuration type used internally (after parsing)
 */
export type SdkloomConfig = z.output<typeof sdkloomConfigSchema>;

/**
 * Input configuration type (before defaults applied)
 */
export type SdkloomConfigInput = z.input<typeof sdkloomConfigSchema>;

/**
 * Config schema for validation
 */
export const configSchema = sdkloomConfigSchema;

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Helper for defining a typed config
 */
export function defineConfig(config: SdkloomConfigInput): SdkloomConfigInput {
  return config;
}

/**
 * Validate a raw config, throwing one message that lists every issue
 */
export function parseConfig(raw: unknown, source: string): SdkloomConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid configuration in ${source}:\n${errors}`);
  }
  return result.data;
}

/**
 * Make the spec path and every outDir absolute against `baseDir`.
 * Remote specs are left as they are.
 */
export function resolveConfigPaths(
  config: SdkloomConfig,
  baseDir: string,
): SdkloomConfig {
  return {
    ...config,
    spec: isUrl(config.spec) ? config.spec : resolve(baseDir, config.spec),
    clients: config.clients.map((client) => ({
      ...client,
      outDir: resolve(baseDir, client.outDir),
    })),
  };
}

/**
 * Load and validate the sdkloom config file
 */
export async function loadSdkloomConfig(
  options: LoadConfigOptions = {},
): Promise<LoadConfigResult> {
  const explicitFile = options.configPath
    ? resolve(options.cwd ?? process.cwd(), options.configPath)
    : undefined;
  // If a config path is provided, use its directory as cwd for dotenv resolution
  const cwd = explicitFile ? dirname(explicitFile) : options.cwd;

  const { config, configFile } = await loadConfig<SdkloomConfigInput>({
    name: "sdkloom",
    cwd,
    configFile: explicitFile,
    rcFile: false,
    globalRc: false,
    dotenv: options.dotenv ?? true,
  });

  if (!config || Object.keys(config).length === 0 || !configFile) {
    throw new Error(
      `No configuration found. Run 'sdkloom init' to create a config file, or specify a config file with --config.`,
    );
  }

  const parsed = parseConfig(config, configFile);

  return {
    config: resolveConfigPaths(parsed, dirname(configFile)),
    configPath: configFile,
  };
}

// =============================================================================
// CLI Fallback
// =============================================================================

/**
 * Single-client options given as CLI flags instead of a config file
 */
export interface FallbackOptions {
  spec?: string;
  type?: string;
  outDir?: string;
  packageName?: string;
  name?: string;
  includeTags?: string[];
  excludeTags?: string[];
}

/**
 * Build a config from CLI flags. Every flag but the tag filters is required.
 */
export function configFromOptions(
  options: FallbackOptions,
  cwd: string = process.cwd(),
): SdkloomConfig {
  const { spec, type, outDir, packageName, name } = options;
  if (!spec || !type || !outDir || !packageName || !name) {
    throw new Error(
      "Either --config or all of --input, --type, --out, --package-name, --name must be provided",
    );
  }

  const parsed = parseConfig(
    {
      spec,
      clients: [
        {
          name,
          type,
          outDir,
          packageName,
          includeTags: options.includeTags ?? [],
          excludeTags: options.excludeTags ?? [],
        },
      ],
    },
    "command line options",
  );
  return resolveConfigPaths(parsed, cwd);
}

/**
 * Check whether a file under a client's outDir is excluded from writing.
 * `targetPath` may be absolute or relative to outDir.
 */
export function shouldExcludeFile(
  client: Pick<ClientConfig, "outDir" | "exclude">,
  targetPath: string,
): boolean {
  if (client.exclude.length === 0) return false;

  const absolute = isAbsolute(targetPath)
    ? targetPath
    : resolve(client.outDir, targetPath);
  const rel = relative(client.outDir, absolute).split(sep).join("/");
  if (rel.startsWith("..")) return false;

  return client.exclude.some((pattern) => {
    const normalized = pattern.split("\\").join("/").replace(/\/+$/, "");
    if (normalized === "") return false;
    return rel === normalized || rel.startsWith(`${normalized}/`);
  });
}

// =============================================================================
// Default Config Generator
// =============================================================================

/**
 * Generate a config file content
 */
export function generateDefaultConfig(): string {
  return `import { defineConfig } from "sdkloom"

export default defineConfig({
	spec: "./openapi.yaml",
	// headers: { authorization: \`Bearer \${process.env.API_TOKEN}\` },
	clients: [
		{
			name: "api",
			type: "typescript",
			outDir: "./src/generated/api",
			packageName: "api-client",
			// includeTags: ["^public"],
			// excludeTags: ["internal"],
			// postCommand: ["npx", "prettier", "--write", "."],
		},
	],
})
`;
}
