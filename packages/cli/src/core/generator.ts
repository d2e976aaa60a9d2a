import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, relative } from "node:path";

import { loadOpenAPIDocument } from "@/adapters/openapi/schema";
import { getEmitter } from "@/emitters";
import { buildIR, compileTagFilters, deriveIR } from "@/ir";
import { defaultLogger } from "@/utils/logger";
import { createNamingEngine } from "@/utils/naming";
import { runCommand } from "./commands";
import { shouldExcludeFile } from "./config";

import type { Emitter } from "@/emitters";
import type { TagFilters } from "@/ir";
import type { SdkLogger } from "@/utils/logger";
import type { ClientConfig, SdkloomConfig } from "./config";

export interface GenerateOptions {
  /** Validated config with absolute paths */
  config: SdkloomConfig;
  /** Only generate the client with this name */
  onlyClient?: string;
  /** Logger for progress and warnings (default: consola) */
  logger?: SdkLogger;
}

/**
 * What was generated for one client
 */
export interface GeneratedClientInfo {
  name: string;
  type: string;
  outDir: string;
  /** Paths relative to outDir that were written */
  files: string[];
  /** Paths relative to outDir skipped by `exclude` */
  skipped: string[];
  operations: number;
  models: number;
  warnings: string[];
}

export interface GenerateResult {
  clients: GeneratedClientInfo[];
  /** Warnings from building the full IR */
  warnings: string[];
}

interface PreparedClient {
  client: ClientConfig;
  emitter: Emitter;
  filters: TagFilters;
}

/**
 * Pick the clients to generate and check each one before anything is loaded
 * or written: the target needs an emitter and the tag patterns must compile.
 */
function prepareClients(
  config: SdkloomConfig,
  onlyClient: string | undefined,
): PreparedClient[] {
  const selected = onlyClient
    ? config.clients.filter((client) => client.name === onlyClient)
    : config.clients;

  if (onlyClient && selected.length === 0) {
    const available = config.clients.map((client) => client.name).join(", ");
    throw new Error(
      `Client "${onlyClient}" not found. Available clients: ${available}`,
    );
  }

  return selected.map((client) => {
    try {
      return {
        client,
        emitter: getEmitter(client.type),
        filters: compileTagFilters(client.includeTags, client.excludeTags),
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Client "${client.name}": ${reason}`);
    }
  });
}

function reportWarnings(
  warnings: string[],
  strict: boolean,
  scope: string,
  logger: SdkLogger,
): void {
  if (warnings.length === 0) return;
  if (strict) {
    throw new Error(
      `${scope} produced ${warnings.length} warning(s) in strict mode:\n${warnings
        .map((w) => `  - ${w}`)
        .join("\n")}`,
    );
  }
  for (const warning of warnings) {
    logger.warn(`${scope}: ${warning}`);
  }
}

/**
 * Main generation function
 *
 * Loads the document once, builds the full IR, then for every client:
 * pre-command, derive, emit, write, post-command.
 */
export async function generate(
  options: GenerateOptions,
): Promise<GenerateResult> {
  const { config, onlyClient, logger = defaultLogger } = options;

  const prepared = prepareClients(config, onlyClient);

  logger.start(`Loading OpenAPI document: ${config.spec}`);
  const document = await loadOpenAPIDocument(config.spec, {
    headers: config.headers,
  });
  logger.success(`Loaded ${document.info.title} ${document.info.version}`);

  const naming = createNamingEngine(config.wordSplit);
  const { ir: full, warnings: buildWarnings } = buildIR(document, { naming });
  reportWarnings(buildWarnings, config.strict, "Schema", logger);

  const clients: GeneratedClientInfo[] = [];

  for (const { client, emitter, filters } of prepared) {
    logger.info(`Generating ${client.type} client: ${client.name}`);
    await mkdir(client.outDir, { recursive: true });

    if (client.preCommand) {
      await runCommand(client.preCommand, client.outDir, "preCommand");
    }

    const derived = deriveIR(full, filters);
    reportWarnings(
      derived.warnings,
      config.strict,
      `Client "${client.name}"`,
      logger,
    );

    const { files, warnings } = emitter.emit(derived.ir, {
      clientName: client.name,
      packageName: client.packageName,
      moduleName: client.moduleName,
      operationIdParser: client.operationIdParser,
      naming,
    });
    const emitWarnings = warnings.filter(
      (warning) => !derived.warnings.includes(warning),
    );
    for (const warning of emitWarnings) {
      logger.warn(`Client "${client.name}": ${warning}`);
    }

    const written: string[] = [];
    const skipped: string[] = [];
    for (const file of files) {
      const target = join(client.outDir, file.filename);
      const rel = relative(client.outDir, target);
      if (shouldExcludeFile(client, target)) {
        skipped.push(rel);
        continue;
      }
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, file.content, "utf-8");
      written.push(rel);
    }

    if (client.postCommand) {
      await runCommand(client.postCommand, client.outDir, "postCommand");
    }

    const operations = derived.ir.services.reduce(
      (count, service) => count + service.operations.length,
      0,
    );
    logger.success(
      `Generated ${client.name}: ${written.join(", ")} (${operations} operations, ${derived.ir.modelDefs.length} models)`,
    );

    clients.push({
      name: client.name,
      type: client.type,
      outDir: client.outDir,
      files: written,
      skipped,
      operations,
      models: derived.ir.modelDefs.length,
      warnings: [...derived.warnings, ...emitWarnings],
    });
  }

  logger.box({
    title: "Generation Complete",
    message: clients
      .map((info) => `${info.name} (${info.type}) -> ${info.outDir}`)
      .join("\n"),
  });

  return { clients, warnings: buildWarnings };
}
