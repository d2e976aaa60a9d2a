import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";

import { defineCommand } from "citty";
import consola from "consola";

import { generateDefaultConfig } from "@/core/config";

export const CONFIG_FILENAME = "sdkloom.config.ts";

/**
 * Write the default config into `cwd`
 * @returns the config path
 * @throws Error if a config exists and `force` is not set
 */
export async function writeDefaultConfig(
  cwd: string,
  force = false,
): Promise<string> {
  const configPath = join(cwd, CONFIG_FILENAME);

  if (existsSync(configPath) && !force) {
    throw new Error(
      `Config file already exists at ${configPath}. Use --force to overwrite.`,
    );
  }

  await writeFile(configPath, generateDefaultConfig(), "utf-8");
  return configPath;
}

export const initCommand = defineCommand({
  meta: {
    name: "init",
    description: "Initialize an sdkloom configuration file",
  },
  args: {
    force: {
      type: "boolean",
      alias: "f",
      description: "Overwrite existing config file",
      default: false,
    },
  },
  async run({ args }) {
    try {
      await writeDefaultConfig(process.cwd(), args.force);
    } catch (error) {
      consola.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }

    consola.success(`Created ${CONFIG_FILENAME}`);
    consola.info("Next steps:");
    consola.info(`  1. Point spec at your OpenAPI document in ${CONFIG_FILENAME}`);
    consola.info("  2. Run `sdkloom generate` to generate your clients");
  },
});
