import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  configFromOptions,
  defineConfig,
  generateDefaultConfig,
  loadSdkloomConfig,
  parseConfig,
  resolveConfigPaths,
  shouldExcludeFile,
} from "./config";

const minimalConfig = {
  spec: "./openapi.yaml",
  clients: [
    {
      name: "api",
      type: "typescript",
      outDir: "./out",
      packageName: "api-client",
    },
  ],
};

describe("defineConfig", () => {
  it("returns the config unchanged", () => {
    const config = defineConfig({
      spec: "./openapi.yaml",
      clients: [
        {
          name: "api",
          type: "go",
          outDir: "./out",
          packageName: "github.com/acme/api",
        },
      ],
    });
    expect(config.clients[0]?.type).toBe("go");
  });
});

describe("parseConfig", () => {
  it("applies defaults", () => {
    const config = parseConfig(minimalConfig, "test");

    expect(config.wordSplit).toBe("acronym");
    expect(config.strict).toBe(false);
    expect(config.clients[0]).toEqual({
      name: "api",
      type: "typescript",
      outDir: "./out",
      packageName: "api-client",
      includeTags: [],
      excludeTags: [],
      exclude: [],
    });
  });

  it("lists every issue with its path", () => {
    expect(() =>
      parseConfig(
        {
          spec: "",
          clients: [{ ...minimalConfig.clients[0], name: "Bad Name" }],
        },
        "sdkloom.config.ts",
      ),
    ).toThrow(
      [
        "Invalid configuration in sdkloom.config.ts:",
        "  - spec: OpenAPI spec path or URL is required",
        "  - clients.0.name: Client name must be lowercase alphanumeric with hyphens, starting with a letter",
      ].join("\n"),
    );
  });

  it("requires at least one client", () => {
    expect(() =>
      parseConfig({ spec: "./openapi.yaml", clients: [] }, "test"),
    ).toThrow("  - clients: At least one client is required");
  });

  it("requires unique client names", () => {
    expect(() =>
      parseConfig(
        {
          spec: "./openapi.yaml",
          clients: [minimalConfig.clients[0], minimalConfig.clients[0]],
        },
        "test",
      ),
    ).toThrow("  - clients: Client names must be unique");
  });

  it("rejects unknown target types", () => {
    expect(() =>
      parseConfig(
        {
          spec: "./openapi.yaml",
          clients: [{ ...minimalConfig.clients[0], type: "rust" }],
        },
        "test",
      ),
    ).toThrow(
      '  - clients.0.type: Unsupported target type "rust". Available types: typescript, python, go',
    );
  });

  it("asks for a missing target type", () => {
    expect(() =>
      parseConfig(
        {
          spec: "./openapi.yaml",
          clients: [{ name: "api", outDir: "./out", packageName: "api-client" }],
        },
        "test",
      ),
    ).toThrow("  - clients.0.type: Target type is required");
  });

  it("rejects empty commands", () => {
    expect(() =>
      parseConfig(
        {
          spec: "./openapi.yaml",
          clients: [{ ...minimalConfig.clients[0], postCommand: [] }],
        },
        "test",
      ),
    ).toThrow("  - clients.0.postCommand: Command must name an executable");
  });
});

describe("resolveConfigPaths", () => {
  it("resolves local specs and output directories", () => {
    const config = resolveConfigPaths(
      parseConfig(minimalConfig, "test"),
      "/work",
    );

    expect(config.spec).toBe(resolve("/work", "openapi.yaml"));
    expect(config.clients[0]?.outDir).toBe(resolve("/work", "out"));
  });

  it("leaves remote specs alone", () => {
    const config = resolveConfigPaths(
      parseConfig(
        { ...minimalConfig, spec: "https://api.example.com/openapi.json" },
        "test",
      ),
      "/work",
    );

    expect(config.spec).toBe("https://api.example.com/openapi.json");
  });
});

describe("configFromOptions", () => {
  it("builds a single-client config", () => {
    const config = configFromOptions(
      {
        spec: "openapi.yaml",
        type: "python",
        outDir: "sdk",
        packageName: "api_client",
        name: "api",
        excludeTags: ["internal"],
      },
      "/work",
    );

    expect(config.spec).toBe(resolve("/work", "openapi.yaml"));
    expect(config.clients).toEqual([
      {
        name: "api",
        type: "python",
        outDir: resolve("/work", "sdk"),
        packageName: "api_client",
        includeTags: [],
        excludeTags: ["internal"],
        exclude: [],
      },
    ]);
  });

  it("requires every identifying flag", () => {
    expect(() =>
      configFromOptions({ spec: "openapi.yaml", type: "go", outDir: "sdk" }),
    ).toThrow(
      "Either --config or all of --input, --type, --out, --package-name, --name must be provided",
    );
  });

  it("validates the flags like a config file", () => {
    expect(() =>
      configFromOptions({
        spec: "openapi.yaml",
        type: "rust",
        outDir: "sdk",
        packageName: "api",
        name: "api",
      }),
    ).toThrow("Invalid configuration in command line options:");
  });
});

describe("shouldExcludeFile", () => {
  const client = {
    outDir: "/work/sdk",
    exclude: ["package.json", "src/", "docs"],
  };

  it("matches exact relative paths", () => {
    expect(shouldExcludeFile(client, "package.json")).toBe(true);
    expect(shouldExcludeFile(client, "/work/sdk/package.json")).toBe(true);
    expect(shouldExcludeFile(client, "models.ts")).toBe(false);
  });

  it("matches everything under an excluded directory", () => {
    expect(shouldExcludeFile(client, "src/client.ts")).toBe(true);
    expect(shouldExcludeFile(client, "/work/sdk/docs/index.md")).toBe(true);
    expect(shouldExcludeFile(client, "srcs/client.ts")).toBe(false);
  });

  it("ignores files outside the output directory", () => {
    expect(shouldExcludeFile(client, "/work/package.json")).toBe(false);
  });

  it("excludes nothing without patterns", () => {
    expect(
      shouldExcludeFile({ outDir: "/work/sdk", exclude: [] }, "package.json"),
    ).toBe(false);
  });
});

describe("loadSdkloomConfig", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "sdkloom-config-test-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("loads, validates and resolves a config file", async () => {
    const configPath = join(testDir, "sdkloom.config.json");
    await writeFile(configPath, JSON.stringify(minimalConfig));

    const { config, configPath: loadedFrom } = await loadSdkloomConfig({
      configPath,
      dotenv: false,
    });

    expect(loadedFrom).toBe(configPath);
    expect(config.spec).toBe(join(testDir, "openapi.yaml"));
    expect(config.clients[0]?.outDir).toBe(join(testDir, "out"));
  });

  it("reports invalid config files with their path", async () => {
    const configPath = join(testDir, "sdkloom.config.json");
    await writeFile(configPath, JSON.stringify({ spec: "./openapi.yaml" }));

    await expect(
      loadSdkloomConfig({ configPath, dotenv: false }),
    ).rejects.toThrow(`Invalid configuration in ${configPath}:`);
  });

  it("fails when no config exists", async () => {
    await expect(
      loadSdkloomConfig({ cwd: testDir, dotenv: false }),
    ).rejects.toThrow("No configuration found.");
  });
});

describe("generateDefaultConfig", () => {
  it("produces a config that imports defineConfig", () => {
    const content = generateDefaultConfig();
    expect(content).toContain('import { defineConfig } from "sdkloom"');
    expect(content).toContain('type: "typescript"');
  });
});
