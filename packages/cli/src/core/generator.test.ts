import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createRecordingLogger, createSilentLogger } from "@/utils/logger";
import { runCommand } from "./commands";
import { parseConfig } from "./config";
import { generate } from "./generator";

import type { IRDocument } from "@/emitters";
import type { SdkloomConfigInput } from "./config";

vi.mock("./commands", () => ({
  runCommand: vi.fn(async () => {}),
}));

const PETSTORE = resolve("src/test/fixtures/openapi/petstore.yaml");

describe("generate", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "sdkloom-generate-test-"));
    vi.mocked(runCommand).mockClear();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function configFor(
    client: Partial<SdkloomConfigInput["clients"][number]> = {},
    overrides: Partial<SdkloomConfigInput> = {},
  ) {
    return parseConfig(
      {
        spec: PETSTORE,
        clients: [
          {
            name: "pets",
            type: "typescript",
            outDir: join(testDir, "pets"),
            packageName: "pets-client",
            excludeTags: ["internal"],
            ...client,
          },
        ],
        ...overrides,
      },
      "test",
    );
  }

  it("writes the derived IR and models for a client", async () => {
    const result = await generate({
      config: configFor(),
      logger: createSilentLogger(),
    });

    expect(result.clients).toHaveLength(1);
    expect(result.clients[0]).toMatchObject({
      name: "pets",
      type: "typescript",
      files: ["ir.json", "models.ts", "services.ts"],
      skipped: [],
      operations: 5,
      models: 4,
    });

    const document: IRDocument = JSON.parse(
      await readFile(join(testDir, "pets", "ir.json"), "utf-8"),
    );
    expect(document.client).toBe("pets");
    expect(document.packageName).toBe("pets-client");
    expect(document.modelDefs.map((m) => m.name)).toEqual([
      "NewPet",
      "Pet_Owner",
      "Pet_Status",
      "Pet",
    ]);
    expect(document.services.map((s) => s.tag)).toEqual(["misc", "pets"]);
    expect(
      document.services[1]?.operations.map((op) => [
        op.method,
        op.path,
        op.methodName,
      ]),
    ).toEqual([
      ["GET", "/pets", "list"],
      ["POST", "/pets", "create"],
      ["DELETE", "/pets/{petId}", "delete"],
      ["GET", "/pets/{petId}", "get"],
    ]);
    expect(document.services[0]?.operations[0]?.methodName).toBe("health");

    const models = await readFile(join(testDir, "pets", "models.ts"), "utf-8");
    expect(models).toContain("export interface Pet {");
    expect(models).not.toContain("Stats");

    const services = await readFile(
      join(testDir, "pets", "services.ts"),
      "utf-8",
    );
    expect(services).toContain("export interface PetsService {");
    expect(services).toContain("export interface MiscService {");
  });

  it("only generates the selected client", async () => {
    const config = parseConfig(
      {
        spec: PETSTORE,
        clients: [
          {
            name: "ts",
            type: "typescript",
            outDir: join(testDir, "ts"),
            packageName: "pets-client",
          },
          {
            name: "py",
            type: "python",
            outDir: join(testDir, "py"),
            packageName: "pets_client",
          },
        ],
      },
      "test",
    );

    const result = await generate({
      config,
      onlyClient: "py",
      logger: createSilentLogger(),
    });

    expect(result.clients.map((c) => c.name)).toEqual(["py"]);
    expect(existsSync(join(testDir, "py", "models.py"))).toBe(true);
    expect(existsSync(join(testDir, "ts"))).toBe(false);
  });

  it("rejects an unknown client name", async () => {
    await expect(
      generate({
        config: configFor(),
        onlyClient: "missing",
        logger: createSilentLogger(),
      }),
    ).rejects.toThrow('Client "missing" not found. Available clients: pets');
  });

  it("checks tag patterns before writing anything", async () => {
    await expect(
      generate({
        config: configFor({ excludeTags: ["("] }),
        logger: createSilentLogger(),
      }),
    ).rejects.toThrow('Client "pets": invalid excludeTags pattern "("');

    expect(existsSync(join(testDir, "pets"))).toBe(false);
  });

  it("skips excluded files", async () => {
    const result = await generate({
      config: configFor({ exclude: ["ir.json"] }),
      logger: createSilentLogger(),
    });

    expect(result.clients[0]?.files).toEqual(["models.ts", "services.ts"]);
    expect(result.clients[0]?.skipped).toEqual(["ir.json"]);
    expect(existsSync(join(testDir, "pets", "ir.json"))).toBe(false);
  });

  it("runs the command hooks in the output directory", async () => {
    await generate({
      config: configFor({
        preCommand: ["make", "clean"],
        postCommand: ["npx", "prettier", "--write", "."],
      }),
      logger: createSilentLogger(),
    });

    const outDir = join(testDir, "pets");
    expect(vi.mocked(runCommand).mock.calls).toEqual([
      [["make", "clean"], outDir, "preCommand"],
      [["npx", "prettier", "--write", "."], outDir, "postCommand"],
    ]);
  });

  describe("warnings", () => {
    let specPath: string;

    beforeEach(async () => {
      specPath = join(testDir, "collision.json");
      await writeFile(
        specPath,
        JSON.stringify({
          openapi: "3.0.3",
          info: { title: "Collision", version: "1.0.0" },
          paths: {},
          components: {
            schemas: {
              Pet: {
                type: "object",
                properties: {
                  Owner: {
                    type: "object",
                    properties: { id: { type: "string" } },
                  },
                  owner: {
                    type: "object",
                    properties: { email: { type: "string" } },
                  },
                },
              },
            },
          },
        }),
      );
    });

    it("logs build warnings", async () => {
      const logger = createRecordingLogger();

      await generate({
        config: configFor({}, { spec: specPath }),
        logger,
      });

      expect(logger.entries[0]).toEqual({
        level: "start",
        message: `Loading OpenAPI document: ${specPath}`,
      });
      expect(logger.messages("warn")).toEqual([
        'Schema: Synthetic model name "Pet_Owner" is already used by a different shape; using "Pet_Owner_2"',
      ]);
    });

    it("fails on build warnings in strict mode", async () => {
      await expect(
        generate({
          config: configFor({}, { spec: specPath, strict: true }),
          logger: createSilentLogger(),
        }),
      ).rejects.toThrow(
        [
          "Schema produced 1 warning(s) in strict mode:",
          '  - Synthetic model name "Pet_Owner" is already used by a different shape; using "Pet_Owner_2"',
        ].join("\n"),
      );

      expect(existsSync(join(testDir, "pets"))).toBe(false);
    });
  });
});
