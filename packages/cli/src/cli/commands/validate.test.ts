import { describe, expect, it } from "vitest";

import { validateDocument } from "./validate";

describe("validateDocument", () => {
  it("summarizes the full IR of a document", async () => {
    const summary = await validateDocument(
      "src/test/fixtures/openapi/petstore.yaml",
    );

    expect(summary).toEqual({
      title: "Petstore",
      version: "1.0.0",
      services: 3,
      operations: 6,
      models: 5,
      warnings: [],
    });
  });

  it("rejects invalid documents", async () => {
    await expect(
      validateDocument("src/test/fixtures/openapi/invalid.yaml"),
    ).rejects.toThrow("Invalid OpenAPI document");
  });
});
