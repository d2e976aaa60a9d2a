/**
 * OpenAPI document loading and validation
 */

import SwaggerParser from "@apidevtools/swagger-parser";

import { hoistBundledSchemas } from "./bundle";

import type { OpenAPI, OpenAPIV3, OpenAPIV3_1 } from "openapi-types";

export type OpenAPIDocument = OpenAPIV3.Document | OpenAPIV3_1.Document;

export interface LoadDocumentOptions {
  /** Headers to send when fetching a remote document */
  headers?: Record<string, string>;
}

/**
 * Check if a spec path is a URL
 */
export function isUrl(spec: string): boolean {
  return spec.startsWith("http://") || spec.startsWith("https://");
}

function isOpenAPI3(document: OpenAPI.Document): document is OpenAPIDocument {
  return "openapi" in document && typeof document.openapi === "string";
}

/**
 * Load, validate and bundle an OpenAPI 3.x document.
 *
 * External files are bundled in and their schemas hoisted into
 * `components.schemas`; internal `$ref`s are kept so schema names survive
 * into the IR. Validation runs on a copy because the parser dereferences
 * what it validates.
 */
export async function loadOpenAPIDocument(
  spec: string,
  options: LoadDocumentOptions = {},
): Promise<OpenAPIDocument> {
  // SwaggerParser handles both URLs and file paths
  const parserOptions: SwaggerParser.Options = {};
  if (isUrl(spec) && options.headers) {
    parserOptions.resolve = {
      http: {
        headers: options.headers,
      },
    };
  }

  const parser = new SwaggerParser();
  let document: OpenAPI.Document;
  try {
    document = await parser.bundle(spec, parserOptions);
  } catch (error) {
    throw new Error(
      `Failed to load OpenAPI document "${spec}": ${errorMessage(error)}`,
    );
  }

  if (!isOpenAPI3(document)) {
    throw new Error(
      `Unsupported document "${spec}": only OpenAPI 3.x is supported (found Swagger 2.0)`,
    );
  }

  hoistBundledSchemas(document, externalSources(parser, document));

  try {
    await SwaggerParser.validate(structuredClone(document), parserOptions);
  } catch (error) {
    throw new Error(
      `Invalid OpenAPI document "${spec}": ${errorMessage(error)}`,
    );
  }

  return document;
}

/**
 * Parsed files the bundler resolved, other than the root document
 */
function externalSources(
  parser: SwaggerParser,
  document: OpenAPI.Document,
): Record<string, unknown> {
  const sources: Record<string, unknown> = {};
  for (const [path, value] of Object.entries(parser.$refs.values())) {
    if (value !== document) sources[path] = value;
  }
  return sources;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
