/**
 * Method name resolution for operations
 *
 * An optional external parser gets the first say; otherwise names come from
 * the operationId, and operations without one fall back to REST heuristics.
 */

import { spawnSync } from "node:child_process";

import { createNamingEngine } from "./naming";

import type { OperationIR } from "@/ir/types";
import type { NamingEngine } from "./naming";

const CONTROLLER_MARKER = "Controller_";
const PARSER_TIMEOUT_MS = 10_000;

export interface MethodNameOptions {
  /** Executable run as `<parser> <operationId> <METHOD> <path>` */
  operationIdParser?: string;
  naming?: NamingEngine;
}

/**
 * Resolve the camelCase method name for an operation
 */
export function resolveMethodName(
  op: OperationIR,
  options: MethodNameOptions = {},
): string {
  const naming = options.naming ?? createNamingEngine();

  if (options.operationIdParser) {
    const parsed = runOperationIdParser(options.operationIdParser, op);
    if (parsed) return naming.toCamelCase(parsed);
  }

  const fromId = parseOperationId(op.operationId);
  if (fromId !== "") return naming.toCamelCase(fromId);

  return deriveMethodName(op);
}

/**
 * Strip everything up to and including `Controller_`, else keep the id as is
 */
export function parseOperationId(operationId: string): string {
  const index = operationId.indexOf(CONTROLLER_MARKER);
  return index === -1
    ? operationId
    : operationId.slice(index + CONTROLLER_MARKER.length);
}

/**
 * REST heuristics for operations without an operationId
 *
 * - GET /brands -> list
 * - GET /brands/{id} -> retrieve
 * - POST /brands -> create
 * - PUT|PATCH /brands/{id} -> update
 * - DELETE /brands/{id} -> delete
 */
export function deriveMethodName(op: OperationIR): string {
  const hasPathParam = /\{[^}]+\}/.test(op.path);

  switch (op.method.toUpperCase()) {
    case "GET":
      return hasPathParam ? "retrieve" : "list";
    case "POST":
      return "create";
    case "PUT":
    case "PATCH":
      return "update";
    case "DELETE":
      return "delete";
    default:
      return op.method.toLowerCase();
  }
}

/**
 * Trimmed stdout of the parser, or undefined when it fails, exits non-zero
 * or prints nothing
 */
function runOperationIdParser(
  parser: string,
  op: OperationIR,
): string | undefined {
  const result = spawnSync(parser, [op.operationId, op.method, op.path], {
    encoding: "utf8",
    timeout: PARSER_TIMEOUT_MS,
  });
  if (result.error || result.status !== 0) return undefined;

  const name = result.stdout.trim();
  return name === "" ? undefined : name;
}
