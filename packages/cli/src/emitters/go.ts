/**
 * Go emitter
 *
 * Writes `ir.json`, a `models.go` with one named type per model and, when the
 * IR has operations, a `services.go` with one interface per tag. Go has no
 * unions or literal types, so those arrive here already approximated.
 * Columns are aligned the way gofmt aligns them.
 */

import { goVocabulary } from "@/projection/vocabularies";
import { createWriter, writeHeader, writeSectionComment } from "@/utils/writer";
import {
  assignTypeNames,
  claimName,
  describeMethod,
  irFile,
  projectModels,
  projectServices,
  toIRDocument,
  uniqueWarnings,
} from "./shared";

import type CodeBlockWriter from "code-block-writer";
import type { EnumBaseKind } from "@/ir/types";
import type { ScalarKind, TypeExpr } from "@/projection/types";
import type { NamingEngine } from "@/utils/naming";
import type { MethodShape, ModelShape, ServiceShape } from "./shared";
import type { Emitter, GeneratedFile } from "./types";

export const GO_MODELS_FILENAME = "models.go";
export const GO_SERVICES_FILENAME = "services.go";

const GO_KEYWORDS = new Set([
  "break",
  "case",
  "chan",
  "const",
  "continue",
  "default",
  "defer",
  "else",
  "fallthrough",
  "for",
  "func",
  "go",
  "goto",
  "if",
  "import",
  "interface",
  "map",
  "package",
  "range",
  "return",
  "select",
  "struct",
  "switch",
  "type",
  "var",
]);

export const goEmitter: Emitter = {
  type: "go",
  vocabulary: goVocabulary,

  emit(ir, options) {
    const warnings: string[] = [];
    const models = projectModels(ir, this.vocabulary, warnings);
    const names = goTypeNames(
      models.map((model) => model.name),
      options.naming,
    );
    const ctx: GoContext = { names, naming: options.naming, warnings };

    const packageClause = `package ${goPackageName(
      options.moduleName ?? options.packageName,
    )}`;

    const writer = createWriter({ useTabs: true });
    writeHeader(writer, "line");
    writer.writeLine(packageClause);

    if (models.length > 0) {
      writer.blankLine();
      writeSectionComment(writer, "Models");
      models.forEach((model, index) => {
        if (index > 0) writer.blankLine();
        writeModel(writer, model, ctx);
      });
    }

    const document = toIRDocument(ir, this.type, options);
    const services = projectServices(document, this.vocabulary, {
      knownModels: new Set(names.keys()),
      warnings,
    });

    const files: GeneratedFile[] = [
      irFile(document),
      { filename: GO_MODELS_FILENAME, content: writer.toString() },
    ];
    if (services.length > 0) {
      files.push({
        filename: GO_SERVICES_FILENAME,
        content: renderServices(services, packageClause, ctx),
      });
    }

    return { files, warnings: uniqueWarnings(warnings) };
  },
};

interface GoContext {
  /** Model name -> exported Go type name */
  names: Map<string, string>;
  naming: NamingEngine;
  warnings: string[];
}

// ============================================================================
// Names
// ============================================================================

/**
 * Package clause from a module path or package name
 * e.g., "github.com/acme/pet-store" -> "petstore"
 */
export function goPackageName(packageName: string): string {
  const last = packageName.split("/").filter(Boolean).pop() ?? "";
  const cleaned = last.toLowerCase().replace(/[^a-z0-9]/g, "");
  if (cleaned === "") return "models";
  return /^[0-9]/.test(cleaned) ? `pkg${cleaned}` : cleaned;
}

/**
 * Exported Go identifier for an arbitrary name
 */
export function goIdentifier(name: string, naming: NamingEngine): string {
  const pascal = naming.toPascalCase(name);
  if (pascal === "") return "Field";
  return /^[0-9]/.test(pascal) ? `Field${pascal}` : pascal;
}

/**
 * Assign each model a unique exported type name, in registry order
 */
export function goTypeNames(
  modelNames: string[],
  naming: NamingEngine,
): Map<string, string> {
  return assignTypeNames(modelNames, (name) => goIdentifier(name, naming));
}

function goTypeName(name: string, ctx: GoContext): string {
  return ctx.names.get(name) ?? goIdentifier(name, ctx.naming);
}

// ============================================================================
// Declarations
// ============================================================================

function writeModel(
  writer: CodeBlockWriter,
  model: ModelShape,
  ctx: GoContext,
): void {
  const name = goTypeName(model.name, ctx);

  switch (model.kind) {
    case "record": {
      if (model.additional) {
        ctx.warnings.push(
          `go cannot express additional properties on "${model.name}"; ` +
            "dropping them",
        );
      }
      const used = new Set<string>();
      const rows = model.fields.map((field) => {
        const fieldName = claimName(
          goIdentifier(field.name, ctx.naming),
          used,
        );
        const type = field.required
          ? renderType(field.type, ctx)
          : renderOptional(field.type, ctx);
        const tag = field.required ? field.name : `${field.name},omitempty`;
        return [fieldName, type, `\`json:${JSON.stringify(tag)}\``];
      });
      writer.writeLine(`type ${name} struct {`);
      writer.indent(() => {
        for (const line of alignColumns(rows)) writer.writeLine(line);
      });
      writer.writeLine("}");
      return;
    }

    case "enum": {
      const base = enumBaseType(model.baseKind);
      writer.writeLine(`type ${name} ${base}`);
      if (base !== "string" || model.values.length === 0) return;

      const used = new Set<string>();
      const rows = model.values.map((value) => [
        claimName(`${name}${goIdentifier(String(value), ctx.naming)}`, used),
        `${name} = ${JSON.stringify(String(value))}`,
      ]);
      writer.blankLine();
      writer.writeLine("const (");
      writer.indent(() => {
        for (const line of alignColumns(rows)) writer.writeLine(line);
      });
      writer.writeLine(")");
      return;
    }

    case "alias":
      writer.writeLine(`type ${name} ${renderType(model.type, ctx)}`);
      return;
  }
}

/**
 * Pad every column but the last to its widest cell, one space apart
 */
function alignColumns(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, index) =>
        index === row.length - 1 ? cell : cell.padEnd(widths[index] ?? 0),
      )
      .join(" "),
  );
}

function enumBaseType(kind: EnumBaseKind): string {
  switch (kind) {
    case "string":
      return "string";
    case "integer":
      return "int64";
    case "number":
      return "float64";
    case "boolean":
      return "bool";
    case "unknown":
      return "any";
  }
}

// ============================================================================
// Type Expressions
// ============================================================================

function renderType(type: TypeExpr, ctx: GoContext): string {
  switch (type.kind) {
    case "scalar":
      return renderScalar(type.scalar);

    case "sequence":
      return `[]${renderType(type.items, ctx)}`;

    case "map":
      return `map[string]${renderType(type.values, ctx)}`;

    case "named":
      return goTypeName(type.name, ctx);

    case "union":
      return "any";

    case "struct":
      return "map[string]any";

    case "intersection": {
      const [first] = type.members;
      return first ? renderType(first, ctx) : "any";
    }

    case "literal":
      return enumBaseType(type.baseKind);

    case "nullable":
      return renderOptional(type.inner, ctx);
  }
}

/**
 * Pointer to the type unless Go can already represent its absence
 */
function renderOptional(type: TypeExpr, ctx: GoContext): string {
  if (type.kind === "nullable") return renderOptional(type.inner, ctx);
  const rendered = renderType(type, ctx);
  if (isNilable(rendered)) return rendered;
  return `*${rendered}`;
}

function isNilable(rendered: string): boolean {
  return (
    rendered === "any" ||
    rendered.startsWith("[]") ||
    rendered.startsWith("map[") ||
    rendered.startsWith("*")
  );
}

function renderScalar(kind: ScalarKind): string {
  switch (kind) {
    case "string":
      return "string";
    case "number":
      return "float64";
    case "integer":
      return "int64";
    case "boolean":
      return "bool";
    case "bytes":
      return "[]byte";
    case "null":
    case "unknown":
      return "any";
  }
}

// ============================================================================
// Services
// ============================================================================

function renderServices(
  services: ServiceShape[],
  packageClause: string,
  ctx: GoContext,
): string {
  const writer = createWriter({ useTabs: true });
  writeHeader(writer, "line");
  writer.writeLine(packageClause);
  writer.blankLine();
  writer.writeLine('import "context"');

  const used = new Set(ctx.names.values());
  for (const service of services) {
    const name = claimName(
      `${goIdentifier(service.tag, ctx.naming)}Service`,
      used,
    );
    writer.blankLine();
    writeSectionComment(writer, name);
    writer.writeLine(`type ${name} interface {`);
    writer.indent(() => {
      const methods = new Set<string>();
      for (const method of service.methods) {
        const methodName = claimName(
          goIdentifier(method.name, ctx.naming),
          methods,
        );
        writeMethod(writer, method, methodName, ctx);
      }
    });
    writer.writeLine("}");
  }

  return writer.toString();
}

/**
 * Unexported Go identifier for a parameter
 */
export function goParamName(name: string, naming: NamingEngine): string {
  const camel = naming.toCamelCase(name);
  if (camel === "") return "param";
  if (/^[0-9]/.test(camel)) return `p${camel}`;
  return GO_KEYWORDS.has(camel) ? `${camel}Param` : camel;
}

function writeMethod(
  writer: CodeBlockWriter,
  method: MethodShape,
  name: string,
  ctx: GoContext,
): void {
  writer.writeLine(`// ${name}: ${describeMethod(method)}`);
  if (method.deprecated) {
    writer.writeLine("//");
    writer.writeLine(
      `// Deprecated: ${method.httpMethod} ${method.path} is deprecated.`,
    );
  }

  const used = new Set(["ctx"]);
  const params = method.params.map((param) => {
    const identifier = claimName(goParamName(param.name, ctx.naming), used);
    const type = param.required
      ? renderType(param.type, ctx)
      : renderOptional(param.type, ctx);
    return `${identifier} ${type}`;
  });
  const result = method.response
    ? `(${renderOptional(method.response, ctx)}, error)`
    : "error";
  writer.writeLine(
    `${name}(${["ctx context.Context", ...params].join(", ")}) ${result}`,
  );
}
