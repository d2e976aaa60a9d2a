/**
 * TypeScript emitter
 *
 * Writes `ir.json`, a `models.ts` with one exported declaration per model and,
 * when the IR has operations, a `services.ts` with one interface per tag.
 */

import { typescriptVocabulary } from "@/projection/vocabularies";
import { getSafePropertyName, isValidIdentifier } from "@/utils/naming";
import { createWriter, writeHeader, writeSectionComment } from "@/utils/writer";
import {
  assignTypeNames,
  claimName,
  describeMethod,
  irFile,
  projectModels,
  projectServices,
  serviceModelNames,
  toIRDocument,
  toTypeIdentifier,
  uniqueWarnings,
} from "./shared";

import type CodeBlockWriter from "code-block-writer";
import type {
  LiteralValue,
  StructFieldExpr,
  TypeExpr,
} from "@/projection/types";
import type { NamingEngine } from "@/utils/naming";
import type { MethodShape, ModelShape, ServiceShape } from "./shared";
import type { Emitter, GeneratedFile } from "./types";

export const TYPESCRIPT_MODELS_FILENAME = "models.ts";
export const TYPESCRIPT_SERVICES_FILENAME = "services.ts";

/** Model name -> exported TypeScript identifier */
type TypeNames = ReadonlyMap<string, string>;

export const typescriptEmitter: Emitter = {
  type: "typescript",
  vocabulary: typescriptVocabulary,

  emit(ir, options) {
    const warnings: string[] = [];
    const models = projectModels(ir, this.vocabulary, warnings);
    const names = assignTypeNames(
      models.map((model) => model.name),
      toTypeIdentifier,
    );

    const writer = createWriter();
    writeHeader(writer);

    if (models.length > 0) {
      writeSectionComment(writer, "Models");
      models.forEach((model, index) => {
        if (index > 0) writer.blankLine();
        writeModel(writer, model, names);
      });
    }

    const document = toIRDocument(ir, this.type, options);
    const services = projectServices(document, this.vocabulary, {
      knownModels: new Set(names.keys()),
      warnings,
    });

    const files: GeneratedFile[] = [
      irFile(document),
      { filename: TYPESCRIPT_MODELS_FILENAME, content: writer.toString() },
    ];
    if (services.length > 0) {
      files.push({
        filename: TYPESCRIPT_SERVICES_FILENAME,
        content: renderServices(services, names, options.naming),
      });
    }

    return { files, warnings: uniqueWarnings(warnings) };
  },
};

// ============================================================================
// Declarations
// ============================================================================

function writeModel(
  writer: CodeBlockWriter,
  model: ModelShape,
  names: TypeNames,
): void {
  const name = names.get(model.name) ?? toTypeIdentifier(model.name);
  const render = (type: TypeExpr) => renderType(type, names);

  switch (model.kind) {
    case "record":
      if (model.additional) {
        const struct = renderStruct(model.fields, model.additional, names);
        writer.writeLine(`export type ${name} = ${struct};`);
        return;
      }
      writer.writeLine(`export interface ${name} {`);
      writer.indent(() => {
        for (const field of model.fields) {
          const key = renderFieldKey(field);
          writer.writeLine(`${key}: ${render(field.type)};`);
        }
      });
      writer.writeLine("}");
      return;

    case "enum":
      writer.writeLine(`export type ${name} = ${renderLiterals(model.values)};`);
      return;

    case "alias":
      writer.writeLine(`export type ${name} = ${render(model.type)};`);
      return;
  }
}

// ============================================================================
// Type Expressions
// ============================================================================

/**
 * Render a projected type as a TypeScript type expression
 */
export function renderType(
  type: TypeExpr,
  names: TypeNames = new Map(),
): string {
  const render = (inner: TypeExpr) => renderType(inner, names);

  switch (type.kind) {
    case "scalar":
      switch (type.scalar) {
        case "integer":
          return "number";
        case "bytes":
          return "Blob";
        default:
          return type.scalar;
      }

    case "sequence": {
      const items = render(type.items);
      return needsParens(type.items) ? `(${items})[]` : `${items}[]`;
    }

    case "map":
      return `Record<string, ${render(type.values)}>`;

    case "named":
      return names.get(type.name) ?? toTypeIdentifier(type.name);

    case "union":
      if (type.members.length === 0) return "unknown";
      return type.members.map(render).join(" | ");

    case "intersection":
      if (type.members.length === 0) return "unknown";
      return type.members
        .map((member) =>
          needsParens(member) ? `(${render(member)})` : render(member),
        )
        .join(" & ");

    case "literal":
      return renderLiterals(type.values);

    case "struct":
      return renderStruct(type.fields, type.additional, names);

    case "nullable":
      return `${render(type.inner)} | null`;
  }
}

function renderLiterals(values: LiteralValue[]): string {
  if (values.length === 0) return "never";
  return values.map((value) => JSON.stringify(value)).join(" | ");
}

function renderStruct(
  fields: StructFieldExpr[],
  additional: TypeExpr | undefined,
  names: TypeNames,
): string {
  const body = fields
    .map(
      (field) => `${renderFieldKey(field)}: ${renderType(field.type, names)}`,
    )
    .join("; ");
  const struct = `{ ${body} }`;
  return additional
    ? `${struct} & Record<string, ${renderType(additional, names)}>`
    : struct;
}

function renderFieldKey(field: StructFieldExpr): string {
  const key = getSafePropertyName(field.name);
  return field.required ? key : `${key}?`;
}

function needsParens(type: TypeExpr): boolean {
  switch (type.kind) {
    case "union":
    case "intersection":
    case "nullable":
      return true;
    case "literal":
      return type.values.length > 1;
    default:
      return false;
  }
}

// ============================================================================
// Services
// ============================================================================

function renderServices(
  services: ServiceShape[],
  names: TypeNames,
  naming: NamingEngine,
): string {
  const writer = createWriter();
  writeHeader(writer);

  const imports = [...serviceModelNames(services)]
    .flatMap((name) => {
      const identifier = names.get(name);
      return identifier === undefined ? [] : [identifier];
    })
    .sort();
  if (imports.length > 0) {
    writer.writeLine(`import type { ${imports.join(", ")} } from "./models";`);
    writer.blankLine();
  }

  // Interfaces share the scope of the imported model names
  const used = new Set(names.values());
  services.forEach((service, index) => {
    if (index > 0) writer.blankLine();
    const name = claimName(
      `${toTypeIdentifier(naming.toPascalCase(service.tag))}Service`,
      used,
    );
    writeSectionComment(writer, name);
    writer.writeLine(`export interface ${name} {`);
    writer.indent(() => {
      const methods = new Set<string>();
      for (const method of service.methods) {
        writeMethod(writer, method, claimName(methodName(method), methods), {
          names,
          naming,
        });
      }
    });
    writer.writeLine("}");
  });

  return writer.toString();
}

function methodName(method: MethodShape): string {
  return isValidIdentifier(method.name)
    ? method.name
    : toTypeIdentifier(method.name);
}

function writeMethod(
  writer: CodeBlockWriter,
  method: MethodShape,
  name: string,
  ctx: { names: TypeNames; naming: NamingEngine },
): void {
  const doc = describeMethod(method).replace(/\*\//g, "*\\/");
  writer.writeLine(
    method.deprecated ? `/** @deprecated ${doc} */` : `/** ${doc} */`,
  );

  const used = new Set<string>();
  const params = method.params.map((param) => {
    const camel = ctx.naming.toCamelCase(param.name);
    const identifier = claimName(
      isValidIdentifier(camel) ? camel : toTypeIdentifier(param.name),
      used,
    );
    const optional = param.required ? "" : "?";
    return `${identifier}${optional}: ${renderType(param.type, ctx.names)}`;
  });
  const response = method.response
    ? renderType(method.response, ctx.names)
    : "void";
  writer.writeLine(`${name}(${params.join(", ")}): Promise<${response}>;`);
}
