/**
 * Python emitter
 *
 * Writes `ir.json`, a `models.py` of TypedDict classes and typing aliases
 * and, when the IR has operations, a `services.py` of typing Protocols.
 * Model references are quoted so declarations can appear in any order.
 */

import { pythonVocabulary } from "@/projection/vocabularies";
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
  ScalarKind,
  StructFieldExpr,
  TypeExpr,
} from "@/projection/types";
import type { NamingEngine } from "@/utils/naming";
import type {
  MethodParamShape,
  MethodShape,
  ModelShape,
  ServiceShape,
} from "./shared";
import type { Emitter, GeneratedFile } from "./types";

export const PYTHON_MODELS_FILENAME = "models.py";
export const PYTHON_SERVICES_FILENAME = "services.py";

const TYPING_IMPORT =
  "from typing import Any, Dict, List, Literal, Optional, Union";

/** Model name -> Python identifier */
type TypeNames = ReadonlyMap<string, string>;

const PYTHON_KEYWORDS = new Set([
  "False",
  "None",
  "True",
  "and",
  "as",
  "assert",
  "async",
  "await",
  "break",
  "class",
  "continue",
  "def",
  "del",
  "elif",
  "else",
  "except",
  "finally",
  "for",
  "from",
  "global",
  "if",
  "import",
  "in",
  "is",
  "lambda",
  "nonlocal",
  "not",
  "or",
  "pass",
  "raise",
  "return",
  "try",
  "while",
  "with",
  "yield",
]);

export const pythonEmitter: Emitter = {
  type: "python",
  vocabulary: pythonVocabulary,

  emit(ir, options) {
    const warnings: string[] = [];
    const models = projectModels(ir, this.vocabulary, warnings);
    const names = assignTypeNames(
      models.map((model) => model.name),
      pythonTypeIdentifier,
    );

    const writer = createWriter({ indentSize: 4 });
    writeHeader(writer, "hash");
    writer.writeLine(TYPING_IMPORT);
    writer.blankLine();
    writer.writeLine("from typing_extensions import NotRequired, TypedDict");

    if (models.length > 0) {
      writer.blankLine();
      writer.blankLine();
      writeSectionComment(writer, "Models", "hash");
      models.forEach((model, index) => {
        if (index > 0) {
          writer.blankLine();
          writer.blankLine();
        }
        writeModel(writer, model, names, warnings);
      });
    }

    const document = toIRDocument(ir, this.type, options);
    const services = projectServices(document, this.vocabulary, {
      knownModels: new Set(names.keys()),
      warnings,
    });

    const files: GeneratedFile[] = [
      irFile(document),
      { filename: PYTHON_MODELS_FILENAME, content: writer.toString() },
    ];
    if (services.length > 0) {
      files.push({
        filename: PYTHON_SERVICES_FILENAME,
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
  warnings: string[],
): void {
  const name = names.get(model.name) ?? pythonTypeIdentifier(model.name);
  const renderField = (field: StructFieldExpr) => {
    const type = renderType(field.type, names);
    return field.required ? type : `NotRequired[${type}]`;
  };

  switch (model.kind) {
    case "record":
      if (model.additional) {
        warnings.push(
          `python cannot express additional properties on "${model.name}"; ` +
            "dropping them",
        );
      }
      if (model.fields.every((field) => isPythonIdentifier(field.name))) {
        writer.writeLine(`class ${name}(TypedDict):`);
        writer.indent(() => {
          for (const field of model.fields) {
            writer.writeLine(`${field.name}: ${renderField(field)}`);
          }
        });
        return;
      }
      // Keys that are not identifiers need the functional form
      writer.writeLine(`${name} = TypedDict(${JSON.stringify(name)}, {`);
      writer.indent(() => {
        for (const field of model.fields) {
          writer.writeLine(
            `${JSON.stringify(field.name)}: ${renderField(field)},`,
          );
        }
      });
      writer.writeLine("})");
      return;

    case "enum":
      writer.writeLine(`${name} = ${renderLiterals(model.values)}`);
      return;

    case "alias":
      writer.writeLine(`${name} = ${renderType(model.type, names)}`);
      return;
  }
}

export function isPythonIdentifier(name: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(name) && !PYTHON_KEYWORDS.has(name);
}

/**
 * Class or alias name for a model; keywords get a trailing underscore
 */
export function pythonTypeIdentifier(name: string): string {
  const identifier = toTypeIdentifier(name);
  return PYTHON_KEYWORDS.has(identifier) ? `${identifier}_` : identifier;
}

// ============================================================================
// Type Expressions
// ============================================================================

/**
 * Render a projected type as a typing annotation
 */
export function renderType(
  type: TypeExpr,
  names: TypeNames = new Map(),
): string {
  const render = (inner: TypeExpr) => renderType(inner, names);

  switch (type.kind) {
    case "scalar":
      return renderScalar(type.scalar);

    case "sequence":
      return `List[${render(type.items)}]`;

    case "map":
      return `Dict[str, ${render(type.values)}]`;

    case "named":
      return JSON.stringify(
        names.get(type.name) ?? pythonTypeIdentifier(type.name),
      );

    case "union":
      if (type.members.length === 0) return "Any";
      return `Union[${type.members.map(render).join(", ")}]`;

    case "intersection": {
      const [first] = type.members;
      return first ? render(first) : "Any";
    }

    case "literal":
      return renderLiterals(type.values);

    case "struct":
      return "Dict[str, Any]";

    case "nullable":
      return `Optional[${render(type.inner)}]`;
  }
}

function renderScalar(kind: ScalarKind): string {
  switch (kind) {
    case "string":
      return "str";
    case "number":
      return "float";
    case "integer":
      return "int";
    case "boolean":
      return "bool";
    case "bytes":
      return "bytes";
    case "null":
      return "None";
    case "unknown":
      return "Any";
  }
}

function renderLiterals(values: LiteralValue[]): string {
  if (values.length === 0) return "Any";
  return `Literal[${values.map(renderLiteral).join(", ")}]`;
}

function renderLiteral(value: LiteralValue): string {
  if (typeof value === "boolean") return value ? "True" : "False";
  return JSON.stringify(value);
}

// ============================================================================
// Services
// ============================================================================

function renderServices(
  services: ServiceShape[],
  names: TypeNames,
  naming: NamingEngine,
): string {
  const writer = createWriter({ indentSize: 4 });
  writeHeader(writer, "hash");
  writer.writeLine(TYPING_IMPORT);
  writer.blankLine();
  writer.writeLine("from typing_extensions import Protocol");

  const imports = [...serviceModelNames(services)]
    .flatMap((name) => {
      const identifier = names.get(name);
      return identifier === undefined ? [] : [identifier];
    })
    .sort();
  if (imports.length > 0) {
    writer.blankLine();
    writer.writeLine(`from .models import ${imports.join(", ")}`);
  }

  const used = new Set(names.values());
  for (const service of services) {
    const name = claimName(
      `${pythonTypeIdentifier(naming.toPascalCase(service.tag))}Service`,
      used,
    );
    writer.blankLine();
    writer.blankLine();
    writeSectionComment(writer, name, "hash");
    writer.writeLine(`class ${name}(Protocol):`);
    writer.indent(() => {
      const methods = new Set<string>();
      service.methods.forEach((method, index) => {
        if (index > 0) writer.blankLine();
        const methodName = claimName(
          pythonName(naming.toSnakeCase(method.name)),
          methods,
        );
        writeMethod(writer, method, methodName, names, naming);
      });
    });
  }

  return writer.toString();
}

function pythonName(name: string): string {
  return isPythonIdentifier(name) ? name : pythonTypeIdentifier(name);
}

function writeMethod(
  writer: CodeBlockWriter,
  method: MethodShape,
  name: string,
  names: TypeNames,
  naming: NamingEngine,
): void {
  const used = new Set(["self"]);
  const params = method.params.map((param) => {
    const identifier = claimName(
      pythonName(naming.toSnakeCase(param.name)),
      used,
    );
    return `${identifier}: ${renderParam(param, names)}`;
  });
  const response = method.response
    ? renderType(method.response, names)
    : "None";

  const doc = describeMethod(method).replace(/"""/g, '\\"\\"\\"');
  writer.writeLine(
    `def ${name}(${["self", ...params].join(", ")}) -> ${response}:`,
  );
  writer.indent(() => {
    writer.writeLine(
      method.deprecated ? `"""Deprecated. ${doc}"""` : `"""${doc}"""`,
    );
    writer.writeLine("...");
  });
}

function renderParam(param: MethodParamShape, names: TypeNames): string {
  const type = renderType(param.type, names);
  if (param.required) return type;
  return param.type.kind === "nullable"
    ? `${type} = None`
    : `Optional[${type}] = None`;
}
