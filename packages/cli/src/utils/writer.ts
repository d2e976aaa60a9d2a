import CodeBlockWriter from "code-block-writer";

/**
 * Comment style of a target language
 */
export type CommentStyle = "block" | "line" | "hash";

export interface WriterOptions {
  /** Indent with tabs (Go) */
  useTabs?: boolean;
  /** Spaces per indent level when not using tabs (default: 2) */
  indentSize?: number;
}

/**
 * Create a code writer with the project's formatting defaults
 */
export function createWriter(options: WriterOptions = {}): CodeBlockWriter {
  return new CodeBlockWriter({
    newLine: "\n",
    indentNumberOfSpaces: options.indentSize ?? 2,
    useTabs: options.useTabs ?? false,
    useSingleQuote: false,
  });
}

/**
 * Write a single-line comment in the target language's syntax
 */
export function writeComment(
  writer: CodeBlockWriter,
  style: CommentStyle,
  text: string,
): void {
  switch (style) {
    case "block":
      writer.writeLine(`/* ${text} */`);
      break;
    case "line":
      writer.writeLine(`// ${text}`);
      break;
    case "hash":
      writer.writeLine(`# ${text}`);
      break;
  }
}

/**
 * Write the "generated file" header followed by a blank line
 */
export function writeHeader(
  writer: CodeBlockWriter,
  style: CommentStyle = "block",
): void {
  // Go tooling recognizes this exact form
  const text =
    style === "line"
      ? "Code generated by sdkloom. DO NOT EDIT."
      : "This file is auto-generated by sdkloom. Do not edit.";
  writeComment(writer, style, text);
  writer.blankLine();
}

/**
 * Write a section separator comment
 */
export function writeSectionComment(
  writer: CodeBlockWriter,
  title: string,
  style: CommentStyle = "line",
): void {
  const rule = "=".repeat(76);
  const prefix = style === "hash" ? "#" : "//";
  writer.writeLine(`${prefix} ${rule}`);
  writer.writeLine(`${prefix} ${title}`);
  writer.writeLine(`${prefix} ${rule}`);
  writer.blankLine();
}
