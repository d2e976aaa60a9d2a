import type { TypeVocabulary } from "./types";

export const typescriptVocabulary: TypeVocabulary = {
  name: "typescript",
  unions: true,
  intersections: true,
  literalKinds: ["string", "number", "integer", "boolean"],
  inlineStructs: true,
};

/** typing.Union and Literal; no intersections or inline classes */
export const pythonVocabulary: TypeVocabulary = {
  name: "python",
  unions: true,
  intersections: false,
  literalKinds: ["string", "integer", "boolean"],
  inlineStructs: false,
};

export const goVocabulary: TypeVocabulary = {
  name: "go",
  unions: false,
  intersections: false,
  literalKinds: [],
  inlineStructs: false,
};

export const vocabularies = {
  typescript: typescriptVocabulary,
  python: pythonVocabulary,
  go: goVocabulary,
} as const;
