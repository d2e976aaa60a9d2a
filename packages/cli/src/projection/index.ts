export * from "./types";
export { isLiteralValue, nullable, projectType, scalar } from "./project";
export {
  goVocabulary,
  pythonVocabulary,
  typescriptVocabulary,
  vocabularies,
} from "./vocabularies";
