/**
 * Document generation.
 */

export {
  DocumentGenerator,
  SectionIndexError,
  defaultOutputPath,
  type DocumentGeneratorOptions,
  type GenerateOptions,
  type GeneratedDocument,
} from "./document-generator.js";
