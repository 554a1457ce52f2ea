/**
 * Output format adapters.
 */

export type { FormatAdapter } from "./types.js";
export { markdownAdapter } from "./markdown.js";
export { docbookAdapter, escapeXml } from "./docbook.js";
export {
  getAdapter,
  listFormats,
  isOutputFormat,
  UnknownFormatError,
} from "./registry.js";
