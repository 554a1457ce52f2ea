/**
 * Markdown output.
 *
 * Values are emitted verbatim: plans routinely carry inline Markdown
 * (emphasis, code spans, links) that authors expect to survive rendering.
 */

import type { FormatAdapter } from "./types.js";

export const markdownAdapter: FormatAdapter = {
  format: "markdown",
  label: "Markdown",
  documentTemplate: "document-markdown",
  sectionTemplate: "section-markdown",
  fileExtension: ".md",
  escape: (text) => text,
};
