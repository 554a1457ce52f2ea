/**
 * DocBook topic output.
 *
 * Every interpolated value is escaped for XML character data and
 * attribute values, so plan text can never open or close an element.
 */

import type { FormatAdapter } from "./types.js";

const XML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}

export const docbookAdapter: FormatAdapter = {
  format: "docbook",
  label: "DocBook XML",
  documentTemplate: "document-docbook",
  sectionTemplate: "section-docbook",
  fileExtension: ".xml",
  escape: escapeXml,
};
