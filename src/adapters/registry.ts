/**
 * Registered output formats.
 */

import { docbookAdapter } from "./docbook.js";
import { markdownAdapter } from "./markdown.js";
import type { FormatAdapter } from "./types.js";

export class UnknownFormatError extends Error {
  constructor(
    public readonly format: string,
    public readonly available: readonly string[]
  ) {
    super(`Unknown output format "${format}". Available: ${available.join(", ")}`);
    this.name = "UnknownFormatError";
  }
}

const ADAPTERS: ReadonlyMap<string, FormatAdapter> = new Map(
  [markdownAdapter, docbookAdapter].map((adapter) => [adapter.format, adapter])
);

/**
 * Names of all registered formats, in registration order.
 */
export function listFormats(): string[] {
  return [...ADAPTERS.keys()];
}

export function isOutputFormat(format: string): boolean {
  return ADAPTERS.has(format);
}

/**
 * Look up the adapter for a format name.
 *
 * @throws UnknownFormatError if no adapter is registered under that name
 */
export function getAdapter(format: string): FormatAdapter {
  const adapter = ADAPTERS.get(format);
  if (!adapter) {
    throw new UnknownFormatError(format, listFormats());
  }
  return adapter;
}
