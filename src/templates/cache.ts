/**
 * Compile-once template cache.
 *
 * Keyed by template identity (a name or a file path). Entries remember the
 * source they were compiled from; asking for the same key with different
 * source recompiles and replaces the entry, so a cache never serves a tree
 * for text that has since changed. Compiled trees are frozen, so one entry
 * can be shared by any number of renders.
 *
 * Nothing is cached implicitly: a TemplateCache exists only where a caller
 * creates one and passes it along (e.g. to TemplateLoader).
 */

import { parseTemplate, type CompiledTemplate } from "./parser.js";

export class TemplateCache {
  private readonly entries = new Map<string, CompiledTemplate>();

  /**
   * Return the compiled template for `key`, compiling `source` when the key
   * is new or its source has changed.
   *
   * @throws TemplateSyntaxError if `source` has to be compiled and is malformed
   */
  compile(key: string, source: string, name?: string): CompiledTemplate {
    const cached = this.entries.get(key);
    if (cached && cached.source === source) {
      return cached;
    }

    const compiled = parseTemplate(source, name ?? key);
    this.entries.set(key, compiled);
    return compiled;
  }

  /** Cached template for `key`, if any. */
  get(key: string): CompiledTemplate | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /** Drop one entry; returns whether it existed. */
  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
