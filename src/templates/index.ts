/**
 * Document template engine.
 *
 * Templates are plain text in any markup with four kinds of marker:
 *
 *   {path.to.field}                  interpolation
 *   {for item in path} … {endfor}    one pass per sequence item
 *   {if path} … {endif}              included when the value is non-empty
 *
 * Blocks nest freely. Malformed block structure is a TemplateSyntaxError at
 * parse time; missing content is never an error at render time.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * import { parseTemplate, renderTemplate } from "./templates/index.js";
 * import { buildContentModel } from "./plan/index.js";
 *
 * const template = parseTemplate("# {title}\n{for c in key_concepts}- {c.name}\n{endfor}");
 * const model = buildContentModel({ title: "Queues", key_concepts: [{ name: "Topic" }] });
 *
 * renderTemplate(template, model);   // "# Queues\n- Topic\n"
 * ```
 *
 * Parse once, render many: compiled templates are frozen and can be shared
 * across renders. TemplateCache adds compile-once-per-identity caching.
 */

// Tokens
export { tokenize, type Token, type TokenKind } from "./tokenizer.js";

// Nodes
export {
  walkNodes,
  type TemplateNode,
  type LiteralNode,
  type ReferenceNode,
  type LoopNode,
  type ConditionalNode,
} from "./nodes.js";

// Parsing
export {
  parseTemplate,
  collectPaths,
  TemplateSyntaxError,
  type CompiledTemplate,
} from "./parser.js";

// Rendering
export { renderTemplate, type RenderOptions } from "./renderer.js";

// Caching
export { TemplateCache } from "./cache.js";

// Loader
export {
  TemplateLoader,
  TemplateLoadError,
  type TemplateLoaderOptions,
} from "./loader.js";
