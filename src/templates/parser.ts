/**
 * Template parsing.
 *
 * A document template is plain text (Markdown, XML, anything) containing
 * interpolation markers and block markers. Parsing turns it into a frozen
 * node tree; see tokenizer.ts for the marker syntax.
 *
 * TEMPLATE FORMAT:
 *
 *   # {title}
 *
 *   {for section in content_structure}
 *   ## {section.title}
 *   {if section.key_points}
 *   {for point in section.key_points}
 *   - {point}
 *   {endfor}
 *   {endif}
 *   {endfor}
 *
 * Rules:
 *   - Blocks nest to any depth, loops and conditionals freely mixed
 *   - A terminator closes the most recently opened block, which must be
 *     of the same kind
 *   - Every opener needs its terminator before the end of the source
 *   - Unrecognized `{…}` text is literal; it is never an error
 *
 * Parsing either returns a complete tree or throws TemplateSyntaxError.
 */

import { tokenize, type ForToken, type IfToken, type Token } from "./tokenizer.js";
import {
  walkNodes,
  type ConditionalNode,
  type LiteralNode,
  type LoopNode,
  type ReferenceNode,
  type TemplateNode,
} from "./nodes.js";

// ---------------------------------------------------------------------------
// Compiled template
// ---------------------------------------------------------------------------

/**
 * A parsed template, ready to render any number of times.
 */
export interface CompiledTemplate {
  /** The raw template source. */
  readonly source: string;
  /** Top-level nodes. */
  readonly nodes: readonly TemplateNode[];
  /** Distinct paths used by references, loops and conditionals, sorted. */
  readonly paths: readonly string[];
  /** Optional name/id for error messages. */
  readonly name?: string;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateSyntaxError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly line: number,
    public readonly column: number,
    public readonly detail: string
  ) {
    super(`Template "${templateName}" line ${line}, column ${column}: ${detail}`);
    this.name = "TemplateSyntaxError";
  }
}

// ---------------------------------------------------------------------------
// Block stack
// ---------------------------------------------------------------------------

interface OpenBlock {
  readonly opener: ForToken | IfToken;
  readonly children: TemplateNode[];
}

const TERMINATOR_FOR: Record<"for" | "if", "endfor" | "endif"> = {
  for: "endfor",
  if: "endif",
};

function describe(opener: ForToken | IfToken): string {
  return `${opener.raw} (line ${opener.line}, column ${opener.column})`;
}

function closeBlock(block: OpenBlock): TemplateNode {
  const { opener } = block;
  const segments = Object.freeze(opener.path.split("."));
  const body = Object.freeze(block.children);

  if (opener.kind === "for") {
    const loop: LoopNode = {
      kind: "loop",
      path: opener.path,
      segments,
      binding: opener.binding,
      body,
    };
    return Object.freeze(loop);
  }
  const conditional: ConditionalNode = { kind: "conditional", path: opener.path, segments, body };
  return Object.freeze(conditional);
}

function buildTree(tokens: readonly Token[], templateName: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: OpenBlock[] = [];

  const current = (): TemplateNode[] => stack[stack.length - 1]?.children ?? root;

  for (const token of tokens) {
    switch (token.kind) {
      case "text": {
        const literal: LiteralNode = { kind: "literal", text: token.text };
        current().push(Object.freeze(literal));
        break;
      }

      case "reference": {
        const reference: ReferenceNode = {
          kind: "reference",
          path: token.path,
          segments: Object.freeze(token.path.split(".")),
        };
        current().push(Object.freeze(reference));
        break;
      }

      case "for":
      case "if":
        stack.push({ opener: token, children: [] });
        break;

      case "endfor":
      case "endif": {
        const open = stack.pop();
        if (open === undefined) {
          const opener = token.kind === "endfor" ? "{for}" : "{if}";
          throw new TemplateSyntaxError(
            templateName,
            token.line,
            token.column,
            `${token.raw} has no matching ${opener}`
          );
        }
        if (TERMINATOR_FOR[open.opener.kind] !== token.kind) {
          throw new TemplateSyntaxError(
            templateName,
            token.line,
            token.column,
            `${token.raw} found while ${describe(open.opener)} is still open`
          );
        }
        current().push(closeBlock(open));
        break;
      }
    }
  }

  const unclosed = stack.pop();
  if (unclosed !== undefined) {
    const { opener } = unclosed;
    throw new TemplateSyntaxError(
      templateName,
      opener.line,
      opener.column,
      `${opener.raw} is never closed with {${TERMINATOR_FOR[opener.kind]}}`
    );
  }

  return root;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Collect the distinct paths a node tree reads, sorted.
 */
export function collectPaths(nodes: readonly TemplateNode[]): string[] {
  const found = new Set<string>();
  walkNodes(nodes, (node) => {
    if (node.kind !== "literal") {
      found.add(node.path);
    }
  });
  return [...found].sort();
}

/**
 * Parse template source into a compiled template.
 *
 * @param source - The raw template text
 * @param name   - Optional template name for error messages
 * @throws TemplateSyntaxError on unbalanced or mis-nested block markers
 */
export function parseTemplate(source: string, name?: string): CompiledTemplate {
  const nodes = Object.freeze(buildTree(tokenize(source), name ?? "(anonymous)"));

  const compiled: CompiledTemplate = {
    source,
    nodes,
    paths: Object.freeze(collectPaths(nodes)),
    name,
  };
  return Object.freeze(compiled);
}
