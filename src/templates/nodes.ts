/**
 * Compiled template node tree.
 *
 * Trees are frozen after parsing and never modified by rendering, so one
 * compiled template can serve any number of renders.
 */

export interface LiteralNode {
  readonly kind: "literal";
  readonly text: string;
}

export interface ReferenceNode {
  readonly kind: "reference";
  /** Dotted path as written in the template. */
  readonly path: string;
  readonly segments: readonly string[];
}

export interface LoopNode {
  readonly kind: "loop";
  readonly path: string;
  readonly segments: readonly string[];
  /** Name the current item is bound to inside the body. */
  readonly binding: string;
  readonly body: readonly TemplateNode[];
}

export interface ConditionalNode {
  readonly kind: "conditional";
  readonly path: string;
  readonly segments: readonly string[];
  readonly body: readonly TemplateNode[];
}

export type TemplateNode = LiteralNode | ReferenceNode | LoopNode | ConditionalNode;

/**
 * Visit every node depth-first, parents before their bodies.
 */
export function walkNodes(
  nodes: readonly TemplateNode[],
  visit: (node: TemplateNode) => void
): void {
  for (const node of nodes) {
    visit(node);
    if (node.kind === "loop" || node.kind === "conditional") {
      walkNodes(node.body, visit);
    }
  }
}
