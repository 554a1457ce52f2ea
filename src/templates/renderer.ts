/**
 * Template renderer.
 *
 * Walks a compiled template against a content model and produces text.
 * Rendering never fails on content: a missing or mistyped path renders as
 * nothing, a loop over anything but a sequence runs zero times, and a
 * conditional over an absent or empty value is skipped. Plans come from a
 * generative model and routinely omit optional fields; whatever is present
 * still renders.
 *
 * Path resolution:
 *
 *   1. If the first segment names a loop variable, the innermost binding
 *      with that name wins and the rest of the path is resolved against it.
 *   2. Otherwise the full path is resolved from the root of the model.
 *
 * Loop variables live in a chain of frames created per iteration. A frame
 * is visible only inside its loop body, so bindings never leak to siblings
 * and an inner loop that reuses a name shadows the outer binding only for
 * the inner body.
 *
 * The renderer is format-agnostic. The one format-aware step is the escape
 * function supplied by the output adapter, applied to every interpolated
 * value.
 */

import {
  isTruthy,
  resolvePath,
  type ContentModel,
  type ContentValue,
} from "../plan/model.js";
import type { TemplateNode } from "./nodes.js";
import type { CompiledTemplate } from "./parser.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RenderOptions {
  /**
   * Applied to the text of every interpolated value before it is emitted.
   * Literal template text is never escaped. Defaults to identity.
   */
  escape?: (text: string) => string;
}

// ---------------------------------------------------------------------------
// Scope
// ---------------------------------------------------------------------------

interface Frame {
  readonly name: string;
  readonly value: ContentValue;
  readonly parent: Frame | null;
}

interface RenderState {
  readonly model: ContentModel;
  readonly escape: (text: string) => string;
  readonly out: string[];
}

function lookup(
  state: RenderState,
  frame: Frame | null,
  segments: readonly string[]
): ContentValue {
  const [head, ...rest] = segments;
  for (let f = frame; f !== null; f = f.parent) {
    if (f.name === head) {
      return resolvePath(f.value, rest);
    }
  }
  return resolvePath(state.model, segments);
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

function renderNodes(
  state: RenderState,
  nodes: readonly TemplateNode[],
  frame: Frame | null
): void {
  for (const node of nodes) {
    switch (node.kind) {
      case "literal":
        state.out.push(node.text);
        break;

      case "reference": {
        const value = lookup(state, frame, node.segments);
        if (value.kind === "scalar") {
          state.out.push(state.escape(value.text));
        }
        break;
      }

      case "loop": {
        const value = lookup(state, frame, node.segments);
        if (value.kind !== "sequence") break;
        for (const item of value.items) {
          renderNodes(state, node.body, { name: node.binding, value: item, parent: frame });
        }
        break;
      }

      case "conditional":
        if (isTruthy(lookup(state, frame, node.segments))) {
          renderNodes(state, node.body, frame);
        }
        break;
    }
  }
}

const identity = (text: string): string => text;

/**
 * Render a compiled template against a content model.
 *
 * @param template - A previously parsed template
 * @param model    - Content model built via buildContentModel()
 * @param options  - Rendering options (escaping)
 * @returns The rendered text
 */
export function renderTemplate(
  template: CompiledTemplate,
  model: ContentModel,
  options: RenderOptions = {}
): string {
  const state: RenderState = {
    model,
    escape: options.escape ?? identity,
    out: [],
  };
  renderNodes(state, template.nodes, null);
  return state.out.join("");
}
