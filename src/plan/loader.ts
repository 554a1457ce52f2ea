/**
 * Content plan persistence and inspection.
 *
 * Responsible for:
 * - Reading plans from disk (JSON, or raw model output that is not JSON)
 * - Writing plans back out
 * - Applying top-level updates without mutating the original
 * - Reporting schema deviations as advisory issues
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, extname, resolve } from "node:path";
import type { ZodIssue } from "zod";

import { ContentPlanSchema } from "./schema.js";

/** A plan as loaded: any JSON object. Fields are checked at render time. */
export type RawContentPlan = Readonly<Record<string, unknown>>;

export class ContentPlanLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load content plan: ${filePath}`);
    this.name = "ContentPlanLoadError";
  }
}

/**
 * A deviation from the expected plan shape. Issues are reported, not
 * enforced: a plan with issues still renders.
 */
export interface PlanIssue {
  /** Path to the offending field */
  path: (string | number)[];
  /** Human-readable message */
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): PlanIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Format issues for log output, one per line.
 */
export function formatPlanIssues(issues: readonly PlanIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `  - ${path}: ${issue.message}`;
    })
    .join("\n");
}

/**
 * Check a plan against ContentPlanSchema and return every issue found.
 * An empty array means the plan has the expected shape.
 */
export function inspectContentPlan(input: unknown): PlanIssue[] {
  const result = ContentPlanSchema.safeParse(input);
  return result.success ? [] : formatZodIssues(result.error.issues);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Interpret text as a plan: a JSON object is used as is, anything else
 * (including valid JSON that is not an object) is kept as raw content.
 */
export function parseContentPlan(text: string): RawContentPlan {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { raw_content: text };
  }
  return isPlainObject(parsed) ? parsed : { raw_content: text };
}

/**
 * Load a plan from disk.
 *
 * `.json` files must contain valid JSON; other files are parsed as JSON
 * when possible and otherwise kept as `{ raw_content }`.
 *
 * @throws ContentPlanLoadError if the file is missing or a .json file is malformed
 */
export function loadContentPlan(filePath: string): RawContentPlan {
  const fullPath = resolve(filePath);

  if (!existsSync(fullPath)) {
    throw new ContentPlanLoadError(fullPath, `Content plan not found: ${fullPath}`);
  }

  const text = readFileSync(fullPath, "utf-8");

  if (extname(fullPath).toLowerCase() !== ".json") {
    return parseContentPlan(text);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ContentPlanLoadError(
      fullPath,
      `Content plan is not valid JSON: ${fullPath} (${reason})`
    );
  }

  return isPlainObject(parsed) ? parsed : { raw_content: text };
}

/**
 * Write a plan to disk, creating parent directories.
 *
 * `.json` targets get indented JSON. Other targets get the raw content
 * when that is all the plan holds, otherwise indented JSON.
 *
 * @returns The absolute path written
 */
export function saveContentPlan(plan: RawContentPlan, filePath: string): string {
  const fullPath = resolve(filePath);
  mkdirSync(dirname(fullPath), { recursive: true });

  const rawContent = plan["raw_content"];
  let body = JSON.stringify(plan, null, 2);
  if (
    extname(fullPath).toLowerCase() !== ".json" &&
    typeof rawContent === "string" &&
    Object.keys(plan).length === 1
  ) {
    body = rawContent;
  }

  writeFileSync(fullPath, body, "utf-8");
  return fullPath;
}

/**
 * Apply top-level field updates, returning a new plan.
 */
export function updateContentPlan(
  plan: RawContentPlan,
  updates: RawContentPlan
): RawContentPlan {
  return { ...plan, ...updates };
}
