/**
 * Document generation from content plans.
 *
 * Ties the pieces together: picks the adapter for the requested format,
 * loads its template, converts the plan into a content model, renders with
 * the adapter's escaping, and optionally writes the result to disk.
 *
 * Plan shape problems are logged as warnings and never stop generation;
 * the rendered document simply leaves out what the plan does not have.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, format as formatPath, parse as parsePath, resolve } from "node:path";

import { getAdapter } from "../adapters/index.js";
import type { FormatAdapter } from "../adapters/index.js";
import {
  buildContentModel,
  formatPlanIssues,
  inspectContentPlan,
  type ContentModel,
  type RawContentPlan,
} from "../plan/index.js";
import { renderTemplate, type TemplateLoader } from "../templates/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class SectionIndexError extends Error {
  constructor(
    public readonly index: number,
    public readonly sectionCount: number
  ) {
    super(
      `Invalid section index: ${index} (content plan has ${sectionCount} section(s))`
    );
    this.name = "SectionIndexError";
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DocumentGeneratorOptions {
  /** Where document and section templates come from. */
  loader: TemplateLoader;
  /** Defaults to a logger that discards everything. */
  logger?: Logger;
  /** Format used when a call does not name one. Defaults to "markdown". */
  defaultFormat?: string;
}

export interface GenerateOptions {
  /** Output format name (see listFormats()). */
  format?: string;
  /** When set, the rendered text is also written to this file. */
  outputPath?: string;
}

export interface GeneratedDocument {
  /** Rendered text. */
  text: string;
  /** Format it was rendered in. */
  format: string;
  /** Template used. */
  templateName: string;
  /** Absolute path written, when an output path was given. */
  outputPath?: string;
  /** Number of plan shape issues reported while rendering. */
  issueCount: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Path a document is written to when none is given: the plan file's path
 * with the format's extension (plan.json → plan.md / plan.xml).
 */
export function defaultOutputPath(planPath: string, format: string): string {
  const { dir, name } = parsePath(planPath);
  return formatPath({ dir, name, ext: getAdapter(format).fileExtension });
}

function writeOutput(filePath: string, text: string): string {
  const fullPath = resolve(filePath);
  mkdirSync(dirname(fullPath), { recursive: true });
  writeFileSync(fullPath, text, "utf-8");
  return fullPath;
}

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

export class DocumentGenerator {
  private readonly loader: TemplateLoader;
  private readonly logger: Logger;
  private readonly defaultFormat: string;

  constructor(options: DocumentGeneratorOptions) {
    this.loader = options.loader;
    this.logger = options.logger ?? createSilentLogger();
    this.defaultFormat = options.defaultFormat ?? "markdown";
  }

  private reportIssues(plan: RawContentPlan): number {
    const issues = inspectContentPlan(plan);
    if (issues.length > 0) {
      this.logger.warn(
        `Content plan has ${issues.length} shape issue(s); rendering what is present\n` +
          formatPlanIssues(issues)
      );
    }
    return issues.length;
  }

  private renderWith(
    adapter: FormatAdapter,
    templateName: string,
    model: ContentModel,
    issueCount: number,
    outputPath: string | undefined
  ): GeneratedDocument {
    const template = this.loader.load(templateName);
    const text = renderTemplate(template, model, { escape: adapter.escape });

    const result: GeneratedDocument = {
      text,
      format: adapter.format,
      templateName,
      issueCount,
    };

    if (outputPath !== undefined) {
      result.outputPath = writeOutput(outputPath, text);
      this.logger.info(`Document saved to ${result.outputPath}`, {
        format: adapter.format,
        chars: text.length,
      });
    }

    return result;
  }

  /**
   * Render a full document from a content plan.
   *
   * @throws UnknownFormatError   for an unregistered format
   * @throws TemplateLoadError    if the format's template cannot be found
   * @throws TemplateSyntaxError  if the format's template is malformed
   */
  generate(plan: RawContentPlan, options: GenerateOptions = {}): GeneratedDocument {
    const adapter = getAdapter(options.format ?? this.defaultFormat);
    const issueCount = this.reportIssues(plan);

    this.logger.debug("Generating document", {
      format: adapter.format,
      template: adapter.documentTemplate,
    });

    return this.renderWith(
      adapter,
      adapter.documentTemplate,
      buildContentModel(plan),
      issueCount,
      options.outputPath
    );
  }

  /**
   * Render one entry of `content_structure` with the format's section
   * template. The section is bound as `section`; the plan title stays
   * available as `title`.
   *
   * @throws SectionIndexError if the plan has no section at `index`
   */
  generateSection(
    plan: RawContentPlan,
    index: number,
    options: GenerateOptions = {}
  ): GeneratedDocument {
    const adapter = getAdapter(options.format ?? this.defaultFormat);
    const sections = plan["content_structure"];
    const sectionCount = Array.isArray(sections) ? sections.length : 0;

    if (!Array.isArray(sections) || !Number.isInteger(index) || index < 0 || index >= sectionCount) {
      throw new SectionIndexError(index, sectionCount);
    }

    const issueCount = this.reportIssues(plan);
    const model = buildContentModel({ title: plan["title"], section: sections[index] });

    this.logger.debug("Generating section", {
      format: adapter.format,
      template: adapter.sectionTemplate,
      index,
    });

    return this.renderWith(adapter, adapter.sectionTemplate, model, issueCount, options.outputPath);
  }
}
