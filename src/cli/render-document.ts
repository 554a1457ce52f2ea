#!/usr/bin/env node
/**
 * CLI tool to render a content plan into documentation.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Render a plan (writes plan.md next to plan.json):
 *   npm run render-document -- --plan plans/queues.json
 *
 * Render DocBook to stdout:
 *   npm run render-document -- --plan plans/queues.json --format docbook --stdout
 *
 * Render one section:
 *   npm run render-document -- --plan plans/queues.json --section 2
 *
 * Check a template for syntax errors:
 *   npm run render-document -- --check document-markdown
 *
 * Options:
 *   --plan <path>             Content plan (JSON, or raw model output)
 *   --format <name>           Output format (default: DOCPLAN_OUTPUT_FORMAT or markdown)
 *   --output <path>           Output file (default: plan path with the format's extension)
 *   --section <index>         Render only content_structure[index]
 *   --stdout                  Print the document instead of writing a file
 *   --templates <dir>         Built-in template directory
 *   --user-templates <dir>    User template directory
 *   --list-templates          List available templates
 *   --check <template>        Parse a template and report syntax errors
 *   --no-color                Disable ANSI colors
 *   --json                    Output as JSON
 *   -h, --help                Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (missing plan, unknown format, template error, bad section)
 */

import { parseArgs } from "node:util";

import { config, validateConfig, configuredLogLevel } from "../config/index.js";
import { getAdapter, listFormats } from "../adapters/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import { loadContentPlan } from "../plan/index.js";
import {
  TemplateCache,
  TemplateLoader,
  TemplateSyntaxError,
} from "../templates/index.js";
import {
  DocumentGenerator,
  defaultOutputPath,
  type GeneratedDocument,
} from "../generator/index.js";

// ============================================================
// Types
// ============================================================

export interface RenderCommandOptions {
  planPath: string;
  format: string;
  outputPath?: string;
  section?: number;
  toStdout: boolean;
}

export interface TemplateCheckResult {
  name: string;
  valid: boolean;
  path?: string;
  paths: readonly string[];
  error?: string;
}

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: render-document [options]

  npm run render-document -- --plan <path> [--format <name>] [--output <path>]
  npm run render-document -- --plan <path> --section <index> [--format <name>]
  npm run render-document -- --list-templates
  npm run render-document -- --check <template>

Options:
  --plan <path>             Content plan (JSON, or raw model output)
  --format <name>           Output format: ${listFormats().join(", ")}
  --output <path>           Output file (default: plan path with the format's extension)
  --section <index>         Render only content_structure[index]
  --stdout                  Print the document instead of writing a file
  --templates <dir>         Built-in template directory
  --user-templates <dir>    User template directory
  --list-templates          List available templates
  --check <template>        Parse a template and report syntax errors
  --no-color                Disable ANSI colors
  --json                    Output as JSON
  -h, --help                Show this help message

Exit codes:
  0 - Success
  1 - Error
`;

export function parseCliArgs(args: string[] = process.argv.slice(2)) {
  const { values } = parseArgs({
    args,
    options: {
      plan: { type: "string" },
      format: { type: "string" },
      output: { type: "string" },
      section: { type: "string" },
      stdout: { type: "boolean", default: false },
      templates: { type: "string" },
      "user-templates": { type: "string" },
      "list-templates": { type: "boolean", default: false },
      check: { type: "string" },
      "no-color": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

/**
 * Parse a --section value. Only non-negative integers are accepted.
 */
export function parseSectionIndex(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`--section must be a non-negative integer, got: ${value}`);
  }
  return parseInt(value, 10);
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

let useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

// ============================================================
// Commands
// ============================================================

/**
 * Render a plan according to the command options.
 */
export function runRenderCommand(
  generator: DocumentGenerator,
  options: RenderCommandOptions
): GeneratedDocument {
  getAdapter(options.format);
  const plan = loadContentPlan(options.planPath);

  let outputPath: string | undefined;
  if (!options.toStdout) {
    outputPath =
      options.outputPath ??
      (options.section === undefined
        ? defaultOutputPath(options.planPath, options.format)
        : undefined);
  }

  return options.section === undefined
    ? generator.generate(plan, { format: options.format, outputPath })
    : generator.generateSection(plan, options.section, { format: options.format, outputPath });
}

/**
 * Parse a template and report whether it is well-formed.
 * Syntax errors are reported in the result; load errors propagate.
 */
export function checkTemplate(loader: TemplateLoader, name: string): TemplateCheckResult {
  const path = loader.locate(name);
  try {
    const template = loader.load(path);
    return { name, valid: true, path, paths: template.paths };
  } catch (err) {
    if (err instanceof TemplateSyntaxError) {
      return { name, valid: false, path, paths: [], error: err.message };
    }
    throw err;
  }
}

// ============================================================
// Main
// ============================================================

/**
 * Write a rendered document as is; the text already ends the way its
 * template does.
 */
export function printDocument(
  text: string,
  out: { write(chunk: string): unknown } = process.stdout
): void {
  out.write(text);
}

function printDocumentSummary(result: GeneratedDocument): void {
  console.error(c("green", `Rendered ${result.format} document with template ${result.templateName}`));
  if (result.outputPath !== undefined) {
    console.error(`  ${c("cyan", "Output:")}      ${result.outputPath}`);
  }
  console.error(`  ${c("cyan", "Characters:")}  ${result.text.length}`);
  if (result.issueCount > 0) {
    console.error(c("dim", `  ${result.issueCount} plan issue(s) logged as warnings`));
  }
}

function main(logger: Logger): number {
  const args = parseCliArgs();

  if (args.help) {
    console.log(HELP);
    return 0;
  }

  if (args["no-color"]) {
    useColors = false;
  }

  const loader = new TemplateLoader({
    builtinDir: args.templates ?? config.templatesDir,
    userDir: args["user-templates"] ?? config.userTemplatesDir,
    cache: new TemplateCache(),
  });

  if (args["list-templates"]) {
    const templates = loader.list();
    if (args.json) {
      console.log(JSON.stringify({ mode: "list-templates", templates: Object.fromEntries(templates) }, null, 2));
    } else if (templates.size === 0) {
      console.log(c("dim", "No templates found."));
    } else {
      for (const [name, path] of templates) {
        console.log(`  ${c("bold", name.padEnd(24))} ${c("dim", path)}`);
      }
    }
    return 0;
  }

  if (args.check !== undefined) {
    const result = checkTemplate(loader, args.check);
    if (args.json) {
      console.log(JSON.stringify({ mode: "check", ...result }, null, 2));
    } else if (result.valid) {
      console.log(c("green", `${result.name}: OK`) + c("dim", ` (${result.paths.length} path(s))`));
      for (const path of result.paths) {
        console.log(`  ${path}`);
      }
    } else {
      console.error(c("red", result.error ?? `${result.name}: invalid`));
    }
    return result.valid ? 0 : 1;
  }

  if (args.plan === undefined) {
    console.error(c("red", "Error: --plan is required"));
    console.error("  Usage: npm run render-document -- --plan <path> [--format <name>]");
    return 1;
  }

  const generator = new DocumentGenerator({
    loader,
    logger: logger.child("generator"),
    defaultFormat: config.defaultOutputFormat,
  });

  const result = runRenderCommand(generator, {
    planPath: args.plan,
    format: args.format ?? config.defaultOutputFormat,
    outputPath: args.output,
    section: args.section !== undefined ? parseSectionIndex(args.section) : undefined,
    toStdout: args.stdout,
  });

  if (args.json) {
    console.log(JSON.stringify({ mode: "render", ...result }, null, 2));
  } else if (result.outputPath === undefined) {
    printDocument(result.text);
  } else {
    printDocumentSummary(result);
  }

  return 0;
}

// Only run when executed directly (not imported by tests)
// (the npm bin link has no extension)
const isDirectExecution = /render-document(\.ts|\.js)?$/.test(process.argv[1] ?? "");

if (isDirectExecution) {
  const runId = initRunId();
  try {
    validateConfig();
    const logger = createLogger({
      level: configuredLogLevel(),
      logDir: config.logDir,
      scope: "render-document",
    });
    logger.debug("Starting", { runId, env: config.env });
    process.exit(main(logger));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    process.exit(1);
  }
}
