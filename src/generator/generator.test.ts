/**
 * Document generator tests.
 *
 * Run: node --import tsx src/generator/generator.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { DocumentGenerator, SectionIndexError, defaultOutputPath } from "./document-generator.js";
import { UnknownFormatError } from "../adapters/index.js";
import { BUILTIN_TEMPLATES_DIR } from "../config/index.js";
import { TemplateLoader } from "../templates/index.js";
import type { Logger } from "../logging/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

interface LogRecord {
  level: string;
  message: string;
}

function createRecordingLogger(records: LogRecord[]): Logger {
  const logger: Logger = {
    debug: (message) => records.push({ level: "debug", message }),
    info: (message) => records.push({ level: "info", message }),
    warn: (message) => records.push({ level: "warn", message }),
    error: (message) => records.push({ level: "error", message }),
    child: () => logger,
  };
  return logger;
}

const TEST_DIR = join(tmpdir(), `docplan-generator-${Date.now()}`);
const USER_DIR = join(TEST_DIR, "user-templates");

function cleanup(): void {
  try {
    rmSync(TEST_DIR, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

mkdirSync(TEST_DIR, { recursive: true });

const PLAN = {
  title: "Guide",
  content_structure: [{ title: "A", purpose: "P", key_points: ["k1", "k2"] }],
};

const loader = new TemplateLoader({ builtinDir: BUILTIN_TEMPLATES_DIR });

// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════

section("generate()");

test("renders markdown by default", () => {
  const generator = new DocumentGenerator({ loader });
  const result = generator.generate(PLAN);
  assert.equal(result.text, "# Guide\n\n## A\n\nP\n\n- k1\n- k2\n\n");
  assert.equal(result.format, "markdown");
  assert.equal(result.templateName, "document-markdown");
  assert.equal(result.issueCount, 0);
  assert.equal(result.outputPath, undefined);
});

test("renders the requested format", () => {
  const generator = new DocumentGenerator({ loader });
  const result = generator.generate(PLAN, { format: "docbook" });
  assert.equal(result.format, "docbook");
  assert.equal(result.templateName, "document-docbook");
  assert.ok(result.text.includes("<title>Guide</title>"));
});

test("uses the configured default format", () => {
  const generator = new DocumentGenerator({ loader, defaultFormat: "docbook" });
  assert.equal(generator.generate({}).format, "docbook");
});

test("rejects unknown formats", () => {
  const generator = new DocumentGenerator({ loader });
  assert.throws(() => generator.generate(PLAN, { format: "pdf" }), UnknownFormatError);
});

test("writes the document when an output path is given", () => {
  const records: LogRecord[] = [];
  const generator = new DocumentGenerator({ loader, logger: createRecordingLogger(records) });
  const outputPath = join(TEST_DIR, "out", "guide.md");

  const result = generator.generate(PLAN, { outputPath });

  assert.equal(result.outputPath, outputPath);
  assert.equal(readFileSync(outputPath, "utf-8"), result.text);
  assert.ok(
    records.some((r) => r.level === "info" && r.message === `Document saved to ${outputPath}`)
  );
});

test("renders plans with shape issues and reports them", () => {
  const records: LogRecord[] = [];
  const generator = new DocumentGenerator({ loader, logger: createRecordingLogger(records) });

  const result = generator.generate({ title: 5, content_structure: "not a list" });

  assert.equal(result.text, "# 5\n\n");
  assert.equal(result.issueCount, 2);
  const warning = records.find((r) => r.level === "warn");
  assert.ok(warning);
  assert.ok(warning.message.startsWith("Content plan has 2 shape issue(s)"));
  assert.ok(warning.message.includes("  - title: "));
  assert.ok(warning.message.includes("  - content_structure: "));
});

test("user templates replace built-in ones", () => {
  mkdirSync(USER_DIR, { recursive: true });
  writeFileSync(join(USER_DIR, "document-markdown.txt"), "Custom: {title}");
  const generator = new DocumentGenerator({
    loader: new TemplateLoader({ builtinDir: BUILTIN_TEMPLATES_DIR, userDir: USER_DIR }),
  });
  assert.equal(generator.generate(PLAN).text, "Custom: Guide");
});

// ═══════════════════════════════════════════════════════════════════════════
// SECTIONS
// ═══════════════════════════════════════════════════════════════════════════

section("generateSection()");

test("renders one section", () => {
  const generator = new DocumentGenerator({ loader });
  const result = generator.generateSection(PLAN, 0);
  assert.equal(result.text, "## A\n\nP\n\n- k1\n- k2\n\n");
  assert.equal(result.templateName, "section-markdown");
});

test("renders a section as DocBook", () => {
  const generator = new DocumentGenerator({ loader });
  const result = generator.generateSection(PLAN, 0, { format: "docbook" });
  assert.ok(result.text.startsWith("<section>\n  <title>A</title>\n  <para>P</para>\n"));
});

test("rejects indices past the last section", () => {
  const generator = new DocumentGenerator({ loader });
  assert.throws(
    () => generator.generateSection(PLAN, 1),
    (err: unknown) => {
      assert.ok(err instanceof SectionIndexError);
      assert.equal(err.message, "Invalid section index: 1 (content plan has 1 section(s))");
      return true;
    }
  );
});

test("rejects negative and fractional indices", () => {
  const generator = new DocumentGenerator({ loader });
  assert.throws(() => generator.generateSection(PLAN, -1), SectionIndexError);
  assert.throws(() => generator.generateSection(PLAN, 0.5), SectionIndexError);
});

test("rejects any index when the plan has no sections", () => {
  const generator = new DocumentGenerator({ loader });
  assert.throws(
    () => generator.generateSection({ title: "T" }, 0),
    (err: unknown) => {
      assert.ok(err instanceof SectionIndexError);
      assert.equal(err.sectionCount, 0);
      return true;
    }
  );
});

test("writes a section when an output path is given", () => {
  const generator = new DocumentGenerator({ loader });
  const outputPath = join(TEST_DIR, "section.md");
  generator.generateSection(PLAN, 0, { outputPath });
  assert.ok(existsSync(outputPath));
});

// ═══════════════════════════════════════════════════════════════════════════
// OUTPUT PATHS
// ═══════════════════════════════════════════════════════════════════════════

section("defaultOutputPath()");

test("swaps the plan extension for the format's", () => {
  assert.equal(defaultOutputPath(join("plans", "guide.json"), "markdown"), join("plans", "guide.md"));
  assert.equal(defaultOutputPath(join("plans", "guide.json"), "docbook"), join("plans", "guide.xml"));
});

test("adds an extension to plans without one", () => {
  assert.equal(defaultOutputPath("guide", "markdown"), "guide.md");
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

cleanup();

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
