/**
 * Content plan tests.
 *
 * Run: node --import tsx src/plan/plan.test.ts
 *
 * Tests cover:
 *   1. Content model — conversion, lookup, truthiness
 *   2. Plan files — load, save, update, raw content
 *   3. Inspection — advisory schema issues
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  ABSENT,
  buildContentModel,
  getField,
  isTruthy,
  record,
  resolvePath,
  scalar,
  sequence,
  toContentValue,
  toPlainValue,
} from "./model.js";
import {
  ContentPlanLoadError,
  formatPlanIssues,
  inspectContentPlan,
  loadContentPlan,
  parseContentPlan,
  saveContentPlan,
  updateContentPlan,
} from "./loader.js";

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

const TEST_DIR = join(tmpdir(), `docplan-plans-${Date.now()}`);

function cleanup(): void {
  try {
    rmSync(TEST_DIR, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

mkdirSync(TEST_DIR, { recursive: true });

// ═══════════════════════════════════════════════════════════════════════════
// CONTENT MODEL
// ═══════════════════════════════════════════════════════════════════════════

section("Content Model — Conversion");

test("strings become scalars", () => {
  assert.deepEqual(toContentValue("abc"), { kind: "scalar", text: "abc" });
});

test("numbers and booleans become their text", () => {
  assert.deepEqual(toContentValue(42), { kind: "scalar", text: "42" });
  assert.deepEqual(toContentValue(1.5), { kind: "scalar", text: "1.5" });
  assert.deepEqual(toContentValue(true), { kind: "scalar", text: "true" });
});

test("null and undefined are absent", () => {
  assert.equal(toContentValue(null), ABSENT);
  assert.equal(toContentValue(undefined), ABSENT);
});

test("arrays become sequences in order", () => {
  const value = toContentValue(["a", "b"]);
  assert.ok(value.kind === "sequence");
  assert.deepEqual(value.items, [scalar("a"), scalar("b")]);
});

test("objects become records preserving key order", () => {
  const value = toContentValue({ b: "2", a: "1" });
  assert.ok(value.kind === "record");
  assert.deepEqual([...value.fields.keys()], ["b", "a"]);
});

test("a non-object plan yields an empty model", () => {
  assert.equal(buildContentModel("text").fields.size, 0);
  assert.equal(buildContentModel(["a"]).fields.size, 0);
  assert.equal(buildContentModel(null).fields.size, 0);
});

test("converted values are frozen", () => {
  const model = buildContentModel({ items: ["a"] });
  assert.ok(Object.isFrozen(model));
  const items = getField(model, "items");
  assert.ok(items.kind === "sequence");
  assert.ok(Object.isFrozen(items.items));
});

section("Content Model — Lookup");

const MODEL = buildContentModel({
  title: "Doc",
  overview: { summary: "Sum" },
  sections: [{ title: "One" }],
});

test("resolvePath() walks nested records", () => {
  assert.deepEqual(resolvePath(MODEL, ["overview", "summary"]), scalar("Sum"));
});

test("resolvePath() with no segments returns the start value", () => {
  assert.equal(resolvePath(MODEL, []), MODEL);
});

test("resolvePath() through a scalar is absent", () => {
  assert.equal(resolvePath(MODEL, ["title", "length"]), ABSENT);
});

test("resolvePath() through a sequence is absent", () => {
  assert.equal(resolvePath(MODEL, ["sections", "title"]), ABSENT);
});

test("resolvePath() of a missing field is absent", () => {
  assert.equal(resolvePath(MODEL, ["missing", "deeper", "still"]), ABSENT);
});

test("getField() on non-records is absent", () => {
  assert.equal(getField(scalar("x"), "x"), ABSENT);
  assert.equal(getField(ABSENT, "x"), ABSENT);
});

section("Content Model — Truthiness");

test("absent is false", () => {
  assert.equal(isTruthy(ABSENT), false);
});

test("scalars are true unless empty", () => {
  assert.equal(isTruthy(scalar("")), false);
  assert.equal(isTruthy(scalar(" ")), true);
  assert.equal(isTruthy(scalar("0")), true);
});

test("sequences are true with at least one item", () => {
  assert.equal(isTruthy(sequence([])), false);
  assert.equal(isTruthy(sequence([ABSENT])), true);
});

test("records are true with at least one field", () => {
  assert.equal(isTruthy(record([])), false);
  assert.equal(isTruthy(record([["a", scalar("1")]])), true);
});

section("Content Model — Plain Values");

test("toPlainValue() reverses conversion", () => {
  const plan = { title: "T", items: ["a", "b"], nested: { x: "y" } };
  assert.deepEqual(toPlainValue(buildContentModel(plan)), plan);
});

test("toPlainValue() drops absent fields and stringifies numbers", () => {
  assert.deepEqual(toPlainValue(buildContentModel({ a: null, n: 7 })), { n: "7" });
});

// ═══════════════════════════════════════════════════════════════════════════
// PLAN FILES
// ═══════════════════════════════════════════════════════════════════════════

section("Plan Files — Loading");

test("loadContentPlan() reads a JSON object", () => {
  const path = join(TEST_DIR, "plan.json");
  writeFileSync(path, JSON.stringify({ title: "Doc", content_structure: [] }));
  assert.deepEqual(loadContentPlan(path), { title: "Doc", content_structure: [] });
});

test("loadContentPlan() throws for a missing file", () => {
  assert.throws(
    () => loadContentPlan(join(TEST_DIR, "nope.json")),
    (err: unknown) => {
      assert.ok(err instanceof ContentPlanLoadError);
      assert.equal(err.message, `Content plan not found: ${join(TEST_DIR, "nope.json")}`);
      return true;
    }
  );
});

test("loadContentPlan() throws for malformed .json", () => {
  const path = join(TEST_DIR, "broken.json");
  writeFileSync(path, "{ not json");
  assert.throws(
    () => loadContentPlan(path),
    (err: unknown) => {
      assert.ok(err instanceof ContentPlanLoadError);
      assert.ok(err.message.startsWith(`Content plan is not valid JSON: ${path}`));
      assert.equal(err.filePath, path);
      return true;
    }
  );
});

test("loadContentPlan() keeps non-JSON text files as raw content", () => {
  const path = join(TEST_DIR, "plan.txt");
  writeFileSync(path, "Here is a plan:\n- intro");
  assert.deepEqual(loadContentPlan(path), { raw_content: "Here is a plan:\n- intro" });
});

test("loadContentPlan() parses JSON inside non-.json files", () => {
  const path = join(TEST_DIR, "plan.out");
  writeFileSync(path, '{"title": "From text"}');
  assert.deepEqual(loadContentPlan(path), { title: "From text" });
});

test("loadContentPlan() wraps JSON that is not an object", () => {
  const path = join(TEST_DIR, "list.json");
  writeFileSync(path, "[1, 2]");
  assert.deepEqual(loadContentPlan(path), { raw_content: "[1, 2]" });
});

test("parseContentPlan() separates objects from other text", () => {
  assert.deepEqual(parseContentPlan('{"a": "b"}'), { a: "b" });
  assert.deepEqual(parseContentPlan('"just a string"'), { raw_content: '"just a string"' });
  assert.deepEqual(parseContentPlan("plain"), { raw_content: "plain" });
});

section("Plan Files — Saving and Updating");

test("saveContentPlan() writes indented JSON and creates directories", () => {
  const path = join(TEST_DIR, "out", "nested", "plan.json");
  const written = saveContentPlan({ title: "Doc" }, path);
  assert.equal(written, path);
  assert.equal(readFileSync(path, "utf-8"), '{\n  "title": "Doc"\n}');
});

test("saveContentPlan() writes raw content to non-JSON targets", () => {
  const path = join(TEST_DIR, "raw.txt");
  saveContentPlan({ raw_content: "free text" }, path);
  assert.equal(readFileSync(path, "utf-8"), "free text");
});

test("saveContentPlan() writes JSON for raw content with other fields", () => {
  const path = join(TEST_DIR, "mixed.txt");
  saveContentPlan({ raw_content: "free", title: "T" }, path);
  assert.deepEqual(JSON.parse(readFileSync(path, "utf-8")), { raw_content: "free", title: "T" });
});

test("saved plans load back unchanged", () => {
  const path = join(TEST_DIR, "again.json");
  const plan = { title: "Doc", content_structure: [{ title: "A", key_points: ["k"] }] };
  saveContentPlan(plan, path);
  assert.ok(existsSync(path));
  assert.deepEqual(loadContentPlan(path), plan);
});

test("updateContentPlan() merges top-level fields without mutating", () => {
  const plan = { title: "Old", glossary: [] };
  const updated = updateContentPlan(plan, { title: "New" });
  assert.deepEqual(updated, { title: "New", glossary: [] });
  assert.equal(plan.title, "Old");
});

// ═══════════════════════════════════════════════════════════════════════════
// INSPECTION
// ═══════════════════════════════════════════════════════════════════════════

section("Inspection");

test("a well-formed plan has no issues", () => {
  assert.deepEqual(
    inspectContentPlan({
      title: "Doc",
      overview: { summary: "S" },
      content_structure: [{ title: "A", key_points: ["k"], subsections: [{ title: "a" }] }],
      extra_field: 1,
    }),
    []
  );
});

test("an empty plan has no issues", () => {
  assert.deepEqual(inspectContentPlan({}), []);
});

test("mistyped fields are reported with their path", () => {
  const issues = inspectContentPlan({ title: 5 });
  assert.equal(issues.length, 1);
  assert.deepEqual(issues[0]?.path, ["title"]);
  assert.equal(issues[0]?.code, "invalid_type");
});

test("nested issues carry array indices", () => {
  const issues = inspectContentPlan({ content_structure: [{ title: "A" }, { key_points: "k" }] });
  assert.equal(issues.length, 1);
  assert.deepEqual(issues[0]?.path, ["content_structure", 1, "key_points"]);
});

test("formatPlanIssues() renders one line per issue", () => {
  const text = formatPlanIssues([
    { path: ["content_structure", 0, "title"], message: "Expected string", code: "invalid_type" },
    { path: [], message: "Expected object", code: "invalid_type" },
  ]);
  assert.equal(text, "  - content_structure.0.title: Expected string\n  - (root): Expected object");
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
