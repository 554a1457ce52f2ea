/**
 * Content model.
 *
 * A content plan arrives as loosely-typed JSON. Before rendering it is
 * converted into a tree of tagged values so that every lookup has exactly
 * four outcomes:
 *
 *   absent    — missing field, null, or a path walked through a non-record
 *   scalar    — text (numbers and booleans are converted to their text form)
 *   record    — named fields, insertion order preserved
 *   sequence  — ordered items
 *
 * Lookups never throw. Absence propagates through the rest of a path.
 */

export interface AbsentValue {
  readonly kind: "absent";
}

export interface ScalarValue {
  readonly kind: "scalar";
  readonly text: string;
}

export interface RecordValue {
  readonly kind: "record";
  readonly fields: ReadonlyMap<string, ContentValue>;
}

export interface SequenceValue {
  readonly kind: "sequence";
  readonly items: readonly ContentValue[];
}

export type ContentValue = AbsentValue | ScalarValue | RecordValue | SequenceValue;

/** The root of a content plan. */
export type ContentModel = RecordValue;

const absent: AbsentValue = { kind: "absent" };
export const ABSENT = Object.freeze(absent);

export function scalar(text: string): ScalarValue {
  const value: ScalarValue = { kind: "scalar", text };
  return Object.freeze(value);
}

export function record(fields: Iterable<readonly [string, ContentValue]>): RecordValue {
  const value: RecordValue = { kind: "record", fields: new Map(fields) };
  return Object.freeze(value);
}

export function sequence(items: Iterable<ContentValue>): SequenceValue {
  const value: SequenceValue = { kind: "sequence", items: Object.freeze([...items]) };
  return Object.freeze(value);
}

/**
 * Convert an arbitrary JSON-like value into a content value.
 */
export function toContentValue(input: unknown): ContentValue {
  if (input === null || input === undefined) {
    return ABSENT;
  }
  if (typeof input === "string") {
    return scalar(input);
  }
  if (typeof input === "number" || typeof input === "boolean" || typeof input === "bigint") {
    return scalar(String(input));
  }
  if (Array.isArray(input)) {
    return sequence(input.map((item: unknown) => toContentValue(item)));
  }
  if (typeof input === "object") {
    return record(
      Object.entries(input).map(([key, value]): [string, ContentValue] => [
        key,
        toContentValue(value),
      ])
    );
  }
  // functions and symbols have no content representation
  return ABSENT;
}

/**
 * Build the root model of a content plan. A plan that is not a JSON
 * object yields an empty model.
 */
export function buildContentModel(plan: unknown): ContentModel {
  const value = toContentValue(plan);
  return value.kind === "record" ? value : record([]);
}

/**
 * Look up one field. Anything other than a record has no fields.
 */
export function getField(value: ContentValue, name: string): ContentValue {
  if (value.kind !== "record") {
    return ABSENT;
  }
  return value.fields.get(name) ?? ABSENT;
}

/**
 * Walk a dotted path (already split into segments) from a starting value.
 */
export function resolvePath(start: ContentValue, segments: readonly string[]): ContentValue {
  let current = start;
  for (const segment of segments) {
    current = getField(current, segment);
    if (current.kind === "absent") {
      return current;
    }
  }
  return current;
}

/**
 * Truthiness used by conditional blocks: non-empty text, a sequence with
 * at least one item, or a record with at least one field.
 */
export function isTruthy(value: ContentValue): boolean {
  switch (value.kind) {
    case "absent":
      return false;
    case "scalar":
      return value.text !== "";
    case "record":
      return value.fields.size > 0;
    case "sequence":
      return value.items.length > 0;
  }
}

/**
 * Convert a content value back into plain JSON (absent becomes undefined).
 */
export function toPlainValue(value: ContentValue): unknown {
  switch (value.kind) {
    case "absent":
      return undefined;
    case "scalar":
      return value.text;
    case "sequence":
      return value.items.map(toPlainValue);
    case "record": {
      const out: Record<string, unknown> = {};
      for (const [key, field] of value.fields) {
        const plain = toPlainValue(field);
        if (plain !== undefined) {
          out[key] = plain;
        }
      }
      return out;
    }
  }
}
