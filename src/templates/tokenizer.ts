/**
 * Template tokenizer.
 *
 * Splits template source into literal text and markers:
 *
 *   {path.to.field}          — interpolation
 *   {for item in path}       — loop opener
 *   {endfor}                 — loop terminator
 *   {if path}                — conditional opener
 *   {endif}                  — conditional terminator
 *
 * Whitespace inside the braces is ignored. A `{` that does not start one
 * of these markers is literal text, so JSON snippets, code samples and
 * tag-based markup pass through untouched. Keywords cannot be used as
 * paths or loop variable names; `{if}` on its own is literal text.
 *
 * Block markers that sit alone on their line are "standalone": the line's
 * indentation and line break are dropped along with the marker so that
 * templates can put each block marker on its own line without leaving
 * blank lines in the output.
 */

export type TokenKind = "text" | "reference" | "for" | "endfor" | "if" | "endif";

interface TokenPosition {
  /** Offset of the first character in the source. */
  readonly offset: number;
  /** 1-based line number. */
  readonly line: number;
  /** 1-based column number. */
  readonly column: number;
}

export interface TextToken extends TokenPosition {
  readonly kind: "text";
  readonly text: string;
}

export interface ReferenceToken extends TokenPosition {
  readonly kind: "reference";
  readonly path: string;
  readonly raw: string;
}

export interface ForToken extends TokenPosition {
  readonly kind: "for";
  readonly binding: string;
  readonly path: string;
  readonly raw: string;
}

export interface IfToken extends TokenPosition {
  readonly kind: "if";
  readonly path: string;
  readonly raw: string;
}

export interface EndToken extends TokenPosition {
  readonly kind: "endfor" | "endif";
  readonly raw: string;
}

export type Token = TextToken | ReferenceToken | ForToken | IfToken | EndToken;
export type BlockToken = ForToken | IfToken | EndToken;

// ---------------------------------------------------------------------------
// Marker patterns (sticky: matched only at the current `{`)
// ---------------------------------------------------------------------------

const IDENT = "[A-Za-z_][A-Za-z0-9_]*";
const PATH = `${IDENT}(?:\\.${IDENT})*`;

const FOR_RE = new RegExp(`\\{\\s*for\\s+(${IDENT})\\s+in\\s+(${PATH})\\s*\\}`, "y");
const IF_RE = new RegExp(`\\{\\s*if\\s+(${PATH})\\s*\\}`, "y");
const ENDFOR_RE = /\{\s*endfor\s*\}/y;
const ENDIF_RE = /\{\s*endif\s*\}/y;
const REFERENCE_RE = new RegExp(`\\{\\s*(${PATH})\\s*\\}`, "y");

const KEYWORDS: ReadonlySet<string> = new Set(["for", "in", "if", "endfor", "endif"]);

function isKeywordFree(path: string): boolean {
  return !path.split(".").some((segment) => KEYWORDS.has(segment));
}

// ---------------------------------------------------------------------------
// Positions
// ---------------------------------------------------------------------------

function lineStarts(source: string): number[] {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source.charCodeAt(i) === 10) {
      starts.push(i + 1);
    }
  }
  return starts;
}

function positionAt(starts: readonly number[], offset: number): TokenPosition {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if ((starts[mid] ?? 0) <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return { offset, line: low + 1, column: offset - (starts[low] ?? 0) + 1 };
}

// ---------------------------------------------------------------------------
// Marker matching
// ---------------------------------------------------------------------------

function execAt(re: RegExp, source: string, offset: number): RegExpExecArray | null {
  re.lastIndex = offset;
  return re.exec(source);
}

function matchMarker(
  source: string,
  offset: number,
  position: TokenPosition
): Exclude<Token, TextToken> | null {
  let match = execAt(ENDFOR_RE, source, offset);
  if (match) {
    return { ...position, kind: "endfor", raw: match[0] };
  }

  match = execAt(ENDIF_RE, source, offset);
  if (match) {
    return { ...position, kind: "endif", raw: match[0] };
  }

  match = execAt(FOR_RE, source, offset);
  if (match) {
    const [raw, binding = "", path = ""] = match;
    if (!KEYWORDS.has(binding) && isKeywordFree(path)) {
      return { ...position, kind: "for", binding, path, raw };
    }
    return null;
  }

  match = execAt(IF_RE, source, offset);
  if (match) {
    const [raw, path = ""] = match;
    if (isKeywordFree(path)) {
      return { ...position, kind: "if", path, raw };
    }
    return null;
  }

  match = execAt(REFERENCE_RE, source, offset);
  if (match) {
    const [raw, path = ""] = match;
    if (isKeywordFree(path)) {
      return { ...position, kind: "reference", path, raw };
    }
  }

  return null;
}

// ---------------------------------------------------------------------------
// Standalone block markers
// ---------------------------------------------------------------------------

const LINE_TAIL_RE = /(^|\n)[ \t]*$/;
const LINE_HEAD_RE = /^[ \t]*(\r?\n|$)/;

function isBlockToken(token: Token): token is BlockToken {
  return token.kind !== "text" && token.kind !== "reference";
}

function startsLine(tokens: readonly Token[], index: number): boolean {
  const prev = tokens[index - 1];
  if (prev === undefined) return true;
  if (prev.kind !== "text") return false;
  return LINE_TAIL_RE.test(prev.text) && (prev.text.includes("\n") || index - 1 === 0);
}

function endsLine(tokens: readonly Token[], index: number): boolean {
  const next = tokens[index + 1];
  if (next === undefined) return true;
  if (next.kind !== "text") return false;
  const match = LINE_HEAD_RE.exec(next.text);
  if (!match) return false;
  // no line break after the marker: only standalone at end of source
  return match[1] !== "" || index + 1 === tokens.length - 1;
}

function stripStandaloneLines(tokens: readonly Token[]): Token[] {
  const trimTail = new Set<number>();
  const trimHead = new Set<number>();

  tokens.forEach((token, index) => {
    if (isBlockToken(token) && startsLine(tokens, index) && endsLine(tokens, index)) {
      trimTail.add(index - 1);
      trimHead.add(index + 1);
    }
  });

  const result: Token[] = [];
  tokens.forEach((token, index) => {
    if (token.kind !== "text") {
      result.push(token);
      return;
    }
    let text = token.text;
    if (trimHead.has(index)) text = text.replace(/^[ \t]*\r?\n?/, "");
    if (trimTail.has(index)) text = text.replace(/[ \t]*$/, "");
    if (text !== "") {
      result.push({ ...token, text });
    }
  });
  return result;
}

// ---------------------------------------------------------------------------
// Tokenize
// ---------------------------------------------------------------------------

/**
 * Split template source into tokens. Never fails: anything that is not a
 * marker is text. Structural checks happen in the parser.
 */
export function tokenize(source: string): Token[] {
  const starts = lineStarts(source);
  const tokens: Token[] = [];
  let textStart = 0;
  let cursor = 0;

  const pushText = (end: number): void => {
    if (end > textStart) {
      tokens.push({
        ...positionAt(starts, textStart),
        kind: "text",
        text: source.slice(textStart, end),
      });
    }
  };

  while (cursor < source.length) {
    const brace = source.indexOf("{", cursor);
    if (brace === -1) break;

    const marker = matchMarker(source, brace, positionAt(starts, brace));
    if (marker === null) {
      cursor = brace + 1;
      continue;
    }

    pushText(brace);
    tokens.push(marker);
    cursor = textStart = brace + marker.raw.length;
  }

  pushText(source.length);
  return stripStandaloneLines(tokens);
}
