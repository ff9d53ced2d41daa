import { ProfileErrorCode, ProfileParseError, formatExpected } from "../errors.js";
import { createSpan, endOfInputSpan, spanText } from "./span.js";
import type { Span } from "./span.js";
import { describeToken, keywordFor } from "./tokens.js";
import type { ProfileToken, ProfileTokenKind } from "./tokens.js";

const ID_START = /^[-_\p{ID_Start}]$/u;
const ID_CONTINUE = /^[-_\p{ID_Continue}]$/u;
const HEX_DIGIT = /^[0-9a-fA-F]$/;
const MAX_HEX_DIGITS = 6;

const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['"', '"'],
  ["'", "'"],
  ["\\", "\\"],
  ["n", "\n"],
  ["r", "\r"],
  ["t", "\t"],
]);

const TOKEN_START = "whitespace, a comment, an identifier, or a string";

interface Decoded {
  /** Offset just past the decoded text. */
  readonly end: number;
  readonly value: string;
}

/**
 * Cursor over a profile source that produces tokens on demand.
 *
 * A tokenizer is only an offset into an immutable string, so lookahead is done
 * by cloning it, reading from the clone and calling `commit` once the caller
 * decides to keep what the clone consumed.
 */
export class Tokenizer {
  private position: number;

  constructor(private readonly source: string, position = 0) {
    this.position = position;
  }

  get offset(): number {
    return this.position;
  }

  clone(): Tokenizer {
    return new Tokenizer(this.source, this.position);
  }

  /** Moves this cursor to where `lookahead`, a clone of it, currently stands. */
  commit(lookahead: Tokenizer): void {
    this.position = lookahead.position;
  }

  /** Next token with whitespace and comments skipped. */
  next(): ProfileToken | undefined {
    let token = this.nextRaw();
    while (token !== undefined && isTrivia(token.kind)) {
      token = this.nextRaw();
    }
    return token;
  }

  nextRaw(): ProfileToken | undefined {
    const start = this.position;
    const ch = this.charAt(start);
    if (ch === undefined) {
      return undefined;
    }

    let kind: ProfileTokenKind;
    let end: number;
    if (isWhitespace(ch)) {
      end = this.skipWhile(start, isWhitespace);
      kind = "whitespace";
    } else if (ch === "/") {
      end = this.scanComment(start);
      kind = "comment";
    } else if (ch === '"') {
      end = this.decodeString(start).end;
      kind = "strlit";
    } else if (ID_START.test(ch)) {
      end = this.skipWhile(start + ch.length, (c) => ID_CONTINUE.test(c));
      kind = keywordFor(this.source.slice(start, end)) ?? "id";
    } else {
      throw unexpectedCharacter(start, ch);
    }

    this.position = end;
    return { kind, span: createSpan(start, end) };
  }

  /**
   * Consumes the next significant token if it has the given kind. On a
   * mismatch nothing is consumed.
   */
  expect(kind: ProfileTokenKind): Span {
    const lookahead = this.clone();
    const token = lookahead.next();
    if (token === undefined || token.kind !== kind) {
      throw this.formatExpectedError(describeToken(kind), token);
    }
    this.commit(lookahead);
    return token.span;
  }

  getSpan(span: Span): string {
    return spanText(this.source, span);
  }

  /** Decoded contents of the string literal that `span` covers exactly. */
  parseStr(span: Span): string {
    if (this.source.charAt(span.start) !== '"') {
      const found = new Tokenizer(this.source, span.start).nextRaw();
      throw this.formatExpectedError(describeToken("strlit"), found);
    }
    const literal = this.decodeString(span.start);
    if (literal.end !== span.end) {
      throw new RangeError(
        `Span ${span.start}..${span.end} does not cover the string literal at ${span.start}..${literal.end}`
      );
    }
    return literal.value;
  }

  formatExpectedError(expected: string, found: ProfileToken | undefined): ProfileParseError {
    if (found === undefined) {
      return new ProfileParseError(
        ProfileErrorCode.UnexpectedEnd,
        formatExpected(expected, "eof"),
        endOfInputSpan(this.source)
      );
    }
    return new ProfileParseError(
      ProfileErrorCode.UnexpectedToken,
      formatExpected(expected, describeToken(found.kind)),
      found.span
    );
  }

  private charAt(offset: number): string | undefined {
    const codePoint = this.source.codePointAt(offset);
    return codePoint === undefined ? undefined : String.fromCodePoint(codePoint);
  }

  private skipWhile(offset: number, predicate: (ch: string) => boolean): number {
    let pos = offset;
    let ch = this.charAt(pos);
    while (ch !== undefined && predicate(ch)) {
      pos += ch.length;
      ch = this.charAt(pos);
    }
    return pos;
  }

  private scanComment(start: number): number {
    const marker = this.source.charAt(start + 1);
    if (marker === "/") {
      let pos = start + 2;
      while (pos < this.source.length && !isLineBreak(this.source.charAt(pos))) {
        pos += 1;
      }
      return pos;
    }
    if (marker !== "*") {
      throw unexpectedCharacter(start, "/");
    }

    // Block comments nest.
    let depth = 1;
    let pos = start + 2;
    while (depth > 0) {
      if (pos >= this.source.length) {
        throw new ProfileParseError(
          ProfileErrorCode.UnterminatedComment,
          formatExpected("`*/`", "eof"),
          createSpan(start, this.source.length)
        );
      }
      if (this.source.startsWith("*/", pos)) {
        depth -= 1;
        pos += 2;
      } else if (this.source.startsWith("/*", pos)) {
        depth += 1;
        pos += 2;
      } else {
        pos += 1;
      }
    }
    return pos;
  }

  private decodeString(start: number): Decoded {
    let value = "";
    let pos = start + 1;
    for (;;) {
      const ch = this.charAt(pos);
      if (ch === undefined) {
        throw new ProfileParseError(
          ProfileErrorCode.UnterminatedString,
          formatExpected('closing `"`', "eof"),
          createSpan(start, this.source.length)
        );
      }
      if (ch === '"') {
        return { end: pos + 1, value };
      }
      if (ch === "\\") {
        const escape = this.decodeEscape(start, pos);
        value += escape.value;
        pos = escape.end;
      } else {
        value += ch;
        pos += ch.length;
      }
    }
  }

  private decodeEscape(literalStart: number, backslash: number): Decoded {
    const ch = this.charAt(backslash + 1);
    if (ch === undefined) {
      throw new ProfileParseError(
        ProfileErrorCode.UnterminatedString,
        formatExpected('closing `"`', "eof"),
        createSpan(literalStart, this.source.length)
      );
    }

    const simple = SIMPLE_ESCAPES.get(ch);
    if (simple !== undefined) {
      return { end: backslash + 2, value: simple };
    }
    if (ch !== "u") {
      throw this.invalidEscape(backslash, backslash + 1 + ch.length);
    }

    // \u{XXXXXX}
    const open = backslash + 2;
    if (this.source.charAt(open) !== "{") {
      throw this.invalidEscape(backslash, open);
    }
    let pos = open + 1;
    while (HEX_DIGIT.test(this.source.charAt(pos))) {
      pos += 1;
    }
    const digits = this.source.slice(open + 1, pos);
    if (this.source.charAt(pos) !== "}" || digits.length === 0 || digits.length > MAX_HEX_DIGITS) {
      throw this.invalidEscape(backslash, pos + 1);
    }

    const codePoint = Number.parseInt(digits, 16);
    if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      throw this.invalidEscape(backslash, pos + 1);
    }
    return { end: pos + 1, value: String.fromCodePoint(codePoint) };
  }

  private invalidEscape(start: number, end: number): ProfileParseError {
    const span = createSpan(start, Math.min(end, this.source.length));
    return new ProfileParseError(
      ProfileErrorCode.InvalidEscape,
      formatExpected("an escape sequence", `\`${spanText(this.source, span)}\``),
      span
    );
  }
}

function unexpectedCharacter(start: number, ch: string): ProfileParseError {
  return new ProfileParseError(
    ProfileErrorCode.UnexpectedCharacter,
    formatExpected(TOKEN_START, `character ${JSON.stringify(ch)}`),
    createSpan(start, start + ch.length)
  );
}

function isTrivia(kind: ProfileTokenKind): boolean {
  return kind === "whitespace" || kind === "comment";
}

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || isLineBreak(ch);
}

function isLineBreak(ch: string): boolean {
  return ch === "\n" || ch === "\r";
}
