import { describe, expect, it } from "vitest";

import { ProfileErrorCode, ProfileParseError, Tokenizer } from "../../src/index.js";
import type { ProfileToken } from "../../src/index.js";

function rawTokens(source: string): ProfileToken[] {
  const tokens = new Tokenizer(source);
  const result: ProfileToken[] = [];
  for (let token = tokens.nextRaw(); token; token = tokens.nextRaw()) {
    result.push(token);
  }
  return result;
}

function lexError(source: string): ProfileParseError {
  try {
    rawTokens(source);
  } catch (error) {
    if (error instanceof ProfileParseError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected ${JSON.stringify(source)} to fail tokenizing`);
}

describe("Tokenizer", () => {
  it("produces raw tokens including trivia", () => {
    expect(rawTokens('extend foo // c\n"s"')).toEqual([
      { kind: "extend", span: { start: 0, end: 6 } },
      { kind: "whitespace", span: { start: 6, end: 7 } },
      { kind: "id", span: { start: 7, end: 10 } },
      { kind: "whitespace", span: { start: 10, end: 11 } },
      { kind: "comment", span: { start: 11, end: 15 } },
      { kind: "whitespace", span: { start: 15, end: 16 } },
      { kind: "strlit", span: { start: 16, end: 19 } },
    ]);
  });

  it("skips whitespace and comments in next", () => {
    const tokens = new Tokenizer('extend foo // c\n"s"');

    expect(tokens.next()?.kind).toBe("extend");
    expect(tokens.next()?.kind).toBe("id");
    expect(tokens.next()?.kind).toBe("strlit");
    expect(tokens.next()).toBeUndefined();
  });

  it("peeks through a clone without moving the original", () => {
    const tokens = new Tokenizer("  provide x");
    const lookahead = tokens.clone();

    expect(lookahead.next()?.kind).toBe("provide");
    expect(tokens.offset).toBe(0);

    tokens.commit(lookahead);
    expect(tokens.offset).toBe(9);
  });

  it("ends line comments before the line break", () => {
    expect(rawTokens("// c\r\nx")).toEqual([
      { kind: "comment", span: { start: 0, end: 4 } },
      { kind: "whitespace", span: { start: 4, end: 6 } },
      { kind: "id", span: { start: 6, end: 7 } },
    ]);
  });

  it("nests block comments", () => {
    expect(rawTokens("/* a /* b */ c */x")).toEqual([
      { kind: "comment", span: { start: 0, end: 17 } },
      { kind: "id", span: { start: 17, end: 18 } },
    ]);
  });

  it("only recognizes whole-word keywords", () => {
    expect(rawTokens("extended with-it with").map((token) => token.kind)).toEqual([
      "id",
      "whitespace",
      "id",
      "whitespace",
      "with",
    ]);
  });

  it("accepts unicode and kebab-case identifiers", () => {
    const tokens = new Tokenizer("café wasi-http");

    expect(tokens.next()).toEqual({ kind: "id", span: { start: 0, end: 4 } });
    const kebab = tokens.next();
    expect(kebab && tokens.getSpan(kebab.span)).toBe("wasi-http");
  });

  it("leaves the cursor in place when expect fails", () => {
    const tokens = new Tokenizer("with");

    expect(() => tokens.expect("extend")).toThrowError(
      "expected keyword `extend`, found keyword `with`"
    );
    expect(tokens.offset).toBe(0);
    expect(tokens.expect("with")).toEqual({ start: 0, end: 4 });
    expect(tokens.offset).toBe(4);
  });

  it("decodes string literal escapes", () => {
    const tokens = new Tokenizer('"a\\nb\\\\c\\u{41}\\\'"');
    const literal = tokens.next();

    expect(literal?.kind).toBe("strlit");
    expect(literal && tokens.parseStr(literal.span)).toBe("a\nb\\cA'");
  });

  it("refuses to decode a span that covers only part of a string literal", () => {
    const tokens = new Tokenizer('"abc" x');

    expect(() => tokens.parseStr({ start: 0, end: 2 })).toThrowError(RangeError);
    expect(() => tokens.parseStr({ start: 0, end: 2 })).toThrowError(
      "Span 0..2 does not cover the string literal at 0..5"
    );
    expect(tokens.parseStr({ start: 0, end: 5 })).toBe("abc");
  });

  it("refuses to decode a span that is not a string literal", () => {
    const tokens = new Tokenizer("foo bar");

    expect(() => tokens.parseStr({ start: 0, end: 3 })).toThrowError(
      "expected a string, found an identifier"
    );
  });
});

describe("Tokenizer errors", () => {
  it("rejects unknown characters", () => {
    const error = lexError("provide #");

    expect(error.code).toBe(ProfileErrorCode.UnexpectedCharacter);
    expect(error.message).toBe(
      'expected whitespace, a comment, an identifier, or a string, found character "#"'
    );
    expect(error.span).toEqual({ start: 8, end: 9 });
  });

  it("rejects a lone slash", () => {
    const error = lexError("a / b");

    expect(error.code).toBe(ProfileErrorCode.UnexpectedCharacter);
    expect(error.span).toEqual({ start: 2, end: 3 });
  });

  it("reports unterminated strings from the opening quote", () => {
    const error = lexError('extend "base');

    expect(error.code).toBe(ProfileErrorCode.UnterminatedString);
    expect(error.message).toBe('expected closing `"`, found eof');
    expect(error.span).toEqual({ start: 7, end: 12 });
  });

  it("reports unterminated block comments", () => {
    const error = lexError("/* open");

    expect(error.code).toBe(ProfileErrorCode.UnterminatedComment);
    expect(error.message).toBe("expected `*/`, found eof");
    expect(error.span).toEqual({ start: 0, end: 7 });
  });

  it("reports invalid escapes with their own span", () => {
    const error = lexError('extend "a\\qb"');

    expect(error.code).toBe(ProfileErrorCode.InvalidEscape);
    expect(error.message).toBe("expected an escape sequence, found `\\q`");
    expect(error.span).toEqual({ start: 9, end: 11 });
  });

  it("rejects unicode escapes that are not scalar values", () => {
    const error = lexError('extend "\\u{D800}"');

    expect(error.code).toBe(ProfileErrorCode.InvalidEscape);
    expect(error.message).toBe("expected an escape sequence, found `\\u{D800}`");
    expect(error.span).toEqual({ start: 8, end: 16 });
  });

  it("rejects unicode escapes without braces", () => {
    const error = lexError('"\\u41"');

    expect(error.code).toBe(ProfileErrorCode.InvalidEscape);
    expect(error.span).toEqual({ start: 1, end: 3 });
  });
});
