import type { Span } from "./lexer/span.js";

export enum ProfileErrorCode {
  UnexpectedCharacter = "unexpected_character",
  UnterminatedString = "unterminated_string",
  UnterminatedComment = "unterminated_comment",
  InvalidEscape = "invalid_escape",
  UnexpectedToken = "unexpected_token",
  UnexpectedEnd = "unexpected_end",
}

export class ProfileParseError extends Error {
  readonly code: ProfileErrorCode;
  readonly span: Span;

  constructor(code: ProfileErrorCode, message: string, span: Span) {
    super(message);
    this.name = "ProfileParseError";
    this.code = code;
    this.span = span;
  }
}

export type ProfileResult<T> = ProfileSuccess<T> | ProfileFailure;

export interface ProfileSuccess<T> {
  ok: true;
  value: T;
}

export interface ProfileFailure {
  ok: false;
  error: ProfileParseError;
}

export function formatExpected(expected: string, found: string): string {
  return `expected ${expected}, found ${found}`;
}

export function ok<T>(value: T): ProfileSuccess<T> {
  return { ok: true, value };
}

export function fail(error: ProfileParseError): ProfileFailure {
  return { ok: false, error };
}
