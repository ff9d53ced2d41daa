import type { ProfileParseError } from "../errors.js";

export interface SourceLocation {
  /** One-based line number. */
  readonly line: number;
  /** One-based column, counted in code points. */
  readonly column: number;
}

interface SourceLine {
  readonly line: number;
  readonly start: number;
  /** Offset of the line break ending the line, or the source length. */
  readonly end: number;
}

const GUTTER = "      |";

export function locateOffset(source: string, offset: number): SourceLocation {
  const clamped = Math.min(Math.max(offset, 0), source.length);
  const { line, start, end } = lineAt(source, clamped);
  const column = codePointLength(source.slice(start, Math.min(clamped, end))) + 1;
  return { line, column };
}

/**
 * Render a parse error with the offending line and a marker under its span,
 * for example:
 *
 * ```text
 * expected a string, found an identifier
 *      --> demo.profile:1:11
 *       |
 *     1 | implement foo with "comp"
 *       |           ^--
 * ```
 */
export function renderParseError(
  error: ProfileParseError,
  source: string,
  filename = "<input>"
): string {
  const start = Math.min(error.span.start, source.length);
  const { line, column } = locateOffset(source, start);
  const sourceLine = lineAt(source, start);
  const text = source.slice(sourceLine.start, sourceLine.end);

  const markedEnd = Math.min(Math.max(error.span.end, start), sourceLine.end);
  const width = Math.max(1, codePointLength(source.slice(start, markedEnd)));
  const marker = `${" ".repeat(column - 1)}^${"-".repeat(width - 1)}`;

  return [
    error.message,
    `     --> ${filename}:${line}:${column}`,
    GUTTER,
    ` ${String(line).padStart(4)} | ${text}`,
    `${GUTTER} ${marker}`,
  ].join("\n");
}

// `\r\n`, `\n` and `\r` each end a line, as they do for the tokenizer.
function lineAt(source: string, offset: number): SourceLine {
  const lineBreak = /\r\n|\r|\n/g;
  let line = 1;
  let start = 0;
  let match = lineBreak.exec(source);
  while (match !== null) {
    const next = match.index + match[0].length;
    if (next > offset) {
      return { line, start, end: match.index };
    }
    line += 1;
    start = next;
    match = lineBreak.exec(source);
  }
  return { line, start, end: source.length };
}

function codePointLength(text: string): number {
  return [...text].length;
}
