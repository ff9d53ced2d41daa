export interface Span {
  /** Inclusive zero-based start offset within the input string. */
  readonly start: number;
  /** Exclusive zero-based end offset within the input string. */
  readonly end: number;
}

export function createSpan(start: number, end: number): Span {
  if (start > end) {
    throw new RangeError(`Span start ${start} is past its end ${end}`);
  }
  return { start, end };
}

/**
 * Span running from the start of `first` to the end of `last`, used to cover a
 * declaration from its keyword through the last token it consumed.
 */
export function joinSpans(first: Span, last: Span): Span {
  return createSpan(first.start, last.end);
}

export function endOfInputSpan(source: string): Span {
  return { start: source.length, end: source.length };
}

export function spanText(source: string, span: Span): string {
  return source.slice(span.start, span.end);
}
