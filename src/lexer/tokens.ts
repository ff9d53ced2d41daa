import type { Span } from "./span.js";

export type KeywordKind = "extend" | "provide" | "require" | "implement" | "with";

export type ProfileTokenKind = "whitespace" | "comment" | "id" | "strlit" | KeywordKind;

/** Keywords that open a declaration. */
export type DeclarationKind = Exclude<KeywordKind, "with">;

export interface ProfileToken {
  readonly kind: ProfileTokenKind;
  /** Text is recovered by slicing the source, never stored on the token. */
  readonly span: Span;
}

const KEYWORDS: ReadonlyMap<string, KeywordKind> = new Map<string, KeywordKind>([
  ["extend", "extend"],
  ["provide", "provide"],
  ["require", "require"],
  ["implement", "implement"],
  ["with", "with"],
]);

const TOKEN_DESCRIPTIONS: Record<ProfileTokenKind, string> = {
  whitespace: "whitespace",
  comment: "a comment",
  id: "an identifier",
  strlit: "a string",
  extend: "keyword `extend`",
  provide: "keyword `provide`",
  require: "keyword `require`",
  implement: "keyword `implement`",
  with: "keyword `with`",
};

export function keywordFor(text: string): KeywordKind | undefined {
  return KEYWORDS.get(text);
}

export function isDeclarationKind(kind: ProfileTokenKind): kind is DeclarationKind {
  return kind === "extend" || kind === "provide" || kind === "require" || kind === "implement";
}

export function describeToken(kind: ProfileTokenKind): string {
  return TOKEN_DESCRIPTIONS[kind];
}
