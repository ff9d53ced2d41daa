import type { Span } from "../lexer/span.js";
import type { DeclarationKind } from "../lexer/tokens.js";

/**
 * `bare` names are the identifier's source text verbatim. `quoted` names come
 * from a string literal with its escapes decoded.
 */
export type IdentifierForm = "bare" | "quoted";

export interface Identifier {
  readonly form: IdentifierForm;
  readonly name: string;
  /** Span of the identifier or string-literal token, quotes included. */
  readonly span: Span;
}

/** Comment texts, delimiters included, in source order. */
export type Docs = readonly string[];

export interface ExtendDeclaration {
  readonly kind: "extend";
  readonly span: Span;
  readonly profile: Identifier;
}

export interface ProvideDeclaration {
  readonly kind: "provide";
  readonly docs: Docs;
  readonly span: Span;
  readonly interface: Identifier;
}

export interface RequireDeclaration {
  readonly kind: "require";
  readonly docs: Docs;
  readonly span: Span;
  readonly interface: Identifier;
}

export interface ImplementDeclaration {
  readonly kind: "implement";
  readonly docs: Docs;
  readonly span: Span;
  readonly interface: string;
  readonly component: string;
  readonly interfaceSpan: Span;
  readonly componentSpan: Span;
}

export type ProfileDeclaration =
  | ExtendDeclaration
  | ProvideDeclaration
  | RequireDeclaration
  | ImplementDeclaration;

export interface ProfileTraceEntry {
  readonly kind: DeclarationKind;
  readonly span: Span;
  /** Number of doc comments collected ahead of the declaration. */
  readonly docs: number;
}

export interface ProfileAst {
  /** Declarations in source order. */
  readonly declarations: readonly ProfileDeclaration[];
  readonly trace?: readonly ProfileTraceEntry[];
}
