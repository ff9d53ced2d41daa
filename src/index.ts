export { parseProfile, tryParseProfile } from "./parser/parseProfile.js";
export type { ParseProfileOptions } from "./parser/parseProfile.js";
export type {
  Docs,
  ExtendDeclaration,
  Identifier,
  IdentifierForm,
  ImplementDeclaration,
  ProfileAst,
  ProfileDeclaration,
  ProfileTraceEntry,
  ProvideDeclaration,
  RequireDeclaration,
} from "./parser/astTypes.js";
export { ProfileErrorCode, ProfileParseError } from "./errors.js";
export type { ProfileFailure, ProfileResult, ProfileSuccess } from "./errors.js";
export { Tokenizer } from "./lexer/tokenizer.js";
export { describeToken } from "./lexer/tokens.js";
export type { DeclarationKind, KeywordKind, ProfileToken, ProfileTokenKind } from "./lexer/tokens.js";
export { joinSpans, spanText } from "./lexer/span.js";
export type { Span } from "./lexer/span.js";
export { locateOffset, renderParseError } from "./diagnostics/renderParseError.js";
export type { SourceLocation } from "./diagnostics/renderParseError.js";
