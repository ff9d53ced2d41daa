import { ProfileParseError, fail, ok } from "../errors.js";
import type { ProfileResult } from "../errors.js";
import { joinSpans } from "../lexer/span.js";
import { Tokenizer } from "../lexer/tokenizer.js";
import { isDeclarationKind } from "../lexer/tokens.js";
import type { DeclarationKind } from "../lexer/tokens.js";
import type {
  Docs,
  ExtendDeclaration,
  Identifier,
  ImplementDeclaration,
  ProfileAst,
  ProfileDeclaration,
  ProfileTraceEntry,
  ProvideDeclaration,
  RequireDeclaration,
} from "./astTypes.js";

export interface ParseProfileOptions {
  readonly trace?: boolean;
}

type DeclarationParser = (tokens: Tokenizer, docs: Docs) => ProfileDeclaration;

const declarationParsers: Record<DeclarationKind, DeclarationParser> = {
  extend: parseExtend,
  provide: parseProvide,
  require: parseRequire,
  implement: parseImplement,
};

const DECLARATION_START = "`extend`, `provide`, `require`, or `implement`";

/**
 * Parse a profile into its declarations. The first lexical or syntax error
 * aborts the parse and is thrown as a {@link ProfileParseError}.
 */
export function parseProfile(source: string, options: ParseProfileOptions = {}): ProfileAst {
  const tokens = new Tokenizer(source);
  const declarations: ProfileDeclaration[] = [];
  const trace: ProfileTraceEntry[] = [];
  const traceEnabled = options.trace === true;

  while (tokens.clone().next() !== undefined) {
    const docs = parseDocs(tokens);
    const declaration = parseDeclaration(tokens, docs);
    declarations.push(declaration);
    if (traceEnabled) {
      trace.push({ kind: declaration.kind, span: declaration.span, docs: docs.length });
    }
  }

  if (!traceEnabled) {
    return { declarations };
  }
  return { declarations, trace };
}

export function tryParseProfile(
  source: string,
  options: ParseProfileOptions = {}
): ProfileResult<ProfileAst> {
  try {
    return ok(parseProfile(source, options));
  } catch (error) {
    if (error instanceof ProfileParseError) {
      return fail(error);
    }
    throw error;
  }
}

/**
 * Collect the comments ahead of the next declaration. Whitespace between them
 * does not break the run; the first other token ends it and is left unread.
 * The cursor is committed only past the last comment taken.
 */
export function parseDocs(tokens: Tokenizer): string[] {
  const docs: string[] = [];
  const lookahead = tokens.clone();

  let token = lookahead.nextRaw();
  while (token !== undefined) {
    if (token.kind === "comment") {
      docs.push(tokens.getSpan(token.span));
      tokens.commit(lookahead);
    } else if (token.kind !== "whitespace") {
      break;
    }
    token = lookahead.nextRaw();
  }

  return docs;
}

export function parseIdentifier(tokens: Tokenizer): Identifier {
  const token = tokens.next();
  if (token?.kind === "id") {
    return { form: "bare", name: tokens.getSpan(token.span), span: token.span };
  }
  if (token?.kind === "strlit") {
    return { form: "quoted", name: tokens.parseStr(token.span), span: token.span };
  }
  throw tokens.formatExpectedError("an identifier or string", token);
}

function parseDeclaration(tokens: Tokenizer, docs: Docs): ProfileDeclaration {
  const next = tokens.clone().next();
  if (next === undefined || !isDeclarationKind(next.kind)) {
    throw tokens.formatExpectedError(DECLARATION_START, next);
  }
  return declarationParsers[next.kind](tokens, docs);
}

// Extend statements carry no docs.
function parseExtend(tokens: Tokenizer): ExtendDeclaration {
  const keyword = tokens.expect("extend");
  const profile = parseIdentifier(tokens);
  return { kind: "extend", span: joinSpans(keyword, profile.span), profile };
}

function parseProvide(tokens: Tokenizer, docs: Docs): ProvideDeclaration {
  const keyword = tokens.expect("provide");
  const iface = parseIdentifier(tokens);
  return { kind: "provide", docs, span: joinSpans(keyword, iface.span), interface: iface };
}

function parseRequire(tokens: Tokenizer, docs: Docs): RequireDeclaration {
  const keyword = tokens.expect("require");
  const iface = parseIdentifier(tokens);
  return { kind: "require", docs, span: joinSpans(keyword, iface.span), interface: iface };
}

// Both operands must be string literals; bare identifiers are rejected here.
function parseImplement(tokens: Tokenizer, docs: Docs): ImplementDeclaration {
  const keyword = tokens.expect("implement");
  const interfaceSpan = tokens.expect("strlit");
  tokens.expect("with");
  const componentSpan = tokens.expect("strlit");

  return {
    kind: "implement",
    docs,
    span: joinSpans(keyword, componentSpan),
    interface: tokens.parseStr(interfaceSpan),
    component: tokens.parseStr(componentSpan),
    interfaceSpan,
    componentSpan,
  };
}
