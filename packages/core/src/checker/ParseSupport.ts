import {
  ParseError,
  Parser,
  ParserContext,
  opt,
  or,
  repeat,
  seq,
  simpleParser,
  text,
} from "mini-parse";
import { CheckerDiagnostic } from "../ValidatorAdapter.js";

/** combinators the checker needs beyond the ones mini-parse provides */

/** a module scope name declaration */
export interface DeclName {
  name: string;
  start: number;
  end: number;
}

/** found while parsing, accumulated in the app state */
export type CheckFinding =
  | ({ kind: "decl" } & DeclName)
  | { kind: "diagnostic"; diagnostic: CheckerDiagnostic };

/** parse results that carry the checker's app state */
export interface HasFindings {
  app: { state: CheckFinding[] };
}

export function addFinding(r: HasFindings, finding: CheckFinding): void {
  r.app.state.push(finding);
}

/**
 * If parsing fails, record an error spanning the next token and abort parsing.
 * The error message is msg followed by the token found.
 */
export function req(arg: string, msg: string): Parser<string>;
export function req<T>(arg: Parser<T>, msg: string): Parser<T>;
export function req<T>(arg: Parser<T> | string, msg: string): Parser<T | string> {
  const p: Parser<T | string> = typeof arg === "string" ? text(arg) : arg;
  return simpleParser(`req ${p.debugName}`, (ctx: ParserContext) => {
    const result = p._run(ctx);
    if (result === null) {
      const { start, end, found } = nextTokenSpan(ctx);
      const message = `${msg}, ${found}`;
      const diagnostic: CheckerDiagnostic = { start, end, message, severity: "error" };
      addFinding(ctx, { kind: "diagnostic", diagnostic });
      throw new ParseError(message);
    }
    return result.value;
  });
}

function nextTokenSpan(ctx: ParserContext): {
  start: number;
  end: number;
  found: string;
} {
  const { lexer } = ctx;
  const start = lexer.position(lexer.skipIgnored());
  const token = lexer.next();
  lexer.position(start);
  if (!token) return { start, end: start, found: "found end of text" };

  const found = `found '${token.text.replace(/\n/g, "\\n")}'`;
  return { start, end: start + token.text.length, found };
}

/** yields true at the end of input, after any ignored tokens */
export function eof(): Parser<true> {
  return simpleParser("eof", (ctx: ParserContext) => {
    const { lexer } = ctx;
    lexer.position(lexer.skipIgnored());
    return lexer.eof() || null;
  });
}

/** a series of elements separated by sep, with an optional trailing sep */
export function withSep<T>(
  sep: string,
  p: Parser<T>,
  requireOne = false
): Parser<T[]> {
  const some: Parser<T[]> = seq(p, repeat(seq(sep, p)), opt(sep)).map((r) => {
    const [first, rest] = r.value;
    return [first, ...rest.map(([, elem]) => elem)];
  });
  if (requireOne) return some;

  const none = simpleParser("none", (): T[] => []);
  return or(some, none);
}

/** two tokens with nothing between them, e.g. the '>' '>' of a shift */
export function joined(a: string, b: string): Parser<string> {
  return simpleParser(`joined ${a}${b}`, (ctx: ParserContext) => {
    const { lexer } = ctx;
    const start = lexer.position(lexer.skipIgnored());
    if (lexer.next()?.text !== a) return null;
    if (lexer.next()?.text !== b) return null;
    return lexer.position() === start + a.length + b.length ? a + b : null;
  });
}
