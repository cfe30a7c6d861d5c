import { matchingLexer } from "mini-parse";
import { Fragment, Token } from "./Fragment.js";
import { ignoredKinds, wgslTokens } from "./MatchWgsl.js";
import { HostSource, directOrigin } from "./Origin.js";

/**
 * Lex the wgsl text between start and end of a host file into tokens
 * that point back at their host file positions.
 * Whitespace and comments are dropped.
 */
export function tokenizeFragment(
  src: HostSource,
  start = 0,
  end = src.text.length
): Token[] {
  const lexer = matchingLexer(src.text.slice(0, end), wgslTokens, ignoredKinds);
  lexer.position(start);

  const tokens: Token[] = [];
  for (let t = lexer.next(); t; t = lexer.next()) {
    const tokenStart = lexer.position() - t.text.length;
    tokens.push({ text: t.text, origin: directOrigin(src, tokenStart) });
  }
  return tokens;
}

export interface FragmentTextOptions {
  /** export name */
  name?: string;
  /** start of the wgsl text in the host file (default 0) */
  start?: number;
  /** end of the wgsl text in the host file (default end of file) */
  end?: number;
}

/** create a fragment from wgsl text embedded in a host file */
export function fragmentFromText(
  src: HostSource,
  options: FragmentTextOptions = {}
): Fragment {
  const { name, start = 0, end = src.text.length } = options;
  const tokens = tokenizeFragment(src, start, end);
  const origin = { src, offset: start };
  return name === undefined ? { tokens, origin } : { name, tokens, origin };
}
