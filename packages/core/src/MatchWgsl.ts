import { tokenMatcher } from "mini-parse";

/** token matchers for wgsl fragment text */

// '>>' is left out so that nested templates like vec2<vec2<f32>> lex correctly.
// The renderer keeps '>' '>' joined where they were joined in the source.
const symbolSet =
  "& && -> @ / ! [ ] { } : , = == != > >= < << <= % - -- " +
  ". + ++ | || ( ) ; * ~ ^ += -= *= /= %= &= |= ^= >>= <<= " +
  "# ::";

// the matcher's regex has no unicode flag, so non-ascii letters are matched
// as any non-ascii character that isn't whitespace
const identStart = "[a-zA-Z_]|[^\\x00-\\x7F\\s]";
const identPart = "\\w|[^\\x00-\\x7F\\s]";

export const wgslTokens = tokenMatcher(
  {
    comment: /\/\/.*|\/\*[\s\S]*?\*\//,
    word: new RegExp(`(?:${identStart})(?:${identPart})*`),
    number:
      /(?:0[xX][\da-fA-F]+|\d+\.?\d*(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?)[iuhf]?/,
    symbol: matchOneOf(symbolSet),
    ws: /\s+/,
    invalid: /./,
  },
  "wgsl"
);

/** token kinds skipped by the fragment tokenizer and the checker */
export const ignoredKinds = new Set<string>([wgslTokens.ws, wgslTokens.comment]);

/** @return a regexp matching any one of a space separated list of symbols,
 * longest symbols first */
export function matchOneOf(syms: string): RegExp {
  const symbols = syms.split(/\s+/).filter((s) => s);
  const byLength = symbols.sort((a, b) => b.length - a.length);
  return new RegExp(byLength.map(escapeRegex).join("|"));
}

const regexSpecials = /[$+*.?|(){}[\]\\/^]/g;

function escapeRegex(s: string): string {
  return s.replace(regexSpecials, "\\$&");
}
