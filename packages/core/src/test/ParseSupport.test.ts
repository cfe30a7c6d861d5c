import { Parser, TagRecord, kind, matchingLexer, seq } from "mini-parse";
import { expect, test } from "vitest";
import { ignoredKinds, wgslTokens } from "../MatchWgsl.js";
import {
  CheckFinding,
  eof,
  joined,
  req,
  withSep,
} from "../checker/ParseSupport.js";

interface Parsed<T> {
  value: T | undefined;
  findings: CheckFinding[];
  position: number;
}

function parseText<T, N extends TagRecord>(p: Parser<T, N>, src: string): Parsed<T> {
  const findings: CheckFinding[] = [];
  const lexer = matchingLexer(src, wgslTokens, ignoredKinds);
  const parsed = p.parse({ lexer, app: { context: undefined, state: findings } });
  return { value: parsed?.value, findings, position: lexer.position() };
}

const word = kind(wgslTokens.word);

test("req records the next token and stops the parse", () => {
  const p = seq(word, req(";", "expected ';'"));
  const { value, findings } = parseText(p, "a  b");
  expect(value).toBeUndefined();
  expect(findings).toEqual([
    {
      kind: "diagnostic",
      diagnostic: { start: 3, end: 4, message: "expected ';', found 'b'", severity: "error" },
    },
  ]);
});

test("req at the end of the text", () => {
  const p = seq(word, req(word, "expected a name"));
  const { findings } = parseText(p, "a /* done */");
  expect(findings).toEqual([
    {
      kind: "diagnostic",
      diagnostic: {
        start: 12,
        end: 12,
        message: "expected a name, found end of text",
        severity: "error",
      },
    },
  ]);
});

test("req passes a match through", () => {
  const { value, findings } = parseText(req(word, "expected a name"), "abc");
  expect(value).toBe("abc");
  expect(findings).toEqual([]);
});

test("eof after trailing whitespace and comments", () => {
  const { value } = parseText(seq(word, eof()), "x  // end\n");
  expect(value).toEqual(["x", true]);
});

test("eof fails before a token", () => {
  const { value, position } = parseText(eof(), "x");
  expect(value).toBeUndefined();
  expect(position).toBe(0);
});

test("withSep with a trailing separator", () => {
  const { value } = parseText(withSep(",", word), "a, b, c,");
  expect(value).toEqual(["a", "b", "c"]);
});

test("withSep accepts an empty list", () => {
  const { value } = parseText(seq("(", withSep(",", word), ")"), "()");
  expect(value).toEqual(["(", [], ")"]);
});

test("withSep requiring one element", () => {
  const { value } = parseText(seq("(", withSep(",", word, true), ")"), "()");
  expect(value).toBeUndefined();
});

test("joined matches adjacent tokens", () => {
  const { value } = parseText(seq(word, joined(">", ">"), word), "x >> y");
  expect(value).toEqual(["x", ">>", "y"]);
});

test("joined rejects separated tokens", () => {
  const { value } = parseText(seq(word, joined(">", ">"), word), "x > > y");
  expect(value).toBeUndefined();
});
