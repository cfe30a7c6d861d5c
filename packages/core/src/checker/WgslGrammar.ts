import {
  Parser,
  any,
  anyNot,
  fn,
  kind,
  not,
  opt,
  or,
  repeat,
  seq,
} from "mini-parse";
import { wgslTokens } from "../MatchWgsl.js";
import { CheckerDiagnostic } from "../ValidatorAdapter.js";
import {
  DeclName,
  HasFindings,
  addFinding,
  eof,
  joined,
  req,
  withSep,
} from "./ParseSupport.js";

/** structural wgsl grammar, enough to find misplaced or malformed code */

// prettier gets confused if we leave the quoted parens inline so make consts for them here
const lParen = "(";
const rParen = ")";

const word = kind(wgslTokens.word);
const number = kind(wgslTokens.number);
const semi = req(";", "expected ';'");

const declName: Parser<DeclName> = word.map((r) => ({
  name: r.value,
  start: r.start,
  end: r.end,
}));

/** template parameters, e.g. <f32> or <storage, read_write> */
const template: Parser<unknown> = seq(
  "<",
  withSep(",", or(number, seq(word, opt(fn(() => template))))),
  ">"
);

const typeSpec = seq(word, opt(template));
const reqType = req(typeSpec, "expected a type");

/* expressions return true if they are a plain function call */

const expression: Parser<boolean> = fn(() => binaryExpression);
const reqExpression = req(expression, "expected an expression");

const argList = seq(lParen, withSep(",", expression), req(rParen, "expected ')'"));

const primary: Parser<boolean> = or(
  seq(lParen, expression, req(rParen, "expected ')'")).map(() => false),
  number.map(() => false),
  seq(word, opt(template), opt(argList)).map((r) => r.value[2] !== undefined)
);

const postfix = or(
  seq("[", reqExpression, req("]", "expected ']'")),
  seq(".", req(word, "expected a member name"))
);

const unary: Parser<boolean> = seq(
  repeat(or("-", "!", "~", "&", "*")),
  primary,
  repeat(postfix)
).map((r) => {
  const [prefixes, isCall, postfixes] = r.value;
  return !prefixes.length && isCall && !postfixes.length;
});

// '>>' is lexed as two tokens, see MatchWgsl
const binaryOp = or(
  "+", "-", "*", "/", "%", "==", "!=", "<=", ">=", "<", "<<",
  "&&", "||", "&", "|", "^", joined(">", ">"), ">"
);

const binaryExpression: Parser<boolean> = seq(
  unary,
  repeat(seq(binaryOp, req(unary, "expected an expression")))
)
  .map((r) => r.value[0] && !r.value[1].length)
  .traceName("expression");

/* statements */

const assignOp = or(
  "=", "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", ">>=", "<<="
);

/** assignment, increment or bare expression. @return true for a call or an assignment */
const simpleStatement: Parser<boolean> = seq(
  expression,
  opt(or(seq(assignOp, reqExpression), "++", "--"))
).map((r) => r.value[0] || r.value[1] !== undefined);

const localVar = seq(
  or("var", "let", "const"),
  opt(template),
  req(word, "expected a name"),
  opt(seq(":", reqType)),
  opt(seq("=", reqExpression))
);

const statement: Parser<unknown> = fn(() => anyStatement);

export const block: Parser<unknown> = seq(
  "{",
  repeat(statement),
  req("}", "expected '}'")
).traceName("block");

const reqBlock = req(block, "expected '{'");

const ifStatement = seq(
  "if",
  req(expression, "expected a condition"),
  reqBlock,
  repeat(seq("else", "if", req(expression, "expected a condition"), reqBlock)),
  opt(seq("else", reqBlock))
);

const forStatement = seq(
  "for",
  req(lParen, "expected '('"),
  opt(or(localVar, simpleStatement)),
  semi,
  opt(expression),
  semi,
  opt(simpleStatement),
  req(rParen, "expected ')'"),
  reqBlock
);

const loopStatement = seq(
  "loop",
  req("{", "expected '{'"),
  repeat(or(seq("continuing", reqBlock), statement)),
  req("}", "expected '}'")
);

const caseClause = or(
  seq(
    "case",
    req(withSep(",", or("default", expression), true), "expected a case selector"),
    opt(":"),
    reqBlock
  ),
  seq("default", opt(":"), reqBlock)
);

const switchStatement = seq(
  "switch",
  reqExpression,
  req("{", "expected '{'"),
  repeat(caseClause),
  req("}", "expected '}'")
);

const expressionStatement = seq(simpleStatement, semi).map((r) => {
  if (!r.value[0]) {
    const message = "statement must be a function call or an assignment";
    addDiagnostic(r, { start: r.start, end: r.end, message, severity: "error" });
  }
});

const anyStatement = or(
  ";",
  seq("return", opt(expression), semi),
  seq(localVar, semi),
  ifStatement,
  forStatement,
  seq("while", req(expression, "expected a condition"), reqBlock),
  loopStatement,
  switchStatement,
  seq("break", opt(seq("if", reqExpression)), semi),
  seq("continue", semi),
  seq("discard", semi),
  seq("const_assert", reqExpression, semi),
  block,
  expressionStatement
).traceName("statement");

/* module scope declarations */

const attribute = seq("@", req(word, "expected an attribute name"), opt(argList));
const attributes = repeat(attribute);

const param = seq(attributes, word, req(":", "expected ':'"), reqType);

const fnDecl = seq(
  attributes,
  "fn",
  req(declName, "expected a function name"),
  req(seq(lParen, withSep(",", param), req(rParen, "expected ')'")), "expected '('"),
  opt(seq("->", attributes, req(typeSpec, "expected a return type"))),
  reqBlock
)
  .map((r) => addDecl(r, r.value[2]))
  .traceName("fnDecl");

const structMember = seq(attributes, word, req(":", "expected ':'"), reqType);

const structDecl = seq(
  "struct",
  req(declName, "expected a struct name"),
  req("{", "expected '{'"),
  withSep(",", structMember),
  req("}", "expected '}'")
).map((r) => addDecl(r, r.value[1]));

const globalVar = seq(
  attributes,
  or("var", "const", "override"),
  opt(template),
  req(declName, "expected a name"),
  opt(seq(":", reqType)),
  opt(seq("=", reqExpression)),
  semi
).map((r) => addDecl(r, r.value[3]));

const alias = seq(
  "alias",
  req(declName, "expected a name"),
  req("=", "expected '='"),
  reqType,
  semi
).map((r) => addDecl(r, r.value[1]));

const globalDirective = or(
  seq(
    or("enable", "requires"),
    req(withSep(",", word, true), "expected a name"),
    semi
  ),
  seq("diagnostic", req(argList, "expected '('"), semi),
  seq("const_assert", reqExpression, semi)
);

const declStart = or(
  "fn", "struct", "var", "const", "override", "alias",
  "const_assert", "enable", "requires", "diagnostic", "@", ";"
);

/** code that doesn't start a declaration, through the next ';' */
const stray = seq(not(declStart), any(), repeat(anyNot(";")), opt(";")).map(
  (r) => {
    const first = r.value[1].text;
    const message = `unexpected '${first}' at module scope`;
    addDiagnostic(r, { start: r.start, end: r.end, message, severity: "error" });
  }
);

export const wgslModule = seq(
  repeat(or(globalDirective, fnDecl, structDecl, globalVar, alias, ";", stray)),
  req(eof(), "expected a declaration")
);

function addDecl(r: HasFindings, decl: DeclName): void {
  addFinding(r, { kind: "decl", ...decl });
}

function addDiagnostic(r: HasFindings, diagnostic: CheckerDiagnostic): void {
  addFinding(r, { kind: "diagnostic", diagnostic });
}
