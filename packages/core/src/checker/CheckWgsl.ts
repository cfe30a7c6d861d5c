import { AppState, matchingLexer } from "mini-parse";
import { ignoredKinds, wgslTokens } from "../MatchWgsl.js";
import { CheckerDiagnostic } from "../ValidatorAdapter.js";
import { CheckFinding, DeclName } from "./ParseSupport.js";
import { wgslModule } from "./WgslGrammar.js";

/**
 * Structural wgsl checker, used when no other checker is supplied.
 *
 * Reports code outside of declarations, malformed declarations and statements,
 * expression statements that are neither calls nor assignments,
 * and module scope names declared twice.
 *
 * @return diagnostics sorted by position
 */
export function checkWgsl(text: string): CheckerDiagnostic[] {
  const findings: CheckFinding[] = [];
  const app: AppState<undefined> = { context: undefined, state: findings };
  const lexer = matchingLexer(text, wgslTokens, ignoredKinds);

  // a required element that is missing records its diagnostic and stops the parse
  wgslModule.parse({ lexer, app });

  const diagnostics: CheckerDiagnostic[] = [];

  const decls: DeclName[] = [];
  for (const f of findings) {
    if (f.kind === "decl") decls.push(f);
    else diagnostics.push(f.diagnostic);
  }
  diagnostics.push(...redeclarations(decls));

  if (!decls.length && !diagnostics.length) {
    const message = "module contains no declarations";
    diagnostics.push({ start: 0, end: 0, message, severity: "warning" });
  }

  return diagnostics.sort((a, b) => a.start - b.start);
}

function redeclarations(decls: DeclName[]): CheckerDiagnostic[] {
  const seen = new Set<string>();
  return decls.flatMap(({ name, start, end }) => {
    if (!seen.has(name)) {
      seen.add(name);
      return [];
    }
    const message = `'${name}' is already declared`;
    const diagnostic: CheckerDiagnostic = { start, end, message, severity: "error" };
    return [diagnostic];
  });
}
