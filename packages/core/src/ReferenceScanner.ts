import { Token, isIdentifier } from "./Fragment.js";
import { DirectiveOptions, isDirectiveAt } from "./ModeSelector.js";
import { OriginRef } from "./Origin.js";

/** an import marker found in a fragment: #name or #name(args) */
export interface ImportReference {
  name: string;
  /** origin of the '#' */
  callSite: OriginRef;
  /** true for #name(args), which also leaves a call in the code */
  hasArgs: boolean;
}

export interface ScanResult {
  references: ImportReference[];
  /** fragment tokens with the import markers removed */
  residual: Token[];
}

/**
 * Find import markers in a fragment.
 *
 * A bare #name is removed from the residual tokens.
 * #name(args) leaves name(args) in place, so the call is emitted inline.
 * Reserved #directives and a '#' not followed by an identifier pass through unchanged.
 */
export function scanReferences(
  tokens: readonly Token[],
  options: DirectiveOptions = {}
): ScanResult {
  const { directives = true } = options;
  const references: ImportReference[] = [];
  const residual: Token[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const nameToken = tokens[i + 1];
    if (
      token.text !== "#" ||
      !nameToken ||
      !isIdentifier(nameToken.text) ||
      (directives && isDirectiveAt(tokens, i))
    ) {
      residual.push(token);
      continue;
    }

    const hasArgs = tokens[i + 2]?.text === "(";
    references.push({ name: nameToken.text, callSite: token.origin, hasArgs });
    if (hasArgs) residual.push(nameToken);
    i++; // skip the name token
  }

  return { references, residual };
}
