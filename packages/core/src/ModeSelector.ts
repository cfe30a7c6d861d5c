import { Token } from "./Fragment.js";

/** directive names reserved for a downstream textual preprocessor */
export const reservedDirectives: ReadonlySet<string> = new Set([
  "define_import_path",
  "import",
  "if",
  "ifdef",
  "ifndef",
  "else",
  "endif",
]);

/** checked fragments are validated after stitching, unchecked fragments are not */
export type StitchMode = "checked" | "unchecked";

export interface DirectiveOptions {
  /** recognize reserved #directives (default true) */
  directives?: boolean;
}

/** @return true if the token at index i starts a reserved #directive */
export function isDirectiveAt(tokens: readonly Token[], i: number): boolean {
  const next = tokens[i + 1];
  return tokens[i].text === "#" && !!next && reservedDirectives.has(next.text);
}

/** a fragment is unchecked if its own tokens contain a reserved #directive */
export function selectMode(
  tokens: readonly Token[],
  options: DirectiveOptions = {}
): StitchMode {
  const { directives = true } = options;
  if (!directives) return "checked";

  const found = tokens.some((_t, i) => isDirectiveAt(tokens, i));
  return found ? "unchecked" : "checked";
}
