import { OriginRef, SrcPosition } from "./Origin.js";

/** one lexical token of an embedded wgsl fragment */
export interface Token {
  readonly text: string;
  readonly origin: OriginRef;
}

/** a block of embedded wgsl tokens, optionally named for export */
export interface Fragment {
  readonly name?: string;
  readonly tokens: readonly Token[];

  /** where the fragment starts in its host file */
  readonly origin: SrcPosition;
}

const identifier = /^(?:[\p{XID_Start}_]\p{XID_Continue}*)$/u;

/** true for text that can be an export name or an import marker name */
export function isIdentifier(text: string): boolean {
  return identifier.test(text);
}
