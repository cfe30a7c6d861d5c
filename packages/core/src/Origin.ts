import { srcLine } from "mini-parse";

/** a host source file containing embedded wgsl fragments */
export interface HostSource {
  path: string;
  text: string;
}

/** a character position in a host source file */
export interface SrcPosition {
  src: HostSource;
  offset: number;
}

/** a token that appears where it was written */
export interface DirectOrigin {
  kind: "direct";
  position: SrcPosition;
}

/** a token copied into another fragment by an import.
 * Only the definition position is reported to users. */
export interface InheritedOrigin {
  kind: "inherited";
  importSite: SrcPosition;
  definition: SrcPosition;
}

export type OriginRef = DirectOrigin | InheritedOrigin;

export function hostSource(path: string, text: string): HostSource {
  return { path, text };
}

export function directOrigin(src: HostSource, offset: number): DirectOrigin {
  return { kind: "direct", position: { src, offset } };
}

/** rewrite an origin for a token copied in by an import at importSite */
export function inheritOrigin(
  origin: OriginRef,
  importSite: SrcPosition
): InheritedOrigin {
  return { kind: "inherited", importSite, definition: definitionPosition(origin) };
}

/** @return the position where the text behind this origin was written */
export function definitionPosition(origin: OriginRef): SrcPosition {
  return origin.kind === "direct" ? origin.position : origin.definition;
}

export function samePosition(a: SrcPosition, b: SrcPosition): boolean {
  return a.src.path === b.src.path && a.offset === b.offset;
}

export function sameOrigin(a: OriginRef, b: OriginRef): boolean {
  if (a.kind === "direct" && b.kind === "direct") {
    return samePosition(a.position, b.position);
  }
  if (a.kind === "inherited" && b.kind === "inherited") {
    return (
      samePosition(a.definition, b.definition) &&
      samePosition(a.importSite, b.importSite)
    );
  }
  return false;
}

/** order by definition position: path first, then offset */
export function compareOrigins(a: OriginRef, b: OriginRef): number {
  return comparePositions(definitionPosition(a), definitionPosition(b));
}

export function comparePositions(a: SrcPosition, b: SrcPosition): number {
  if (a.src.path !== b.src.path) return a.src.path < b.src.path ? -1 : 1;
  return a.offset - b.offset;
}

export interface LineColumn {
  /** first line is 1 */
  line: number;
  /** first column is 1 */
  column: number;
}

export function lineColumn(pos: SrcPosition): LineColumn {
  const { lineNum, linePos } = srcLine(pos.src.text, pos.offset);
  return { line: lineNum, column: linePos + 1 };
}

/** @return e.g. "src/shade.ts:12:5" */
export function positionLabel(pos: SrcPosition): string {
  const { line, column } = lineColumn(pos);
  return `${pos.src.path}:${line}:${column}`;
}
