import {
  OriginRef,
  SrcPosition,
  definitionPosition,
  directOrigin,
  positionLabel,
} from "./Origin.js";
import { ByteRangeOriginTable } from "./Renderer.js";

export type Severity = "error" | "warning";

/** a diagnostic from a checker, positioned in the text it checked */
export interface CheckerDiagnostic {
  start: number;
  /** exclusive */
  end: number;
  message: string;
  severity: Severity;
}

/** validates wgsl text. Checkers are pure and synchronous. */
export type Checker = (text: string) => CheckerDiagnostic[];

/** a checker diagnostic mapped back to the host source */
export interface MappedDiagnostic {
  /** origin of the token where the diagnostic starts */
  origin: OriginRef;
  /** definition site of that token */
  position: SrcPosition;
  message: string;
  severity: Severity;
}

/**
 * Run the checker once on rendered text, and map each diagnostic's start
 * back to the definition site of the token that produced it.
 *
 * @param fallback position for diagnostics in text with no tokens
 */
export function validate(
  text: string,
  table: ByteRangeOriginTable,
  checker: Checker,
  fallback: SrcPosition
): MappedDiagnostic[] {
  return checker(text).map(({ start, message, severity }) => {
    const origin = table.originAt(start)?.origin ?? directOrigin(fallback.src, fallback.offset);
    return { origin, position: definitionPosition(origin), message, severity };
  });
}

/** the checker reported at least one error */
export class CheckFailedError extends Error {
  constructor(readonly diagnostics: MappedDiagnostic[]) {
    const errors = diagnostics.filter((d) => d.severity === "error");
    const [first] = errors;
    const more = errors.length > 1 ? ` (and ${errors.length - 1} more)` : "";
    const where = first ? `${positionLabel(first.position)}: ${first.message}` : "";
    super(`wgsl check failed: ${where}${more}`);
    this.name = "CheckFailedError";
  }
}
