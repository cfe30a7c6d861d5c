import { logger, srcLog } from "mini-parse";
import { OriginRef, SrcPosition, definitionPosition } from "./Origin.js";
import { StitchError } from "./StitchErrors.js";
import { MappedDiagnostic } from "./ValidatorAdapter.js";

/** log a message along with the host source line of an origin */
export function originLog(
  origin: OriginRef | SrcPosition,
  ...msgs: unknown[]
): void {
  const pos = "kind" in origin ? definitionPosition(origin) : origin;
  const { src, offset } = pos;
  srcLog(src.text, offset, ...msgs, ` file: ${src.path}`);
}

export function stitchErrorLog(e: StitchError): void {
  if (e.position) {
    originLog(e.position, e.message);
  } else {
    logger(e.message);
  }
}

export function diagnosticLog(d: MappedDiagnostic): void {
  originLog(d.position, `${d.severity}: ${d.message}`);
}
