import { OriginRef, SrcPosition, definitionPosition, positionLabel } from "./Origin.js";

export type StitchErrorKind =
  | "nameConflict"
  | "unresolvedExport"
  | "importCycle"
  | "unknownUnit"
  | "invalidExportName";

/** a fragment could not be registered or stitched */
export abstract class StitchError extends Error {
  abstract readonly kind: StitchErrorKind;

  constructor(
    msg: string,
    /** where to report the error, at the definition site when inside an import */
    readonly position: SrcPosition | undefined
  ) {
    super(msg);
  }
}

export class NameConflictError extends StitchError {
  readonly kind = "nameConflict";

  constructor(
    readonly exportName: string,
    readonly firstOrigin: SrcPosition,
    readonly secondOrigin: SrcPosition
  ) {
    super(
      `export '${exportName}' is already defined at ${positionLabel(firstOrigin)}`,
      secondOrigin
    );
    this.name = "NameConflictError";
  }
}

export class UnresolvedExportError extends StitchError {
  readonly kind = "unresolvedExport";

  constructor(
    readonly exportName: string,
    readonly callSite: OriginRef,
    /** unit that exports the name, when it exists but isn't visible from here */
    readonly owner?: string
  ) {
    const hint = owner ? ` (exported by unit '${owner}', which is not a dependency)` : "";
    super(`unresolved import '${exportName}'${hint}`, definitionPosition(callSite));
    this.name = "UnresolvedExportError";
  }
}

export class ImportCycleError extends StitchError {
  readonly kind = "importCycle";

  constructor(
    /** names from the first import in the cycle through the repeated name */
    readonly chain: string[],
    readonly callSite: OriginRef
  ) {
    super(`import cycle: ${chain.join(" -> ")}`, definitionPosition(callSite));
    this.name = "ImportCycleError";
  }
}

export class UnknownUnitError extends StitchError {
  readonly kind = "unknownUnit";

  constructor(readonly unit: string) {
    super(`unknown build unit '${unit}'`, undefined);
    this.name = "UnknownUnitError";
  }
}

export class InvalidExportNameError extends StitchError {
  readonly kind = "invalidExportName";

  constructor(
    readonly exportName: string,
    origin: SrcPosition
  ) {
    super(`export name '${exportName}' is not an identifier`, origin);
    this.name = "InvalidExportNameError";
  }
}
