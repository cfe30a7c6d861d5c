import { checkWgsl } from "./checker/CheckWgsl.js";
import { ExportRegistry } from "./ExportRegistry.js";
import { Fragment } from "./Fragment.js";
import { StitchMode, selectMode } from "./ModeSelector.js";
import { ByteRangeOriginTable, renderStitched } from "./Renderer.js";
import { StitchedModule, stitch } from "./Stitcher.js";
import {
  CheckFailedError,
  Checker,
  MappedDiagnostic,
  validate,
} from "./ValidatorAdapter.js";

export interface StitchOptions {
  registry: ExportRegistry;

  /** build unit of the fragment */
  unit: string;

  /** validates stitched text (default checkWgsl) */
  checker?: Checker;

  /** recognize reserved #directives (default true) */
  directives?: boolean;
}

export interface Expanded {
  /** stitched wgsl text */
  text: string;
  mode: StitchMode;
  /** checker warnings, mapped to their origins */
  warnings: MappedDiagnostic[];
  table: ByteRangeOriginTable;
  module: StitchedModule;
}

/**
 * Stitch a fragment with its imports, render it to text,
 * and validate the text unless the fragment contains a reserved #directive.
 *
 * @throws StitchError if the imports can't be resolved
 * @throws CheckFailedError if the checker reports an error
 */
export function expandFragment(
  fragment: Fragment,
  options: StitchOptions
): Expanded {
  const { registry, unit, checker = checkWgsl, directives = true } = options;
  const mode = selectMode(fragment.tokens, { directives });
  const module = stitch(fragment, { registry, unit, directives });
  const { text, table } = renderStitched(module);
  if (mode === "unchecked") {
    return { text, mode, warnings: [], table, module };
  }

  const diagnostics = validate(text, table, checker, fragment.origin);
  if (diagnostics.some((d) => d.severity === "error")) {
    throw new CheckFailedError(diagnostics);
  }
  return { text, mode, warnings: diagnostics, table, module };
}
