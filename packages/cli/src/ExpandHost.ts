import {
  ExportRegistry,
  FragmentResult,
  ShaderBuild,
  ShaderBuildOptions,
  fragmentFromText,
} from "@wgsl-stitch/core";
import { sliceReplace } from "./Slicer.js";
import { HostFile, orderUnits } from "./UnitGraph.js";

export interface ExpandedHostFile {
  file: HostFile;
  /** one result per fragment, in file order */
  results: FragmentResult[];
  /** the host text with each expanded fragment replaced by a string literal */
  text: string;
}

export interface ExpandedHost {
  files: ExpandedHostFile[];
  registry: ExportRegistry;
}

/**
 * Expand the fragments of host files, each file a build unit.
 * Files are expanded after the files they import.
 *
 * @throws UnitCycleError
 */
export function expandHostFiles(
  hostFiles: HostFile[],
  options: ShaderBuildOptions = {}
): ExpandedHost {
  const build = new ShaderBuild(options);
  const files = orderUnits(hostFiles).map((file) => {
    const unit = build.unit(file.unit, file.dependencies);
    for (const f of file.scan.fragments) {
      const { name, textStart: start, textEnd: end } = f;
      unit.fragment(fragmentFromText(file.src, { name, start, end }));
    }
    const results = unit.expand();

    const slices = file.scan.fragments.flatMap((f, i) => {
      const result = results[i];
      if (!("expanded" in result)) return [];
      const replacement = JSON.stringify(result.expanded.text);
      return [{ start: f.replaceStart, end: f.replaceEnd, replacement }];
    });
    return { file, results, text: sliceReplace(file.src.text, slices) };
  });

  return { files, registry: build.registry };
}
