import { HostSource, hostSource } from "@wgsl-stitch/core";
import { HostScan, scanHostFile } from "./HostScan.js";
import { importCandidates, normalize, slashPath } from "./PathUtil.js";

/** a host file and its fragments, one build unit */
export interface HostFile {
  /** normalized file path, also the build unit name */
  unit: string;
  src: HostSource;
  scan: HostScan;
  /** units of the other listed files that this file imports */
  dependencies: string[];
}

export interface HostFileText {
  filePath: string;
  /** path shown in logs and used for output files */
  displayPath: string;
  text: string;
}

/** listed host files import each other in a cycle */
export class UnitCycleError extends Error {
  constructor(readonly chain: string[]) {
    super(`import cycle between host files: ${chain.join(" -> ")}`);
    this.name = "UnitCycleError";
  }
}

/** scan host files and connect their relative imports */
export function loadHostFiles(texts: HostFileText[]): HostFile[] {
  const scanned = texts.map(({ filePath, displayPath, text }) => {
    const src = hostSource(displayPath, text);
    return { unit: normalize(slashPath(filePath)), src, scan: scanHostFile(src) };
  });
  const units = new Set(scanned.map((s) => s.unit));

  return scanned.map((s) => {
    const dependencies = s.scan.imports.flatMap((specifier) => {
      const found = importCandidates(s.unit, specifier).find((c) => units.has(c));
      return found && found !== s.unit ? [found] : [];
    });
    return { ...s, dependencies: [...new Set(dependencies)] };
  });
}

/** @return files ordered so that each follows the files it imports */
export function orderUnits(files: HostFile[]): HostFile[] {
  const byUnit = new Map(files.map((f) => [f.unit, f]));
  const ordered: HostFile[] = [];
  const done = new Set<string>();
  const visiting: string[] = [];

  function visit(file: HostFile): void {
    if (done.has(file.unit)) return;
    const cycleStart = visiting.indexOf(file.unit);
    if (cycleStart !== -1) {
      throw new UnitCycleError([...visiting.slice(cycleStart), file.unit]);
    }

    visiting.push(file.unit);
    for (const dep of file.dependencies) {
      const depFile = byUnit.get(dep);
      depFile && visit(depFile);
    }
    visiting.pop();

    done.add(file.unit);
    ordered.push(file);
  }

  files.forEach(visit);
  return ordered;
}
