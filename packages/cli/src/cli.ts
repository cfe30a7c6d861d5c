import { logger } from "mini-parse";
import {
  CheckFailedError,
  ExportRegistry,
  FragmentResult,
  diagnosticLog,
  originLog,
  stitchErrorLog,
} from "@wgsl-stitch/core";
import { createTwoFilesPatch } from "diff";
import fs from "node:fs";
import path from "node:path";
import yargs from "yargs";
import { ExpandedHost, ExpandedHostFile, expandHostFiles } from "./ExpandHost.js";
import { normalize, rmBaseDirPrefix, slashPath } from "./PathUtil.js";
import { HostFile, HostFileText, UnitCycleError, loadHostFiles } from "./UnitGraph.js";

type CliArgs = ReturnType<typeof parseArgs>;

/** expand the wgsl fragments in host files
 * @return process exit code */
export function cli(rawArgs: string[]): number {
  const argv = parseArgs(rawArgs);
  const paths = Array.isArray(argv.files) ? argv.files.map(String) : [];

  const texts = readFiles(paths, argv.baseDir);
  if (!texts) return 1;
  const hostFiles = loadHostFiles(texts);
  let failed = logProblems(hostFiles);

  let expanded: ExpandedHost;
  try {
    expanded = expandHostFiles(hostFiles, { directives: argv.directives });
  } catch (e) {
    if (e instanceof UnitCycleError) {
      logger(e.message);
      return 1;
    }
    throw e;
  }

  for (const file of expanded.files) {
    failed = logResults(file, argv) || failed;
    argv.outDir && writeFile(argv.outDir, file);
    argv.diff && printDiff(file);
  }
  argv.details && printDetails(expanded.registry);

  return failed ? 1 : 0;
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
function parseArgs(args: string[]) {
  return yargs(args)
    .command("$0 <files...>", "typescript or javascript files containing wgsl`` fragments")
    .option("outDir", {
      requiresArg: true,
      type: "string",
      describe: "write host files with expanded fragments to this directory",
    })
    .option("baseDir", {
      requiresArg: true,
      type: "string",
      describe: "rm common prefix from file paths",
    })
    .option("directives", {
      type: "boolean",
      default: true,
      describe: "treat #import, #if and other reserved names as directives",
    })
    .option("details", {
      type: "boolean",
      default: false,
      hidden: true,
      describe: "show registered exports",
    })
    .option("diff", {
      type: "boolean",
      default: false,
      hidden: true,
      describe: "show comparison with src file",
    })
    .option("emit", {
      type: "boolean",
      default: true,
      hidden: true,
      describe: "emit expanded fragments",
    })
    .help()
    .parseSync();
}

function readFiles(
  paths: string[],
  baseDir: string | undefined
): HostFileText[] | undefined {
  const texts: HostFileText[] = [];
  for (const filePath of paths) {
    try {
      const text = fs.readFileSync(filePath, { encoding: "utf8" });
      const displayPath = normalize(rmBaseDirPrefix(slashPath(filePath), baseDir));
      texts.push({ filePath, displayPath, text });
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      logger(`can't read ${filePath}: ${reason}`);
      return undefined;
    }
  }
  return texts;
}

/** @return true if any file has problems */
function logProblems(files: HostFile[]): boolean {
  let found = false;
  for (const { src, scan } of files) {
    for (const { offset, message } of scan.problems) {
      originLog({ src, offset }, message);
      found = true;
    }
  }
  return found;
}

/** @return true if any fragment failed */
function logResults(expanded: ExpandedHostFile, argv: CliArgs): boolean {
  const { file, results } = expanded;
  let failed = false;
  results.forEach((result, i) => {
    if ("error" in result) {
      failed = true;
      const { error } = result;
      if (error instanceof CheckFailedError) {
        error.diagnostics.forEach(diagnosticLog);
      } else {
        stitchErrorLog(error);
      }
    } else {
      result.expanded.warnings.forEach(diagnosticLog);
      if (argv.emit) {
        logger(`// ${file.src.path}: ${fragmentLabel(result, i)}`);
        logger(result.expanded.text.trimEnd());
      }
    }
  });
  return failed;
}

function fragmentLabel(result: FragmentResult, i: number): string {
  const { name } = result.fragment;
  return name !== undefined ? `export ${name}` : `fragment ${i + 1}`;
}

function writeFile(outDir: string, expanded: ExpandedHostFile): void {
  const outPath = path.join(outDir, expanded.file.src.path);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, expanded.text);
}

function printDiff({ file, text }: ExpandedHostFile): void {
  const srcPath = file.src.path;
  if (file.src.text !== text) {
    const patch = createTwoFilesPatch(srcPath, "expanded", file.src.text, text);
    logger(patch);
  } else {
    logger(`${srcPath}: no fragments to expand`);
  }
}

function printDetails(registry: ExportRegistry): void {
  for (const name of registry.exportNames()) {
    logger(`export ${name}  (unit ${registry.exportOwner(name) ?? "?"})`);
    const text = registry.exportDefinitionText(name) ?? "";
    logger(text.trimEnd().replace(/^/gm, "    "));
  }
}
