/** simplistic path manipulation for '/' separated paths */

export function dirname(path: string): string {
  const lastSlash = path.lastIndexOf("/");
  if (lastSlash === -1) return ".";
  return path.slice(0, lastSlash);
}

/** return path with ./ and foo/.. elements removed */
export function normalize(path: string): string {
  const absolute = path.startsWith("/");
  const segments: string[] = [];
  for (const s of path.split("/")) {
    if (s === "" || s === ".") continue;
    if (s === ".." && segments.length && segments[segments.length - 1] !== "..") {
      segments.pop();
    } else {
      segments.push(s);
    }
  }
  return (absolute ? "/" : "") + segments.join("/");
}

/** use forward slashes, e.g. for paths from the windows command line */
export function slashPath(path: string): string {
  return path.replace(/\\/g, "/");
}

const hostSuffixes = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"];

/** candidate file paths for a relative import from a host file,
 * e.g. './util.js' from 'src/main.ts' might be 'src/util.ts' */
export function importCandidates(fromPath: string, specifier: string): string[] {
  const joined = normalize(dirname(fromPath) + "/" + specifier);
  const bare = joined.replace(/\.[cm]?jsx?$/, "");
  const withSuffix = hostSuffixes.map((s) => bare + s);
  const index = hostSuffixes.map((s) => `${joined}/index${s}`);
  return [joined, ...withSuffix, ...index];
}

/** remove a directory prefix from a path, for display */
export function rmBaseDirPrefix(path: string, baseDir: string | undefined): string {
  if (baseDir) {
    const found = path.indexOf(baseDir);
    if (found !== -1) {
      return path.slice(found + baseDir.length).replace(/^\//, "");
    }
  }
  return path;
}
