import { expect, test } from "vitest";
import { expandHostFiles } from "../ExpandHost.js";
import { HostFile, loadHostFiles } from "../UnitGraph.js";

const libText =
  'export const f = wgslExport("f", wgsl`fn f() -> f32 { return 1.0; }`);\n';
const mainText =
  'import "./lib.js";\nexport const s = wgsl`fn g() -> f32 { return #f(); }`;\n';

function hostFiles(files: Record<string, string>): HostFile[] {
  const texts = Object.entries(files).map(([filePath, text]) => ({
    filePath,
    displayPath: filePath,
    text,
  }));
  return loadHostFiles(texts);
}

test("expanded fragments become string literals", () => {
  const files = hostFiles({ "main.ts": mainText, "lib.ts": libText });
  const expanded = expandHostFiles(files);
  const [lib, main] = expanded.files;

  expect(lib.file.unit).toBe("lib.ts");
  expect(lib.text).toBe(
    `export const f = ${JSON.stringify("fn f() -> f32 {\nreturn 1.0;\n}\n")};\n`
  );
  const stitched = "fn f() -> f32 {\nreturn 1.0;\n}\nfn g() -> f32 {\nreturn f();\n}\n";
  expect(main.text).toBe(
    `import "./lib.js";\nexport const s = ${JSON.stringify(stitched)};\n`
  );
  expect(expanded.registry.exportOwner("f")).toBe("lib.ts");
});

test("failed fragments are left in place", () => {
  const text = "const a = wgsl`fn a() { #nope(); }`;\nconst b = wgsl`fn b() {}`;\n";
  const [file] = expandHostFiles(hostFiles({ "a.ts": text })).files;
  const [a, b] = file.results;
  expect("error" in a && a.error.message).toBe("unresolved import 'nope'");
  expect("expanded" in b).toBe(true);
  expect(file.text).toBe(
    `const a = wgsl\`fn a() { #nope(); }\`;\nconst b = ${JSON.stringify("fn b() {\n}\n")};\n`
  );
});

test("exports of files that aren't imported are not visible", () => {
  const files = hostFiles({
    "lib.ts": libText,
    "other.ts": "const o = wgsl`fn o() -> f32 { return #f(); }`;",
  });
  const [, other] = expandHostFiles(files).files;
  const [result] = other.results;
  expect("error" in result && result.error.message).toBe(
    "unresolved import 'f' (exported by unit 'lib.ts', which is not a dependency)"
  );
});
