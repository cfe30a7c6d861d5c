import { hostSource } from "@wgsl-stitch/core";
import { expect, test } from "vitest";
import { HostFragment, scanHostFile } from "../HostScan.js";

function fragmentTexts(text: string, fragments: HostFragment[]): string[] {
  return fragments.map((f) => text.slice(f.textStart, f.textEnd));
}

test("find wgsl tagged templates", () => {
  const text = "const a = wgsl`fn a() {}`;\nconst b = 1;\nconst c = wgsl`fn c() {}`;";
  const { fragments, problems } = scanHostFile(hostSource("a.ts", text));
  expect(fragmentTexts(text, fragments)).toEqual(["fn a() {}", "fn c() {}"]);
  expect(problems).toEqual([]);

  const [a] = fragments;
  expect(a.name).toBeUndefined();
  expect(text.slice(a.replaceStart, a.replaceEnd)).toBe("wgsl`fn a() {}`");
});

test("find named exports", () => {
  const text = 'export const e = wgslExport("e", wgsl`fn e() {}`);';
  const { fragments } = scanHostFile(hostSource("e.ts", text));
  expect(fragments.length).toBe(1);
  const [e] = fragments;
  expect(e.name).toBe("e");
  expect(text.slice(e.textStart, e.textEnd)).toBe("fn e() {}");
  expect(text.slice(e.replaceStart, e.replaceEnd)).toBe(
    'wgslExport("e", wgsl`fn e() {}`)'
  );
});

test("templates nested in other code", () => {
  const text = "function make() {\n  return [wgsl`fn x() {}`];\n}";
  const { fragments } = scanHostFile(hostSource("n.js", text));
  expect(fragmentTexts(text, fragments)).toEqual(["fn x() {}"]);
});

test("other tags are ignored", () => {
  const text = "const h = html`<p></p>`;\nconst s = `fn y() {}`;";
  const { fragments } = scanHostFile(hostSource("o.ts", text));
  expect(fragments).toEqual([]);
});

test("relative imports and re-exports", () => {
  const text = [
    'import { f } from "./f.js";',
    'import x from "lodash";',
    'import "../side.js";',
    'export * from "./g.js";',
  ].join("\n");
  const { imports } = scanHostFile(hostSource("m.ts", text));
  expect(imports).toEqual(["./f.js", "../side.js", "./g.js"]);
});

test("substitutions are reported", () => {
  const text = "const z = wgsl`fn z() { ${body} }`;";
  const { fragments, problems } = scanHostFile(hostSource("z.ts", text));
  expect(fragments).toEqual([]);
  expect(problems).toEqual([
    {
      offset: text.indexOf("`"),
      message: "wgsl templates can't contain ${} substitutions",
    },
  ]);
});

test("malformed export calls are reported", () => {
  const text = 'const q = wgslExport("q");';
  const { fragments, problems } = scanHostFile(hostSource("q.ts", text));
  expect(fragments).toEqual([]);
  expect(problems).toEqual([
    {
      offset: text.indexOf("wgslExport"),
      message: "wgslExport() expects a name string and a wgsl`` template",
    },
  ]);
});
