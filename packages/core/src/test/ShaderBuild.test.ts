import { expect, test } from "vitest";
import { hostSource } from "../Origin.js";
import { FragmentResult, ShaderBuild } from "../ShaderBuild.js";
import { NameConflictError, UnresolvedExportError } from "../StitchErrors.js";
import { fragmentFromText } from "../TokenizeFragment.js";
import { CheckFailedError } from "../ValidatorAdapter.js";
import { textFragment } from "./TestFragments.js";

function texts(results: FragmentResult[]): (string | undefined)[] {
  return results.map((r) => ("expanded" in r ? r.expanded.text : undefined));
}

test("units see the exports of their dependencies", () => {
  const build = new ShaderBuild();
  build
    .unit("lib")
    .fragment(textFragment("fn f() -> f32 { return 1.0; }", "f"))
    .expand();
  const app = build.unit("app", ["lib"]);
  app.fragment(textFragment("fn g() -> f32 { return #f(); }"));
  expect(texts(app.expand())).toEqual([
    "fn f() -> f32 {\nreturn 1.0;\n}\nfn g() -> f32 {\nreturn f();\n}\n",
  ]);
});

test("a fragment may use an export declared later in its own unit", () => {
  const build = new ShaderBuild();
  const unit = build.unit("u");
  unit.fragment(textFragment("fn main() { #helper(); }"));
  unit.fragment(textFragment("fn helper() {}", "helper"));
  const [main, helper] = unit.expand();
  expect("expanded" in main && main.expanded.text).toBe(
    "fn helper() {\n}\nfn main() {\nhelper();\n}\n"
  );
  expect("expanded" in helper).toBe(true);
});

test("a failing fragment doesn't stop the others", () => {
  const build = new ShaderBuild();
  const unit = build.unit("u");
  unit.fragment(textFragment("fn a() { #missing(); }"));
  unit.fragment(textFragment("fn b() { 1; }"));
  unit.fragment(textFragment("fn c() {}"));
  const results = unit.expand();
  const errors = results.map((r) => ("error" in r ? r.error.constructor : undefined));
  expect(errors).toEqual([UnresolvedExportError, CheckFailedError, undefined]);
});

test("a conflicting export fails only that fragment", () => {
  const build = new ShaderBuild();
  build.unit("lib").fragment(textFragment("fn f() {}", "f")).expand();
  const app = build.unit("app", ["lib"]);
  const src = hostSource("app.ts", "fn f() {}");
  app.fragment(fragmentFromText(src, { name: "f" }));
  app.fragment(textFragment("fn g() { #f(); }"));
  const [dup, user] = app.expand();
  expect("error" in dup && dup.error).toBeInstanceOf(NameConflictError);
  expect("expanded" in user).toBe(true);
});

test("expand is idempotent, and closes the unit", () => {
  const build = new ShaderBuild();
  const unit = build.unit("u");
  unit.fragment(textFragment("fn f() {}", "f"));
  const first = unit.expand();
  expect(unit.expand()).toBe(first);
  expect(() => unit.fragment(textFragment("fn g() {}"))).toThrow(
    "unit 'u' is already expanded"
  );
});

test("build options reach each fragment", () => {
  const checked: string[] = [];
  const build = new ShaderBuild({
    checker: (text) => {
      checked.push(text);
      return [];
    },
    directives: false,
  });
  const unit = build.unit("u");
  unit.fragment(textFragment("fn import() {}", "import"));
  unit.fragment(textFragment("#import"));
  const results = unit.expand();
  expect(texts(results)).toEqual(["fn import() {\n}\n", "fn import() {\n}\n"]);
  expect(checked.length).toBe(2);
});
