import { expect, test } from "vitest";
import { importCandidates, normalize, rmBaseDirPrefix } from "../PathUtil.js";

test("normalize", () => {
  expect(normalize("./a/b/../c")).toBe("a/c");
  expect(normalize("/x/./y//z")).toBe("/x/y/z");
  expect(normalize("../a")).toBe("../a");
});

test("import candidates swap .js for host suffixes", () => {
  const candidates = importCandidates("src/main.ts", "./util.js");
  expect(candidates.slice(0, 3)).toEqual([
    "src/util.js",
    "src/util.ts",
    "src/util.tsx",
  ]);
  expect(candidates).toContain("src/util.js/index.ts");
});

test("import candidates from a parent directory", () => {
  expect(importCandidates("src/a/main.ts", "../b")).toContain("src/b/index.ts");
});

test("rmBaseDirPrefix", () => {
  expect(rmBaseDirPrefix("/home/me/proj/src/a.ts", "proj")).toBe("src/a.ts");
  expect(rmBaseDirPrefix("src/a.ts", "other")).toBe("src/a.ts");
  expect(rmBaseDirPrefix("src/a.ts", undefined)).toBe("src/a.ts");
});
