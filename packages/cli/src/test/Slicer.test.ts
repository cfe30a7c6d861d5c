import { expect, test } from "vitest";
import { sliceReplace } from "../Slicer.js";

test("replace slices in any order", () => {
  const replaced = sliceReplace("aaabbbbbc", [
    { start: 8, end: 9, replacement: "Z" },
    { start: 3, end: 8, replacement: "XXX" },
  ]);
  expect(replaced).toBe("aaaXXXZ");
});

test("no slices", () => {
  expect(sliceReplace("abc", [])).toBe("abc");
});
