import { describe, expect, test } from "vitest";
import { wrapRows } from "../src/wrap.js";

const rows = (text: string, width: number) => {
  const chars = [...text];
  return wrapRows(chars, width).map(([start, end]) =>
    chars.slice(start, end).join("")
  );
};

describe("wrapRows", () => {
  test("breaks after the last space that fits", () => {
    expect(rows("alpha beta gamma", 10)).toEqual(["alpha ", "beta gamma"]);
  });

  test("also breaks after slashes and hyphens", () => {
    expect(rows("src/main-entry", 6)).toEqual(["src/", "main-", "entry"]);
  });

  test("cuts words longer than the width", () => {
    expect(rows("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  test("counts code points, not UTF-16 units", () => {
    expect(rows("😀😀😀", 2)).toEqual(["😀😀", "😀"]);
  });

  test("a zero width or a short line gives one row", () => {
    expect(rows("alpha beta", 0)).toEqual(["alpha beta"]);
    expect(rows("short", 10)).toEqual(["short"]);
    expect(rows("", 3)).toEqual([""]);
  });
});
