import { describe, expect, test } from "vitest";
import {
  escapeControl,
  escapeControls,
  expandTabs,
} from "../src/control-escape.js";

describe("escapeControl", () => {
  test("maps C0 controls to control pictures", () => {
    expect(escapeControl("\x00")).toBe("␀");
    expect(escapeControl("\x1b")).toBe("␛");
    expect(escapeControl("\t")).toBe("␉");
  });

  test("maps DEL and C1 controls", () => {
    expect(escapeControl("\x7f")).toBe("␡");
    expect(escapeControl("\x85")).toBe("�");
  });

  test("passes other characters through", () => {
    expect(escapeControl("é")).toBe("é");
    expect(escapeControl("😀")).toBe("😀");
  });
});

describe("escapeControls", () => {
  test("neutralises escape sequences one code point each", () => {
    const escaped = escapeControls("a\x1b[31mb\x00c");
    expect(escaped).toBe("a␛[31mb␀c");
    expect([...escaped]).toHaveLength(8);
  });
});

describe("expandTabs", () => {
  test("advances to the next tab stop", () => {
    expect(expandTabs("a\tb", 4)).toEqual({ text: "a   b", column: 5 });
  });

  test("counts from the given column", () => {
    expect(expandTabs("\tx", 4, 1)).toEqual({ text: "   x", column: 5 });
    expect(expandTabs("\t", 4, 4)).toEqual({ text: "    ", column: 8 });
  });
});
