import { describe, expect, test } from "vitest";
import { InvalidSpanError } from "../src/errors.js";
import {
  comparePositions,
  position,
  Span,
  unionAdjacentOrOverlapping,
  uniqueSpans,
} from "../src/position.js";

describe("Span", () => {
  test("rejects a start after the end", () => {
    expect(() => Span.of(2, 1, 1, 5)).toThrow(InvalidSpanError);
  });

  test("an empty span contains nothing", () => {
    const span = Span.of(3, 4, 3, 4);
    expect(span.isEmpty).toBe(true);
    expect(span.contains(position(3, 4))).toBe(false);
  });

  test("line spans end at the start of the next line", () => {
    const span = Span.line(2);
    expect(span.toString()).toBe("2:1-3:1");
    expect(span.firstLine).toBe(2);
    expect(span.lastLine).toBe(2);
    expect(span.contains(position(2, 80))).toBe(true);
    expect(span.contains(position(3, 1))).toBe(false);
  });

  test("lastLine is the end line for mid-line ends", () => {
    expect(Span.of(1, 3, 4, 2).lastLine).toBe(4);
    expect(Span.lines(1, 4).lastLine).toBe(4);
  });

  test("intersection is half-open", () => {
    const a = Span.of(1, 1, 1, 5);
    expect(a.intersects(Span.of(1, 5, 1, 9))).toBe(false);
    expect(a.intersects(Span.of(1, 4, 1, 9))).toBe(true);
    expect(Span.lines(1, 3).containsSpan(Span.of(2, 2, 3, 7))).toBe(true);
    expect(Span.line(1).containsSpan(Span.of(1, 2, 2, 2))).toBe(false);
  });

  test("clipToLine splits multi-line spans per line", () => {
    const span = Span.of(1, 3, 3, 4);
    expect(span.clipToLine(1)?.toString()).toBe("1:3-2:1");
    expect(span.clipToLine(2)?.toString()).toBe("2:1-3:1");
    expect(span.clipToLine(3)?.toString()).toBe("3:1-3:4");
    expect(span.clipToLine(4)).toBeUndefined();
    expect(Span.line(1).clipToLine(2)).toBeUndefined();
  });

  test("orders by start, then end", () => {
    expect(comparePositions(position(1, 9), position(2, 1))).toBeLessThan(0);
    expect(Span.of(1, 1, 1, 2).equals(Span.of(1, 1, 1, 2))).toBe(true);
  });
});

describe("span sets", () => {
  test("merges overlapping and consecutive line ranges", () => {
    const merged = unionAdjacentOrOverlapping([
      Span.of(5, 1, 5, 3),
      Span.of(1, 2, 1, 4),
      Span.of(2, 1, 2, 2),
      Span.of(9, 1, 9, 2),
      Span.of(4, 7, 4, 9),
    ]);
    expect(merged.map((span) => span.toString())).toEqual([
      "1:2-2:2",
      "4:7-5:3",
      "9:1-9:2",
    ]);
  });

  test("keeps the first of each equal span", () => {
    const unique = uniqueSpans([
      Span.of(1, 1, 1, 2),
      Span.of(2, 1, 2, 2),
      Span.of(1, 1, 1, 2),
    ]);
    expect(unique.map((span) => span.toString())).toEqual([
      "1:1-1:2",
      "2:1-2:2",
    ]);
  });
});
