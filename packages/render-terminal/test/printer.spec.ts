import type { ClassifiedSegment } from "@yamlshade/core";
import {
  fullDiff,
  hexColor,
  Source,
  Span,
  Style,
  Styles,
  summaryDiff,
} from "@yamlshade/core";
import { yamlClassifier } from "@yamlshade/lexer-yaml";
import stripAnsi from "strip-ansi";
import { describe, expect, test } from "vitest";
import { createChalk, paint } from "../src/ansi.js";
import type { Gutter } from "../src/gutter.js";
import { defaultGutter, diffGutter, lineNumberGutter } from "../src/gutter.js";
import type { PrinterOptions } from "../src/printer.js";
import { Printer } from "../src/printer.js";

const plain = (options: PrinterOptions = {}) =>
  new Printer({ colorLevel: 0, ...options });

const tenLines = () =>
  Source.fromLines(Array.from({ length: 10 }, (_, index) => `l${index + 1}`));

describe("paint", () => {
  test("emits truecolor escapes at level 3", () => {
    const style = Style.make({ foreground: hexColor("#d46eff") });
    expect(paint(style, "key", createChalk(3))).toBe(
      "\u001b[38;2;212;110;255mkey\u001b[39m"
    );
  });

  test("emits plain text at level 0 and for empty styles", () => {
    const style = Style.make({ foreground: hexColor("#d46eff"), bold: true });
    expect(paint(style, "key", createChalk(0))).toBe("key");
    expect(paint(Style.empty, "key", createChalk(3))).toBe("key");
  });

  test("runs the style transform", () => {
    const style = Style.make({ transform: (text) => text.toUpperCase() });
    expect(paint(style, "key", createChalk(0))).toBe("KEY");
  });
});

describe("Printer", () => {
  test("prints classified YAML with one styled run per category", () => {
    const printer = new Printer({ colorLevel: 3 });
    const chalk = createChalk(3);
    const source = Source.fromString("key: value\n").classify(yamlClassifier);
    const output = printer.print(source);

    const styles = printer.styles;
    expect(output).toBe(
      paint(styles.style("name-tag"), "key", chalk) +
        paint(styles.style("punctuation-mapping-value"), ":", chalk) +
        paint(styles.style("text"), " ", chalk) +
        paint(styles.style("literal-string"), "value", chalk) +
        "\n"
    );
    expect([...stripAnsi(output)]).toHaveLength(11);
  });

  test("escapes control characters without changing the rune count", () => {
    const output = plain().print(Source.fromString("a\x1bb\x00c"));
    expect(output).toBe("a␛b␀c");
    expect([...output]).toHaveLength(5);
  });

  test("expands tabs across styled runs when escaping is off", () => {
    const segments: ClassifiedSegment[] = [
      { span: Span.of(1, 1, 1, 3), category: "name-tag", text: "ab" },
    ];
    const source = Source.build([{ text: "ab\tc", segments }]);

    expect(plain({ controlEscape: false, tabWidth: 4 }).print(source)).toBe(
      "ab  c"
    );
    expect(plain().print(source)).toBe("ab␉c");
  });

  test("printSlice passes original line numbers to the gutter", () => {
    const seen: number[] = [];
    const gutter: Gutter = (lineNumber) => {
      seen.push(lineNumber);
      return `${lineNumber}|`;
    };
    expect(plain({ gutter }).printSlice(tenLines(), 2, 3)).toBe("2|l2\n3|l3");
    expect(seen).toEqual([2, 3]);
  });

  test("printSlice clips to the source", () => {
    expect(plain().printSlice(tenLines(), 9, 20)).toBe("l9\nl10");
    expect(plain().printSlice(tenLines(), 11, 20)).toBe("");
  });

  test("printSpans merges neighbouring spans and separates the rest", () => {
    const output = plain().printSpans(
      tenLines(),
      Span.of(7, 1, 7, 2),
      Span.line(2),
      Span.of(3, 1, 3, 2)
    );
    expect(output).toBe("l2\nl3\n\nl7");
  });

  test("gives the gutter the index and count of printed lines", () => {
    const contexts: string[] = [];
    const gutter: Gutter = (lineNumber, context) => {
      contexts.push(
        `${lineNumber} ${context.index}/${context.totalLines} ${context.kind}`
      );
      return "";
    };
    plain({ gutter }).printSlice(tenLines(), 4, 5);
    expect(contexts).toEqual(["4 0/2 line", "5 1/2 line"]);
  });

  test("prints annotations under their line", () => {
    const source = Source.fromString("key: value\n").annotate(1, {
      content: "expected a number",
      column: 6,
    });
    expect(plain().print(source)).toBe(
      "key: value\n     ^ expected a number\n"
    );
    expect(plain({ gutter: lineNumberGutter() }).print(source)).toBe(
      "   1 key: value\n          ^ expected a number\n"
    );
    expect(plain({ annotations: false }).print(source)).toBe("key: value\n");
  });

  test("disjoint overlays print the same in either order", () => {
    const printer = new Printer({ colorLevel: 3 });
    const first = Source.fromString("abcdef")
      .addOverlay("generic-deleted", Span.of(1, 1, 1, 3))
      .addOverlay("generic-inserted", Span.of(1, 4, 1, 6));
    const second = Source.fromString("abcdef")
      .addOverlay("generic-inserted", Span.of(1, 4, 1, 6))
      .addOverlay("generic-deleted", Span.of(1, 1, 1, 3));
    expect(printer.print(first)).toBe(printer.print(second));
    expect(stripAnsi(printer.print(first))).toBe("abcdef");
  });

  test("overlays change the style of the characters they cover", () => {
    const styles = Styles.make(Style.empty, {
      "generic-highlight": Style.make({ bold: true }),
    });
    const printer = new Printer({ styles, colorLevel: 1 });
    const source = Source.fromString("abc").addOverlay(
      "generic-highlight",
      Span.of(1, 2, 1, 3)
    );
    expect(printer.print(source)).toBe("a\u001b[1mb\u001b[22mc");
  });

  test("an empty source prints nothing", () => {
    expect(plain().print(Source.fromString(""))).toBe("");
  });
});

describe("Printer.printDiff", () => {
  const origin = Source.fromString("a\nb\nc\n");
  const tip = Source.fromString("a\nB\nc\n");

  test("prints a full diff with markers", () => {
    expect(
      plain({ gutter: diffGutter() }).printDiff(fullDiff(origin, tip))
    ).toBe("  a\n- b\n+ B\n  c\n");
  });

  test("the default gutter shows numbers and markers", () => {
    expect(
      plain({ gutter: defaultGutter() }).printDiff(fullDiff(origin, tip))
    ).toBe("   1   a\n   2 - b\n   2 + B\n   3   c\n");
  });

  test("separates summary hunks with a blank line", () => {
    const lines = Array.from({ length: 10 }, (_, index) => `l${index + 1}`);
    const changed = [...lines];
    changed[1] = "L2";
    changed[8] = "L9";
    const view = summaryDiff(
      Source.fromLines(lines),
      Source.fromLines(changed),
      1
    );

    expect(plain().printDiff(view)).toBe(
      "l1\nl2\nL2\nl3\n\nl8\nl9\nL9\nl10"
    );
    expect(
      plain().printDiff(view, { hunkHeaders: true, hunkSeparator: "⋯" })
    ).toBe(
      "@@ -1,3 +1,3 @@\nl1\nl2\nL2\nl3\n⋯\n@@ -8,3 +8,3 @@\nl8\nl9\nL9\nl10"
    );
  });

  test("a summary of identical sources is empty", () => {
    expect(plain().printDiff(summaryDiff(origin, origin, 3))).toBe("");
  });
});

describe("Printer wrapping", () => {
  test("wraps at the width left after the gutter", () => {
    const source = Source.fromString("alpha beta gamma\n");
    expect(plain({ width: 10 }).print(source)).toBe("alpha \nbeta gamma\n");
    const numbered = plain({ gutter: lineNumberGutter(), width: 12 });
    expect(numbered.print(source)).toBe(
      "   1 alpha \n   - beta \n   - gamma\n"
    );
  });

  test("continuation rows get the wrap gutter", () => {
    const gutter: Gutter = (_lineNumber, context) =>
      context.kind === "wrap" ? "~ " : "> ";
    const source = Source.fromString("aaa bbb");
    expect(plain({ gutter, width: 6 }).print(source)).toBe("> aaa \n~ bbb");
  });

  test("changed lines keep their marker on every row", () => {
    const view = fullDiff(
      Source.fromString("a\n"),
      Source.fromString("abc def\n")
    );
    expect(plain({ gutter: diffGutter(), width: 6 }).printDiff(view)).toBe(
      "- a\n+ abc \n+ def\n"
    );
  });

  test("keeps every character of a styled line", () => {
    const line = "name: alpha beta gamma delta epsilon";
    const source = Source.fromString(line).classify(yamlClassifier);
    const printer = new Printer({ colorLevel: 3, width: 12 });
    const rows = stripAnsi(printer.print(source)).split("\n");

    expect(rows.length).toBeGreaterThan(1);
    expect(rows.every((row) => [...row].length <= 12)).toBe(true);
    expect([...rows.join("")]).toHaveLength([...line].length);
    expect(rows.join("")).toBe(line);
  });

  test("a width of zero never wraps", () => {
    const line = "x".repeat(200);
    expect(plain({ width: 0 }).print(Source.fromString(line))).toBe(line);
  });
});
