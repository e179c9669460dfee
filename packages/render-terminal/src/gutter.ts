import type { LineFlag, StyleCategory, Styles } from "@yamlshade/core";

export interface GutterContext {
  /** Position of the line among the lines being printed, from 0. */
  readonly index: number;
  readonly flag: LineFlag;
  readonly totalLines: number;
  /**
   * `"annotation"` for the extra line printed under an annotated line,
   * `"wrap"` for the continuation rows of a wrapped line.
   */
  readonly kind: "line" | "annotation" | "wrap";
  readonly styles: Styles;
  paint(category: StyleCategory, text: string): string;
}

/** Prefix for one printed line, given its displayed line number. */
export type Gutter = (lineNumber: number, context: GutterContext) => string;

const NUMBER_WIDTH = 4;

export const noGutter: Gutter = () => "";

export function lineNumberGutter(): Gutter {
  return (lineNumber, context) => {
    if (context.kind === "annotation") {
      return " ".repeat(NUMBER_WIDTH + 1);
    }
    if (context.kind === "wrap") {
      return context.paint("text-subtle", `${"-".padStart(NUMBER_WIDTH)} `);
    }
    return context.paint(
      "text-subtle",
      `${String(lineNumber).padStart(NUMBER_WIDTH)} `
    );
  };
}

const markers: Record<LineFlag, readonly [StyleCategory, string]> = {
  inserted: ["generic-inserted", "+"],
  deleted: ["generic-deleted", "-"],
  default: ["text", " "],
};

export function diffGutter(): Gutter {
  return (_lineNumber, context) => {
    if (context.kind === "annotation") {
      return "  ";
    }
    const [category, marker] = markers[context.flag];
    return `${context.paint(category, marker)} `;
  };
}

/** Line number followed by the diff marker. */
export function defaultGutter(): Gutter {
  const numbers = lineNumberGutter();
  const diff = diffGutter();
  return (lineNumber, context) =>
    numbers(lineNumber, context) + diff(lineNumber, context);
}
