import type { DiffView, Source, Span, Style, StyleCategory, Styles } from "@yamlshade/core";
import { StyleComposer, unionAdjacentOrOverlapping } from "@yamlshade/core";
import type { ChalkInstance } from "chalk";
import type { ColorSupportLevel } from "./ansi.js";
import { createChalk, paint } from "./ansi.js";
import { escapeControls, expandTabs } from "./control-escape.js";
import type { Gutter, GutterContext } from "./gutter.js";
import { noGutter } from "./gutter.js";
import { defaultStyles } from "./themes.js";
import { wrapRows } from "./wrap.js";

export interface PrinterOptions {
  /** Defaults to the bundled dark theme. */
  readonly styles?: Styles;
  readonly gutter?: Gutter;
  /** Show control characters as control pictures. Default `true`. */
  readonly controlEscape?: boolean;
  /** TAB stop width when control characters are not escaped. Default 8. */
  readonly tabWidth?: number;
  /** Chalk color level; defaults to what the terminal supports. */
  readonly colorLevel?: ColorSupportLevel;
  /** Print line annotations under their lines. Default `true`. */
  readonly annotations?: boolean;
  /**
   * Total row width, gutter included. Longer lines wrap onto continuation
   * rows. Default 0, which never wraps.
   */
  readonly width?: number;
}

export interface PrintDiffOptions {
  /** Line printed between summary hunks. Default: an empty line. */
  readonly hunkSeparator?: string;
  /** Print each summary hunk's `@@` header above it. */
  readonly hunkHeaders?: boolean;
}

interface Window {
  readonly first: number;
  readonly last: number;
}

interface Cell {
  readonly style: Style | undefined;
  readonly char: string;
}

/**
 * Renders sources as styled terminal text.
 *
 * Every character starts with its segment's style; overlays covering it are
 * then blended on in the order they were added. Runs of characters that end
 * up with the same style object are emitted together.
 */
export class Printer {
  readonly styles: Styles;
  private readonly composer: StyleComposer;
  private readonly chalk: ChalkInstance;
  private readonly gutter: Gutter;
  private readonly controlEscape: boolean;
  private readonly tabWidth: number;
  private readonly annotations: boolean;
  private readonly width: number;

  constructor(options: PrinterOptions = {}) {
    this.styles = options.styles ?? defaultStyles();
    this.composer = StyleComposer.for(this.styles);
    this.chalk = createChalk(options.colorLevel);
    this.gutter = options.gutter ?? noGutter;
    this.controlEscape = options.controlEscape ?? true;
    this.tabWidth = Math.max(1, options.tabWidth ?? 8);
    this.annotations = options.annotations ?? true;
    this.width = Math.max(0, options.width ?? 0);
  }

  print(source: Source): string {
    const body = this.renderWindow(source, {
      first: 1,
      last: source.lineCount,
    }).join("\n");
    return source.trailingNewline && source.lineCount > 0 ? `${body}\n` : body;
  }

  /** Lines `first..last`, inclusive and clipped to the source. */
  printSlice(source: Source, first: number, last: number): string {
    return this.renderWindow(source, { first, last }).join("\n");
  }

  /**
   * The lines touched by `spans`. Spans on overlapping or consecutive lines
   * print as one block; blocks are separated by an empty line.
   */
  printSpans(source: Source, ...spans: readonly Span[]): string {
    return unionAdjacentOrOverlapping(spans)
      .map((span) =>
        this.renderWindow(source, { first: span.firstLine, last: span.lastLine })
      )
      .filter((lines) => lines.length > 0)
      .map((lines) => lines.join("\n"))
      .join("\n\n");
  }

  printDiff(view: DiffView, options: PrintDiffOptions = {}): string {
    if (view.mode === "full") {
      return this.print(view.source);
    }
    if (view.hunks.length === 0) {
      return "";
    }
    const separator = `\n${options.hunkSeparator ?? ""}\n`;
    const body = view.hunks
      .map((hunk) => {
        const lines = this.renderWindow(view.source, {
          first: hunk.span.firstLine,
          last: hunk.span.lastLine,
        });
        if (options.hunkHeaders) {
          lines.unshift(this.paintCategory("text-subtle", hunk.header));
        }
        return lines.join("\n");
      })
      .join(separator);
    return view.source.trailingNewline ? `${body}\n` : body;
  }

  private paintCategory(category: StyleCategory, text: string): string {
    return paint(this.styles.style(category), text, this.chalk);
  }

  private renderWindow(source: Source, window: Window): string[] {
    const first = Math.max(1, window.first);
    const last = Math.min(source.lineCount, window.last);
    const rendered: string[] = [];
    const totalLines = Math.max(0, last - first + 1);
    const contentWidth = this.contentWidth(source, first, last, totalLines);
    for (let n = first; n <= last; n++) {
      const meta = source.lineMeta(n);
      const context: GutterContext = {
        index: n - first,
        flag: meta.flag,
        totalLines,
        kind: "line",
        styles: this.styles,
        paint: (category, text) => this.paintCategory(category, text),
      };
      const cells = this.renderCells(source, n);
      const rows = wrapRows(
        cells.map((cell) => cell.char),
        contentWidth
      );
      const wrapContext: GutterContext = { ...context, kind: "wrap" };
      for (const [row, [start, end]] of rows.entries()) {
        rendered.push(
          this.gutter(meta.number, row === 0 ? context : wrapContext) +
            this.paintCells(cells.slice(start, end))
        );
      }
      if (this.annotations && meta.annotation) {
        const column = Math.max(1, meta.annotation.column ?? 1);
        rendered.push(
          this.gutter(meta.number, { ...context, kind: "annotation" }) +
            this.paintCategory(
              "comment",
              `${" ".repeat(column - 1)}^ ${meta.annotation.content}`
            )
        );
      }
    }
    return rendered;
  }

  private resolveStyles(source: Source, n: number, width: number): Style[] {
    const resolved = new Array<Style>(width).fill(this.styles.style("text"));
    for (const segment of source.segments(n)) {
      const style = this.styles.style(segment.category);
      const end = Math.min(width, segment.span.end.column - 1);
      for (let index = segment.span.start.column - 1; index < end; index++) {
        resolved[index] = style;
      }
    }
    for (const overlay of source.overlays()) {
      const part = overlay.span.clipToLine(n);
      if (!part) {
        continue;
      }
      const style = this.styles.style(overlay.category);
      const end =
        part.end.line > n ? width : Math.min(width, part.end.column - 1);
      for (let index = part.start.column - 1; index < end; index++) {
        const current = resolved[index];
        if (current) {
          resolved[index] = this.composer.blend(current, style);
        }
      }
    }
    return resolved;
  }

  /**
   * Columns left for content once the gutter is drawn, or 0 when the printer
   * does not wrap. The gutter is measured unpainted at the widest line number
   * of the window.
   */
  private contentWidth(
    source: Source,
    first: number,
    last: number,
    totalLines: number
  ): number {
    if (this.width === 0 || first > last) {
      return 0;
    }
    let widest = 0;
    for (let n = first; n <= last; n++) {
      widest = Math.max(widest, source.lineMeta(n).number);
    }
    const sample = this.gutter(widest, {
      index: 0,
      flag: "default",
      totalLines,
      kind: "line",
      styles: this.styles,
      paint: (_category, text) => text,
    });
    return Math.max(1, this.width - [...sample].length);
  }

  /** Display characters of line `n` with their resolved styles. */
  private renderCells(source: Source, n: number): Cell[] {
    const chars = [...source.line(n)];
    const resolved = this.resolveStyles(source, n, chars.length);
    const cells: Cell[] = [];
    let column = 0;
    let runStart = 0;
    for (let index = 1; index <= chars.length; index++) {
      const style = resolved[runStart];
      if (index < chars.length && resolved[index] === style) {
        continue;
      }
      const raw = chars.slice(runStart, index).join("");
      let text: string;
      if (this.controlEscape) {
        text = escapeControls(raw);
      } else {
        const expanded = expandTabs(raw, this.tabWidth, column);
        text = expanded.text;
        column = expanded.column;
      }
      for (const char of text) {
        cells.push({ style, char });
      }
      runStart = index;
    }
    return cells;
  }

  private paintCells(cells: readonly Cell[]): string {
    let out = "";
    let runStart = 0;
    for (let index = 1; index <= cells.length; index++) {
      const style = cells[runStart]?.style;
      if (index < cells.length && cells[index]?.style === style) {
        continue;
      }
      const text = cells
        .slice(runStart, index)
        .map((cell) => cell.char)
        .join("");
      out += style ? paint(style, text, this.chalk) : text;
      runStart = index;
    }
    return out;
  }
}
