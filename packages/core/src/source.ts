import type { ClassifiedSegment, Classifier } from "./classifier.js";
import { SegmentOverlapError } from "./errors.js";
import { logger } from "./logger.js";
import type { Position } from "./position.js";
import { comparePositions, position, Span } from "./position.js";
import type { StyleCategory } from "./style-category.js";

export type LineFlag = "default" | "inserted" | "deleted";

/** A note printed under a line, pointing at `column` (default 1). */
export interface Annotation {
  readonly content: string;
  readonly column?: number;
}

export interface LineMeta {
  /** Number shown for the line; differs from its index in derived sources. */
  readonly number: number;
  readonly flag: LineFlag;
  readonly annotation?: Annotation;
}

export interface Overlay {
  readonly category: StyleCategory;
  readonly span: Span;
}

export interface SourceOptions {
  readonly name?: string;
}

/** One line handed to {@link Source.build}. Segments must sit on line 1. */
export interface LineInit {
  readonly text: string;
  readonly number?: number;
  readonly flag?: LineFlag;
  readonly annotation?: Annotation;
  readonly segments?: readonly ClassifiedSegment[];
}

interface LineEntry {
  readonly text: string;
  meta: LineMeta;
  segments: readonly ClassifiedSegment[];
}

const codePoints = (text: string) => [...text];

/** Moves a single-line segment onto `line`, keeping its columns. */
export function relocateSegment(
  segment: ClassifiedSegment,
  line: number
): ClassifiedSegment {
  if (segment.span.start.line === line) {
    return segment;
  }
  return {
    ...segment,
    span: Span.of(line, segment.span.start.column, line, segment.span.end.column),
  };
}

const maxPosition = (a: Position, b: Position) =>
  comparePositions(a, b) >= 0 ? a : b;
const minPosition = (a: Position, b: Position) =>
  comparePositions(a, b) <= 0 ? a : b;

function intersection(a: Span, b: Span): Span | undefined {
  const start = maxPosition(a.start, b.start);
  const end = minPosition(a.end, b.end);
  if (comparePositions(start, end) >= 0) {
    return undefined;
  }
  return Span.make(start, end);
}

const shiftPosition = (p: Position, lines: number) =>
  position(p.line - lines, p.column);

/**
 * Ordered lines of text with classification segments, line metadata and
 * style overlays.
 *
 * Overlays and annotations may be added until the source is handed to a
 * diff or a finder; after that callers must treat it as frozen.
 */
export class Source {
  private readonly entries: LineEntry[];
  private readonly overlayList: Overlay[] = [];
  readonly name: string | undefined;
  /** Whether the text this source was read from ended with LF. */
  readonly trailingNewline: boolean;

  private constructor(
    entries: LineEntry[],
    name: string | undefined,
    trailingNewline: boolean
  ) {
    this.entries = entries;
    this.name = name;
    this.trailingNewline = trailingNewline;
  }

  /** Splits on LF. A final LF ends the last line rather than opening one. */
  static fromString(text: string, options: SourceOptions = {}): Source {
    if (text.length === 0) {
      return new Source([], options.name, false);
    }
    const trailingNewline = text.endsWith("\n");
    const body = trailingNewline ? text.slice(0, -1) : text;
    return Source.fromLines(body.split("\n"), options, trailingNewline);
  }

  static fromLines(
    lines: readonly string[],
    options: SourceOptions = {},
    trailingNewline = false
  ): Source {
    return Source.build(
      lines.map((text) => ({ text })),
      options,
      trailingNewline
    );
  }

  /** Builds a source whose lines carry their own metadata and segments. */
  static build(
    lines: readonly LineInit[],
    options: SourceOptions = {},
    trailingNewline = false
  ): Source {
    const entries = lines.map((init, index): LineEntry => {
      const number = index + 1;
      return {
        text: init.text,
        meta: {
          number: init.number ?? number,
          flag: init.flag ?? "default",
          ...(init.annotation ? { annotation: init.annotation } : {}),
        },
        segments: (init.segments ?? []).map((segment) =>
          relocateSegment(segment, number)
        ),
      };
    });
    const source = new Source(entries, options.name, trailingNewline);
    for (const [index, entry] of entries.entries()) {
      source.validateSegments(index + 1, entry);
    }
    return source;
  }

  get lineCount(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  line(n: number): string {
    return this.entry(n).text;
  }

  *lines(): Generator<string> {
    for (const entry of this.entries) {
      yield entry.text;
    }
  }

  lineMeta(n: number): LineMeta {
    return this.entry(n).meta;
  }

  segments(n: number): readonly ClassifiedSegment[] {
    return this.entry(n).segments;
  }

  overlays(): readonly Overlay[] {
    return this.overlayList;
  }

  text(): string {
    const body = this.entries.map((entry) => entry.text).join("\n");
    return this.trailingNewline ? `${body}\n` : body;
  }

  /** Text covered by `span`; line breaks inside the span come back as LF. */
  substring(span: Span): string {
    let out = "";
    for (let n = Math.max(1, span.start.line); n <= span.end.line; n++) {
      if (n > this.lineCount) {
        break;
      }
      const part = span.clipToLine(n);
      if (!part) {
        continue;
      }
      const chars = codePoints(this.line(n));
      const from = part.start.column - 1;
      if (part.end.line > n) {
        out += `${chars.slice(from).join("")}\n`;
      } else {
        out += chars.slice(from, part.end.column - 1).join("");
      }
    }
    return out;
  }

  /**
   * Replaces every line's segments with the classifier's output for the
   * whole text. Throws {@link SegmentOverlapError} when a segment spans a
   * line break, falls outside its line or overlaps another one.
   */
  classify(classifier: Classifier): this {
    const byLine = new Map<number, ClassifiedSegment[]>();
    for (const segment of classifier.classify(this.text())) {
      const line = segment.span.start.line;
      const bucket = byLine.get(line);
      if (bucket) {
        bucket.push(segment);
      } else {
        byLine.set(line, [segment]);
      }
    }
    for (const line of byLine.keys()) {
      if (line < 1 || line > this.lineCount) {
        throw new SegmentOverlapError({
          line,
          message: `Segment on line ${line} is outside a source of ${this.lineCount} lines`,
        });
      }
    }
    for (const [index, entry] of this.entries.entries()) {
      const candidate = { ...entry, segments: byLine.get(index + 1) ?? [] };
      this.validateSegments(index + 1, candidate);
      entry.segments = candidate.segments;
    }
    return this;
  }

  /**
   * Adds style overlays. Spans are clipped to the source's lines; spans with
   * nothing left after clipping are dropped.
   */
  addOverlay(category: StyleCategory, ...spans: readonly Span[]): this {
    if (this.isEmpty) {
      if (spans.length > 0) {
        logger.debug("Dropping overlays on an empty source", category);
      }
      return this;
    }
    const bounds = Span.lines(1, this.lineCount);
    for (const span of spans) {
      const clipped = intersection(span, bounds);
      if (!clipped) {
        logger.debug("Dropping overlay outside source", category, span.toString());
        continue;
      }
      this.overlayList.push({ category, span: clipped });
    }
    return this;
  }

  clearOverlays(): this {
    this.overlayList.length = 0;
    return this;
  }

  annotate(n: number, annotation: Annotation): this {
    const entry = this.entry(n);
    entry.meta = { ...entry.meta, annotation };
    return this;
  }

  /**
   * Lines `first..last` (inclusive, clipped to the source) as a new source.
   * Line metadata keeps the original numbers; overlays move with their lines.
   */
  slice(first: number, last: number): Source {
    const from = Math.max(1, first);
    const to = Math.min(this.lineCount, last);
    if (from > to) {
      return new Source([], this.name, false);
    }
    const shift = from - 1;
    const entries = this.entries.slice(shift, to).map(
      (entry, index): LineEntry => ({
        text: entry.text,
        meta: entry.meta,
        segments: entry.segments.map((segment) =>
          relocateSegment(segment, index + 1)
        ),
      })
    );
    const sliced = new Source(
      entries,
      this.name,
      this.trailingNewline && to === this.lineCount
    );
    const window = Span.lines(from, to);
    for (const overlay of this.overlayList) {
      const kept = intersection(overlay.span, window);
      if (kept) {
        sliced.overlayList.push({
          category: overlay.category,
          span: Span.make(
            shiftPosition(kept.start, shift),
            shiftPosition(kept.end, shift)
          ),
        });
      }
    }
    return sliced;
  }

  private entry(n: number): LineEntry {
    const entry = this.entries[n - 1];
    if (!entry || n < 1) {
      throw new RangeError(
        `Line ${n} is outside a source of ${this.lineCount} lines`
      );
    }
    return entry;
  }

  private validateSegments(line: number, entry: LineEntry) {
    const width = codePoints(entry.text).length;
    const sorted = [...entry.segments].sort(
      (a, b) => a.span.start.column - b.span.start.column
    );
    let previousEnd = 1;
    for (const segment of sorted) {
      const { start, end } = segment.span;
      if (start.line !== end.line) {
        throw new SegmentOverlapError({
          line,
          message: `Segment ${segment.span.toString()} crosses a line break`,
        });
      }
      if (end.column > width + 1) {
        throw new SegmentOverlapError({
          line,
          message: `Segment ${segment.span.toString()} runs past the end of line ${line}`,
        });
      }
      if (start.column < previousEnd) {
        throw new SegmentOverlapError({
          line,
          message: `Segment ${segment.span.toString()} overlaps a previous segment on line ${line}`,
        });
      }
      previousEnd = end.column;
    }
  }
}
