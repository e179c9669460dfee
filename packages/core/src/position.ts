import { InvalidSpanError } from "./errors.js";

/** A 1-based location; columns count Unicode code points. */
export interface Position {
  readonly line: number;
  readonly column: number;
}

export const position = (line: number, column: number): Position => ({
  line,
  column,
});

export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) {
    return a.line - b.line;
  }
  return a.column - b.column;
}

const formatPosition = (p: Position) => `${p.line}:${p.column}`;

/**
 * Half-open range `[start, end)` of positions in a source.
 *
 * A span that runs to the end of line `n` ends at `(n + 1, 1)`, so
 * `Span.line(n)` covers the whole of line `n` and nothing of line `n + 1`.
 */
export class Span {
  private constructor(
    readonly start: Position,
    readonly end: Position
  ) {}

  static make(start: Position, end: Position): Span {
    if (comparePositions(start, end) > 0) {
      throw new InvalidSpanError({
        start: formatPosition(start),
        end: formatPosition(end),
        message: `Span start ${formatPosition(start)} is after end ${formatPosition(end)}`,
      });
    }
    return new Span(start, end);
  }

  static of(
    startLine: number,
    startColumn: number,
    endLine: number,
    endColumn: number
  ): Span {
    return Span.make(
      position(startLine, startColumn),
      position(endLine, endColumn)
    );
  }

  static line(n: number): Span {
    return Span.of(n, 1, n + 1, 1);
  }

  static lines(first: number, last: number): Span {
    return Span.of(first, 1, last + 1, 1);
  }

  get isEmpty(): boolean {
    return comparePositions(this.start, this.end) === 0;
  }

  get firstLine(): number {
    return this.start.line;
  }

  /** Last line holding at least one position of the span. */
  get lastLine(): number {
    if (this.end.column === 1 && this.end.line > this.start.line) {
      return this.end.line - 1;
    }
    return this.end.line;
  }

  contains(p: Position): boolean {
    return (
      comparePositions(this.start, p) <= 0 && comparePositions(p, this.end) < 0
    );
  }

  containsSpan(other: Span): boolean {
    return (
      comparePositions(this.start, other.start) <= 0 &&
      comparePositions(other.end, this.end) <= 0
    );
  }

  intersects(other: Span): boolean {
    return (
      comparePositions(this.start, other.end) < 0 &&
      comparePositions(other.start, this.end) < 0
    );
  }

  /**
   * The part of this span on line `n`, or `undefined` when the span holds
   * no position there. A part reaching the line end ends at `(n + 1, 1)`.
   */
  clipToLine(n: number): Span | undefined {
    if (n < this.start.line || n > this.end.line) {
      return undefined;
    }
    const startColumn = n === this.start.line ? this.start.column : 1;
    const clipped =
      n === this.end.line
        ? Span.of(n, startColumn, n, this.end.column)
        : Span.of(n, startColumn, n + 1, 1);
    return clipped.isEmpty ? undefined : clipped;
  }

  equals(other: Span): boolean {
    return compareSpans(this, other) === 0;
  }

  toString(): string {
    return `${formatPosition(this.start)}-${formatPosition(this.end)}`;
  }
}

export function compareSpans(a: Span, b: Span): number {
  return comparePositions(a.start, b.start) || comparePositions(a.end, b.end);
}

const maxPosition = (a: Position, b: Position) =>
  comparePositions(a, b) >= 0 ? a : b;

/**
 * Sorts spans by start and merges every pair whose line ranges overlap or
 * sit on consecutive lines.
 */
export function unionAdjacentOrOverlapping(spans: readonly Span[]): Span[] {
  const sorted = [...spans].sort(compareSpans);
  const merged: Span[] = [];
  for (const span of sorted) {
    const previous = merged.at(-1);
    if (previous && span.firstLine <= previous.lastLine + 1) {
      merged[merged.length - 1] = Span.make(
        previous.start,
        maxPosition(previous.end, span.end)
      );
      continue;
    }
    merged.push(span);
  }
  return merged;
}

/** Drops spans equal to an earlier one, keeping the first occurrence order. */
export function uniqueSpans(spans: Iterable<Span>): Span[] {
  const seen = new Set<string>();
  const unique: Span[] = [];
  for (const span of spans) {
    const key = span.toString();
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(span);
    }
  }
  return unique;
}
