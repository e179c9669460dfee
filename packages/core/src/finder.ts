import { Normalizer } from "./normalizer.js";
import { Span, uniqueSpans } from "./position.js";
import type { Source } from "./source.js";

export interface FinderOptions {
  readonly normalizer?: Normalizer;
}

interface LineIndex {
  readonly line: number;
  readonly text: string;
  /** Original column of every UTF-16 unit of `text`, plus one end sentinel. */
  readonly columns: Int32Array;
}

/**
 * Substring search over folded text. Hits come back as spans in the
 * original source's columns and never cross a line break.
 */
export class Finder {
  readonly normalizer: Normalizer;
  private sourceRef: WeakRef<Source> | undefined;
  private index: readonly LineIndex[] = [];
  private readonly folded = new Map<string, string>();

  constructor(options: FinderOptions = {}) {
    this.normalizer = options.normalizer ?? new Normalizer();
  }

  /** The loaded source, while something else still holds it. */
  get source(): Source | undefined {
    return this.sourceRef?.deref();
  }

  /** Indexes `source`, replacing any previous index. */
  load(source: Source): this {
    const index: LineIndex[] = [];
    let line = 0;
    for (const text of source.lines()) {
      line++;
      index.push(this.indexLine(line, text));
    }
    this.index = index;
    this.sourceRef = new WeakRef(source);
    return this;
  }

  /** Leftmost non-overlapping hits, in source order. */
  find(query: string): Span[] {
    const needle = this.normalizer.normalize(query);
    if (needle.length === 0) {
      return [];
    }
    const hits: Span[] = [];
    for (const entry of this.index) {
      let from = 0;
      for (;;) {
        const found = entry.text.indexOf(needle, from);
        if (found === -1) {
          break;
        }
        const startColumn = entry.columns[found] ?? 1;
        const endColumn = (entry.columns[found + needle.length - 1] ?? 0) + 1;
        hits.push(Span.of(entry.line, startColumn, entry.line, endColumn));
        from = found + needle.length;
      }
    }
    return uniqueSpans(hits);
  }

  private indexLine(line: number, text: string): LineIndex {
    let normalized = "";
    const columns: number[] = [];
    let column = 0;
    for (const char of text) {
      column++;
      const folded = this.fold(char);
      normalized += folded;
      for (let unit = 0; unit < folded.length; unit++) {
        columns.push(column);
      }
    }
    columns.push(column + 1);
    return { line, text: normalized, columns: Int32Array.from(columns) };
  }

  private fold(char: string): string {
    const cached = this.folded.get(char);
    if (cached !== undefined) {
      return cached;
    }
    const folded = this.normalizer.normalize(char);
    this.folded.set(char, folded);
    return folded;
  }
}
