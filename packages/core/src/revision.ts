import type { Source } from "./source.js";

/**
 * A node in a chain of sources, from the origin (first) to the tip
 * (latest). Navigation methods return other nodes of the same chain.
 */
export class Revision {
  private previous: Revision | undefined;
  private next: Revision | undefined;

  private constructor(readonly source: Source) {}

  static of(source: Source): Revision {
    return new Revision(source);
  }

  /** Builds a chain in order and returns its tip. */
  static chain(first: Source, ...rest: readonly Source[]): Revision {
    let revision = Revision.of(first);
    for (const source of rest) {
      revision = revision.append(source);
    }
    return revision;
  }

  get name(): string | undefined {
    return this.source.name;
  }

  get parent(): Revision | undefined {
    return this.previous;
  }

  get child(): Revision | undefined {
    return this.next;
  }

  get atOrigin(): boolean {
    return this.previous === undefined;
  }

  get atTip(): boolean {
    return this.next === undefined;
  }

  /** Adds `source` after this node, dropping any later revisions. */
  append(source: Source): Revision {
    const revision = new Revision(source);
    revision.previous = this;
    this.next = revision;
    return revision;
  }

  /** Adds `source` before this node, dropping any earlier revisions. */
  prepend(source: Source): Revision {
    const revision = new Revision(source);
    revision.next = this;
    this.previous = revision;
    return revision;
  }

  /** Moves `n` steps towards the tip (or the origin when negative), stopping at either end. */
  seek(n: number): Revision {
    let current: Revision = this;
    for (let step = 0; step < Math.abs(n); step++) {
      const target = n > 0 ? current.next : current.previous;
      if (!target) {
        break;
      }
      current = target;
    }
    return current;
  }

  origin(): Revision {
    let current: Revision = this;
    while (current.previous) {
      current = current.previous;
    }
    return current;
  }

  tip(): Revision {
    let current: Revision = this;
    while (current.next) {
      current = current.next;
    }
    return current;
  }

  /** Zero-based position from the origin; clamps at the tip. */
  at(index: number): Revision {
    return this.origin().seek(index);
  }

  index(): number {
    let index = 0;
    for (let current = this.previous; current; current = current.previous) {
      index++;
    }
    return index;
  }

  count(): number {
    let count = 0;
    for (let current: Revision | undefined = this.origin(); current; current = current.next) {
      count++;
    }
    return count;
  }

  /** Source names from origin to tip; unnamed sources give `""`. */
  names(): string[] {
    const names: string[] = [];
    for (let current: Revision | undefined = this.origin(); current; current = current.next) {
      names.push(current.name ?? "");
    }
    return names;
  }
}
