import { Span } from "./position.js";
import type { Revision } from "./revision.js";
import type { LineInit } from "./source.js";
import { Source } from "./source.js";

export type DiffEvent =
  | { readonly type: "equal"; readonly originLine: number; readonly tipLine: number }
  | { readonly type: "delete"; readonly originLine: number }
  | { readonly type: "insert"; readonly tipLine: number };

export interface DiffHunk {
  /** Lines of the hunk in the view's source. */
  readonly span: Span;
  /** First to last changed line of the hunk in the view's source. */
  readonly changed: Span;
  readonly originStart: number;
  readonly originCount: number;
  readonly tipStart: number;
  readonly tipCount: number;
  /** Unified-diff header, `@@ -a,b +c,d @@`. */
  readonly header: string;
}

export interface DiffView {
  readonly mode: DiffMode;
  readonly source: Source;
  /** One span per hunk in summary views; empty for full views. */
  readonly highlightRanges: readonly Span[];
  readonly hunks: readonly DiffHunk[];
  readonly events: readonly DiffEvent[];
}

export type DiffMode = "full" | "summary";

const at = (values: Int32Array, index: number) => values[index] ?? 0;

/**
 * Myers O(N·D) line diff. Within every run of changes the deletions come
 * before the insertions.
 *
 * The sides are searched in a canonical order and the result mirrored back
 * when they were swapped, so `diffLines(b, a)` keeps the same equal lines as
 * `diffLines(a, b)`.
 */
export function diffLines(
  origin: readonly string[],
  tip: readonly string[]
): DiffEvent[] {
  if (compareSides(origin, tip) > 0) {
    return deletionsFirst(myers(tip, origin).map(mirror));
  }
  return deletionsFirst(myers(origin, tip));
}

function compareSides(left: readonly string[], right: readonly string[]) {
  if (left.length !== right.length) {
    return left.length - right.length;
  }
  for (let index = 0; index < left.length; index++) {
    const a = left[index] ?? "";
    const b = right[index] ?? "";
    if (a !== b) {
      return a < b ? -1 : 1;
    }
  }
  return 0;
}

function mirror(event: DiffEvent): DiffEvent {
  switch (event.type) {
    case "equal":
      return {
        type: "equal",
        originLine: event.tipLine,
        tipLine: event.originLine,
      };
    case "delete":
      return { type: "insert", tipLine: event.originLine };
    case "insert":
      return { type: "delete", originLine: event.tipLine };
  }
}

function myers(origin: readonly string[], tip: readonly string[]): DiffEvent[] {
  const n = origin.length;
  const m = tip.length;
  const max = n + m;
  const offset = max + 1;
  const v = new Int32Array(2 * max + 3);
  const trace: Int32Array[] = [];

  search: for (let d = 0; d <= max; d++) {
    trace.push(v.slice());
    for (let k = -d; k <= d; k += 2) {
      let x =
        k === -d || (k !== d && at(v, offset + k - 1) < at(v, offset + k + 1))
          ? at(v, offset + k + 1)
          : at(v, offset + k - 1) + 1;
      let y = x - k;
      while (x < n && y < m && origin[x] === tip[y]) {
        x++;
        y++;
      }
      v[offset + k] = x;
      if (x >= n && y >= m) {
        break search;
      }
    }
  }

  const reversed: DiffEvent[] = [];
  let x = n;
  let y = m;
  for (let d = trace.length - 1; d >= 0; d--) {
    const previous = trace[d] ?? v;
    const k = x - y;
    const previousK =
      k === -d ||
      (k !== d && at(previous, offset + k - 1) < at(previous, offset + k + 1))
        ? k + 1
        : k - 1;
    const previousX = at(previous, offset + previousK);
    const previousY = previousX - previousK;
    while (x > previousX && y > previousY) {
      reversed.push({ type: "equal", originLine: x, tipLine: y });
      x--;
      y--;
    }
    if (d > 0) {
      if (x === previousX) {
        reversed.push({ type: "insert", tipLine: y });
      } else {
        reversed.push({ type: "delete", originLine: x });
      }
    }
    x = previousX;
    y = previousY;
  }

  return reversed.reverse();
}

function deletionsFirst(events: readonly DiffEvent[]): DiffEvent[] {
  const ordered: DiffEvent[] = [];
  let deletes: DiffEvent[] = [];
  let inserts: DiffEvent[] = [];
  const flush = () => {
    ordered.push(...deletes, ...inserts);
    deletes = [];
    inserts = [];
  };
  for (const event of events) {
    if (event.type === "delete") {
      deletes.push(event);
    } else if (event.type === "insert") {
      inserts.push(event);
    } else {
      flush();
      ordered.push(event);
    }
  }
  flush();
  return ordered;
}

const diffName = (origin: Source, tip: Source) =>
  origin.name !== undefined && tip.name !== undefined
    ? `${origin.name} → ${tip.name}`
    : undefined;

function lineFor(event: DiffEvent, origin: Source, tip: Source): LineInit {
  switch (event.type) {
    case "equal":
      return {
        text: origin.line(event.originLine),
        number: event.tipLine,
        segments: origin.segments(event.originLine),
      };
    case "delete":
      return {
        text: origin.line(event.originLine),
        number: event.originLine,
        flag: "deleted",
        segments: origin.segments(event.originLine),
      };
    case "insert":
      return {
        text: tip.line(event.tipLine),
        number: event.tipLine,
        flag: "inserted",
        segments: tip.segments(event.tipLine),
      };
  }
}

function buildSource(
  events: readonly DiffEvent[],
  origin: Source,
  tip: Source
): Source {
  const source = Source.build(
    events.map((event) => lineFor(event, origin, tip)),
    { name: diffName(origin, tip) },
    events.length > 0 && (origin.trailingNewline || tip.trailingNewline)
  );
  for (const [index, event] of events.entries()) {
    if (event.type === "delete") {
      source.addOverlay("generic-deleted", Span.line(index + 1));
    } else if (event.type === "insert") {
      source.addOverlay("generic-inserted", Span.line(index + 1));
    }
  }
  return source;
}

const sourceLines = (source: Source) => [...source.lines()];

/** Every line of both sides, in edit-script order. */
export function fullDiff(origin: Source, tip: Source): DiffView {
  const events = diffLines(sourceLines(origin), sourceLines(tip));
  return {
    mode: "full",
    source: buildSource(events, origin, tip),
    highlightRanges: [],
    hunks: [],
    events,
  };
}

/**
 * Only the changed lines plus up to `contextLines` unchanged lines around
 * each change. Changes whose context windows meet share a hunk.
 */
export function summaryDiff(
  origin: Source,
  tip: Source,
  contextLines: number
): DiffView {
  const events = diffLines(sourceLines(origin), sourceLines(tip));
  const context = Math.max(0, Math.floor(contextLines));
  const windows = hunkWindows(events, context);

  const picked: DiffEvent[] = [];
  const hunks: DiffHunk[] = [];
  for (const window of windows) {
    const firstLine = picked.length + 1;
    const slice = events.slice(window.start, window.end + 1);
    picked.push(...slice);
    const lastLine = picked.length;
    const firstChanged =
      firstLine + slice.findIndex((event) => event.type !== "equal");
    const lastChanged =
      firstLine + findLastIndex(slice, (event) => event.type !== "equal");
    const counts = countLines(events, window.start, window.end);
    hunks.push({
      span: Span.lines(firstLine, lastLine),
      changed: Span.lines(firstChanged, lastChanged),
      ...counts,
      header: `@@ -${counts.originStart},${counts.originCount} +${counts.tipStart},${counts.tipCount} @@`,
    });
  }

  return {
    mode: "summary",
    source: buildSource(picked, origin, tip),
    highlightRanges: hunks.map((hunk) => hunk.changed),
    hunks,
    events,
  };
}

interface EventWindow {
  readonly start: number;
  readonly end: number;
}

function hunkWindows(
  events: readonly DiffEvent[],
  context: number
): EventWindow[] {
  const windows: EventWindow[] = [];
  for (const [index, event] of events.entries()) {
    if (event.type === "equal") {
      continue;
    }
    const start = Math.max(0, index - context);
    const end = Math.min(events.length - 1, index + context);
    const previous = windows.at(-1);
    if (previous && start <= previous.end + 1) {
      windows[windows.length - 1] = { start: previous.start, end };
    } else {
      windows.push({ start, end });
    }
  }
  return windows;
}

function findLastIndex<T>(values: readonly T[], predicate: (value: T) => boolean) {
  for (let index = values.length - 1; index >= 0; index--) {
    const value = values[index];
    if (value !== undefined && predicate(value)) {
      return index;
    }
  }
  return -1;
}

function countLines(events: readonly DiffEvent[], start: number, end: number) {
  let originBefore = 0;
  let tipBefore = 0;
  for (const event of events.slice(0, start)) {
    if (event.type !== "insert") {
      originBefore++;
    }
    if (event.type !== "delete") {
      tipBefore++;
    }
  }
  let originCount = 0;
  let tipCount = 0;
  for (const event of events.slice(start, end + 1)) {
    if (event.type !== "insert") {
      originCount++;
    }
    if (event.type !== "delete") {
      tipCount++;
    }
  }
  return {
    originStart: originCount > 0 ? originBefore + 1 : originBefore,
    originCount,
    tipStart: tipCount > 0 ? tipBefore + 1 : tipBefore,
    tipCount,
  };
}

/** Diffs the origin of `revision`'s chain against its tip. */
export function diffRevisions(
  revision: Revision,
  mode: DiffMode = "full",
  contextLines = 3
): DiffView {
  const origin = revision.origin().source;
  const tip = revision.tip().source;
  return mode === "full"
    ? fullDiff(origin, tip)
    : summaryDiff(origin, tip, contextLines);
}
