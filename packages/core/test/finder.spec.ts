import { describe, expect, test } from "vitest";
import { Finder } from "../src/finder.js";
import { Normalizer } from "../src/normalizer.js";
import { Source } from "../src/source.js";

const spans = (finder: Finder, query: string) =>
  finder.find(query).map((span) => span.toString());

describe("Finder", () => {
  test("folds case and diacritics", () => {
    const finder = new Finder().load(Source.fromString("Café\ncafé CAFE\n"));
    expect(spans(finder, "cafe")).toEqual(["1:1-1:5", "2:1-2:5", "2:6-2:10"]);
  });

  test("returns non-overlapping hits", () => {
    const finder = new Finder().load(Source.fromString("aaa"));
    expect(spans(finder, "aa")).toEqual(["1:1-1:3"]);
    expect(spans(finder, "a")).toEqual(["1:1-1:2", "1:2-1:3", "1:3-1:4"]);
  });

  test("maps expanded characters back to their original column", () => {
    const finder = new Finder().load(Source.fromString("Straße"));
    expect(spans(finder, "STRASSE")).toEqual(["1:1-1:7"]);
    expect(spans(finder, "ss")).toEqual(["1:5-1:6"]);
    expect(spans(finder, "s")).toEqual(["1:1-1:2", "1:5-1:6"]);
  });

  test("finds words ending in final sigma", () => {
    const finder = new Finder().load(Source.fromString("λόγος ΛΟΓΟΣ\n"));
    expect(spans(finder, "λογος")).toEqual(["1:1-1:6", "1:7-1:12"]);
    expect(spans(finder, "ΛΟΓΟΣ")).toEqual(["1:1-1:6", "1:7-1:12"]);
  });

  test.each(["λογος", "straße", "CAFE", "ss", "σ"])(
    "every hit for %s folds back to the query",
    (query) => {
      const source = Source.fromString("Straße café\nλόγος ΛΟΓΟΣ Café\n");
      const finder = new Finder().load(source);
      const needle = finder.normalizer.normalize(query);
      const hits = finder.find(query);
      expect(hits.length).toBeGreaterThan(0);
      for (const span of hits) {
        expect(finder.normalizer.normalize(source.substring(span))).toContain(
          needle,
        );
      }
    },
  );

  test("never matches across a line break", () => {
    const finder = new Finder().load(Source.fromString("ab\ncd"));
    expect(spans(finder, "bc")).toEqual([]);
  });

  test("an empty query finds nothing", () => {
    const finder = new Finder().load(Source.fromString("text"));
    expect(spans(finder, "")).toEqual([]);
  });

  test("respects the normalizer it was built with", () => {
    const finder = new Finder({
      normalizer: new Normalizer({ caseFold: false }),
    }).load(Source.fromString("Key key"));
    expect(spans(finder, "key")).toEqual(["1:5-1:8"]);
  });

  test("reloading replaces the index", () => {
    const first = Source.fromString("alpha");
    const second = Source.fromString("beta");
    const finder = new Finder().load(first).load(second);
    expect(finder.source).toBe(second);
    expect(spans(finder, "alpha")).toEqual([]);
    expect(spans(finder, "beta")).toEqual(["1:1-1:5"]);
  });
});
