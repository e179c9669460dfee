import { describe, expect, test } from "vitest";
import { Revision } from "../src/revision.js";
import { Source } from "../src/source.js";

const named = (name: string) => Source.fromString(`${name}\n`, { name });

describe("Revision", () => {
  test("chain returns the tip", () => {
    const tip = Revision.chain(named("v1"), named("v2"), named("v3"));
    expect(tip.atTip).toBe(true);
    expect(tip.name).toBe("v3");
    expect(tip.index()).toBe(2);
    expect(tip.count()).toBe(3);
    expect(tip.names()).toEqual(["v1", "v2", "v3"]);
  });

  test("navigates in both directions", () => {
    const tip = Revision.chain(named("v1"), named("v2"), named("v3"));
    const origin = tip.origin();
    expect(origin.atOrigin).toBe(true);
    expect(origin.child?.name).toBe("v2");
    expect(tip.parent?.name).toBe("v2");
    expect(origin.tip()).toBe(tip);
    expect(origin.at(1).name).toBe("v2");
  });

  test("seek stops at either end", () => {
    const tip = Revision.chain(named("v1"), named("v2"), named("v3"));
    expect(tip.seek(-10).name).toBe("v1");
    expect(tip.origin().seek(10)).toBe(tip);
    expect(tip.seek(0)).toBe(tip);
  });

  test("append drops later revisions", () => {
    const tip = Revision.chain(named("v1"), named("v2"), named("v3"));
    const branch = tip.origin().append(named("v2b"));
    expect(branch.names()).toEqual(["v1", "v2b"]);
    expect(branch.tip()).toBe(branch);
  });

  test("prepend drops earlier revisions", () => {
    const tip = Revision.chain(named("v1"), named("v2"));
    const base = tip.prepend(named("v0"));
    expect(tip.names()).toEqual(["v0", "v2"]);
    expect(base.atOrigin).toBe(true);
  });

  test("unnamed sources list as empty names", () => {
    expect(
      Revision.chain(Source.fromString("a"), named("b")).names()
    ).toEqual(["", "b"]);
  });
});
