import { describe, it, expect } from "vitest";
import { hpItemRule, scoreHpForItem } from "../src/calc/hp-numbers.js";

describe("hpItemRule", () => {
  it("maps floored-fraction items to their rule", () => {
    expect(hpItemRule("Leftovers")).toBe("recovery-16");
    expect(hpItemRule("black_sludge")).toBe("recovery-16");
    expect(hpItemRule("life-orb")).toBe("recoil-10");
    expect(hpItemRule("sitrus-berry")).toBe("heal-4");
  });

  it("has no rule for other items or no item", () => {
    expect(hpItemRule("choice-scarf")).toBeNull();
    expect(hpItemRule(undefined)).toBeNull();
    expect(hpItemRule("")).toBeNull();
  });
});

describe("scoreHpForItem", () => {
  it("scores leftovers by distance to a multiple of 16", () => {
    expect(scoreHpForItem(176, "leftovers")).toBe(1);
    expect(scoreHpForItem(177, "leftovers")).toBe(0.875);
    expect(scoreHpForItem(175, "leftovers")).toBe(0.875);
    expect(scoreHpForItem(184, "leftovers")).toBe(0);
  });

  it("scores life orb highest one below a multiple of 10", () => {
    expect(scoreHpForItem(159, "life-orb")).toBe(1);
    expect(scoreHpForItem(160, "life-orb")).toBe(0);
  });

  it("scores a sitrus berry highest on multiples of 4", () => {
    expect(scoreHpForItem(180, "sitrus-berry")).toBe(1);
    expect(scoreHpForItem(179, "sitrus-berry")).toBe(0);
  });

  it("scores every total 1 without an hp item", () => {
    expect(scoreHpForItem(177, undefined)).toBe(1);
    expect(scoreHpForItem(177, "choice-specs")).toBe(1);
  });
});
