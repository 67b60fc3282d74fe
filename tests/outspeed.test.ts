import { describe, it, expect } from "vitest";
import { estimateOutspeed, speedDistributionFromSpreads } from "../src/calc/outspeed.js";
import { speedStat } from "../src/calc/speed.js";
import { EV_STEPS } from "../src/calc/stats.js";
import { ValidationError } from "../src/errors.js";

const DISTRIBUTION = [
  { speed: 130, weight: 0.5 },
  { speed: 150, weight: 0.25 },
  { speed: 170, weight: 0.25 },
];

describe("estimateOutspeed", () => {
  it("weights each opponent speed by its frequency", () => {
    expect(estimateOutspeed(150, DISTRIBUTION)).toEqual({ outspeed: 0.5, tie: 0.25, outsped: 0.25 });
  });

  it("inverts under trick room", () => {
    expect(estimateOutspeed(150, DISTRIBUTION, { trickRoom: true })).toEqual({
      outspeed: 0.25,
      tie: 0.25,
      outsped: 0.5,
    });
  });

  it("applies side modifiers to both speeds", () => {
    // 80 under tailwind is 160: faster than 130 and 150, slower than 170.
    expect(estimateOutspeed(80, DISTRIBUTION, { first: { tailwind: true } })).toEqual({
      outspeed: 0.75,
      tie: 0,
      outsped: 0.25,
    });
  });

  it("rejects weights that do not sum to 1", () => {
    expect(() => estimateOutspeed(150, [{ speed: 100, weight: 0.5 }])).toThrow(
      "Speed weights must sum to 1, got 0.5.",
    );
    expect(() => estimateOutspeed(150, [])).toThrow(ValidationError);
    expect(() =>
      estimateOutspeed(150, [
        { speed: 100, weight: 1.5 },
        { speed: 120, weight: -0.5 },
      ]),
    ).toThrow(ValidationError);
  });
});

describe("speedDistributionFromSpreads", () => {
  it("merges spreads landing on the same speed", () => {
    const distribution = speedDistributionFromSpreads(
      100,
      [
        { nature: "jolly", speedEvs: 252, usage: 2 },
        { nature: "hardy", speedEvs: 252, usage: 1 },
        { nature: "adamant", speedEvs: 252, usage: 1 },
      ],
      50,
    );
    expect(distribution).toEqual([
      { speed: 152, weight: 0.5 },
      { speed: 167, weight: 0.5 },
    ]);
  });

  it("uses the given speed IV", () => {
    const distribution = speedDistributionFromSpreads(
      100,
      [{ nature: "brave", speedEvs: 0, speedIv: 0, usage: 5 }],
      50,
    );
    // floor((floor(200 * 50 / 100) + 5) * 0.9) = 94
    expect(distribution).toEqual([{ speed: 94, weight: 1 }]);
  });

  it("rejects empty or zero-usage input", () => {
    expect(() => speedDistributionFromSpreads(100, [], 50)).toThrow(ValidationError);
    expect(() =>
      speedDistributionFromSpreads(100, [{ nature: "jolly", speedEvs: 252, usage: 0 }], 50),
    ).toThrow(ValidationError);
  });
});

describe("estimateOutspeed — speed investment", () => {
  const field = [
    { speed: 110, weight: 0.25 },
    { speed: 125, weight: 0.25 },
    { speed: 140, weight: 0.25 },
    { speed: 150, weight: 0.25 },
  ];

  it("never lowers the outspeed fraction as speed EVs grow", () => {
    // Neutral base 100 at level 50 runs from 120 to 152.
    const fractions = EV_STEPS.map(
      (evs) => estimateOutspeed(speedStat(100, 31, evs, "hardy", 50), field).outspeed,
    );
    for (let i = 1; i < fractions.length; i++) {
      expect(fractions[i]).toBeGreaterThanOrEqual(fractions[i - 1]);
    }
    expect(fractions[0]).toBe(0.25);
    expect(fractions[fractions.length - 1]).toBe(1);
  });

  it("never raises the fraction acting first under trick room", () => {
    const fractions = EV_STEPS.map(
      (evs) =>
        estimateOutspeed(speedStat(100, 31, evs, "hardy", 50), field, { trickRoom: true }).outspeed,
    );
    for (let i = 1; i < fractions.length; i++) {
      expect(fractions[i]).toBeLessThanOrEqual(fractions[i - 1]);
    }
    expect(fractions[0]).toBe(0.75);
    expect(fractions[fractions.length - 1]).toBe(0);
  });
});
