import { ValidationError } from "../errors.js";
import { isNatureName } from "./natures.js";
import { compareSpeed, speedStat, type SpeedContext } from "./speed.js";
import type { NatureName } from "./types.js";

export interface SpeedFrequency {
  speed: number;
  weight: number;
}

export interface OutspeedEstimate {
  outspeed: number;
  tie: number;
  outsped: number;
}

const WEIGHT_TOLERANCE = 1e-6;

/**
 * Frequency-weighted chance of acting before, tying with, or acting after
 * an opponent drawn from `distribution`. Weights must sum to 1.
 */
export function estimateOutspeed(
  mySpeed: number,
  distribution: readonly SpeedFrequency[],
  context: SpeedContext = {},
): OutspeedEstimate {
  if (distribution.length === 0) {
    throw new ValidationError("Speed distribution is empty.");
  }
  let total = 0;
  for (const { speed, weight } of distribution) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ValidationError(`Weight for speed ${String(speed)} must be non-negative.`);
    }
    total += weight;
  }
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new ValidationError(`Speed weights must sum to 1, got ${String(total)}.`);
  }

  const estimate: OutspeedEstimate = { outspeed: 0, tie: 0, outsped: 0 };
  for (const { speed, weight } of distribution) {
    const { movesFirst } = compareSpeed(mySpeed, speed, context);
    if (movesFirst === "first") estimate.outspeed += weight;
    else if (movesFirst === "tie") estimate.tie += weight;
    else estimate.outsped += weight;
  }
  return estimate;
}

export interface OpponentSpread {
  nature: NatureName;
  speedEvs: number;
  speedIv?: number;
  /** Relative usage; normalised across all spreads. */
  usage: number;
}

/**
 * Turns usage-weighted opponent spreads into a speed distribution, merging
 * spreads that land on the same speed. Sorted by speed, ascending.
 */
export function speedDistributionFromSpreads(
  baseSpeed: number,
  spreads: readonly OpponentSpread[],
  level: number,
): SpeedFrequency[] {
  const usageTotal = spreads.reduce((sum, spread) => sum + spread.usage, 0);
  if (spreads.length === 0 || !(usageTotal > 0)) {
    throw new ValidationError("At least one spread with positive usage is required.");
  }
  const bySpeed = new Map<number, number>();
  for (const spread of spreads) {
    if (!isNatureName(spread.nature)) {
      throw new ValidationError(`Unknown nature '${String(spread.nature)}'.`);
    }
    if (spread.usage < 0) {
      throw new ValidationError("Spread usage must be non-negative.");
    }
    const speed = speedStat(baseSpeed, spread.speedIv ?? 31, spread.speedEvs, spread.nature, level);
    bySpeed.set(speed, (bySpeed.get(speed) ?? 0) + spread.usage / usageTotal);
  }
  return [...bySpeed.entries()]
    .sort(([a], [b]) => a - b)
    .map(([speed, weight]) => ({ speed, weight }));
}
