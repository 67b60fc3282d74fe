import { ValidationError } from "../errors.js";
import { isNatureName, naturePercent } from "./natures.js";
import {
  STAT_IDS,
  type CombatantBuild,
  type NatureName,
  type StatId,
  type StatTable,
} from "./types.js";

export const MAX_IV = 31;
export const MAX_EV = 252;
export const MAX_TOTAL_EVS = 508;
export const EV_STEP = 4;
export const MIN_LEVEL = 1;
export const MAX_LEVEL = 100;

/** Every legal per-stat EV value, ascending. */
export const EV_STEPS: readonly number[] = Array.from(
  { length: MAX_EV / EV_STEP + 1 },
  (_, i) => i * EV_STEP,
);

export type FinalStats = StatTable;

export function zeroStats(): Record<StatId, number> {
  return { hp: 0, atk: 0, def: 0, spa: 0, spd: 0, spe: 0 };
}

export function uniformStats(value: number): Record<StatId, number> {
  return { hp: value, atk: value, def: value, spa: value, spd: value, spe: value };
}

export function totalEvs(evs: StatTable): number {
  let total = 0;
  for (const stat of STAT_IDS) total += evs[stat];
  return total;
}

export function validateEvSpread(evs: StatTable): string | null {
  for (const stat of STAT_IDS) {
    const value = evs[stat];
    if (!Number.isInteger(value) || value < 0 || value > MAX_EV) {
      return `EV for ${stat} must be an integer in [0, ${String(MAX_EV)}], got ${String(value)}`;
    }
    if (value % EV_STEP !== 0) {
      return `EV for ${stat} must be a multiple of ${String(EV_STEP)}, got ${String(value)}`;
    }
  }
  const total = totalEvs(evs);
  if (total > MAX_TOTAL_EVS) {
    return `EV total must be at most ${String(MAX_TOTAL_EVS)}, got ${String(total)}`;
  }
  return null;
}

export function validateIvSpread(ivs: StatTable): string | null {
  for (const stat of STAT_IDS) {
    const value = ivs[stat];
    if (!Number.isInteger(value) || value < 0 || value > MAX_IV) {
      return `IV for ${stat} must be an integer in [0, ${String(MAX_IV)}], got ${String(value)}`;
    }
  }
  return null;
}

function validateLevel(level: number): void {
  if (!Number.isInteger(level) || level < MIN_LEVEL || level > MAX_LEVEL) {
    throw new ValidationError(
      `Level must be an integer in [${String(MIN_LEVEL)}, ${String(MAX_LEVEL)}], got ${String(level)}`,
    );
  }
}

function validateBase(stat: StatId, base: number): void {
  if (!Number.isInteger(base) || base < 1 || base > 255) {
    throw new ValidationError(
      `Base ${stat} must be an integer in [1, 255], got ${String(base)}`,
    );
  }
}

function core(base: number, iv: number, ev: number, level: number): number {
  return Math.floor(((2 * base + iv + Math.floor(ev / 4)) * level) / 100);
}

/** Unvalidated hp formula. A base of 1 always yields 1 hp. */
export function calcHp(base: number, iv: number, ev: number, level: number): number {
  if (base === 1) return 1;
  return core(base, iv, ev, level) + level + 10;
}

/** Unvalidated non-hp formula; `percent` is the nature factor (90/100/110). */
export function calcStat(
  base: number,
  iv: number,
  ev: number,
  level: number,
  percent: number,
): number {
  return Math.floor(((core(base, iv, ev, level) + 5) * percent) / 100);
}

export function calcSingleStat(
  stat: StatId,
  base: number,
  iv: number,
  ev: number,
  nature: NatureName,
  level: number,
): number {
  if (stat === "hp") return calcHp(base, iv, ev, level);
  return calcStat(base, iv, ev, level, naturePercent(nature, stat));
}

export function resolveStats(
  base: StatTable,
  ivs: StatTable,
  evs: StatTable,
  nature: NatureName,
  level: number,
): FinalStats {
  validateLevel(level);
  if (!isNatureName(nature)) {
    throw new ValidationError(`Unknown nature '${String(nature)}'.`);
  }
  for (const stat of STAT_IDS) validateBase(stat, base[stat]);
  const ivError = validateIvSpread(ivs);
  if (ivError) throw new ValidationError(ivError);
  const evError = validateEvSpread(evs);
  if (evError) throw new ValidationError(evError);

  const result = zeroStats();
  for (const stat of STAT_IDS) {
    result[stat] = calcSingleStat(stat, base[stat], ivs[stat], evs[stat], nature, level);
  }
  return result;
}

export function resolveBuild(build: CombatantBuild): FinalStats {
  return resolveStats(build.baseStats, build.ivs, build.evs, build.nature, build.level);
}

/**
 * Smallest legal EV investment that brings `stat` to at least `target`,
 * or null when even 252 falls short.
 */
export function minEvsForStat(
  stat: StatId,
  base: number,
  iv: number,
  nature: NatureName,
  level: number,
  target: number,
): number | null {
  const reach = (ev: number) => calcSingleStat(stat, base, iv, ev, nature, level);
  if (reach(0) >= target) return 0;
  if (reach(MAX_EV) < target) return null;

  let lo = 0;
  let hi = EV_STEPS.length - 1;
  // reach(EV_STEPS[lo]) < target <= reach(EV_STEPS[hi])
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (reach(mid * EV_STEP) >= target) hi = mid;
    else lo = mid;
  }
  return hi * EV_STEP;
}
