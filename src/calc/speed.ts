import { ValidationError } from "../errors.js";
import { MOD, applyModifier, assertModelled, resolveHeld } from "./modifiers.js";
import {
  EV_STEPS,
  resolveBuild,
  resolveStats,
  uniformStats,
  zeroStats,
} from "./stats.js";
import { movePriority, type PrioritizedMove } from "./moves.js";
import type { CombatantBuild, Weather } from "./types.js";

export interface SpeedSideModifiers {
  tailwind?: boolean;
  paralyzed?: boolean;
  /** Speed stat stage in [-6, 6]. */
  stage?: number;
}

export interface SpeedContext {
  /** Slower combatants move first; ties stay ties. */
  trickRoom?: boolean;
  weather?: Weather;
  first?: SpeedSideModifiers;
  second?: SpeedSideModifiers;
}

export type SpeedOrder = "first" | "second" | "tie";

export interface SpeedComparison {
  firstSpeed: number;
  secondSpeed: number;
  /** Which side has the higher effective speed. */
  faster: SpeedOrder;
  /** Which side acts first once trick room is considered. */
  movesFirst: SpeedOrder;
  difference: number;
}

function stageMultiplied(speed: number, stage: number): number {
  if (!Number.isInteger(stage) || stage < -6 || stage > 6) {
    throw new ValidationError(`Speed stage must be an integer in [-6, 6], got ${String(stage)}`);
  }
  if (stage >= 0) return Math.floor((speed * (2 + stage)) / 2);
  return Math.floor((speed * 2) / (2 - stage));
}

/** Applies stage, tailwind and paralysis, each floored, in that order. */
export function effectiveSpeed(speed: number, side: SpeedSideModifiers = {}): number {
  if (!Number.isInteger(speed) || speed < 0) {
    throw new ValidationError(`Speed must be a non-negative integer, got ${String(speed)}`);
  }
  let result = stageMultiplied(speed, side.stage ?? 0);
  if (side.tailwind === true) result *= 2;
  if (side.paralyzed === true) result = Math.floor(result / 2);
  return result;
}

export function compareSpeed(
  first: number,
  second: number,
  context: SpeedContext = {},
): SpeedComparison {
  const firstSpeed = effectiveSpeed(first, context.first);
  const secondSpeed = effectiveSpeed(second, context.second);
  let faster: SpeedOrder = "tie";
  if (firstSpeed > secondSpeed) faster = "first";
  else if (secondSpeed > firstSpeed) faster = "second";

  let movesFirst = faster;
  if (context.trickRoom === true && faster !== "tie") {
    movesFirst = faster === "first" ? "second" : "first";
  }
  return {
    firstSpeed,
    secondSpeed,
    faster,
    movesFirst,
    difference: firstSpeed - secondSpeed,
  };
}

export interface TurnOrder {
  firstPriority: number;
  secondPriority: number;
  firstSpeed: number;
  secondSpeed: number;
  movesFirst: SpeedOrder;
  /** What settled the order; "tie" means a speed tie at equal priority. */
  decidedBy: "priority" | "speed" | "tie";
}

/**
 * Order of two moves in one turn. The higher priority bracket acts first
 * regardless of speed; trick room only reorders within a bracket.
 */
export function turnOrder(
  firstMove: PrioritizedMove,
  secondMove: PrioritizedMove,
  first: number,
  second: number,
  context: SpeedContext = {},
): TurnOrder {
  const firstPriority = movePriority(firstMove);
  const secondPriority = movePriority(secondMove);
  const comparison = compareSpeed(first, second, context);
  const base = {
    firstPriority,
    secondPriority,
    firstSpeed: comparison.firstSpeed,
    secondSpeed: comparison.secondSpeed,
  };
  if (firstPriority !== secondPriority) {
    return {
      ...base,
      movesFirst: firstPriority > secondPriority ? "first" : "second",
      decidedBy: "priority",
    };
  }
  return {
    ...base,
    movesFirst: comparison.movesFirst,
    decidedBy: comparison.movesFirst === "tie" ? "tie" : "speed",
  };
}

/** Speed stat of a build after its item and ability speed effects. */
export function buildSpeed(build: CombatantBuild, weather?: Weather): number {
  let speed = resolveBuild(build).spe;
  const heldList = resolveHeld(build);
  assertModelled(heldList, "speed");
  for (const held of heldList) {
    const modifier = held.effect.speed?.(weather, held.entry) ?? MOD.NEUTRAL;
    if (modifier !== MOD.NEUTRAL) speed = applyModifier(speed, modifier);
  }
  return speed;
}

/**
 * Smallest speed EV investment that lets `subject` (the first side) act
 * before an opponent with the given speed, or null if none does.
 */
export function minSpeedEvsToMoveFirst(
  subject: CombatantBuild,
  opponentSpeed: number,
  context: SpeedContext = {},
): number | null {
  const movesFirst = (evs: number) =>
    compareSpeed(
      buildSpeed({ ...subject, evs: { ...subject.evs, spe: evs } }, context.weather),
      opponentSpeed,
      context,
    ).movesFirst === "first";

  // Under trick room investing only slows the subject down.
  if (context.trickRoom === true) return movesFirst(0) ? 0 : null;

  const candidates = EV_STEPS;
  if (!movesFirst(candidates[candidates.length - 1])) return null;
  let lo = -1;
  let hi = candidates.length - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (movesFirst(candidates[mid])) hi = mid;
    else lo = mid;
  }
  return candidates[hi];
}

/**
 * Largest speed EV investment that still lets `subject` act before the
 * opponent under trick room, or null if even 0 EVs is too fast. Without
 * trick room every investment that moves first at all is kept, so this is
 * the full 252.
 */
export function maxSpeedEvsToMoveFirst(
  subject: CombatantBuild,
  opponentSpeed: number,
  context: SpeedContext = {},
): number | null {
  const movesFirst = (evs: number) =>
    compareSpeed(
      buildSpeed({ ...subject, evs: { ...subject.evs, spe: evs } }, context.weather),
      opponentSpeed,
      context,
    ).movesFirst === "first";

  const candidates = EV_STEPS;
  const last = candidates.length - 1;
  if (context.trickRoom !== true) return movesFirst(candidates[last]) ? candidates[last] : null;

  if (!movesFirst(candidates[0])) return null;
  let lo = 0;
  let hi = candidates.length;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (movesFirst(candidates[mid])) lo = mid;
    else hi = mid;
  }
  return candidates[lo];
}

/** Validated final speed of a single stat line. */
export function speedStat(
  baseSpeed: number,
  iv: number,
  ev: number,
  nature: CombatantBuild["nature"],
  level: number,
): number {
  const evs = { ...zeroStats(), spe: ev };
  return resolveStats(uniformStats(baseSpeed), uniformStats(iv), evs, nature, level).spe;
}
