import { ValidationError } from "../errors.js";
import { NATURE_TABLE, isNeutralNature } from "./natures.js";
import {
  MAX_TOTAL_EVS,
  minEvsForStat,
  resolveStats,
  uniformStats,
  zeroStats,
} from "./stats.js";
import {
  NATURE_NAMES,
  STAT_IDS,
  type NatureName,
  type NonHpStatId,
  type StatId,
  type StatTable,
} from "./types.js";

export interface NatureOptimizationRequest {
  baseStats: StatTable;
  ivs?: StatTable;
  level: number;
  primary: { stat: StatId; value: number };
  secondary?: { stat: StatId; minimum: number };
  /** Natures lowering any of these stats are ruled out. */
  avoidLowering?: readonly NonHpStatId[];
}

export interface NatureCandidate {
  nature: NatureName;
  reachable: boolean;
  primaryEvs: number | null;
  secondaryEvs: number | null;
  totalEvs: number | null;
  boostsPrimary: boolean;
  lowersTarget: boolean;
}

export interface NatureOptimizationResult {
  best: NatureCandidate | null;
  /** Reachable natures best-first, then unreachable ones in table order. */
  candidates: NatureCandidate[];
  /** EVs saved by the best nature over the cheapest neutral one. */
  savingsVersusNeutral: number | null;
}

function evaluate(
  nature: NatureName,
  request: NatureOptimizationRequest,
  ivs: StatTable,
): NatureCandidate {
  const { baseStats, level, primary, secondary } = request;
  const effect = NATURE_TABLE[nature];
  const primaryEvs = minEvsForStat(
    primary.stat,
    baseStats[primary.stat],
    ivs[primary.stat],
    nature,
    level,
    primary.value,
  );
  const secondaryEvs = secondary
    ? minEvsForStat(
        secondary.stat,
        baseStats[secondary.stat],
        ivs[secondary.stat],
        nature,
        level,
        secondary.minimum,
      )
    : 0;
  const totalEvs =
    primaryEvs === null || secondaryEvs === null ? null : primaryEvs + secondaryEvs;
  return {
    nature,
    reachable: totalEvs !== null && totalEvs <= MAX_TOTAL_EVS,
    primaryEvs,
    secondaryEvs: secondary ? secondaryEvs : null,
    totalEvs,
    boostsPrimary: effect.plus === primary.stat,
    lowersTarget:
      effect.minus !== null &&
      (effect.minus === primary.stat || effect.minus === secondary?.stat),
  };
}

function compareCandidates(a: NatureCandidate, b: NatureCandidate): number {
  const costA = a.totalEvs ?? Infinity;
  const costB = b.totalEvs ?? Infinity;
  if (costA !== costB) return costA - costB;
  if (a.boostsPrimary !== b.boostsPrimary) return a.boostsPrimary ? -1 : 1;
  if (a.lowersTarget !== b.lowersTarget) return a.lowersTarget ? 1 : -1;
  return NATURE_NAMES.indexOf(a.nature) - NATURE_NAMES.indexOf(b.nature);
}

/**
 * Picks the nature that reaches the primary target and the secondary
 * minimum with the fewest EVs. Ties prefer boosting the primary stat, then
 * lowering neither targeted stat, then table order.
 */
export function optimizeNature(request: NatureOptimizationRequest): NatureOptimizationResult {
  const { primary, secondary } = request;
  if (secondary && secondary.stat === primary.stat) {
    throw new ValidationError("Primary and secondary targets must be different stats.");
  }
  const ivs = request.ivs ?? uniformStats(31);
  // Validates base stats, ivs and level once up front.
  resolveStats(request.baseStats, ivs, zeroStats(), "hardy", request.level);
  for (const target of [primary.stat, secondary?.stat]) {
    if (target !== undefined && !STAT_IDS.some((stat) => stat === target)) {
      throw new ValidationError(`Unknown stat '${String(target)}'.`);
    }
  }
  if (!(primary.value > 0)) {
    throw new ValidationError("Primary target value must be positive.");
  }

  const avoid = new Set<StatId>(request.avoidLowering ?? []);
  const evaluated = NATURE_NAMES.filter((nature) => {
    const minus = NATURE_TABLE[nature].minus;
    return minus === null || !avoid.has(minus);
  }).map((nature) => evaluate(nature, request, ivs));

  const reachable = evaluated.filter((c) => c.reachable).sort(compareCandidates);
  const unreachable = evaluated.filter((c) => !c.reachable);
  const best = reachable.length > 0 ? reachable[0] : null;

  const neutral = reachable.find((c) => isNeutralNature(c.nature));
  const savingsVersusNeutral =
    best && neutral && best.totalEvs !== null && neutral.totalEvs !== null
      ? neutral.totalEvs - best.totalEvs
      : null;

  return { best, candidates: [...reachable, ...unreachable], savingsVersusNeutral };
}
