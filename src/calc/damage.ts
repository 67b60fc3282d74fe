import { ValidationError } from "../errors.js";
import {
  convolve,
  maxValue,
  minValue,
  mixture,
  probabilityAtLeast,
  quantiles,
  repeat,
  uniform,
  type Distribution,
} from "./distribution.js";
import {
  BASE_MODIFIER,
  MOD,
  applyModifier,
  assertModelled,
  effectiveTypes,
  isGrounded,
  resolveHeld,
  screenModifier,
  terrainModifier,
  weatherDefenseModifier,
  weatherModifier,
  type ModifierInput,
  type ResolvedModifier,
} from "./modifiers.js";
import { maxHitsOf, resolveMove, validateMove } from "./moves.js";
import {
  EV_STEP,
  EV_STEPS,
  MAX_EV,
  MAX_TOTAL_EVS,
  resolveBuild,
  totalEvs,
  type FinalStats,
} from "./stats.js";
import { assertTypeName, typeEffectiveness } from "./type-chart.js";
import {
  TERRAINS,
  WEATHERS,
  type BattleContext,
  type BattleFormat,
  type CombatantBuild,
  type DamageDetails,
  type DamageResult,
  type DamagingMove,
  type HitCount,
  type KoVerdict,
  type Move,
  type TypeName,
} from "./types.js";

export const DEFAULT_MAX_KO_HITS = 4;
const ROLL_PERCENTS = Array.from({ length: 16 }, (_, i) => 85 + i);
const ROLLS_PER_HIT = ROLL_PERCENTS.length;

export interface DamageOptions {
  /** Largest n reported in koChances and as a guaranteed n-hit KO. */
  maxKoHits?: number;
}

// -- Validation --

export function validateCombatant(build: CombatantBuild, role: string): void {
  if (build.types.length === 0 || build.types.length > 2) {
    throw new ValidationError(`The ${role} must have one or two types.`);
  }
  if (build.types.length === 2 && build.types[0] === build.types[1]) {
    throw new ValidationError(`The ${role} lists the same type twice.`);
  }
  for (const type of build.types) assertTypeName(type);
  if (build.teraType !== undefined) assertTypeName(build.teraType);
  resolveHeld(build);
}

export function validateContext(context: BattleContext): void {
  const { format, weather, terrain } = context;
  if (format !== undefined && format !== "singles" && format !== "doubles") {
    throw new ValidationError(`Unknown battle format '${String(format)}'.`);
  }
  if (weather !== undefined && !WEATHERS.some((w) => w === weather)) {
    throw new ValidationError(`Unknown weather '${String(weather)}'.`);
  }
  if (terrain !== undefined && !TERRAINS.some((t) => t === terrain)) {
    throw new ValidationError(`Unknown terrain '${String(terrain)}'.`);
  }
}

// -- Single hit --

interface HitSetup {
  attacker: CombatantBuild;
  defender: CombatantBuild;
  move: DamagingMove;
  moveType: TypeName;
  effectiveness: number;
  attackerHeld: ResolvedModifier[];
  defenderHeld: ResolvedModifier[];
  attackerStats: FinalStats;
  defenderStats: FinalStats;
  format: BattleFormat;
}

interface HitOutcome {
  damage: number;
  details: DamageDetails;
}

type NumericHook =
  | "attackStat"
  | "basePower"
  | "attackerFinal"
  | "defenseStat"
  | "defenderFinal";

function applyHeld(
  value: number,
  heldList: readonly ResolvedModifier[],
  hook: NumericHook,
  input: ModifierInput,
  labels: string[],
): number {
  let result = value;
  for (const held of heldList) {
    const fn = held.effect[hook];
    if (fn === undefined) continue;
    const modifier = fn(input, held.entry);
    if (modifier === MOD.NEUTRAL) continue;
    result = applyModifier(result, modifier);
    labels.push(`${held.source}:${held.id}`);
  }
  return result;
}

function convertedType(move: DamagingMove, held: readonly ResolvedModifier[]): TypeName {
  if (move.type !== "normal") return move.type;
  const converter = held.find((h) => h.effect.convertsNormalMoves === true);
  return converter?.entry.type ?? move.type;
}

/**
 * Same-type bonus. Transforming into one of the declared types doubles it;
 * the stronger-bonus ability lifts 1.5 to 2 and 2 to 2.25.
 */
export function stabModifier(
  attacker: CombatantBuild,
  moveType: TypeName,
  stronger: boolean,
): number {
  const declared = attacker.types.includes(moveType);
  const transformed = attacker.teraType === moveType;
  if (declared && transformed) return stronger ? MOD.ADAPTED_TERA : MOD.DOUBLE;
  if (declared || transformed) return stronger ? MOD.DOUBLE : MOD.ONE_AND_HALF;
  return MOD.NEUTRAL;
}

function hitDamage(setup: HitSetup, context: BattleContext): HitOutcome {
  const { attacker, defender, move, moveType, effectiveness } = setup;
  const physical = move.category === "physical";
  const input: ModifierInput = { attacker, defender, move, moveType, effectiveness, context };
  const modifiers: string[] = [];
  const stronger = setup.attackerHeld.some((h) => h.effect.strongerStab === true);
  const stab = stabModifier(attacker, moveType, stronger);

  let immunity: string | undefined;
  if (effectiveness === 0) {
    immunity = "type";
  } else {
    const immune = setup.defenderHeld.find((h) => h.effect.immune?.(input, h.entry) === true);
    if (immune) immunity = `${immune.source}:${immune.id}`;
  }

  let attackStat = physical ? setup.attackerStats.atk : setup.attackerStats.spa;
  attackStat = applyHeld(attackStat, setup.attackerHeld, "attackStat", input, modifiers);

  let defenseStat = physical ? setup.defenderStats.def : setup.defenderStats.spd;
  const weatherDefense = weatherDefenseModifier(
    context.weather,
    effectiveTypes(defender),
    move.category,
  );
  if (weatherDefense !== MOD.NEUTRAL) {
    defenseStat = applyModifier(defenseStat, weatherDefense);
    modifiers.push(`weather:${String(context.weather)}`);
  }
  defenseStat = applyHeld(defenseStat, setup.defenderHeld, "defenseStat", input, modifiers);

  let basePower = applyHeld(move.basePower, setup.attackerHeld, "basePower", input, modifiers);
  basePower = Math.max(1, basePower);

  const levelFactor = Math.floor((2 * attacker.level) / 5) + 2;
  const baseDamage =
    Math.floor(Math.floor((levelFactor * basePower * attackStat) / defenseStat) / 50) + 2;

  const details: DamageDetails = {
    moveType,
    attackStat,
    defenseStat,
    basePower,
    baseDamage,
    effectiveness,
    stab: stab / BASE_MODIFIER,
    modifiers,
  };
  if (immunity !== undefined) {
    details.immunity = immunity;
    return { damage: 0, details };
  }

  let damage = baseDamage;
  const step = (modifier: number, label: string) => {
    if (modifier === MOD.NEUTRAL) return;
    damage = applyModifier(damage, modifier);
    modifiers.push(label);
  };

  if (context.multiTarget === true) step(MOD.THREE_QUARTERS, "spread");
  if (context.helpingHand === true) step(MOD.ONE_AND_HALF, "helping-hand");
  step(weatherModifier(context.weather, moveType), `weather:${String(context.weather)}`);
  if (context.critical === true) step(MOD.ONE_AND_HALF, "critical");
  step(stab, "stab");
  damage = Math.floor(damage * effectiveness);
  if (
    context.attackerBurned === true &&
    physical &&
    !setup.attackerHeld.some((h) => h.effect.ignoresBurn === true)
  ) {
    step(MOD.HALF, "burn");
  }
  damage = applyHeld(damage, setup.attackerHeld, "attackerFinal", input, modifiers);
  damage = applyHeld(damage, setup.defenderHeld, "defenderFinal", input, modifiers);
  if (context.friendGuard === true) step(MOD.THREE_QUARTERS, "friend-guard");
  step(
    terrainModifier({
      terrain: context.terrain,
      moveType,
      moveName: move.name,
      attackerGrounded: isGrounded(attacker),
      defenderGrounded: isGrounded(defender),
    }),
    `terrain:${String(context.terrain)}`,
  );
  step(screenModifier(context, move.category, setup.format), "screen");

  return { damage, details };
}

/** The 16 random-factor rolls (85%..100%) of one hit, ascending. */
export function damageRolls(damage: number): number[] {
  return ROLL_PERCENTS.map((percent) => {
    if (damage === 0) return 0;
    return Math.max(1, Math.floor((damage * percent) / 100));
  });
}

// -- Whole result --

function useDistribution(
  hits: HitCount,
  firstHit: Distribution,
  laterHit: Distribution,
): Distribution {
  const chain = (count: number) =>
    count === 1 ? firstHit : convolve(firstHit, repeat(laterHit, count - 1));
  switch (hits.kind) {
    case "single":
      return firstHit;
    case "fixed":
      return chain(hits.hits);
    case "variable":
      return mixture(
        hits.distribution.map(({ hits: count, weight }) => ({ dist: chain(count), weight })),
      );
  }
}

export function percentOfHp(damage: number, hp: number): number {
  return Math.floor((damage * 1000) / hp) / 10;
}

function classify(
  firstUse: Distribution,
  laterUse: Distribution,
  hp: number,
  koChance: number,
  maxKoHits: number,
): KoVerdict {
  const minFirst = minValue(firstUse);
  if (minFirst >= hp) return { kind: "guaranteed-ohko" };
  if (maxValue(firstUse) >= hp) return { kind: "possible-ohko", chance: koChance };
  const minLater = minValue(laterUse);
  for (let hits = 2; hits <= maxKoHits; hits++) {
    if (minFirst + (hits - 1) * minLater >= hp) {
      return { kind: "guaranteed-nhko", hits };
    }
  }
  return { kind: "no-ko" };
}

function statusResult(move: Move, hp: number, maxKoHits: number): DamageResult {
  return {
    rolls: Array.from({ length: ROLLS_PER_HIT }, () => 0),
    minDamage: 0,
    maxDamage: 0,
    minPercent: 0,
    maxPercent: 0,
    defenderHp: hp,
    hitCount: 0,
    koChance: 0,
    koChances: Array.from({ length: maxKoHits }, () => 0),
    verdict: { kind: "no-ko" },
    details: {
      moveType: move.type,
      attackStat: 0,
      defenseStat: 0,
      basePower: 0,
      baseDamage: 0,
      effectiveness: 1,
      stab: 1,
      modifiers: [],
    },
  };
}

export function calculateDamage(
  attacker: CombatantBuild,
  defender: CombatantBuild,
  move: Move,
  context: BattleContext = {},
  options: DamageOptions = {},
): DamageResult {
  const maxKoHits = options.maxKoHits ?? DEFAULT_MAX_KO_HITS;
  if (!Number.isInteger(maxKoHits) || maxKoHits < 1) {
    throw new ValidationError("maxKoHits must be a positive integer.");
  }
  validateMove(move);
  validateContext(context);
  validateCombatant(attacker, "attacker");
  validateCombatant(defender, "defender");
  const attackerStats = resolveBuild(attacker);
  const defenderStats = resolveBuild(defender);
  const hp = defenderStats.hp;

  if (move.category === "status") return statusResult(move, hp, maxKoHits);

  if (context.multiTarget === true && move.spread !== true) {
    throw new ValidationError(
      `Move '${move.name}' hits a single target but the context flags multiple targets.`,
    );
  }

  const resolved = resolveMove(move);
  const hitContext: BattleContext = resolved.alwaysCritical
    ? { ...context, critical: true }
    : context;
  const attackerHeld = resolveHeld(attacker);
  const defenderHeld = resolveHeld(defender);
  assertModelled(attackerHeld, "attacking");
  assertModelled(defenderHeld, "defending");
  const moveType = convertedType(move, attackerHeld);
  const setup: HitSetup = {
    attacker,
    defender,
    move,
    moveType,
    effectiveness: typeEffectiveness(moveType, effectiveTypes(defender)),
    attackerHeld,
    defenderHeld,
    attackerStats,
    defenderStats,
    format: context.format ?? "singles",
  };

  // Hits after the first land on a defender no longer at full hp.
  const first = hitDamage(setup, hitContext);
  const later =
    hitContext.defenderAtFullHp === false
      ? first
      : hitDamage(setup, { ...hitContext, defenderAtFullHp: false });
  const firstRolls = damageRolls(first.damage);
  const laterHit = uniform(damageRolls(later.damage));
  const firstUse = useDistribution(resolved.hits, uniform(firstRolls), laterHit);
  const laterUse = useDistribution(resolved.hits, laterHit, laterHit);

  const hitCount = maxHitsOf(resolved.hits);
  const rolls =
    resolved.hits.kind === "single"
      ? firstRolls
      : quantiles(firstUse, ROLLS_PER_HIT * hitCount);

  const koChances: number[] = [];
  let accumulated = convolve(new Map([[0, 1]]), firstUse, hp);
  for (let uses = 1; uses <= maxKoHits; uses++) {
    if (uses > 1) accumulated = convolve(accumulated, laterUse, hp);
    koChances.push(probabilityAtLeast(accumulated, hp));
  }

  const minDamage = minValue(firstUse);
  const maxDamage = maxValue(firstUse);
  return {
    rolls,
    minDamage,
    maxDamage,
    minPercent: percentOfHp(minDamage, hp),
    maxPercent: percentOfHp(maxDamage, hp),
    defenderHp: hp,
    hitCount,
    koChance: koChances[0],
    koChances,
    verdict: classify(firstUse, laterUse, hp, koChances[0], maxKoHits),
    details: first.details,
  };
}

// -- KO threshold search --

export interface KoThresholdQuery {
  /** Number of uses that must KO; defaults to 1. */
  uses?: number;
  /** Required KO chance in (0, 1]; defaults to 1. */
  chance?: number;
}

export interface KoThreshold {
  stat: "atk" | "spa";
  evs: number;
  koChance: number;
}

/**
 * Smallest offensive EV investment, keeping the attacker's other EVs, that
 * reaches the requested KO chance. Null when even the largest legal
 * investment falls short.
 */
export function findKoThreshold(
  attacker: CombatantBuild,
  defender: CombatantBuild,
  move: Move,
  context: BattleContext = {},
  query: KoThresholdQuery = {},
): KoThreshold | null {
  if (move.category === "status") {
    throw new ValidationError(`Status move '${move.name}' cannot KO.`);
  }
  const uses = query.uses ?? 1;
  const chance = query.chance ?? 1;
  if (!Number.isInteger(uses) || uses < 1) {
    throw new ValidationError("uses must be a positive integer.");
  }
  if (!(chance > 0 && chance <= 1)) {
    throw new ValidationError("chance must be in (0, 1].");
  }

  const stat = move.category === "physical" ? "atk" : "spa";
  const others = totalEvs(attacker.evs) - attacker.evs[stat];
  const budget = Math.min(MAX_EV, Math.floor((MAX_TOTAL_EVS - others) / EV_STEP) * EV_STEP);
  if (budget < 0) {
    throw new ValidationError("The attacker's other EVs already exceed the total cap.");
  }
  const koAt = (evs: number) =>
    calculateDamage({ ...attacker, evs: { ...attacker.evs, [stat]: evs } }, defender, move, context, {
      maxKoHits: uses,
    }).koChances[uses - 1];
  const meets = (evs: number) => koAt(evs) >= chance - 1e-9;

  const steps = EV_STEPS.filter((evs) => evs <= budget);
  if (!meets(steps[steps.length - 1])) return null;
  let lo = -1;
  let hi = steps.length - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (meets(steps[mid])) hi = mid;
    else lo = mid;
  }
  return { stat, evs: steps[hi], koChance: koAt(steps[hi]) };
}
