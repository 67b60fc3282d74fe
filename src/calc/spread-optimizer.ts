import {
  InfeasibleSpreadError,
  UnsupportedMechanicError,
  ValidationError,
} from "../errors.js";
import { calculateDamage, validateCombatant } from "./damage.js";
import {
  compareSpeed,
  buildSpeed,
  minSpeedEvsToMoveFirst,
  type SpeedContext,
  type SpeedOrder,
} from "./speed.js";
import { scoreHpForItem } from "./hp-numbers.js";
import {
  EV_STEPS,
  MAX_EV,
  MAX_TOTAL_EVS,
  calcHp,
  resolveBuild,
  zeroStats,
  type FinalStats,
} from "./stats.js";
import type {
  CombatantBuild,
  KoVerdict,
  NatureName,
  StatTable,
  ThreatSpec,
} from "./types.js";

/** Survive 15 of the 16 rolls: only the maximum roll may KO. */
export const DEFAULT_SURVIVAL_RATE = 15 / 16;
const TOLERANCE = 1e-9;

export type SubjectBuild = Omit<CombatantBuild, "evs">;
export type OffensiveRole = "physical" | "special" | "none";
type ResilienceStat = "def" | "spd";

export interface SpeedBenchmark {
  opponentSpeed: number;
  /** The subject is the `first` side. */
  context?: SpeedContext;
}

export interface SpreadOptimizationRequest {
  subject: SubjectBuild;
  threats: readonly ThreatSpec[];
  speed?: SpeedBenchmark;
  survivalRate?: number;
  role?: OffensiveRole;
  /**
   * Among equally cheap spreads, prefer the hp total that suits the held
   * item (Leftovers, Life Orb, Sitrus Berry). Defaults to true.
   */
  tuneHp?: boolean;
}

export interface ThreatRequirement {
  hpEvs: number;
  resilienceEvs: number;
  totalEvs: number;
}

export interface ThreatDiagnostic {
  threatId: string;
  stat: ResilienceStat;
  /** Cheapest (hp, resilience) pair for this threat alone; null if none. */
  minimal: ThreatRequirement | null;
}

export interface ThreatReport {
  threatId: string;
  stat: ResilienceStat;
  satisfied: boolean;
  survivalRate: number;
  maxDamage: number;
  /** Hp left after the maximum roll; negative when that roll KOs. */
  hpMargin: number;
  verdict: KoVerdict;
}

export interface SpeedReport {
  subjectSpeed: number;
  opponentSpeed: number;
  movesFirst: SpeedOrder;
  satisfied: boolean;
  margin: number;
}

export interface FeasibleSpread {
  feasible: true;
  nature: NatureName;
  evs: StatTable;
  finalStats: FinalStats;
  totalEvs: number;
  unallocated: number;
  survivalRate: number;
  threats: ThreatReport[];
  speed: SpeedReport | null;
}

export interface InfeasibleSpread {
  feasible: false;
  nature: NatureName;
  survivalRate: number;
  requirements: ThreatDiagnostic[];
  speed: { opponentSpeed: number; requiredEvs: number | null } | null;
  reasons: string[];
}

export type SpreadResult = FeasibleSpread | InfeasibleSpread;

// -- Per-threat frontier --

interface Frontier {
  threatId: string;
  stat: ResilienceStat;
  /** Indexed like EV_STEPS: minimal resilience EVs for that hp EV value. */
  required: (number | null)[];
}

function withEvs(
  subject: SubjectBuild,
  evs: Partial<Record<keyof StatTable, number>>,
): CombatantBuild {
  return { ...subject, evs: { ...zeroStats(), ...evs } };
}

function survivalRate(threat: ThreatSpec, defender: CombatantBuild): number {
  const result = calculateDamage(threat.attacker, defender, threat.move, threat.context, {
    maxKoHits: 1,
  });
  return 1 - result.koChance;
}

/**
 * Walks the boundary of the survivable region on the (hp, resilience) grid.
 * More of either never lowers survival, so the required resilience only
 * falls as hp rises and the pointer never moves back up.
 */
function threatFrontier(
  subject: SubjectBuild,
  threat: ThreatSpec,
  threatId: string,
  target: number,
): Frontier {
  if (threat.move.category === "status") {
    throw new ValidationError(`Threat '${threatId}' uses a status move.`);
  }
  const stat: ResilienceStat = threat.move.category === "physical" ? "def" : "spd";
  const survives = (hp: number, resilience: number) =>
    survivalRate(threat, withEvs(subject, { hp, [stat]: resilience })) >= target - TOLERANCE;

  const required: (number | null)[] = [];
  let pointer = EV_STEPS.length - 1;
  for (const hp of EV_STEPS) {
    if (!survives(hp, EV_STEPS[pointer])) {
      required.push(null);
      continue;
    }
    while (pointer > 0 && survives(hp, EV_STEPS[pointer - 1])) pointer--;
    required.push(EV_STEPS[pointer]);
  }
  return { threatId, stat, required };
}

function cheapestPair(frontier: Frontier): ThreatRequirement | null {
  let best: ThreatRequirement | null = null;
  for (let index = 0; index < EV_STEPS.length; index++) {
    const resilienceEvs = frontier.required[index];
    if (resilienceEvs === null) continue;
    const hpEvs = EV_STEPS[index];
    const totalEvs = hpEvs + resilienceEvs;
    if (best === null || totalEvs <= best.totalEvs) {
      best = { hpEvs, resilienceEvs, totalEvs };
    }
  }
  return best;
}

// -- Combined search --

interface Allocation {
  hp: number;
  def: number;
  spd: number;
  cost: number;
  hpScore: number;
}

function cheapestAllocation(
  frontiers: readonly Frontier[],
  speedEvs: number,
  hpScore: (hpEvs: number) => number,
): Allocation | null {
  let best: Allocation | null = null;
  candidates: for (let index = 0; index < EV_STEPS.length; index++) {
    const hp = EV_STEPS[index];
    let def = 0;
    let spd = 0;
    for (const frontier of frontiers) {
      const needed = frontier.required[index];
      if (needed === null) continue candidates;
      if (frontier.stat === "def") def = Math.max(def, needed);
      else spd = Math.max(spd, needed);
    }
    const cost = hp + def + spd + speedEvs;
    const score = hpScore(hp);
    // Ascending hp with >= keeps the bulkier of equally cheap, equally scored spreads.
    if (
      best === null ||
      cost < best.cost ||
      (cost === best.cost && score >= best.hpScore)
    ) {
      best = { hp, def, spd, cost, hpScore: score };
    }
  }
  return best;
}

function validateRequest(request: SpreadOptimizationRequest, target: number): void {
  if (!(target > 0 && target <= 1)) {
    throw new ValidationError(`survivalRate must be in (0, 1], got ${String(target)}.`);
  }
  if (request.threats.length === 0 && request.speed === undefined) {
    throw new ValidationError("Nothing to optimize: give at least one threat or a speed benchmark.");
  }
  const role = request.role ?? "none";
  if (role !== "physical" && role !== "special" && role !== "none") {
    throw new ValidationError(`Unknown role '${String(role)}'.`);
  }
  const subject = withEvs(request.subject, {});
  validateCombatant(subject, "subject");
  resolveBuild(subject);
}

function threatReport(
  threat: ThreatSpec,
  threatId: string,
  stat: ResilienceStat,
  defender: CombatantBuild,
  target: number,
): ThreatReport {
  const result = calculateDamage(threat.attacker, defender, threat.move, threat.context);
  const rate = 1 - result.koChance;
  return {
    threatId,
    stat,
    satisfied: rate >= target - TOLERANCE,
    survivalRate: rate,
    maxDamage: result.maxDamage,
    hpMargin: result.defenderHp - result.maxDamage,
    verdict: result.verdict,
  };
}

/**
 * Finds the cheapest EV spread that survives every threat at the target
 * rate and, when asked, acts before the speed benchmark. Whatever budget
 * remains goes to the role's offensive stat.
 */
export function optimizeSpread(request: SpreadOptimizationRequest): SpreadResult {
  const target = request.survivalRate ?? DEFAULT_SURVIVAL_RATE;
  validateRequest(request, target);
  const { subject, speed } = request;
  const ids = request.threats.map((threat, i) => threat.id ?? `threat-${String(i + 1)}`);

  const frontiers = request.threats.map((threat, i) =>
    threatFrontier(subject, threat, ids[i], target),
  );
  const speedEvs = speed
    ? minSpeedEvsToMoveFirst(withEvs(subject, {}), speed.opponentSpeed, speed.context)
    : 0;
  const hpScore = (hpEvs: number) =>
    request.tuneHp === false
      ? 1
      : scoreHpForItem(
          calcHp(subject.baseStats.hp, subject.ivs.hp, hpEvs, subject.level),
          subject.item,
        );
  const allocation =
    speedEvs === null ? null : cheapestAllocation(frontiers, speedEvs, hpScore);

  if (allocation === null || speedEvs === null || allocation.cost > MAX_TOTAL_EVS) {
    const requirements = frontiers.map((frontier) => ({
      threatId: frontier.threatId,
      stat: frontier.stat,
      minimal: cheapestPair(frontier),
    }));
    const reasons: string[] = [];
    for (const requirement of requirements) {
      if (requirement.minimal === null) {
        reasons.push(
          `Threat '${requirement.threatId}' cannot be survived even with ${String(MAX_EV)} hp and ${String(MAX_EV)} ${requirement.stat} EVs.`,
        );
      }
    }
    if (speedEvs === null) {
      reasons.push(`No speed investment moves first against speed ${String(speed?.opponentSpeed)}.`);
    }
    if (allocation !== null) {
      reasons.push(
        `The combined minimum of ${String(allocation.cost)} EVs exceeds ${String(MAX_TOTAL_EVS)}.`,
      );
    } else if (reasons.length === 0) {
      reasons.push("No hp investment satisfies every threat at once.");
    }
    return {
      feasible: false,
      nature: subject.nature,
      survivalRate: target,
      requirements,
      speed: speed ? { opponentSpeed: speed.opponentSpeed, requiredEvs: speedEvs } : null,
      reasons,
    };
  }

  let unallocated = MAX_TOTAL_EVS - allocation.cost;
  const role = request.role ?? "none";
  const offense = Math.min(MAX_EV, role === "none" ? 0 : unallocated);
  unallocated -= offense;
  const evs = {
    ...zeroStats(),
    hp: allocation.hp,
    def: allocation.def,
    spd: allocation.spd,
    spe: speedEvs,
    atk: role === "physical" ? offense : 0,
    spa: role === "special" ? offense : 0,
  };
  const build: CombatantBuild = { ...subject, evs };

  const threats = request.threats.map((threat, i) =>
    threatReport(threat, ids[i], frontiers[i].stat, build, target),
  );
  let speedReport: SpeedReport | null = null;
  if (speed) {
    const subjectSpeed = buildSpeed(build, speed.context?.weather);
    const comparison = compareSpeed(subjectSpeed, speed.opponentSpeed, speed.context);
    speedReport = {
      subjectSpeed: comparison.firstSpeed,
      opponentSpeed: comparison.secondSpeed,
      movesFirst: comparison.movesFirst,
      satisfied: comparison.movesFirst === "first",
      margin: comparison.difference,
    };
  }

  const failed = threats.filter((report) => !report.satisfied).map((report) => report.threatId);
  if (speedReport && !speedReport.satisfied) failed.push("speed");
  if (failed.length > 0) {
    throw new UnsupportedMechanicError(
      `Spread failed re-verification for ${failed.join(", ")}; an item or ability interaction is not monotonic in EVs.`,
    );
  }

  return {
    feasible: true,
    nature: subject.nature,
    evs,
    finalStats: resolveBuild(build),
    totalEvs: MAX_TOTAL_EVS - unallocated,
    unallocated,
    survivalRate: target,
    threats,
    speed: speedReport,
  };
}

export function requireFeasible(result: SpreadResult): FeasibleSpread {
  if (result.feasible) return result;
  throw new InfeasibleSpreadError<InfeasibleSpread>(
    `No legal spread satisfies every constraint: ${result.reasons.join(" ")}`,
    result,
  );
}
