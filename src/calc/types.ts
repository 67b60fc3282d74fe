export const STAT_IDS = ["hp", "atk", "def", "spa", "spd", "spe"] as const;
export type StatId = (typeof STAT_IDS)[number];
export type NonHpStatId = Exclude<StatId, "hp">;

export type StatTable = Readonly<Record<StatId, number>>;

export const TYPE_NAMES = [
  "normal",
  "fire",
  "water",
  "electric",
  "grass",
  "ice",
  "fighting",
  "poison",
  "ground",
  "flying",
  "psychic",
  "bug",
  "rock",
  "ghost",
  "dragon",
  "dark",
  "steel",
  "fairy",
] as const;
export type TypeName = (typeof TYPE_NAMES)[number];

// Table order matters: the nature optimizer falls back to it on ties.
export const NATURE_NAMES = [
  "hardy",
  "docile",
  "serious",
  "bashful",
  "quirky",
  "lonely",
  "brave",
  "adamant",
  "naughty",
  "bold",
  "relaxed",
  "impish",
  "lax",
  "modest",
  "mild",
  "quiet",
  "rash",
  "calm",
  "gentle",
  "sassy",
  "careful",
  "timid",
  "hasty",
  "jolly",
  "naive",
] as const;
export type NatureName = (typeof NATURE_NAMES)[number];

export const WEATHERS = [
  "sun",
  "rain",
  "sand",
  "snow",
  "harsh-sun",
  "heavy-rain",
] as const;
export type Weather = (typeof WEATHERS)[number];

export const TERRAINS = ["electric", "grassy", "psychic", "misty"] as const;
export type Terrain = (typeof TERRAINS)[number];

export type BattleFormat = "singles" | "doubles";

export interface CombatantBuild {
  name?: string;
  level: number;
  baseStats: StatTable;
  ivs: StatTable;
  evs: StatTable;
  nature: NatureName;
  types: readonly TypeName[];
  item?: string;
  ability?: string;
  /** Transformed type; replaces the declared types while active. */
  teraType?: TypeName;
}

export interface HitWeight {
  hits: number;
  weight: number;
}

export type HitCount =
  | { kind: "single" }
  | { kind: "fixed"; hits: number }
  | { kind: "variable"; distribution: readonly HitWeight[] };

export const VARIABLE_2_TO_5: HitCount = {
  kind: "variable",
  distribution: [
    { hits: 2, weight: 0.35 },
    { hits: 3, weight: 0.35 },
    { hits: 4, weight: 0.15 },
    { hits: 5, weight: 0.15 },
  ],
};

interface MoveBase {
  name: string;
  type: TypeName;
  priority?: number;
}

export interface DamagingMove extends MoveBase {
  category: "physical" | "special";
  basePower: number;
  hits?: HitCount;
  /** Hits every adjacent target. */
  spread?: boolean;
  contact?: boolean;
}

export interface StatusMove extends MoveBase {
  category: "status";
}

export type Move = DamagingMove | StatusMove;
export type MoveCategory = Move["category"];

export interface Screens {
  reflect?: boolean;
  lightScreen?: boolean;
  auroraVeil?: boolean;
}

export interface BattleContext {
  format?: BattleFormat;
  weather?: Weather;
  terrain?: Terrain;
  screens?: Screens;
  /** The move is hitting more than one target this turn. */
  multiTarget?: boolean;
  critical?: boolean;
  helpingHand?: boolean;
  friendGuard?: boolean;
  attackerBurned?: boolean;
  /** Defaults to true. */
  defenderAtFullHp?: boolean;
}

export type KoVerdict =
  | { kind: "guaranteed-ohko" }
  | { kind: "possible-ohko"; chance: number }
  | { kind: "guaranteed-nhko"; hits: number }
  | { kind: "no-ko" };

export interface DamageDetails {
  moveType: TypeName;
  attackStat: number;
  defenseStat: number;
  basePower: number;
  baseDamage: number;
  effectiveness: number;
  stab: number;
  /** Labels of every modifier that changed the result, in application order. */
  modifiers: string[];
  immunity?: string;
}

export interface DamageResult {
  rolls: number[];
  minDamage: number;
  maxDamage: number;
  minPercent: number;
  maxPercent: number;
  defenderHp: number;
  hitCount: number;
  /** Fraction of outcomes that knock the defender out in one use. */
  koChance: number;
  /** koChances[n - 1] is the chance that n uses knock the defender out. */
  koChances: number[];
  verdict: KoVerdict;
  details: DamageDetails;
}

export interface ThreatSpec {
  id?: string;
  attacker: CombatantBuild;
  move: Move;
  context: BattleContext;
}
