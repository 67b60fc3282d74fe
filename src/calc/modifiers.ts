import { UnsupportedMechanicError, ValidationError } from "../errors.js";
import { loadDataFile } from "../json-files.js";
import type {
  BattleContext,
  BattleFormat,
  CombatantBuild,
  DamagingMove,
  Terrain,
  TypeName,
  Weather,
} from "./types.js";

// -- Fixed-point multipliers (x/4096) --

export const BASE_MODIFIER = 4096;

export const MOD = {
  IMMUNE: 0,
  HALF: 2048,
  DOUBLES_SCREEN: 2732,
  THREE_QUARTERS: 3072,
  NEUTRAL: 4096,
  MUSCLE_BAND: 4505,
  TYPE_BOOST: 4915,
  LIFE_ORB: 5324,
  TERRAIN: 5325,
  ONE_AND_HALF: 6144,
  DOUBLE: 8192,
  ADAPTED_TERA: 9216,
} as const;

export function applyModifier(value: number, modifier: number): number {
  return Math.floor((value * modifier) / BASE_MODIFIER);
}

// -- Catalog data --

export type EffectId =
  | "none"
  | "unsupported"
  | "physical-attack-boost"
  | "special-attack-boost"
  | "physical-attack-double"
  | "guts"
  | "solar-power"
  | "special-defense-boost"
  | "eviolite"
  | "fur-coat"
  | "type-power-boost"
  | "physical-power-boost"
  | "special-power-boost"
  | "technician"
  | "tough-claws"
  | "sand-force"
  | "type-conversion"
  | "adaptability"
  | "life-orb"
  | "expert-belt"
  | "tinted-lens"
  | "sniper"
  | "multiscale"
  | "filter"
  | "thick-fat"
  | "type-damage-halved"
  | "ice-scales"
  | "fluffy"
  | "resist-berry"
  | "levitation"
  | "type-immunity"
  | "wonder-guard"
  | "speed-boost"
  | "weather-speed";

/** Where an unmodelled entry would change the result. */
export type UnsupportedWhen = "attacking" | "defending" | "speed";

export interface ModifierEntry {
  description: string;
  effect: EffectId;
  type?: TypeName;
  weather?: Weather;
  unsupportedWhen?: UnsupportedWhen[];
}

interface ModifierCatalogFile {
  entries: Record<string, ModifierEntry>;
}

export type ModifierSource = "item" | "ability";

const catalogs: Record<ModifierSource, Record<string, ModifierEntry>> = {
  item: loadDataFile<ModifierCatalogFile>(
    "data/items.json",
    "schemas/modifier_catalog.schema.json",
  ).entries,
  ability: loadDataFile<ModifierCatalogFile>(
    "data/abilities.json",
    "schemas/modifier_catalog.schema.json",
  ).entries,
};

// -- Effect hooks --

export interface ModifierInput {
  attacker: CombatantBuild;
  defender: CombatantBuild;
  move: DamagingMove;
  moveType: TypeName;
  effectiveness: number;
  context: BattleContext;
}

type ModifierHook = (input: ModifierInput, entry: ModifierEntry) => number;

/**
 * Attacker-side hooks fire for the attacker's item and ability, defender-side
 * hooks for the defender's. Numeric hooks return an x/4096 multiplier.
 */
export interface ModifierEffect {
  attackStat?: ModifierHook;
  basePower?: ModifierHook;
  attackerFinal?: ModifierHook;
  defenseStat?: ModifierHook;
  defenderFinal?: ModifierHook;
  immune?: (input: ModifierInput, entry: ModifierEntry) => boolean;
  /** Normal-type moves take the entry's type. */
  convertsNormalMoves?: boolean;
  strongerStab?: boolean;
  ignoresBurn?: boolean;
  ungrounded?: boolean;
  speed?: (weather: Weather | undefined, entry: ModifierEntry) => number;
}

const whenPhysical =
  (modifier: number): ModifierHook =>
  ({ move }) =>
    move.category === "physical" ? modifier : MOD.NEUTRAL;

const whenSpecial =
  (modifier: number): ModifierHook =>
  ({ move }) =>
    move.category === "special" ? modifier : MOD.NEUTRAL;

const whenSuperEffective =
  (modifier: number): ModifierHook =>
  ({ effectiveness }) =>
    effectiveness > 1 ? modifier : MOD.NEUTRAL;

export const effectRegistry: Record<EffectId, ModifierEffect> = {
  none: {},
  unsupported: {},
  "physical-attack-boost": { attackStat: whenPhysical(MOD.ONE_AND_HALF) },
  "special-attack-boost": { attackStat: whenSpecial(MOD.ONE_AND_HALF) },
  "physical-attack-double": { attackStat: whenPhysical(MOD.DOUBLE) },
  guts: {
    attackStat: ({ move, context }) =>
      move.category === "physical" && context.attackerBurned === true
        ? MOD.ONE_AND_HALF
        : MOD.NEUTRAL,
    ignoresBurn: true,
  },
  "solar-power": {
    attackStat: ({ move, context }) =>
      move.category === "special" && isSunny(context.weather)
        ? MOD.ONE_AND_HALF
        : MOD.NEUTRAL,
  },
  "special-defense-boost": { defenseStat: whenSpecial(MOD.ONE_AND_HALF) },
  eviolite: { defenseStat: () => MOD.ONE_AND_HALF },
  "fur-coat": { defenseStat: whenPhysical(MOD.DOUBLE) },
  "type-power-boost": {
    basePower: ({ moveType }, entry) =>
      moveType === entry.type ? MOD.TYPE_BOOST : MOD.NEUTRAL,
  },
  "physical-power-boost": { basePower: whenPhysical(MOD.MUSCLE_BAND) },
  "special-power-boost": { basePower: whenSpecial(MOD.MUSCLE_BAND) },
  technician: {
    basePower: ({ move }) =>
      move.basePower <= 60 ? MOD.ONE_AND_HALF : MOD.NEUTRAL,
  },
  "tough-claws": {
    basePower: ({ move }) =>
      move.contact === true ? MOD.TERRAIN : MOD.NEUTRAL,
  },
  "sand-force": {
    basePower: ({ moveType, context }) =>
      context.weather === "sand" &&
      (moveType === "rock" || moveType === "ground" || moveType === "steel")
        ? MOD.TERRAIN
        : MOD.NEUTRAL,
  },
  "type-conversion": {
    convertsNormalMoves: true,
    basePower: ({ move }) =>
      move.type === "normal" ? MOD.TYPE_BOOST : MOD.NEUTRAL,
  },
  adaptability: { strongerStab: true },
  "life-orb": { attackerFinal: () => MOD.LIFE_ORB },
  "expert-belt": { attackerFinal: whenSuperEffective(MOD.TYPE_BOOST) },
  "tinted-lens": {
    attackerFinal: ({ effectiveness }) =>
      effectiveness < 1 ? MOD.DOUBLE : MOD.NEUTRAL,
  },
  sniper: {
    attackerFinal: ({ context }) =>
      context.critical === true ? MOD.ONE_AND_HALF : MOD.NEUTRAL,
  },
  multiscale: {
    defenderFinal: ({ context }) =>
      context.defenderAtFullHp === false ? MOD.NEUTRAL : MOD.HALF,
  },
  filter: { defenderFinal: whenSuperEffective(MOD.THREE_QUARTERS) },
  "thick-fat": {
    defenderFinal: ({ moveType }) =>
      moveType === "fire" || moveType === "ice" ? MOD.HALF : MOD.NEUTRAL,
  },
  "type-damage-halved": {
    defenderFinal: ({ moveType }, entry) =>
      moveType === entry.type ? MOD.HALF : MOD.NEUTRAL,
  },
  "ice-scales": { defenderFinal: whenSpecial(MOD.HALF) },
  fluffy: {
    defenderFinal: ({ move, moveType }) => {
      const contact = move.contact === true;
      const fire = moveType === "fire";
      if (contact && !fire) return MOD.HALF;
      if (fire && !contact) return MOD.DOUBLE;
      return MOD.NEUTRAL;
    },
  },
  "resist-berry": {
    defenderFinal: ({ moveType, effectiveness }, entry) =>
      moveType === entry.type && (effectiveness > 1 || entry.type === "normal")
        ? MOD.HALF
        : MOD.NEUTRAL,
  },
  levitation: {
    immune: ({ moveType }) => moveType === "ground",
    ungrounded: true,
  },
  "type-immunity": {
    immune: ({ moveType }, entry) => moveType === entry.type,
  },
  "wonder-guard": {
    immune: ({ effectiveness }) => effectiveness <= 1,
  },
  "speed-boost": { speed: () => MOD.ONE_AND_HALF },
  "weather-speed": {
    speed: (weather, entry) =>
      weather !== undefined && baseWeather(weather) === entry.weather
        ? MOD.DOUBLE
        : MOD.NEUTRAL,
  },
};

// -- Lookup --

export interface ResolvedModifier {
  id: string;
  source: ModifierSource;
  entry: ModifierEntry;
  effect: ModifierEffect;
}

export function normalizeId(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s_]+/g, "-");
}

/**
 * Looks up an item or ability. Unknown ids fail validation. Recognized ids
 * the engine cannot model resolve here and are rejected by
 * `assertModelled` only where they would change the result.
 */
export function resolveModifier(
  source: ModifierSource,
  raw: string | undefined,
): ResolvedModifier | null {
  if (raw === undefined || raw === "") return null;
  const id = normalizeId(raw);
  const entry = catalogs[source][id];
  if (entry === undefined) {
    throw new ValidationError(`Unknown ${source} '${raw}'.`);
  }
  return { id, source, entry, effect: effectRegistry[entry.effect] };
}

export function assertModelled(
  held: readonly ResolvedModifier[],
  when: UnsupportedWhen,
): void {
  for (const { id, source, entry } of held) {
    if (entry.effect !== "unsupported") continue;
    if (entry.unsupportedWhen?.includes(when) === false) continue;
    throw new UnsupportedMechanicError(
      `The ${source} '${id}' is recognized but not modelled: ${entry.description}`,
    );
  }
}

export function resolveHeld(
  build: CombatantBuild,
): ResolvedModifier[] {
  const held: ResolvedModifier[] = [];
  const ability = resolveModifier("ability", build.ability);
  if (ability) held.push(ability);
  const item = resolveModifier("item", build.item);
  if (item) held.push(item);
  return held;
}

// -- Field conditions --

function baseWeather(weather: Weather): Weather {
  if (weather === "harsh-sun") return "sun";
  if (weather === "heavy-rain") return "rain";
  return weather;
}

function isSunny(weather: Weather | undefined): boolean {
  return weather === "sun" || weather === "harsh-sun";
}

export function weatherModifier(
  weather: Weather | undefined,
  moveType: TypeName,
): number {
  switch (weather) {
    case "sun":
      if (moveType === "fire") return MOD.ONE_AND_HALF;
      return moveType === "water" ? MOD.HALF : MOD.NEUTRAL;
    case "rain":
      if (moveType === "water") return MOD.ONE_AND_HALF;
      return moveType === "fire" ? MOD.HALF : MOD.NEUTRAL;
    case "harsh-sun":
      if (moveType === "fire") return MOD.ONE_AND_HALF;
      return moveType === "water" ? MOD.IMMUNE : MOD.NEUTRAL;
    case "heavy-rain":
      if (moveType === "water") return MOD.ONE_AND_HALF;
      return moveType === "fire" ? MOD.IMMUNE : MOD.NEUTRAL;
    default:
      return MOD.NEUTRAL;
  }
}

/** Sand raises Rock-type special bulk, snow raises Ice-type physical bulk. */
export function weatherDefenseModifier(
  weather: Weather | undefined,
  defenderTypes: readonly TypeName[],
  category: DamagingMove["category"],
): number {
  if (weather === "sand" && category === "special" && defenderTypes.includes("rock")) {
    return MOD.ONE_AND_HALF;
  }
  if (weather === "snow" && category === "physical" && defenderTypes.includes("ice")) {
    return MOD.ONE_AND_HALF;
  }
  return MOD.NEUTRAL;
}

const TERRAIN_BOOSTED: Partial<Record<Terrain, TypeName>> = {
  electric: "electric",
  grassy: "grass",
  psychic: "psychic",
};

const GRASSY_HALVED_MOVES = new Set(["earthquake", "bulldoze", "magnitude"]);

export interface TerrainInput {
  terrain: Terrain | undefined;
  moveType: TypeName;
  moveName: string;
  attackerGrounded: boolean;
  defenderGrounded: boolean;
}

export function terrainModifier(input: TerrainInput): number {
  const { terrain } = input;
  if (terrain === undefined) return MOD.NEUTRAL;
  if (terrain === "misty") {
    return input.moveType === "dragon" && input.defenderGrounded
      ? MOD.HALF
      : MOD.NEUTRAL;
  }
  if (
    terrain === "grassy" &&
    input.defenderGrounded &&
    GRASSY_HALVED_MOVES.has(normalizeId(input.moveName))
  ) {
    return MOD.HALF;
  }
  return TERRAIN_BOOSTED[terrain] === input.moveType && input.attackerGrounded
    ? MOD.TERRAIN
    : MOD.NEUTRAL;
}

export function screenModifier(
  context: BattleContext,
  category: DamagingMove["category"],
  format: BattleFormat,
): number {
  if (context.critical === true) return MOD.NEUTRAL;
  const screens = context.screens ?? {};
  const active =
    screens.auroraVeil === true ||
    (category === "physical" ? screens.reflect === true : screens.lightScreen === true);
  if (!active) return MOD.NEUTRAL;
  return format === "doubles" ? MOD.DOUBLES_SCREEN : MOD.HALF;
}

export function effectiveTypes(build: CombatantBuild): readonly TypeName[] {
  return build.teraType !== undefined ? [build.teraType] : build.types;
}

export function isGrounded(build: CombatantBuild): boolean {
  if (effectiveTypes(build).includes("flying")) return false;
  return !resolveHeld(build).some((held) => held.effect.ungrounded === true);
}

// -- Catalog --

export interface ModifierMeta {
  description: string;
  supported: boolean;
  unsupportedWhen?: UnsupportedWhen[];
}

function toMeta(entries: Record<string, ModifierEntry>): Record<string, ModifierMeta> {
  const result: Record<string, ModifierMeta> = {};
  for (const [id, entry] of Object.entries(entries)) {
    const supported = entry.effect !== "unsupported";
    result[id] = supported
      ? { description: entry.description, supported }
      : { description: entry.description, supported, unsupportedWhen: entry.unsupportedWhen };
  }
  return result;
}

export const weatherCatalog: Record<Weather, string> = {
  sun: "Fire moves x1.5, Water moves x0.5.",
  rain: "Water moves x1.5, Fire moves x0.5.",
  sand: "Rock-type Special Defense x1.5.",
  snow: "Ice-type Defense x1.5.",
  "harsh-sun": "Fire moves x1.5, Water moves fail.",
  "heavy-rain": "Water moves x1.5, Fire moves fail.",
};

export const terrainCatalog: Record<Terrain, string> = {
  electric: "Electric moves from grounded attackers x1.3.",
  grassy:
    "Grass moves from grounded attackers x1.3; Earthquake and Bulldoze against grounded targets x0.5.",
  psychic: "Psychic moves from grounded attackers x1.3.",
  misty: "Dragon moves against grounded targets x0.5.",
};

export function getModifierCatalog(): {
  items: Record<string, ModifierMeta>;
  abilities: Record<string, ModifierMeta>;
  weather: Record<Weather, string>;
  terrain: Record<Terrain, string>;
} {
  return {
    items: toMeta(catalogs.item),
    abilities: toMeta(catalogs.ability),
    weather: weatherCatalog,
    terrain: terrainCatalog,
  };
}
