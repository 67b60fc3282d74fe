import { ValidationError } from "../errors.js";
import {
  NATURE_NAMES,
  type NatureName,
  type NonHpStatId,
  type StatId,
} from "./types.js";

export interface NatureEffect {
  plus: NonHpStatId | null;
  minus: NonHpStatId | null;
}

const NEUTRAL: NatureEffect = { plus: null, minus: null };

export const NATURE_TABLE: Readonly<Record<NatureName, NatureEffect>> = {
  hardy: NEUTRAL,
  docile: NEUTRAL,
  serious: NEUTRAL,
  bashful: NEUTRAL,
  quirky: NEUTRAL,
  lonely: { plus: "atk", minus: "def" },
  brave: { plus: "atk", minus: "spe" },
  adamant: { plus: "atk", minus: "spa" },
  naughty: { plus: "atk", minus: "spd" },
  bold: { plus: "def", minus: "atk" },
  relaxed: { plus: "def", minus: "spe" },
  impish: { plus: "def", minus: "spa" },
  lax: { plus: "def", minus: "spd" },
  modest: { plus: "spa", minus: "atk" },
  mild: { plus: "spa", minus: "def" },
  quiet: { plus: "spa", minus: "spe" },
  rash: { plus: "spa", minus: "spd" },
  calm: { plus: "spd", minus: "atk" },
  gentle: { plus: "spd", minus: "def" },
  sassy: { plus: "spd", minus: "spe" },
  careful: { plus: "spd", minus: "spa" },
  timid: { plus: "spe", minus: "atk" },
  hasty: { plus: "spe", minus: "def" },
  jolly: { plus: "spe", minus: "spa" },
  naive: { plus: "spe", minus: "spd" },
};

export function isNatureName(value: string): value is NatureName {
  return NATURE_NAMES.some((name) => name === value);
}

export function getNature(name: string): NatureEffect {
  if (!isNatureName(name)) {
    throw new ValidationError(`Unknown nature '${name}'.`);
  }
  return NATURE_TABLE[name];
}

export function isNeutralNature(name: NatureName): boolean {
  return NATURE_TABLE[name].plus === null;
}

/**
 * Nature multiplier as a percentage (90, 100 or 110) so stat math stays in
 * integers.
 */
export function naturePercent(name: NatureName, stat: StatId): number {
  const effect = getNature(name);
  if (effect.plus === stat) return 110;
  if (effect.minus === stat) return 90;
  return 100;
}

export function natureMultiplier(name: NatureName, stat: StatId): number {
  return naturePercent(name, stat) / 100;
}
