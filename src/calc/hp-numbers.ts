import { normalizeId } from "./modifiers.js";

/**
 * Held items whose effect is a floored fraction of max hp. Some hp totals
 * get more healing, or lose less to recoil, than their neighbours.
 */
export type HpItemRule = "recovery-16" | "recoil-10" | "heal-4";

const HP_ITEM_RULES: Record<string, HpItemRule> = {
  leftovers: "recovery-16",
  "black-sludge": "recovery-16",
  "life-orb": "recoil-10",
  "sitrus-berry": "heal-4",
};

export function hpItemRule(item: string | undefined): HpItemRule | null {
  if (item === undefined || item === "") return null;
  return HP_ITEM_RULES[normalizeId(item)] ?? null;
}

/**
 * How well an hp total suits the held item, from 0 to 1. Items without a
 * floored-fraction effect score every total 1.
 *
 * - recovery-16: multiples of 16 score 1, falling to 0 eight away.
 * - recoil-10: totals of 10n - 1 score 1, multiples of 10 score 0.
 * - heal-4: multiples of 4 score 1.
 */
export function scoreHpForItem(hp: number, item: string | undefined): number {
  switch (hpItemRule(item)) {
    case "recovery-16": {
      const remainder = hp % 16;
      return 1 - Math.min(remainder, 16 - remainder) / 8;
    }
    case "recoil-10":
      return (hp % 10) / 9;
    case "heal-4":
      return 1 - (hp % 4) / 3;
    case null:
      return 1;
  }
}
