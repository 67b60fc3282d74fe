export * from "./types.js";
export { NATURE_TABLE, natureMultiplier, type NatureEffect } from "./natures.js";
export { typeEffectiveness, singleEffectiveness } from "./type-chart.js";
export {
  resolveStats,
  resolveBuild,
  minEvsForStat,
  validateEvSpread,
  validateIvSpread,
  type FinalStats,
} from "./stats.js";
export { calculateDamage, findKoThreshold, damageRolls } from "./damage.js";
export {
  compareSpeed,
  buildSpeed,
  minSpeedEvsToMoveFirst,
  maxSpeedEvsToMoveFirst,
  turnOrder,
} from "./speed.js";
export { movePriority } from "./moves.js";
export { scoreHpForItem } from "./hp-numbers.js";
export { optimizeSpread, requireFeasible } from "./spread-optimizer.js";
export { optimizeNature } from "./nature-optimizer.js";
export { estimateOutspeed, speedDistributionFromSpreads } from "./outspeed.js";

import { getModifierCatalog, type ModifierMeta } from "./modifiers.js";
import { NATURE_TABLE, type NatureEffect } from "./natures.js";
import { TYPE_NAMES, type NatureName, type Terrain, type TypeName, type Weather } from "./types.js";

export function getFullCatalog(): {
  types: readonly TypeName[];
  natures: Readonly<Record<NatureName, NatureEffect>>;
  items: Record<string, ModifierMeta>;
  abilities: Record<string, ModifierMeta>;
  weather: Record<Weather, string>;
  terrain: Record<Terrain, string>;
} {
  return {
    types: TYPE_NAMES,
    natures: NATURE_TABLE,
    ...getModifierCatalog(),
  };
}
