import { ValidationError } from "../errors.js";
import { loadDataFile } from "../json-files.js";
import { TYPE_NAMES, type TypeName } from "./types.js";

interface TypeChartFile {
  types: string[];
  matchups: Record<string, Record<string, number>>;
}

const chart = loadDataFile<TypeChartFile>(
  "data/type-chart.json",
  "schemas/type_chart.schema.json",
);

for (const name of chart.types) {
  if (!isTypeName(name)) {
    throw new Error(`Type chart lists unknown type '${name}'.`);
  }
}

export function isTypeName(value: string): value is TypeName {
  return TYPE_NAMES.some((name) => name === value);
}

export function assertTypeName(value: string): TypeName {
  if (!isTypeName(value)) {
    throw new ValidationError(`Unknown type '${value}'.`);
  }
  return value;
}

/** Single attacking-type vs defending-type lookup. */
export function singleEffectiveness(attacking: TypeName, defending: TypeName): number {
  return chart.matchups[assertTypeName(attacking)]?.[assertTypeName(defending)] ?? 1;
}

/**
 * Product of single lookups against every defending type. With at most two
 * defending types the result is one of 0, 0.25, 0.5, 1, 2 or 4.
 */
export function typeEffectiveness(
  attacking: TypeName,
  defending: readonly TypeName[],
): number {
  if (defending.length === 0 || defending.length > 2) {
    throw new ValidationError(
      `A combatant has one or two types, got ${String(defending.length)}.`,
    );
  }
  let multiplier = 1;
  for (const type of defending) {
    multiplier *= singleEffectiveness(attacking, type);
  }
  return multiplier;
}
