import { UnsupportedMechanicError, ValidationError } from "../errors.js";
import { loadDataFile } from "../json-files.js";
import { normalizeId } from "./modifiers.js";
import { assertTypeName } from "./type-chart.js";
import {
  VARIABLE_2_TO_5,
  type DamagingMove,
  type HitCount,
  type Move,
} from "./types.js";

export const MAX_HITS = 10;

interface MoveMechanics {
  minHits: number;
  maxHits: number;
  alwaysCritical?: boolean;
  unsupported?: string;
}

const mechanics = loadDataFile<{ moves: Record<string, MoveMechanics> }>(
  "data/move-mechanics.json",
  "schemas/move_mechanics.schema.json",
).moves;

const priorities = loadDataFile<{ moves: Record<string, number> }>(
  "data/move-priority.json",
  "schemas/move_priority.schema.json",
).moves;

export const MIN_PRIORITY = -7;
export const MAX_PRIORITY = 5;

/** Just enough of a move to place it in the turn order. */
export type PrioritizedMove = Pick<Move, "name" | "priority">;

function validatePriority(move: PrioritizedMove): void {
  if (
    move.priority !== undefined &&
    (!Number.isInteger(move.priority) ||
      move.priority < MIN_PRIORITY ||
      move.priority > MAX_PRIORITY)
  ) {
    throw new ValidationError(
      `Move '${move.name}' priority must be an integer in [${String(MIN_PRIORITY)}, ${String(MAX_PRIORITY)}].`,
    );
  }
}

/** Explicit priority, else the bracket listed for the move, else 0. */
export function movePriority(move: PrioritizedMove): number {
  if (typeof move.name !== "string" || move.name.trim() === "") {
    throw new ValidationError("Move name is required.");
  }
  validatePriority(move);
  return move.priority ?? priorities[normalizeId(move.name)] ?? 0;
}

export function validateMove(move: Move): void {
  if (typeof move.name !== "string" || move.name.trim() === "") {
    throw new ValidationError("Move name is required.");
  }
  if (typeof move.type !== "string") {
    throw new ValidationError(`Move '${move.name}' has no type.`);
  }
  assertTypeName(move.type);
  validatePriority(move);
  if (move.category === "status") return;
  if (move.category !== "physical" && move.category !== "special") {
    throw new ValidationError(
      `Move '${move.name}' has unknown category '${String(move.category)}'.`,
    );
  }
  if (!Number.isInteger(move.basePower) || move.basePower < 1) {
    throw new ValidationError(
      `Damaging move '${move.name}' needs an integer base power of at least 1.`,
    );
  }
  if (move.hits !== undefined) validateHitCount(move.name, move.hits);
}

function validateHitCount(name: string, hits: HitCount): void {
  switch (hits.kind) {
    case "single":
      return;
    case "fixed":
      if (!Number.isInteger(hits.hits) || hits.hits < 2 || hits.hits > MAX_HITS) {
        throw new ValidationError(
          `Move '${name}' fixed hit count must be an integer in [2, ${String(MAX_HITS)}].`,
        );
      }
      return;
    case "variable": {
      if (hits.distribution.length === 0) {
        throw new ValidationError(`Move '${name}' hit distribution is empty.`);
      }
      const seen = new Set<number>();
      let total = 0;
      for (const { hits: count, weight } of hits.distribution) {
        if (!Number.isInteger(count) || count < 1 || count > MAX_HITS || seen.has(count)) {
          throw new ValidationError(
            `Move '${name}' hit distribution has an invalid or repeated hit count ${String(count)}.`,
          );
        }
        if (!(weight > 0)) {
          throw new ValidationError(
            `Move '${name}' hit weights must be positive.`,
          );
        }
        seen.add(count);
        total += weight;
      }
      if (Math.abs(total - 1) > 1e-6) {
        throw new ValidationError(
          `Move '${name}' hit weights must sum to 1, got ${String(total)}.`,
        );
      }
      return;
    }
    default:
      throw new ValidationError(`Move '${name}' has an unknown hit descriptor.`);
  }
}

export interface ResolvedMove {
  move: DamagingMove;
  hits: HitCount;
  alwaysCritical: boolean;
}

/**
 * Fills in hit counts and fixed critical hits for moves listed in the
 * mechanics table. An explicit `hits` on the move wins over the table.
 */
export function resolveMove(move: DamagingMove): ResolvedMove {
  const known = mechanics[normalizeId(move.name)];
  if (known === undefined) {
    return { move, hits: move.hits ?? { kind: "single" }, alwaysCritical: false };
  }
  if (known.unsupported !== undefined) {
    throw new UnsupportedMechanicError(
      `Move '${move.name}' is not modelled: ${known.unsupported}`,
    );
  }
  return {
    move,
    hits: move.hits ?? tableHits(known),
    alwaysCritical: known.alwaysCritical === true,
  };
}

function tableHits({ minHits, maxHits }: MoveMechanics): HitCount {
  if (minHits === maxHits) {
    return minHits === 1 ? { kind: "single" } : { kind: "fixed", hits: minHits };
  }
  if (minHits === 2 && maxHits === 5) return VARIABLE_2_TO_5;
  throw new UnsupportedMechanicError(
    `No hit distribution for ${String(minHits)}-${String(maxHits)} hits.`,
  );
}

export function maxHitsOf(hits: HitCount): number {
  switch (hits.kind) {
    case "single":
      return 1;
    case "fixed":
      return hits.hits;
    case "variable":
      return Math.max(...hits.distribution.map((entry) => entry.hits));
  }
}
