import { Ajv, type ValidateFunction } from "ajv";
import type { CalcConfig } from "./config-loader.js";
import { ValidationError } from "./errors.js";
import { formatAjvErrors, readSchema } from "./json-files.js";
import type { OpponentSpread, SpeedFrequency } from "./calc/outspeed.js";
import type { PrioritizedMove } from "./calc/moves.js";
import type { SpeedContext } from "./calc/speed.js";
import type {
  OffensiveRole,
  SpeedBenchmark,
  SubjectBuild,
} from "./calc/spread-optimizer.js";
import {
  STAT_IDS,
  type BattleContext,
  type CombatantBuild,
  type Move,
  type NatureName,
  type NonHpStatId,
  type StatId,
  type StatTable,
  type ThreatSpec,
  type TypeName,
} from "./calc/types.js";

export type PartialStats = Partial<Record<StatId, number>>;

/** A build as clients send it: ivs, evs and level may be left out. */
export interface BuildInput {
  name?: string;
  level?: number;
  baseStats: StatTable;
  ivs?: PartialStats;
  evs?: PartialStats;
  nature: NatureName;
  types: TypeName[];
  item?: string;
  ability?: string;
  teraType?: TypeName;
}

export interface StatsRequest {
  baseStats: StatTable;
  ivs?: PartialStats;
  evs?: PartialStats;
  nature: NatureName;
  level?: number;
}

export interface DamageRequest {
  attacker: BuildInput;
  defender: BuildInput;
  move: Move;
  context?: BattleContext;
  maxKoHits?: number;
}

export interface KoThresholdRequest {
  attacker: BuildInput;
  defender: BuildInput;
  move: Move;
  context?: BattleContext;
  uses?: number;
  chance?: number;
}

export type SpeedSubject = { speed: number } | { build: BuildInput };

export interface SpeedCompareRequest {
  first: SpeedSubject;
  second: SpeedSubject;
  context?: SpeedContext;
}

export interface TurnOrderRequest {
  first: SpeedSubject;
  second: SpeedSubject;
  firstMove: PrioritizedMove;
  secondMove: PrioritizedMove;
  context?: SpeedContext;
}

export interface SpeedThresholdRequest {
  subject: BuildInput;
  opponentSpeed: number;
  context?: SpeedContext;
}

export interface OutspeedRequest {
  subject: SpeedSubject;
  distribution?: SpeedFrequency[];
  opponent?: { baseSpeed: number; level?: number; spreads: OpponentSpread[] };
  context?: SpeedContext;
}

export interface ThreatInput {
  id?: string;
  attacker: BuildInput;
  move: Move;
  context?: BattleContext;
}

export interface SpreadRequest {
  subject: Omit<BuildInput, "evs">;
  threats: ThreatInput[];
  speed?: SpeedBenchmark;
  survivalRate?: number;
  role?: OffensiveRole;
  tuneHp?: boolean;
  /** Answer 422 instead of a diagnostic body when nothing fits. */
  requireFeasible?: boolean;
}

export interface NatureRequest {
  baseStats: StatTable;
  ivs?: PartialStats;
  level?: number;
  primary: { stat: StatId; value: number };
  secondary?: { stat: StatId; minimum: number };
  avoidLowering?: NonHpStatId[];
}

interface RequestBodies {
  stats_request: StatsRequest;
  damage_request: DamageRequest;
  ko_threshold_request: KoThresholdRequest;
  speed_compare_request: SpeedCompareRequest;
  speed_threshold_request: SpeedThresholdRequest;
  turn_order_request: TurnOrderRequest;
  outspeed_request: OutspeedRequest;
  spread_request: SpreadRequest;
  nature_request: NatureRequest;
}

export type RequestSchemaId = keyof RequestBodies;

const REQUEST_SCHEMA_IDS: readonly RequestSchemaId[] = [
  "stats_request",
  "damage_request",
  "ko_threshold_request",
  "speed_compare_request",
  "speed_threshold_request",
  "turn_order_request",
  "outspeed_request",
  "spread_request",
  "nature_request",
];

let ajv: Ajv | undefined;

function requestAjv(): Ajv {
  if (ajv) return ajv;
  const instance = new Ajv({ allErrors: true });
  instance.addSchema(readSchema("schemas/common.schema.json"));
  for (const id of REQUEST_SCHEMA_IDS) {
    instance.addSchema(readSchema(`schemas/${id}.schema.json`));
  }
  ajv = instance;
  return instance;
}

type RequestValidators = { [K in RequestSchemaId]?: ValidateFunction<RequestBodies[K]> };

const validators: RequestValidators = {};

function requestValidator<K extends RequestSchemaId>(
  schemaId: K,
): ValidateFunction<RequestBodies[K]> {
  const cache: { [P in K]?: ValidateFunction<RequestBodies[P]> } = validators;
  const cached = cache[schemaId];
  if (cached) return cached;
  // Request schemas reference each other, so they are registered up front
  // and compiled here through a reference to their $id.
  const compiled = requestAjv().compile<RequestBodies[K]>({
    $ref: `${schemaId}.schema.json`,
  });
  cache[schemaId] = compiled;
  return compiled;
}

/** Validates a request body against its JSON Schema, narrowing it on success. */
export function validateRequest<K extends RequestSchemaId>(
  schemaId: K,
  body: unknown,
): RequestBodies[K] {
  const validate = requestValidator(schemaId);
  if (!validate(body)) {
    throw new ValidationError(
      `Request body failed validation:\n${formatAjvErrors(validate.errors)}`,
    );
  }
  return body;
}

// -- Defaults from the active CalcConfig --

export function fillStats(partial: PartialStats | undefined, fallback: number): StatTable {
  const table: Record<StatId, number> = { hp: 0, atk: 0, def: 0, spa: 0, spd: 0, spe: 0 };
  for (const stat of STAT_IDS) table[stat] = partial?.[stat] ?? fallback;
  return table;
}

export function toBuild(input: BuildInput, config: CalcConfig): CombatantBuild {
  return {
    ...input,
    level: input.level ?? config.level,
    ivs: fillStats(input.ivs, config.defaultIv),
    evs: fillStats(input.evs, 0),
  };
}

export function toSubject(input: Omit<BuildInput, "evs">, config: CalcConfig): SubjectBuild {
  return {
    ...input,
    level: input.level ?? config.level,
    ivs: fillStats(input.ivs, config.defaultIv),
  };
}

export function toContext(
  context: BattleContext | undefined,
  config: CalcConfig,
): BattleContext {
  return { format: config.format, ...context };
}

export function toThreat(input: ThreatInput, config: CalcConfig): ThreatSpec {
  return {
    id: input.id,
    attacker: toBuild(input.attacker, config),
    move: input.move,
    context: toContext(input.context, config),
  };
}
