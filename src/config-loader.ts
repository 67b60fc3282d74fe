import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { Ajv } from "ajv";
import type { BattleFormat } from "./calc/types.js";
import { formatAjvErrors, readSchema } from "./json-files.js";

export interface CalcConfig {
  calcConfigId: string;
  /** Level applied to builds that leave it out. */
  level: number;
  /** IV applied to every stat a build leaves out. */
  defaultIv: number;
  survivalRate: number;
  format: BattleFormat;
  maxKoHits: number;
}

declare module "fastify" {
  interface FastifyInstance {
    calcConfig: CalcConfig;
  }
}

const DEFAULT_CONFIG_PATH = "examples/calc_defaults.json";
const SCHEMA_PATH = "schemas/calc_config.schema.json";

export function loadCalcConfig(configPath?: string): CalcConfig {
  const path = configPath ?? process.env.CALC_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
  const resolvedPath = resolve(path);

  const raw = readFileSync(resolvedPath, "utf-8");
  const data: unknown = JSON.parse(raw);

  const ajv = new Ajv({ allErrors: true });
  const validate = ajv.compile<CalcConfig>(readSchema(SCHEMA_PATH));

  if (!validate(data)) {
    throw new Error(
      `CalcConfig validation failed for '${resolvedPath}':\n${formatAjvErrors(validate.errors)}`,
    );
  }

  return data;
}
