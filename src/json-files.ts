import { readFileSync } from "node:fs";
import { Ajv, type ErrorObject, type SchemaObject } from "ajv";

// src/ and dist/ both sit one level below the project root.
const PROJECT_ROOT = new URL("../", import.meta.url);

export function projectFile(relativePath: string): URL {
  return new URL(relativePath, PROJECT_ROOT);
}

export function readJson(file: string | URL): unknown {
  const raw = readFileSync(file, "utf-8");
  return JSON.parse(raw);
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readSchema(relativePath: string): SchemaObject {
  const schema = readJson(projectFile(relativePath));
  if (!isSchemaObject(schema)) {
    throw new Error(`Schema '${relativePath}' is not a JSON object.`);
  }
  return schema;
}

export function formatAjvErrors(
  errors: readonly ErrorObject[] | null | undefined,
): string {
  return (errors ?? [])
    .map((e: ErrorObject) => `${e.instancePath || "/"}: ${String(e.message)}`)
    .join("\n");
}

/**
 * Loads a data file shipped with the project and validates it against its
 * JSON Schema. Throws on the first invalid file; nothing falls back.
 */
export function loadDataFile<T>(dataPath: string, schemaPath: string): T {
  const ajv = new Ajv({ allErrors: true });
  const validate = ajv.compile<T>(readSchema(schemaPath));
  const data = readJson(projectFile(dataPath));
  if (!validate(data)) {
    throw new Error(
      `Data file '${dataPath}' failed validation:\n${formatAjvErrors(validate.errors)}`,
    );
  }
  return data;
}
