import { createRegistry } from "../schema/registry.js";
import type { PushConfig } from "../types/config.js";
import type { RawConfig } from "./loader.js";

export type ConfigValidationResult = { ok: true; config: PushConfig } | { ok: false; errors: string };

/**
 * Validate a loaded config against schemas/config.schema.json.
 * String values from the environment are coerced to booleans and integers in place.
 */
export async function validateConfig(raw: RawConfig, schemaDir?: string): Promise<ConfigValidationResult> {
  const registry = await createRegistry(schemaDir, { coerceTypes: true });
  const result = await registry.validate<PushConfig>("config", raw);
  if (!result.valid) return { ok: false, errors: result.errors };
  return { ok: true, config: result.value };
}
