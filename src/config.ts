/**
 * Runtime configuration from environment variables.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { DRIFT_CHANCE } from './domain/engine.js';

export interface AppConfig {
  /** Directory holding slot_<n>.json files */
  saveDir: string;
  slotCount: number;
  /** Probability of an incidental health nudge after each choice */
  driftChance: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const envSchema = z.object({
  THORNSFALL_SAVE_DIR: z.string().min(1).default('saves'),
  THORNSFALL_SLOT_COUNT: z.coerce.number().int().min(1).max(99).default(8),
  THORNSFALL_DRIFT_CHANCE: z.coerce.number().min(0).max(1).default(DRIFT_CHANCE),
});

/**
 * Reads and validates configuration. Relative save directories resolve
 * against `cwd`.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return {
    saveDir: resolve(cwd, parsed.data.THORNSFALL_SAVE_DIR),
    slotCount: parsed.data.THORNSFALL_SLOT_COUNT,
    driftChance: parsed.data.THORNSFALL_DRIFT_CHANCE,
  };
}
