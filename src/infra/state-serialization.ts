/**
 * State serialization utilities for save slots.
 *
 * Converts between the in-memory StoryState (stats grouped, camelCase) and
 * the flat, human-readable stored format (snake_case keys).
 */

import { z } from 'zod';
import type { StoryState } from '../domain/state.js';
import { STAT_KEYS, makeDefaultState } from '../domain/state.js';
import { clampStat } from '../domain/transitions.js';
import { SaveError } from './errors.js';

const storedStateSchema = z.object({
  name: z.string(),
  chapter: z.number().int().nonnegative(),
  location: z.string(),
  health: z.number().int(),
  power: z.number().int(),
  morality: z.number().int(),
  notoriety: z.number().int(),
  trust_demon_lord: z.number().int(),
  bond_demon_lord: z.number().int(),
  inventory: z.array(z.string()),
  flags: z.record(z.union([z.boolean(), z.string()])),
  history: z.array(z.string()),
  seed: z.number().int(),
});

/**
 * Storage-friendly state format.
 */
export type StoredState = z.infer<typeof storedStateSchema>;

/**
 * Every field optional; unknown keys are stripped.
 */
const partialStoredStateSchema = storedStateSchema.partial();

/**
 * Converts StoryState to storage format. Containers are copied.
 */
export function serializeState(state: StoryState): StoredState {
  return {
    name: state.name,
    chapter: state.chapter,
    location: state.location,
    health: state.stats.health,
    power: state.stats.power,
    morality: state.stats.morality,
    notoriety: state.stats.notoriety,
    trust_demon_lord: state.stats.trustDemonLord,
    bond_demon_lord: state.stats.bondDemonLord,
    inventory: [...state.inventory],
    flags: { ...state.flags },
    history: [...state.history],
    seed: state.seed,
  };
}

/**
 * Converts a stored payload back to StoryState.
 *
 * Missing fields come from the default-constructed record, containers are
 * rebuilt rather than aliased, bounded stats are clamped and the inventory
 * is de-duplicated. Wrong types raise SaveError('malformed').
 */
export function deserializeState(raw: unknown): StoryState {
  const parsed = partialStoredStateSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SaveError('malformed', `Saved state is malformed: ${details}`, { cause: parsed.error });
  }

  const stored: StoredState = { ...serializeState(makeDefaultState()), ...parsed.data };

  const state: StoryState = {
    name: stored.name,
    chapter: stored.chapter,
    location: stored.location,
    stats: {
      health: stored.health,
      power: stored.power,
      morality: stored.morality,
      notoriety: stored.notoriety,
      trustDemonLord: stored.trust_demon_lord,
      bondDemonLord: stored.bond_demon_lord,
    },
    inventory: Array.from(new Set(stored.inventory)),
    flags: { ...stored.flags },
    history: [...stored.history],
    seed: stored.seed >>> 0,
  };

  for (const key of STAT_KEYS) {
    state.stats[key] = clampStat(key, state.stats[key]);
  }

  return state;
}
