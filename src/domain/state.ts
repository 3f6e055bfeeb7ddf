/**
 * Canonical domain state definitions for a Thornsfall playthrough.
 *
 * This file defines the state record the engine reads and transitions:
 * - Bounded stats that gate scenes and endings
 * - Flags for narrative gating (lazily initialized, never removed)
 * - Inventory, history and the seed that keeps saves reproducible
 *
 * Non-goals (not included):
 * - Storage format (see infra/state-serialization.ts)
 * - Scene eligibility (belongs in rules.ts)
 * - Transition logic (belongs in transitions.ts)
 */

import { createHash } from 'node:crypto';

// ============================================================================
// Stats
// ============================================================================

/**
 * StatKey: The six bounded attributes of a playthrough.
 *
 * `bondDemonLord` is only ever raised; every other stat moves both ways.
 */
export type StatKey =
  | 'health'
  | 'power'
  | 'morality'
  | 'notoriety'
  | 'trustDemonLord'
  | 'bondDemonLord';

export const STAT_KEYS: readonly StatKey[] = [
  'health',
  'power',
  'morality',
  'notoriety',
  'trustDemonLord',
  'bondDemonLord',
];

/**
 * Stats: Mapping of stat keys to integer values.
 */
export type Stats = Record<StatKey, number>;

/**
 * StatBounds: Closed interval a stat is clamped to after every change.
 */
export interface StatBounds {
  min: number;
  max: number;
}

export const STAT_BOUNDS: Readonly<Record<StatKey, StatBounds>> = {
  health: { min: 0, max: 100 },
  power: { min: 0, max: 100 },
  morality: { min: -100, max: 100 },
  notoriety: { min: 0, max: 100 },
  trustDemonLord: { min: 0, max: 100 },
  bondDemonLord: { min: 0, max: 100 },
};

// ============================================================================
// Flags
// ============================================================================

/**
 * FlagValue: Flags are booleans, except `demon_lord_name` which freezes
 * the Demon Lord's name for the rest of the playthrough.
 */
export type FlagValue = boolean | string;

/**
 * Flags: Plain mapping owned by the state record.
 *
 * Keys are only ever added or overwritten. Scenes that need a flag
 * initialize it through setFlagIfAbsent().
 */
export type Flags = Record<string, FlagValue>;

export const DEMON_LORD_NAME_FLAG = 'demon_lord_name';
export const DEFAULT_DEMON_LORD_NAME = 'the Demon Lord';

// ============================================================================
// Story State
// ============================================================================

/**
 * StoryState: Everything that describes one playthrough.
 *
 * The record is treated as immutable by the engine: every transition
 * returns a new record with fresh containers.
 */
export interface StoryState {
  /** Player name, fixed at creation */
  name: string;
  /** 0 means "not yet started" and forces the introductory scene */
  chapter: number;
  /** Descriptive only; overwritten by every scene render */
  location: string;
  stats: Stats;
  /** Item names in first-seen order, no duplicates */
  inventory: string[];
  flags: Flags;
  /** Append-only log lines */
  history: string[];
  /** Seeds the random source whenever this state is (re)loaded */
  seed: number;
}

export const DEFAULT_NAME = 'Nameless';
export const DEFAULT_SEED = 42;

const DEFAULT_STATS: Stats = {
  health: 80,
  power: 20,
  morality: 0,
  notoriety: 0,
  trustDemonLord: 10,
  bondDemonLord: 0,
};

const STARTER_INVENTORY = ['Torn Cloak', 'Rusty Sword'] as const;

const STARTER_FLAGS: Flags = {
  betrayed: true,
  met_demon_lord: true,
  allied: false,
  seeking_truth: true,
};

/**
 * PartialStoryState: Overrides accepted by makeDefaultState().
 */
export type PartialStoryState = Partial<Omit<StoryState, 'stats'>> & {
  stats?: Partial<Stats>;
};

/**
 * Builds the default-constructed record.
 *
 * Also the source of values for fields a saved payload is missing.
 */
export function makeDefaultState(overrides?: PartialStoryState): StoryState {
  return {
    name: overrides?.name ?? DEFAULT_NAME,
    chapter: overrides?.chapter ?? 0,
    location: overrides?.location ?? 'Demon Forest',
    stats: { ...DEFAULT_STATS, ...overrides?.stats },
    inventory: [...(overrides?.inventory ?? STARTER_INVENTORY)],
    flags: { ...overrides?.flags },
    history: [...(overrides?.history ?? [])],
    seed: overrides?.seed ?? DEFAULT_SEED,
  };
}

/**
 * Derives a playthrough seed from the player's name and the wall clock.
 *
 * Collision-resistant across players and sessions; not a secret.
 */
export function deriveSeed(name: string, nowMs: number): number {
  const digest = createHash('sha256')
    .update(`${name}-${nowMs / 1000}`, 'utf8')
    .digest('hex');
  return Number.parseInt(digest.slice(0, 8), 16) >>> 0;
}

/**
 * Creates the record for a new playthrough with the starter flags.
 */
export function createNewState(name: string, nowMs: number): StoryState {
  const trimmed = name.trim() || DEFAULT_NAME;
  return makeDefaultState({
    name: trimmed,
    seed: deriveSeed(trimmed, nowMs),
    flags: { ...STARTER_FLAGS },
  });
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Returns a copy of `flags` with `key` set to `value` unless already present.
 */
export function setFlagIfAbsent(flags: Flags, key: string, value: FlagValue): Flags {
  if (Object.prototype.hasOwnProperty.call(flags, key)) {
    return flags;
  }
  return { ...flags, [key]: value };
}

/**
 * Reads a boolean flag; absent and string-valued flags count as false.
 */
export function hasFlag(state: StoryState, key: string): boolean {
  return state.flags[key] === true;
}

/**
 * The frozen Demon Lord name, or the generic title before the intro.
 */
export function getDemonLordName(state: StoryState): string {
  const value = state.flags[DEMON_LORD_NAME_FLAG];
  return typeof value === 'string' && value.length > 0 ? value : DEFAULT_DEMON_LORD_NAME;
}
