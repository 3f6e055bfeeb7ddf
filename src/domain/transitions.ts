/**
 * Pure state transition functions.
 *
 * This file implements pure functions (no side effects, no IO, no randomness)
 * that transition a StoryState and emit EngineEvent arrays. Every function
 * returns a new record with fresh containers and leaves its input untouched.
 *
 * Non-goals (not included):
 * - Scene eligibility (belongs in rules.ts)
 * - Random draws (the engine draws, then calls in here with the result)
 * - Persistence
 */

import type { Flags, FlagValue, StatKey, Stats, StoryState } from './state.js';
import { STAT_BOUNDS } from './state.js';
import type { ChoiceConsequence, ChoiceTag } from './scenes.js';
import type { EngineEvent } from './events.js';

// ============================================================================
// Clamping
// ============================================================================

/**
 * Saturates `value` to [lo, hi].
 */
export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

export function clampStat(stat: StatKey, value: number): number {
  const bounds = STAT_BOUNDS[stat];
  return clamp(value, bounds.min, bounds.max);
}

// ============================================================================
// Pure State Update Helpers
// ============================================================================

/**
 * Applies stat deltas through each stat's clamp.
 *
 * Returns the new stats and the deltas that actually landed; a delta the
 * clamp fully absorbed does not appear in `applied`.
 */
export function applyStatDeltas(
  currentStats: Stats,
  deltas: Partial<Record<StatKey, number>>
): { stats: Stats; applied: Partial<Record<StatKey, number>> } {
  const newStats: Stats = { ...currentStats };
  const applied: Partial<Record<StatKey, number>> = {};

  for (const [key, delta] of Object.entries(deltas) as [StatKey, number][]) {
    const next = clampStat(key, newStats[key] + delta);
    if (next !== newStats[key]) {
      applied[key] = next - newStats[key];
    }
    newStats[key] = next;
  }

  return { stats: newStats, applied };
}

/**
 * Sets flags to the given values. Keys are never removed.
 *
 * Returns the new flags and only the entries whose value changed.
 */
export function applyFlagChanges(
  currentFlags: Flags,
  flagsToSet: Record<string, FlagValue>
): { flags: Flags; changed: Record<string, FlagValue> } {
  const newFlags: Flags = { ...currentFlags };
  const changed: Record<string, FlagValue> = {};

  for (const [flag, value] of Object.entries(flagsToSet)) {
    if (newFlags[flag] !== value) {
      changed[flag] = value;
    }
    newFlags[flag] = value;
  }

  return { flags: newFlags, changed };
}

/**
 * Appends items, suppressing duplicates while keeping first-seen order.
 */
export function addInventoryItems(
  inventory: string[],
  items: string[]
): { inventory: string[]; added: string[] } {
  const seen = new Set(inventory);
  const added: string[] = [];

  for (const item of items) {
    if (!seen.has(item)) {
      seen.add(item);
      added.push(item);
    }
  }

  return { inventory: [...inventory, ...added], added };
}

// ============================================================================
// Main Transition Functions
// ============================================================================

/**
 * Advances the chapter by exactly one.
 */
export function applyChapterAdvance(
  state: StoryState
): { state: StoryState; events: EngineEvent[] } {
  const newChapter = state.chapter + 1;
  return {
    state: { ...state, chapter: newChapter },
    events: [{ type: 'chapter_advanced', previousChapter: state.chapter, newChapter }],
  };
}

/**
 * Applies a choice consequence descriptor.
 *
 * Does not touch the chapter; the engine advances it separately so unknown
 * tags advance too.
 */
export function applyConsequence(
  state: StoryState,
  consequence: ChoiceConsequence
): { state: StoryState; events: EngineEvent[] } {
  const events: EngineEvent[] = [];

  let stats = state.stats;
  if (consequence.statChanges) {
    const result = applyStatDeltas(state.stats, consequence.statChanges);
    stats = result.stats;
    if (Object.keys(result.applied).length > 0) {
      events.push({ type: 'stat_changed', deltas: result.applied });
    }
  }

  let flags: Flags = { ...state.flags };
  if (consequence.flagsToSet) {
    const result = applyFlagChanges(state.flags, consequence.flagsToSet);
    flags = result.flags;
    if (Object.keys(result.changed).length > 0) {
      events.push({ type: 'flag_changed', changes: result.changed });
    }
  }

  let inventory = [...state.inventory];
  if (consequence.itemsToAdd && consequence.itemsToAdd.length > 0) {
    const result = addInventoryItems(state.inventory, consequence.itemsToAdd);
    inventory = result.inventory;
    if (result.added.length > 0) {
      events.push({ type: 'item_added', items: result.added });
    }
  }

  let history = [...state.history];
  if (consequence.historyEntry) {
    history = [...history, consequence.historyEntry];
    events.push({ type: 'history_appended', entry: consequence.historyEntry });
  }

  return {
    state: { ...state, stats, flags, inventory, history },
    events,
  };
}

/**
 * Records an unknown tag. Nothing but the event changes.
 */
export function applyUnknownChoice(
  state: StoryState,
  tag: ChoiceTag
): { state: StoryState; events: EngineEvent[] } {
  return { state, events: [{ type: 'choice_unknown', tag }] };
}

/**
 * Adds a drift delta to one stat through its clamp.
 *
 * Emits nothing when the clamp absorbs the delta.
 */
export function applyDrift(
  state: StoryState,
  stat: StatKey,
  delta: number
): { state: StoryState; events: EngineEvent[] } {
  const deltas: Partial<Record<StatKey, number>> = {};
  deltas[stat] = delta;
  const { stats, applied } = applyStatDeltas(state.stats, deltas);
  const landed = applied[stat];
  return {
    state: { ...state, stats },
    events: landed === undefined ? [] : [{ type: 'drift_applied', stat, delta: landed }],
  };
}
