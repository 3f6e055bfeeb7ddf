/**
 * Canonical domain event types.
 *
 * This file defines TypeScript types only (no logic). Events record what an
 * engine operation actually changed, after clamping, so callers can report
 * consequences without diffing states.
 *
 * Non-goals (not included):
 * - Event handling or processing logic
 * - Persistence or logging concerns
 * - Player-facing strings (see narrative.ts)
 */

import type { FlagValue, StatKey } from './state.js';
import type { ChoiceTag, SceneArchetype } from './scenes.js';

// ============================================================================
// Event Types
// ============================================================================

/**
 * SceneRenderedEvent: A scene was selected and rendered.
 */
export interface SceneRenderedEvent {
  type: 'scene_rendered';
  archetype: SceneArchetype;
  location: string;
}

/**
 * ChapterAdvancedEvent: Emitted once per applied choice, known or not.
 */
export interface ChapterAdvancedEvent {
  type: 'chapter_advanced';
  previousChapter: number;
  newChapter: number;
}

/**
 * StatChangedEvent: Deltas that actually landed.
 *
 * A +20 on a stat at 95 reports +5; a delta fully absorbed by the clamp is
 * omitted, and the event is skipped when nothing moved.
 */
export interface StatChangedEvent {
  type: 'stat_changed';
  deltas: Partial<Record<StatKey, number>>;
}

/**
 * FlagChangedEvent: Flags whose value differs from before.
 */
export interface FlagChangedEvent {
  type: 'flag_changed';
  changes: Record<string, FlagValue>;
}

export interface ItemAddedEvent {
  type: 'item_added';
  items: string[];
}

export interface HistoryAppendedEvent {
  type: 'history_appended';
  entry: string;
}

/**
 * ChoiceUnknownEvent: The tag matched no consequence; only the chapter moved.
 */
export interface ChoiceUnknownEvent {
  type: 'choice_unknown';
  tag: ChoiceTag;
}

/**
 * DriftAppliedEvent: Incidental health nudge between turns.
 */
export interface DriftAppliedEvent {
  type: 'drift_applied';
  stat: StatKey;
  delta: number;
}

/**
 * EngineEvent: Union type of all engine events.
 */
export type EngineEvent =
  | SceneRenderedEvent
  | ChapterAdvancedEvent
  | StatChangedEvent
  | FlagChangedEvent
  | ItemAddedEvent
  | HistoryAppendedEvent
  | ChoiceUnknownEvent
  | DriftAppliedEvent;
