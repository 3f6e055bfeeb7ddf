/**
 * Story Engine: orchestration layer for scene rendering and choice application.
 *
 * This file coordinates pure transitions with scene catalog lookups and the
 * seeded random source. It does not implement eligibility (rules.ts) or
 * state arithmetic (transitions.ts).
 *
 * Determinism: the only draws are one per non-intro render, one for the
 * Demon Lord's name on the intro, and one or two per incidental drift.
 *
 * Non-goals (not included):
 * - Persistence or storage
 * - Terminal I/O
 */

import type { StoryState, StatKey } from './state.js';
import { DEMON_LORD_NAME_FLAG, setFlagIfAbsent } from './state.js';
import type {
  ChoiceTag,
  IntroSceneDefinition,
  RenderedScene,
  SceneArchetype,
  SceneChoice,
  SceneDefinition,
} from './scenes.js';
import type { EngineEvent } from './events.js';
import type { RandomSource } from './random.js';
import {
  applyChapterAdvance,
  applyConsequence,
  applyDrift,
  applyUnknownChoice,
} from './transitions.js';
import { filterEligibleScenes } from './rules.js';
import { interpolate } from './narrative.js';

export { checkEnding } from './endings.js';
export type { Ending, EndingId } from './endings.js';

// ============================================================================
// Scene Catalog Interface
// ============================================================================

/**
 * SceneCatalog: Lookup and enumeration of the fixed scene templates.
 *
 * Injected so the engine stays testable with small stand-in catalogs.
 */
export interface SceneCatalog {
  /** The forced opening scene */
  getIntroScene(): IntroSceneDefinition;
  /** Drawable scenes in fixed evaluation order */
  listScenes(): SceneDefinition[];
  /** Finds the choice (and its consequence) for a tag across all scenes */
  getChoiceByTag(tag: ChoiceTag): SceneChoice | undefined;
}

export const UNKNOWN_CHOICE_NARRATION =
  'Time moves, yet nothing decisive happens. Perhaps the next choice will cut deeper.';

export const DRIFT_CHANCE = 0.15;
const DRIFT_STAT: StatKey = 'health';
const DRIFT_DELTAS: readonly number[] = [-2, -1, 1, 2];

// ============================================================================
// Rendering
// ============================================================================

/**
 * Applies a scene's location and setup, then renders its text.
 */
function renderDefinition(
  state: StoryState,
  scene: SceneDefinition
): { state: StoryState; scene: RenderedScene; events: EngineEvent[] } {
  const events: EngineEvent[] = [];
  let flags = { ...state.flags };
  let history = [...state.history];

  if (scene.setup?.flagDefaults) {
    const initialized: Record<string, boolean> = {};
    for (const [flag, value] of Object.entries(scene.setup.flagDefaults)) {
      const next = setFlagIfAbsent(flags, flag, value);
      if (next !== flags) {
        initialized[flag] = value;
        flags = next;
      }
    }
    if (Object.keys(initialized).length > 0) {
      events.push({ type: 'flag_changed', changes: initialized });
    }
  }

  if (scene.setup?.historyEntry) {
    history = [...history, scene.setup.historyEntry];
    events.push({ type: 'history_appended', entry: scene.setup.historyEntry });
  }

  const newState: StoryState = { ...state, location: scene.location, flags, history };
  events.unshift({ type: 'scene_rendered', archetype: scene.archetype, location: scene.location });

  return {
    state: newState,
    scene: {
      archetype: scene.archetype,
      location: scene.location,
      narration: interpolate(scene.narration, newState),
      choices: scene.choices.map((choice) => ({
        text: interpolate(choice.text, newState),
        tag: choice.tag,
      })),
    },
    events,
  };
}

/**
 * Renders the opening scene: chapter 1, starter flags, and a Demon Lord
 * name drawn once and frozen.
 */
function renderIntro(
  state: StoryState,
  intro: IntroSceneDefinition,
  random: RandomSource
): { state: StoryState; scene: RenderedScene; events: EngineEvent[] } {
  const events: EngineEvent[] = [
    { type: 'chapter_advanced', previousChapter: state.chapter, newChapter: 1 },
  ];

  let named = state;
  const existing = state.flags[DEMON_LORD_NAME_FLAG];
  if (typeof existing !== 'string' || existing.length === 0) {
    const name = random.pick(intro.demonLordNames);
    named = { ...state, flags: { ...state.flags, [DEMON_LORD_NAME_FLAG]: name } };
    events.push({ type: 'flag_changed', changes: { [DEMON_LORD_NAME_FLAG]: name } });
  }

  const rendered = renderDefinition({ ...named, chapter: 1 }, intro);
  return { ...rendered, events: [...rendered.events, ...events] };
}

/**
 * Selects and renders the current scene.
 *
 * Chapter 0 always yields the intro. Otherwise one eligible scene is drawn
 * uniformly; the always-eligible exploration scenes keep the set non-empty.
 */
export function renderScene(
  state: StoryState,
  catalog: SceneCatalog,
  random: RandomSource
): { state: StoryState; scene: RenderedScene; events: EngineEvent[] } {
  if (state.chapter === 0) {
    return renderIntro(state, catalog.getIntroScene(), random);
  }

  const eligible = filterEligibleScenes(state, catalog.listScenes());
  const chosen = random.pick(eligible);
  return renderDefinition(state, chosen);
}

/**
 * Lists the archetypes a non-intro render could draw for this state.
 */
export function listEligibleArchetypes(
  state: StoryState,
  catalog: SceneCatalog
): SceneArchetype[] {
  return filterEligibleScenes(state, catalog.listScenes()).map((scene) => scene.archetype);
}

// ============================================================================
// Choices
// ============================================================================

/**
 * Applies a choice tag.
 *
 * The chapter advances by one unconditionally. Tags the catalog does not
 * know (stale or unrelated scenes) get the fixed fallback narration.
 */
export function applyChoice(
  state: StoryState,
  tag: ChoiceTag,
  catalog: SceneCatalog
): { state: StoryState; narration: string; events: EngineEvent[] } {
  const advanced = applyChapterAdvance(state);
  const choice = catalog.getChoiceByTag(tag);

  if (!choice) {
    const unknown = applyUnknownChoice(advanced.state, tag);
    return {
      state: unknown.state,
      narration: UNKNOWN_CHOICE_NARRATION,
      events: [...advanced.events, ...unknown.events],
    };
  }

  const result = applyConsequence(advanced.state, choice.consequence);
  return {
    state: result.state,
    narration: interpolate(choice.consequence.narration, result.state),
    events: [...advanced.events, ...result.events],
  };
}

/**
 * Small random health nudge between turns: one draw for the chance, and a
 * second for the delta only when the chance hits.
 */
export function applyIncidentalDrift(
  state: StoryState,
  random: RandomSource,
  chance: number = DRIFT_CHANCE
): { state: StoryState; events: EngineEvent[] } {
  if (!random.chance(chance)) {
    return { state, events: [] };
  }
  return applyDrift(state, DRIFT_STAT, random.pick(DRIFT_DELTAS));
}
