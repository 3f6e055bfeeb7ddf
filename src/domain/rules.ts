/**
 * Scene eligibility evaluation.
 *
 * This file implements pure functions that decide which scene archetypes may
 * be drawn for the current state. Each scene's conditions are evaluated
 * independently; the eligible set keeps catalog order, which only matters
 * for the random draw.
 *
 * Non-goals (not included):
 * - The random draw itself (engine.ts)
 * - Rendering (engine.ts)
 */

import type { StoryState, StatKey } from './state.js';
import { hasFlag } from './state.js';
import type {
  SceneDefinition,
  SceneEligibility,
  StatRequirement,
  FlagRequirement,
} from './scenes.js';

// ============================================================================
// Eligibility Evaluation
// ============================================================================

/**
 * Checks inclusive minimum and maximum stat thresholds.
 */
function meetsStatRequirements(
  state: StoryState,
  statReq: StatRequirement
): boolean {
  if (statReq.minimum) {
    for (const [statKey, minimumValue] of Object.entries(statReq.minimum) as [StatKey, number][]) {
      if (state.stats[statKey] < minimumValue) {
        return false;
      }
    }
  }

  if (statReq.maximum) {
    for (const [statKey, maximumValue] of Object.entries(statReq.maximum) as [StatKey, number][]) {
      if (state.stats[statKey] > maximumValue) {
        return false;
      }
    }
  }

  return true;
}

/**
 * All required flags must be true; any true blocked flag prevents eligibility.
 *
 * Absent flags count as false.
 */
function meetsFlagRequirements(
  state: StoryState,
  flagReq: FlagRequirement
): boolean {
  if (flagReq.required) {
    for (const flag of flagReq.required) {
      if (!hasFlag(state, flag)) {
        return false;
      }
    }
  }

  if (flagReq.blocked) {
    for (const flag of flagReq.blocked) {
      if (hasFlag(state, flag)) {
        return false;
      }
    }
  }

  return true;
}

/**
 * Evaluates one scene's eligibility conditions against the state.
 */
export function meetsEligibility(
  state: StoryState,
  eligibility: SceneEligibility
): boolean {
  if (eligibility.stats && !meetsStatRequirements(state, eligibility.stats)) {
    return false;
  }

  if (eligibility.flags && !meetsFlagRequirements(state, eligibility.flags)) {
    return false;
  }

  return true;
}

export function isSceneEligible(state: StoryState, scene: SceneDefinition): boolean {
  return meetsEligibility(state, scene.eligibility);
}

// ============================================================================
// Scene Filtering
// ============================================================================

/**
 * Filters scenes to those eligible for the state, preserving input order.
 *
 * Each scene appears at most once however many of its conditions hold.
 */
export function filterEligibleScenes(
  state: StoryState,
  scenes: SceneDefinition[]
): SceneDefinition[] {
  return scenes.filter((scene) => isSceneEligible(state, scene));
}
