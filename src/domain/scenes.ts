/**
 * Canonical scene type definitions.
 *
 * This file defines TypeScript types only (no logic) that represent:
 * - Scene archetypes and their render templates
 * - The choices a scene offers and the consequence of each
 * - Eligibility conditions (stat thresholds and flag dependencies)
 *
 * Non-goals (not included):
 * - Eligibility evaluation (belongs in rules.ts)
 * - Applying consequences (belongs in transitions.ts)
 * - Terminal presentation
 */

import type { StatKey } from './state.js';

// ============================================================================
// Scene Identity
// ============================================================================

/**
 * SceneArchetype: Named category of scene with its own template.
 *
 * `intro` is never drawn; it is forced while the chapter is 0.
 */
export type SceneArchetype =
  | 'intro'
  | 'oath_bond'
  | 'council'
  | 'training'
  | 'tense_camp'
  | 'spy_report'
  | 'ambush_king_scouts'
  | 'rescue_travelers'
  | 'grim_bargain'
  | 'mystic_ruins'
  | 'wild_hunt'
  | 'whispering_trees';

/**
 * ChoiceTag: Opaque identifier binding a displayed choice to its consequence.
 *
 * Tags are looked up at apply time, so a tag from a stale scene is simply
 * unknown rather than an error.
 */
export type ChoiceTag = string;

/**
 * Flag: Individual flag identifier.
 */
export type Flag = string;

/**
 * Template: Text that may contain `{demonLord}`, replaced at render time
 * with the frozen Demon Lord name.
 */
export type Template = string;

// ============================================================================
// Choices
// ============================================================================

/**
 * ChoiceConsequence: Fixed effect of taking a choice.
 *
 * Every delta is applied through the stat's clamp. The chapter advance is
 * not part of the descriptor; it happens for every applied tag.
 */
export interface ChoiceConsequence {
  /** Stat deltas (applied then clamped) */
  statChanges?: Partial<Record<StatKey, number>>;
  /** Flags to set, with the value they take */
  flagsToSet?: Record<Flag, boolean>;
  /** Line appended to history */
  historyEntry?: string;
  /** Items added to the inventory (duplicates suppressed) */
  itemsToAdd?: string[];
  /** Narration shown after the choice */
  narration: Template;
}

export interface SceneChoice {
  tag: ChoiceTag;
  text: Template;
  consequence: ChoiceConsequence;
}

// ============================================================================
// Eligibility
// ============================================================================

/**
 * StatRequirement: Inclusive stat thresholds.
 *
 * Stats are integers, so "below 30" is written as `maximum: 29`.
 */
export interface StatRequirement {
  minimum?: Partial<Record<StatKey, number>>;
  maximum?: Partial<Record<StatKey, number>>;
}

/**
 * FlagRequirement: Flags that must be true, and flags that must not be.
 */
export interface FlagRequirement {
  required?: Flag[];
  blocked?: Flag[];
}

/**
 * SceneEligibility: All present conditions must hold. An empty object
 * means the scene is always eligible.
 */
export interface SceneEligibility {
  stats?: StatRequirement;
  flags?: FlagRequirement;
}

// ============================================================================
// Scene Structure
// ============================================================================

/**
 * SceneSetup: State a scene establishes when rendered, beyond its location.
 */
export interface SceneSetup {
  /** Flags initialized only if absent */
  flagDefaults?: Record<Flag, boolean>;
  /** Line appended to history on render */
  historyEntry?: string;
}

export interface SceneDefinition {
  archetype: SceneArchetype;
  /** Written to `state.location` when rendered */
  location: string;
  narration: Template;
  /** 3-4 choices, in display order */
  choices: SceneChoice[];
  eligibility: SceneEligibility;
  setup?: SceneSetup;
}

/**
 * IntroSceneDefinition: The opening scene also names the Demon Lord, once
 * per playthrough, from a fixed list.
 */
export interface IntroSceneDefinition extends SceneDefinition {
  archetype: 'intro';
  demonLordNames: readonly string[];
}

// ============================================================================
// Rendered Output
// ============================================================================

export interface RenderedChoice {
  text: string;
  tag: ChoiceTag;
}

/**
 * RenderedScene: What the caller displays for one turn.
 */
export interface RenderedScene {
  archetype: SceneArchetype;
  location: string;
  narration: string;
  choices: RenderedChoice[];
}
