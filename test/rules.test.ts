/**
 * Rules unit tests covering scene eligibility.
 */

import { describe, it, expect } from 'vitest';
import { filterEligibleScenes, meetsEligibility } from '../src/domain/rules.js';
import type { PartialStoryState, StoryState } from '../src/domain/state.js';
import { makeDefaultState } from '../src/domain/state.js';
import type { SceneArchetype } from '../src/domain/scenes.js';
import { catalog } from '../src/scenes/catalog.js';

// ============================================================================
// Test Helpers
// ============================================================================

const STARTER_FLAGS = { betrayed: true, met_demon_lord: true, allied: false, seeking_truth: true };

function makeState(overrides?: PartialStoryState): StoryState {
  return makeDefaultState({ chapter: 1, flags: { ...STARTER_FLAGS }, ...overrides });
}

function eligible(state: StoryState): SceneArchetype[] {
  return filterEligibleScenes(state, catalog.listScenes()).map((scene) => scene.archetype);
}

const ALWAYS = ['mystic_ruins', 'wild_hunt', 'whispering_trees'];

// ============================================================================
// Tests
// ============================================================================

describe('filterEligibleScenes()', () => {
  it('offers the tense camp, not council or training, at trust 10', () => {
    const archetypes = eligible(makeState({ stats: { trustDemonLord: 10 } }));

    expect(archetypes).toContain('tense_camp');
    expect(archetypes).not.toContain('council');
    expect(archetypes).not.toContain('training');
  });

  it('switches from the tense camp to council and training at trust 30', () => {
    expect(eligible(makeState({ stats: { trustDemonLord: 29 } }))).toEqual(['tense_camp', ...ALWAYS]);
    expect(eligible(makeState({ stats: { trustDemonLord: 30 } }))).toEqual(['council', 'training', ...ALWAYS]);
  });

  it('offers the oath at trust 60 until the oath is sworn', () => {
    expect(eligible(makeState({ stats: { trustDemonLord: 60 } }))).toEqual([
      'oath_bond',
      'council',
      'training',
      ...ALWAYS,
    ]);

    const sworn = makeState({
      stats: { trustDemonLord: 100 },
      flags: { ...STARTER_FLAGS, oath_bound: true },
    });
    expect(eligible(sworn)).not.toContain('oath_bond');
  });

  it('requires meeting the Demon Lord for relationship scenes', () => {
    expect(eligible(makeState({ flags: {}, stats: { trustDemonLord: 70 } }))).toEqual(ALWAYS);
  });

  it('gates revenge scenes on the vow', () => {
    const vowed = makeState({ flags: { ...STARTER_FLAGS, vow_revenge: true } });

    expect(eligible(vowed)).toEqual(['tense_camp', 'spy_report', 'ambush_king_scouts', ...ALWAYS]);
    expect(eligible(makeState({ flags: { ...STARTER_FLAGS, vow_revenge: false } }))).not.toContain('spy_report');
  });

  it('gates rescue and bargain scenes on morality', () => {
    expect(eligible(makeState({ stats: { morality: 39 } }))).not.toContain('rescue_travelers');
    expect(eligible(makeState({ stats: { morality: 40 } }))).toContain('rescue_travelers');
    expect(eligible(makeState({ stats: { morality: -39 } }))).not.toContain('grim_bargain');
    expect(eligible(makeState({ stats: { morality: -40 } }))).toContain('grim_bargain');
  });

  it('is never empty', () => {
    expect(eligible(makeDefaultState({ chapter: 1 }))).toEqual(ALWAYS);
  });
});

describe('meetsEligibility()', () => {
  it('treats empty conditions as always eligible', () => {
    expect(meetsEligibility(makeState(), {})).toBe(true);
  });

  it('treats string-valued flags as not set', () => {
    const state = makeState({ flags: { demon_lord_name: 'Nyx' } });

    expect(meetsEligibility(state, { flags: { required: ['demon_lord_name'] } })).toBe(false);
    expect(meetsEligibility(state, { flags: { blocked: ['demon_lord_name'] } })).toBe(true);
  });
});
