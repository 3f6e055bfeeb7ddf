import { describe, it, expect } from 'vitest';
import { checkEnding } from '../src/domain/endings.js';
import type { PartialStoryState, StoryState } from '../src/domain/state.js';
import { makeDefaultState } from '../src/domain/state.js';

function makeState(overrides?: PartialStoryState): StoryState {
  return makeDefaultState({ chapter: 5, ...overrides });
}

describe('checkEnding()', () => {
  it('returns null while no ending applies', () => {
    expect(checkEnding(makeState())).toBeNull();
  });

  it('ends in death at zero health', () => {
    const ending = checkEnding(makeState({ stats: { health: 0 } }));

    expect(ending).toEqual({
      id: 'death',
      title: 'Fallen Beneath Black Boughs',
      narration: 'Your story ends beneath black boughs. Even the forest bows its head.',
    });
  });

  it('ranks death above every other ending', () => {
    const state = makeState({
      stats: { health: 0, trustDemonLord: 90, power: 90, morality: 90 },
      flags: { oath_bound: true },
    });

    expect(checkEnding(state)?.id).toBe('death');
  });

  it('requires the oath for the alliance', () => {
    const stats = { trustDemonLord: 80, power: 70 };

    expect(checkEnding(makeState({ stats }))).toBeNull();

    const ending = checkEnding(makeState({ stats, flags: { oath_bound: true, demon_lord_name: 'Nyx' } }));
    expect(ending?.id).toBe('alliance');
    expect(ending?.narration.startsWith('Side by side with Nyx, you confront the crown.')).toBe(true);
  });

  it('ranks the alliance above the guardian', () => {
    const state = makeState({
      stats: { trustDemonLord: 80, power: 70, morality: 80 },
      flags: { oath_bound: true },
    });

    expect(checkEnding(state)?.id).toBe('alliance');
  });

  it('crowns a feared and ruthless sovereign', () => {
    expect(checkEnding(makeState({ stats: { notoriety: 80, power: 80, morality: -30 } }))?.id).toBe('sovereign');
    expect(checkEnding(makeState({ stats: { notoriety: 80, power: 80, morality: -29 } }))).toBeNull();
  });

  it('redeems a guardian', () => {
    expect(checkEnding(makeState({ stats: { morality: 80, power: 50 } }))?.title).toBe('Redeemed Guardian');
    expect(checkEnding(makeState({ stats: { morality: 80, power: 49 } }))).toBeNull();
  });

  it('exiles a forgotten wanderer from chapter 30', () => {
    const stats = { trustDemonLord: 39, notoriety: 39 };

    expect(checkEnding(makeState({ chapter: 29, stats }))).toBeNull();
    expect(checkEnding(makeState({ chapter: 30, stats }))?.id).toBe('exile');
    expect(checkEnding(makeState({ chapter: 30, stats: { trustDemonLord: 40 } }))).toBeNull();
  });
});
