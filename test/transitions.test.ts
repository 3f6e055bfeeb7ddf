import { describe, it, expect } from 'vitest';
import {
  addInventoryItems,
  applyChapterAdvance,
  applyConsequence,
  applyFlagChanges,
  applyStatDeltas,
  clamp,
  clampStat,
} from '../src/domain/transitions.js';
import { makeDefaultState } from '../src/domain/state.js';

describe('clamping', () => {
  it('saturates to the interval', () => {
    expect(clamp(120, 0, 100)).toBe(100);
    expect(clamp(-5, 0, 100)).toBe(0);
    expect(clamp(42, 0, 100)).toBe(42);
  });

  it('uses the signed range for morality only', () => {
    expect(clampStat('morality', -150)).toBe(-100);
    expect(clampStat('notoriety', -150)).toBe(0);
  });
});

describe('applyStatDeltas()', () => {
  it('reports only what actually landed', () => {
    const stats = makeDefaultState({ stats: { trustDemonLord: 95, power: 100 } }).stats;

    const result = applyStatDeltas(stats, { trustDemonLord: 20, power: 5, morality: -3 });

    expect(result.stats.trustDemonLord).toBe(100);
    expect(result.stats.power).toBe(100);
    expect(result.stats.morality).toBe(-3);
    expect(result.applied).toEqual({ trustDemonLord: 5, morality: -3 });
    expect(stats.trustDemonLord).toBe(95);
  });
});

describe('applyFlagChanges()', () => {
  it('overwrites values and reports only changes', () => {
    const flags = { allied: false, seeking_truth: true };

    const result = applyFlagChanges(flags, { allied: true, seeking_truth: true });

    expect(result.flags).toEqual({ allied: true, seeking_truth: true });
    expect(result.changed).toEqual({ allied: true });
    expect(flags.allied).toBe(false);
  });
});

describe('addInventoryItems()', () => {
  it('keeps first-seen order without duplicates', () => {
    const result = addInventoryItems(['Torn Cloak'], ['Vault Relic', 'Torn Cloak', 'Vault Relic']);

    expect(result.inventory).toEqual(['Torn Cloak', 'Vault Relic']);
    expect(result.added).toEqual(['Vault Relic']);
  });
});

describe('applyChapterAdvance()', () => {
  it('adds exactly one', () => {
    const result = applyChapterAdvance(makeDefaultState({ chapter: 7 }));

    expect(result.state.chapter).toBe(8);
    expect(result.events).toEqual([{ type: 'chapter_advanced', previousChapter: 7, newChapter: 8 }]);
  });
});

describe('applyConsequence()', () => {
  it('applies every part of the descriptor without touching the input', () => {
    const state = makeDefaultState();
    const before = structuredClone(state);

    const result = applyConsequence(state, {
      statChanges: { power: 4 },
      flagsToSet: { betrayer_trail: true },
      itemsToAdd: ['Vault Relic'],
      historyEntry: 'Followed the whispers.',
      narration: 'unused here',
    });

    expect(state).toEqual(before);
    expect(result.state.chapter).toBe(0);
    expect(result.state.stats.power).toBe(24);
    expect(result.state.flags).toEqual({ betrayer_trail: true });
    expect(result.state.inventory).toEqual(['Torn Cloak', 'Rusty Sword', 'Vault Relic']);
    expect(result.state.history).toEqual(['Followed the whispers.']);
    expect(result.events).toEqual([
      { type: 'stat_changed', deltas: { power: 4 } },
      { type: 'flag_changed', changes: { betrayer_trail: true } },
      { type: 'item_added', items: ['Vault Relic'] },
      { type: 'history_appended', entry: 'Followed the whispers.' },
    ]);
  });

  it('returns fresh containers even when nothing changes', () => {
    const state = makeDefaultState();

    const result = applyConsequence(state, { narration: 'Nothing stirs.' });

    expect(result.events).toEqual([]);
    expect(result.state.inventory).not.toBe(state.inventory);
    expect(result.state.flags).not.toBe(state.flags);
    expect(result.state.history).not.toBe(state.history);
  });
});
