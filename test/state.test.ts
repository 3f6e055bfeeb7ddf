import { describe, it, expect } from 'vitest';
import {
  DEFAULT_NAME,
  createNewState,
  deriveSeed,
  getDemonLordName,
  makeDefaultState,
  setFlagIfAbsent,
} from '../src/domain/state.js';

describe('makeDefaultState()', () => {
  it('builds the not-yet-started record', () => {
    expect(makeDefaultState()).toEqual({
      name: 'Nameless',
      chapter: 0,
      location: 'Demon Forest',
      stats: { health: 80, power: 20, morality: 0, notoriety: 0, trustDemonLord: 10, bondDemonLord: 0 },
      inventory: ['Torn Cloak', 'Rusty Sword'],
      flags: {},
      history: [],
      seed: 42,
    });
  });

  it('never shares containers between records', () => {
    const a = makeDefaultState();
    const b = makeDefaultState();

    a.inventory.push('Vault Relic');
    a.stats.health = 1;

    expect(b.inventory).toEqual(['Torn Cloak', 'Rusty Sword']);
    expect(b.stats.health).toBe(80);
  });
});

describe('createNewState()', () => {
  it('trims the name and sets the starter flags', () => {
    const state = createNewState('  Aria  ', 1_700_000_000_000);

    expect(state.name).toBe('Aria');
    expect(state.chapter).toBe(0);
    expect(state.flags).toEqual({ betrayed: true, met_demon_lord: true, allied: false, seeking_truth: true });
    expect(state.seed).toBe(deriveSeed('Aria', 1_700_000_000_000));
  });

  it('falls back to the default name', () => {
    expect(createNewState('   ', 0).name).toBe(DEFAULT_NAME);
  });
});

describe('deriveSeed()', () => {
  it('is a stable unsigned 32-bit value', () => {
    const seed = deriveSeed('Aria', 1_700_000_000_000);

    expect(seed).toBe(deriveSeed('Aria', 1_700_000_000_000));
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(0xffffffff);
  });

  it('depends on the name and the clock', () => {
    const seed = deriveSeed('Aria', 1_700_000_000_000);

    expect(deriveSeed('Brann', 1_700_000_000_000)).not.toBe(seed);
    expect(deriveSeed('Aria', 1_700_000_001_000)).not.toBe(seed);
  });
});

describe('flags', () => {
  it('sets a flag only when absent', () => {
    const flags = { allied: false };

    expect(setFlagIfAbsent(flags, 'allied', true)).toBe(flags);
    expect(setFlagIfAbsent(flags, 'vow_revenge', false)).toEqual({ allied: false, vow_revenge: false });
  });

  it('reads the frozen Demon Lord name', () => {
    expect(getDemonLordName(makeDefaultState())).toBe('the Demon Lord');
    expect(getDemonLordName(makeDefaultState({ flags: { demon_lord_name: 'Noctra' } }))).toBe('Noctra');
  });
});
