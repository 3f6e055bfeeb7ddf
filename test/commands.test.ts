import { describe, it, expect } from 'vitest';
import { parseChoiceNumber, parseCommand } from '../src/cli/commands.js';

describe('parseCommand()', () => {
  it('recognizes bare commands regardless of case and spacing', () => {
    expect(parseCommand('help')).toEqual({ kind: 'help' });
    expect(parseCommand('  STATS ')).toEqual({ kind: 'stats' });
    expect(parseCommand('slots')).toEqual({ kind: 'slots' });
    expect(parseCommand('Quit')).toEqual({ kind: 'quit' });
  });

  it('parses save and load slots', () => {
    expect(parseCommand('save 3')).toEqual({ kind: 'save', slot: 3 });
    expect(parseCommand('LOAD   2')).toEqual({ kind: 'load', slot: 2 });
  });

  it('leaves a missing or non-numeric slot as null', () => {
    expect(parseCommand('save')).toEqual({ kind: 'save', slot: null });
    expect(parseCommand('load two')).toEqual({ kind: 'load', slot: null });
  });

  it('returns null for choices and unknown words', () => {
    expect(parseCommand('2')).toBeNull();
    expect(parseCommand('')).toBeNull();
    expect(parseCommand('dance')).toBeNull();
  });
});

describe('parseChoiceNumber()', () => {
  it('accepts digits only', () => {
    expect(parseChoiceNumber(' 2 ')).toBe(2);
    expect(parseChoiceNumber('2a')).toBeNull();
    expect(parseChoiceNumber('-1')).toBeNull();
    expect(parseChoiceNumber('')).toBeNull();
  });
});
