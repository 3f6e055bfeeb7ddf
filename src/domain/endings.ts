/**
 * Ending predicates, checked in priority order. First match wins.
 */

import type { StoryState } from './state.js';
import { getDemonLordName, hasFlag } from './state.js';

export type EndingId = 'death' | 'alliance' | 'sovereign' | 'guardian' | 'exile';

export interface Ending {
  id: EndingId;
  title: string;
  narration: string;
}

interface EndingRule {
  id: EndingId;
  title: string;
  matches(state: StoryState): boolean;
  narrate(state: StoryState): string;
}

const ENDING_RULES: readonly EndingRule[] = [
  {
    id: 'death',
    title: 'Fallen Beneath Black Boughs',
    matches: (state) => state.stats.health <= 0,
    narrate: () => 'Your story ends beneath black boughs. Even the forest bows its head.',
  },
  {
    id: 'alliance',
    title: 'Ascendant Alliance',
    matches: (state) =>
      state.stats.trustDemonLord >= 80 &&
      state.stats.power >= 70 &&
      hasFlag(state, 'oath_bound'),
    narrate: (state) =>
      `Side by side with ${getDemonLordName(state)}, you confront the crown. Proof and power make a quiet revolution.\n` +
      'The heroes who betrayed you kneel, not to force, but to truth. The forest grows less afraid.',
  },
  {
    id: 'sovereign',
    title: 'Lone Sovereign',
    matches: (state) =>
      state.stats.notoriety >= 80 && state.stats.power >= 80 && state.stats.morality <= -30,
    narrate: () =>
      'Feared and unstoppable, you become a storm that keeps its own counsel. Kings learn to read the sky.',
  },
  {
    id: 'guardian',
    title: 'Redeemed Guardian',
    matches: (state) => state.stats.morality >= 80 && state.stats.power >= 50,
    narrate: () => 'You choose to guard rather than rule. Roads are safer where your shadow falls.',
  },
  {
    id: 'exile',
    title: 'Quiet Exile',
    matches: (state) =>
      state.chapter >= 30 && state.stats.trustDemonLord < 40 && state.stats.notoriety < 40,
    narrate: () =>
      'Years pass like leaves. Your name fades, but the people you saved remember.\n' +
      'Not all legends need thrones.',
  },
];

/**
 * Returns the highest-priority ending the state satisfies, or null.
 *
 * The state is not marked; a caller that keeps looping keeps playing.
 */
export function checkEnding(state: StoryState): Ending | null {
  for (const rule of ENDING_RULES) {
    if (rule.matches(state)) {
      return { id: rule.id, title: rule.title, narration: rule.narrate(state) };
    }
  }
  return null;
}
