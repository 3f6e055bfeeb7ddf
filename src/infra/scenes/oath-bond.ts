/**
 * The oath offer. Appears once trust reaches 60 and disappears for good
 * after the oath is sworn.
 */

import type { SceneDefinition } from '../../domain/scenes.js';

export const oathBondScene: SceneDefinition = {
  archetype: 'oath_bond',
  location: 'Moonwell — Mirror of Vows',
  narration:
    'Beside the Moonwell, {demonLord} offers her hand. "We choose each other—against crown and fate."\n' +
    'The water reflects futures you barely recognize.',
  eligibility: {
    stats: { minimum: { trustDemonLord: 60 } },
    flags: { required: ['met_demon_lord'], blocked: ['oath_bound'] },
  },
  choices: [
    {
      tag: 'oath_sworn',
      text: 'Swear an oath of alliance.',
      consequence: {
        statChanges: { trustDemonLord: 20, bondDemonLord: 3 },
        flagsToSet: { oath_bound: true },
        narration:
          'You swear by fang and star. The Moonwell seals the promise with a chill that tastes like dawn.',
      },
    },
    {
      tag: 'oath_hesitate',
      text: 'Hesitate—the cost of vows is always hidden.',
      consequence: {
        statChanges: { trustDemonLord: -5 },
        narration: 'You ask for time. The Moonwell reflects two strangers trying to be allies.',
      },
    },
    {
      tag: 'oath_refuse',
      text: 'Refuse—freedom above all.',
      consequence: {
        statChanges: { trustDemonLord: -12 },
        flagsToSet: { allied: false },
        narration: 'You step back from the brink. Freedom is a lonely country.',
      },
    },
  ],
};
