/**
 * Relationship scene while trust is still thin (below 30).
 */

import type { SceneDefinition } from '../../domain/scenes.js';

export const tenseCampScene: SceneDefinition = {
  archetype: 'tense_camp',
  location: 'Forest Camp — Ember Clearing',
  narration:
    'A small fire sputters beneath twisted pines. {demonLord} watches you from across the flames.\n' +
    'Trust flickers like kindling. The forest listens.',
  eligibility: {
    stats: { maximum: { trustDemonLord: 29 } },
    flags: { required: ['met_demon_lord'] },
  },
  choices: [
    {
      tag: 'camp_confide',
      text: 'Share a painful memory to earn her empathy.',
      consequence: {
        statChanges: { morality: 5, trustDemonLord: 12 },
        narration:
          'Your memory is a splinter. You let it out. {demonLord} listens without mercy—without judgment. The fire warms, just a little.',
      },
    },
    {
      tag: 'camp_silence',
      text: 'Hone your blade in silence; let actions speak.',
      consequence: {
        statChanges: { power: 5, trustDemonLord: 2 },
        narration: 'You sharpen steel and silence. Sparks chart constellations no map has named.',
      },
    },
    {
      tag: 'camp_probe',
      text: 'Probe her motives—why rule the demons at all?',
      consequence: {
        statChanges: { trustDemonLord: -3, notoriety: 5 },
        narration:
          'Questions are knives. {demonLord} answers some and turns aside others. You learn enough to be wary—and useful.',
      },
    },
    {
      tag: 'camp_scout',
      text: 'Scout the perimeter; danger stalks the dark.',
      consequence: {
        statChanges: { power: 3, health: 3 },
        narration:
          'You pace the warding ring. Footprints. A bent reed. The forest is a chessboard and you are learning the moves.',
      },
    },
  ],
};
