import type { SceneDefinition } from '../../domain/scenes.js';

export const ambushKingScoutsScene: SceneDefinition = {
  archetype: 'ambush_king_scouts',
  location: 'Ravine Verge — Broken Bridge',
  narration:
    'You spot royal scouts across a broken bridge, whispering your name like a curse.\n' +
    'Their signal mirrors glint. A choice, sharp as shale.',
  eligibility: {
    flags: { required: ['vow_revenge'] },
  },
  choices: [
    {
      tag: 'ambush_shadow',
      text: 'Strike from shadow—no witnesses.',
      consequence: {
        statChanges: { power: 8, morality: -6, notoriety: 8 },
        narration: 'No witnesses. No mercy. The bridge remembers only silence.',
      },
    },
    {
      tag: 'ambush_capture',
      text: 'Seize a scout alive for information.',
      consequence: {
        statChanges: { morality: 6, notoriety: 4 },
        narration:
          'Under your blade, a scout chooses life—and answers. Names spill like beads from a torn chain.',
      },
    },
    {
      tag: 'ambush_letgo',
      text: 'Let them flee; plant fear and rumor.',
      consequence: {
        statChanges: { morality: 2, notoriety: 6 },
        narration: 'Mercy travels faster than hoofbeats. Fear travels faster still.',
      },
    },
  ],
};
