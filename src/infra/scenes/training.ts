import type { SceneDefinition } from '../../domain/scenes.js';

export const trainingScene: SceneDefinition = {
  archetype: 'training',
  location: 'Obsidian Glade — Training Stones',
  narration:
    'In the Obsidian Glade, {demonLord} tests you. Demonic sigils fracture the air.\n' +
    'Power strains your scars as you push beyond mortal limits.',
  eligibility: {
    stats: { minimum: { trustDemonLord: 30 } },
    flags: { required: ['met_demon_lord'] },
  },
  choices: [
    {
      tag: 'train_defense',
      text: 'Master a defensive ward to shield the weak.',
      consequence: {
        statChanges: { power: 7, morality: 5, trustDemonLord: 5 },
        narration:
          'Your ward blooms like a quiet star. It holds when claws descend. Somewhere, someone will live because of this.',
      },
    },
    {
      tag: 'train_wrath',
      text: 'Channel wrath—strike harder, faster, crueler.',
      consequence: {
        statChanges: { power: 12, morality: -6, notoriety: 6 },
        narration: 'You inhale the storm and exhale ruin. The stones remember your name as a crack.',
      },
    },
    {
      tag: 'train_sync',
      text: "Synchronize with {demonLord}'s rhythm; trust the dance of blades.",
      consequence: {
        statChanges: { power: 6, trustDemonLord: 10, bondDemonLord: 1 },
        narration: "Step, strike, breathe—together. {demonLord}'s motion becomes a language you begin to read.",
      },
    },
  ],
};
