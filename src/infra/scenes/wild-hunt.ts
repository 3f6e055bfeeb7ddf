import type { SceneDefinition } from '../../domain/scenes.js';

export const wildHuntScene: SceneDefinition = {
  archetype: 'wild_hunt',
  location: 'Night Plains — The Wild Hunt',
  narration:
    'Horns sound. Spectral riders rise like storm-surf, seeking a worthy quarry.\n' +
    'They circle, inviting chase or challenge.',
  eligibility: {},
  choices: [
    {
      tag: 'hunt_race',
      text: 'Race with them; learn their paths.',
      consequence: {
        statChanges: { power: 5, notoriety: 3 },
        narration:
          'You run with ghosts until your lungs are bells. They teach you shortcuts through moonlight.',
      },
    },
    {
      tag: 'hunt_duel',
      text: 'Challenge the huntmaster to single combat.',
      consequence: {
        statChanges: { power: 10, health: -6, notoriety: 6 },
        narration: 'Steel rings against antler and oath. You win a scar and a salute.',
      },
    },
    {
      tag: 'hunt_hide',
      text: 'Hide and observe; knowledge first.',
      consequence: {
        statChanges: { morality: 2 },
        narration: "You watch unseen as the Wild Hunt redraws the night's borders.",
      },
    },
  ],
};
