import type { SceneDefinition } from '../../domain/scenes.js';

export const whisperingTreesScene: SceneDefinition = {
  archetype: 'whispering_trees',
  location: 'Whispering Trees — Root of Echoes',
  narration:
    'Leaves speak in voices you once trusted. They tell different truths now.\n' +
    'One whisper carries the name of a hero who betrayed you.',
  eligibility: {},
  choices: [
    {
      tag: 'whisper_follow',
      text: 'Follow the whisper to its source.',
      consequence: {
        statChanges: { notoriety: 4 },
        flagsToSet: { betrayer_trail: true },
        narration:
          "The whisper leads to a sigil cut in bark: a hero's mark. The trail warms under your gaze.",
      },
    },
    {
      tag: 'whisper_ward',
      text: 'Silence the voices with a ward.',
      consequence: {
        statChanges: { power: 3, morality: 1 },
        narration: 'You hush the forest with a ward that tastes like peppermint and thunder.',
      },
    },
    {
      tag: 'whisper_together',
      text: 'Ask {demonLord} to listen with you.',
      consequence: {
        statChanges: { trustDemonLord: 8, bondDemonLord: 1 },
        narration: 'You and {demonLord} listen as one. The voices braid into a map only two can read.',
      },
    },
  ],
};
