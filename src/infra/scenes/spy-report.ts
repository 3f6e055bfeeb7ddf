import type { SceneDefinition } from '../../domain/scenes.js';

export const spyReportScene: SceneDefinition = {
  archetype: 'spy_report',
  location: "Shadespine — Scout's Path",
  narration:
    'A demon scout kneels, breathless: the kingdom moves hunters into the forest.\n' +
    'They bear your crest—bait for a public execution.',
  eligibility: {
    flags: { required: ['vow_revenge'] },
  },
  choices: [
    {
      tag: 'spy_intercept',
      text: 'Intercept and expose the ruse.',
      consequence: {
        statChanges: { morality: 4, notoriety: 5 },
        narration: 'You unmask the trap and free the bait. Rumors begin to turn toward truth.',
      },
    },
    {
      tag: 'spy_reverse',
      text: 'Turn the ambush onto the hunters.',
      consequence: {
        statChanges: { power: 7, morality: -2, notoriety: 9 },
        narration: 'Hunters become the hunted. The forest keeps your secrets.',
      },
    },
    {
      tag: 'spy_ignore',
      text: 'Ignore; focus on power first.',
      consequence: {
        statChanges: { power: 4, morality: -4 },
        narration: 'You let the game play on without you—for now.',
      },
    },
  ],
};
