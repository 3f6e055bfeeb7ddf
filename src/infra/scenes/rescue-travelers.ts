import type { SceneDefinition } from '../../domain/scenes.js';

export const rescueTravelersScene: SceneDefinition = {
  archetype: 'rescue_travelers',
  location: 'Cairn Road — Bleak Mile',
  narration:
    'A caravan of refugees stumbles under the weight of injustice. Bandits circle.\n' +
    "You hear a child's cough beneath the wind.",
  eligibility: {
    stats: { minimum: { morality: 40 } },
  },
  choices: [
    {
      tag: 'rescue_shield',
      text: 'Shield the caravan; take the blows for them.',
      consequence: {
        statChanges: { morality: 10, health: -8, trustDemonLord: 4 },
        narration: "You take the blows others could not bear. A child's cough becomes a laugh.",
      },
    },
    {
      tag: 'rescue_ruse',
      text: 'Outwit the bandits with a ruse.',
      consequence: {
        statChanges: { morality: 6, power: 3 },
        narration:
          'Illusions, footprints, a staged cry—bandits chase ghosts while the caravan slips free.',
      },
    },
    {
      tag: 'rescue_walk',
      text: 'Walk away. Mercy is a luxury.',
      consequence: {
        statChanges: { morality: -10, power: 4, notoriety: 5 },
        narration: 'You turn away. The road learns your name without deciding if it loves you.',
      },
    },
  ],
};
