/**
 * The Thorn Altar, offered only to the ruthless (morality -40 or lower).
 */

import type { SceneDefinition } from '../../domain/scenes.js';

export const grimBargainScene: SceneDefinition = {
  archetype: 'grim_bargain',
  location: 'Thorn Altar — Price of Power',
  narration:
    "A thorned altar hums with forbidden strength. {demonLord}'s gaze is unreadable.\n" +
    'The altar grants might… and takes what you value most.',
  eligibility: {
    stats: { maximum: { morality: -40 } },
  },
  choices: [
    {
      tag: 'bargain_memory',
      text: 'Bleed for power: sacrifice a memory.',
      consequence: {
        statChanges: { power: 15, morality: -8 },
        historyEntry: 'You traded a cherished memory at the Thorn Altar.',
        narration: 'You give the altar a memory of home. Power rushes in to fill the hollow it leaves.',
      },
    },
    {
      tag: 'bargain_reject',
      text: 'Spare yourself—reject the altar.',
      consequence: {
        statChanges: { morality: 5, trustDemonLord: 3 },
        narration: 'You walk away from easy strength. The altar hums, disappointed.',
      },
    },
    {
      tag: 'bargain_token',
      text: 'Offer the altar a token from your betrayers.',
      consequence: {
        statChanges: { power: 10, notoriety: 7 },
        narration:
          "You place a betrayer's token on the altar. The thorns drink deep and answer with power.",
      },
    },
  ],
};
