import type { SceneDefinition } from '../../domain/scenes.js';

export const mysticRuinsScene: SceneDefinition = {
  archetype: 'mystic_ruins',
  location: 'Ancient Ruins — Vault of Mists',
  narration:
    'Fog curls around cracked archways. Glyphs speak of heroes who burned their own ages ago.\n' +
    'A vault door breathes cold secrets.',
  eligibility: {},
  choices: [
    {
      tag: 'ruins_study',
      text: 'Study the glyphs for hidden history.',
      consequence: {
        statChanges: { power: 4, morality: 2 },
        historyEntry: 'Discovered records of prior heroes consumed by their crowns.',
        narration:
          'Glyphs confess: heroes burned an age to keep a throne warm. Truth is an ember you pocket.',
      },
    },
    {
      tag: 'ruins_force',
      text: 'Force the vault—whatever lies within is yours.',
      consequence: {
        statChanges: { power: 8, morality: -4 },
        itemsToAdd: ['Vault Relic'],
        narration:
          'The vault yields with a scream of stone. Inside waits a relic that knows your pulse.',
      },
    },
    {
      tag: 'ruins_mark',
      text: 'Leave a mark: a promise to return stronger.',
      consequence: {
        statChanges: { morality: 1, trustDemonLord: 2 },
        narration: 'You leave a mark, not a wound. Even ruins deserve a future.',
      },
    },
  ],
};
