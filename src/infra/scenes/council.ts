import type { SceneDefinition } from '../../domain/scenes.js';

export const councilScene: SceneDefinition = {
  archetype: 'council',
  location: 'Eclipse Hall — Council of Cinders',
  narration:
    "{demonLord}'s lieutenants argue under lanterns filled with captured starlight.\n" +
    'War or peace? Retaliation or secrecy? They seek your counsel.',
  eligibility: {
    stats: { minimum: { trustDemonLord: 30 } },
    flags: { required: ['met_demon_lord'] },
  },
  choices: [
    {
      tag: 'council_diplomacy',
      text: "Advise diplomacy—seek proof of the kingdom's treachery.",
      consequence: {
        statChanges: { morality: 8, trustDemonLord: 6 },
        flagsToSet: { seeking_truth: true },
        narration: 'You chart a path of proof and patience. The hall quiets; even war can listen.',
      },
    },
    {
      tag: 'council_raids',
      text: 'Plan raids on corrupt nobles and supply lines.',
      consequence: {
        statChanges: { power: 8, notoriety: 10 },
        flagsToSet: { vow_revenge: true },
        narration: 'Targets line the map like sins. You thread a needle through them made of fire.',
      },
    },
    {
      tag: 'council_parley',
      text: 'Propose a secret parley with a sympathetic hero.',
      consequence: {
        statChanges: { morality: 3, notoriety: 3 },
        flagsToSet: { parley_set: true },
        narration: 'A secret parley—dangerous, delicate. If it holds, the story changes.',
      },
    },
  ],
};
