/**
 * Opening scene: Thornsfall Edge.
 *
 * Forced while the chapter is 0. Initializes the story flags and names the
 * Demon Lord once; the name is frozen in the `demon_lord_name` flag.
 */

import type { IntroSceneDefinition } from '../../domain/scenes.js';

export const DEMON_LORD_NAMES = [
  'Nyx',
  'Velaria',
  'Lilithe',
  'Morrigan',
  'Eresh',
  'Seraphine',
  'Astariel',
  'Noctra',
] as const;

export const introScene: IntroSceneDefinition = {
  archetype: 'intro',
  location: 'Demon Forest — Thornsfall Edge',
  narration:
    'You awaken in briars and ash. The kingdom you died to protect has cast you out.\n' +
    'Branches claw your cloak as you stumble through the Demon Forest. A presence watches.\n\n' +
    'She steps from the gloom: the Demon Lord, a girl with eyes like eclipsed moons.\n' +
    '"I am {demonLord}. Your light reeks of betrayal," she says. "Why should I spare you?"',
  demonLordNames: DEMON_LORD_NAMES,
  setup: {
    flagDefaults: {
      betrayed: true,
      met_demon_lord: true,
      allied: false,
      vow_revenge: false,
      seeking_truth: true,
    },
    historyEntry: 'Banished to the Demon Forest after betrayal by the kingdom and fellow heroes.',
  },
  eligibility: {},
  choices: [
    {
      tag: 'intro_plead',
      text: 'Plead your case: you were framed and seek only the truth.',
      consequence: {
        statChanges: { morality: 10, trustDemonLord: 15 },
        flagsToSet: { seeking_truth: true },
        narration:
          'You speak plainly of betrayal. {demonLord} studies the cracks in your voice and lowers her hand. "Truth cuts deeper than any blade," she says.',
      },
    },
    {
      tag: 'intro_vengeance',
      text: "Swear vengeance: you'll raze the kingdom that betrayed you.",
      consequence: {
        statChanges: { morality: -10, power: 10, trustDemonLord: 5 },
        flagsToSet: { vow_revenge: true },
        narration:
          'Vengeance burns like pitch. {demonLord} smiles—a small, dangerous thing. "Then we understand each other."',
      },
    },
    {
      tag: 'intro_pact',
      text: 'Offer a pact: strength for strength—become uneasy allies.',
      consequence: {
        statChanges: { trustDemonLord: 20 },
        flagsToSet: { allied: true },
        narration:
          'You offer terms, not supplication. {demonLord} clasps your wrist. "We hunt different prey—but we can share the trail."',
      },
    },
    {
      tag: 'intro_fight',
      text: "Draw steel: if she wants blood, she'll earn it.",
      consequence: {
        statChanges: { health: -15, power: 5, trustDemonLord: 10 },
        narration:
          'Steel rings. You draw blood and pay in kind. {demonLord} laughs like thunder far away. "Live, then. Earn the right to stand."',
      },
    },
  ],
};
