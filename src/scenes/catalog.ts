/**
 * Scene catalog.
 *
 * Provides scene lookup and enumeration for the engine.
 * This is a dumb catalog: no eligibility logic, no draws, no side effects.
 */

import type { SceneCatalog } from '../domain/engine.js';
import type { ChoiceTag, SceneChoice, SceneDefinition } from '../domain/scenes.js';
import { introScene } from '../infra/scenes/intro.js';
import { oathBondScene } from '../infra/scenes/oath-bond.js';
import { councilScene } from '../infra/scenes/council.js';
import { trainingScene } from '../infra/scenes/training.js';
import { tenseCampScene } from '../infra/scenes/tense-camp.js';
import { spyReportScene } from '../infra/scenes/spy-report.js';
import { ambushKingScoutsScene } from '../infra/scenes/ambush-king-scouts.js';
import { rescueTravelersScene } from '../infra/scenes/rescue-travelers.js';
import { grimBargainScene } from '../infra/scenes/grim-bargain.js';
import { mysticRuinsScene } from '../infra/scenes/mystic-ruins.js';
import { wildHuntScene } from '../infra/scenes/wild-hunt.js';
import { whisperingTreesScene } from '../infra/scenes/whispering-trees.js';

/**
 * Drawable scenes in evaluation order. The order feeds the random draw,
 * so changing it changes every seeded playthrough.
 */
const scenes: SceneDefinition[] = [
  oathBondScene,
  councilScene,
  trainingScene,
  tenseCampScene,
  spyReportScene,
  ambushKingScoutsScene,
  rescueTravelersScene,
  grimBargainScene,
  mysticRuinsScene,
  wildHuntScene,
  whisperingTreesScene,
];

/**
 * Tag → choice across every scene, intro included. Later duplicates would
 * shadow earlier ones; lint-scenes rejects duplicate tags.
 */
const choicesByTag = new Map<ChoiceTag, SceneChoice>(
  [introScene, ...scenes].flatMap((scene) =>
    scene.choices.map((choice): [ChoiceTag, SceneChoice] => [choice.tag, choice])
  )
);

export const catalog: SceneCatalog = {
  getIntroScene() {
    return introScene;
  },

  listScenes() {
    return [...scenes];
  },

  getChoiceByTag(tag: ChoiceTag) {
    return choicesByTag.get(tag);
  },
};
