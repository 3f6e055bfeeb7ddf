import { describe, it, expect } from 'vitest';
import { lintCatalog } from '../src/dev/lint-scenes.js';
import type { SceneCatalog } from '../src/domain/engine.js';
import type { SceneDefinition } from '../src/domain/scenes.js';
import { catalog } from '../src/scenes/catalog.js';
import { introScene } from '../src/infra/scenes/intro.js';
import { mysticRuinsScene } from '../src/infra/scenes/mystic-ruins.js';

function catalogOf(scenes: SceneDefinition[]): SceneCatalog {
  return {
    getIntroScene: () => introScene,
    listScenes: () => scenes,
    getChoiceByTag: () => undefined,
  };
}

describe('lintCatalog()', () => {
  it('accepts the shipped catalog', () => {
    expect(lintCatalog(catalog)).toEqual([]);
  });

  it('flags broken scenes', () => {
    const [study] = mysticRuinsScene.choices;
    const broken: SceneDefinition = {
      ...mysticRuinsScene,
      choices: [study, { ...study, consequence: { ...study.consequence, statChanges: { power: 25 } } }],
    };

    const violations = lintCatalog(catalogOf([broken]));
    const ruinsRules = violations.filter((v) => v.archetype === 'mystic_ruins').map((v) => v.rule);

    expect(ruinsRules).toEqual(['choice-count', 'tag-unique', 'delta-range']);
    expect(violations.filter((v) => v.rule === 'archetype-present')).toHaveLength(10);
  });
});
