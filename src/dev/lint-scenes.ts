/**
 * Scene catalog linter.
 *
 * Validates the catalog the engine draws from. It can be run with:
 * npm run lint:scenes
 */

import { fileURLToPath } from 'node:url';
import type { SceneCatalog } from '../domain/engine.js';
import type { SceneArchetype, SceneDefinition } from '../domain/scenes.js';
import { STAT_KEYS, type StatKey } from '../domain/state.js';
import { catalog } from '../scenes/catalog.js';

// ============================================================================
// Validation Rules
// ============================================================================

export interface LintViolation {
  archetype: SceneArchetype;
  /** Empty for scene-level rules */
  tag: string;
  rule: string;
  message: string;
}

export const MAX_ABS_DELTA = 20;

const DRAWABLE_ARCHETYPES: readonly SceneArchetype[] = [
  'oath_bond',
  'council',
  'training',
  'tense_camp',
  'spy_report',
  'ambush_king_scouts',
  'rescue_travelers',
  'grim_bargain',
  'mystic_ruins',
  'wild_hunt',
  'whispering_trees',
];

function isStatKey(key: string): key is StatKey {
  return STAT_KEYS.some((stat) => stat === key);
}

function validateScene(scene: SceneDefinition, seenTags: Set<string>): LintViolation[] {
  const violations: LintViolation[] = [];
  const { archetype } = scene;

  const [minChoices, maxChoices] = archetype === 'intro' ? [4, 4] : [3, 4];
  if (scene.choices.length < minChoices || scene.choices.length > maxChoices) {
    violations.push({
      archetype,
      tag: '',
      rule: 'choice-count',
      message:
        minChoices === maxChoices
          ? `must offer exactly ${minChoices} choices, got ${scene.choices.length}`
          : `must offer ${minChoices}-${maxChoices} choices, got ${scene.choices.length}`,
    });
  }

  if (scene.narration.trim() === '') {
    violations.push({ archetype, tag: '', rule: 'narration-non-empty', message: 'scene narration is empty' });
  }

  for (const choice of scene.choices) {
    const { tag, consequence } = choice;

    if (seenTags.has(tag)) {
      violations.push({ archetype, tag, rule: 'tag-unique', message: `tag ${tag} is used more than once` });
    }
    seenTags.add(tag);

    if (choice.text.trim() === '' || consequence.narration.trim() === '') {
      violations.push({ archetype, tag, rule: 'text-non-empty', message: 'choice text and narration must be non-empty' });
    }

    for (const [key, delta] of Object.entries(consequence.statChanges ?? {})) {
      if (!isStatKey(key)) {
        violations.push({ archetype, tag, rule: 'stat-known', message: `unknown stat ${key}` });
      } else if (delta === undefined || !Number.isInteger(delta) || Math.abs(delta) > MAX_ABS_DELTA) {
        violations.push({
          archetype,
          tag,
          rule: 'delta-range',
          message: `${key} delta must be an integer within ±${MAX_ABS_DELTA}, got ${String(delta)}`,
        });
      }
    }
  }

  return violations;
}

/**
 * Returns every violation in the catalog; an empty list means it is valid.
 */
export function lintCatalog(sceneCatalog: SceneCatalog): LintViolation[] {
  const seenTags = new Set<string>();
  const scenes = sceneCatalog.listScenes();
  const violations = [sceneCatalog.getIntroScene(), ...scenes].flatMap((scene) =>
    validateScene(scene, seenTags)
  );

  const present = new Set(scenes.map((scene) => scene.archetype));
  for (const archetype of DRAWABLE_ARCHETYPES) {
    if (!present.has(archetype)) {
      violations.push({ archetype, tag: '', rule: 'archetype-present', message: 'no scene for this archetype' });
    }
  }

  return violations;
}

// ============================================================================
// Main
// ============================================================================

function main(): number {
  console.log('Linting scenes...\n');

  const violations = lintCatalog(catalog);
  if (violations.length === 0) {
    console.log('✓ All scenes valid\n');
    return 0;
  }

  console.log('✗ Validation failures:\n');
  for (const violation of violations) {
    console.log(`  Scene: ${violation.archetype}${violation.tag ? ` (${violation.tag})` : ''}`);
    console.log(`  Rule: ${violation.rule}`);
    console.log(`  Error: ${violation.message}`);
    console.log('');
  }
  console.log(`Total: ${violations.length} error(s)\n`);
  return 1;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  process.exitCode = main();
}
