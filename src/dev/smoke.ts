/**
 * Developer smoke test for the story engine.
 *
 * This script is intentionally simple and explicit.
 * Its purpose is to prove that:
 * - the intro renders and names the Demon Lord
 * - choices advance chapters and emit events
 * - a fixed seed always reaches the same ending
 *
 * Run with:
 *   npm run smoke
 */

import {
  applyChoice,
  applyIncidentalDrift,
  checkEnding,
  renderScene,
} from '../domain/engine.js';
import { makeDefaultState, type StoryState } from '../domain/state.js';
import { createRandom } from '../domain/random.js';
import { summarize } from '../domain/narrative.js';
import { catalog } from '../scenes/catalog.js';

const SEED = 42;
const MAX_TURNS = 60;

// -----------------------------------------------------------------------------
// Initial State
// -----------------------------------------------------------------------------

let state: StoryState = makeDefaultState({ name: 'Smoke', seed: SEED });
const random = createRandom(state.seed);

console.log('\n=== INITIAL STATE ===');
console.dir(state, { depth: null });

// -----------------------------------------------------------------------------
// Play: always the first choice
// -----------------------------------------------------------------------------

for (let turn = 1; turn <= MAX_TURNS; turn++) {
  const ending = checkEnding(state);
  if (ending) {
    console.log(`\n=== ENDING: ${ending.title} ===`);
    console.log(ending.narration);
    break;
  }

  const rendered = renderScene(state, catalog, random);
  state = rendered.state;
  const choice = rendered.scene.choices[0];

  console.log(`\n=== TURN ${turn}: [Chapter ${state.chapter}] ${rendered.scene.archetype} ===`);
  console.log(`Choice: ${choice.text}`);

  const result = applyChoice(state, choice.tag, catalog);
  const drift = applyIncidentalDrift(result.state, random);
  state = drift.state;

  console.log(result.narration);
  console.log(`(${summarize([...result.events, ...drift.events]) ?? 'no change'})`);
}

// -----------------------------------------------------------------------------
// Done
// -----------------------------------------------------------------------------

console.log('\n=== FINAL STATE ===');
console.dir(state, { depth: null });
