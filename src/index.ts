/**
 * Library entry point: the story engine, its scene catalog and persistence.
 *
 * The interactive terminal game lives in cli/main.ts.
 */

export type {
  StoryState,
  Stats,
  StatKey,
  Flags,
  FlagValue,
  PartialStoryState,
} from './domain/state.js';
export {
  STAT_BOUNDS,
  createNewState,
  deriveSeed,
  getDemonLordName,
  makeDefaultState,
  setFlagIfAbsent,
} from './domain/state.js';
export type { RandomSource } from './domain/random.js';
export { createRandom } from './domain/random.js';
export type {
  ChoiceConsequence,
  ChoiceTag,
  RenderedChoice,
  RenderedScene,
  SceneArchetype,
  SceneDefinition,
} from './domain/scenes.js';
export type { EngineEvent } from './domain/events.js';
export type { Ending, EndingId, SceneCatalog } from './domain/engine.js';
export {
  applyChoice,
  applyIncidentalDrift,
  checkEnding,
  listEligibleArchetypes,
  renderScene,
} from './domain/engine.js';
export { summarize } from './domain/narrative.js';
export { catalog } from './scenes/catalog.js';
export { SaveSlots, type SaveContainer, type SlotSummary } from './infra/save-slots.js';
export { SaveError, type SaveErrorCode } from './infra/errors.js';
export { deserializeState, serializeState, type StoredState } from './infra/state-serialization.js';
export { loadConfig, ConfigError, type AppConfig } from './config.js';
