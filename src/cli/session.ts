/**
 * Interactive session loop: main menu, turns, and out-of-band commands.
 *
 * All terminal I/O goes through SessionIO so the loop runs unchanged against
 * readline in the binary and a scripted stand-in in tests.
 */

import type { StoryState } from '../domain/state.js';
import { createNewState } from '../domain/state.js';
import type { SceneCatalog, Ending } from '../domain/engine.js';
import {
  applyChoice,
  applyIncidentalDrift,
  checkEnding,
  renderScene,
} from '../domain/engine.js';
import type { RenderedScene } from '../domain/scenes.js';
import { createRandom, type RandomSource } from '../domain/random.js';
import { summarize } from '../domain/narrative.js';
import type { SaveSlots } from '../infra/save-slots.js';
import { SaveError } from '../infra/errors.js';
import { parseChoiceNumber, parseCommand, type Command } from './commands.js';
import { GAME_TITLE, formatSlotList, formatStats, helpText, titleBanner } from './format.js';

export interface SessionIO {
  /** Resolves null when input is exhausted */
  prompt(message: string): Promise<string | null>;
  print(text: string): void;
}

export interface SessionDeps {
  io: SessionIO;
  catalog: SceneCatalog;
  slots: Pick<SaveSlots, 'save' | 'load' | 'list' | 'slotCount'>;
  driftChance: number;
  /** Clock in milliseconds, used for new-game seeds */
  now?: () => number;
}

export type SessionOutcome =
  | { reason: 'ending'; state: StoryState; ending: Ending }
  | { reason: 'quit'; state: StoryState };

/**
 * Result of handling one line at the choice prompt.
 */
type TurnStep =
  | { kind: 'stay' }
  | { kind: 'advance'; state: StoryState }
  | { kind: 'reload'; state: StoryState }
  | { kind: 'quit' };

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function printScene(io: SessionIO, state: StoryState, scene: RenderedScene): void {
  io.print(`\n[Chapter ${state.chapter}] ${state.location}`);
  io.print(`\n${scene.narration}\n`);
  scene.choices.forEach((choice, index) => {
    io.print(`  ${index + 1}. ${choice.text}`);
  });
  io.print('  (Or type a command: save <n>, load <n>, stats, slots, help, quit)');
}

async function handleCommand(
  command: Command,
  state: StoryState,
  random: RandomSource,
  deps: SessionDeps
): Promise<TurnStep> {
  const { io, slots } = deps;

  switch (command.kind) {
    case 'help':
      io.print(helpText(slots.slotCount));
      return { kind: 'stay' };
    case 'stats':
      io.print(formatStats(state));
      return { kind: 'stay' };
    case 'slots':
      io.print(formatSlotList(await slots.list(), slots.slotCount));
      return { kind: 'stay' };
    case 'quit':
      io.print('Farewell, traveler.');
      return { kind: 'quit' };
    case 'save':
      if (command.slot === null) {
        io.print(`Usage: save <slot number 1-${slots.slotCount}>`);
        return { kind: 'stay' };
      }
      try {
        const path = await slots.save(command.slot, state);
        io.print(`Saved to Slot ${command.slot} (${path})`);
      } catch (error) {
        if (!(error instanceof SaveError)) {
          console.error('[session] save failed:', error);
        }
        io.print(`Save failed: ${describeError(error)}`);
      }
      return { kind: 'stay' };
    case 'load':
      if (command.slot === null) {
        io.print(`Usage: load <slot number 1-${slots.slotCount}>`);
        return { kind: 'stay' };
      }
      try {
        const loaded = await slots.load(command.slot);
        random.reseed(loaded.seed);
        io.print(`Loaded Slot ${command.slot}.`);
        io.print(formatStats(loaded));
        return { kind: 'reload', state: loaded };
      } catch (error) {
        if (!(error instanceof SaveError)) {
          console.error('[session] load failed:', error);
        }
        io.print(`Load failed: ${describeError(error)}`);
        return { kind: 'stay' };
      }
  }
}

function takeChoice(
  state: StoryState,
  scene: RenderedScene,
  index: number,
  random: RandomSource,
  deps: SessionDeps
): StoryState {
  const { io, catalog } = deps;
  const choice = scene.choices[index - 1];

  const result = applyChoice(state, choice.tag, catalog);
  io.print(`\n${result.narration}\n`);
  const summary = summarize(result.events);
  if (summary) {
    io.print(`(${summary})`);
  }

  return applyIncidentalDrift(result.state, random, deps.driftChance).state;
}

/**
 * Plays from `initial` until an ending is reached or the player quits.
 *
 * Loading a slot swaps the state, reseeds the random source from the loaded
 * seed, and renders a fresh scene for it.
 */
export async function runSession(initial: StoryState, deps: SessionDeps): Promise<SessionOutcome> {
  const { io, catalog, slots } = deps;
  const random = createRandom(initial.seed);
  let state = initial;

  io.print(titleBanner());
  io.print("You can type 'help' at any time.\n");
  io.print(helpText(slots.slotCount));

  for (;;) {
    const ending = checkEnding(state);
    if (ending) {
      io.print(`\n=== An Ending Unfolds: ${ending.title} ===`);
      io.print(ending.narration);
      io.print(`\nThanks for playing ${GAME_TITLE}.\n`);
      return { reason: 'ending', state, ending };
    }

    const rendered = renderScene(state, catalog, random);
    state = rendered.state;
    printScene(io, state, rendered.scene);

    let turnDone = false;
    while (!turnDone) {
      const raw = (await io.prompt('\nYour choice: ')) ?? 'quit';
      const command = parseCommand(raw);

      if (command) {
        const step = await handleCommand(command, state, random, deps);
        if (step.kind === 'quit') {
          return { reason: 'quit', state };
        }
        if (step.kind === 'reload') {
          state = step.state;
          turnDone = true;
        }
        continue;
      }

      const index = parseChoiceNumber(raw);
      if (index === null) {
        io.print("Type a choice number, or a command like 'save 1' or 'help'.");
      } else if (index < 1 || index > rendered.scene.choices.length) {
        io.print('Pick a listed choice number.');
      } else {
        state = takeChoice(state, rendered.scene, index, random, deps);
        turnDone = true;
      }
    }
  }
}

/**
 * Main menu: new game, load game, quit. Returns when the player quits or
 * input runs out.
 */
export async function runMainMenu(deps: SessionDeps): Promise<void> {
  const { io, slots } = deps;
  const now = deps.now ?? Date.now;

  for (;;) {
    io.print(titleBanner());
    io.print('1) New Game');
    io.print('2) Load Game');
    io.print('3) Quit');

    const raw = await io.prompt('\nSelect: ');
    const selection = (raw ?? 'quit').trim().toLowerCase();

    if (['1', 'n', 'new', 'new game'].includes(selection)) {
      io.print(`Welcome to ${GAME_TITLE}.\n`);
      const name = (await io.prompt('What name shall your legend carry? ')) ?? '';
      await runSession(createNewState(name, now()), deps);
    } else if (['2', 'l', 'load', 'load game'].includes(selection)) {
      const slotInput = (await io.prompt(`Enter slot number (1-${slots.slotCount}): `)) ?? '';
      const slot = parseChoiceNumber(slotInput);
      if (slot === null) {
        io.print('Invalid slot.');
        continue;
      }
      try {
        const loaded = await slots.load(slot);
        await runSession(loaded, deps);
      } catch (error) {
        if (!(error instanceof SaveError)) {
          throw error;
        }
        io.print(`Could not load: ${error.message}`);
      }
    } else if (['3', 'q', 'quit', 'exit'].includes(selection)) {
      io.print('Goodbye.');
      return;
    } else {
      io.print('Please choose 1, 2, or 3.\n');
    }
  }
}
