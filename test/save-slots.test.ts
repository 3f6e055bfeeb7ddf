import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SaveSlots, SAVE_FORMAT_VERSION } from '../src/infra/save-slots.js';
import { SaveError } from '../src/infra/errors.js';
import { makeDefaultState } from '../src/domain/state.js';

// ============================================================================
// Test Helpers
// ============================================================================

const NOW_MS = 1_700_000_000_000;

let root: string;
let directory: string;

function makeSlots(): SaveSlots {
  return new SaveSlots({ directory, slotCount: 8, now: () => NOW_MS });
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'thornsfall-'));
  directory = join(root, 'saves');
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

// ============================================================================
// Tests
// ============================================================================

describe('SaveSlots.save()', () => {
  it('writes a versioned container and creates the directory', async () => {
    const state = makeDefaultState({ name: 'Aria', chapter: 4 });

    const path = await makeSlots().save(2, state);

    expect(path).toBe(join(directory, 'slot_2.json'));
    const container: unknown = JSON.parse(await readFile(path, 'utf-8'));
    expect(container).toMatchObject({
      version: SAVE_FORMAT_VERSION,
      timestamp: 1_700_000_000,
      state: { name: 'Aria', chapter: 4, trust_demon_lord: 10 },
    });
  });

  it('overwrites an existing slot', async () => {
    const slots = makeSlots();
    await slots.save(1, makeDefaultState({ chapter: 1 }));
    await slots.save(1, makeDefaultState({ chapter: 9 }));

    expect((await slots.load(1)).chapter).toBe(9);
  });
});

describe('SaveSlots.load()', () => {
  it('returns an equal state', async () => {
    const state = makeDefaultState({
      name: 'Aria',
      chapter: 7,
      flags: { allied: true, demon_lord_name: 'Astariel' },
      history: ['Swore an oath.'],
      seed: 99,
    });
    const slots = makeSlots();
    await slots.save(3, state);

    expect(await slots.load(3)).toEqual(state);
  });

  it('reports a missing slot', async () => {
    await expect(makeSlots().load(5)).rejects.toMatchObject({
      code: 'not_found',
      message: 'No save found in slot 5.',
    });
  });

  it('reports unparseable files as malformed', async () => {
    const slots = makeSlots();
    await slots.save(1, makeDefaultState());
    await writeFile(slots.slotPath(1), '{ not json', 'utf-8');

    await expect(slots.load(1)).rejects.toMatchObject({ code: 'malformed', message: 'Slot 1 is not valid JSON.' });
  });

  it('reports files that are not containers as malformed', async () => {
    const slots = makeSlots();
    await slots.save(1, makeDefaultState());
    await writeFile(slots.slotPath(1), JSON.stringify({ name: 'Aria' }), 'utf-8');

    await expect(slots.load(1)).rejects.toMatchObject({
      code: 'malformed',
      message: 'Slot 1 is not a save container.',
    });
  });
});

describe('unreadable slot files', () => {
  it('reports a slot path that cannot be read as malformed', async () => {
    const slots = makeSlots();
    await mkdir(slots.slotPath(1), { recursive: true });

    await expect(slots.load(1)).rejects.toMatchObject({
      code: 'malformed',
      message: 'Slot 1 could not be read.',
    });
  });

  it('lists an unreadable slot undated instead of failing', async () => {
    const slots = makeSlots();
    await mkdir(slots.slotPath(1), { recursive: true });
    await slots.save(2, makeDefaultState());

    expect(await slots.list()).toEqual([
      { slot: 1, timestamp: null },
      { slot: 2, timestamp: 1_700_000_000 },
    ]);
  });
});

describe('slot validation', () => {
  it.each([0, 9, -1, 1.5])('rejects slot %s before touching the disk', async (slot) => {
    const slots = makeSlots();

    await expect(slots.save(slot, makeDefaultState())).rejects.toBeInstanceOf(SaveError);
    await expect(slots.load(slot)).rejects.toMatchObject({
      code: 'invalid_slot',
      message: 'Slot must be between 1 and 8.',
    });
    expect(await exists(directory)).toBe(false);
  });
});

describe('SaveSlots.list()', () => {
  it('is empty before anything is saved', async () => {
    expect(await makeSlots().list()).toEqual([]);
  });

  it('lists existing slots in order, with unreadable ones undated', async () => {
    const slots = makeSlots();
    await slots.save(3, makeDefaultState());
    await slots.save(1, makeDefaultState());
    await writeFile(slots.slotPath(2), 'garbage', 'utf-8');

    expect(await slots.list()).toEqual([
      { slot: 1, timestamp: 1_700_000_000 },
      { slot: 2, timestamp: null },
      { slot: 3, timestamp: 1_700_000_000 },
    ]);
  });
});
