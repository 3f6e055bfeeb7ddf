/**
 * Numbered save slots on the local filesystem.
 *
 * One pretty-printed JSON file per slot (`slot_<n>.json`) holding a versioned
 * container: `{ version, timestamp, state }`. Slot numbers are validated
 * before any filesystem access.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { StoryState } from '../domain/state.js';
import { deserializeState, serializeState, type StoredState } from './state-serialization.js';
import { SaveError } from './errors.js';

export const SAVE_FORMAT_VERSION = 1;

/**
 * SaveContainer: What is written to disk for one slot.
 */
export interface SaveContainer {
  version: number;
  /** Unix seconds */
  timestamp: number;
  state: StoredState;
}

const containerSchema = z.object({
  version: z.number().int(),
  timestamp: z.number(),
  state: z.unknown().optional(),
});

/**
 * SlotSummary: One existing slot. `timestamp` is null when the file exists
 * but cannot be read as a container.
 */
export interface SlotSummary {
  slot: number;
  timestamp: number | null;
}

export interface SaveSlotsOptions {
  directory: string;
  slotCount: number;
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class SaveSlots {
  private readonly directory: string;
  private readonly now: () => number;
  readonly slotCount: number;

  constructor(options: SaveSlotsOptions) {
    this.directory = options.directory;
    this.slotCount = options.slotCount;
    this.now = options.now ?? Date.now;
  }

  slotPath(slot: number): string {
    return join(this.directory, `slot_${slot}.json`);
  }

  /**
   * Writes the state to a slot and returns the file path.
   */
  async save(slot: number, state: StoryState): Promise<string> {
    this.assertValidSlot(slot);

    const container: SaveContainer = {
      version: SAVE_FORMAT_VERSION,
      timestamp: Math.floor(this.now() / 1000),
      state: serializeState(state),
    };

    await mkdir(this.directory, { recursive: true });
    const path = this.slotPath(slot);
    await writeFile(path, `${JSON.stringify(container, null, 2)}\n`, 'utf-8');
    return path;
  }

  /**
   * Reads a slot back into a StoryState.
   *
   * Throws SaveError: `invalid_slot`, `not_found`, or `malformed` (which
   * also covers files that exist but cannot be read).
   */
  async load(slot: number): Promise<StoryState> {
    this.assertValidSlot(slot);
    const container = await this.readContainer(slot);
    return deserializeState(container.state);
  }

  /**
   * Existing slots in slot order.
   */
  async list(): Promise<SlotSummary[]> {
    const summaries: SlotSummary[] = [];

    for (let slot = 1; slot <= this.slotCount; slot++) {
      try {
        const container = await this.readContainer(slot);
        summaries.push({ slot, timestamp: container.timestamp });
      } catch (error) {
        if (error instanceof SaveError && error.code === 'not_found') {
          continue;
        }
        if (error instanceof SaveError && error.code === 'malformed') {
          summaries.push({ slot, timestamp: null });
          continue;
        }
        throw error;
      }
    }

    return summaries;
  }

  private assertValidSlot(slot: number): void {
    if (!Number.isInteger(slot) || slot < 1 || slot > this.slotCount) {
      throw new SaveError('invalid_slot', `Slot must be between 1 and ${this.slotCount}.`);
    }
  }

  private async readContainer(slot: number): Promise<z.infer<typeof containerSchema>> {
    let text: string;
    try {
      text = await readFile(this.slotPath(slot), 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new SaveError('not_found', `No save found in slot ${slot}.`, { cause: error });
      }
      throw new SaveError('malformed', `Slot ${slot} could not be read.`, { cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new SaveError('malformed', `Slot ${slot} is not valid JSON.`, { cause: error });
    }

    const parsed = containerSchema.safeParse(data);
    if (!parsed.success) {
      throw new SaveError('malformed', `Slot ${slot} is not a save container.`, { cause: parsed.error });
    }
    return parsed.data;
  }
}
