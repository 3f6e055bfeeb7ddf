#!/usr/bin/env node
/**
 * Terminal entry point.
 *
 * Configuration (all optional):
 *   THORNSFALL_SAVE_DIR      slot directory (default ./saves)
 *   THORNSFALL_SLOT_COUNT    number of slots (default 8)
 *   THORNSFALL_DRIFT_CHANCE  incidental drift probability (default 0.15)
 */

import { loadConfig } from '../config.js';
import { catalog } from '../scenes/catalog.js';
import { SaveSlots } from '../infra/save-slots.js';
import { runMainMenu } from './session.js';
import { createTerminalIO } from './terminal-io.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const io = createTerminalIO({ input: process.stdin, output: process.stdout });

  try {
    await runMainMenu({
      io,
      catalog,
      slots: new SaveSlots({ directory: config.saveDir, slotCount: config.slotCount }),
      driftChance: config.driftChance,
    });
  } finally {
    io.close();
  }
}

try {
  await main();
} catch (error) {
  console.error('[thornsfall] fatal:', error);
  process.exitCode = 1;
}
