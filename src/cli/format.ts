/**
 * Terminal presentation: banner, stats block, help and slot listing.
 */

import type { StoryState } from '../domain/state.js';
import type { SlotSummary } from '../infra/save-slots.js';

export const GAME_TITLE = 'Thornsfall';

export function titleBanner(): string {
  return String.raw`
  _____ _                          __       _ _
 |_   _| |__   ___  _ __ _ __  ___ / _| __ _| | |
   | | | '_ \ / _ \| '__| '_ \/ __| |_ / _' | | |
   | | | | | | (_) | |  | | | \__ \  _| (_| | | |
   |_| |_| |_|\___/|_|  |_| |_|___/_|  \__,_|_|_|
                 A   G A M E   O F   L O R E
`;
}

export function helpText(slotCount: number): string {
  return [
    'Commands you can type anytime:',
    '  help           - show this help',
    '  stats          - show your current stats',
    `  save <slot>    - save to slot 1-${slotCount} (e.g., save 3)`,
    `  load <slot>    - load from slot 1-${slotCount} (e.g., load 2)`,
    '  slots          - list existing saves',
    '  quit           - exit the game',
  ].join('\n');
}

export function formatStats(state: StoryState): string {
  const { stats } = state;
  const lines = [
    '--- Stats ---',
    `Name: ${state.name} | Chapter: ${state.chapter} | Location: ${state.location}`,
    `Health: ${stats.health}  Power: ${stats.power}  Morality: ${stats.morality}  Notoriety: ${stats.notoriety}`,
    `Trust (Demon Lord): ${stats.trustDemonLord}  Bond: ${stats.bondDemonLord}`,
    `Inventory: ${state.inventory.length > 0 ? state.inventory.join(', ') : '(empty)'}`,
  ];

  const notable = Object.entries(state.flags)
    .filter(([, value]) => value === true)
    .map(([flag]) => flag)
    .sort();
  if (notable.length > 0) {
    lines.push(`Notable Flags: ${notable.join(', ')}`);
  }

  lines.push('-------------');
  return lines.join('\n');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local `YYYY-MM-DD HH:MM:SS` for a unix-seconds timestamp.
 */
export function formatTimestamp(timestamp: number | null): string {
  if (timestamp === null) {
    return '<unknown>';
  }
  const date = new Date(timestamp * 1000);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatSlotList(summaries: SlotSummary[], slotCount: number): string {
  if (summaries.length === 0) {
    return `No saves yet. Use: save <slot> (1-${slotCount})`;
  }
  return ['Existing saves:', ...summaries.map((s) => `  Slot ${s.slot}: ${formatTimestamp(s.timestamp)}`)].join('\n');
}
