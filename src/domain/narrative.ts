/**
 * Narrative layer: template interpolation and one-line effect summaries.
 */

import type { EngineEvent } from './events.js';
import type { StatKey, StoryState } from './state.js';
import { getDemonLordName } from './state.js';
import type { Template } from './scenes.js';

const STAT_LABELS: Record<StatKey, string> = {
  health: 'Health',
  power: 'Power',
  morality: 'Morality',
  notoriety: 'Notoriety',
  trustDemonLord: 'Trust',
  bondDemonLord: 'Bond',
};

/**
 * Fills `{demonLord}` placeholders from the state's frozen name.
 */
export function interpolate(template: Template, state: StoryState): string {
  return template.replace(/\{demonLord\}/g, getDemonLordName(state));
}

function formatDelta(stat: StatKey, delta: number): string {
  const sign = delta > 0 ? '+' : '';
  return `${STAT_LABELS[stat]} ${sign}${delta}`;
}

function formatFlag(flag: string, value: boolean): string {
  const label = flag.replace(/_/g, ' ');
  return value ? label : `no longer ${label}`;
}

/**
 * Summarizes the events of one choice as a single line, e.g.
 * `Trust +20 · allied`. Returns null when nothing measurable changed.
 *
 * Scene renders, chapter advances and history lines are not summarized.
 */
export function summarize(events: EngineEvent[]): string | null {
  const parts: string[] = [];

  for (const event of events) {
    switch (event.type) {
      case 'stat_changed':
        for (const [stat, delta] of Object.entries(event.deltas) as [StatKey, number][]) {
          parts.push(formatDelta(stat, delta));
        }
        break;
      case 'drift_applied':
        parts.push(formatDelta(event.stat, event.delta));
        break;
      case 'flag_changed':
        for (const [flag, value] of Object.entries(event.changes)) {
          if (typeof value === 'boolean') {
            parts.push(formatFlag(flag, value));
          }
        }
        break;
      case 'item_added':
        for (const item of event.items) {
          parts.push(`gained ${item}`);
        }
        break;
      default:
        break;
    }
  }

  return parts.length > 0 ? parts.join(' · ') : null;
}
