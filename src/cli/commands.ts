/**
 * Out-of-band commands accepted at the choice prompt.
 */

export type Command =
  | { kind: 'help' }
  | { kind: 'stats' }
  | { kind: 'slots' }
  | { kind: 'quit' }
  | { kind: 'save'; slot: number | null }
  | { kind: 'load'; slot: number | null };

/**
 * Parses a command line. Returns null for anything that is not a command,
 * including bare numbers (those are choice selections).
 *
 * `save`/`load` without a numeric slot parse with `slot: null`; range
 * checks belong to the save slots.
 */
export function parseCommand(input: string): Command | null {
  const parts = input.trim().toLowerCase().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length === 0) {
    return null;
  }

  const [word, arg] = parts;
  switch (word) {
    case 'help':
    case 'stats':
    case 'slots':
    case 'quit':
      return { kind: word };
    case 'save':
    case 'load':
      return { kind: word, slot: arg !== undefined && /^\d+$/.test(arg) ? Number(arg) : null };
    default:
      return null;
  }
}

/**
 * Parses a 1-based choice number, or null if the input is not all digits.
 */
export function parseChoiceNumber(input: string): number | null {
  const trimmed = input.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : null;
}
