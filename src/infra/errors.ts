/**
 * Errors raised by the persistence layer.
 *
 * The engine itself never throws for game-level conditions; these cover
 * the surrounding save/load collaborator only.
 */

export type SaveErrorCode = 'invalid_slot' | 'not_found' | 'malformed';

export class SaveError extends Error {
  readonly code: SaveErrorCode;

  constructor(code: SaveErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SaveError';
    this.code = code;
  }
}
