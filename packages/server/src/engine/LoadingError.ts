import type { LoadingErrorCode } from '@loadsheet/shared';

/**
 * Raised when a loading computation has no meaningful result
 * (empty aircraft, no fuel to burn, unsolvable station).
 */
export class LoadingError extends Error {
  constructor(
    readonly code: LoadingErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'LoadingError';
  }
}
