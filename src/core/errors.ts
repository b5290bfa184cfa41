/**
 * Error types shared by the engine, the store and the HTTP layer
 */

export type SimulationErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'PERSISTENCE';

export class SimulationError extends Error {
  constructor(
    message: string,
    public readonly code: SimulationErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}

/**
 * Caller-supplied input is out of range or malformed
 */
export class ValidationFailure extends SimulationError {
  constructor(message: string, cause?: unknown) {
    super(message, 'VALIDATION', cause);
    this.name = 'ValidationFailure';
  }
}

export class NotFoundFailure extends SimulationError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundFailure';
  }
}

/**
 * The store rejected, timed out on, or returned an unreadable row
 */
export class PersistenceFailure extends SimulationError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE', cause);
    this.name = 'PersistenceFailure';
  }
}

export function isSimulationError(error: unknown): error is SimulationError {
  return error instanceof SimulationError;
}
