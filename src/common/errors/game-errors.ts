// Engine error taxonomy: every operation-level rejection is a GameError

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

/** Malformed or missing input, rejected before any mutation */
export class ValidationError extends GameError {
  constructor(message = 'Validation failed', details?: Record<string, unknown>) {
    super('VALIDATION_FAILED', message, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
    this.name = 'NotFoundError';
  }
}

export type StateConflictCode =
  | 'BATTLE_ALREADY_ACTIVE'
  | 'NO_ACTIVE_BATTLE'
  | 'ACTOR_DEFEATED'
  | 'STATE_CONFLICT';

export class StateConflictError extends GameError {
  constructor(
    code: StateConflictCode = 'STATE_CONFLICT',
    message = 'State conflict',
    details?: Record<string, unknown>,
  ) {
    super(code, message, details);
    this.name = 'StateConflictError';
  }
}

export class InvalidConfigError extends GameError {
  constructor(message = 'Invalid configuration', details?: Record<string, unknown>) {
    super('INVALID_CONFIG', message, details);
    this.name = 'InvalidConfigError';
  }
}
