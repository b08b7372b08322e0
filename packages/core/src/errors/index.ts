/**
 * Custom Error Classes
 *
 * Expected resource pack problems are reported as PackIssue values
 * (see ../issues.ts). These classes cover bad input and broken invariants.
 */

import type { RunState } from '../stateMachine.js';

/**
 * Base error class for all pack-doctor errors
 */
export class PackDoctorError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PackDoctorError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid options or configuration values
 */
export class ValidationError extends PackDoctorError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid run state changes
 */
export class StateTransitionError extends PackDoctorError {
  constructor(
    fromState: RunState,
    toState: RunState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}
