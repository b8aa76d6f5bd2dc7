export type RecommendationErrorCode =
  | 'not_found'
  | 'invalid_window'
  | 'invalid_override'
  | 'invalid_request'
  | 'internal_failure';

export class RecommendationError extends Error {
  constructor(
    readonly code: RecommendationErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends RecommendationError {
  constructor(readonly userId: string) {
    super('not_found', `User ${userId} not found`);
  }
}

export class InvalidWindowError extends RecommendationError {
  constructor(readonly windowDays: unknown) {
    super('invalid_window', `Window must be one of 30, 90 or 180 days (received ${String(windowDays)})`);
  }
}

export class InvalidOverrideError extends RecommendationError {
  constructor(message: string) {
    super('invalid_override', message);
  }
}

export class InvalidRequestError extends RecommendationError {
  constructor(message: string) {
    super('invalid_request', message);
  }
}

/** Carries no internal detail; the cause is logged where it is caught. */
export class RecommendationFailureError extends RecommendationError {
  constructor() {
    super('internal_failure', 'Unable to generate recommendations');
  }
}
