/**
 * Application Error Models
 *
 * Error types shared by the polling pipeline, the match scheduler and the
 * command handlers. Command errors are mapped to ephemeral replies by the
 * error handling middleware; poll and reminder errors are logged at the
 * per-league / per-match boundary.
 */

/**
 * HTTP fetch failure (network error or status >= 400)
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public url: string,
    public status?: number,
    public excerpt?: string
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * Markup did not yield a usable standings table
 */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Malformed user input (date/time tokens, unknown league, bad week)
 */
export class ValidationError extends Error {
  constructor(message: string, public details?: Record<string, string>) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * No destination channel is bound for the requested league/tenant
 */
export class UnconfiguredError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnconfiguredError';
  }
}

/**
 * Resource not found (match id, message, channel)
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Member lacks the role or permission a command requires
 */
export class ForbiddenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ForbiddenError';
  }
}

/**
 * Persisted state document has a shape we do not understand
 */
export class StateValidationError extends Error {
  constructor(message: string, public details: Record<string, string> = {}) {
    super(message);
    this.name = 'StateValidationError';
  }
}
