/**
 * Error Handling Middleware
 *
 * Centralized error handling that maps errors thrown from a command body
 * to the ephemeral reply shown to the invoking member. User errors are
 * "rejected"; anything unexpected is "failed" and logged at ERROR.
 */

import {
  ForbiddenError,
  NotFoundError,
  ParseError,
  StateValidationError,
  TransportError,
  UnconfiguredError,
  ValidationError,
} from '../models/errors';
import { errorMessage, log, LogLevel } from '../utils/logger';

export type CommandOutcome = 'ok' | 'rejected' | 'failed';

/**
 * Reply to a command, always ephemeral
 */
export interface CommandReply {
  content: string;
  outcome: CommandOutcome;
}

export const GENERIC_FAILURE = '❌ Something went wrong. Please try again later.';

/**
 * Handle error and format the reply
 *
 * - ValidationError: reason (the message already names expected formats)
 * - ForbiddenError: permission denied with the reason
 * - NotFoundError / UnconfiguredError: the message
 * - TransportError / ParseError: short reason from the standings source
 * - anything else: generic failure
 *
 * @example
 * ```typescript
 * try {
 *   // ... command body
 * } catch (error) {
 *   return handleCommandError(error, requestId);
 * }
 * ```
 */
export function handleCommandError(error: unknown, requestId: string): CommandReply {
  if (error instanceof ValidationError) {
    return { content: `❌ ${error.message}`, outcome: 'rejected' };
  }

  if (error instanceof ForbiddenError) {
    return { content: `⛔ Permission denied: ${error.message}`, outcome: 'rejected' };
  }

  if (error instanceof NotFoundError) {
    return { content: `❌ ${error.message}`, outcome: 'rejected' };
  }

  if (error instanceof UnconfiguredError) {
    return { content: `⚠️ ${error.message}`, outcome: 'rejected' };
  }

  if (error instanceof TransportError || error instanceof ParseError) {
    return { content: `❌ Could not read standings: ${error.message}`, outcome: 'failed' };
  }

  log(LogLevel.ERROR, 'Unhandled command error', {
    request_id: requestId,
    error_type: error instanceof Error ? error.name : typeof error,
    error: errorMessage(error),
    details: error instanceof StateValidationError ? error.details : undefined,
  });

  return { content: GENERIC_FAILURE, outcome: 'failed' };
}

/**
 * Wrap an async command body with error handling
 *
 * @example
 * ```typescript
 * const reply = await withErrorHandling(
 *   async () => `Scheduled ${match.id}`,
 *   requestId
 * );
 * ```
 */
export async function withErrorHandling(fn: () => Promise<string>, requestId: string): Promise<CommandReply> {
  try {
    return { content: await fn(), outcome: 'ok' };
  } catch (error) {
    return handleCommandError(error, requestId);
  }
}
