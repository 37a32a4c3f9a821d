/**
 * State Document Validation Tests
 */

import { describe, it, expect } from '@jest/globals';
import { validateStateDocument } from '../../src/utils/state-validation';
import { StateValidationError } from '../../src/models/errors';

function validationDetails(data: unknown): Record<string, string> {
  try {
    validateStateDocument(data);
  } catch (error) {
    if (error instanceof StateValidationError) {
      return error.details;
    }
    throw error;
  }
  throw new Error('expected a StateValidationError');
}

describe('validateStateDocument', () => {
  it('should accept an empty document', () => {
    expect(validateStateDocument({})).toEqual({});
  });

  it('should accept legacy keys and numeric ids', () => {
    const doc = {
      guilds: { '100': { standings_channel_id: 123, current_week: { champion: 2 } } },
      standings: { champion: { last_hash: null, message_id: 456 } },
      last_hash: 'abc',
      standings_message_id: 789,
      scheduled_matches: [
        { id: 'a1b2c3', league: 'champion', team: 'Angels', opponent: 'Devils', scheduled_iso: '2026-01-15T02:30:00Z', guild_id: 100 },
      ],
    };

    expect(validateStateDocument(doc)).toBe(doc);
  });

  it('should reject an unknown top-level key', () => {
    expect(validationDetails({ guilds: {}, players: [] })).toEqual({ document: 'Unknown field: players' });
  });

  it('should reject a section of the wrong type', () => {
    expect(validationDetails({ scheduled_matches: {} })).toEqual({ scheduled_matches: 'Expected array' });
  });

  it('should report a match missing a required field', () => {
    const details = validationDetails({
      scheduled_matches: [{ id: 'A1B2C3', league: 'champion', team: 'Angels', opponent: 'Devils', guild_id: '100' }],
    });

    expect(details).toEqual({ 'scheduled_matches/0': 'Missing required field: scheduled_iso' });
  });

  it('should reject a malformed rollover date', () => {
    const details = validationDetails({ guilds: { '100': { last_week_rollover: 'monday' } } });

    expect(Object.keys(details)).toContain('guilds/100/last_week_rollover');
  });

  it('should throw StateValidationError with its message', () => {
    expect(() => validateStateDocument([])).toThrow(new StateValidationError('State document has an unknown shape'));
  });
});
