/**
 * State Document Validation
 *
 * Validates the persisted JSON document against a JSON schema using ajv
 * before the repositories touch it. Unknown top-level keys and sections of
 * the wrong type are rejected rather than silently dropped.
 */

import Ajv, { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import { RawStateDocument } from '../models/state';
import { StateValidationError } from '../models/errors';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
  coerceTypes: false,
});

// Format validators (date, date-time, ...)
addFormats(ajv);

const idSchema = { type: ['string', 'integer'] };
const nullableIdSchema = { type: ['string', 'integer', 'null'] };
const idMapSchema = { type: 'object', additionalProperties: idSchema };

const tenantSchema = {
  type: 'object',
  properties: {
    standings_channels: idMapSchema,
    schedule_channels: idMapSchema,
    standings_message_ids: idMapSchema,
    schedule_message_ids: idMapSchema,
    current_week: { type: 'object', additionalProperties: { type: 'integer', minimum: 1 } },
    logs_channel_id: nullableIdSchema,
    announcements_channel_id: nullableIdSchema,
    last_week_rollover: {
      anyOf: [{ type: 'string', format: 'date' }, { type: 'null' }],
    },
    scheduler_enabled: { type: 'boolean' },
    standings_channel_id: nullableIdSchema,
  },
  additionalProperties: false,
};

const leagueStandingsSchema = {
  type: 'object',
  properties: {
    last_hash: { type: ['string', 'null'] },
    message_id: nullableIdSchema,
  },
  additionalProperties: false,
};

const matchSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', minLength: 1 },
    league: { type: 'string', minLength: 1 },
    week: { type: 'integer', minimum: 1 },
    team: { type: 'string' },
    opponent: { type: 'string' },
    scheduled_iso: { type: 'string' },
    guild_id: idSchema,
    channel_id: nullableIdSchema,
    created_by: idSchema,
    reminders_sent: { type: 'object', additionalProperties: { type: 'boolean' } },
  },
  required: ['id', 'league', 'team', 'opponent', 'scheduled_iso', 'guild_id'],
};

const stateDocumentSchema = {
  type: 'object',
  properties: {
    guilds: { type: 'object', additionalProperties: tenantSchema },
    standings: { type: 'object', additionalProperties: leagueStandingsSchema },
    scheduled_matches: { type: 'array', items: matchSchema },
    last_hash: { type: ['string', 'null'] },
    standings_message_id: nullableIdSchema,
  },
  additionalProperties: false,
};

const validateDocument = ajv.compile<RawStateDocument>(stateDocumentSchema);

/**
 * Format ajv validation errors into path-specific error details
 */
function formatValidationErrors(errors: ErrorObject[]): Record<string, string> {
  const details: Record<string, string> = {};

  for (const error of errors) {
    const field = error.instancePath ? error.instancePath.substring(1) : 'document';

    let message = error.message || 'Validation failed';

    if (error.keyword === 'required') {
      message = `Missing required field: ${String(error.params.missingProperty)}`;
    } else if (error.keyword === 'type') {
      message = `Expected ${String(error.params.type)}`;
    } else if (error.keyword === 'format') {
      message = `Invalid format, expected ${String(error.params.format)}`;
    } else if (error.keyword === 'additionalProperties') {
      message = `Unknown field: ${String(error.params.additionalProperty)}`;
    } else if (error.keyword === 'minimum') {
      message = `Must be >= ${String(error.params.limit)}`;
    }

    details[field] = message;
  }

  return details;
}

/**
 * Validate a parsed state document
 *
 * @returns The document, typed as the on-disk shape
 * @throws StateValidationError with path-specific details
 */
export function validateStateDocument(data: unknown): RawStateDocument {
  if (validateDocument(data)) {
    return data;
  }

  throw new StateValidationError(
    'State document has an unknown shape',
    formatValidationErrors(validateDocument.errors ?? [])
  );
}
