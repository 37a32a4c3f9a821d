/**
 * Match Models
 *
 * Type definitions for user-scheduled matches and their reminder state.
 * Matches live in one global list in the state document and are filtered
 * by tenant at read time.
 */

/**
 * Reminder lead times, longest first
 */
export const REMINDER_THRESHOLDS = [
  { label: '24h', lead_ms: 24 * 60 * 60 * 1000 },
  { label: '1h', lead_ms: 60 * 60 * 1000 },
] as const;

export type ReminderLabel = (typeof REMINDER_THRESHOLDS)[number]['label'];

/**
 * Scheduled match
 */
export interface Match {
  id: string;                               // 6 uppercase hex characters
  league: string;                           // League key
  week: number;                             // Tenant+league week at creation
  team: string;
  opponent: string;
  scheduled_iso: string;                    // ISO-8601 with zone
  guild_id: string;                         // Tenant identifier
  channel_id?: string;                      // Channel the match was scheduled from
  created_by: string;                       // User identifier
  reminders_sent: Record<string, boolean>;  // Threshold label -> sent
}

/**
 * Match record as found in the state document
 *
 * Older documents stored identifiers as numbers.
 */
export interface MatchRecord {
  id: string;
  league: string;
  week?: number;
  team: string;
  opponent: string;
  scheduled_iso: string;
  guild_id: string | number;
  channel_id?: string | number | null;
  created_by?: string | number;
  reminders_sent?: Record<string, boolean>;
}

/**
 * Convert stored record to Match model
 */
export function mapMatchRecord(record: MatchRecord): Match {
  const match: Match = {
    id: record.id.trim().toUpperCase(),
    league: record.league.trim().toLowerCase(),
    week: record.week ?? 1,
    team: record.team,
    opponent: record.opponent,
    scheduled_iso: record.scheduled_iso,
    guild_id: String(record.guild_id),
    created_by: record.created_by === undefined ? '' : String(record.created_by),
    reminders_sent: { ...(record.reminders_sent ?? {}) },
  };

  if (record.channel_id !== undefined && record.channel_id !== null && String(record.channel_id) !== '0') {
    match.channel_id = String(record.channel_id);
  }

  return match;
}

/**
 * Parse the scheduled time of a match
 *
 * @returns Date, or null when the stored timestamp is unparseable
 */
export function scheduledTime(match: Pick<Match, 'scheduled_iso'>): Date | null {
  const ms = Date.parse(match.scheduled_iso);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Parameters for scheduling a match
 */
export interface CreateMatchParams {
  league: string;
  team: string;
  opponent: string;
  scheduled_at: Date;
  tenant_id: string;
  channel_id?: string;
  created_by: string;
  week: number;
}
