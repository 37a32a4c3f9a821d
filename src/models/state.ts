/**
 * State Document Models
 *
 * Shape of the single JSON document that persists tenant configuration,
 * per-league standings state and the scheduled match list.
 *
 * Raw* types describe what may be found on disk (older documents used
 * numeric identifiers and a few legacy keys); the normalized types are what
 * the repositories work with.
 */

import { LeagueStandingsState } from './standing';
import { Match, MatchRecord } from './match';

type RawId = string | number;

/**
 * Tenant section as found on disk
 */
export interface RawTenantState {
  standings_channels?: Record<string, RawId>;
  schedule_channels?: Record<string, RawId>;
  standings_message_ids?: Record<string, RawId>;
  schedule_message_ids?: Record<string, RawId>;
  current_week?: Record<string, number>;
  logs_channel_id?: RawId | null;
  announcements_channel_id?: RawId | null;
  last_week_rollover?: string | null;
  scheduler_enabled?: boolean;
  standings_channel_id?: RawId | null;     // legacy single standings channel
}

/**
 * Per-league standings section as found on disk
 */
export interface RawLeagueStandingsState {
  last_hash?: string | null;
  message_id?: RawId | null;
}

/**
 * State document as found on disk
 */
export interface RawStateDocument {
  guilds?: Record<string, RawTenantState>;
  standings?: Record<string, RawLeagueStandingsState>;
  scheduled_matches?: MatchRecord[];
  last_hash?: string | null;               // legacy global fingerprint
  standings_message_id?: RawId | null;     // legacy global message id
}

/**
 * Tenant configuration (normalized)
 */
export interface TenantState {
  standings_channels: Record<string, string>;
  schedule_channels: Record<string, string>;
  standings_message_ids: Record<string, string>;
  schedule_message_ids: Record<string, string>;
  current_week: Record<string, number>;
  logs_channel_id: string | null;
  announcements_channel_id: string | null;
  last_week_rollover: string | null;
  scheduler_enabled: boolean;
}

/**
 * State document (normalized)
 */
export interface StateDocument {
  guilds: Record<string, TenantState>;
  standings: Record<string, LeagueStandingsState>;
  scheduled_matches: Match[];
}

/**
 * Defaults for a tenant with no stored configuration
 */
export function emptyTenantState(): TenantState {
  return {
    standings_channels: {},
    schedule_channels: {},
    standings_message_ids: {},
    schedule_message_ids: {},
    current_week: {},
    logs_channel_id: null,
    announcements_channel_id: null,
    last_week_rollover: null,
    scheduler_enabled: true,
  };
}

export function emptyStateDocument(): StateDocument {
  return {
    guilds: {},
    standings: {},
    scheduled_matches: [],
  };
}

/**
 * Channel roles a tenant can bind
 */
export type ChannelKind = 'standings' | 'schedule' | 'logs' | 'announcements';

/**
 * Resource a channel binding applies to: `standings:<league>`,
 * `schedule:<league>`, `logs` or `announcements`
 */
export interface ChannelTarget {
  kind: ChannelKind;
  league_key?: string;
}
