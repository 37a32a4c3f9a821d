/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * All configuration values should be accessed through this module.
 * `.env` is loaded by the entry point before anything here runs.
 */

import * as fs from 'fs';
import { errorMessage, log, LogLevel } from '../utils/logger';

export interface EnvironmentConfig {
  // Platform configuration
  discordToken: string;
  guildId: string | null;
  pollSeconds: number;

  // Standings sources
  championStandingsUrl: string;
  challengerStandingsUrl: string;

  // League fallback channels
  championStandingsChannelId: string | null;
  challengerStandingsChannelId: string | null;

  // Permissions
  bypassSchedulerPermissions: boolean;
  devUserIds: string[];
  commissionerRoles: string[];
  gmRoles: string[];
  orgGmRole: string;
  gmOrgMapPath: string;
  gmOrgMap: Record<string, string>;

  // Application configuration
  leagueTimeZone: string;
  statePath: string;
  weekRolloverDay: number | null;
  logLevel: string;
}

const DEFAULT_POLL_SECONDS = 180;
const MIN_POLL_SECONDS = 30;
const DEFAULT_TIME_ZONE = 'America/New_York';

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback = ''): string {
  return (env[name] ?? fallback).trim();
}

function readInt(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (!raw) {
    return fallback;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`${name} must be an integer (got "${raw}")`);
  }
  return parseInt(raw, 10);
}

/**
 * Snowflake-style id; empty, "standby" or non-numeric means unset
 */
function readOptionalId(env: Env, name: string): string | null {
  const raw = readString(env, name);
  if (!raw || raw.toLowerCase() === 'standby' || !/^\d+$/.test(raw) || /^0+$/.test(raw)) {
    return null;
  }
  return raw;
}

function readBool(env: Env, name: string): boolean {
  return ['1', 'true', 'yes', 'y', 'on'].includes(readString(env, name).toLowerCase());
}

function readLowerList(env: Env, name: string, fallback: string): string[] {
  return readString(env, name, fallback)
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

function readIdList(env: Env, name: string): string[] {
  return readString(env, name)
    .split(',')
    .map((item) => item.trim())
    .filter((item) => /^\d+$/.test(item));
}

/**
 * Resolve an IANA zone name, falling back to UTC when the runtime rejects it
 */
export function resolveTimeZone(name: string): string {
  const zone = name.trim() || DEFAULT_TIME_ZONE;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return zone;
  } catch {
    return 'UTC';
  }
}

function readWeekday(env: Env, name: string): number | null {
  const raw = readString(env, name).toLowerCase();
  if (!raw) {
    return null;
  }
  const index = WEEKDAYS.indexOf(raw);
  if (index === -1) {
    throw new Error(`${name} must be a weekday name (got "${raw}")`);
  }
  return index;
}

/**
 * Load the user-id -> organization map
 *
 * A missing or unreadable file yields an empty map.
 */
export function loadGmOrgMap(path: string): Record<string, string> {
  let parsed: unknown;
  try {
    if (!fs.existsSync(path)) {
      return {};
    }
    parsed = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (error) {
    log(LogLevel.WARN, 'GM organization map unreadable, ignoring it', {
      path,
      error: errorMessage(error),
    });
    return {};
  }

  const map: Record<string, string> = {};
  if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
    for (const [userId, org] of Object.entries(parsed)) {
      if (/^\d+$/.test(userId) && typeof org === 'string' && org.trim()) {
        map[userId] = org.trim().toLowerCase();
      }
    }
  }
  return map;
}

/**
 * Load and validate environment configuration
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  const gmOrgMapPath = readString(env, 'GM_ORG_MAP_PATH', 'gm_orgs.json');

  return {
    discordToken: readString(env, 'DISCORD_TOKEN'),
    guildId: readOptionalId(env, 'GUILD_ID'),
    pollSeconds: readInt(env, 'POLL_SECONDS', DEFAULT_POLL_SECONDS),
    championStandingsUrl: readString(env, 'STANDINGS_URL'),
    challengerStandingsUrl: readString(env, 'CHALLENGER_STANDINGS_URL'),
    championStandingsChannelId: readOptionalId(env, 'CHAMPION_STANDINGS_CHANNEL_ID'),
    challengerStandingsChannelId: readOptionalId(env, 'CHALLENGER_STANDINGS_CHANNEL_ID'),
    bypassSchedulerPermissions: readBool(env, 'BYPASS_SCHEDULER_PERMISSIONS'),
    devUserIds: readIdList(env, 'DEV_USER_IDS'),
    commissionerRoles: readLowerList(env, 'COMMISSIONER_ROLES', 'Commissioner'),
    gmRoles: readLowerList(env, 'GM_ROLES', 'GM'),
    orgGmRole: readString(env, 'ORG_GM_ROLE', 'Org GM').toLowerCase(),
    gmOrgMapPath,
    gmOrgMap: loadGmOrgMap(gmOrgMapPath),
    leagueTimeZone: resolveTimeZone(readString(env, 'LEAGUE_TZ', DEFAULT_TIME_ZONE)),
    statePath: readString(env, 'STATE_PATH', 'state.json'),
    weekRolloverDay: readWeekday(env, 'WEEK_ROLLOVER_DAY'),
    logLevel: readString(env, 'LOG_LEVEL', 'info').toLowerCase(),
  };
}

/**
 * Validate that all required environment variables are set
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const requiredFields: { field: keyof EnvironmentConfig; variable: string }[] = [
    { field: 'discordToken', variable: 'DISCORD_TOKEN' },
    { field: 'championStandingsUrl', variable: 'STANDINGS_URL' },
  ];

  const missing = requiredFields.filter(({ field }) => !config[field]).map(({ variable }) => variable);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  if (config.pollSeconds < MIN_POLL_SECONDS) {
    throw new Error(`POLL_SECONDS must be at least ${MIN_POLL_SECONDS} seconds`);
  }
}
