/**
 * League Models
 *
 * Static descriptors for the external competitions whose standings are
 * tracked. Built once from configuration at startup and never mutated.
 */

/**
 * League descriptor
 */
export interface League {
  key: string;                         // Stable storage key, e.g. "champion"
  name: string;                        // Display name
  standings_url: string;               // Source page; empty = inactive
  fallback_channel_id: string | null;  // League-level static channel, null = unset
}

/**
 * A league is active when it has a standings URL
 */
export function isActiveLeague(league: League): boolean {
  return league.standings_url.trim().length > 0;
}

/**
 * Organization affiliation: one team per league for an organization
 */
export interface OrgAffiliation {
  org_key: string;
  teams: Record<string, string>;       // league key -> team name
}
