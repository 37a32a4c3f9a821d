/**
 * Standing Models
 *
 * Rows scraped from a league standings table and the rendered
 * leaderboard view built from them.
 */

/**
 * One ranked row of a standings table
 *
 * Every field except rank is kept as the source text; missing cells are
 * replaced with placeholders by the parser.
 */
export interface StandingsRow {
  rank: number;
  team: string;
  win_loss: string;
  games_won: string;
  games_lost: string;
  point_margin: string;
  games_behind: string;
}

/**
 * Placeholder shown for a blank cell
 */
export const PLACEHOLDER = '—';

/**
 * Rendered leaderboard for one league
 */
export interface StandingsView {
  fingerprint: string;   // SHA-256 over the full row sequence
  title: string;
  url: string;
  text: string;          // One line per displayed row
}

/**
 * Persisted per-league standings state
 */
export interface LeagueStandingsState {
  last_hash: string | null;
  message_id: string | null;
}
