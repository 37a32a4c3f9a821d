/**
 * Standings Rendering
 *
 * Builds the leaderboard view and the content fingerprint used to skip
 * no-op polls. The fingerprint covers every parsed row, not only the
 * displayed ones, so a change below the cut still republishes.
 */

import { createHash } from 'crypto';
import { EmbedPayload } from '../models/messaging';
import { PLACEHOLDER, StandingsRow, StandingsView } from '../models/standing';

/**
 * Rows shown in the leaderboard
 */
export const DEFAULT_TOP_N = 12;

const STANDINGS_COLOR = 0x3498db;

/**
 * SHA-256 over a canonical serialization of the rows
 *
 * Each row is serialized as a fixed-order array so the digest does not
 * depend on object key order.
 */
export function fingerprintRows(rows: StandingsRow[]): string {
  const canonical = JSON.stringify(
    rows.map((r) => [r.rank, r.team, r.win_loss, r.games_won, r.games_lost, r.point_margin, r.games_behind])
  );
  return createHash('sha256').update(canonical, 'utf8').digest('hex');
}

/**
 * One leaderboard line: rank, team, win-loss and games behind
 */
export function formatStandingsLine(row: StandingsRow): string {
  const winLoss = row.win_loss.trim() || PLACEHOLDER;
  const behind = row.games_behind.trim();
  const gamesBehind = behind === '' || behind === PLACEHOLDER ? '-' : behind;
  return `**${row.rank}. ${row.team}**  •  \`${winLoss}\`  •  \`GB ${gamesBehind}\``;
}

/**
 * Render the leaderboard view for a league
 */
export function renderStandings(
  rows: StandingsRow[],
  url: string,
  leagueName: string,
  topN: number = DEFAULT_TOP_N
): StandingsView {
  const lines = rows.slice(0, topN).map(formatStandingsLine);

  return {
    fingerprint: fingerprintRows(rows),
    title: `🏆 ${leagueName} Standings`,
    url,
    text: lines.length > 0 ? lines.join('\n\n') : PLACEHOLDER,
  };
}

/**
 * Card payload for a standings view
 */
export function standingsEmbed(view: StandingsView, now: Date = new Date()): EmbedPayload {
  return {
    title: view.title,
    description: view.text,
    url: view.url,
    color: STANDINGS_COLOR,
    footer: 'Standings update automatically',
    timestamp: now.toISOString(),
  };
}
