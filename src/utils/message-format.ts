/**
 * Message Formatting
 *
 * Text for schedule boards, reminders and audit lines.
 */

import { EmbedPayload, RoleRef } from '../models/messaging';
import { Match, scheduledTime } from '../models/match';

const SCHEDULE_COLOR = 0x2ecc71;

export const EMPTY_SCHEDULE_TEXT = '_No matches scheduled._';

/**
 * Platform timestamp markup (rendered in each reader's local time)
 *
 * @param style - F = full date/time, R = relative
 */
export function platformTimestamp(date: Date, style: 'F' | 'R' | 'f' | 't' = 'F'): string {
  return `<t:${Math.floor(date.getTime() / 1000)}:${style}>`;
}

/**
 * Mention for a role name, or the name itself when no role matches
 *
 * Matching is case-insensitive and exact after trimming.
 */
export function roleMention(roles: RoleRef[], roleName: string): string {
  const wanted = roleName.trim().toLowerCase();
  if (!wanted) {
    return roleName;
  }
  const role = roles.find((r) => r.name.trim().toLowerCase() === wanted);
  return role ? `<@&${role.id}>` : roleName;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * One schedule board line
 */
export function formatScheduleLine(match: Match): string {
  const when = scheduledTime(match);
  const time = when ? platformTimestamp(when) : match.scheduled_iso;
  return `• **${match.team}** vs **${match.opponent}** — ${time} (\`${match.id}\`)`;
}

/**
 * Sort matches by scheduled time; unparseable times go last
 */
export function sortByScheduledTime(matches: Match[]): Match[] {
  const time = (m: Match): number => scheduledTime(m)?.getTime() ?? Number.POSITIVE_INFINITY;
  return [...matches].sort((a, b) => time(a) - time(b));
}

/**
 * Schedule board card for one league
 */
export function scheduleEmbed(leagueName: string, matches: Match[], now: Date = new Date()): EmbedPayload {
  const lines = sortByScheduledTime(matches).map(formatScheduleLine);

  return {
    title: `📅 ${capitalize(leagueName)} Schedule`,
    description: lines.length > 0 ? lines.join('\n') : EMPTY_SCHEDULE_TEXT,
    color: SCHEDULE_COLOR,
    timestamp: now.toISOString(),
  };
}

/**
 * Reminder text for one threshold
 */
export function formatReminder(params: {
  label: string;
  match: Match;
  when: Date;
  teamMention: string;
  opponentMention: string;
}): string {
  const { label, match, when } = params;
  return [
    `⏰ **Match Reminder (${label})** — \`${match.league}\` — ID \`${match.id}\``,
    `${params.teamMention} vs ${params.opponentMention}`,
    `When: ${platformTimestamp(when, 'F')} (${platformTimestamp(when, 'R')})`,
  ].join('\n');
}

/**
 * Line listing a match for the invoking member
 */
export function formatMatchSummary(match: Match): string {
  const when = scheduledTime(match);
  const time = when ? platformTimestamp(when) : match.scheduled_iso;
  return `\`${match.id}\` · Week ${match.week} · **${match.team}** vs **${match.opponent}** — ${time}`;
}
