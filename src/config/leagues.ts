/**
 * League Configuration
 *
 * Static league descriptors and the organization affiliation table.
 */

import { EnvironmentConfig } from './environment';
import { League, OrgAffiliation, isActiveLeague } from '../models/league';
import { ValidationError } from '../models/errors';

export const CHAMPION = 'champion';
export const CHALLENGER = 'challenger';

/**
 * Organization -> [Champion team, Challenger team]
 */
const ORG_AFFILIATIONS: Record<string, [string, string]> = {
  angels: ['Angels', 'Saints'],
  devils: ['Devils', 'Demons'],
  dragons: ['Dragons', 'Dracos'],
  reapers: ['Reapers', 'Ghouls'],
  lumberjacks: ['Lumberjacks', 'Miners'],
  tigers: ['Tigers', 'Panthers'],
  ninjas: ['Ninjas', 'Samurais'],
  orcas: ['Orcas', 'Sharks'],
  rockets: ['Rockets', 'Astronauts'],
  spartans: ['Spartans', 'Warriors'],
};

/**
 * Build league descriptors from configuration
 */
export function getLeagues(
  config: Pick<
    EnvironmentConfig,
    | 'championStandingsUrl'
    | 'challengerStandingsUrl'
    | 'championStandingsChannelId'
    | 'challengerStandingsChannelId'
  >
): League[] {
  return [
    {
      key: CHAMPION,
      name: 'Champion',
      standings_url: config.championStandingsUrl,
      fallback_channel_id: config.championStandingsChannelId,
    },
    {
      key: CHALLENGER,
      name: 'Challenger',
      standings_url: config.challengerStandingsUrl,
      fallback_channel_id: config.challengerStandingsChannelId,
    },
  ];
}

export function activeLeagues(leagues: League[]): League[] {
  return leagues.filter(isActiveLeague);
}

/**
 * Find an active league by key or display name (case-insensitive)
 *
 * @throws ValidationError naming the known leagues
 */
export function findLeague(leagues: League[], value: string): League {
  const wanted = value.trim().toLowerCase();
  const active = activeLeagues(leagues);
  const league = active.find(
    (l) => l.key.toLowerCase() === wanted || l.name.toLowerCase() === wanted
  );

  if (!league) {
    const known = active.map((l) => l.name).join(', ') || 'none';
    throw new ValidationError(`Unknown league '${value}'. Known leagues: ${known}.`, {
      league: value,
    });
  }

  return league;
}

/**
 * Affiliation table as records keyed by league
 */
export function getOrgAffiliations(): OrgAffiliation[] {
  return Object.entries(ORG_AFFILIATIONS).map(([orgKey, [championTeam, challengerTeam]]) => ({
    org_key: orgKey,
    teams: { [CHAMPION]: championTeam, [CHALLENGER]: challengerTeam },
  }));
}

/**
 * Team an organization fields in a league, if any
 */
export function teamForOrg(orgKey: string, leagueKey: string): string | null {
  const affiliation = getOrgAffiliations().find((a) => a.org_key === orgKey.trim().toLowerCase());
  return affiliation?.teams[leagueKey] ?? null;
}
