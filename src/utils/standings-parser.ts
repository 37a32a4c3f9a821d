/**
 * Standings Parser
 *
 * Turns a third-party standings page into ranked rows. The page has no
 * stable schema, so the parser works in three steps:
 *
 * 1. Pick the table with the most rows and flatten it into text cells.
 * 2. Resolve column positions with the first strategy that succeeds
 *    (header keywords, then fixed positions).
 * 3. Extract every row whose first cell is a rank, substituting
 *    placeholders for blank cells, and sort by rank.
 */

import * as cheerio from 'cheerio';
import { ParseError } from '../models/errors';
import { PLACEHOLDER, StandingsRow } from '../models/standing';

/**
 * Flattened table row
 */
export interface TableRow {
  header_cell_count: number;   // <th> cells in the row
  cells: string[];             // <th> and <td> text, document order
  data_cells: string[];        // <td> text only
}

export interface TableModel {
  rows: TableRow[];
}

/**
 * Column positions within data cells
 */
export interface ColumnLayout {
  strategy: string;
  team: number;
  win_loss: number;
  games_won: number;
  games_lost: number;
  point_margin: number;
  games_behind: number;
  first_data_row: number;      // Index of the first row to extract
  min_cells: number;           // Rows with fewer data cells are skipped
}

/**
 * Column resolution strategy
 */
export interface ColumnStrategy {
  readonly name: string;
  resolve(table: TableModel): ColumnLayout | null;
}

/**
 * Rows scanned when looking for a header
 */
const HEADER_SCAN_ROWS = 12;

/**
 * Tokens that mark a data row as a header when two or more cells carry one
 */
const HEADER_TOKENS = ['TEAM', 'W-L', 'GAMES', 'GB', 'PTS'];

const TEAM_NAMES = ['TEAM'];
const WIN_LOSS_NAMES = ['W-L', 'W – L', 'W/L'];
const GAMES_WON_NAMES = ['GAMES WON', 'WON'];
const GAMES_LOST_NAMES = ['GAMES LOST', 'LOST'];
const POINT_MARGIN_NAMES = ['+/-', '+/−', '+−', 'DIFF'];
const GAMES_BEHIND_NAMES = ['GB'];

/**
 * Locate the header row and resolve every column by keyword
 *
 * Returns null when no header is found or any column keyword is missing.
 */
export class HeaderKeywordStrategy implements ColumnStrategy {
  readonly name = 'header-keywords';

  resolve(table: TableModel): ColumnLayout | null {
    const header = this.findHeader(table);
    if (!header) {
      return null;
    }

    const column = (names: string[]): number => {
      return header.labels.findIndex((label) => names.some((n) => label.includes(n)));
    };

    const layout = {
      team: column(TEAM_NAMES),
      win_loss: column(WIN_LOSS_NAMES),
      games_won: column(GAMES_WON_NAMES),
      games_lost: column(GAMES_LOST_NAMES),
      point_margin: column(POINT_MARGIN_NAMES),
      games_behind: column(GAMES_BEHIND_NAMES),
    };

    if (Object.values(layout).some((index) => index === -1)) {
      return null;
    }

    return {
      strategy: this.name,
      ...layout,
      first_data_row: header.index + 1,
      min_cells: 0,
    };
  }

  private findHeader(table: TableModel): { index: number; labels: string[] } | null {
    const scanned = table.rows.slice(0, HEADER_SCAN_ROWS);

    for (let i = 0; i < scanned.length; i++) {
      const row = scanned[i];

      if (row.header_cell_count > 0) {
        return { index: i, labels: row.cells.map((c) => c.toUpperCase()) };
      }

      const labels = row.data_cells.map((c) => c.toUpperCase());
      if (labels.length === 0) {
        continue;
      }

      const hits = labels.filter((label) => HEADER_TOKENS.some((token) => label.includes(token))).length;
      if (hits >= 2) {
        return { index: i, labels };
      }
    }

    return null;
  }
}

/**
 * Fixed column positions used when the header cannot be resolved
 */
export class FixedPositionStrategy implements ColumnStrategy {
  readonly name = 'fixed-positions';

  resolve(): ColumnLayout {
    return {
      strategy: this.name,
      team: 1,
      win_loss: 2,
      games_won: 3,
      games_lost: 4,
      point_margin: 5,
      games_behind: 7,
      first_data_row: 0,
      min_cells: 8,
    };
  }
}

export const DEFAULT_STRATEGIES: ColumnStrategy[] = [new HeaderKeywordStrategy(), new FixedPositionStrategy()];

/**
 * Detect a bot-protection challenge page
 */
export function isChallengePage(html: string): boolean {
  const lowered = html.toLowerCase();
  return (
    lowered.includes('cloudflare') &&
    (lowered.includes('attention required') || lowered.includes('verify you are human'))
  );
}

function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Flatten the table with the most rows into text cells
 *
 * Ties go to the table that appears first. Cell text is the trimmed text
 * of every descendant joined by single spaces.
 *
 * @returns null when the page has no table
 */
export function extractLargestTable(html: string): TableModel | null {
  const $ = cheerio.load(html);

  // Keep words in adjacent child elements apart once text is concatenated
  $('td *, th *').each((_, el) => {
    $(el).prepend(' ').append(' ');
  });

  const tables = $('table').toArray();
  if (tables.length === 0) {
    return null;
  }

  let largest = tables[0];
  let largestCount = $(largest).find('tr').length;
  for (const table of tables.slice(1)) {
    const count = $(table).find('tr').length;
    if (count > largestCount) {
      largest = table;
      largestCount = count;
    }
  }

  const rows = $(largest)
    .find('tr')
    .toArray()
    .map((tr) => ({
      header_cell_count: $(tr).find('th').length,
      cells: $(tr)
        .find('th, td')
        .toArray()
        .map((cell) => normalizeText($(cell).text())),
      data_cells: $(tr)
        .find('td')
        .toArray()
        .map((cell) => normalizeText($(cell).text())),
    }));

  return { rows };
}

function isPlaceholder(value: string): boolean {
  return value === '' || value === PLACEHOLDER;
}

function cellAt(cells: string[], index: number, fallback: string): string {
  const value = index >= 0 && index < cells.length ? cells[index].trim() : '';
  return isPlaceholder(value) ? fallback : value;
}

/**
 * Extract ranked rows using a resolved layout
 */
export function extractRows(table: TableModel, layout: ColumnLayout): StandingsRow[] {
  const parsed: StandingsRow[] = [];

  for (const row of table.rows.slice(layout.first_data_row)) {
    const cells = row.data_cells;
    if (cells.length === 0 || cells.length < layout.min_cells) {
      continue;
    }

    const rankRaw = cells[0].trim();
    if (!/^\d+$/.test(rankRaw)) {
      continue;
    }

    parsed.push({
      rank: parseInt(rankRaw, 10),
      team: cellAt(cells, layout.team, PLACEHOLDER),
      win_loss: cellAt(cells, layout.win_loss, PLACEHOLDER),
      games_won: cellAt(cells, layout.games_won, '0'),
      games_lost: cellAt(cells, layout.games_lost, '0'),
      point_margin: cellAt(cells, layout.point_margin, '0'),
      games_behind: cellAt(cells, layout.games_behind, '-'),
    });
  }

  return parsed.sort((a, b) => a.rank - b.rank);
}

/**
 * Parse a standings page
 *
 * @throws ParseError for challenge pages, pages without a table, empty
 * tables, and tables where no row carries a rank
 */
export function parseStandings(html: string, strategies: ColumnStrategy[] = DEFAULT_STRATEGIES): StandingsRow[] {
  if (isChallengePage(html)) {
    throw new ParseError('Blocked by bot protection (challenge page).');
  }

  const table = extractLargestTable(html);
  if (!table) {
    throw new ParseError('No standings table found.');
  }

  if (table.rows.length === 0) {
    throw new ParseError('Standings table has no rows.');
  }

  let rows: StandingsRow[] = [];
  for (const strategy of strategies) {
    const layout = strategy.resolve(table);
    if (layout) {
      rows = extractRows(table, layout);
      break;
    }
  }

  if (rows.length === 0) {
    throw new ParseError('No team rows parsed from standings (table structure may have changed).');
  }

  return rows;
}
