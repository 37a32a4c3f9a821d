/**
 * State Store
 *
 * Owns the single persisted JSON document. The document is loaded and
 * validated once, held in memory, and rewritten as a whole on every
 * mutation (temp file + rename). Writes are chained so two saves never
 * interleave on disk; mutations themselves run synchronously on the
 * in-memory document, which keeps load-modify-save atomic on the single
 * event loop.
 */

import * as fs from 'fs';
import * as path from 'path';
import JSONbig from 'json-bigint';
import { mapMatchRecord } from '../models/match';
import {
  RawStateDocument,
  RawTenantState,
  StateDocument,
  TenantState,
  emptyStateDocument,
  emptyTenantState,
} from '../models/state';
import { StateValidationError } from '../models/errors';
import { validateStateDocument } from '../utils/state-validation';
import { errorMessage, log, LogLevel } from '../utils/logger';

export interface StateStoreOptions {
  /**
   * League that legacy single-league keys are migrated into
   */
  primaryLeagueKey: string;
}

type RawId = string | number;

// Snowflake ids written as bare numbers exceed 2^53; keep their digits as strings
const losslessJson = JSONbig({ storeAsString: true });

function isFileMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function idOrNull(value: RawId | null | undefined): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  const id = String(value).trim();
  return id === '' || id === '0' ? null : id;
}

function idMap(raw: Record<string, RawId> | undefined): Record<string, string> {
  const map: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw ?? {})) {
    const id = idOrNull(value);
    if (id) {
      map[key] = id;
    }
  }
  return map;
}

function normalizeTenant(raw: RawTenantState, primaryLeagueKey: string): TenantState {
  const tenant: TenantState = {
    ...emptyTenantState(),
    standings_channels: idMap(raw.standings_channels),
    schedule_channels: idMap(raw.schedule_channels),
    standings_message_ids: idMap(raw.standings_message_ids),
    schedule_message_ids: idMap(raw.schedule_message_ids),
    current_week: { ...(raw.current_week ?? {}) },
    logs_channel_id: idOrNull(raw.logs_channel_id),
    announcements_channel_id: idOrNull(raw.announcements_channel_id),
    last_week_rollover: raw.last_week_rollover ?? null,
    scheduler_enabled: raw.scheduler_enabled ?? true,
  };

  const legacyStandingsChannel = idOrNull(raw.standings_channel_id);
  if (legacyStandingsChannel && !tenant.standings_channels[primaryLeagueKey]) {
    tenant.standings_channels[primaryLeagueKey] = legacyStandingsChannel;
  }

  return tenant;
}

/**
 * Convert a validated on-disk document to the normalized shape
 *
 * Legacy global keys are folded into the primary league's section when
 * that section is empty.
 */
export function normalizeStateDocument(raw: RawStateDocument, options: StateStoreOptions): StateDocument {
  const document = emptyStateDocument();

  for (const [tenantId, tenant] of Object.entries(raw.guilds ?? {})) {
    document.guilds[tenantId] = normalizeTenant(tenant, options.primaryLeagueKey);
  }

  for (const [leagueKey, standings] of Object.entries(raw.standings ?? {})) {
    document.standings[leagueKey] = {
      last_hash: standings.last_hash ?? null,
      message_id: idOrNull(standings.message_id),
    };
  }

  const legacyHash = raw.last_hash ?? null;
  const legacyMessageId = idOrNull(raw.standings_message_id);
  if ((legacyHash || legacyMessageId) && !document.standings[options.primaryLeagueKey]) {
    document.standings[options.primaryLeagueKey] = {
      last_hash: legacyHash,
      message_id: legacyMessageId,
    };
  }

  document.scheduled_matches = (raw.scheduled_matches ?? []).map(mapMatchRecord);

  return document;
}

export class StateStore {
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private document: StateDocument = emptyStateDocument()
  ) {}

  /**
   * Load the document from disk
   *
   * A missing file yields an empty document.
   *
   * @throws StateValidationError when the file is not JSON or has an unknown shape
   */
  static async load(filePath: string, options: StateStoreOptions): Promise<StateStore> {
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isFileMissing(error)) {
        log(LogLevel.INFO, 'State file not found, starting empty', { state_path: filePath });
        return new StateStore(filePath);
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = text.trim() === '' ? {} : losslessJson.parse(text);
    } catch (error) {
      throw new StateValidationError('State document is not valid JSON', {
        document: errorMessage(error),
      });
    }

    const raw = validateStateDocument(parsed);
    return new StateStore(filePath, normalizeStateDocument(raw, options));
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Current document; callers must go through mutate() to change it
   */
  get state(): StateDocument {
    return this.document;
  }

  /**
   * Apply a change to the document and persist the whole document
   *
   * @returns Whatever the change function returns
   */
  async mutate<T>(change: (document: StateDocument) => T): Promise<T> {
    const result = change(this.document);
    await this.save();
    return result;
  }

  /**
   * Rewrite the whole document atomically
   */
  save(): Promise<void> {
    const write = this.pendingWrite.then(
      () => this.writeFile(),
      () => this.writeFile()
    );
    this.pendingWrite = write;
    return write;
  }

  private async writeFile(): Promise<void> {
    const directory = path.dirname(this.filePath);
    const tempPath = path.join(directory, `.${path.basename(this.filePath)}.${process.pid}.tmp`);

    await fs.promises.mkdir(directory, { recursive: true });
    await fs.promises.writeFile(tempPath, JSON.stringify(this.document, null, 2), 'utf-8');
    await fs.promises.rename(tempPath, this.filePath);
  }
}
