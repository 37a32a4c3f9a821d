/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the poll loop, the reminder sweep and command handling. Every entry
 * carries a timestamp and level; context objects are scrubbed of secrets
 * before they are written.
 */

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

let minimumLevel: LogLevel = LogLevel.INFO;

/**
 * Set the minimum level written; unknown names leave it unchanged
 */
export function setLogLevel(level: string): void {
  const match = Object.values(LogLevel).find((l) => l === level.trim().toUpperCase());
  if (match) {
    minimumLevel = match;
  }
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  request_id?: string;
  tenant_id?: string;
  user_id?: string;
}

/**
 * Slash command log entry
 */
interface CommandLogEntry extends BaseLogEntry {
  log_type: 'COMMAND';
  command: string;
  outcome: 'ok' | 'rejected' | 'failed';
  latency_ms: number;
  reason?: string;
}

/**
 * Authorization log entry
 */
interface AuthorizationLogEntry extends BaseLogEntry {
  log_type: 'AUTHORIZATION';
  success: boolean;
  command: string;
  reason?: string;
  user_roles?: string[];
}

/**
 * Standings poll log entry
 */
interface PollLogEntry extends BaseLogEntry {
  log_type: 'STANDINGS_POLL';
  tick_id?: string;
  league: string;
  outcome: 'unchanged' | 'published' | 'failed' | 'unconfigured';
  fingerprint?: string;
  message_id?: string;
  error?: string;
}

/**
 * Secret-bearing field names
 */
const SECRET_FIELDS = ['token', 'discord_token', 'authorization', 'password', 'secret', 'api_key'];

/**
 * Bot-token shaped strings (three dot-separated base64url segments)
 */
const TOKEN_PATTERN = /[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]{6,}\.[A-Za-z0-9_-]{20,}/g;

function sanitizeString(value: string): string {
  return value.replace(TOKEN_PATTERN, '[TOKEN_REDACTED]');
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value && typeof value === 'object' && !(value instanceof Date)) {
    return sanitizeObject(value);
  }
  return value;
}

/**
 * Sanitize object by redacting secret fields and token patterns
 */
function sanitizeObject(obj: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[REDACTED]';
      continue;
    }
    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

/**
 * Write log entry to stdout (stderr for errors)
 */
function writeLog(entry: BaseLogEntry & object): void {
  if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minimumLevel]) {
    return;
  }
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Log a slash command invocation
 *
 * @example
 * ```typescript
 * logCommand({
 *   requestId: 'abc-123',
 *   command: 'schedule',
 *   tenantId: '1000',
 *   userId: '2000',
 *   outcome: 'ok',
 *   latencyMs: 45
 * });
 * ```
 */
export function logCommand(params: {
  requestId: string;
  command: string;
  tenantId: string;
  userId: string;
  outcome: 'ok' | 'rejected' | 'failed';
  latencyMs: number;
  reason?: string;
}): void {
  const entry: CommandLogEntry = {
    timestamp: new Date().toISOString(),
    level:
      params.outcome === 'failed' ? LogLevel.ERROR : params.outcome === 'rejected' ? LogLevel.WARN : LogLevel.INFO,
    log_type: 'COMMAND',
    request_id: params.requestId,
    tenant_id: params.tenantId,
    user_id: params.userId,
    command: params.command,
    outcome: params.outcome,
    latency_ms: params.latencyMs,
    reason: params.reason === undefined ? undefined : sanitizeString(params.reason),
  };

  writeLog(entry);
}

/**
 * Log a permission check
 *
 * Denials are logged at WARN with the member's role names.
 */
export function logAuthorization(params: {
  requestId?: string;
  tenantId: string;
  userId: string;
  success: boolean;
  command: string;
  reason?: string;
  userRoles?: string[];
}): void {
  const entry: AuthorizationLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.WARN,
    log_type: 'AUTHORIZATION',
    request_id: params.requestId,
    tenant_id: params.tenantId,
    user_id: params.userId,
    success: params.success,
    command: params.command,
    reason: params.reason,
    user_roles: params.userRoles,
  };

  writeLog(entry);
}

/**
 * Log the outcome of one league in a standings poll
 */
export function logPoll(params: {
  tickId?: string;
  tenantId?: string;
  league: string;
  outcome: 'unchanged' | 'published' | 'failed' | 'unconfigured';
  fingerprint?: string;
  messageId?: string;
  error?: string;
}): void {
  const level =
    params.outcome === 'failed' ? LogLevel.ERROR : params.outcome === 'unconfigured' ? LogLevel.WARN : LogLevel.INFO;

  const entry: PollLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.outcome === 'unchanged' ? LogLevel.DEBUG : level,
    log_type: 'STANDINGS_POLL',
    tick_id: params.tickId,
    tenant_id: params.tenantId,
    league: params.league,
    outcome: params.outcome,
    fingerprint: params.fingerprint,
    message_id: params.messageId,
    error: params.error === undefined ? undefined : sanitizeString(params.error),
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * @example
 * ```typescript
 * log(LogLevel.INFO, 'Reminder sent', {
 *   tenant_id: '1000',
 *   match_id: 'A1B2C3',
 *   threshold: '24h'
 * });
 * ```
 */
export function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...sanitizedContext,
  };

  writeLog(entry);
}
