// src/logger.ts
// In-memory log buffer for the bridge. Entries at info and above are mirrored
// to stderr; stdout carries the MCP protocol and must stay clean.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  source?: string;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const logBuffer: LogEntry[] = [];
export const MAX_LOG_ENTRIES = 1000;

let mirrorLevel: LogLevel | 'silent' = 'info';

export function addLog(level: LogLevel, message: string, source?: string): void {
  logBuffer.push({
    timestamp: new Date(),
    level,
    message,
    source,
  });
  if (logBuffer.length > MAX_LOG_ENTRIES) {
    logBuffer.shift();
  }

  if (mirrorLevel !== 'silent' && LEVEL_ORDER[level] >= LEVEL_ORDER[mirrorLevel]) {
    console.error(source ? `[${source}] ${message}` : message);
  }
}

/**
 * Minimum level echoed to stderr. The buffer always records everything.
 */
export function setStderrLevel(level: LogLevel | 'silent'): void {
  mirrorLevel = level;
}

export function createLogger(source: string): Logger {
  return {
    debug: message => addLog('debug', message, source),
    info: message => addLog('info', message, source),
    warn: message => addLog('warn', message, source),
    error: message => addLog('error', message, source),
  };
}

export interface LogQuery {
  level?: LogLevel;
  source?: string;
  /** Newest entries kept; 50 when unset */
  limit?: number;
}

const DEFAULT_LOG_LIMIT = 50;

/** Matching entries, oldest first, cut to the newest `limit` */
export function getLogs(query: LogQuery = {}): LogEntry[] {
  const { level, source, limit = DEFAULT_LOG_LIMIT } = query;
  const matches = logBuffer.filter(
    entry => (!level || entry.level === level) && (!source || entry.source === source)
  );
  return matches.slice(Math.max(0, matches.length - limit));
}

/** Empty the buffer; reports how many entries went */
export function clearLogs(): { cleared: number } {
  return { cleared: logBuffer.splice(0).length };
}
