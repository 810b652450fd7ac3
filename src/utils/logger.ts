/**
 * Logging for registration, configuration and the CLI.
 *
 * Lines go to stderr so CLI output on stdout stays machine-readable. The
 * codec modules never log.
 *
 * The level starts from PGVECTOR_WIRE_LOG_LEVEL (default `info`) and the
 * format from PGVECTOR_WIRE_LOG_JSON; the CLI applies the loaded config on
 * top through setLogLevel() and setJsonMode().
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export type Logger = Record<EntryLevel, (msg: string, meta?: Record<string, unknown>) => void>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

const envLevel = process.env.PGVECTOR_WIRE_LOG_LEVEL;
let currentLevel: LogLevel = envLevel !== undefined && isLogLevel(envLevel) ? envLevel : 'info';
let jsonMode = process.env.PGVECTOR_WIRE_LOG_JSON === 'true';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

/**
 * Render one entry as a JSON line or as `[HH:MM:SS] LEVEL message (k=v ...)`.
 */
export function formatEntry(entry: LogEntry, json: boolean = jsonMode): string {
  if (json) {
    return JSON.stringify(entry);
  }

  const time = entry.timestamp.slice(11, 19);
  const line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  const pairs = Object.entries(entry.meta ?? {}).map(
    ([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`,
  );
  return pairs.length > 0 ? `${line} (${pairs.join(' ')})` : line;
}

/**
 * Create a logger whose messages start with `[prefix]`.
 */
export function createLogger(prefix: string): Logger {
  const write =
    (level: EntryLevel) =>
    (msg: string, meta?: Record<string, unknown>): void => {
      if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message: `[${prefix}] ${msg}`,
        meta,
      };
      process.stderr.write(formatEntry(entry) + '\n');
    };

  return { debug: write('debug'), info: write('info'), warn: write('warn'), error: write('error') };
}
