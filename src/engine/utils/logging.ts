/**
 * Structured log sink injected into the engine.
 *
 * The engine never writes to the console on its own; hosts pass a sink (or
 * accept the no-op default) so that evaluation stays free of hidden I/O.
 */
export type LogFields = Record<string, string | number | boolean | null>;

export type LogLevel = 'debug' | 'info' | 'warn';

export interface ThermalLogSink {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
}

export interface LogRecord {
  level: LogLevel;
  event: string;
  fields: LogFields;
}

export const noopLogSink: ThermalLogSink = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2 };

function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${typeof value === 'number' ? parseFloat(value.toFixed(4)) : String(value)}`)
    .join(' ');
}

/** Console-backed sink for hosts; records below `minLevel` are dropped. */
export function createConsoleLogSink(minLevel: LogLevel = 'info', prefix = '[thermal]'): ThermalLogSink {
  const write = (level: LogLevel, event: string, fields: LogFields = {}) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
    const line = `${prefix} ${event}${Object.keys(fields).length > 0 ? ` ${formatFields(fields)}` : ''}`;
    if (level === 'warn') console.warn(line);
    else if (level === 'info') console.info(line);
    else console.debug(line);
  };
  return {
    debug: (event, fields) => write('debug', event, fields),
    info: (event, fields) => write('info', event, fields),
    warn: (event, fields) => write('warn', event, fields),
  };
}

/** In-memory sink; `records` keeps every call in order. Used by tests and diagnostics panels. */
export function createMemoryLogSink(): ThermalLogSink & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  const push = (level: LogLevel) => (event: string, fields: LogFields = {}) => {
    records.push({ level, event, fields });
  };
  return {
    records,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
  };
}
