/**
 * Logger: console output tagged with the logger name
 *
 * Every line is printed as "  [name] message", the same way the CLI tags
 * its own output. Levels are resolved per logger name through a registry,
 * so the bridge config's logging section can tune single loggers:
 *
 *   setLogLevel('root', 'INFO')
 *   setLogLevel('mxtg.intent', 'DEBUG')
 *
 * A logger takes the level of its closest configured dotted ancestor,
 * falling back to the root level.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

const ROOT = 'root';
const DEFAULT_LEVEL: LogLevel = 'INFO';

export type LogSink = (level: LogLevel, name: string, message: string, args: unknown[]) => void;

export interface Logger {
  readonly name: string;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(name: string): Logger;
}

const levels = new Map<string, LogLevel>([[ROOT, DEFAULT_LEVEL]]);

const consoleSink: LogSink = (level, name, message, args) => {
  const line = `  [${name}] ${message}`;
  if (level === 'WARNING' || level === 'ERROR') {
    console.error(line, ...args);
  } else {
    console.log(line, ...args);
  }
};

let sink: LogSink = consoleSink;

export function setLogLevel(name: string, level: LogLevel): void {
  levels.set(name, level);
}

/** Forget every configured level and restore the console sink. */
export function resetLogging(): void {
  levels.clear();
  levels.set(ROOT, DEFAULT_LEVEL);
  sink = consoleSink;
}

export function setLogSink(next: LogSink): void {
  sink = next;
}

export function getEffectiveLevel(name: string): LogLevel {
  let current = name;
  while (current) {
    const level = levels.get(current);
    if (level) return level;
    const dot = current.lastIndexOf('.');
    current = dot === -1 ? '' : current.slice(0, dot);
  }
  return levels.get(ROOT) ?? DEFAULT_LEVEL;
}

export function isLevelEnabled(name: string, level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(getEffectiveLevel(name));
}

/**
 * Accepts the level names used in YAML configs ("debug", "WARN", "CRITICAL").
 */
export function parseLogLevel(value: unknown): LogLevel | null {
  if (typeof value !== 'string') return null;
  const normalized = value.trim().toUpperCase();
  if (normalized === 'WARN') return 'WARNING';
  if (normalized === 'CRITICAL') return 'ERROR';
  return LOG_LEVELS.find((level) => level === normalized) ?? null;
}

export function createLogger(name: string): Logger {
  const emit = (level: LogLevel, message: string, args: unknown[]): void => {
    if (isLevelEnabled(name, level)) {
      sink(level, name, message, args);
    }
  };

  return {
    name,
    debug: (message, ...args) => emit('DEBUG', message, args),
    info: (message, ...args) => emit('INFO', message, args),
    warn: (message, ...args) => emit('WARNING', message, args),
    error: (message, ...args) => emit('ERROR', message, args),
    child: (childName) => createLogger(`${name}.${childName}`),
  };
}
