/**
 * log.ts — Leveled, tagged logging for the bridge and its host
 *
 * Every line is written as `[tag] message` so browser, script and bridge
 * output can be told apart in one stream:
 *
 *   [tab] GET http://example.test/ 200 1532B
 *   [script] crashed in app.js (load): TypeError: not a function
 *
 * Sinks are pluggable: the console sink is the default, tests use a
 * MemorySink and assert on the captured lines.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_NAMES = new Set<string>(LOG_LEVELS);

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVEL_NAMES.has(value);
}

// ── Sinks ─────────────────────────────────────────────────────────────────────

export interface LogSink {
  write(level: Exclude<LogLevel, 'silent'>, line: string): void;
}

export const consoleSink: LogSink = {
  write(level, line) {
    if (level === 'error')     console.error(line);
    else if (level === 'warn') console.warn(line);
    else                       console.log(line);
  },
};

export interface LogEntry { level: Exclude<LogLevel, 'silent'>; line: string; }

/** Captures lines in memory (developer console, tests). */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];
  write(level: Exclude<LogLevel, 'silent'>, line: string): void {
    this.entries.push({ level, line });
  }
  lines(level?: Exclude<LogLevel, 'silent'>): string[] {
    return this.entries.filter(e => !level || e.level === level).map(e => e.line);
  }
  clear(): void { this.entries.length = 0; }
}

// ── Logger ────────────────────────────────────────────────────────────────────

function formatPart(part: unknown): string {
  if (typeof part === 'string') return part;
  if (part instanceof Error) return part.stack ?? (part.name + ': ' + part.message);
  try { return JSON.stringify(part) ?? String(part); }
  catch (_) { return String(part); }
}

export class Logger {
  readonly tag: string;
  private _level: LogLevel;
  private _sink: LogSink;

  constructor(tag: string, level: LogLevel = 'info', sink: LogSink = consoleSink) {
    this.tag    = tag;
    this._level = level;
    this._sink  = sink;
  }

  get level(): LogLevel { return this._level; }
  set level(level: LogLevel) { this._level = level; }

  /** Same level and sink, different tag. */
  child(tag: string): Logger {
    return new Logger(tag, this._level, this._sink);
  }

  enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return RANK[level] >= RANK[this._level];
  }

  debug(...parts: unknown[]): void { this._emit('debug', parts); }
  info(...parts: unknown[]):  void { this._emit('info',  parts); }
  warn(...parts: unknown[]):  void { this._emit('warn',  parts); }
  error(...parts: unknown[]): void { this._emit('error', parts); }

  private _emit(level: Exclude<LogLevel, 'silent'>, parts: unknown[]): void {
    if (!this.enabled(level)) return;
    this._sink.write(level, '[' + this.tag + '] ' + parts.map(formatPart).join(' '));
  }
}
