/**
 * config.ts — Browser/bridge configuration
 *
 * Defaults are merged under an optional JSON file, then under PAGE_BRIDGE_*
 * environment variables, so a tab always starts even when the file is absent
 * or only partially populated.
 *
 *   { "logLevel": "debug", "scriptTimeoutMs": 250 }
 */

import { readFileSync, existsSync } from 'node:fs';
import { isLogLevel, type LogLevel } from './log.js';

export interface BrowserConfig {
  logLevel:         LogLevel;
  /** Layout width in pixels. */
  viewportWidth:    number;
  /** Per-evaluation deadline for page scripts; 0 disables the watchdog. */
  scriptTimeoutMs:  number;
  /** QuickJS heap limit per page; 0 means unlimited. */
  memoryLimitBytes: number;
  /** How many fault records the developer console keeps. */
  maxFaultRecords:  number;
}

export const DEFAULTS: Readonly<BrowserConfig> = {
  logLevel:         'info',
  viewportWidth:    800,
  scriptTimeoutMs:  0,
  memoryLimitBytes: 4 * 1024 * 1024,
  maxFaultRecords:  100,
};

const ENV_KEYS: Record<string, keyof BrowserConfig> = {
  PAGE_BRIDGE_LOG_LEVEL:         'logLevel',
  PAGE_BRIDGE_VIEWPORT_WIDTH:    'viewportWidth',
  PAGE_BRIDGE_SCRIPT_TIMEOUT_MS: 'scriptTimeoutMs',
  PAGE_BRIDGE_MEMORY_LIMIT:      'memoryLimitBytes',
};

export class ConfigError extends Error {
  readonly key: string;
  constructor(key: string, message: string) {
    super(key + ': ' + message);
    this.name = 'ConfigError';
    this.key  = key;
  }
}

// ── Validation ────────────────────────────────────────────────────────────────

function toCount(key: string, raw: unknown, min: number): number {
  var n = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < min) {
    throw new ConfigError(key, 'expected an integer >= ' + min + ', got ' + JSON.stringify(raw));
  }
  return n;
}

function apply(cfg: BrowserConfig, key: string, raw: unknown): void {
  switch (key) {
    case 'logLevel':
      if (!isLogLevel(raw)) throw new ConfigError(key, 'unknown log level ' + JSON.stringify(raw));
      cfg.logLevel = raw;
      return;
    case 'viewportWidth':    cfg.viewportWidth    = toCount(key, raw, 1); return;
    case 'scriptTimeoutMs':  cfg.scriptTimeoutMs  = toCount(key, raw, 0); return;
    case 'memoryLimitBytes': cfg.memoryLimitBytes = toCount(key, raw, 0); return;
    case 'maxFaultRecords':  cfg.maxFaultRecords  = toCount(key, raw, 1); return;
    default:
      throw new ConfigError(key, 'unknown configuration key');
  }
}

// ── Loading ───────────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  /** JSON file to merge over the defaults; skipped when it does not exist. */
  path?: string;
  /** Defaults to process.env. */
  env?:  Record<string, string | undefined>;
  /** Highest-priority values, e.g. from a test or an embedding application. */
  overrides?: Partial<BrowserConfig>;
}

export function loadConfig(opts: LoadConfigOptions = {}): BrowserConfig {
  var cfg: BrowserConfig = { ...DEFAULTS };

  if (opts.path && existsSync(opts.path)) {
    var parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(opts.path, 'utf8'));
    } catch (e) {
      throw new ConfigError(opts.path, 'not valid JSON (' + (e instanceof Error ? e.message : String(e)) + ')');
    }
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigError(opts.path, 'expected a JSON object');
    }
    for (var [key, value] of Object.entries(parsed)) apply(cfg, key, value);
  }

  var env = opts.env ?? process.env;
  for (var name in ENV_KEYS) {
    var raw = env[name];
    if (raw !== undefined && raw !== '') apply(cfg, ENV_KEYS[name], raw);
  }

  if (opts.overrides) {
    for (var [okey, ovalue] of Object.entries(opts.overrides)) {
      if (ovalue !== undefined) apply(cfg, okey, ovalue);
    }
  }
  return cfg;
}
