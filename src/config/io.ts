/**
 * coffeepair Configuration I/O
 *
 * Config file location: ./coffeepair.yaml (or ~/.coffeepair/config.yaml)
 *
 * Precedence, lowest first: built-in defaults, config file,
 * environment variables.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import YAML from 'yaml';
import type { CoffeePairConfig, HistoryConfig, ScheduleConfig, SlackConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Any subset of the config, as read from a file or the environment
 */
export interface ConfigOverrides {
  slack?: Partial<SlackConfig>;
  channel?: string;
  testingChannel?: string;
  testing?: boolean;
  history?: Partial<HistoryConfig>;
  schedule?: Partial<ScheduleConfig>;
}

/**
 * Candidate config file locations, checked in order
 */
export function configSearchPaths(cwd: string = process.cwd(), home: string = homedir()): string[] {
  return [
    resolve(cwd, 'coffeepair.yaml'),          // Project-local
    resolve(cwd, 'coffeepair.yml'),           // Project-local alt
    join(home, '.coffeepair', 'config.yaml'), // User global
  ];
}

/**
 * Find the config file path (first existing, or the project-local default)
 *
 * COFFEEPAIR_CONFIG always wins when set.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.COFFEEPAIR_CONFIG) {
    return resolve(env.COFFEEPAIR_CONFIG);
  }

  const paths = configSearchPaths();
  for (const p of paths) {
    if (existsSync(p)) {
      return p;
    }
  }
  return paths[0];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim()) return value.trim();
  return undefined;
}

function readBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true' || lowered === '1' || lowered === 'yes') return true;
    if (lowered === 'false' || lowered === '0' || lowered === 'no') return false;
  }
  return undefined;
}

function readPositiveNumber(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n === 'number' && Number.isFinite(n) && n > 0) return n;
  return undefined;
}

/**
 * Pick known keys out of a parsed YAML document. Unknown keys and
 * values of the wrong type are ignored.
 */
export function parseConfigDocument(raw: unknown): ConfigOverrides {
  if (!isRecord(raw)) return {};

  const slack = isRecord(raw.slack) ? raw.slack : {};
  const history = isRecord(raw.history) ? raw.history : {};
  const schedule = isRecord(raw.schedule) ? raw.schedule : {};

  return {
    slack: { token: readString(slack.token) },
    channel: readString(raw.channel),
    testingChannel: readString(raw.testingChannel),
    testing: readBoolean(raw.testing),
    history: { lookbackDays: readPositiveNumber(history.lookbackDays) },
    schedule: {
      cron: readString(schedule.cron),
      timezone: readString(schedule.timezone),
      logPath: readString(schedule.logPath),
    },
  };
}

/**
 * Read overrides from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  return {
    slack: { token: readString(env.SLACK_BOT_TOKEN) ?? readString(env.SLACK_API_TOKEN) },
    channel: readString(env.COFFEEPAIR_CHANNEL),
    testingChannel: readString(env.COFFEEPAIR_TESTING_CHANNEL),
    testing: readBoolean(env.COFFEEPAIR_TESTING),
    history: { lookbackDays: readPositiveNumber(env.COFFEEPAIR_LOOKBACK_DAYS) },
    schedule: {
      cron: readString(env.COFFEEPAIR_SCHEDULE),
      timezone: readString(env.COFFEEPAIR_TIMEZONE),
    },
  };
}

/**
 * Layer overrides on top of a base config. Unset fields keep the base value.
 */
export function mergeConfig(base: CoffeePairConfig, overrides: ConfigOverrides): CoffeePairConfig {
  return {
    slack: {
      token: overrides.slack?.token ?? base.slack.token,
    },
    channel: overrides.channel ?? base.channel,
    testingChannel: overrides.testingChannel ?? base.testingChannel,
    testing: overrides.testing ?? base.testing,
    history: {
      lookbackDays: overrides.history?.lookbackDays ?? base.history.lookbackDays,
    },
    schedule: {
      cron: overrides.schedule?.cron ?? base.schedule.cron,
      timezone: overrides.schedule?.timezone ?? base.schedule.timezone,
      logPath: overrides.schedule?.logPath ?? base.schedule.logPath,
    },
  };
}

/**
 * Load config: defaults, then the YAML file if present, then environment
 */
export function loadConfig(
  configPath: string = resolveConfigPath(),
  env: NodeJS.ProcessEnv = process.env,
): CoffeePairConfig {
  const fromEnv = configFromEnv(env);

  if (!existsSync(configPath)) {
    return mergeConfig(DEFAULT_CONFIG, fromEnv);
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const fromFile = mergeConfig(DEFAULT_CONFIG, parseConfigDocument(YAML.parse(content)));
    return mergeConfig(fromFile, fromEnv);
  } catch (err) {
    console.error(`[Config] Failed to load ${configPath}:`, err instanceof Error ? err.message : err);
    return mergeConfig(DEFAULT_CONFIG, fromEnv);
  }
}
