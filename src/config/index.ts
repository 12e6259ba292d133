import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { isProduction } from '../util/env.js';

/**
 * Upper bound for the digit count of `random()` when none is given.
 * Mirrors the 4300-digit int/str conversion limit common in other runtimes;
 * it is a convention, not a mathematical limit.
 */
export const DEFAULT_RANDOM_MAX_DIGITS = 4300;

/**
 * Largest accepted `random.maxDigits`. The digit count is drawn from
 * maxDigits + 1 values and crypto.randomInt takes ranges up to 2^48 - 1.
 */
export const RANDOM_MAX_DIGITS_LIMIT = 2 ** 48 - 2;

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const randomSchema = z.object({
  maxDigits: z.number().int().min(0).max(RANDOM_MAX_DIGITS_LIMIT),
}).strict();

const logSchema = z.object({
  level: z.enum(LOG_LEVELS),
  pretty: z.boolean(),
}).strict();

const configSchema = z.object({
  random: randomSchema,
  log: logSchema,
}).strict();

const fileSchema = z.object({
  random: randomSchema.partial().optional(),
  log: logSchema.partial().optional(),
}).strict();

export type AppConfig = z.infer<typeof configSchema>;
type FileConfig = z.infer<typeof fileSchema>;

type EnvOverrides = {
  random: { maxDigits?: number };
  log: { level?: string; pretty?: boolean | string };
};

let cfg: AppConfig | null = null;
let sources: string[] = [];

// For testing: reset the cache
export function resetConfigCache() {
  cfg = null;
  sources = [];
}

export function configPath(): string {
  return path.resolve(process.cwd(), process.env.HUGEINT_CONFIG || path.join('config', 'hugeint.json'));
}

function defaultConfig(): AppConfig {
  return {
    random: { maxDigits: DEFAULT_RANDOM_MAX_DIGITS },
    log: { level: 'info', pretty: !isProduction() },
  };
}

function readConfigFile(file: string): FileConfig | undefined {
  if (!fs.existsSync(file)) return undefined;
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return fileSchema.parse(raw);
}

function parseBoolEnv(value: string): boolean | string {
  const v = value.trim().toLowerCase();
  if (v === 'true' || v === '1') return true;
  if (v === 'false' || v === '0') return false;
  return value; // left for the schema to reject
}

function readEnvOverrides(): EnvOverrides {
  const env: EnvOverrides = { random: {}, log: {} };
  if (process.env.HUGEINT_RANDOM_MAX_DIGITS) {
    env.random.maxDigits = Number(process.env.HUGEINT_RANDOM_MAX_DIGITS);
  }
  if (process.env.LOG_LEVEL) {
    env.log.level = process.env.LOG_LEVEL.toLowerCase();
  }
  if (process.env.HUGEINT_LOG_PRETTY) {
    env.log.pretty = parseBoolEnv(process.env.HUGEINT_LOG_PRETTY);
  }
  return env;
}

/**
 * Merge defaults, the optional JSON file and env overrides (in that order)
 * and validate the result. Throws a ZodError naming the offending path.
 */
export function loadConfig(): AppConfig {
  const base = defaultConfig();
  const file = configPath();
  const fromFile = readConfigFile(file);
  const env = readEnvOverrides();

  const merged = {
    random: { ...base.random, ...fromFile?.random, ...env.random },
    log: { ...base.log, ...fromFile?.log, ...env.log },
  };

  const validated = configSchema.parse(merged);

  const applied = ['defaults'];
  if (fromFile) applied.push(file);
  if (Object.keys(env.random).length + Object.keys(env.log).length > 0) applied.push('env');

  cfg = validated;
  sources = applied;
  return validated;
}

export function getConfig(): AppConfig {
  if (!cfg) return loadConfig();
  return cfg;
}

/** Where the current config came from, lowest priority first */
export function getConfigSources(): string[] {
  return sources.slice();
}
