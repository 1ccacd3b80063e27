import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../util/errors.js';

export const TIE_POLICIES = ['separate', 'player1', 'player2'] as const;
export const MALFORMED_POLICIES = ['abort', 'skip'] as const;
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type TiePolicy = (typeof TIE_POLICIES)[number];
export type MalformedPolicy = (typeof MALFORMED_POLICIES)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];

const configSchema = z.object({
  tiePolicy: z.enum(TIE_POLICIES).default('separate'),
  onMalformed: z.enum(MALFORMED_POLICIES).default('abort'),
  strictSuits: z.boolean().default(false),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  pretty: z.boolean().default(true),
}).strict();

export type AppConfig = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

export const DEFAULT_CONFIG_FILE = path.join('config', 'config.json');

function stripComments(jsonText: string): string {
  // Allow // and /* */ comments in config.json for convenience
  return jsonText
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .replace(/^\s*\/\/.*$/gm, '');
}

function readConfigFile(file: string): Record<string, unknown> {
  if (!fs.existsSync(file)) return {};
  const text = stripComments(fs.readFileSync(file, 'utf8')).trim();
  if (!text) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(file, [`not valid JSON: ${e instanceof Error ? e.message : String(e)}`]);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(file, ['expected a JSON object']);
  }
  return { ...parsed };
}

function parseBool(name: string, value: string): boolean {
  const v = value.trim().toLowerCase();
  if (v === 'true' || v === '1') return true;
  if (v === 'false' || v === '0') return false;
  throw new ConfigError('environment', [`${name} must be true or false, got "${value}"`]);
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigInput {
  const out: Record<string, unknown> = {};
  if (env.SHOWDOWN_TIE_POLICY) out.tiePolicy = env.SHOWDOWN_TIE_POLICY.toLowerCase();
  if (env.SHOWDOWN_ON_MALFORMED) out.onMalformed = env.SHOWDOWN_ON_MALFORMED.toLowerCase();
  if (env.SHOWDOWN_STRICT_SUITS) out.strictSuits = parseBool('SHOWDOWN_STRICT_SUITS', env.SHOWDOWN_STRICT_SUITS);
  if (env.LOG_LEVEL) out.logLevel = env.LOG_LEVEL.toLowerCase();
  if (env.NO_COLOR) out.pretty = false;
  return validate('environment', out);
}

function validate(source: string, input: Record<string, unknown>): ConfigInput {
  const res = configSchema.partial().safeParse(input);
  if (!res.success) {
    throw new ConfigError(source, res.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`));
  }
  return res.data;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Record<string, unknown>;
}

/**
 * Merges defaults, `config/config.json` (or `SHOWDOWN_CONFIG`), the environment
 * and `overrides`, later sources winning.
 */
export function loadConfig(opts: LoadConfigOptions = {}): AppConfig {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const file = path.resolve(cwd, env.SHOWDOWN_CONFIG || DEFAULT_CONFIG_FILE);

  const fromFile = validate(file, readConfigFile(file));
  const fromEnv = configFromEnv(env);
  // a flag left unset must not mask the file or the environment
  const overrides = Object.fromEntries(Object.entries(opts.overrides ?? {}).filter(([, v]) => v !== undefined));
  const fromFlags = validate('command line', overrides);
  return configSchema.parse({ ...fromFile, ...fromEnv, ...fromFlags });
}
