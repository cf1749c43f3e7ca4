import fs from 'node:fs/promises';
import path from 'node:path';

import { DEFAULT_HISTORY_SIZE, DEFAULT_MAX_ITERATIONS } from './agent/constants.js';
import type { TermpilotConfig } from './types.js';
import { configDir, isRecord } from './utils.js';

export const DEFAULTS: TermpilotConfig = {
  endpoint: 'http://localhost:8080/v1',
  model: '',
  max_tokens: 4096,
  temperature: 0.2,
  timeout: 600,
  max_iterations: DEFAULT_MAX_ITERATIONS,
  no_confirm: false,
  verbose: false,
  history_size: DEFAULT_HISTORY_SIZE,
  context_file_names: ['.termpilot.md', 'AGENTS.md'],
  global_contexts: [],
  no_context: false,
};

export type ConfigOverrides = Partial<TermpilotConfig>;

export function defaultConfigPath() {
  return path.join(configDir(), 'config.json');
}

export function parseBool(v: string | undefined): boolean | undefined {
  if (v == null) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(v.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(v.toLowerCase())) return false;
  return undefined;
}

export function parseNum(v: string | undefined): number | undefined {
  if (v == null || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

export function parseCsv(v: string | undefined): string[] | undefined {
  if (v == null) return undefined;
  const values = v
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean);
  return values.length ? values : undefined;
}

const STRING_KEYS = ['endpoint', 'model', 'api_key', 'dir'] as const;
const NUMBER_KEYS = [
  'max_tokens',
  'temperature',
  'timeout',
  'max_iterations',
  'history_size',
] as const;
const BOOL_KEYS = ['no_confirm', 'verbose', 'no_context'] as const;
const LIST_KEYS = ['context_file_names', 'global_contexts'] as const;

/**
 * Pick the known keys out of a parsed config file. Keys of the wrong type are
 * reported and skipped; unknown keys are ignored.
 */
export function configFromJson(raw: unknown, source: string): ConfigOverrides {
  if (!isRecord(raw)) throw new Error(`${source}: config must be a JSON object`);
  const out: ConfigOverrides = {};
  const bad = (k: string, want: string) =>
    console.warn(`[warn] ${source}: ignoring '${k}' (expected ${want})`);

  for (const k of STRING_KEYS) {
    const v = raw[k];
    if (v === undefined) continue;
    if (typeof v === 'string') out[k] = v;
    else bad(k, 'a string');
  }
  for (const k of NUMBER_KEYS) {
    const v = raw[k];
    if (v === undefined) continue;
    if (typeof v === 'number' && Number.isFinite(v)) out[k] = v;
    else bad(k, 'a number');
  }
  for (const k of BOOL_KEYS) {
    const v = raw[k];
    if (v === undefined) continue;
    if (typeof v === 'boolean') out[k] = v;
    else bad(k, 'true or false');
  }
  for (const k of LIST_KEYS) {
    const v = raw[k];
    if (v === undefined) continue;
    if (Array.isArray(v) && v.every((x): x is string => typeof x === 'string')) out[k] = v;
    else bad(k, 'an array of strings');
  }
  return out;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  return stripUndef({
    endpoint: env.TERMPILOT_ENDPOINT,
    model: env.TERMPILOT_MODEL,
    api_key: env.TERMPILOT_API_KEY ?? env.OPENAI_API_KEY,
    dir: env.TERMPILOT_DIR,
    max_tokens: parseNum(env.TERMPILOT_MAX_TOKENS),
    temperature: parseNum(env.TERMPILOT_TEMPERATURE),
    timeout: parseNum(env.TERMPILOT_TIMEOUT),
    max_iterations: parseNum(env.TERMPILOT_MAX_ITERATIONS),
    no_confirm: parseBool(env.TERMPILOT_NO_CONFIRM),
    verbose: parseBool(env.TERMPILOT_VERBOSE),
    history_size: parseNum(env.TERMPILOT_HISTORY_SIZE),
    context_file_names: parseCsv(env.TERMPILOT_CONTEXT_FILE_NAMES),
    global_contexts: parseCsv(env.TERMPILOT_GLOBAL_CONTEXTS),
    no_context: parseBool(env.TERMPILOT_NO_CONTEXT),
  });
}

function stripUndef(obj: ConfigOverrides): ConfigOverrides {
  const out: ConfigOverrides = {};
  for (const k of [...STRING_KEYS, ...NUMBER_KEYS, ...BOOL_KEYS, ...LIST_KEYS]) {
    if (obj[k] !== undefined) Object.assign(out, { [k]: obj[k] });
  }
  return out;
}

function checkRanges(cfg: TermpilotConfig): void {
  const positiveInt = ['max_iterations', 'history_size', 'max_tokens'] as const;
  for (const k of positiveInt) {
    if (!Number.isInteger(cfg[k]) || cfg[k] < 1) {
      throw new Error(`config: ${k} must be a positive integer (got ${cfg[k]})`);
    }
  }
  if (!(cfg.timeout > 0)) throw new Error(`config: timeout must be > 0 (got ${cfg.timeout})`);
  if (!/^https?:\/\//.test(cfg.endpoint)) {
    throw new Error(`config: endpoint must be an http(s) URL (got ${cfg.endpoint})`);
  }
}

/**
 * Resolve the effective configuration.
 * Precedence: CLI > environment (TERMPILOT_*) > config file > defaults.
 */
export async function loadConfig(opts: {
  configPath?: string;
  cli?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}): Promise<{ config: TermpilotConfig; configPath: string }> {
  const configPath = opts.configPath ?? defaultConfigPath();

  let fileCfg: ConfigOverrides = {};
  try {
    const raw = await fs.readFile(configPath, 'utf8');
    if (raw.trim().length) fileCfg = configFromJson(JSON.parse(raw), configPath);
  } catch (e: unknown) {
    if (!(e && typeof e === 'object' && 'code' in e && e.code === 'ENOENT')) {
      throw new Error(
        `failed to load config ${configPath}: ${e instanceof Error ? e.message : String(e)}`
      );
    }
  }

  const envCfg = configFromEnv(opts.env ?? process.env);
  const cliCfg = stripUndef(opts.cli ?? {});
  const config: TermpilotConfig = { ...DEFAULTS, ...fileCfg, ...envCfg, ...cliCfg };
  checkRanges(config);
  return { config, configPath };
}
