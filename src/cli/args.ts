/**
 * CLI argument parsing, config overrides, and help text.
 */

import type { ConfigOverrides } from '../config.js';
import type { ColorMode } from '../term.js';

/** Bad command line; the CLI exits with status 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type ParsedArgs = {
  /** Message words. */
  _: string[];
  flags: Record<string, string | true>;
};

// Flags that never consume the next argument as their value
const BOOLEAN_FLAGS = new Set([
  'help',
  'version',
  'yes',
  'no-confirm',
  'no-context',
  'clear-history',
  'verbose',
]);

const VALUE_FLAGS = new Set([
  'dir',
  'model',
  'endpoint',
  'max-iterations',
  'context',
  'config',
  'color',
]);

const SHORT_ALIASES: Record<string, string> = {
  h: 'help',
  v: 'version',
  y: 'yes',
};

export function parseArgs(argv: string[]): ParsedArgs {
  const out: ParsedArgs = { _: [], flags: {} };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--') {
      out._.push(...argv.slice(i + 1));
      break;
    }
    if (!a.startsWith('-') || a === '-') {
      out._.push(a);
      continue;
    }

    let key: string;
    let value: string | undefined;
    if (a.startsWith('--')) {
      const eq = a.indexOf('=');
      key = eq === -1 ? a.slice(2) : a.slice(2, eq);
      value = eq === -1 ? undefined : a.slice(eq + 1);
    } else if (a.length === 2 && SHORT_ALIASES[a.slice(1)]) {
      key = SHORT_ALIASES[a.slice(1)];
    } else {
      throw new UsageError(`unknown option: ${a}`);
    }

    if (BOOLEAN_FLAGS.has(key)) {
      if (value !== undefined) throw new UsageError(`option --${key} does not take a value`);
      out.flags[key] = true;
    } else if (VALUE_FLAGS.has(key)) {
      if (value === undefined) {
        const next = argv[i + 1];
        if (next === undefined || next.startsWith('--')) {
          throw new UsageError(`option --${key} requires a value`);
        }
        value = next;
        i++;
      }
      out.flags[key] = value;
    } else {
      throw new UsageError(`unknown option: --${key}`);
    }
  }
  return out;
}

export function flagString(args: ParsedArgs, key: string): string | undefined {
  const v = args.flags[key];
  return typeof v === 'string' ? v : undefined;
}

export function flagBool(args: ParsedArgs, key: string): boolean {
  return args.flags[key] === true;
}

export function asNum(v: string | undefined): number | undefined {
  if (v === undefined) return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

export function colorMode(args: ParsedArgs): ColorMode {
  const v = flagString(args, 'color') ?? 'auto';
  if (v === 'auto' || v === 'always' || v === 'never') return v;
  throw new UsageError(`--color must be auto, always or never (got ${v})`);
}

/** Config keys set on the command line. Unset flags stay undefined. */
export function cliOverrides(args: ParsedArgs): ConfigOverrides {
  const out: ConfigOverrides = {};
  const dir = flagString(args, 'dir');
  if (dir !== undefined) out.dir = dir;
  const model = flagString(args, 'model');
  if (model !== undefined) out.model = model;
  const endpoint = flagString(args, 'endpoint');
  if (endpoint !== undefined) out.endpoint = endpoint;

  const rawMax = flagString(args, 'max-iterations');
  if (rawMax !== undefined) {
    const n = asNum(rawMax);
    if (n === undefined || !Number.isInteger(n) || n < 1) {
      throw new UsageError(`--max-iterations expects a positive integer (got ${rawMax})`);
    }
    out.max_iterations = n;
  }

  if (flagBool(args, 'yes') || flagBool(args, 'no-confirm')) out.no_confirm = true;
  if (flagBool(args, 'no-context')) out.no_context = true;
  if (flagBool(args, 'verbose')) out.verbose = true;
  return out;
}

/** Convert raw errors into user-friendly messages (no stack traces). */
export function friendlyError(e: unknown): string {
  const msg = e instanceof Error ? e.message : String(e);
  if (msg.includes('max iterations exceeded')) {
    return `Stopped: ${msg}. The task needed more steps than allowed. Try --max-iterations <N> to increase the limit.`;
  }
  if (msg.includes('connection failure') || msg.includes('ECONNREFUSED')) {
    return `Connection failed: ${msg}. Is your LLM server running?`;
  }
  if (msg.includes('returned 503')) {
    return `Model is loading, try again in a few seconds. (${msg})`;
  }
  if (e instanceof Error && e.name === 'AbortError') {
    return 'Aborted.';
  }
  return msg;
}

export function helpText(): string {
  return `Usage: termpilot [options] [message...]

Without a message, starts an interactive session (exit with /exit or Ctrl-D).

Options:
  --dir PATH                 workspace root (default: current directory)
  --model NAME
  --endpoint URL             OpenAI-compatible base URL (default http://localhost:8080/v1)
  --max-iterations N         model requests allowed per message (default 50)
  --yes, -y                  run shell commands without asking (alias: --no-confirm)
  --context NAME             use ~/.config/termpilot/context/NAME.md instead of project context
  --no-context               skip context files
  --clear-history            forget previous interactions
  --config PATH              (default: ~/.config/termpilot/config.json)
  --color auto|always|never
  --verbose
  --help, -h
  --version, -v

Environment: TERMPILOT_ENDPOINT, TERMPILOT_MODEL, TERMPILOT_API_KEY (or OPENAI_API_KEY),
TERMPILOT_MAX_ITERATIONS, TERMPILOT_NO_CONFIRM, TERMPILOT_VERBOSE, ...
`;
}
