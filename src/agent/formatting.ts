import { makeStyler, type Styler } from '../term.js';
import type { JsonObject, JsonValue } from '../types.js';

const SENSITIVE_HINTS = [
  'key',
  'token',
  'secret',
  'password',
  'passwd',
  'auth',
  'authorization',
  'cookie',
  'api_key',
  'apikey',
  'access_key',
  'session',
  'bearer',
];

export function isSensitiveKey(key: string): boolean {
  const k = key.toLowerCase();
  return SENSITIVE_HINTS.some((h) => k.includes(h));
}

/** Cut to `max` characters, marking the cut with `…`. */
export function truncateChars(s: string, max: number): string {
  const chars = [...s];
  if (chars.length <= max) return s;
  return chars.slice(0, max).join('') + '…';
}

function isScalar(v: JsonValue): v is string | number | boolean | null {
  return v === null || typeof v !== 'object';
}

function renderScalar(v: string | number | boolean | null, maxString: number, quote: boolean): string {
  if (typeof v === 'string') {
    const t = truncateChars(v, maxString);
    return quote ? `"${t}"` : t;
  }
  return String(v);
}

/** One parameter value as shown to the operator. */
export function renderValue(key: string, v: JsonValue): string {
  if (isSensitiveKey(key)) return '***';
  if (isScalar(v)) return renderScalar(v, 160, false);
  if (Array.isArray(v)) {
    if (!v.length) return '[]';
    if (v.length <= 5 && v.every(isScalar)) {
      return `[${v.map((it) => (isScalar(it) ? renderScalar(it, 60, true) : '…')).join(', ')}]`;
    }
    return `[${v.length} items]`;
  }
  return `{${Object.keys(v).length} keys}`;
}

const byKey = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Render raw tool-call arguments as sorted `key: value` lines.
 * Nested objects get one extra level; anything that is not a JSON object is
 * pretty-printed, and unparseable input is returned as-is.
 */
export function formatToolParams(argsRaw: string, s: Styler = makeStyler(false)): string {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(argsRaw);
  } catch {
    return argsRaw;
  }
  if (isScalar(parsed) || Array.isArray(parsed)) return JSON.stringify(parsed, null, 2);

  const key = (k: string) => s.green(s.bold(k));
  const out: string[] = [];
  for (const k of Object.keys(parsed).sort(byKey)) {
    const v = parsed[k];
    if (v !== null && typeof v === 'object' && !Array.isArray(v) && !isSensitiveKey(k)) {
      out.push(`  ${key(k)}:`);
      for (const sk of Object.keys(v).sort(byKey)) {
        out.push(`    ${key(sk)}: ${renderValue(sk, v[sk])}`);
      }
    } else {
      out.push(`  ${key(k)}: ${renderValue(k, v)}`);
    }
  }
  return out.join('\n');
}

export function formatToolResult(payload: JsonObject): string {
  return JSON.stringify(payload, null, 2);
}
