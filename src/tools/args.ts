/**
 * Typed accessors over the parsed JSON arguments of a tool call.
 * Each accessor throws a ValidationError naming the tool and the offending key.
 */

import type { JsonObject, JsonValue } from '../types.js';
import { isRecord } from '../utils.js';

import { ValidationError } from './tool-error.js';

export type ToolArgs = Record<string, unknown>;

export function requireString(args: ToolArgs, key: string, tool: string): string {
  const v = args[key];
  if (v === undefined || v === null) throw new ValidationError(`${tool}: missing '${key}'`);
  if (typeof v !== 'string') {
    throw new ValidationError(`${tool}: '${key}' must be a string (got ${typeName(v)})`);
  }
  return v;
}

export function optString(args: ToolArgs, key: string, tool: string): string | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== 'string') {
    throw new ValidationError(`${tool}: '${key}' must be a string (got ${typeName(v)})`);
  }
  return v;
}

/** Non-negative integer; numeric strings are accepted since some models quote numbers. */
export function optInt(args: ToolArgs, key: string, tool: string): number | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : v;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 0) {
    throw new ValidationError(`${tool}: '${key}' must be a non-negative integer`);
  }
  return n;
}

export function optBool(args: ToolArgs, key: string, tool: string): boolean | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v === 'boolean') return v;
  if (v === 'true') return true;
  if (v === 'false') return false;
  throw new ValidationError(`${tool}: '${key}' must be a boolean`);
}

export function optStringArray(args: ToolArgs, key: string, tool: string): string[] | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (!Array.isArray(v)) throw new ValidationError(`${tool}: '${key}' must be an array of strings`);
  const out: string[] = [];
  for (const item of v) {
    if (typeof item !== 'string') {
      throw new ValidationError(`${tool}: '${key}' must be an array of strings`);
    }
    out.push(item);
  }
  return out;
}

export function optRecord(args: ToolArgs, key: string, tool: string): ToolArgs | undefined {
  const v = args[key];
  if (v === undefined || v === null) return undefined;
  if (!isRecord(v)) throw new ValidationError(`${tool}: '${key}' must be an object`);
  return v;
}

/** Drop undefined fields so the result is a valid JSON payload. */
export function compact(obj: Record<string, JsonValue | undefined>): JsonObject {
  const out: JsonObject = {};
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v;
  }
  return out;
}

function typeName(v: unknown): string {
  if (Array.isArray(v)) return 'array';
  return typeof v;
}
