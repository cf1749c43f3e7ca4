import { Agent, fetch, type Dispatcher } from 'undici';

import type { ToolContext } from '../tools.js';
import type { JsonObject } from '../types.js';

import { optInt, optRecord, optString, requireString, type ToolArgs } from './args.js';
import type { Tool } from './registry.js';
import { truncateBytes } from './text-utils.js';
import { NetworkError, ValidationError, errnoCode } from './tool-error.js';

export const FETCH_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD'] as const;
export type FetchMethod = (typeof FETCH_METHODS)[number];

const DEFAULT_TIMEOUT_SEC = 10;
const DEFAULT_MAX_BYTES = 200_000;

function isFetchMethod(m: string): m is FetchMethod {
  return FETCH_METHODS.some((x) => x === m);
}

export function checkUrl(url: string): void {
  if (!(url.startsWith('http://') || url.startsWith('https://'))) {
    throw new NetworkError('Only http/https URLs are allowed');
  }
}

export function parseMethod(raw: string | undefined): FetchMethod {
  const m = (raw ?? 'GET').toUpperCase();
  if (!isFetchMethod(m)) {
    throw new ValidationError(`Unsupported method: ${raw}`, `use one of ${FETCH_METHODS.join(', ')}`);
  }
  return m;
}

/** Header values that are not strings are dropped, not coerced. */
function stringHeaders(raw: ToolArgs | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw ?? {})) {
    if (typeof v === 'string') out[k] = v;
  }
  return out;
}

function describeFetchError(e: unknown): string {
  const cause = e instanceof Error && e.cause instanceof Error ? e.cause : undefined;
  const code = errnoCode(cause) ?? errnoCode(e);
  const msg = cause?.message ?? (e instanceof Error ? e.message : String(e));
  return code && !msg.includes(code) ? `${code}: ${msg}` : msg;
}

export async function fetchUrlTool(ctx: ToolContext, args: ToolArgs): Promise<JsonObject> {
  const url = requireString(args, 'url', 'fetch_url');
  checkUrl(url);
  const method = parseMethod(optString(args, 'method', 'fetch_url'));
  const headers = stringHeaders(optRecord(args, 'headers', 'fetch_url'));
  const body = optString(args, 'body', 'fetch_url');
  const timeoutSec = optInt(args, 'timeout_sec', 'fetch_url') ?? DEFAULT_TIMEOUT_SEC;
  const maxBytes = optInt(args, 'max_bytes', 'fetch_url') ?? DEFAULT_MAX_BYTES;

  const timeoutMs = Math.max(1, timeoutSec) * 1000;
  // a private agent per call unless the context supplies one
  let owned: Agent | undefined;
  let dispatcher: Dispatcher;
  if (ctx.dispatcher) {
    dispatcher = ctx.dispatcher;
  } else {
    owned = new Agent({ connect: { timeout: timeoutMs } });
    dispatcher = owned;
  }
  try {
    const res = await fetch(url, {
      method,
      headers,
      body: method === 'GET' || method === 'HEAD' ? undefined : body,
      redirect: 'follow',
      dispatcher,
      signal: AbortSignal.timeout(timeoutMs),
    });
    const respHeaders: JsonObject = {};
    res.headers.forEach((value, name) => {
      respHeaders[name] = value;
    });
    const { text, truncated } = truncateBytes(await res.text(), maxBytes);
    return {
      url,
      final_url: res.url || url,
      status: res.status,
      headers: respHeaders,
      truncated,
      text,
    };
  } catch (e: unknown) {
    if (e instanceof Error && e.name === 'TimeoutError') {
      throw new NetworkError(`Request to ${url} timed out after ${timeoutSec}s`, true);
    }
    throw new NetworkError(`Request failed for ${url}: ${describeFetchError(e)}`, true);
  } finally {
    await owned?.close();
  }
}

export const fetchUrl: Tool = {
  spec: {
    name: 'fetch_url',
    description: 'Fetch an HTTP(S) URL and return status, headers, and text body.',
    parameters: [
      { name: 'url', type: 'string', description: 'http(s) URL to fetch', required: true },
      {
        name: 'method',
        type: 'string',
        description: `HTTP method (${FETCH_METHODS.join(', ')}; default GET)`,
      },
      { name: 'headers', type: 'object', description: 'Request headers as key-value strings' },
      { name: 'body', type: 'string', description: 'Request body for POST/PUT/PATCH' },
      {
        name: 'timeout_sec',
        type: 'integer',
        description: `Connect and total timeout in seconds (default ${DEFAULT_TIMEOUT_SEC})`,
      },
      {
        name: 'max_bytes',
        type: 'integer',
        description: `Maximum body bytes to return (default ${DEFAULT_MAX_BYTES})`,
      },
    ],
  },
  execute: fetchUrlTool,
};
