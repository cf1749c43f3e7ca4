import { errnoCode } from '../tools/tool-error.js';

export class ClientError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'ClientError';
  }
}

const RE_CONN_REFUSED = /ECONNREFUSED/i;

export function isConnRefused(e: unknown): boolean {
  const cause = e instanceof Error ? e.cause : undefined;
  if (errnoCode(cause) === 'ECONNREFUSED' || errnoCode(e) === 'ECONNREFUSED') return true;
  return e instanceof Error && RE_CONN_REFUSED.test(e.message);
}

export function isTimeout(e: unknown): boolean {
  return e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError');
}

export function asError(e: unknown, fallback = 'unknown error'): Error {
  if (e instanceof Error) return e;
  if (e === undefined) return new Error(fallback);
  return new Error(String(e));
}

/** Retry delays can be shortened in tests through TERMPILOT_TEST_RETRY_DELAY_MS. */
export function getRetryDelayMs(defaultMs: number): number {
  const raw = process.env.TERMPILOT_TEST_RETRY_DELAY_MS;
  if (raw == null) return defaultMs;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) return defaultMs;
  return Math.floor(parsed);
}
