import { setTimeout as sleep } from 'timers/promises';

import { logger } from './logger.js';

export interface RetryOptions {
  /** Extra attempts after the first one. */
  retries?: number;
  base?: number;
  max?: number;
  /** Shown in the retry log line, e.g. `email.send`. */
  label?: string;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/** Socket-level failures worth another attempt; the request may never have reached the provider. */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 3, base = 250, max = 4000, label = 'operation' } = options;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !isTransient(error)) throw error;

      const delayMs = backoffDelay(attempt, base, max);
      logger.warn(`[retry] ${label} failed, retrying`, {
        attempt: attempt + 1,
        delayMs,
        status: extractStatus(error),
        code: networkCode(error),
      });
      options.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }
}

/** Exponential backoff capped at `max`, with the upper half jittered. */
function backoffDelay(attempt: number, base: number, max: number): number {
  const ceiling = Math.min(max, base * 2 ** attempt);
  return Math.max(base, Math.round(ceiling / 2 + Math.random() * (ceiling / 2)));
}

/** Timeouts, rate limits, 5xx and dropped connections. */
export function isTransient(error: unknown): boolean {
  const status = extractStatus(error);
  if (status !== null) return status === 408 || status === 429 || status >= 500;
  const code = networkCode(error);
  return code !== null && TRANSIENT_NETWORK_CODES.has(code);
}

function field(value: unknown, key: string): unknown {
  if (!value || typeof value !== 'object') return undefined;
  return Reflect.get(value, key);
}

function networkCode(error: unknown): string | null {
  for (const candidate of [field(error, 'code'), field(field(error, 'cause'), 'code')]) {
    if (typeof candidate === 'string' && /^[A-Z_]+$/.test(candidate)) return candidate;
  }
  return null;
}

/** HTTP status carried by an API client error, whichever shape the client uses. */
export function extractStatus(error: unknown): number | null {
  const candidates = [field(error, 'status'), field(field(error, 'response'), 'status'), field(error, 'code')];
  for (const candidate of candidates) {
    if (typeof candidate === 'number' && Number.isFinite(candidate)) return candidate;
    if (typeof candidate === 'string' && /^\d{3}$/.test(candidate)) return Number(candidate);
  }
  return null;
}
