import type { SideEffectName, SideEffectOutcome } from '@core/interfaces/booking.types.js';

import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';

export type SideEffectTask = () => Promise<'ok' | 'skipped'>;

export class SideEffectTimeoutError extends Error {
  constructor(effect: SideEffectName, timeoutMs: number) {
    super(`${effect} timed out after ${timeoutMs}ms`);
    this.name = 'SideEffectTimeoutError';
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs a best-effort task with a time bound. Never rejects: failures and timeouts
 * come back as a `failed` outcome so the booking decision is unaffected.
 */
export async function runSideEffect(
  effect: SideEffectName,
  task: SideEffectTask,
  timeoutMs: number,
  context: Record<string, unknown> = {},
): Promise<SideEffectOutcome> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new SideEffectTimeoutError(effect, timeoutMs)), timeoutMs);
    timer.unref();
  });

  try {
    const status = await Promise.race([task(), timeout]);
    return { effect, status };
  } catch (err) {
    incrementCounter('side_effect_failed');
    logger.error(`[side-effect] ${effect} failed`, { ...context, err });
    return { effect, status: 'failed', detail: errorMessage(err) };
  } finally {
    clearTimeout(timer);
  }
}

export function skipped(effect: SideEffectName, detail: string): SideEffectOutcome {
  return { effect, status: 'skipped', detail };
}

export function warningsOf(outcomes: SideEffectOutcome[]): string[] {
  return outcomes
    .filter((o) => o.status === 'failed')
    .map((o) => `${o.effect}: ${o.detail ?? 'failed'}`);
}
