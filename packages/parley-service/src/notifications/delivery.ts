/**
 * Bounded delivery retry.
 *
 * Runs one gateway call up to `maxAttempts` times, stopping at the first
 * confirmed delivery. A thrown error counts as an undelivered attempt. The
 * loop never runs past `maxAttempts`.
 */

import type { Logger } from '../util/logger';
import type { DeliveryReport } from './gateway';

export type BackoffKind = 'fixed' | 'linear';

export interface DeliveryPolicy {
  maxAttempts: number;
  /** Delay before the second attempt, in milliseconds */
  retryDelayMs: number;
  /** `fixed` waits `retryDelayMs` every time; `linear` waits `retryDelayMs * attempt` */
  backoff: BackoffKind;
}

export const DEFAULT_DELIVERY_POLICY: DeliveryPolicy = {
  maxAttempts: 3,
  retryDelayMs: 2000,
  backoff: 'fixed',
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface DeliveryOutcome {
  delivered: boolean;
  attempts: number;
  /** Last error thrown by the gateway, if the final attempt threw */
  lastError?: unknown;
}

/** Delay to wait after failed attempt number `attempt` (1-based). */
export function retryDelay(policy: DeliveryPolicy, attempt: number): number {
  return policy.backoff === 'linear' ? policy.retryDelayMs * attempt : policy.retryDelayMs;
}

export async function deliverWithRetry(
  send: () => Promise<DeliveryReport>,
  policy: DeliveryPolicy,
  wait: Sleep,
  log: Logger,
): Promise<DeliveryOutcome> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const report = await send();
      lastError = undefined;
      if (report.delivered) {
        log.debug({ attempt, notificationsSent: report.notificationsSent }, 'Delivery confirmed');
        return { delivered: true, attempts: attempt };
      }
      log.warn({ attempt, maxAttempts, notificationsSent: report.notificationsSent }, 'Sent but not delivered');
    } catch (err) {
      lastError = err;
      log.warn({ err, attempt, maxAttempts }, 'Delivery attempt failed');
    }

    if (attempt < maxAttempts) {
      await wait(retryDelay(policy, attempt));
    }
  }

  return lastError === undefined
    ? { delivered: false, attempts: maxAttempts }
    : { delivered: false, attempts: maxAttempts, lastError };
}
