/**
 * Readiness Poller - waits for the database to accept connections
 */

import { setTimeout as sleep } from 'timers/promises';
import { ReadinessTimeout, errorMessage } from '../core/errors.js';

/** Resolves when the target is ready, rejects otherwise */
export type ReadinessProbe = () => Promise<void>;

export interface ReadinessOptions {
  /** Shown in diagnostics, e.g. "postgres@db:5432" */
  target: string;
  intervalMs: number;
  maxAttempts: number;
  signal?: AbortSignal;
  onAttemptFailed?: (attempt: number, reason: string) => void;
}

export interface Ready {
  attempts: number;
}

/**
 * Probe until the first success, sleeping intervalMs between failures.
 *
 * @throws ReadinessTimeout after maxAttempts consecutive failures
 * @throws the signal's abort reason when cancelled
 */
export async function waitUntilReady(probe: ReadinessProbe, options: ReadinessOptions): Promise<Ready> {
  const { target, intervalMs, maxAttempts, signal, onAttemptFailed } = options;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted();
    try {
      await probe();
      return { attempts: attempt };
    } catch (error) {
      onAttemptFailed?.(attempt, errorMessage(error));
    }

    if (attempt < maxAttempts) {
      await sleep(intervalMs, undefined, { signal });
    }
  }

  throw new ReadinessTimeout(target, maxAttempts);
}
