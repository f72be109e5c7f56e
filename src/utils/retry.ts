import { setTimeout as sleep } from 'timers/promises';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async ms => {
    await sleep(ms);
  },
};

export interface RetryPolicy {
  maxAttempts: number;
  intervalMs: number;
  /** Overall budget measured from the first attempt. Unbounded when omitted. */
  timeoutMs?: number;
}

export interface ProbeContext {
  attempt: number;
  /** Budget left before the loop gives up, when the policy has a timeout. */
  remainingMs?: number;
}

export interface RetryOptions extends RetryPolicy {
  probe: (context: ProbeContext) => Promise<boolean>;
  /** Errors that count as "not yet satisfied". Anything else is rethrown. */
  tolerate?: (error: unknown) => boolean;
  clock?: Clock;
}

export type RetryResult =
  | { satisfied: true; attempts: number; elapsedMs: number }
  | {
      satisfied: false;
      attempts: number;
      elapsedMs: number;
      exhausted: 'attempts' | 'timeout';
      lastError?: unknown;
    };

export async function retryUntil(options: RetryOptions): Promise<RetryResult> {
  const { maxAttempts, intervalMs, timeoutMs, probe } = options;
  const tolerate = options.tolerate ?? (() => false);
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();
  const elapsed = () => clock.now() - startedAt;

  let attempts = 0;
  let lastError: unknown;
  const exhausted = (reason: 'attempts' | 'timeout'): RetryResult => ({
    satisfied: false,
    attempts,
    elapsedMs: elapsed(),
    exhausted: reason,
    lastError,
  });

  while (attempts < maxAttempts) {
    if (timeoutMs !== undefined && elapsed() >= timeoutMs) {
      return exhausted('timeout');
    }

    attempts++;
    const remainingMs = timeoutMs === undefined ? undefined : timeoutMs - elapsed();

    try {
      if (await probe({ attempt: attempts, remainingMs })) {
        return { satisfied: true, attempts, elapsedMs: elapsed() };
      }
    } catch (error) {
      if (!tolerate(error)) {
        throw error;
      }
      lastError = error;
    }

    if (attempts >= maxAttempts) {
      break;
    }

    // Sleeping past the deadline would only delay the same answer
    if (timeoutMs !== undefined && elapsed() + intervalMs > timeoutMs) {
      return exhausted('timeout');
    }

    await clock.sleep(intervalMs);
  }

  return exhausted('attempts');
}
