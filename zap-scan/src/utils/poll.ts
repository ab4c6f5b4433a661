import { setTimeout as sleep } from 'timers/promises';

export interface PollOptions {
  intervalMs: number;
  /** Give up once this much time has passed; omitted means no deadline */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type PollOutcome<T> =
  | { status: 'done'; value: T; attempts: number }
  | { status: 'timeout'; attempts: number; elapsedMs: number }
  | { status: 'aborted'; attempts: number };

/**
 * Call `check` every `intervalMs` until it returns a value other than undefined.
 *
 * Each attempt gets a signal that aborts on cancellation and, when there is a
 * deadline, once the deadline passes, so a hung check cannot outlive either.
 * Errors thrown by `check` propagate unchanged unless one of those fired.
 */
export async function pollUntil<T>(
  check: (attempt: number, signal: AbortSignal | undefined) => Promise<T | undefined>,
  options: PollOptions
): Promise<PollOutcome<T>> {
  const { intervalMs, timeoutMs, signal } = options;
  const startedAt = Date.now();
  let attempts = 0;

  while (true) {
    if (signal?.aborted) {
      return { status: 'aborted', attempts };
    }

    attempts++;
    const deadline =
      timeoutMs === undefined ? undefined : AbortSignal.timeout(Math.max(1, timeoutMs - (Date.now() - startedAt)));
    const attemptSignal = combineSignals(signal, deadline);

    let value: T | undefined;
    try {
      value = await check(attempts, attemptSignal);
    } catch (error) {
      if (signal?.aborted) {
        return { status: 'aborted', attempts };
      }
      if (deadline?.aborted) {
        return { status: 'timeout', attempts, elapsedMs: Date.now() - startedAt };
      }
      throw error;
    }
    if (value !== undefined) {
      return { status: 'done', value, attempts };
    }
    if (signal?.aborted) {
      return { status: 'aborted', attempts };
    }

    const elapsedMs = Date.now() - startedAt;
    if (timeoutMs !== undefined && (deadline?.aborted || elapsedMs >= timeoutMs)) {
      return { status: 'timeout', attempts, elapsedMs };
    }

    const waitMs = timeoutMs === undefined ? intervalMs : Math.min(intervalMs, timeoutMs - elapsedMs);
    try {
      await sleep(waitMs, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        return { status: 'aborted', attempts };
      }
      throw error;
    }
  }
}

/**
 * Merge optional signals into one that aborts when any of them does
 */
export function combineSignals(...signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const present = signals.filter((s): s is AbortSignal => s !== undefined);
  if (present.length === 0) return undefined;
  if (present.length === 1) return present[0];
  return AbortSignal.any(present);
}
