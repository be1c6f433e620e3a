import { StageFailure } from "./errors.js";

export type BackoffPolicy = {
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Fraction of the delay that may be shaved off at random, in [0, 1]. */
  jitter: number;
};

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 500,
  multiplier: 2,
  maxDelayMs: 8_000,
  jitter: 0.5
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based):
 * `min(max, base * mult^(attempt-1))`, scaled into `[1 - jitter, 1]` of itself.
 */
export function backoffDelayMs(attempt: number, policy: BackoffPolicy, random: () => number = Math.random): number {
  const exp = Math.max(0, attempt - 1);
  const raw = Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.multiplier ** exp);
  const jitter = Math.min(1, Math.max(0, policy.jitter));
  const r = Math.min(1, Math.max(0, random()));
  return Math.max(0, Math.round(raw * (1 - jitter * r)));
}

function cancelledFailure(signal: AbortSignal): StageFailure {
  const reason: unknown = signal.reason;
  if (reason instanceof StageFailure) return reason;
  const msg = reason instanceof Error && reason.message.trim().length > 0 ? reason.message : "Cancelled";
  return new StageFailure("Cancelled", msg);
}

export const sleep: SleepFn = (ms, signal) => {
  if (signal?.aborted) return Promise.reject(cancelledFailure(signal));
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(cancelledFailure(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
};

/**
 * Runs `work` with a hard deadline. The work receives a signal that aborts on the deadline
 * or on the outer signal; the returned promise settles at the deadline even if the work
 * ignores its signal.
 */
export async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  outer?: AbortSignal
): Promise<T> {
  if (outer?.aborted) throw cancelledFailure(outer);

  const controller = new AbortController();
  return await new Promise<T>((resolve, reject) => {
    let settled = false;
    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
      fn();
    };

    const timer = setTimeout(() => {
      const failure = new StageFailure("Timeout", `${label} exceeded its ${timeoutMs}ms deadline`);
      controller.abort(failure);
      settle(() => reject(failure));
    }, Math.max(0, timeoutMs));

    const onAbort = () => {
      const failure = outer ? cancelledFailure(outer) : new StageFailure("Cancelled", "Cancelled");
      controller.abort(failure);
      settle(() => reject(failure));
    };
    outer?.addEventListener("abort", onAbort, { once: true });

    work(controller.signal).then(
      (value) => settle(() => resolve(value)),
      (err: unknown) => settle(() => reject(err))
    );
  });
}
