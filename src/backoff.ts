export interface BackoffOptions {
  /** Delay before the first retry, before jitter */
  baseDelayMs: number;
  /** Upper bound of any delay */
  maxDelayMs: number;
  /** Share of the delay that is randomized, 0 to 1. Default: 0.5 */
  jitter?: number;
}

/**
 * Computes the wait before reconnect attempt `attempt` (1-based):
 * exponential growth from baseDelayMs, capped at maxDelayMs, with the
 * jittered share drawn from `random`.
 *
 * @example
 * ```ts
 * computeBackoffDelay(3, { baseDelayMs: 1000, maxDelayMs: 30_000 }, () => 1);
 * // 4000
 * ```
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const capped = Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** exponent);
  const jitter = Math.min(1, Math.max(0, options.jitter ?? 0.5));
  return Math.round(capped * (1 - jitter) + capped * jitter * random());
}

/**
 * A timer that can be cut short.
 * `done` resolves true when the delay elapsed and false when cancelled.
 */
export interface CancellableDelay {
  readonly done: Promise<boolean>;
  cancel(): void;
}

export function createDelay(ms: number): CancellableDelay {
  let settle: (elapsed: boolean) => void = () => undefined;
  let timer: ReturnType<typeof setTimeout> | null = null;

  const done = new Promise<boolean>((resolve) => {
    settle = resolve;
    timer = setTimeout(() => {
      timer = null;
      resolve(true);
    }, ms);
  });

  return {
    done,
    cancel() {
      if (timer !== null) {
        clearTimeout(timer);
        timer = null;
      }
      settle(false);
    },
  };
}
