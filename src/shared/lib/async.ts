export type DeadlineOutcome<T> =
  | { status: 'settled'; value: T }
  | { status: 'timeout' }
  | { status: 'aborted' };

type Settled<T> = DeadlineOutcome<T> | { status: 'rejected'; error: unknown };

/**
 * Resolve after `ms`, or early (without rejecting) when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
  });
}

/**
 * Run `task` under a per-call deadline linked to the caller's signal.
 *
 * The task receives a signal that fires on either the deadline or the
 * caller's cancellation; whichever comes first decides the outcome, and a
 * result that arrives afterwards is dropped. Rejections from `task` propagate.
 */
export async function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<DeadlineOutcome<T>> {
  if (signal?.aborted) return { status: 'aborted' };

  const controller = new AbortController();
  let interrupt: (outcome: Settled<T>) => void = () => {};
  const interrupted = new Promise<Settled<T>>((resolve) => {
    interrupt = resolve;
  });
  const timer = setTimeout(() => {
    controller.abort();
    interrupt({ status: 'timeout' });
  }, timeoutMs);
  const onAbort = () => {
    controller.abort();
    interrupt({ status: 'aborted' });
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  // Rejections are captured as values so a late failure, after the deadline
  // has already won the race, never surfaces as an unhandled rejection.
  const settled = Promise.resolve()
    .then(() => task(controller.signal))
    .then(
      (value): Settled<T> => ({ status: 'settled', value }),
      (error: unknown): Settled<T> => ({ status: 'rejected', error }),
    );

  try {
    const outcome = await Promise.race([settled, interrupted]);
    if (outcome.status === 'rejected') throw outcome.error;
    return outcome;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}
