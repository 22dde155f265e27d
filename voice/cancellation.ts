/**
 * Cancellable awaiting of port calls.
 *
 * The loop never awaits a port promise directly. Each call runs under a child
 * AbortController that is aborted when the loop's stop signal fires or the
 * call's deadline passes. The loop stops waiting at that moment; the port is
 * told through the child signal and is expected to forward it to its own work.
 * A result that arrives after the loop stopped waiting is dropped.
 *
 * Responsibilities:
 * - Run a task with a per-call signal linked to the loop's stop signal
 * - Reject with Interrupted on stop and DeadlineExceeded on timeout
 * - Log failures of abandoned tasks instead of leaving them unhandled
 * - Provide a cancellable delay
 */

import { DeadlineExceeded, Interrupted, describeError } from "./errors.js";

import type { LoopLogger } from "./ports.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Options for runCancellable.
 */
export interface CancellableOptions {
  /** The loop's stop signal */
  signal: AbortSignal;
  /** Deadline in ms. 0 or less disables it. */
  timeoutMs?: number;
  /** Name of the call, used in deadline errors and logs */
  label: string;
  /** Where failures of abandoned tasks are reported (defaults to console) */
  logger?: LoopLogger;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Run `task` and wait for it, unless the stop signal fires or the deadline
 * passes first.
 *
 * If the stop signal is already aborted the task is never started.
 *
 * @param task - Work to run; receives a signal aborted on stop or deadline
 * @param options - Stop signal, deadline and label
 * @returns The task's result
 * @throws Interrupted if the stop signal fires before the task settles
 * @throws DeadlineExceeded if the deadline passes before the task settles
 */
export function runCancellable<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: CancellableOptions,
): Promise<T> {
  const { signal, label } = options;
  const logger: LoopLogger = options.logger ?? console;
  const timeoutMs = options.timeoutMs ?? 0;

  if (signal.aborted) {
    return Promise.reject(new Interrupted());
  }

  const child = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | null = null;

    /** Settle once and detach listeners. */
    function finish(settle: () => void): void {
      if (settled) return;
      settled = true;
      signal.removeEventListener("abort", onAbort);
      if (timer !== null) clearTimeout(timer);
      settle();
    }

    function onAbort(): void {
      finish(() => reject(new Interrupted()));
      child.abort(new Interrupted());
    }

    signal.addEventListener("abort", onAbort, { once: true });

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        const error = new DeadlineExceeded(label, timeoutMs);
        finish(() => reject(error));
        child.abort(error);
      }, timeoutMs);
    }

    let work: Promise<T>;
    try {
      work = task(child.signal);
    } catch (err) {
      finish(() => reject(err));
      return;
    }

    work.then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => {
        if (settled) {
          logAbandonedFailure(logger, label, err);
          return;
        }
        finish(() => reject(err));
      },
    );
  });
}

/**
 * Wait for `ms`, resolving early (without error) if the signal fires.
 *
 * @param ms - Delay in milliseconds
 * @param signal - Stop signal
 */
export function delay(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return Promise.resolve();

  return new Promise<void>((resolve) => {
    const timer = setTimeout(done, ms);

    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    }

    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * The error an aborted signal carries, for adapters that reject on abort.
 *
 * @param signal - An aborted signal
 * @returns signal.reason when it is an Error, otherwise Interrupted
 */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Interrupted();
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Log a failure from a task the loop already stopped waiting for.
 * Aborts forwarded by the loop itself are expected and not logged.
 *
 * @param logger - Diagnostics sink
 * @param label - Name of the call
 * @param err - The late rejection
 */
function logAbandonedFailure(logger: LoopLogger, label: string, err: unknown): void {
  if (err instanceof Interrupted || err instanceof DeadlineExceeded) return;
  if (err instanceof Error && err.name === "AbortError") return;
  logger.warn(`[loop] ${label} failed after it was abandoned: ${describeError(err)}`);
}
