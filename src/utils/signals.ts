import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** A signal that aborts after a timeout, plus a handle to cancel the pending timer. */
export interface TimeoutSignal {
  /** Signal aborting with a {@link TimeoutError} once the timeout elapses */
  signal: AbortSignal;
  /** Cancels the timer once the request has settled */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after `timeoutMs`.
 *
 * When `timeoutMs` is `false`, `0` or `undefined`, no signal is created.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    timeoutMs,
  );

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), { once: true });

  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
}

/** A merged signal, plus a handle detaching it from its sources. */
export interface MergedSignal {
  /** Signal aborting once any source aborts */
  signal: AbortSignal;
  /** Removes the listeners left on the sources once the request has settled */
  cleanup: () => void;
}

/**
 * Merges several {@link AbortSignal} instances into one that aborts when any source does.
 *
 * - No signals: `null`.
 * - A single signal: returned as-is, with nothing to clean up.
 * - Otherwise a new signal that carries the first source's `reason`, or an
 *   {@link AbortError} when the source has none.
 *
 * Sources may outlive the merged signal, so `cleanup` must run once the request settles.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  const [first] = active;
  if (!first) {
    return null;
  }

  if (active.length === 1) {
    return { signal: first, cleanup: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const cleanup = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    cleanup();
    if (source.reason !== undefined) {
      controller.abort(source.reason);
      return;
    }

    controller.abort(new AbortError('error signal triggered with unknown reason'));
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, cleanup };
}
