import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Abort signal guarding one request, plus the handle that releases its timer and listeners. */
export interface RequestSignal {
  /** `undefined` when there is neither a timeout nor a caller signal. */
  signal: AbortSignal | undefined;
  /** Call once the request settled. Idempotent. */
  settle: () => void;
}

/**
 * Combines a per-request timeout with the signals of whoever owns the request.
 *
 * The returned signal aborts with a {@link TimeoutError} once `timeoutMs` elapses,
 * or with the reason of the first owner signal that aborts
 * (an {@link AbortError} when that signal carries no reason).
 * `timeoutMs` of `false` or `0` disables the timer.
 */
export function requestSignal(
  timeoutMs: number | false,
  ...owners: Array<AbortSignal | null | undefined>
): RequestSignal {
  const sources = owners.filter((s): s is AbortSignal => s !== null && s !== undefined);
  if (!timeoutMs && sources.length === 0) {
    return { signal: undefined, settle: () => {} };
  }

  const controller = new AbortController();
  const cleanups: Array<() => void> = [];
  const settle = () => {
    for (const cleanup of cleanups.splice(0)) {
      cleanup();
    }
  };

  const abortWith = (reason: unknown) => {
    if (!controller.signal.aborted) {
      controller.abort(reason ?? new AbortError('error request aborted without a reason'));
    }
    settle();
  };

  for (const source of sources) {
    if (source.aborted) {
      abortWith(source.reason);
      return { signal: controller.signal, settle };
    }

    const onAbort = () => abortWith(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => source.removeEventListener('abort', onAbort));
  }

  if (timeoutMs) {
    const timer = setTimeout(() => abortWith(new TimeoutError(timeoutMs)), timeoutMs);
    cleanups.push(() => clearTimeout(timer));
  }

  return { signal: controller.signal, settle };
}
