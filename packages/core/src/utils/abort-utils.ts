import { AbortError } from '../errors/index.js';

const ABORTED: unique symbol = Symbol('aborted');

/**
 * Coerce an abort reason into an AbortError, keeping the reason as `cause`.
 */
export function toAbortError(reason: unknown): AbortError {
  if (reason instanceof AbortError) return reason;
  const message = reason instanceof Error && reason.message ? reason.message : 'The operation was aborted';
  return new AbortError(message, { cause: reason });
}

/**
 * True for our AbortError as well as the DOMException thrown by platform APIs.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw toAbortError(signal.reason);
  }
}

/**
 * Wait for `task`, giving up when `signal` aborts.
 *
 * On abort: `cancel` is invoked to stop the underlying work, then the task is
 * awaited until it settles, and only then is an AbortError thrown. The task is
 * never left running behind the caller's back. A failing `cancel` is reported
 * through `onCancelError` and does not replace the AbortError.
 */
export async function awaitWithCancellation<T>(
  task: Promise<T>,
  signal: AbortSignal | undefined,
  cancel: () => void | Promise<void>,
  onCancelError: (error: unknown) => void
): Promise<T> {
  if (!signal) return task;

  if (signal.aborted) {
    // started against an already-cancelled signal: stop it the same way
    return stopAndThrow(task, signal, cancel, onCancelError);
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<typeof ABORTED>((resolve) => {
    onAbort = () => resolve(ABORTED);
    signal.addEventListener('abort', onAbort, { once: true });
  });

  let outcome: T | typeof ABORTED;
  try {
    outcome = await Promise.race([task, aborted]);
  } finally {
    if (onAbort) signal.removeEventListener('abort', onAbort);
  }

  if (outcome !== ABORTED) return outcome;
  return stopAndThrow(task, signal, cancel, onCancelError);
}

async function stopAndThrow(
  task: Promise<unknown>,
  signal: AbortSignal,
  cancel: () => void | Promise<void>,
  onCancelError: (error: unknown) => void
): Promise<never> {
  try {
    await cancel();
  } catch (cancelError) {
    onCancelError(cancelError);
  }
  await Promise.allSettled([task]);
  throw toAbortError(signal.reason);
}
