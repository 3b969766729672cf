import { describe, expect, it, vi } from 'vitest';

import { AbortError } from '../../errors/index.js';
import { awaitWithCancellation, isAbortError, throwIfAborted, toAbortError } from '../abort-utils.js';

function deferred<T>() {
  let resolve!: (value: T) => void;
  let reject!: (error: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('awaitWithCancellation', () => {
  it('returns the task value when no signal is given', async () => {
    const cancel = vi.fn();

    await expect(awaitWithCancellation(Promise.resolve(42), undefined, cancel, vi.fn())).resolves.toBe(42);
    expect(cancel).not.toHaveBeenCalled();
  });

  it('returns the task value when the signal never fires', async () => {
    const controller = new AbortController();
    const cancel = vi.fn();

    await expect(awaitWithCancellation(Promise.resolve('rows'), controller.signal, cancel, vi.fn())).resolves.toBe(
      'rows'
    );
    expect(cancel).not.toHaveBeenCalled();
  });

  it('propagates task failures unchanged', async () => {
    const controller = new AbortController();
    const failure = new Error('SQLITE_BUSY');

    await expect(
      awaitWithCancellation(Promise.reject(failure), controller.signal, vi.fn(), vi.fn())
    ).rejects.toBe(failure);
  });

  it('cancels, waits for the task to settle, then throws AbortError', async () => {
    const controller = new AbortController();
    const task = deferred<string>();
    const events: string[] = [];
    const cancel = vi.fn(() => {
      events.push('cancel');
      // a driver reacting to the cancel request fails the running statement
      task.reject(new Error('interrupted'));
    });
    void task.promise.catch(() => events.push('task settled'));

    const pending = awaitWithCancellation(task.promise, controller.signal, cancel, vi.fn());
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortError);
    expect(cancel).toHaveBeenCalledTimes(1);
    expect(events).toEqual(['cancel', 'task settled']);
  });

  it('does not throw before a slow task finishes after cancel', async () => {
    const controller = new AbortController();
    const task = deferred<number>();
    let settled = false;

    const pending = awaitWithCancellation(task.promise, controller.signal, vi.fn(), vi.fn()).catch(
      (error: unknown) => {
        settled = true;
        return error;
      }
    );
    controller.abort();
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(settled).toBe(false);

    task.resolve(1);
    const error = await pending;

    expect(settled).toBe(true);
    expect(isAbortError(error)).toBe(true);
  });

  it('cancels immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('shutdown'));
    const cancel = vi.fn();

    const error: unknown = await awaitWithCancellation(Promise.resolve(1), controller.signal, cancel, vi.fn()).catch(
      (e: unknown) => e
    );

    expect(cancel).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(AbortError);
    expect(error).toMatchObject({ message: 'shutdown' });
  });

  it('reports a failing cancel without replacing the AbortError', async () => {
    const controller = new AbortController();
    const task = deferred<number>();
    const cancelFailure = new Error('cannot interrupt');
    const onCancelError = vi.fn();

    const pending = awaitWithCancellation(
      task.promise,
      controller.signal,
      () => {
        task.resolve(0);
        throw cancelFailure;
      },
      onCancelError
    );
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortError);
    expect(onCancelError).toHaveBeenCalledWith(cancelFailure);
  });
});

describe('throwIfAborted', () => {
  it('does nothing for a live signal', () => {
    expect(() => throwIfAborted(new AbortController().signal)).not.toThrow();
    expect(() => throwIfAborted(undefined)).not.toThrow();
  });

  it('throws AbortError for an aborted signal', () => {
    const controller = new AbortController();
    controller.abort();

    expect(() => throwIfAborted(controller.signal)).toThrow(AbortError);
  });
});

describe('toAbortError', () => {
  it('keeps an existing AbortError', () => {
    const error = new AbortError('stop');
    expect(toAbortError(error)).toBe(error);
  });

  it('keeps the reason as cause', () => {
    const reason = new Error('deadline');
    const error = toAbortError(reason);

    expect(error.message).toBe('deadline');
    expect(error.cause).toBe(reason);
  });

  it('uses a default message for non-error reasons', () => {
    expect(toAbortError('nope').message).toBe('The operation was aborted');
  });
});
