import { RequestTimeoutError } from '../errors.js';

/**
 * Run `task` with an overall deadline.
 *
 * The task receives a signal that aborts when the deadline passes or when
 * `parent` aborts. On deadline the returned promise rejects with
 * `RequestTimeoutError` even if the task ignores its signal. Parent aborts are
 * only forwarded; the task decides how to fail.
 *
 * A `timeoutMs` of `0` runs the task without a deadline.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) forwardAbort();
  else parent?.addEventListener('abort', forwardAbort, { once: true });

  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  const pending: Promise<T>[] = [task(controller.signal)];

  if (timeoutMs > 0) {
    pending.push(
      new Promise<never>((_, reject) => {
        timeoutHandle = setTimeout(() => {
          const error = new RequestTimeoutError(timeoutMs);
          controller.abort(error);
          reject(error);
        }, timeoutMs);
      }),
    );
  }

  try {
    return await Promise.race(pending);
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
    parent?.removeEventListener('abort', forwardAbort);
  }
}
