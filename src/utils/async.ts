// src/utils/async.ts

import { WorkflowAborted } from '../errors';

export class TimeoutError extends Error {
  constructor(public label: string, public timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new WorkflowAborted();
  }
}

/**
 * Runs `task` with a signal that aborts after `timeoutMs` or when `parent`
 * aborts, whichever happens first. The returned promise settles as soon as
 * the signal fires even if the task ignores it.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal,
): Promise<T> {
  throwIfAborted(parent);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const cancelled = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    onParentAbort = () => {
      const error = new WorkflowAborted(`${label} aborted`);
      controller.abort(error);
      reject(error);
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });
  });

  try {
    return await Promise.race([task(controller.signal), cancelled]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) {
      parent?.removeEventListener('abort', onParentAbort);
    }
  }
}
