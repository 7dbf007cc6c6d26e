/** Generic timeout wrapper. Rejects with TimeoutError if the promise doesn't settle within ms. */

import type { ChildProcess } from 'node:child_process';

/** Custom error class for timeout detection via instanceof. */
export class TimeoutError extends Error {
  readonly timeoutMs: number | null;

  constructor(message = 'Timed out', timeoutMs: number | null = null) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export interface WithTimeoutOptions {
  /** If provided, the child process is killed on timeout so it doesn't leak. */
  childProcess?: ChildProcess;
  /** Names the operation in the timeout message. */
  label?: string;
}

export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  options?: WithTimeoutOptions,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      options?.childProcess?.kill();
      const message = options?.label ? `${options.label} timed out after ${ms}ms` : 'Timed out';
      reject(new TimeoutError(message, ms));
    }, ms);
    promise.then(
      (val) => { clearTimeout(timer); resolve(val); },
      (err: unknown) => { clearTimeout(timer); reject(err); },
    );
  });
}
