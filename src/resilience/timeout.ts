/**
 * Deadline helpers shared by every collaborator call.
 */

export class TimeoutError extends Error {
  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class AbortedError extends Error {
  constructor(label: string) {
    super(`${label} aborted by caller`);
    this.name = 'AbortedError';
  }
}

/**
 * Race `work` against a timer and an optional caller signal.
 * The callback receives a signal that fires on either, so cooperative
 * callees (SDK clients, fetch) stop their own work as well.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
  callerSignal?: AbortSignal,
): Promise<T> {
  if (callerSignal?.aborted) {
    throw new AbortedError(label);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onCallerAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);

    if (callerSignal) {
      onCallerAbort = () => {
        controller.abort();
        reject(new AbortedError(label));
      };
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  });

  try {
    return await Promise.race([work(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    if (callerSignal && onCallerAbort) {
      callerSignal.removeEventListener('abort', onCallerAbort);
    }
  }
}
