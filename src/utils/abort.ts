/**
 * AbortSignal helpers shared by the polling and retry loops
 */

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) {
    return reason;
  }
  if (typeof reason === 'string' && reason.length > 0) {
    return new Error(reason);
  }
  return new Error('Operation aborted');
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * setTimeout-based sleep that rejects with the abort reason as soon as the
 * signal fires and clears its timer.
 */
export const sleep: Sleep = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
