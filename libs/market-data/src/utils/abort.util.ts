import { CancelledError } from '../errors';
import { Sleep } from '../interfaces';

export const throwIfCancelled = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw new CancelledError();
  }
};

/**
 * Settles with `promise`, or rejects with CancelledError as soon as `signal` aborts.
 */
export const raceAbort = <T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> => {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
};

export const sleep: Sleep = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
