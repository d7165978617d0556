// =============================================================================
// STOCKROOM — Request Cancellation Signal
// =============================================================================

import { EventEmitter } from 'events';
import { AuthError } from '../errors';

/** The parts of an outgoing response needed to notice a disconnect. */
export interface ClosableResponse extends EventEmitter {
  readonly writableFinished: boolean;
}

export interface RequestSignal {
  signal: AbortSignal;
  /** Stop listening and cancel the deadline. */
  release(): void;
}

/**
 * Abort signal for one request. Fires with RequestAborted when the client
 * goes away before the response is finished, or RequestTimeout once
 * `timeoutMs` elapses. The abort reason is always an AuthError.
 */
export function createRequestSignal(res: ClosableResponse, timeoutMs: number): RequestSignal {
  const controller = new AbortController();

  const onClose = () => {
    if (!res.writableFinished) {
      controller.abort(new AuthError('RequestAborted'));
    }
  };
  res.once('close', onClose);

  const timer = setTimeout(() => {
    controller.abort(new AuthError('RequestTimeout'));
  }, timeoutMs);

  return {
    signal: controller.signal,
    release: () => {
      clearTimeout(timer);
      res.removeListener('close', onClose);
    },
  };
}

/**
 * Settle with `work`, or reject with the signal's reason as soon as it aborts,
 * whichever comes first.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}
