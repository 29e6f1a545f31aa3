// Cancellation token primitives for backend queries.
//
// A query in flight holds a token; the front end keeps the matching source and
// cancels it on Ctrl-C. Engines subscribe with onCancel() so they can kill the
// subprocess they are waiting on instead of polling.

export type CancellationReason = unknown;

/**
 * Error raised by {@link CancellationToken.throwIfCanceled}. Carries the reason
 * supplied to cancel() for diagnostics.
 */
export class OperationCanceledError extends Error {
  readonly cancellationReason: CancellationReason;

  constructor(message: string, reason: CancellationReason) {
    super(message);
    this.name = 'OperationCanceledError';
    this.cancellationReason = reason;
    Object.setPrototypeOf(this, OperationCanceledError.prototype);
  }
}

export function isOperationCanceledError(error: unknown): error is OperationCanceledError {
  return error instanceof OperationCanceledError;
}

/**
 * Read-only view of a cancellation token.
 */
export interface CancellationToken {
  /** True once cancel() has been invoked on the associated source. */
  readonly isCanceled: boolean;
  /** Optional reason supplied by the canceller (for logging/diagnostics). */
  readonly reason?: CancellationReason;

  /**
   * Throws an OperationCanceledError if the token has been canceled.
   *
   *   token.throwIfCanceled('before spawning script');
   */
  throwIfCanceled(contextMessage?: string): void;

  /**
   * Register a listener invoked once when the token is canceled. If the token
   * is already canceled the listener runs synchronously. Returns a function
   * that removes the listener.
   */
  onCancel(listener: (reason: CancellationReason) => void): () => void;
}

/**
 * Mutable source for a {@link CancellationToken}.
 *
 *   const source = createCancellationSource();
 *   session.diff({ token: source.token }).catch(report);
 *   // later, from a SIGINT handler:
 *   source.cancel('interrupted');
 */
export interface CancellationSource {
  readonly token: CancellationToken;
  /**
   * Marks the token as canceled and notifies listeners. Subsequent calls are
   * no-ops.
   */
  cancel(reason?: CancellationReason): void;
}

export function createCancellationSource(): CancellationSource {
  let canceled = false;
  let reason: CancellationReason | undefined;
  const listeners = new Set<(reason: CancellationReason) => void>();

  const token: CancellationToken = {
    get isCanceled() {
      return canceled;
    },
    get reason() {
      return reason;
    },
    throwIfCanceled(contextMessage?: string): void {
      if (!canceled) return;
      const detail = contextMessage ? ` (${contextMessage})` : '';
      throw new OperationCanceledError(`Operation canceled${detail}`, reason);
    },
    onCancel(listener: (reason: CancellationReason) => void): () => void {
      if (canceled) {
        listener(reason);
        return () => undefined;
      }
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };

  return {
    token,
    cancel(nextReason?: CancellationReason): void {
      if (canceled) return;
      canceled = true;
      reason = nextReason;
      const pending = [...listeners];
      listeners.clear();
      for (const listener of pending) {
        listener(nextReason);
      }
    },
  };
}
