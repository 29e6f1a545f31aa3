// Timeout helpers for backend queries.
//
// runWithTimeout wraps a Promise-based operation so callers can:
//   - Enforce an explicit time budget on a subprocess round trip.
//   - Record the duration in milliseconds for logging.
//   - Distinguish between successful completion, timeout, and cancellation.
//
// The helper does not abort the underlying work. Callers that own a resource
// (a child process) must release it when the outcome is not 'ok'.

import {
  isOperationCanceledError,
  type CancellationReason,
  type CancellationToken,
} from './cancellation';

export type TimedOperationOutcome = 'ok' | 'timeout' | 'canceled';

export type TimedOperationResult<T> =
  | { kind: 'ok'; durationMs: number; value: T }
  | { kind: 'timeout'; durationMs: number }
  | { kind: 'canceled'; durationMs: number; cancellationReason: CancellationReason };

export interface TimedOperationOptions {
  /** Maximum allowed duration in milliseconds; 0 means unbounded. */
  timeoutMs: number;
  /** Optional cancellation token; cancellation settles the result immediately. */
  token?: CancellationToken | undefined;
  /** Clock dependency (overridable for tests). Defaults to Date.now. */
  now?: () => number;
}

class TimeoutSignal {
  constructor(readonly timeoutMs: number) {}
}

class CancelSignal {
  constructor(readonly reason: CancellationReason) {}
}

/**
 * Run an async operation with an upper time bound, returning a structured
 * result instead of throwing on timeout or cancellation.
 *
 * - A token that is already canceled yields `canceled` without starting the
 *   operation.
 * - An operation that rejects with an OperationCanceledError is reported as
 *   `canceled`.
 * - Every other rejection is rethrown unchanged.
 */
export async function runWithTimeout<T>(
  operation: () => Promise<T>,
  options: TimedOperationOptions
): Promise<TimedOperationResult<T>> {
  const { timeoutMs, token, now = Date.now } = options;
  const start = now();

  if (token?.isCanceled) {
    return { kind: 'canceled', durationMs: 0, cancellationReason: token.reason };
  }

  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  let detachCancel: (() => void) | undefined;

  const guards: Array<Promise<never>> = [];
  if (timeoutMs > 0) {
    guards.push(
      new Promise<never>((_, reject) => {
        timeoutHandle = setTimeout(() => reject(new TimeoutSignal(timeoutMs)), timeoutMs);
      })
    );
  }
  if (token) {
    guards.push(
      new Promise<never>((_, reject) => {
        detachCancel = token.onCancel((reason) => reject(new CancelSignal(reason)));
      })
    );
  }

  try {
    const value = await Promise.race([operation(), ...guards]);
    return { kind: 'ok', durationMs: now() - start, value };
  } catch (error) {
    const durationMs = now() - start;

    if (error instanceof TimeoutSignal) {
      return { kind: 'timeout', durationMs };
    }
    if (error instanceof CancelSignal) {
      return { kind: 'canceled', durationMs, cancellationReason: error.reason };
    }
    if (isOperationCanceledError(error)) {
      return { kind: 'canceled', durationMs, cancellationReason: error.cancellationReason };
    }

    throw error;
  } finally {
    if (timeoutHandle !== undefined) {
      clearTimeout(timeoutHandle);
    }
    detachCancel?.();
  }
}
