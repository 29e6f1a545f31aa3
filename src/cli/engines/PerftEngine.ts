import type { PerftQuery, PerftReport } from '../../shared/types/perft';
import type { CancellationToken } from '../../shared/utils/cancellation';

export interface PerftQueryOptions {
  /** Cancels the query; the engine releases the subprocess it was waiting on. */
  token?: CancellationToken | undefined;
  /** Upper bound for the round trip in milliseconds; 0 or unset means unbounded. */
  timeoutMs?: number | undefined;
}

/**
 * A backend able to count perft nodes below every legal move of a position.
 *
 * Implementations reject with a QueryFailedError subclass (transport,
 * protocol, timeout, busy, canceled); they never partially succeed.
 */
export interface PerftEngine {
  /** Short display name used in error messages and logs. */
  readonly name: string;

  perft(query: PerftQuery, options?: PerftQueryOptions): Promise<PerftReport>;

  /** Release any subprocess owned by the engine. Safe to call repeatedly. */
  dispose(): Promise<void>;
}

/**
 * Engines that understand the alternate castling rules. The flag is engine
 * state, not part of a query.
 */
export interface Chess960Capable {
  readonly isChess960: boolean;
  setChess960(enabled: boolean): void;
}

export function supportsChess960(engine: PerftEngine): engine is PerftEngine & Chess960Capable {
  return 'setChess960' in engine && typeof engine.setChess960 === 'function';
}
