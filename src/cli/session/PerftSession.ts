import { mergePerftReports, mismatchedRows, isTotalMismatch } from '../../shared/perft';
import {
  createNavigationState,
  gotoChild,
  gotoParent,
  gotoRoot,
  setDepth,
  setMoves,
  setPosition,
  toPerftQuery,
  type NavigationState,
} from '../../shared/stateMachines/navigation';
import type { MoveToken, PerftDiff, PositionDescriptor } from '../../shared/types/perft';
import type { CancellationToken } from '../../shared/utils/cancellation';
import { supportsChess960, type EnginePair } from '../engines';
import { logger } from '../utils/logger';

export interface PerftSessionOptions {
  /** Bound applied to each backend query; 0 means unbounded. */
  queryTimeoutMs?: number;
  initialState?: Partial<NavigationState>;
}

/**
 * One interactive comparison session: the navigation state plus the two
 * backends it queries. The session owns the engines and releases them in
 * {@link dispose}.
 */
export class PerftSession {
  private state: NavigationState;
  private readonly queryTimeoutMs: number;
  private disposed = false;

  constructor(
    private readonly engines: EnginePair,
    options: PerftSessionOptions = {}
  ) {
    this.state = createNavigationState(options.initialState);
    this.queryTimeoutMs = options.queryTimeoutMs ?? 0;
  }

  get fen(): PositionDescriptor {
    return this.state.fen;
  }

  get moves(): readonly MoveToken[] {
    return this.state.moves;
  }

  get depth(): number {
    return this.state.depth;
  }

  setPosition(fen: PositionDescriptor): void {
    this.state = setPosition(this.state, fen);
  }

  setMoves(moves: readonly MoveToken[]): void {
    this.state = setMoves(this.state, moves);
  }

  setDepth(depth: number): void {
    this.state = setDepth(this.state, depth);
  }

  gotoRoot(): void {
    this.state = gotoRoot(this.state);
  }

  gotoParent(): void {
    this.state = gotoParent(this.state);
  }

  gotoChild(move: MoveToken): void {
    this.state = gotoChild(this.state, move);
  }

  /** Takes effect on the next query to every engine that understands it. */
  setChess960(enabled: boolean): void {
    for (const engine of [this.engines.lhs, this.engines.rhs]) {
      if (supportsChess960(engine)) {
        engine.setChess960(enabled);
      }
    }
  }

  /**
   * Query both backends for the current position and merge their answers.
   *
   * The backends are asked one after the other with an identical query. Any
   * failure propagates unchanged and leaves the navigation state as it was.
   *
   * @throws DepthUnderflowError when the path is deeper than the target depth
   * @throws QueryFailedError when either backend fails
   */
  async diff(options: { token?: CancellationToken | undefined } = {}): Promise<PerftDiff> {
    const query = toPerftQuery(this.state);
    const queryOptions = { token: options.token, timeoutMs: this.queryTimeoutMs };

    logger.debug('Comparing perft counts', {
      fen: query.fen,
      moves: query.moves,
      depth: query.depth,
    });

    const lhs = await this.engines.lhs.perft(query, queryOptions);
    const rhs = await this.engines.rhs.perft(query, queryOptions);

    const diff = mergePerftReports(lhs, rhs);
    const mismatches = mismatchedRows(diff).length;
    if (mismatches > 0 || isTotalMismatch(diff)) {
      logger.info('Perft mismatch', {
        fen: query.fen,
        moves: query.moves,
        depth: query.depth,
        mismatches,
        total: diff.total,
      });
    }
    return diff;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await Promise.all([this.engines.lhs.dispose(), this.engines.rhs.dispose()]);
  }
}

/**
 * Run `fn` with a session and dispose of it on every exit path, including
 * errors thrown by `fn`.
 */
export async function withPerftSession<T>(
  session: PerftSession,
  fn: (session: PerftSession) => Promise<T>
): Promise<T> {
  try {
    return await fn(session);
  } finally {
    await session.dispose();
  }
}
