/**
 * Core value types shared by the perft backends, the navigation state machine
 * and the diff/presentation layers.
 *
 * Position descriptors and moves are opaque strings: nothing in this project
 * parses or validates them, they are only forwarded to backends and used as
 * map keys.
 */

/** Standard starting position, used as the initial base position. */
export const INITIAL_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

export type PositionDescriptor = string;

export type MoveToken = string;

/**
 * One backend's answer to one query: the total node count plus the node count
 * below every legal move. Counts are bigint because they overflow 64 bits at
 * high depth.
 */
export interface PerftReport {
  readonly total: bigint;
  readonly children: ReadonlyMap<MoveToken, bigint>;
}

/**
 * A single perft request as sent to a backend. `depth` is already relative to
 * the position reached after applying `moves` to `fen`.
 */
export interface PerftQuery {
  fen: PositionDescriptor;
  moves: readonly MoveToken[];
  depth: number;
}

/**
 * One merged row of a diff. An undefined side means that backend did not list
 * the move at this position.
 */
export interface PerftDiffRow {
  move: MoveToken;
  lhs?: bigint | undefined;
  rhs?: bigint | undefined;
}

export interface PerftDiff {
  /** Rows sorted by move name. */
  readonly rows: readonly PerftDiffRow[];
  /** Verbatim totals of (lhs, rhs); never recomputed from the rows. */
  readonly total: readonly [bigint, bigint];
}
