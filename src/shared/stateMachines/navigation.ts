import { DepthUnderflowError, InvalidArgumentError } from '../errors';
import {
  INITIAL_FEN,
  type MoveToken,
  type PerftQuery,
  type PositionDescriptor,
} from '../types/perft';

/**
 * The position the user is currently inspecting.
 *
 * `depth` is measured from the base position `fen`, not from the position
 * reached after `moves`; the depth actually sent to a backend is derived by
 * {@link relativeDepth}.
 *
 * Transitions:
 *   setPosition  → fen replaced, moves cleared
 *   setMoves     → moves replaced wholesale
 *   setDepth     → depth replaced (not checked against the path)
 *   gotoRoot     → moves cleared
 *   gotoParent   → last move dropped (no-op on an empty path)
 *   gotoChild    → move appended
 */
export interface NavigationState {
  readonly fen: PositionDescriptor;
  readonly moves: readonly MoveToken[];
  readonly depth: number;
}

export function createNavigationState(
  overrides: Partial<NavigationState> = {}
): NavigationState {
  return {
    fen: overrides.fen ?? INITIAL_FEN,
    moves: overrides.moves ? [...overrides.moves] : [],
    depth: overrides.depth ?? 1,
  };
}

export function setPosition(state: NavigationState, fen: PositionDescriptor): NavigationState {
  return { ...state, fen, moves: [] };
}

export function setMoves(state: NavigationState, moves: readonly MoveToken[]): NavigationState {
  return { ...state, moves: [...moves] };
}

export function setDepth(state: NavigationState, depth: number): NavigationState {
  if (!Number.isSafeInteger(depth) || depth < 0) {
    throw new InvalidArgumentError(`depth must be a non-negative integer, got ${depth}`, {
      depth,
    });
  }
  return { ...state, depth };
}

export function gotoRoot(state: NavigationState): NavigationState {
  return state.moves.length === 0 ? state : { ...state, moves: [] };
}

export function gotoParent(state: NavigationState): NavigationState {
  if (state.moves.length === 0) {
    return state;
  }
  return { ...state, moves: state.moves.slice(0, -1) };
}

export function gotoChild(state: NavigationState, move: MoveToken): NavigationState {
  return { ...state, moves: [...state.moves, move] };
}

/**
 * Depth remaining below the navigated position.
 *
 * @throws DepthUnderflowError when the path is already longer than the target
 * depth; no backend can be asked for a negative depth.
 */
export function relativeDepth(state: NavigationState): number {
  const remaining = state.depth - state.moves.length;
  if (remaining < 0) {
    throw new DepthUnderflowError(state.depth, state.moves.length);
  }
  return remaining;
}

/**
 * Build the query both backends receive for the current state.
 */
export function toPerftQuery(state: NavigationState): PerftQuery {
  return {
    fen: state.fen,
    moves: [...state.moves],
    depth: relativeDepth(state),
  };
}
