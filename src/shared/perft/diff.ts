import type { MoveToken, PerftDiff, PerftDiffRow, PerftReport } from '../types/perft';

/**
 * Merge two reports into one row per move seen by either side.
 *
 * Moves listed by only one report get `undefined` on the other side. Rows are
 * ordered by move name and the totals are copied verbatim.
 */
export function mergePerftReports(lhs: PerftReport, rhs: PerftReport): PerftDiff {
  const rows = new Map<MoveToken, PerftDiffRow>();

  for (const [move, count] of lhs.children) {
    rows.set(move, { move, lhs: count, rhs: undefined });
  }
  for (const [move, count] of rhs.children) {
    const existing = rows.get(move);
    if (existing) {
      existing.rhs = count;
    } else {
      rows.set(move, { move, lhs: undefined, rhs: count });
    }
  }

  const sorted = [...rows.values()].sort((a, b) =>
    a.move < b.move ? -1 : a.move > b.move ? 1 : 0
  );

  return {
    rows: sorted,
    total: [lhs.total, rhs.total],
  };
}

export function isRowMismatch(row: PerftDiffRow): boolean {
  return row.lhs !== row.rhs;
}

export function isTotalMismatch(diff: PerftDiff): boolean {
  return diff.total[0] !== diff.total[1];
}

export function mismatchedRows(diff: PerftDiff): PerftDiffRow[] {
  return diff.rows.filter(isRowMismatch);
}

export function hasMismatch(diff: PerftDiff): boolean {
  return isTotalMismatch(diff) || diff.rows.some(isRowMismatch);
}
