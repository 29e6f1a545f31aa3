import {
  hasMismatch,
  isRowMismatch,
  isTotalMismatch,
  mergePerftReports,
  mismatchedRows,
} from '../../../src/shared/perft/diff';
import { createPerftReport } from '../../../src/shared/perft/report';

describe('mergePerftReports', () => {
  const lhs = createPerftReport(60n, [
    ['e2e4', 20n],
    ['a2a3', 20n],
    ['b1c3', 20n],
  ]);
  const rhs = createPerftReport(61n, [
    ['a2a3', 20n],
    ['e2e4', 21n],
    ['g1f3', 20n],
  ]);

  it('produces one row per move listed by either side, sorted by move', () => {
    const diff = mergePerftReports(lhs, rhs);

    expect(diff.rows).toEqual([
      { move: 'a2a3', lhs: 20n, rhs: 20n },
      { move: 'b1c3', lhs: 20n, rhs: undefined },
      { move: 'e2e4', lhs: 20n, rhs: 21n },
      { move: 'g1f3', lhs: undefined, rhs: 20n },
    ]);
    expect(diff.total).toEqual([60n, 61n]);
  });

  it('copies totals verbatim instead of summing rows', () => {
    const diff = mergePerftReports(
      createPerftReport(999n, [['a2a3', 1n]]),
      createPerftReport(1n, [['a2a3', 1n]])
    );

    expect(diff.total).toEqual([999n, 1n]);
  });

  it('orders by code unit, so uppercase sorts before lowercase', () => {
    const diff = mergePerftReports(
      createPerftReport(3n, [
        ['h2h3', 1n],
        ['a7a8q', 1n],
        ['a7a8Q', 1n],
      ]),
      createPerftReport(0n, [])
    );

    expect(diff.rows.map((row) => row.move)).toEqual(['a7a8Q', 'a7a8q', 'h2h3']);
  });

  it('identifies mismatched rows and totals', () => {
    const diff = mergePerftReports(lhs, rhs);

    expect(mismatchedRows(diff).map((row) => row.move)).toEqual(['b1c3', 'e2e4', 'g1f3']);
    expect(isTotalMismatch(diff)).toBe(true);
    expect(hasMismatch(diff)).toBe(true);
  });

  it('reports agreement when both sides match', () => {
    const diff = mergePerftReports(lhs, lhs);

    expect(diff.rows.every((row) => !isRowMismatch(row))).toBe(true);
    expect(hasMismatch(diff)).toBe(false);
  });

  it('flags a total-only mismatch', () => {
    const diff = mergePerftReports(
      createPerftReport(2n, [['a2a3', 1n]]),
      createPerftReport(3n, [['a2a3', 1n]])
    );

    expect(mismatchedRows(diff)).toEqual([]);
    expect(hasMismatch(diff)).toBe(true);
  });
});
