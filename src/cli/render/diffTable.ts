import chalk from 'chalk';
import { isRowMismatch, isTotalMismatch } from '../../shared/perft';
import type { PerftDiff } from '../../shared/types/perft';

export interface DiffLine {
  text: string;
  highlighted: boolean;
}

const COLUMN_GAP = '  ';

/**
 * Column width shared by both count columns: the number of decimal digits in
 * the largest count present.
 */
export function countColumnWidth(diff: PerftDiff): number {
  let width = 0;
  for (const row of diff.rows) {
    for (const count of [row.lhs, row.rhs]) {
      if (count !== undefined) {
        width = Math.max(width, count.toString().length);
      }
    }
  }
  return width;
}

function formatCount(count: bigint | undefined, width: number): string {
  return (count === undefined ? '' : count.toString()).padStart(width);
}

/**
 * Lay out a diff as plain text lines: one per move, a blank separator, then the
 * totals. Each line records whether the two sides disagree.
 */
export function formatDiffLines(diff: PerftDiff): DiffLine[] {
  const width = countColumnWidth(diff);
  const lines: DiffLine[] = diff.rows.map((row) => ({
    text: [row.move, formatCount(row.lhs, width), formatCount(row.rhs, width)].join(COLUMN_GAP),
    highlighted: isRowMismatch(row),
  }));

  lines.push({ text: '', highlighted: false });

  const [lhsTotal, rhsTotal] = diff.total;
  lines.push({
    text: ['total', lhsTotal.toString(), rhsTotal.toString()].join(COLUMN_GAP),
    highlighted: isTotalMismatch(diff),
  });

  return lines;
}

/**
 * Render a diff for the terminal, mismatched lines in bold red. The result ends
 * with a newline.
 */
export function renderDiff(diff: PerftDiff, styler: chalk.Chalk = chalk): string {
  const emphasize = styler.red.bold;
  return formatDiffLines(diff)
    .map((line) => (line.highlighted ? emphasize(line.text) : line.text) + '\n')
    .join('');
}
