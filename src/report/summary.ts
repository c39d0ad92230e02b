import type { RuntimePivot } from '../results/table.js';

/**
 * Plain-text runtime table, one row per threshold and one column per algorithm.
 * Missing measurements print as "-".
 */
export function formatSummaryTable(pivot: RuntimePivot, decimals = 2): string {
  const headers = ['Support', ...pivot.series.map((s) => `${s.algorithm} (s)`)];
  const rows = pivot.thresholds.map((threshold, i) => [
    `${threshold}%`,
    ...pivot.series.map((s) => {
      const runtime = s.runtimes[i];
      return runtime === null ? '-' : runtime.toFixed(decimals);
    }),
  ]);

  const widths = headers.map((header, col) =>
    Math.max(header.length, ...rows.map((row) => row[col].length))
  );
  const render = (cells: string[]): string =>
    cells.map((cell, col) => cell.padEnd(widths[col])).join('  ').trimEnd();

  return [
    render(headers),
    widths.map((w) => '-'.repeat(w)).join('  '),
    ...rows.map(render),
  ].join('\n');
}
