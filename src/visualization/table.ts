import type { GenerationRecord } from '../evolution/evolution.types';

/** Column captions of the history table, in order. */
export const HISTORY_HEADERS = [
  'Generation',
  'Solved',
  'Best genome',
  'Fitness',
  'Accuracy',
];

/**
 * Draw a grid table with box characters; every row is separated by a rule.
 *
 * @example
 * renderTable(['A'], [['1']]);
 * // ╒═══╕
 * // │ A │
 * // ╞═══╡
 * // │ 1 │
 * // ╘═══╛
 */
export function renderTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[]
): string {
  const widths = headers.map((header, column) =>
    rows.reduce(
      (width, row) => Math.max(width, (row[column] ?? '').length),
      header.length
    )
  );
  const rule = (left: string, fill: string, join: string, right: string) =>
    left + widths.map((width) => fill.repeat(width + 2)).join(join) + right;
  const line = (cells: readonly string[]) =>
    '│' +
    widths
      .map((width, column) => ` ${(cells[column] ?? '').padEnd(width)} `)
      .join('│') +
    '│';

  const out = [rule('╒', '═', '╤', '╕'), line(headers)];
  out.push(rule('╞', '═', '╪', '╡'));
  rows.forEach((row, index) => {
    if (index > 0) out.push(rule('├', '─', '┼', '┤'));
    out.push(line(row));
  });
  out.push(rule('╘', '═', '╧', '╛'));
  return out.join('\n');
}

/** Tabulate a run history: one row per generation record. */
export function renderHistoryTable(history: readonly GenerationRecord[]): string {
  return renderTable(
    HISTORY_HEADERS,
    history.map((record) => [
      String(record.generation),
      record.solved ? 'yes' : 'no',
      `[${record.best.join(', ')}]`,
      String(record.fitness),
      record.accuracyText,
    ])
  );
}
