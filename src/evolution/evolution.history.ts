import type { GenerationRecord } from './evolution.types';

/**
 * History export helpers.
 *
 * These serialize the per-generation records kept by `Evolution` into common
 * data-export formats (JSONL and CSV) for plotting or log processing.
 */

/** Format a percentage the way records carry it: three decimals plus `%`. */
export function formatAccuracy(accuracy: number): string {
  return `${accuracy.toFixed(3)}%`;
}

/**
 * Serialize the history to JSON Lines: one JSON object per record, newline
 * separated.
 */
export function exportHistoryJSONL(history: readonly GenerationRecord[]): string {
  return history.map((record) => JSON.stringify(record)).join('\n');
}

/** Ordered CSV header names. */
const CSV_HEADERS = ['generation', 'solved', 'best', 'fitness', 'accuracy'];

/**
 * Export the most recent records as CSV.
 *
 * The best genome is written as space separated rows (`1 3 0 2`) so the
 * column needs no quoting; accuracy is the numeric percentage with three
 * decimals.
 *
 * @param maxEntries Maximum number of most recent records to include (default 500).
 * @returns CSV text (header + rows) or an empty string when there is no history.
 */
export function exportHistoryCSV(
  history: readonly GenerationRecord[],
  maxEntries = 500
): string {
  const recent = history.slice(-maxEntries);
  if (!recent.length) return '';
  const lines: string[] = [CSV_HEADERS.join(',')];
  for (const record of recent) {
    lines.push(
      [
        record.generation,
        record.solved,
        record.best.join(' '),
        record.fitness,
        record.accuracy.toFixed(3),
      ].join(',')
    );
  }
  return lines.join('\n');
}
