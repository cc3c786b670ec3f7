/**
 * Board Visualization - renders a column-encoded genome as an N×N grid.
 *
 * Row `r` shows ` Q ` in every column whose queen sits on row `r` and ` * `
 * elsewhere, top row first:
 *
 *    *  Q  *  *
 *    *  *  *  Q
 *    Q  *  *  *
 *    *  *  Q  *
 *
 * With `color` enabled queens are painted green when safe and red when they
 * share a row or diagonal with another queen.
 */
import { colors } from './colors';

export interface BoardRenderOptions {
  /** Wrap cells in ANSI colors. Default: false */
  color?: boolean;
}

/** Columns whose queen attacks (or is attacked by) at least one other queen. */
export function conflictedColumns(genome: readonly number[]): Set<number> {
  const columns = new Set<number>();
  for (let i = 0; i < genome.length - 1; i++) {
    for (let j = i + 1; j < genome.length; j++) {
      const rowGap = Math.abs(genome[i] - genome[j]);
      if (rowGap === 0 || rowGap === j - i) {
        columns.add(i);
        columns.add(j);
      }
    }
  }
  return columns;
}

/**
 * Render `genome` as text, one board row per line, no trailing newline.
 *
 * @example
 * renderBoard([1, 0]);
 * // " *  Q \n Q  * "
 */
export function renderBoard(
  genome: readonly number[],
  options: BoardRenderOptions = {}
): string {
  const size = genome.length;
  const attacked = options.color ? conflictedColumns(genome) : undefined;
  const lines: string[] = [];
  for (let row = 0; row < size; row++) {
    let line = '';
    for (let column = 0; column < size; column++) {
      if (genome[column] !== row) {
        line += attacked ? `${colors.dim} * ${colors.reset}` : ' * ';
        continue;
      }
      if (!attacked) {
        line += ' Q ';
        continue;
      }
      const paint = attacked.has(column) ? colors.red : colors.green;
      line += `${paint} Q ${colors.reset}`;
    }
    lines.push(line);
  }
  return lines.join('\n');
}
