import { CHART_HEIGHT } from './constants.js';

/** Options for renderValueChart. */
export interface ChartOptions {
  /** Rows between the lowest and highest value. At least 2. */
  readonly height?: number;
  readonly title?: string;
}

/**
 * Render the aggregate value series as a terminal scatter chart,
 * one three-character column per period.
 *
 * @param series - One value per period.
 * @param options - Height and title.
 * @returns Chart lines, or a single notice for an empty series.
 * @throws RangeError if height is below 2.
 */
export function renderValueChart(series: readonly number[], options: ChartOptions = {}): string[] {
  const height = options.height ?? CHART_HEIGHT;
  if (!Number.isInteger(height) || height < 2) {
    throw new RangeError(`Chart height must be an integer of at least 2 (got ${String(height)})`);
  }
  if (series.length === 0) {
    return ['No data to plot.'];
  }

  let min = series[0];
  let max = series[0];
  for (const value of series) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  const span = max - min;
  const rowOf = (value: number): number => (span === 0 ? 0 : Math.round(((value - min) / span) * (height - 1)));
  const points = series.map(rowOf);

  const labels: string[] = [];
  for (let row = height - 1; row >= 0; row--) {
    labels.push((min + (span * row) / (height - 1)).toFixed(2));
  }
  const labelWidth = Math.max(...labels.map((label) => label.length));

  const lines = [options.title ?? 'Total Market Value Over Time'];
  labels.forEach((label, i) => {
    const row = height - 1 - i;
    const cells = points.map((point) => (point === row ? ' * ' : '   ')).join('');
    lines.push(`${label.padStart(labelWidth)} |${cells}`.trimEnd());
  });
  lines.push(`${' '.repeat(labelWidth)} +${'-'.repeat(series.length * 3)}`);
  const ticks = series.map((_, i) => String(i + 1).padStart(2).padEnd(3)).join('');
  lines.push(`${' '.repeat(labelWidth + 2)}${ticks}`.trimEnd());
  lines.push(`${' '.repeat(labelWidth + 2)}Year`);
  return lines;
}
