/**
 * Bandit Lab CLI - Terminal Line Charts
 *
 * Plain-text rendering of one or more numeric series on a shared y-axis.
 * Colouring is left to the caller.
 */

import chalk from 'chalk';

export interface ChartSeries {
  label: string;
  values: readonly number[];
  symbol: string;
}

export interface ChartOptions {
  width: number;
  height: number;
}

/**
 * Render series into rows of text: one per chart row plus the x-axis.
 * Each series is resampled to the chart width; non-finite points are skipped.
 */
export function renderChart(series: readonly ChartSeries[], options: ChartOptions): string[] {
  const width = Math.max(2, Math.floor(options.width));
  const height = Math.max(2, Math.floor(options.height));

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const s of series) {
    for (const v of s.values) {
      if (!Number.isFinite(v)) continue;
      if (v < min) min = v;
      if (v > max) max = v;
    }
  }
  if (min > max) {
    return ['(no data)'];
  }

  if (max === min) {
    max = min + 1;
  }

  const grid: string[][] = Array.from({ length: height }, () => new Array<string>(width).fill(' '));

  for (const s of series) {
    const n = s.values.length;
    if (n === 0) continue;

    for (let col = 0; col < width; col++) {
      const idx = n === 1 ? 0 : Math.round((col * (n - 1)) / (width - 1));
      const value = s.values[idx];
      if (!Number.isFinite(value)) continue;

      const row = Math.round(((value - min) / (max - min)) * (height - 1));
      grid[height - 1 - row][col] = s.symbol;
    }
  }

  const labels = grid.map((_, r) => formatAxisValue(max - (r * (max - min)) / (height - 1)));
  const labelWidth = Math.max(...labels.map((l) => l.length));

  const lines = grid.map((cells, r) => `${labels[r].padStart(labelWidth)} ┤${cells.join('')}`);
  lines.push(`${' '.repeat(labelWidth)} └${'─'.repeat(width)}`);
  return lines;
}

function formatAxisValue(value: number): string {
  return Math.abs(value) >= 100000 ? value.toExponential(2) : value.toFixed(2);
}

const SERIES_COLORS = [chalk.cyan, chalk.magenta, chalk.yellow, chalk.green];

/**
 * Print a titled chart with a legend
 */
export function displayChart(
  title: string,
  series: readonly ChartSeries[],
  options: ChartOptions,
  trials: number
): void {
  console.log(chalk.bold(`\n  📈 ${title}\n`));

  const colorFor = new Map(series.map((s, i) => [s.symbol, SERIES_COLORS[i % SERIES_COLORS.length]]));

  for (const line of renderChart(series, options)) {
    const colored = [...line].map((ch) => {
      const color = colorFor.get(ch);
      return color ? color(ch) : ch;
    });
    console.log('  ' + colored.join(''));
  }

  console.log(chalk.gray(`  Trials 1 → ${trials}`));
  const legend = series.map((s, i) => SERIES_COLORS[i % SERIES_COLORS.length](`${s.symbol} ${s.label}`));
  console.log('  ' + legend.join('   '));
}
