// src/plot.ts - Function sampling onto a character grid
import { Result } from './types';
import { EvaluationContext } from './context';
import { evaluateWith } from './engine';
import { fail, ok } from './errors';
import { formatNumber } from './format';

export const DEFAULT_PLOT_WIDTH = 60;
export const DEFAULT_PLOT_HEIGHT = 20;
export const MAX_PLOT_WIDTH = 120;
export const MAX_PLOT_HEIGHT = 40;

/**
 * Plot Grid: Sampled curve with axes, one string per row (top row = ymax).
 */
export interface PlotGrid {
  rows: string[];
  width: number;
  height: number;
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
  skipped: number; // Columns with no marker because the sample failed
}

function clampSize(requested: number, fallback: number, max: number): number {
  if (!Number.isFinite(requested) || requested <= 0) return fallback;
  return Math.min(Math.max(Math.floor(requested), 2), max);
}

export function samplePlot(
  expr: string,
  context: EvaluationContext,
  name: string,
  xmin: number,
  xmax: number,
  width: number = DEFAULT_PLOT_WIDTH,
  height: number = DEFAULT_PLOT_HEIGHT
): Result<PlotGrid> {
  // A reversed range plots right to left
  if (!Number.isFinite(xmin) || !Number.isFinite(xmax) || xmin === xmax) {
    return fail('InvalidArgument', 'Plot range needs finite, distinct xmin and xmax');
  }
  const W = clampSize(width, DEFAULT_PLOT_WIDTH, MAX_PLOT_WIDTH);
  const H = clampSize(height, DEFAULT_PLOT_HEIGHT, MAX_PLOT_HEIGHT);
  if (W !== width || H !== height) {
    context.logger.warn(`plot: size ${width}x${height} adjusted to ${W}x${H}`);
  }
  const xAt = (column: number) => xmin + ((xmax - xmin) * column) / (W - 1);
  const sample = (x: number): number | undefined => {
    const y = evaluateWith(expr, context, name, x);
    return y.ok && Number.isFinite(y.value) ? y.value : undefined;
  };

  // First pass: observed y-range
  let ymin = Infinity;
  let ymax = -Infinity;
  for (let i = 0; i < W; i++) {
    const y = sample(xAt(i));
    if (y === undefined) continue;
    ymin = Math.min(ymin, y);
    ymax = Math.max(ymax, y);
  }
  if (ymin > ymax) {
    ymin = -1;
    ymax = 1;
  } else if (ymin === ymax) {
    ymin -= 1;
    ymax += 1;
  }

  const grid: string[][] = Array.from({ length: H }, () => Array<string>(W).fill(' '));
  if (Math.min(xmin, xmax) <= 0 && Math.max(xmin, xmax) >= 0) {
    const col = Math.min(Math.max(Math.trunc(((0 - xmin) / (xmax - xmin)) * (W - 1)), 0), W - 1);
    for (let row = 0; row < H; row++) grid[row][col] = '|';
  }
  if (ymin <= 0 && ymax >= 0) {
    const row = Math.min(Math.max(Math.trunc(((ymax - 0) / (ymax - ymin)) * (H - 1)), 0), H - 1);
    grid[row].fill('-');
  }
  let skipped = 0;
  for (let col = 0; col < W; col++) {
    const y = sample(xAt(col));
    if (y === undefined) {
      skipped++;
      continue;
    }
    const row = Math.trunc(((ymax - y) / (ymax - ymin)) * (H - 1));
    if (row >= 0 && row < H) grid[row][col] = '*';
  }
  if (skipped > 0) {
    context.logger.debug(`plot: ${skipped} of ${W} samples skipped`);
  }

  return ok({
    rows: grid.map((cells) => cells.join('')),
    width: W,
    height: H,
    xmin,
    xmax,
    ymin,
    ymax,
    skipped,
  });
}

export function renderPlot(grid: PlotGrid): string[] {
  const header =
    ` y in [${formatNumber(grid.ymin, 6)}, ${formatNumber(grid.ymax, 6)}]` +
    `  x in [${formatNumber(grid.xmin, 6)}, ${formatNumber(grid.xmax, 6)}]`;
  return [header, ...grid.rows.map((row) => ` ${row}`)];
}
