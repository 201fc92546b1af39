/**
 * Julia literal formatting
 */

import { DenseMatrix, SparseMatrix } from '../graph/Values.js';

const DEFAULT_DECIMALS = 11;

/**
 * Round to a fixed number of decimals, working from the exact decimal
 * expansion of the double so the result does not depend on the platform
 */
export function roundTo(value: number, decimals: number = DEFAULT_DECIMALS): number {
  if (!Number.isFinite(value)) {
    return value;
  }
  return Number(value.toFixed(decimals));
}

/**
 * Shortest text that reads back as the same double. Integral values keep a
 * trailing .0 so Julia parses them as Float64.
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (value === Infinity) {
    return 'Inf';
  }
  if (value === -Infinity) {
    return '-Inf';
  }
  const text = String(value);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

export function formatVector(values: readonly number[]): string {
  return `[${values.map(formatNumber).join(',')}]`;
}

export function formatMatrix(matrix: DenseMatrix): string {
  const rows: string[] = [];
  for (let i = 0; i < matrix.rows; i++) {
    const row = matrix.data.slice(i * matrix.cols, (i + 1) * matrix.cols);
    rows.push(row.map(formatNumber).join(' '));
  }
  return `[${rows.join('; ')}]`;
}

/**
 * sparse(rows, cols, values, m, n) with 1-based rows and cols
 */
export function formatSparse(matrix: SparseMatrix): string {
  const rows = matrix.entries.map(e => String(e.row + 1));
  const cols = matrix.entries.map(e => String(e.col + 1));
  const values = matrix.entries.map(e => e.value);
  return `sparse([${rows.join(',')}], [${cols.join(',')}], ${formatVector(values)}, ${matrix.rows}, ${matrix.cols})`;
}

/**
 * 1-based inclusive range covering the 0-based half-open [start, stop)
 */
export function formatIndexRange(start: number, stop: number): string {
  return `${start + 1}:${stop}`;
}
