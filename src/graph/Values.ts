/**
 * Concrete values produced by constant folding
 */

export interface DenseMatrix {
  kind: 'dense';
  rows: number;
  cols: number;
  data: readonly number[];  // row-major
}

export interface SparseEntry {
  row: number;  // 0-based
  col: number;  // 0-based
  value: number;
}

export interface SparseMatrix {
  kind: 'sparse';
  rows: number;
  cols: number;
  entries: readonly SparseEntry[];
}

export type ConstantValue = number | DenseMatrix | SparseMatrix;

export function denseFromRows(rows: readonly (readonly number[])[]): DenseMatrix {
  const cols = rows.length > 0 ? rows[0].length : 0;
  for (const row of rows) {
    if (row.length !== cols) {
      throw new RangeError(`Ragged matrix: expected ${cols} columns, got ${row.length}`);
    }
  }
  return { kind: 'dense', rows: rows.length, cols, data: rows.flat() };
}

export function columnVector(values: readonly number[]): DenseMatrix {
  return { kind: 'dense', rows: values.length, cols: 1, data: [...values] };
}

/**
 * Build a sparse matrix, summing duplicates and dropping explicit zeros.
 * Entries are kept in column-major order.
 */
export function sparseFromEntries(
  rows: number,
  cols: number,
  entries: readonly SparseEntry[]
): SparseMatrix {
  const summed = new Map<number, SparseEntry>();
  for (const entry of entries) {
    if (entry.row < 0 || entry.row >= rows || entry.col < 0 || entry.col >= cols) {
      throw new RangeError(`Sparse entry (${entry.row}, ${entry.col}) outside ${rows}x${cols}`);
    }
    const key = entry.col * rows + entry.row;
    const existing = summed.get(key);
    summed.set(key, {
      row: entry.row,
      col: entry.col,
      value: (existing ? existing.value : 0) + entry.value
    });
  }

  const ordered = [...summed.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, entry]) => entry)
    .filter(entry => entry.value !== 0);

  return { kind: 'sparse', rows, cols, entries: ordered };
}

export function denseGet(matrix: DenseMatrix, row: number, col: number): number {
  return matrix.data[row * matrix.cols + col];
}

export function sparseToDense(matrix: SparseMatrix): DenseMatrix {
  const data = new Array<number>(matrix.rows * matrix.cols).fill(0);
  for (const { row, col, value } of matrix.entries) {
    data[row * matrix.cols + col] = value;
  }
  return { kind: 'dense', rows: matrix.rows, cols: matrix.cols, data };
}

/**
 * Apply fn to every stored value (zeros of sparse matrices are untouched)
 */
export function mapValues(value: ConstantValue, fn: (v: number) => number): ConstantValue {
  if (typeof value === 'number') {
    return fn(value);
  }
  if (value.kind === 'dense') {
    return { ...value, data: value.data.map(fn) };
  }
  return sparseFromEntries(
    value.rows,
    value.cols,
    value.entries.map(entry => ({ ...entry, value: fn(entry.value) }))
  );
}

export function shapeOfValue(value: ConstantValue): number[] {
  return typeof value === 'number' ? [] : [value.rows, value.cols];
}

/**
 * Stable text key for a value (distinguishes NaN, Infinity and -0)
 */
export function valueKey(value: ConstantValue): string {
  const num = (v: number): string => Object.is(v, -0) ? '-0' : String(v);
  if (typeof value === 'number') {
    return num(value);
  }
  if (value.kind === 'dense') {
    return `dense ${value.rows}x${value.cols} ${value.data.map(num).join(',')}`;
  }
  const entries = value.entries.map(e => `${e.row}:${e.col}=${num(e.value)}`);
  return `sparse ${value.rows}x${value.cols} ${entries.join(',')}`;
}
