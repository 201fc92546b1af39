/**
 * Constant folding over an ExpressionGraph
 *
 * A node is constant when nothing below it reads state, time or inputs and
 * every operation on the way can be folded here. Anything that cannot be
 * folded is reported as non-constant and left for run time.
 */

import { NodeId, ExprNode, BinaryOperator, blocksConstantFolding } from './Node.js';
import {
  ConstantValue,
  DenseMatrix,
  columnVector,
  denseGet,
  sparseFromEntries,
  sparseToDense,
  mapValues,
  SparseEntry
} from './Values.js';
import { ExpressionGraph } from './ExpressionGraph.js';
import { GraphError } from './Errors.js';

export interface ConstantEvaluator {
  isConstant(id: NodeId): boolean;
  /** Throws GraphError when the node is not constant */
  evaluate(id: NodeId): ConstantValue;
}

const ELEMENTWISE_FUNCTIONS: ReadonlyMap<string, (x: number) => number> = new Map([
  ['sin', Math.sin],
  ['cos', Math.cos],
  ['tan', Math.tan],
  ['exp', Math.exp],
  ['log', Math.log],
  ['sqrt', Math.sqrt],
  ['abs', Math.abs],
  ['tanh', Math.tanh],
  ['sinh', Math.sinh],
  ['cosh', Math.cosh]
]);

const REDUCTION_FUNCTIONS: ReadonlyMap<string, (xs: number[]) => number> = new Map([
  ['minimum', (xs: number[]) => Math.min(...xs)],
  ['maximum', (xs: number[]) => Math.max(...xs)],
  ['sum', (xs: number[]) => xs.reduce((a, b) => a + b, 0)]
]);

const BINARY_FUNCTIONS: Record<Exclude<BinaryOperator, '@'>, (a: number, b: number) => number> = {
  '+': (a, b) => a + b,
  '-': (a, b) => a - b,
  '*': (a, b) => a * b,
  '/': (a, b) => a / b,
  '^': (a, b) => Math.pow(a, b),
  'min': (a, b) => Math.min(a, b),
  'max': (a, b) => Math.max(a, b),
  '<': (a, b) => (a < b ? 1 : 0),
  '<=': (a, b) => (a <= b ? 1 : 0),
  '>': (a, b) => (a > b ? 1 : 0),
  '>=': (a, b) => (a >= b ? 1 : 0),
  '==': (a, b) => (a === b ? 1 : 0)
};

export class GraphEvaluator implements ConstantEvaluator {
  // undefined marks a node already known not to fold
  private cache: Map<NodeId, ConstantValue | undefined> = new Map();

  constructor(private graph: ExpressionGraph) {}

  isConstant(id: NodeId): boolean {
    return this.tryEvaluate(id) !== undefined;
  }

  evaluate(id: NodeId): ConstantValue {
    const value = this.tryEvaluate(id);
    if (value === undefined) {
      throw new GraphError('node is not constant', id);
    }
    return value;
  }

  private tryEvaluate(id: NodeId): ConstantValue | undefined {
    if (this.cache.has(id)) {
      return this.cache.get(id);
    }
    const value = this.fold(this.graph.get(id));
    this.cache.set(id, value);
    return value;
  }

  private fold(node: ExprNode): ConstantValue | undefined {
    if (blocksConstantFolding(node)) {
      return undefined;
    }

    const args: ConstantValue[] = [];
    for (const child of node.children) {
      const value = this.tryEvaluate(child);
      if (value === undefined) {
        return undefined;
      }
      args.push(value);
    }

    switch (node.kind) {
      case 'constant':
        return node.value;

      case 'binary':
        if (node.operator === '@') {
          return matmul(args[0], args[1]);
        }
        return elementwise(args[0], args[1], BINARY_FUNCTIONS[node.operator]);

      case 'unary':
        return node.operator === '-' ? mapValues(args[0], x => -x) : args[0];

      case 'index': {
        const flat = flatten(args[0]);
        return flat === undefined ? undefined : columnVector(flat.slice(node.slice.start, node.slice.stop));
      }

      case 'call':
        return callFunction(node.name, args);

      case 'concatenation': {
        const parts: number[] = [];
        for (const arg of args) {
          const flat = flatten(arg);
          if (flat === undefined) {
            return undefined;
          }
          parts.push(...flat);
        }
        return columnVector(parts);
      }

      case 'domainConcatenation': {
        const out = new Array<number>(node.shape[0]).fill(0);
        for (let c = 0; c < args.length; c++) {
          const flat = flatten(args[c]);
          if (flat === undefined) {
            return undefined;
          }
          for (const placement of node.placements[c]) {
            placement.outputSlices.forEach((target, i) => {
              const source = placement.childSlices[i];
              for (let k = 0; k < target.stop - target.start; k++) {
                out[target.start + k] = flat[source.start + k];
              }
            });
          }
        }
        return columnVector(out);
      }

      default:
        return undefined;
    }
  }
}

function toDense(value: ConstantValue): DenseMatrix {
  if (typeof value === 'number') {
    return { kind: 'dense', rows: 1, cols: 1, data: [value] };
  }
  return value.kind === 'sparse' ? sparseToDense(value) : value;
}

/**
 * Values of a scalar or column vector, top to bottom
 */
function flatten(value: ConstantValue): number[] | undefined {
  const dense = toDense(value);
  return dense.cols === 1 ? [...dense.data] : undefined;
}

function isScalarLike(value: ConstantValue): boolean {
  return typeof value === 'number' || (value.rows === 1 && value.cols === 1);
}

function elementwise(
  a: ConstantValue,
  b: ConstantValue,
  fn: (x: number, y: number) => number
): ConstantValue | undefined {
  if (typeof a === 'number' && typeof b === 'number') {
    return fn(a, b);
  }
  const left = toDense(a);
  const right = toDense(b);
  if (isScalarLike(a) && !isScalarLike(b)) {
    return { ...right, data: right.data.map(y => fn(left.data[0], y)) };
  }
  if (isScalarLike(b) && !isScalarLike(a)) {
    return { ...left, data: left.data.map(x => fn(x, right.data[0])) };
  }
  if (left.rows !== right.rows || left.cols !== right.cols) {
    return undefined;
  }
  return { ...left, data: left.data.map((x, i) => fn(x, right.data[i])) };
}

function matmul(a: ConstantValue, b: ConstantValue): ConstantValue | undefined {
  const left = toDense(a);
  const right = toDense(b);
  if (left.cols !== right.rows) {
    return undefined;
  }

  const data = new Array<number>(left.rows * right.cols).fill(0);
  for (let i = 0; i < left.rows; i++) {
    for (let j = 0; j < right.cols; j++) {
      let total = 0;
      for (let k = 0; k < left.cols; k++) {
        total += denseGet(left, i, k) * denseGet(right, k, j);
      }
      data[i * right.cols + j] = total;
    }
  }
  const product: DenseMatrix = { kind: 'dense', rows: left.rows, cols: right.cols, data };

  if (typeof a !== 'number' && a.kind === 'sparse' && typeof b !== 'number' && b.kind === 'sparse') {
    const entries: SparseEntry[] = [];
    product.data.forEach((value, k) => {
      entries.push({ row: Math.floor(k / product.cols), col: k % product.cols, value });
    });
    return sparseFromEntries(product.rows, product.cols, entries);
  }
  return product;
}

function callFunction(name: string, args: ConstantValue[]): ConstantValue | undefined {
  if (args.length !== 1) {
    return undefined;
  }
  const elementFn = ELEMENTWISE_FUNCTIONS.get(name);
  if (elementFn !== undefined) {
    const arg = args[0];
    return typeof arg === 'number' ? elementFn(arg) : mapValues(toDense(arg), elementFn);
  }
  const reduceFn = REDUCTION_FUNCTIONS.get(name);
  if (reduceFn !== undefined) {
    const dense = toDense(args[0]);
    return dense.data.length === 0 ? undefined : reduceFn([...dense.data]);
  }
  return undefined;
}
