/**
 * ExpressionGraph: arena of interned expression nodes
 *
 * Adding a node whose kind, metadata and children match an existing node
 * returns the existing id, so structurally identical subexpressions always
 * share one identity.
 */

import {
  NodeId,
  ExprNode,
  NodeSpec,
  BinaryOperator,
  UnaryOperator,
  Slice,
  StateTarget,
  DomainPlacement,
  nodeKey
} from './Node.js';
import {
  ConstantValue,
  SparseEntry,
  columnVector,
  denseFromRows,
  sparseFromEntries,
  shapeOfValue
} from './Values.js';
import { GraphError } from './Errors.js';

const REDUCTIONS = new Set(['minimum', 'maximum', 'sum']);
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Selection of state-vector positions: a half-open slice or explicit indices
 */
export type StateSelection = Slice | readonly number[];

export class ExpressionGraph {
  private nodes: ExprNode[] = [];
  private hashcons: Map<string, NodeId> = new Map();

  get nodeCount(): number {
    return this.nodes.length;
  }

  /**
   * Intern a node, returning the id of an identical existing node if any
   */
  intern(spec: NodeSpec): NodeId {
    for (const child of spec.children) {
      this.get(child);
    }
    const key = nodeKey(spec);
    const existing = this.hashcons.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const id = this.nodes.length;
    const node: ExprNode = { ...spec, id };
    this.nodes.push(node);
    this.hashcons.set(key, id);
    return id;
  }

  get(id: NodeId): ExprNode {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new GraphError('unknown node id', id);
    }
    return node;
  }

  /**
   * Number of rows a node occupies in a flat vector (1 for scalars)
   */
  size(id: NodeId): number {
    const shape = this.get(id).shape;
    return shape.length === 0 ? 1 : shape[0];
  }

  // Leaves

  constant(value: ConstantValue): NodeId {
    return this.intern({ kind: 'constant', value, shape: shapeOfValue(value), children: [] });
  }

  scalar(value: number): NodeId {
    return this.constant(value);
  }

  vector(values: readonly number[]): NodeId {
    return this.constant(columnVector(values));
  }

  matrix(rows: readonly (readonly number[])[]): NodeId {
    return this.constant(denseFromRows(rows));
  }

  sparse(rows: number, cols: number, entries: readonly SparseEntry[]): NodeId {
    return this.constant(sparseFromEntries(rows, cols, entries));
  }

  stateVector(selection: StateSelection, target: StateTarget = 'y'): NodeId {
    const indices = selectionIndices(selection);
    return this.intern({
      kind: 'stateVector',
      target,
      indices,
      shape: [indices.length, 1],
      children: []
    });
  }

  stateVectorDot(selection: StateSelection): NodeId {
    return this.stateVector(selection, 'dy');
  }

  time(): NodeId {
    return this.intern({ kind: 'time', shape: [], children: [] });
  }

  input(name: string): NodeId {
    if (!IDENTIFIER.test(name)) {
      throw new GraphError(`input name '${name}' is not an identifier`);
    }
    return this.intern({ kind: 'input', name, shape: [], children: [] });
  }

  variable(name: string, shape: readonly number[] = []): NodeId {
    return this.intern({ kind: 'variable', name, shape, children: [] });
  }

  // Operators

  binary(operator: BinaryOperator, left: NodeId, right: NodeId): NodeId {
    const leftShape = this.get(left).shape;
    const rightShape = this.get(right).shape;
    const shape = operator === '@'
      ? matmulShape(leftShape, rightShape)
      : broadcastShape(leftShape, rightShape);
    if (shape === undefined) {
      throw new GraphError(
        `incompatible shapes [${leftShape.join(', ')}] ${operator} [${rightShape.join(', ')}]`
      );
    }
    return this.intern({ kind: 'binary', operator, shape, children: [left, right] });
  }

  add(left: NodeId, right: NodeId): NodeId {
    return this.binary('+', left, right);
  }

  sub(left: NodeId, right: NodeId): NodeId {
    return this.binary('-', left, right);
  }

  mul(left: NodeId, right: NodeId): NodeId {
    return this.binary('*', left, right);
  }

  div(left: NodeId, right: NodeId): NodeId {
    return this.binary('/', left, right);
  }

  matmul(left: NodeId, right: NodeId): NodeId {
    return this.binary('@', left, right);
  }

  pow(base: NodeId, exponent: NodeId): NodeId {
    return this.binary('^', base, exponent);
  }

  minimum(left: NodeId, right: NodeId): NodeId {
    return this.binary('min', left, right);
  }

  maximum(left: NodeId, right: NodeId): NodeId {
    return this.binary('max', left, right);
  }

  unary(operator: UnaryOperator, operand: NodeId): NodeId {
    return this.intern({ kind: 'unary', operator, shape: this.get(operand).shape, children: [operand] });
  }

  negate(operand: NodeId): NodeId {
    return this.unary('-', operand);
  }

  index(operand: NodeId, slice: Slice): NodeId {
    const size = this.size(operand);
    if (slice.start < 0 || slice.stop > size || slice.start >= slice.stop) {
      throw new GraphError(`slice [${slice.start}, ${slice.stop}) out of range for size ${size}`, operand);
    }
    return this.intern({
      kind: 'index',
      slice: { start: slice.start, stop: slice.stop },
      shape: [slice.stop - slice.start, 1],
      children: [operand]
    });
  }

  /**
   * Named function call. Reductions (minimum, maximum, sum) are scalar;
   * anything else broadcasts over its arguments unless a shape is given.
   */
  call(name: string, args: readonly NodeId[], shape?: readonly number[]): NodeId {
    let resultShape: readonly number[] = [];
    if (shape !== undefined) {
      resultShape = shape;
    } else if (!REDUCTIONS.has(name)) {
      for (const arg of args) {
        const next = broadcastShape(resultShape, this.get(arg).shape);
        if (next === undefined) {
          throw new GraphError(`incompatible argument shapes in call to ${name}`);
        }
        resultShape = next;
      }
    }
    return this.intern({ kind: 'call', name, shape: resultShape, children: [...args] });
  }

  spatial(name: string, operand: NodeId): NodeId {
    return this.intern({ kind: 'spatial', name, shape: this.get(operand).shape, children: [operand] });
  }

  // Concatenations

  concatenate(children: readonly NodeId[]): NodeId {
    if (children.length === 0) {
      throw new GraphError('cannot concatenate zero children');
    }
    const rows = children.reduce((total, child) => total + this.size(child), 0);
    return this.intern({ kind: 'concatenation', shape: [rows, 1], children: [...children] });
  }

  /**
   * Concatenation whose children are spread over subdomains. Each child lists
   * where its subdomains sit, with one slice per secondary repetition.
   */
  domainConcatenate(
    children: readonly NodeId[],
    placements: readonly (readonly DomainPlacement[])[],
    secondaryPoints: number = 1
  ): NodeId {
    if (children.length === 0) {
      throw new GraphError('cannot concatenate zero children');
    }
    if (placements.length !== children.length) {
      throw new GraphError(
        `expected ${children.length} placement lists, got ${placements.length}`
      );
    }
    if (!Number.isInteger(secondaryPoints) || secondaryPoints < 1) {
      throw new GraphError(`secondary points must be a positive integer, got ${secondaryPoints}`);
    }

    let rows = 0;
    placements.forEach((childPlacements, c) => {
      const child = children[c];
      const childSize = this.size(child);
      for (const placement of childPlacements) {
        if (
          placement.childSlices.length !== secondaryPoints ||
          placement.outputSlices.length !== secondaryPoints
        ) {
          throw new GraphError(
            `domain '${placement.domain}' needs ${secondaryPoints} slices per repetition`
          );
        }
        for (let rep = 0; rep < secondaryPoints; rep++) {
          const from = placement.childSlices[rep];
          const to = placement.outputSlices[rep];
          checkPlacementSlice(placement.domain, from, child);
          checkPlacementSlice(placement.domain, to, child);
          if (from.stop > childSize) {
            throw new GraphError(
              `domain '${placement.domain}' slice [${from.start}, ${from.stop}) exceeds child size ${childSize}`,
              child
            );
          }
          if (from.stop - from.start !== to.stop - to.start) {
            throw new GraphError(
              `domain '${placement.domain}' maps ${from.stop - from.start} rows onto ${to.stop - to.start}`,
              child
            );
          }
          rows += to.stop - to.start;
        }
      }
    });

    return this.intern({
      kind: 'domainConcatenation',
      secondaryPoints,
      placements,
      shape: [rows, 1],
      children: [...children]
    });
  }
}

function checkPlacementSlice(domain: string, slice: Slice, child: NodeId): void {
  if (!Number.isInteger(slice.start) || !Number.isInteger(slice.stop) || slice.start < 0 || slice.start >= slice.stop) {
    throw new GraphError(`domain '${domain}' has empty or negative slice [${slice.start}, ${slice.stop})`, child);
  }
}

function selectionIndices(selection: StateSelection): number[] {
  let indices: number[];
  if (isSlice(selection)) {
    if (selection.start < 0 || selection.start >= selection.stop) {
      throw new GraphError(`empty or negative state slice [${selection.start}, ${selection.stop})`);
    }
    indices = [];
    for (let i = selection.start; i < selection.stop; i++) {
      indices.push(i);
    }
  } else {
    indices = [...new Set(selection)].sort((a, b) => a - b);
    if (indices.length === 0) {
      throw new GraphError('state selection is empty');
    }
    if (indices.some(i => !Number.isInteger(i) || i < 0)) {
      throw new GraphError('state indices must be non-negative integers');
    }
  }
  return indices;
}

function isSlice(selection: StateSelection): selection is Slice {
  return !Array.isArray(selection);
}

function isScalarShape(shape: readonly number[]): boolean {
  return shape.length === 0 || (shape.length === 2 && shape[0] === 1 && shape[1] === 1);
}

function sameShape(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((dim, i) => dim === b[i]);
}

export function broadcastShape(
  a: readonly number[],
  b: readonly number[]
): readonly number[] | undefined {
  if (a.length === 0) return b;
  if (b.length === 0) return a;
  if (sameShape(a, b)) return a;
  if (isScalarShape(a)) return b;
  if (isScalarShape(b)) return a;
  return undefined;
}

function matmulShape(
  a: readonly number[],
  b: readonly number[]
): readonly number[] | undefined {
  if (a.length !== 2 || b.length !== 2 || a[1] !== b[0]) {
    return undefined;
  }
  return [a[0], b[1]];
}
