/**
 * Lowering: expression DAG -> constant table, instruction queue, size table
 *
 * Constant subtrees are folded and stored as literals. Every other node gets
 * one instruction, written in terms of the buffers of its children, and is
 * queued after its children so the queue is in topological order. Nodes are
 * visited once per id, so shared subtrees are lowered once.
 */

import { ExpressionGraph } from '../graph/ExpressionGraph.js';
import { ConstantEvaluator, GraphEvaluator } from '../graph/Evaluator.js';
import {
  NodeId,
  ExprNode,
  BinaryNode,
  DomainConcatenationNode,
  StateVectorNode
} from '../graph/Node.js';
import { ConstantValue, DenseMatrix, SparseMatrix, mapValues } from '../graph/Values.js';
import {
  roundTo,
  formatNumber,
  formatVector,
  formatMatrix,
  formatSparse,
  formatIndexRange
} from './Format.js';
import { bufferName } from './Names.js';
import { Instruction, ConcatPart } from './Instruction.js';
import { InstructionQueue } from './InstructionQueue.js';
import { UnsupportedNodeKindError, UnsupportedInputError } from './Errors.js';

export type ConstantLiteral =
  | { kind: 'scalar'; value: number }
  | { kind: 'vector'; values: number[] }
  | { kind: 'matrix'; value: DenseMatrix }
  | { kind: 'sparse'; value: SparseMatrix };

export interface LoweredTables {
  constants: Map<NodeId, ConstantLiteral>;
  variables: InstructionQueue;
  sizes: Map<NodeId, number>;
}

export interface LoweringOptions {
  /** Round constants to 11 decimals before emitting them (default true) */
  roundConstants?: boolean;
  evaluator?: ConstantEvaluator;
}

/**
 * Calls that reduce their argument instead of mapping over it
 */
const REDUCTION_CALLS: ReadonlySet<string> = new Set(['minimum', 'maximum']);

const ARITHMETIC_OPERATORS: ReadonlySet<string> = new Set(['+', '-', '*', '/']);

export function lower(
  graph: ExpressionGraph,
  root: NodeId,
  options: LoweringOptions = {}
): LoweredTables {
  const lowering = new Lowering(
    graph,
    options.evaluator ?? new GraphEvaluator(graph),
    options.roundConstants !== false
  );
  lowering.visit(root);
  return lowering.tables;
}

export function formatConstant(literal: ConstantLiteral): string {
  switch (literal.kind) {
    case 'scalar':
      return formatNumber(literal.value);
    case 'vector':
      return formatVector(literal.values);
    case 'matrix':
      return formatMatrix(literal.value);
    case 'sparse':
      return formatSparse(literal.value);
  }
}

function classifyConstant(value: ConstantValue): ConstantLiteral {
  if (typeof value === 'number') {
    return { kind: 'scalar', value };
  }
  if (value.kind === 'sparse') {
    return { kind: 'sparse', value };
  }
  if (value.rows === 1 && value.cols === 1) {
    return { kind: 'scalar', value: value.data[0] };
  }
  if (value.cols === 1) {
    return { kind: 'vector', values: [...value.data] };
  }
  return { kind: 'matrix', value };
}

class Lowering {
  readonly tables: LoweredTables = {
    constants: new Map(),
    variables: new InstructionQueue(),
    sizes: new Map()
  };

  constructor(
    private graph: ExpressionGraph,
    private evaluator: ConstantEvaluator,
    private roundConstants: boolean
  ) {}

  visit(id: NodeId): void {
    const { constants, variables, sizes } = this.tables;
    if (constants.has(id) || variables.has(id)) {
      return;
    }

    if (this.evaluator.isConstant(id)) {
      let value = this.evaluator.evaluate(id);
      if (this.roundConstants) {
        value = mapValues(value, v => roundTo(v));
      }
      constants.set(id, classifyConstant(value));
      sizes.set(id, this.graph.size(id));
      return;
    }

    const node = this.graph.get(id);
    for (const child of node.children) {
      this.visit(child);
    }
    const refs = node.children.map(child => this.reference(child));

    variables.push(id, this.render(node, refs));
    sizes.set(id, this.graph.size(id));
  }

  /**
   * How a consumer refers to a lowered node: a number literal for scalar
   * constants, otherwise the name of the node's buffer.
   * Negative literals are parenthesised: Julia reads -2.0 .^ x as -(2.0 .^ x).
   */
  private reference(id: NodeId): string {
    const literal = this.tables.constants.get(id);
    if (literal === undefined) {
      return bufferName(id, 'cache');
    }
    if (literal.kind !== 'scalar') {
      return bufferName(id, 'const');
    }
    const text = formatNumber(literal.value);
    return text.startsWith('-') ? `(${text})` : text;
  }

  private sizeOf(id: NodeId): number {
    const size = this.tables.sizes.get(id);
    return size === undefined ? this.graph.size(id) : size;
  }

  private render(node: ExprNode, refs: string[]): Instruction {
    switch (node.kind) {
      case 'binary':
        return this.renderBinary(node, refs);

      case 'unary':
        return { kind: 'expression', form: 'arithmetic', code: `${node.operator}${refs[0]}` };

      case 'index':
        return {
          kind: 'expression',
          form: 'view',
          code: `@view ${refs[0]}[${formatIndexRange(node.slice.start, node.slice.stop)}]`
        };

      case 'call': {
        const code = `${node.name}(${refs.join(', ')})`;
        return REDUCTION_CALLS.has(node.name)
          ? { kind: 'reduction', code }
          : { kind: 'expression', form: 'opaque', code };
      }

      case 'concatenation':
        return {
          kind: 'concatenation',
          parts: node.children.map((child, i) => ({ size: this.sizeOf(child), ref: refs[i] }))
        };

      case 'domainConcatenation':
        return { kind: 'concatenation', parts: this.domainParts(node, refs) };

      case 'stateVector':
        return { kind: 'expression', form: 'view', code: renderStateVector(node) };

      case 'time':
        return { kind: 'expression', form: 'time', code: 't' };

      case 'input':
        return { kind: 'input', name: node.name };

      case 'constant':
        throw new UnsupportedInputError('constant node could not be evaluated', node.id);

      case 'variable':
      case 'spatial':
        throw new UnsupportedNodeKindError(node.kind, node.id);
    }
  }

  private renderBinary(node: BinaryNode, refs: string[]): Instruction {
    const [left, right] = refs;
    switch (node.operator) {
      case '@':
        return { kind: 'matmul', left, right };
      case 'min':
      case 'max':
        return { kind: 'expression', form: 'opaque', code: `${node.operator}(${left}, ${right})` };
      case '^':
        return { kind: 'expression', form: 'opaque', code: `${left} .^ ${right}` };
      default:
        return {
          kind: 'expression',
          form: ARITHMETIC_OPERATORS.has(node.operator) ? 'arithmetic' : 'opaque',
          code: `${left} ${node.operator} ${right}`
        };
    }
  }

  /**
   * Children of a domain concatenation, placed in output order. With several
   * secondary repetitions each repetition's subdomain slices are sorted by
   * where they start in the output.
   */
  private domainParts(node: DomainConcatenationNode, refs: string[]): ConcatPart[] {
    if (node.secondaryPoints === 1) {
      return node.children.map((child, i) => ({ size: this.sizeOf(child), ref: refs[i] }));
    }

    const parts: ConcatPart[] = [];
    for (let rep = 0; rep < node.secondaryPoints; rep++) {
      const placed: { start: number; part: ConcatPart }[] = [];
      node.placements.forEach((childPlacements, c) => {
        const literal = this.tables.constants.get(node.children[c])?.kind === 'scalar';
        for (const placement of childPlacements) {
          const slice = placement.childSlices[rep];
          placed.push({
            start: placement.outputSlices[rep].start,
            part: {
              size: slice.stop - slice.start,
              ref: literal ? refs[c] : `@view ${refs[c]}[${formatIndexRange(slice.start, slice.stop)}]`
            }
          });
        }
      });
      placed.sort((a, b) => a.start - b.start);
      parts.push(...placed.map(p => p.part));
    }
    return parts;
  }
}

/**
 * y[3] for one position, @view y[3:5] for a contiguous run
 */
function renderStateVector(node: StateVectorNode): string {
  const { indices } = node;
  const first = indices[0];
  const last = indices[indices.length - 1];
  if (last - first + 1 !== indices.length) {
    throw new UnsupportedInputError(
      `state vector selection [${indices.join(', ')}] is not contiguous`,
      node.id
    );
  }
  if (indices.length === 1) {
    return `${node.target}[${first + 1}]`;
  }
  return `@view ${node.target}[${formatIndexRange(first, last + 1)}]`;
}
