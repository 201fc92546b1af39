/**
 * Expression DAG nodes
 *
 * Nodes live in an ExpressionGraph arena and reference their children by id.
 * Structurally identical nodes are interned to the same id, so sharing is
 * detected by comparing ids rather than walking subtrees.
 */

import { ConstantValue, valueKey } from './Values.js';

export type NodeId = number;

/**
 * Half-open slice [start, stop)
 */
export interface Slice {
  start: number;
  stop: number;
}

export type BinaryOperator =
  | '+' | '-' | '*' | '/'
  | '@'   // matrix multiply
  | '^'
  | 'min' | 'max'
  | '<' | '<=' | '>' | '>=' | '==';

export type UnaryOperator = '-' | '+';

export type StateTarget = 'y' | 'dy';

interface NodeBase {
  id: NodeId;
  shape: readonly number[];
  children: readonly NodeId[];
}

export interface ConstantNode extends NodeBase {
  kind: 'constant';
  value: ConstantValue;
}

export interface BinaryNode extends NodeBase {
  kind: 'binary';
  operator: BinaryOperator;
}

export interface UnaryNode extends NodeBase {
  kind: 'unary';
  operator: UnaryOperator;
}

export interface IndexNode extends NodeBase {
  kind: 'index';
  slice: Slice;
}

export interface CallNode extends NodeBase {
  kind: 'call';
  name: string;
}

export interface ConcatenationNode extends NodeBase {
  kind: 'concatenation';
}

/**
 * Placement of one subdomain of a child inside a domain concatenation.
 * Both lists hold one slice per secondary-dimension repetition.
 */
export interface DomainPlacement {
  domain: string;
  childSlices: readonly Slice[];
  outputSlices: readonly Slice[];
}

export interface DomainConcatenationNode extends NodeBase {
  kind: 'domainConcatenation';
  secondaryPoints: number;
  placements: readonly (readonly DomainPlacement[])[];  // one list per child
}

export interface StateVectorNode extends NodeBase {
  kind: 'stateVector';
  target: StateTarget;
  indices: readonly number[];  // sorted, 0-based
}

export interface TimeNode extends NodeBase {
  kind: 'time';
}

export interface InputNode extends NodeBase {
  kind: 'input';
  name: string;
}

/**
 * Model variable that has not been discretised yet
 */
export interface VariableNode extends NodeBase {
  kind: 'variable';
  name: string;
}

/**
 * Spatial operator (grad, div, ...) that has not been discretised yet
 */
export interface SpatialNode extends NodeBase {
  kind: 'spatial';
  name: string;
}

export type ExprNode =
  | ConstantNode
  | BinaryNode
  | UnaryNode
  | IndexNode
  | CallNode
  | ConcatenationNode
  | DomainConcatenationNode
  | StateVectorNode
  | TimeNode
  | InputNode
  | VariableNode
  | SpatialNode;

export type NodeKind = ExprNode['kind'];

/**
 * Node as handed to ExpressionGraph.intern, before it has an id
 */
export type NodeSpec = WithoutId<ExprNode>;

type WithoutId<N> = N extends unknown ? Omit<N, 'id'> : never;

/**
 * Canonical key used for interning. Children are already interned, so their
 * ids stand in for whole subtrees.
 */
export function nodeKey(node: NodeSpec): string {
  switch (node.kind) {
    case 'constant':
      return `const:${valueKey(node.value)}`;
    case 'binary':
      return `bin:${node.operator}(${node.children.join(',')})`;
    case 'unary':
      return `un:${node.operator}(${node.children.join(',')})`;
    case 'index':
      return `idx:${node.slice.start}:${node.slice.stop}(${node.children.join(',')})`;
    case 'call':
      return `call:${node.name}(${node.children.join(',')})`;
    case 'concatenation':
      return `cat(${node.children.join(',')})`;
    case 'domainConcatenation':
      return `dcat:${node.secondaryPoints}:${JSON.stringify(node.placements)}(${node.children.join(',')})`;
    case 'stateVector':
      return `sv:${node.target}[${node.indices.join(',')}]`;
    case 'time':
      return 'time';
    case 'input':
      return `input:${node.name}`;
    case 'variable':
      return `var:${node.name}:${node.shape.join('x')}`;
    case 'spatial':
      return `spatial:${node.name}(${node.children.join(',')})`;
  }
}

/**
 * True for nodes that can never be folded to a constant
 */
export function blocksConstantFolding(node: ExprNode): boolean {
  switch (node.kind) {
    case 'stateVector':
    case 'time':
    case 'input':
    case 'variable':
    case 'spatial':
      return true;
    default:
      return false;
  }
}
