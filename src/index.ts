/**
 * dag-to-julia - compile expression DAGs into allocation-free Julia functions
 *
 * Builds right-hand-side (ODE) and residual (DAE) functions for time-stepping
 * solvers from an interned expression graph.
 */

// Expression graph
export { ExpressionGraph, type StateSelection } from './graph/ExpressionGraph.js';
export { GraphEvaluator, type ConstantEvaluator } from './graph/Evaluator.js';
export { GraphError } from './graph/Errors.js';
export type {
  NodeId,
  NodeKind,
  ExprNode,
  Slice,
  BinaryOperator,
  UnaryOperator,
  StateTarget,
  DomainPlacement
} from './graph/Node.js';
export {
  columnVector,
  denseFromRows,
  sparseFromEntries,
  type ConstantValue,
  type DenseMatrix,
  type SparseMatrix,
  type SparseEntry
} from './graph/Values.js';

// Julia code generation
export {
  lower,
  formatConstant,
  type LoweredTables,
  type LoweringOptions,
  type ConstantLiteral
} from './julia/Lowering.js';
export { generateJuliaFunction, emit, residualForm } from './julia/Emitter.js';
export type { EmitOptions, GenerateOptions } from './julia/Options.js';
export { InstructionQueue, type QueueEntry } from './julia/InstructionQueue.js';
export { instructionText, type Instruction, type ExpressionForm } from './julia/Instruction.js';
export { UnsupportedNodeKindError, UnsupportedInputError } from './julia/Errors.js';
