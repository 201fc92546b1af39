/**
 * Code emission for lowered expression DAGs
 *
 * Drains the instruction queue in topological order, inlining cheap
 * expressions into their consumers and materialising the rest into cache
 * buffers, then assembles a Julia function that writes the root's value into
 * the caller's output buffer without allocating per call.
 */

import { ExpressionGraph } from '../graph/ExpressionGraph.js';
import { NodeId } from '../graph/Node.js';
import { formatNumber } from './Format.js';
import { bufferName, referencesBuffer, renameBuffers, BUFFER_NAME_PATTERN } from './Names.js';
import { Instruction, ConcatPart, instructionText, substitute } from './Instruction.js';
import { LoweredTables, lower, formatConstant } from './Lowering.js';
import { EmitOptions, GenerateOptions, ResolvedEmitOptions, resolveOptions } from './Options.js';
import { debugLog } from './Debug.js';
import { UnsupportedInputError } from './Errors.js';

const INDENT = '   ';

type Statement =
  | { kind: 'broadcast'; target: string; rhs: string }
  | { kind: 'sliceAssign'; target: string; start: number; stop: number; rhs: string }
  | { kind: 'concatTemp'; temp: string; rhs: string }
  | { kind: 'vcat'; target: string; temps: string[] }
  | { kind: 'mulInPlace'; target: string; left: string; right: string }
  | { kind: 'product'; target: string; left: string; right: string }
  | { kind: 'reduction'; target: string; rhs: string };

/**
 * Compile a DAG into a Julia function. In DAE mode (differentialCount set)
 * the root is first rewritten into residual form.
 */
export function generateJuliaFunction(
  graph: ExpressionGraph,
  root: NodeId,
  options: GenerateOptions = {}
): string {
  const resolved = resolveOptions(options);
  const target = resolved.differentialCount === undefined
    ? root
    : residualForm(graph, root, resolved.differentialCount);
  const tables = lower(graph, target, {
    roundConstants: resolved.roundConstants,
    evaluator: options.evaluator
  });
  return new Emitter(target, tables, resolved).run();
}

/**
 * Emit a Julia function from tables produced by lower(). The tables are
 * consumed: their instruction queue is empty afterwards.
 */
export function emit(root: NodeId, tables: LoweredTables, options: EmitOptions = {}): string {
  return new Emitter(root, tables, resolveOptions(options)).run();
}

/**
 * Subtract the matching slice of dy from every top-level child that lies
 * entirely within the first differentialCount rows. Children past that
 * point are algebraic and pass through unchanged.
 */
export function residualForm(graph: ExpressionGraph, root: NodeId, differentialCount: number): NodeId {
  const node = graph.get(root);
  const children = node.kind === 'concatenation' ? node.children : [root];

  let end = 0;
  const rewritten = children.map(child => {
    const start = end;
    end += graph.size(child);
    if (end <= differentialCount) {
      return graph.sub(child, graph.stateVectorDot({ start, stop: end }));
    }
    return child;
  });
  return graph.concatenate(rewritten);
}

/**
 * A reference that needs no parentheses when substituted: a name, possibly
 * with a plain index such as y[3]
 */
function isAtomic(code: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_.]*(\[[0-9:]+\])?$/.test(code);
}

function consumesWholeBuffer(instruction: Instruction): boolean {
  return instruction.kind === 'matmul' || instruction.kind === 'reduction';
}

class Emitter {
  private statements: Statement[] = [];
  private inputs: Map<string, string> = new Map();  // buffer name -> parameter name
  private renames: Map<string, string> = new Map();
  private rootName: string;

  constructor(
    private root: NodeId,
    private tables: LoweredTables,
    private options: ResolvedEmitOptions
  ) {
    this.rootName = bufferName(root, 'cache');
  }

  private get isDae(): boolean {
    return this.options.differentialCount !== undefined;
  }

  private get outputName(): string {
    return this.isDae ? 'out' : 'dy';
  }

  run(): string {
    const constantDeclarations = this.declareConstants();

    const rootConstant = this.tables.constants.get(this.root);
    if (rootConstant !== undefined) {
      const rhs = rootConstant.kind === 'scalar'
        ? formatNumber(rootConstant.value)
        : bufferName(this.root, 'const');
      this.statements.push({ kind: 'broadcast', target: this.rootName, rhs });
    }

    const queue = this.tables.variables;
    for (let entry = queue.shift(); entry !== undefined; entry = queue.shift()) {
      this.process(entry.id, entry.instruction);
    }

    const caches = this.declareCaches();
    this.renames.set(this.rootName, this.outputName);
    for (const [buffer, parameter] of this.inputs) {
      if (buffer !== this.rootName) {
        this.renames.set(buffer, parameter);
      }
    }

    const body = this.statements.map(stmt => this.render(stmt));
    const preamble = this.options.preallocate
      ? [...constantDeclarations, ...caches.map(c => `${c.name} = zeros(${c.size})`)]
      : constantDeclarations;
    return this.assemble(preamble, body);
  }

  /**
   * Non-scalar constants become fields const_0, const_1, ... of cs.
   * Scalar constants are already written as literals.
   */
  private declareConstants(): string[] {
    const declarations: string[] = [];
    for (const [id, literal] of this.tables.constants) {
      if (literal.kind === 'scalar') {
        continue;
      }
      const name = `const_${declarations.length}`;
      declarations.push(`${name} = ${formatConstant(literal)}`);
      this.renames.set(bufferName(id, 'const'), `cs.${name}`);
    }
    return declarations;
  }

  private process(id: NodeId, instruction: Instruction): void {
    const target = bufferName(id, 'cache');
    const isRoot = id === this.root;

    switch (instruction.kind) {
      case 'concatenation':
        this.emitConcatenation(target, instruction.parts, isRoot);
        break;

      case 'matmul':
        this.statements.push(this.options.preallocate
          ? { kind: 'mulInPlace', target, left: instruction.left, right: instruction.right }
          : { kind: 'product', target, left: instruction.left, right: instruction.right });
        break;

      case 'input':
        if (this.options.inputOrder?.includes(instruction.name) !== true) {
          throw new UnsupportedInputError(`input parameter '${instruction.name}' is missing from inputOrder`, id);
        }
        this.inputs.set(target, instruction.name);
        if (isRoot) {
          this.statements.push({ kind: 'broadcast', target, rhs: instruction.name });
        }
        break;

      case 'reduction':
        this.statements.push({ kind: 'reduction', target, rhs: instruction.code });
        break;

      case 'expression':
        if (instruction.form !== 'opaque' && this.tryInline(target, instruction.form, instruction.code)) {
          break;
        }
        debugLog(`materialise ${target} = ${instruction.code}`);
        this.statements.push({ kind: 'broadcast', target, rhs: instruction.code });
        break;
    }
  }

  /**
   * Substitute an expression into every pending consumer. Fails when the
   * buffer feeds a matrix multiply or a reduction (unless the expression is a
   * view) or when nothing consumes it.
   */
  private tryInline(target: string, form: 'view' | 'arithmetic' | 'time', code: string): boolean {
    const consumers = [...this.tables.variables.pending()]
      .filter(entry => referencesBuffer(instructionText(entry.instruction), target));

    if (form !== 'view' && consumers.some(entry => consumesWholeBuffer(entry.instruction))) {
      debugLog(`keep ${target}: used by a matrix multiply or reduction`);
      return false;
    }
    if (consumers.length === 0) {
      return false;
    }

    const replacement = form === 'time' || isAtomic(code) ? code : `(${code})`;
    for (const entry of consumers) {
      this.tables.variables.replace(entry.id, substitute(entry.instruction, target, replacement));
    }
    debugLog(`inline ${target} into ${consumers.length} consumer(s)`);
    return true;
  }

  private emitConcatenation(target: string, parts: ConcatPart[], isRoot: boolean): void {
    if (this.options.preallocate || isRoot) {
      let start = 0;
      for (const part of parts) {
        this.statements.push({ kind: 'sliceAssign', target, start, stop: start + part.size, rhs: part.ref });
        start += part.size;
      }
      return;
    }

    const temps = parts.map((part, i) => {
      const temp = `x${i + 1}`;
      this.statements.push({ kind: 'concatTemp', temp, rhs: part.ref });
      return temp;
    });
    this.statements.push({ kind: 'vcat', target, temps });
  }

  /**
   * Cache buffers still named by some statement, renamed cache_0, cache_1, ...
   * in lowering order. The root writes to the output buffer instead, and
   * input parameters are not buffers.
   */
  private declareCaches(): { name: string; size: number }[] {
    const mentioned = new Set<string>();
    for (const stmt of this.statements) {
      for (const text of statementTexts(stmt)) {
        for (const match of text.matchAll(BUFFER_NAME_PATTERN)) {
          mentioned.add(match[0]);
        }
      }
    }

    const caches: { name: string; size: number }[] = [];
    for (const [id, size] of this.tables.sizes) {
      const buffer = bufferName(id, 'cache');
      if (id === this.root || this.inputs.has(buffer) || !mentioned.has(buffer)) {
        continue;
      }
      const name = `cache_${caches.length}`;
      this.renames.set(buffer, this.options.preallocate ? `cs.${name}` : name);
      caches.push({ name, size });
    }
    return caches;
  }

  private render(stmt: Statement): string {
    const r = (code: string) => renameBuffers(code, this.renames);
    const inPlace = this.options.preallocate;

    switch (stmt.kind) {
      case 'broadcast':
        return inPlace || stmt.target === this.rootName
          ? `@. ${r(stmt.target)} = ${r(stmt.rhs)}`
          : `${r(stmt.target)} = @. ${r(stmt.rhs)}`;
      case 'sliceAssign':
        return `@. ${r(stmt.target)}[${stmt.start + 1}:${stmt.stop}] = ${r(stmt.rhs)}`;
      case 'concatTemp':
        return `${stmt.temp} = @. ${r(stmt.rhs)}`;
      case 'vcat':
        return `${r(stmt.target)} = vcat(${stmt.temps.join(', ')})`;
      case 'mulInPlace':
        return `mul!(${r(stmt.target)}, ${r(stmt.left)}, ${r(stmt.right)})`;
      case 'product':
        return stmt.target === this.rootName
          ? `${r(stmt.target)} .= ${r(stmt.left)} * ${r(stmt.right)}`
          : `${r(stmt.target)} = ${r(stmt.left)} * ${r(stmt.right)}`;
      case 'reduction':
        return inPlace || stmt.target === this.rootName
          ? `${r(stmt.target)} .= ${r(stmt.rhs)}`
          : `${r(stmt.target)} = ${r(stmt.rhs)}`;
    }
  }

  private assemble(preamble: string[], body: string[]): string {
    const { functionName, inputOrder, preallocate } = this.options;
    const useLet = preallocate && preamble.length > 0;
    const name = useLet ? `${functionName}_with_consts!` : `${functionName}!`;
    const args = this.isDae ? 'out, dy, y, p, t' : 'dy, y, p, t';

    const lines = ['begin'];
    if (preamble.length > 0) {
      lines.push(useLet ? `${functionName}! = let cs = (` : 'cs = (');
      lines.push(...preamble.map(line => `${INDENT}${line},`));
      lines.push(')');
    }
    lines.push('');
    lines.push(`function ${name}(${args})`);
    if (inputOrder !== undefined && inputOrder.length === 1) {
      lines.push(`${INDENT}${inputOrder[0]} = p[1]`);
    } else if (inputOrder !== undefined && inputOrder.length > 1) {
      lines.push(`${INDENT}${inputOrder.join(', ')} = p`);
    }
    lines.push(...body.map(line => `${INDENT}${line}`));
    lines.push(`${INDENT}nothing`);
    lines.push('end');
    lines.push('');
    if (useLet) {
      lines.push('end');
    }
    lines.push('end');
    return lines.join('\n');
  }
}

function statementTexts(stmt: Statement): string[] {
  switch (stmt.kind) {
    case 'broadcast':
    case 'reduction':
    case 'sliceAssign':
      return [stmt.target, stmt.rhs];
    case 'concatTemp':
      return [stmt.rhs];
    case 'vcat':
      return [stmt.target];
    case 'mulInPlace':
    case 'product':
      return [stmt.target, stmt.left, stmt.right];
  }
}
