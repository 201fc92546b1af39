/**
 * Instructions produced by lowering, one per run-time dependent node
 */

import { replaceBuffer } from './Names.js';

/**
 * How cheap an expression is to inline into its consumers
 *  - view:       a slice of an existing buffer
 *  - arithmetic: + - * / or a sign change
 *  - time:       the bare time symbol
 *  - opaque:     anything else; always materialised
 */
export type ExpressionForm = 'view' | 'arithmetic' | 'time' | 'opaque';

export interface ConcatPart {
  size: number;
  ref: string;
}

export type Instruction =
  | { kind: 'expression'; form: ExpressionForm; code: string }
  | { kind: 'concatenation'; parts: ConcatPart[] }
  | { kind: 'matmul'; left: string; right: string }
  | { kind: 'reduction'; code: string }
  | { kind: 'input'; name: string };

/**
 * Text form of an instruction, as it reads before emission
 */
export function instructionText(instruction: Instruction): string {
  switch (instruction.kind) {
    case 'expression':
    case 'reduction':
      return instruction.code;
    case 'concatenation':
      return `[${instruction.parts.map(p => `${p.size}::${p.ref}`).join(', ')}]`;
    case 'matmul':
      return `${instruction.left} @ ${instruction.right}`;
    case 'input':
      return `inputs['${instruction.name}']`;
  }
}

/**
 * Replace every use of a buffer inside an instruction
 */
export function substitute(instruction: Instruction, name: string, code: string): Instruction {
  const sub = (text: string) => replaceBuffer(text, name, code);
  switch (instruction.kind) {
    case 'expression':
      return { ...instruction, code: sub(instruction.code) };
    case 'reduction':
      return { ...instruction, code: sub(instruction.code) };
    case 'concatenation':
      return { ...instruction, parts: instruction.parts.map(p => ({ size: p.size, ref: sub(p.ref) })) };
    case 'matmul':
      return { ...instruction, left: sub(instruction.left), right: sub(instruction.right) };
    case 'input':
      return instruction;
  }
}
