/**
 * Options for Julia code generation
 */

import { z } from 'zod';
import { ConstantEvaluator } from '../graph/Evaluator.js';
import { UnsupportedInputError } from './Errors.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// Names the generated function already uses
const RESERVED = new Set(['y', 'dy', 'p', 't', 'out', 'cs', 'nothing', 'begin', 'end', 'function', 'let']);
const GENERATED = /^(?:cache|const)_\d+$|^x\d+$/;

const ParameterNameSchema = z
  .string()
  .regex(IDENTIFIER, 'must be a Julia identifier')
  .refine(name => !RESERVED.has(name) && !GENERATED.test(name), {
    message: 'clashes with a name used by the generated function'
  });

export const EmitOptionsSchema = z.object({
  functionName: z.string().regex(IDENTIFIER, 'must be a Julia identifier').default('f'),
  inputOrder: z
    .array(ParameterNameSchema)
    .refine(names => new Set(names).size === names.length, { message: 'contains duplicate names' })
    .optional(),
  differentialCount: z.number().int().nonnegative().optional(),
  preallocate: z.boolean().default(true),
  roundConstants: z.boolean().default(true)
});

export interface EmitOptions {
  /** Base name of the generated function (default 'f') */
  functionName?: string;
  /** Order in which input parameters are unpacked from p */
  inputOrder?: readonly string[];
  /**
   * Number of differential equations. When set the output is a DAE residual
   * function f!(out, dy, y, p, t); otherwise an ODE right-hand side f!(dy, y, p, t)
   */
  differentialCount?: number;
  /** Keep buffers alive across calls instead of allocating per call (default true) */
  preallocate?: boolean;
  /** Round constants to 11 decimals (default true) */
  roundConstants?: boolean;
}

export interface GenerateOptions extends EmitOptions {
  evaluator?: ConstantEvaluator;
}

export type ResolvedEmitOptions = z.infer<typeof EmitOptionsSchema>;

export function resolveOptions(options: EmitOptions): ResolvedEmitOptions {
  const result = EmitOptionsSchema.safeParse({
    functionName: options.functionName,
    inputOrder: options.inputOrder === undefined ? undefined : [...options.inputOrder],
    differentialCount: options.differentialCount,
    preallocate: options.preallocate,
    roundConstants: options.roundConstants
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join('.');
    throw new UnsupportedInputError(`invalid option '${path}': ${issue.message}`);
  }
  return result.data;
}
