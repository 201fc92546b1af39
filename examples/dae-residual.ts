/**
 * Example: DAE residual
 *
 * Three-point diffusion on y[1:3] coupled to an algebraic constraint that
 * y[4] equals the largest concentration.
 */

import { ExpressionGraph, generateJuliaFunction, UnsupportedInputError } from '../src/index.js';

const g = new ExpressionGraph();

const concentration = g.stateVector({ start: 0, stop: 3 });
const laplacian = g.matrix([
  [-2, 1, 0],
  [1, -2, 1],
  [0, 1, -2]
]);
const diffusion = g.matmul(laplacian, concentration);
const constraint = g.sub(g.stateVector([3]), g.call('maximum', [concentration]));

const root = g.concatenate([diffusion, constraint]);
console.log(generateJuliaFunction(g, root, { differentialCount: 3, functionName: 'residual' }));

// Selections with gaps cannot be written as a single view
try {
  generateJuliaFunction(g, g.stateVector([0, 2]));
} catch (error) {
  if (!(error instanceof UnsupportedInputError)) {
    throw error;
  }
  console.log(`\n${error.message}`);
}
