/**
 * Example: ODE right-hand side
 *
 * A damped oscillator with a forcing term, written as a first-order system
 * over y = [position, velocity].
 */

import { ExpressionGraph, generateJuliaFunction } from '../src/index.js';

const g = new ExpressionGraph();

const position = g.stateVector([0]);
const velocity = g.stateVector([1]);
const stiffness = g.input('k');
const damping = g.input('c');

const acceleration = g.sub(
  g.sub(g.call('sin', [g.time()]), g.mul(stiffness, position)),
  g.mul(damping, velocity)
);
const rhs = g.concatenate([velocity, acceleration]);

console.log('=== Preallocated ===\n');
console.log(generateJuliaFunction(g, rhs, { inputOrder: ['k', 'c'] }));

console.log('\n=== Allocating ===\n');
console.log(generateJuliaFunction(g, rhs, { inputOrder: ['k', 'c'], preallocate: false }));
