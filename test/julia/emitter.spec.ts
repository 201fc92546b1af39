import { describe, it, expect, vi, afterEach } from 'vitest';
import { ExpressionGraph } from '../../src/graph/ExpressionGraph.js';
import { generateJuliaFunction, emit, residualForm } from '../../src/julia/Emitter.js';
import { lower } from '../../src/julia/Lowering.js';
import { UnsupportedInputError, UnsupportedNodeKindError } from '../../src/julia/Errors.js';
import { functionBody, preamble } from '../helpers.js';

describe('generateJuliaFunction', () => {
  describe('ODE mode', () => {
    it('should write a single state entry straight into dy', () => {
      const g = new ExpressionGraph();
      const code = generateJuliaFunction(g, g.stateVector([0]), { preallocate: false });

      expect(code).toBe([
        'begin',
        '',
        'function f!(dy, y, p, t)',
        '   @. dy = y[1]',
        '   nothing',
        'end',
        '',
        'end'
      ].join('\n'));
    });

    it('should inline scalar constants as literals', () => {
      const g = new ExpressionGraph();
      const root = g.add(g.scalar(5), g.stateVector([1]));
      const code = generateJuliaFunction(g, root, { preallocate: false });

      expect(functionBody(code)).toEqual(['@. dy = 5.0 + y[2]']);
      expect(preamble(code)).toEqual([]);
    });

    it('should assign a shared subexpression once and reuse its cache', () => {
      const g = new ExpressionGraph();
      const e = g.call('exp', [g.stateVector({ start: 0, stop: 2 })]);
      const root = g.add(g.mul(e, g.scalar(2)), g.call('sin', [e]));
      const code = generateJuliaFunction(g, root);

      expect(preamble(code)).toEqual(['cache_0 = zeros(2)', 'cache_1 = zeros(2)']);
      expect(functionBody(code)).toEqual([
        '@. cs.cache_0 = exp((@view y[1:2]))',
        '@. cs.cache_1 = sin(cs.cache_0)',
        '@. dy = (cs.cache_0 * 2.0) + cs.cache_1'
      ]);
    });

    it('should produce identical text on repeated runs', () => {
      const build = () => {
        const g = new ExpressionGraph();
        const y = g.stateVector({ start: 0, stop: 3 });
        const root = g.sub(g.matmul(g.matrix([[1, 0, 0], [0, 2, 0], [0, 0, 3]]), y), g.call('tanh', [y]));
        return generateJuliaFunction(g, root);
      };
      expect(build()).toBe(build());
    });
  });

  describe('matrix multiplication', () => {
    const build = (preallocate: boolean) => {
      const g = new ExpressionGraph();
      const product = g.matmul(g.matrix([[1, 2], [3, 4]]), g.stateVector({ start: 0, stop: 2 }));
      return generateJuliaFunction(g, g.add(product, g.time()), { preallocate });
    };

    it('should multiply in place into a captured cache', () => {
      expect(build(true)).toBe([
        'begin',
        'f! = let cs = (',
        '   const_0 = [1.0 2.0; 3.0 4.0],',
        '   cache_0 = zeros(2),',
        ')',
        '',
        'function f_with_consts!(dy, y, p, t)',
        '   mul!(cs.cache_0, cs.const_0, (@view y[1:2]))',
        '   @. dy = cs.cache_0 + t',
        '   nothing',
        'end',
        '',
        'end',
        'end'
      ].join('\n'));
    });

    it('should allocate the product when not preallocating', () => {
      expect(build(false)).toBe([
        'begin',
        'cs = (',
        '   const_0 = [1.0 2.0; 3.0 4.0],',
        ')',
        '',
        'function f!(dy, y, p, t)',
        '   cache_0 = cs.const_0 * (@view y[1:2])',
        '   @. dy = cache_0 + t',
        '   nothing',
        'end',
        '',
        'end'
      ].join('\n'));
    });

    it('should materialise arithmetic that feeds a matrix multiply', () => {
      const g = new ExpressionGraph();
      const scaled = g.mul(g.scalar(2), g.stateVector({ start: 0, stop: 2 }));
      const root = g.matmul(g.matrix([[0, 1], [1, 0]]), scaled);
      const code = generateJuliaFunction(g, root);

      expect(functionBody(code)).toEqual([
        '@. cs.cache_0 = 2.0 * (@view y[1:2])',
        'mul!(dy, cs.const_0, cs.cache_0)'
      ]);
    });

    it('should write sparse constants as sparse literals', () => {
      const g = new ExpressionGraph();
      const m = g.sparse(2, 3, [{ row: 1, col: 0, value: 2 }, { row: 0, col: 2, value: 1.5 }]);
      const code = generateJuliaFunction(g, g.matmul(m, g.stateVector({ start: 0, stop: 3 })));

      expect(preamble(code)).toEqual(['const_0 = sparse([2,1], [1,3], [2.0,1.5], 2, 3)']);
      expect(functionBody(code)).toEqual(['mul!(dy, cs.const_0, (@view y[1:3]))']);
    });
  });

  describe('reductions', () => {
    const build = (preallocate: boolean) => {
      const g = new ExpressionGraph();
      const m = g.call('maximum', [g.stateVector({ start: 0, stop: 3 })]);
      return generateJuliaFunction(g, g.add(m, g.time()), { preallocate });
    };

    it('should reduce into a preallocated cache', () => {
      expect(functionBody(build(true))).toEqual([
        'cs.cache_0 .= maximum((@view y[1:3]))',
        '@. dy = cs.cache_0 + t'
      ]);
      expect(preamble(build(true))).toEqual(['cache_0 = zeros(1)']);
    });

    it('should bind the reduction to a local otherwise', () => {
      expect(functionBody(build(false))).toEqual([
        'cache_0 = maximum((@view y[1:3]))',
        '@. dy = cache_0 + t'
      ]);
    });

    it('should materialise arithmetic that feeds a reduction', () => {
      const g = new ExpressionGraph();
      const root = g.call('minimum', [g.negate(g.stateVector({ start: 0, stop: 2 }))]);

      expect(functionBody(generateJuliaFunction(g, root))).toEqual([
        '@. cs.cache_0 = -(@view y[1:2])',
        'dy .= minimum(cs.cache_0)'
      ]);
    });
  });

  describe('concatenation', () => {
    const build = (preallocate: boolean) => {
      const g = new ExpressionGraph();
      const cat = g.concatenate([g.stateVector([0]), g.time()]);
      return generateJuliaFunction(g, g.mul(cat, g.scalar(2)), { preallocate });
    };

    it('should fill a preallocated buffer slice by slice', () => {
      const code = build(true);
      expect(preamble(code)).toEqual(['cache_0 = zeros(2)']);
      expect(functionBody(code)).toEqual([
        '@. cs.cache_0[1:1] = y[1]',
        '@. cs.cache_0[2:2] = t',
        '@. dy = cs.cache_0 * 2.0'
      ]);
    });

    it('should build with vcat when not preallocating', () => {
      expect(functionBody(build(false))).toEqual([
        'x1 = @. y[1]',
        'x2 = @. t',
        'cache_0 = vcat(x1, x2)',
        '@. dy = cache_0 * 2.0'
      ]);
    });

    it('should write a domain concatenation root in output order', () => {
      const g = new ExpressionGraph();
      const halves = [{ start: 0, stop: 5 }, { start: 5, stop: 10 }];
      const root = g.domainConcatenate(
        [g.stateVector({ start: 0, stop: 10 }), g.stateVector({ start: 10, stop: 20 })],
        [
          [{ domain: 'b', childSlices: halves, outputSlices: [{ start: 5, stop: 10 }, { start: 15, stop: 20 }] }],
          [{ domain: 'a', childSlices: halves, outputSlices: [{ start: 0, stop: 5 }, { start: 10, stop: 15 }] }]
        ],
        2
      );

      expect(functionBody(generateJuliaFunction(g, root, { preallocate: false }))).toEqual([
        '@. dy[1:5] = @view (@view y[11:20])[1:5]',
        '@. dy[6:10] = @view (@view y[1:10])[1:5]',
        '@. dy[11:15] = @view (@view y[11:20])[6:10]',
        '@. dy[16:20] = @view (@view y[1:10])[6:10]'
      ]);
    });
  });

  describe('domain concatenation with constants', () => {
    it('should write a scalar child without a view', () => {
      const g = new ExpressionGraph();
      const y = g.stateVector({ start: 0, stop: 2 });
      const root = g.domainConcatenate(
        [y, g.scalar(3)],
        [
          [{ domain: 'a', childSlices: [{ start: 0, stop: 1 }, { start: 1, stop: 2 }], outputSlices: [{ start: 0, stop: 1 }, { start: 2, stop: 3 }] }],
          [{ domain: 'b', childSlices: [{ start: 0, stop: 1 }, { start: 0, stop: 1 }], outputSlices: [{ start: 1, stop: 2 }, { start: 3, stop: 4 }] }]
        ],
        2
      );

      expect(functionBody(generateJuliaFunction(g, root, { preallocate: false }))).toEqual([
        '@. dy[1:1] = @view (@view y[1:2])[1:1]',
        '@. dy[2:2] = 3.0',
        '@. dy[3:3] = @view (@view y[1:2])[2:2]',
        '@. dy[4:4] = 3.0'
      ]);
    });
  });

  describe('constants at the root', () => {
    it('should write a scalar root as a literal', () => {
      const g = new ExpressionGraph();
      expect(functionBody(generateJuliaFunction(g, g.scalar(3.5)))).toEqual(['@. dy = 3.5']);
    });

    it('should capture a vector root in cs', () => {
      const g = new ExpressionGraph();
      const code = generateJuliaFunction(g, g.vector([1, 2]));

      expect(code.split('\n')[1]).toBe('f! = let cs = (');
      expect(preamble(code)).toEqual(['const_0 = [1.0,2.0]']);
      expect(functionBody(code)).toEqual(['@. dy = cs.const_0']);
    });

    it('should round constants unless told not to', () => {
      const g = new ExpressionGraph();
      const root = g.scalar(0.1 + 0.2);
      expect(functionBody(generateJuliaFunction(g, root))).toEqual(['@. dy = 0.3']);
      expect(functionBody(generateJuliaFunction(g, root, { roundConstants: false })))
        .toEqual(['@. dy = 0.30000000000000004']);
    });

    it('should give the same text for constants that are already rounded', () => {
      const g = new ExpressionGraph();
      const root = g.add(g.vector([0.25, -1.5]), g.stateVector({ start: 0, stop: 2 }));
      expect(generateJuliaFunction(g, root)).toBe(generateJuliaFunction(g, root, { roundConstants: false }));
    });
  });

  describe('input parameters', () => {
    const graph = () => {
      const g = new ExpressionGraph();
      const root = g.add(g.mul(g.input('a'), g.stateVector([0])), g.input('b'));
      return { g, root };
    };

    it('should destructure several parameters from p', () => {
      const { g, root } = graph();
      const code = generateJuliaFunction(g, root, { inputOrder: ['a', 'b'], preallocate: false });

      expect(code.split('\n').slice(2, 5)).toEqual([
        'function f!(dy, y, p, t)',
        '   a, b = p',
        '   @. dy = (a * y[1]) + b'
      ]);
    });

    it('should take a single parameter by index', () => {
      const g = new ExpressionGraph();
      const root = g.mul(g.input('k'), g.stateVector({ start: 0, stop: 2 }));
      const code = generateJuliaFunction(g, root, { inputOrder: ['k'], preallocate: false });

      expect(code.split('\n').slice(2, 5)).toEqual([
        'function f!(dy, y, p, t)',
        '   k = p[1]',
        '   @. dy = k * (@view y[1:2])'
      ]);
    });

    it('should reject inputs that inputOrder does not list', () => {
      const g = new ExpressionGraph();
      const root = g.mul(g.input('k'), g.stateVector([0]));
      expect(() => generateJuliaFunction(g, root)).toThrow(
        "Unsupported input: input parameter 'k' is missing from inputOrder (node 0)"
      );
      expect(() => generateJuliaFunction(g, root, { inputOrder: ['c'] })).toThrow(UnsupportedInputError);
    });

    it('should copy a parameter that is itself the root', () => {
      const g = new ExpressionGraph();
      const code = generateJuliaFunction(g, g.input('a'), { inputOrder: ['a'] });
      expect(functionBody(code)).toEqual(['a = p[1]', '@. dy = a']);
    });
  });

  describe('DAE mode', () => {
    it('should subtract dy from the differential equations only', () => {
      const g = new ExpressionGraph();
      const differential = g.mul(g.scalar(2), g.stateVector([0]));
      const algebraic = g.sub(g.stateVector([1]), g.scalar(1));
      const root = g.concatenate([differential, algebraic]);
      const code = generateJuliaFunction(g, root, { differentialCount: 1, preallocate: false });

      expect(code).toBe([
        'begin',
        '',
        'function f!(out, dy, y, p, t)',
        '   @. out[1:1] = ((2.0 * y[1]) - dy[1])',
        '   @. out[2:2] = (y[2] - 1.0)',
        '   nothing',
        'end',
        '',
        'end'
      ].join('\n'));
    });

    it('should capture preallocated buffers in the residual closure', () => {
      const g = new ExpressionGraph();
      const differential = g.matmul(g.matrix([[1, 2], [3, 4]]), g.stateVector({ start: 0, stop: 2 }));
      const algebraic = g.sub(g.stateVector([2]), g.time());
      const root = g.concatenate([differential, algebraic]);
      const code = generateJuliaFunction(g, root, { differentialCount: 2 });

      expect(code).toBe([
        'begin',
        'f! = let cs = (',
        '   const_0 = [1.0 2.0; 3.0 4.0],',
        '   cache_0 = zeros(2),',
        ')',
        '',
        'function f_with_consts!(out, dy, y, p, t)',
        '   mul!(cs.cache_0, cs.const_0, (@view y[1:2]))',
        '   @. out[1:2] = (cs.cache_0 - (@view dy[1:2]))',
        '   @. out[3:3] = (y[3] - t)',
        '   nothing',
        'end',
        '',
        'end',
        'end'
      ].join('\n'));
    });

    it('should leave a purely algebraic system unchanged', () => {
      const g = new ExpressionGraph();
      const root = g.concatenate([g.stateVector([0]), g.time()]);
      expect(residualForm(g, root, 0)).toBe(root);
    });

    it('should wrap a non-concatenation root as a single child', () => {
      const g = new ExpressionGraph();
      const y = g.stateVector({ start: 0, stop: 2 });
      const residual = residualForm(g, y, 2);
      const node = g.get(residual);

      expect(node.kind).toBe('concatenation');
      expect(node.children).toEqual([g.sub(y, g.stateVectorDot({ start: 0, stop: 2 }))]);
    });
  });

  describe('naming', () => {
    it('should use the requested function name', () => {
      const g = new ExpressionGraph();
      const root = g.add(g.vector([1, 2]), g.stateVector({ start: 0, stop: 2 }));
      const code = generateJuliaFunction(g, root, { functionName: 'rhs' });

      expect(code).toContain('rhs! = let cs = (');
      expect(code).toContain('function rhs_with_consts!(dy, y, p, t)');
    });
  });

  describe('errors', () => {
    it('should reject graphs containing unbound variables', () => {
      const g = new ExpressionGraph();
      const root = g.mul(g.variable('k'), g.stateVector([0]));
      expect(() => generateJuliaFunction(g, root)).toThrow(UnsupportedNodeKindError);
    });

    it('should keep a negative base of a power grouped', () => {
      const g = new ExpressionGraph();
      const root = g.pow(g.scalar(-2), g.stateVector([0]));
      expect(functionBody(generateJuliaFunction(g, root, { preallocate: false }))).toEqual(['@. dy = (-2.0) .^ y[1]']);
    });

    it('should reject non-contiguous state selections', () => {
      const g = new ExpressionGraph();
      expect(() => generateJuliaFunction(g, g.stateVector([1, 3]))).toThrow(UnsupportedInputError);
    });
  });
});

describe('emit', () => {
  it('should emit from tables lowered separately', () => {
    const g = new ExpressionGraph();
    const root = g.add(g.scalar(5), g.stateVector([1]));
    const tables = lower(g, root);

    expect(functionBody(emit(root, tables, { preallocate: false }))).toEqual(['@. dy = 5.0 + y[2]']);
    expect(tables.variables.length).toBe(0);
  });
});

describe('debug tracing', () => {
  afterEach(() => {
    delete process.env.DAG_TO_JULIA_DEBUG;
    vi.restoreAllMocks();
  });

  it('should log inlining decisions when enabled', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    process.env.DAG_TO_JULIA_DEBUG = '1';
    const g = new ExpressionGraph();
    generateJuliaFunction(g, g.add(g.scalar(5), g.stateVector([1])));

    expect(spy).toHaveBeenCalledWith('[dag-to-julia] inline cache_00001 into 1 consumer(s)');
    expect(spy).toHaveBeenCalledWith('[dag-to-julia] materialise cache_00002 = 5.0 + y[2]');
  });

  it('should stay quiet by default', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const g = new ExpressionGraph();
    generateJuliaFunction(g, g.add(g.scalar(5), g.stateVector([1])));

    expect(spy).not.toHaveBeenCalled();
  });
});
