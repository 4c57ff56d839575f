import { describe, it, expect } from 'vitest';
import { makeSymbol, makeNumber, makeAdd, makeMul, makePow } from '../algebra/expr.js';
import { defineFunction, builtin } from '../algebra/functions.js';
import { evaluate } from '../algebra/evaluate.js';
import { parseExpression } from '../algebra/parser.js';
import { NDArray, asarray } from '../ndarray/ndarray.js';
import { multiply } from '../ndarray/ufuncs.js';
import type { BindingKey } from './bindings.js';
import { CompilationCache } from './cache.js';
import { ExpressionCompiler } from './compiler.js';
import {
  InvalidBindingError,
  InvalidSpecError,
  OverlappingBindingError,
  UnboundFunctionError,
  UnboundSymbolError,
} from './errors.js';
import { isValidIdentifier } from './identifiers.js';

const x = makeSymbol('x');
const y = makeSymbol('y');
const a = makeSymbol('a');
const g = makeSymbol('g');

function newCompiler(): ExpressionCompiler {
  return new ExpressionCompiler(new CompilationCache(32));
}

function toArray(value: number | NDArray): unknown {
  return value instanceof NDArray ? value.toArray() : value;
}

describe('Compiler - Scenarios', () => {
  it('should add two variables', () => {
    const f = newCompiler().compile(makeAdd(x, y), { vars: [x, y] });
    expect(f.call(2, 3)).toBe(5);
    expect(f.source).toBe(
      [
        'function _generated(x, y) {',
        '  x = np.asarray(x);',
        '  y = np.asarray(y);',
        '  return x + y;',
        '}',
      ].join('\n')
    );
  });

  it('should broadcast a constant to the argument shape', () => {
    const f = newCompiler().compile(5, { vars: [x] });
    expect(toArray(f.call([1, 2, 3]))).toEqual([5, 5, 5]);
    expect(f.call(7)).toBe(5);
  });

  it('should freeze and unfreeze a coefficient', () => {
    const f = newCompiler().compile(makeMul(a, x), { vars: [x, a] });
    const frozen = f.freeze({ a: 2 });
    expect(frozen.call(3)).toBe(6);
    expect(frozen.unfreeze(a).call(3, 4)).toBe(12);
  });

  it('should accept integer keys with a named slot', () => {
    const f = newCompiler().compile(makeAdd(x, y, g), { vars: { 0: x, 1: y, gain: g } });
    expect(f.call(2, 3, { gain: 4 })).toBe(9);
  });

  it('should reject non-contiguous integer keys', () => {
    expect(() => newCompiler().compile(makeAdd(x, y), { vars: { 0: x, 2: y } })).toThrow(/contiguous/);
    expect(() => newCompiler().compile(makeAdd(x, y), { vars: { 0: x, 2: y } })).toThrow(InvalidSpecError);
  });

  it('should allocate distinct valid identifiers', () => {
    const keyword = makeSymbol('for');
    const runtime = makeSymbol('np');
    const f = newCompiler().compile(makeAdd(keyword, runtime));
    expect(f.callSignature).toEqual([[keyword, 'for_'], [runtime, 'np_1']]);
    expect(f.source?.split('\n').at(-2)).toBe('  return for_ + np_1;');

    const real = makeSymbol('x', { real: true });
    const h = newCompiler().compile(makeAdd(x, real), { vars: [x, real] });
    const ids = h.callSignature.map(([, id]) => id);
    expect(ids).toEqual(['x', 'x_1']);
    expect(ids.every(isValidIdentifier)).toBe(true);
    expect(h.call(1, 2)).toBe(3);
  });
});

describe('Compiler - Caching', () => {
  it('should return the identical artifact for a repeated request', () => {
    const compiler = newCompiler();
    const first = compiler.compileArtifact(makeMul(a, x), { vars: [x, a] });
    const second = compiler.compileArtifact(makeMul(x, a), { vars: [x, a] });
    expect(second).toBe(first);
    expect(compiler.cacheStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
  });

  it('should build fresh artifacts with the cache disabled', () => {
    const compiler = newCompiler();
    const first = compiler.compile(makeMul(a, x), { vars: [x, a], cache: false });
    const second = compiler.compile(makeMul(a, x), { vars: [x, a], cache: false });
    expect(second.artifact).not.toBe(first.artifact);
    expect(second.call(3, 4)).toBe(first.call(3, 4));
    expect(compiler.cacheStats().size).toBe(0);
  });

  it('should compile separately for different options', () => {
    const compiler = newCompiler();
    const vectorized = compiler.compileArtifact(makeMul(a, x), { vars: [x, a] });
    const plain = compiler.compileArtifact(makeMul(a, x), { vars: [x, a], vectorize: false });
    const reordered = compiler.compileArtifact(makeMul(a, x), { vars: [a, x] });
    expect(plain).not.toBe(vectorized);
    expect(reordered).not.toBe(vectorized);
    expect(compiler.cacheStats().size).toBe(3);
  });

  it('should recompile after a bound plain array changes', () => {
    const compiler = newCompiler();
    const values = [1, 2, 3];
    const bindings = new Map<BindingKey, unknown>([[a, values]]);
    const before = compiler.compile(makeMul(a, x), { bindings });
    values[0] = 100;
    const cached = compiler.compile(makeMul(a, x), { bindings });
    const fresh = compiler.compile(makeMul(a, x), { bindings, cache: false });
    expect(toArray(before.call(1))).toEqual([1, 2, 3]);
    expect(toArray(cached.call(1))).toEqual([100, 2, 3]);
    expect(toArray(fresh.call(1))).toEqual([100, 2, 3]);
    expect(compiler.cacheStats()).toMatchObject({ hits: 0, misses: 2, size: 2 });
  });

  it('should keep the entry for a bound NDArray and see its changes', () => {
    const compiler = newCompiler();
    const values = asarray([1, 2, 3]);
    const bindings = new Map<BindingKey, unknown>([[a, values]]);
    const before = compiler.compile(makeMul(a, x), { bindings });
    if (values instanceof NDArray) {
      values.data[0] = 100;
    }
    const after = compiler.compile(makeMul(a, x), { bindings });
    expect(after.artifact).toBe(before.artifact);
    expect(toArray(after.call(1))).toEqual([100, 2, 3]);
  });

  it('should clear the cache', () => {
    const compiler = newCompiler();
    compiler.compile(makeMul(a, x));
    compiler.cacheClear();
    expect(compiler.cacheStats()).toMatchObject({ hits: 0, misses: 0, size: 0 });
  });
});

describe('Compiler - Variables and bindings', () => {
  it('should default to free symbols sorted by name', () => {
    const f = newCompiler().compile(makeAdd(y, x));
    expect(f.varNames).toEqual(['x', 'y']);
  });

  it('should exclude bound symbols from the default variables', () => {
    const f = newCompiler().compile(makeMul(a, x), { bindings: new Map<BindingKey, unknown>([[a, 2]]) });
    expect(f.varNames).toEqual(['x']);
    expect(f.call(3)).toBe(6);
    expect(f.source?.split('\n')).toEqual([
      'function _generated(x) {',
      '  x = np.asarray(x);',
      '  const a = _bindings["a"];',
      '  return a * x;',
      '}',
    ]);
  });

  it('should broadcast expressions made only of constants', () => {
    const f = newCompiler().compile(a, { vars: [x], bindings: new Map<BindingKey, unknown>([[a, 3]]) });
    expect(toArray(f.call([1, 2]))).toEqual([3, 3]);
  });

  it('should reject a symbol that is both a variable and a binding', () => {
    expect(() =>
      newCompiler().compile(makeMul(a, x), { vars: [x, a], bindings: new Map<BindingKey, unknown>([[a, 2]]) })
    ).toThrow(OverlappingBindingError);
  });

  it('should reject unbound symbols', () => {
    expect(() => newCompiler().compile(makeMul(a, x), { vars: [x] })).toThrow(UnboundSymbolError);
  });

  it('should not cache failed compiles', () => {
    const compiler = newCompiler();
    expect(() => compiler.compile(makeMul(a, x), { vars: [x] })).toThrow(UnboundSymbolError);
    expect(compiler.cacheStats().size).toBe(0);
  });
});

describe('Compiler - Functions', () => {
  it('should require an implementation for unknown functions', () => {
    const G = defineFunction('G', { arity: 1 });
    expect(() => newCompiler().compile(G.apply(x))).toThrow(UnboundFunctionError);
  });

  it('should call bound functions and keep their names reserved', () => {
    const G = defineFunction('G', { arity: 1 });
    const shadow = makeSymbol('G');
    const f = newCompiler().compile(makeAdd(G.apply(x), shadow), {
      bindings: new Map<BindingKey, unknown>([[G, (v: number | NDArray) => multiply(v, 10)]]),
    });
    expect(f.callSignature).toEqual([[shadow, 'G_1'], [x, 'x']]);
    expect(f.source?.split('\n').at(-2)).toBe('  return G(x) + G_1;');
    expect(f.call(1, 2)).toBe(21);
  });

  it('should refuse to compile distinct functions sharing a name', () => {
    const first = defineFunction('G', { arity: 1, numeric: v => v });
    const second = defineFunction('G', { arity: 1, numeric: v => multiply(10, v) });
    const compiler = newCompiler();
    expect(() => compiler.compile(makeAdd(first.apply(x), second.apply(x)))).toThrow(InvalidBindingError);
    expect(compiler.cacheStats().size).toBe(0);
  });

  it('should use numeric implementations', () => {
    const T = defineFunction('T', { arity: 1, numeric: v => multiply(2, v) });
    expect(toArray(newCompiler().compile(T.apply(x)).call([1, 2]))).toEqual([2, 4]);
  });

  it('should expand symbolic definitions', () => {
    const sq = defineFunction('sq', { arity: 1, definition: u => makePow(u, makeNumber(2)) });
    const f = newCompiler().compile(sq.apply(x));
    expect(String(f.symbolic)).toBe('(^ x 2)');
    expect(f.call(3)).toBe(9);
    expect(() => newCompiler().compile(sq.apply(x), { expandDefinition: false })).toThrow(
      'Expression contains unknown function(s) that require a numeric implementation: sq.'
    );
  });
});

describe('Compiler - Numeric results', () => {
  it('should agree with direct evaluation', () => {
    const expr = parseExpression('(+ x (* a (sin y)))');
    const f = newCompiler().compile(expr, { vars: [x, a, y] });
    const expected = evaluate(expr, new Map([[x, 1], [a, 2], [y, Math.PI / 2]]));
    expect(f.call(1, 2, Math.PI / 2)).toBe(expected);
    expect(toArray(f.call([1, 2], 2, 0))).toEqual([1, 2]);
  });

  it('should require arrays to be coerced without vectorization', () => {
    const f = newCompiler().compile(makeMul(x, makeNumber(2)), { vectorize: false });
    expect(f.source?.split('\n')).toEqual(['function _generated(x) {', '  return 2 * x;', '}']);
    expect(() => f.call([1, 2])).toThrow('Argument 0 must be a number or NDArray when not vectorizing');
    expect(toArray(f.call(asarray([1, 2])))).toEqual([2, 4]);
  });

  it('should apply builtins elementwise', () => {
    const f = newCompiler().compile(builtin('sqrt').apply(x));
    expect(toArray(f.call([4, 9, 16]))).toEqual([2, 3, 4]);
  });
});
