import { describe, it, expect } from 'vitest';
import { type Expr, makeSymbol, makeNumber, makeAdd, makeMul } from '../algebra/expr.js';
import { NDArray } from '../ndarray/ndarray.js';
import { add } from '../ndarray/ufuncs.js';
import { buildArtifact, generateSource, isConstantExpression, lowerProgram, artifactFromCallable } from './codegen.js';
import { disassemble } from './insn.js';
import { NumericPrinter } from './printer.js';
import { normalizeVarSpec } from './var-spec.js';
import type { CallSignature } from './identifiers.js';

const x = makeSymbol('x');
const y = makeSymbol('y');
const a = makeSymbol('a');

const signature: CallSignature = [[x, 'x'], [y, 'y']];
const constants: CallSignature = [[a, 'a']];
const printer = new NumericPrinter({ identifiers: new Map<Expr, string>([...signature, ...constants]) });
const expr = makeAdd(x, makeMul(a, y));

describe('Codegen - Source', () => {
  it('should generate a vectorized function', () => {
    const source = generateSource({ expr, signature, constants, printer, vectorize: true, broadcast: false });
    expect(source).toBe(
      [
        'function _generated(x, y) {',
        '  x = np.asarray(x);',
        '  y = np.asarray(y);',
        '  const a = _bindings["a"];',
        '  return a * y + x;',
        '}',
      ].join('\n')
    );
  });

  it('should skip coercion without vectorization', () => {
    const source = generateSource({ expr, signature, constants, printer, vectorize: false, broadcast: false });
    expect(source.split('\n')).toEqual([
      'function _generated(x, y) {',
      '  const a = _bindings["a"];',
      '  return a * y + x;',
      '}',
    ]);
  });

  it('should broadcast constant results', () => {
    const source = generateSource({
      expr: makeNumber(5),
      signature: [[x, 'x']],
      constants: [],
      printer,
      vectorize: true,
      broadcast: true,
    });
    expect(source.split('\n')).toEqual([
      'function _generated(x) {',
      '  x = np.asarray(x);',
      '  const _shape = np.broadcastShape(x);',
      '  return np.add(5, np.zeros(_shape));',
      '}',
    ]);
  });

  it('should detect constant expressions', () => {
    expect(isConstantExpression(makeNumber(5), new Map())).toBe(true);
    expect(isConstantExpression(makeMul(a, makeNumber(2)), new Map([[a, 1]]))).toBe(true);
    expect(isConstantExpression(expr, new Map([[a, 1]]))).toBe(false);
  });
});

describe('Codegen - Lowering', () => {
  it('should lower operands left to right', () => {
    const program = lowerProgram({ expr, signature, constants, vectorize: true, broadcast: false });
    expect(disassemble(program)).toEqual([
      'vectorize',
      'binding 0 a',
      'arg 1',
      'primitive multiply/2',
      'arg 0',
      'primitive add/2',
    ]);
  });

  it('should end with a broadcast for constant results', () => {
    const program = lowerProgram({
      expr: makeNumber(5),
      signature: [[x, 'x']],
      constants: [],
      vectorize: true,
      broadcast: true,
    });
    expect(disassemble(program)).toEqual(['vectorize', 'const 5', 'broadcast']);
  });
});

describe('Codegen - Artifacts', () => {
  const artifact = buildArtifact({
    expr,
    vars: normalizeVarSpec([x, y]),
    callSignature: signature,
    source: generateSource({ expr, signature, constants, printer, vectorize: true, broadcast: false }),
    vectorize: true,
    program: lowerProgram({ expr, signature, constants, vectorize: true, broadcast: false }),
    constantValues: [10],
    functions: new Map(),
  });

  it('should run the lowered program', () => {
    // 10 * 2 + 1
    expect(artifact.call([1, 2])).toBe(21);
    const result = artifact.call([[1, 2], 3]);
    expect(result instanceof NDArray && result.toArray()).toEqual([31, 32]);
  });

  it('should check the argument count', () => {
    expect(() => artifact.call([1])).toThrow('Compiled function takes 2 argument(s), got 1');
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(artifact)).toBe(true);
  });

  it('should wrap hand-written callables', () => {
    const wrapped = artifactFromCallable((u, v) => add(u, v), normalizeVarSpec([x, y]));
    expect(wrapped.source).toBeNull();
    expect(wrapped.callSignature).toEqual([[x, 'x'], [y, 'y']]);
    const result = wrapped.call([[1, 2], 10]);
    expect(result instanceof NDArray && result.toArray()).toEqual([11, 12]);
  });
});
