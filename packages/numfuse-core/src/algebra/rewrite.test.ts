/**
 * Rewriting tests - traversal, substitution and definition expansion
 */

import { describe, it, expect } from 'vitest';
import { makeNumber, makeSymbol, makeAdd, makeMul, makePow } from './expr.js';
import { type FunctionDef, defineFunction, builtin } from './functions.js';
import { freeSymbols, applications, transform, substitute, expandDefinitionOnce, expandDefinitions } from './rewrite.js';

const x = makeSymbol('x');
const y = makeSymbol('y');

describe('Rewrite - Traversal', () => {
  it('should list free symbols once in depth-first order', () => {
    expect(freeSymbols(makeAdd(y, makeMul(x, y)))).toEqual([x, y]);
    expect(freeSymbols(makeNumber(3))).toEqual([]);
  });

  it('should list distinct applications outermost first', () => {
    const sin = builtin('sin');
    const cos = builtin('cos');
    const inner = cos.apply(x);
    const outer = sin.apply(inner);
    expect(applications(makeMul(outer, inner)).map(a => a.toString())).toEqual(['(cos x)', '(sin (cos x))']);
    expect(applications(outer).map(a => a.toString())).toEqual(['(sin (cos x))', '(cos x)']);
  });

  it('should return the same tree when nothing changes', () => {
    const expr = makeAdd(x, makeMul(makeNumber(2), y));
    expect(transform(expr, node => node)).toBe(expr);
  });

  it('should substitute symbols', () => {
    expect(substitute(makeAdd(x, y), new Map([[x, makeNumber(2)]])).toString()).toBe('(+ 2 y)');
    const expr = makeAdd(x, y);
    expect(substitute(expr, new Map())).toBe(expr);
  });
});

describe('Rewrite - Definitions', () => {
  const sq = defineFunction('sq', { arity: 1, definition: u => makePow(u, makeNumber(2)) });

  it('should expand one level per pass', () => {
    const quad = defineFunction('quad', { arity: 1, definition: u => sq.apply(sq.apply(u)) });
    expect(expandDefinitionOnce(quad.apply(x)).toString()).toBe('(sq (sq x))');
    expect(expandDefinitions(quad.apply(x)).toString()).toBe('(^ (^ x 2) 2)');
  });

  it('should expand inside larger trees', () => {
    expect(expandDefinitions(makeAdd(sq.apply(makeAdd(x, makeNumber(1))), y)).toString()).toBe('(+ (^ (+ 1 x) 2) y)');
  });

  it('should leave opaque functions alone', () => {
    const G = defineFunction('G', { arity: 1, definition: () => null });
    const expr = G.apply(x);
    expect(expandDefinitions(expr)).toBe(expr);
  });

  it('should stop a self-referential definition at the pass budget', () => {
    const step: FunctionDef = defineFunction('step', {
      arity: 1,
      definition: u => step.apply(makeAdd(u, makeNumber(1))),
    });
    expect(expandDefinitions(step.apply(x), 3).toString()).toBe('(step (+ 3 x))');
  });

  it('should not mutate its input', () => {
    const expr = sq.apply(x);
    const before = expr.key;
    expandDefinitions(expr);
    expect(expr.key).toBe(before);
  });
});
