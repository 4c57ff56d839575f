/**
 * Numeric operations over compiled functions
 */

import { type Expr, type SymbolExpr, toExpr } from '../algebra/expr.js';
import { freeSymbols } from '../algebra/rewrite.js';
import { type NumericValue, formatShape } from '../ndarray/ndarray.js';
import { ExpressionCompiler } from './compiler.js';
import { type FreezeInput, NumericFunction } from './numeric-function.js';

export type Integrand = NumericFunction | Expr | number | ((t: number) => number);

export interface IntegrandOptions {
  /** Variable of a symbolic integrand */
  variable?: SymbolExpr;
  /** Values for the remaining variables of a symbolic or compiled integrand */
  freeze?: FreezeInput;
  /** Compiler for symbolic integrands; a fresh one by default */
  compiler?: ExpressionCompiler;
}

export interface IntegrateOptions extends IntegrandOptions {
  /** Absolute error tolerance (default 1e-10) */
  tolerance?: number;
  /** Maximum bisection depth (default 50) */
  maxDepth?: number;
  /** Maximum number of integrand evaluations (default 200000) */
  maxEvaluations?: number;
}

export interface FourierOptions extends IntegrandOptions {
  /** Number of sample points over one period (default 4000) */
  samples?: number;
}

export interface FourierCoefficients {
  cos: number[];
  sin: number[];
}

function scalarOf(value: NumericValue): number {
  if (typeof value === 'number') {
    return value;
  }
  if (value.size !== 1) {
    throw new Error(`Integrand must return a scalar, got shape ${formatShape(value.shape)}`);
  }
  return value.data[0];
}

function toIntegrand(target: Integrand, options: IntegrandOptions, caller: string): (t: number) => number {
  if (typeof target === 'function') {
    if (options.freeze) {
      throw new Error('freeze is only supported for symbolic and compiled integrands');
    }
    return target;
  }

  let fn: NumericFunction;
  if (target instanceof NumericFunction) {
    fn = target;
  } else {
    const expr = toExpr(target);
    const variable = options.variable;
    if (!variable) {
      throw new Error(`${caller} needs a variable for symbolic integrands`);
    }
    const others = freeSymbols(expr)
      .filter(s => s !== variable)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    const compiler = options.compiler ?? new ExpressionCompiler();
    fn = compiler.compile(expr, { vars: [variable, ...others] });
  }

  if (options.freeze) {
    fn = fn.freeze(options.freeze);
  }

  const free = fn.freeVars;
  if (free.length !== 1) {
    throw new Error(
      `${caller} needs exactly one free variable, got ${free.length}` +
        (free.length > 0 ? `: ${free.map(s => s.name).join(', ')}` : '')
    );
  }

  const compiled = fn;
  const slot = compiled.varSpec.slotOf(free[0]);
  if (slot?.kind === 'named') {
    const name = slot.name;
    return t => scalarOf(compiled.invoke([], { [name]: t }));
  }
  return t => scalarOf(compiled.invoke([t]));
}

function simpson(a: number, b: number, fa: number, fm: number, fb: number): number {
  return ((b - a) / 6) * (fa + 4 * fm + fb);
}

/**
 * Integrand wrapper that counts evaluations and rejects non-finite values
 */
class Sampler {
  count = 0;

  constructor(
    private readonly f: (t: number) => number,
    private readonly limit: number
  ) {}

  at(t: number): number {
    if (++this.count > this.limit) {
      throw new Error(`nintegrate exceeded ${this.limit} integrand evaluations`);
    }
    const value = this.f(t);
    if (!Number.isFinite(value)) {
      throw new Error(`Integrand is not finite at ${t}: ${value}`);
    }
    return value;
  }
}

function adaptive(
  f: Sampler,
  a: number,
  b: number,
  fa: number,
  fm: number,
  fb: number,
  whole: number,
  tolerance: number,
  depth: number
): number {
  const m = (a + b) / 2;
  const flm = f.at((a + m) / 2);
  const frm = f.at((m + b) / 2);
  const left = simpson(a, m, fa, flm, fm);
  const right = simpson(m, b, fm, frm, fb);
  const delta = left + right - whole;
  if (!Number.isFinite(delta)) {
    throw new Error(`Quadrature diverged on [${a}, ${b}]`);
  }

  if (depth <= 0 || Math.abs(delta) <= 15 * tolerance) {
    return left + right + delta / 15;
  }
  return (
    adaptive(f, a, m, fa, flm, fm, left, tolerance / 2, depth - 1) +
    adaptive(f, m, b, fm, frm, fb, right, tolerance / 2, depth - 1)
  );
}

/**
 * Map an integral with infinite limits onto a finite interval.
 * The transformed integrand is taken as 0 at an infinite endpoint.
 */
function finiteForm(f: (t: number) => number, a: number, b: number): [(u: number) => number, number, number] {
  if (a === -Infinity && b === Infinity) {
    // t = u / (1 - u^2)
    const g = (u: number): number => {
      if (Math.abs(u) >= 1) return 0;
      const w = 1 - u * u;
      return (f(u / w) * (1 + u * u)) / (w * w);
    };
    return [g, -1, 1];
  }
  if (b === Infinity) {
    // t = a + u / (1 - u)
    const g = (u: number): number => {
      if (u >= 1) return 0;
      const w = 1 - u;
      return f(a + u / w) / (w * w);
    };
    return [g, 0, 1];
  }
  if (a === -Infinity) {
    // t = b - (1 - u) / u
    const g = (u: number): number => {
      if (u <= 0) return 0;
      return f(b - (1 - u) / u) / (u * u);
    };
    return [g, 0, 1];
  }
  return [f, a, b];
}

function integrate(f: (t: number) => number, a: number, b: number, options: IntegrateOptions): number {
  if (a === b) {
    return 0;
  }
  if (a > b) {
    return -integrate(f, b, a, options);
  }

  const [g, lo, hi] = finiteForm(f, a, b);
  const sampler = new Sampler(g, options.maxEvaluations ?? 200_000);
  const fa = sampler.at(lo);
  const fb = sampler.at(hi);
  const fm = sampler.at((lo + hi) / 2);
  const tolerance = options.tolerance ?? 1e-10;
  return adaptive(sampler, lo, hi, fa, fm, fb, simpson(lo, hi, fa, fm, fb), tolerance, options.maxDepth ?? 50);
}

/**
 * Definite integral over [a, b] by adaptive Simpson quadrature; either limit
 * may be infinite
 *
 * @example
 * nintegrate(makePow(x, makeNumber(2)), [0, 1], { variable: x }); // 0.3333...
 */
export function nintegrate(
  target: Integrand,
  limits: readonly [number, number],
  options: IntegrateOptions = {}
): number {
  const [a, b] = limits;
  if (Number.isNaN(a) || Number.isNaN(b)) {
    throw new Error(`Integration limits must be numbers, got [${a}, ${b}]`);
  }
  return integrate(toIntegrand(target, options, 'nintegrate'), a, b, options);
}

/**
 * Real Fourier coefficients of one period [a, b], from a discrete Fourier
 * transform of `samples` equally spaced points
 *
 * Coefficients are taken against the orthonormal basis 1/sqrt(L),
 * sqrt(2/L) cos(2 pi k t / L) and sqrt(2/L) sin(2 pi k t / L), L = b - a,
 * for k = 0 .. floor(samples / 2). sin[0] is always 0.
 */
export function nrealFourierSeries(
  target: Integrand,
  limits: readonly [number, number],
  options: FourierOptions = {}
): FourierCoefficients {
  const samples = options.samples ?? 4000;
  if (!Number.isInteger(samples) || samples < 2) {
    throw new Error(`samples must be an integer >= 2, got ${samples}`);
  }
  const [a, b] = limits;
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    throw new Error(`Fourier series limits must be finite, got [${a}, ${b}]`);
  }
  const length = b - a;
  if (length <= 0) {
    throw new Error(`nrealFourierSeries expects b > a, got [${a}, ${b}]`);
  }

  const f = toIntegrand(target, options, 'nrealFourierSeries');
  const values = Array.from({ length: samples }, (_, n) => f(a + (length * n) / samples));

  const scale = length / samples / Math.sqrt(length);
  const modes = Math.floor(samples / 2) + 1;
  const cos: number[] = [];
  const sin: number[] = [];
  for (let k = 0; k < modes; k++) {
    let re = 0;
    let im = 0;
    for (let n = 0; n < samples; n++) {
      const angle = (2 * Math.PI * k * n) / samples;
      re += values[n] * Math.cos(angle);
      im -= values[n] * Math.sin(angle);
    }
    // shift the grid origin from a back to 0
    const phase = (2 * Math.PI * k * a) / length;
    const cr = scale * (re * Math.cos(phase) + im * Math.sin(phase));
    const ci = scale * (im * Math.cos(phase) - re * Math.sin(phase));
    if (k === 0) {
      cos.push(cr);
      sin.push(0);
    } else {
      cos.push(Math.SQRT2 * cr);
      sin.push(-Math.SQRT2 * ci);
    }
  }
  return { cos, sin };
}
