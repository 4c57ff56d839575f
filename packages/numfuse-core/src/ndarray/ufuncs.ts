/**
 * Element-wise maths over numeric values
 *
 * Each ufunc pairs a scalar kernel with its arity; applyUfunc lifts the kernel
 * over arrays with broadcasting.
 */

import { type NumericValue, map, zipWith } from './ndarray.js';

export interface Ufunc {
  readonly name: string;
  readonly arity: number;
  readonly scalar: (...args: number[]) => number;
}

function unary(name: string, scalar: (x: number) => number): Ufunc {
  return { name, arity: 1, scalar };
}

function binary(name: string, scalar: (x: number, y: number) => number): Ufunc {
  return { name, arity: 2, scalar };
}

/**
 * Builtin maths functions, by the name expressions use for them
 */
export const ufuncs: Readonly<Record<string, Ufunc>> = {
  sin: unary('sin', Math.sin),
  cos: unary('cos', Math.cos),
  tan: unary('tan', Math.tan),
  asin: unary('asin', Math.asin),
  acos: unary('acos', Math.acos),
  atan: unary('atan', Math.atan),
  sinh: unary('sinh', Math.sinh),
  cosh: unary('cosh', Math.cosh),
  tanh: unary('tanh', Math.tanh),
  asinh: unary('asinh', Math.asinh),
  acosh: unary('acosh', Math.acosh),
  atanh: unary('atanh', Math.atanh),
  exp: unary('exp', Math.exp),
  log: unary('log', Math.log),
  log2: unary('log2', Math.log2),
  log10: unary('log10', Math.log10),
  sqrt: unary('sqrt', Math.sqrt),
  cbrt: unary('cbrt', Math.cbrt),
  abs: unary('abs', Math.abs),
  sign: unary('sign', Math.sign),
  floor: unary('floor', Math.floor),
  ceil: unary('ceil', Math.ceil),
  atan2: binary('atan2', Math.atan2),
  hypot: binary('hypot', (x, y) => Math.hypot(x, y)),
  minimum: binary('minimum', (x, y) => Math.min(x, y)),
  maximum: binary('maximum', (x, y) => Math.max(x, y)),
};

export function lookupUfunc(name: string): Ufunc | null {
  return Object.hasOwn(ufuncs, name) ? ufuncs[name] : null;
}

export function applyUfunc(ufunc: Ufunc, args: readonly NumericValue[]): NumericValue {
  if (args.length !== ufunc.arity) {
    throw new Error(`${ufunc.name} requires exactly ${ufunc.arity} argument(s), got ${args.length}`);
  }
  if (ufunc.arity === 1) {
    return map(args[0], x => ufunc.scalar(x));
  }
  return zipWith(args[0], args[1], (x, y) => ufunc.scalar(x, y));
}

export function add(...terms: NumericValue[]): NumericValue {
  let acc: NumericValue = 0;
  for (const term of terms) {
    acc = zipWith(acc, term, (x, y) => x + y);
  }
  return acc;
}

export function multiply(...factors: NumericValue[]): NumericValue {
  let acc: NumericValue = 1;
  for (const factor of factors) {
    acc = zipWith(acc, factor, (x, y) => x * y);
  }
  return acc;
}

export function subtract(a: NumericValue, b: NumericValue): NumericValue {
  return zipWith(a, b, (x, y) => x - y);
}

export function divide(a: NumericValue, b: NumericValue): NumericValue {
  return zipWith(a, b, (x, y) => x / y);
}

export function power(base: NumericValue, exponent: NumericValue): NumericValue {
  return zipWith(base, exponent, (x, y) => Math.pow(x, y));
}

export function negative(value: NumericValue): NumericValue {
  return map(value, x => -x);
}
