/**
 * Binding resolution
 *
 * Splits a bindings map into constant values for symbols and callables for
 * functions, then auto-binds functions whose definition carries a numeric
 * implementation. Explicit bindings win over auto-discovered ones.
 */

import { type Expr, ApplyExpr, SymbolExpr } from '../algebra/expr.js';
import { FunctionDef, type NumericCallable } from '../algebra/functions.js';
import { applications } from '../algebra/rewrite.js';
import { type NumericValue, toNumericValue } from '../ndarray/ndarray.js';
import { InvalidBindingError } from './errors.js';

/**
 * What a binding can be keyed by: a symbol (constant), or a function
 * definition or one of its applications (callable)
 */
export type BindingKey = Expr | FunctionDef;

export type BindingsInput = ReadonlyMap<BindingKey, unknown>;

export interface ResolvedBindings {
  readonly symbols: ReadonlyMap<SymbolExpr, NumericValue>;
  readonly functions: ReadonlyMap<string, NumericCallable>;
}

export function isCallable(value: unknown): value is NumericCallable {
  return typeof value === 'function';
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Function definition a binding key stands for, or null for other keys
 */
export function functionOfKey(key: BindingKey): FunctionDef | null {
  if (key instanceof FunctionDef) return key;
  if (key instanceof ApplyExpr) return key.fn;
  return null;
}

/**
 * Callables are looked up by function name at run time, so one compile may
 * not mix distinct definitions that share a name.
 */
export function resolveBindings(expr: Expr, bindings: BindingsInput = new Map()): ResolvedBindings {
  const symbols = new Map<SymbolExpr, NumericValue>();
  const functions = new Map<string, NumericCallable>();
  const named = new Map<string, FunctionDef>();

  const claim = (fn: FunctionDef): void => {
    const seen = named.get(fn.name);
    if (seen && seen !== fn) {
      throw new InvalidBindingError(`Distinct functions share the name ${fn.name}; give each definition its own name`);
    }
    named.set(fn.name, fn);
  };

  for (const app of applications(expr)) {
    claim(app.fn);
  }

  for (const [key, value] of bindings) {
    if (key instanceof SymbolExpr) {
      const numeric = toNumericValue(value);
      if (numeric === null) {
        throw new InvalidBindingError(`Binding for symbol ${key.name} must be numeric, got ${describeValue(value)}`);
      }
      symbols.set(key, numeric);
      continue;
    }

    const fn = functionOfKey(key);
    if (fn) {
      if (!isCallable(value)) {
        throw new InvalidBindingError(`Function binding for ${fn.name} must be callable, got ${describeValue(value)}`);
      }
      claim(fn);
      functions.set(fn.name, value);
      continue;
    }

    throw new InvalidBindingError(
      `Binding keys must be symbols, function definitions or function applications; got ${String(key)}`
    );
  }

  for (const app of applications(expr)) {
    const { name, numeric } = app.fn;
    if (!app.fn.builtin && numeric && !functions.has(name)) {
      functions.set(name, numeric);
    }
  }

  return { symbols, functions };
}
