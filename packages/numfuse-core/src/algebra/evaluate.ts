/**
 * Direct tree-walking evaluation
 *
 * The reference semantics compiled functions are checked against.
 */

import type { Expr, SymbolExpr } from './expr.js';
import type { NumericCallable } from './functions.js';
import { type NumericValue, asarray } from '../ndarray/ndarray.js';
import { add, multiply, power, applyUfunc } from '../ndarray/ufuncs.js';

export function evaluate(
  expr: Expr,
  values: ReadonlyMap<SymbolExpr, NumericValue>,
  functions: ReadonlyMap<string, NumericCallable> = new Map()
): NumericValue {
  const num = expr.asNumber();
  if (num) {
    return num.value;
  }

  const sym = expr.asSymbol();
  if (sym) {
    const value = values.get(sym);
    if (value === undefined) {
      throw new Error(`No value for symbol ${sym.name}`);
    }
    return value;
  }

  const recur = (child: Expr): NumericValue => evaluate(child, values, functions);

  const sum = expr.asAdd();
  if (sum) {
    return add(...sum.terms.map(recur));
  }

  const product = expr.asMul();
  if (product) {
    return multiply(...product.factors.map(recur));
  }

  const pow = expr.asPow();
  if (pow) {
    return power(recur(pow.base), recur(pow.exponent));
  }

  const app = expr.asApply();
  if (app) {
    const args = app.args.map(recur);
    if (app.fn.ufunc) {
      return applyUfunc(app.fn.ufunc, args);
    }
    const callable = functions.get(app.fn.name) ?? app.fn.numeric;
    if (callable) {
      return asarray(callable(...args));
    }
    const expanded = app.fn.expand(app);
    if (expanded) {
      return recur(expanded);
    }
    throw new Error(`No numeric implementation for ${app.fn.name}`);
  }

  throw new Error(`Cannot evaluate expression: ${expr}`);
}
