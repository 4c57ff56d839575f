/**
 * Compile-time checks
 *
 * Each check collects every offending name before throwing, so one failed
 * compile reports all problems of its kind.
 */

import type { Expr, SymbolExpr } from '../algebra/expr.js';
import type { NumericCallable } from '../algebra/functions.js';
import { applications, freeSymbols } from '../algebra/rewrite.js';
import type { NumericValue } from '../ndarray/ndarray.js';
import { UnboundSymbolError, OverlappingBindingError, UnboundFunctionError } from './errors.js';
import type { NumericPrinter } from './printer.js';
import type { VarSpec } from './var-spec.js';

function sortedNames(symbols: Iterable<SymbolExpr>): string[] {
  return Array.from(new Set(Array.from(symbols, s => s.name))).sort();
}

/**
 * Every free symbol must be a variable or have a constant binding
 */
export function checkUnboundSymbols(
  expr: Expr,
  vars: VarSpec,
  constants: ReadonlyMap<SymbolExpr, NumericValue>
): void {
  const unbound = freeSymbols(expr).filter(s => !vars.has(s) && !constants.has(s));
  if (unbound.length > 0) {
    throw new UnboundSymbolError(sortedNames(unbound), vars.all.map(s => s.name));
  }
}

/**
 * No symbol may be both a variable and a constant binding
 */
export function checkOverlap(vars: VarSpec, constants: ReadonlyMap<SymbolExpr, NumericValue>): void {
  const overlap = vars.all.filter(s => constants.has(s));
  if (overlap.length > 0) {
    throw new OverlappingBindingError(sortedNames(overlap));
  }
}

/**
 * Every application that prints as a bare call needs a bound callable
 *
 * @param printer - configured to pass unknown functions through
 */
export function requireBoundFunctions(
  expr: Expr,
  printer: NumericPrinter,
  functions: ReadonlyMap<string, NumericCallable>
): void {
  const missing = new Set<string>();

  for (const app of applications(expr)) {
    const name = app.fn.name;
    const code = printer.doprint(app).trim();
    if (code.startsWith(`${name}(`) && !functions.has(name)) {
      missing.add(name);
    }
  }

  if (missing.size > 0) {
    throw new UnboundFunctionError(Array.from(missing).sort());
  }
}
