/**
 * Function definitions
 *
 * A FunctionDef is a named function class that expressions apply. Besides its
 * name it may carry:
 * - a fixed arity,
 * - a symbolic definition, used to expand applications before compilation
 *   (returning null keeps the function opaque),
 * - a numeric implementation, which the compiler binds automatically.
 *
 * Builtin maths functions (sin, exp, ...) are shared instances backed by the
 * ufunc table.
 */

import { type Expr, type ApplyExpr, makeApply, toExpr } from './expr.js';
import type { NumericInput, NumericValue } from '../ndarray/ndarray.js';
import { type Ufunc, ufuncs } from '../ndarray/ufuncs.js';

/**
 * Numeric implementation of a function, called with array values
 */
export type NumericCallable = (...args: NumericValue[]) => NumericInput;

/**
 * Symbolic definition: maps argument expressions to the expanded expression
 */
export type SymbolicDefinition = (...args: Expr[]) => Expr | null;

export interface FunctionOptions {
  arity?: number;
  definition?: SymbolicDefinition;
  numeric?: NumericCallable;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

let nextFunctionId = 0;

export class FunctionDef {
  readonly id: number;
  readonly arity: number | undefined;
  readonly definition: SymbolicDefinition | undefined;
  readonly numeric: NumericCallable | undefined;

  constructor(
    readonly name: string,
    options: FunctionOptions = {},
    readonly ufunc: Ufunc | null = null
  ) {
    this.id = nextFunctionId++;
    this.arity = options.arity;
    this.definition = options.definition;
    this.numeric = options.numeric;
  }

  /**
   * Identity key - distinct definitions never share one, even with equal names
   */
  get key(): string {
    return `${this.name}#${this.id}`;
  }

  get builtin(): boolean {
    return this.ufunc !== null;
  }

  apply(...args: (Expr | number)[]): ApplyExpr {
    return makeApply(this, args.map(toExpr));
  }

  /**
   * Expand one application through the symbolic definition
   *
   * @returns The expansion, or null when the function is opaque here
   */
  expand(application: ApplyExpr): Expr | null {
    if (!this.definition) {
      return null;
    }
    const expanded = this.definition(...application.args);
    if (expanded === null || expanded.equals(application)) {
      return null;
    }
    return expanded;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Define a custom function
 *
 * @example
 * const sq = defineFunction('sq', { arity: 1, definition: u => makePow(u, makeNumber(2)) });
 * const G = defineFunction('G', { arity: 1, numeric: v => v });
 */
export function defineFunction(name: string, options: FunctionOptions = {}): FunctionDef {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Function name must be a valid identifier: ${JSON.stringify(name)}`);
  }
  if (options.arity !== undefined && (!Number.isInteger(options.arity) || options.arity < 0)) {
    throw new Error(`Function arity must be a non-negative integer, got ${options.arity}`);
  }
  if (Object.hasOwn(ufuncs, name)) {
    throw new Error(`Function name ${name} is reserved for a builtin`);
  }
  return new FunctionDef(name, options);
}

const builtinTable = new Map<string, FunctionDef>(
  Object.values(ufuncs).map(u => [u.name, new FunctionDef(u.name, { arity: u.arity }, u)])
);

/**
 * Builtin function by name, or null
 */
export function builtinFunction(name: string): FunctionDef | null {
  return builtinTable.get(name) ?? null;
}

export function builtinFunctions(): FunctionDef[] {
  return Array.from(builtinTable.values());
}

/**
 * Builtin function by name; throws for unknown names
 */
export function builtin(name: string): FunctionDef {
  const fn = builtinTable.get(name);
  if (!fn) {
    throw new Error(`Unknown builtin function: ${name}`);
  }
  return fn;
}
