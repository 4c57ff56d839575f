/**
 * Expression tree - immutable symbolic formulas
 *
 * Every node has a canonical structural key. Two trees with equal keys are the
 * same expression: sums and products are flattened, their numeric operands
 * folded and the remaining operands sorted by key, so `x + y` and `y + x`
 * build identical trees.
 */

import type { FunctionDef } from './functions.js';

/**
 * Symbol assumptions (e.g. `{ real: true }`), part of a symbol's identity
 */
export type Assumptions = Readonly<Record<string, boolean>>;

/**
 * Base class for all expression nodes
 */
export abstract class Expr {
  private cachedKey: string | null = null;

  /** Type predicates - return the specific node or null */
  asNumber(): NumberExpr | null { return null; }
  asSymbol(): SymbolExpr | null { return null; }
  asAdd(): AddExpr | null { return null; }
  asMul(): MulExpr | null { return null; }
  asPow(): PowExpr | null { return null; }
  asApply(): ApplyExpr | null { return null; }

  /** Direct sub-expressions, in order */
  abstract children(): readonly Expr[];

  /** Rebuild this node over new children (same count, same order) */
  abstract withChildren(children: readonly Expr[]): Expr;

  protected abstract computeKey(): string;

  /**
   * Canonical structural key
   */
  get key(): string {
    if (this.cachedKey === null) {
      this.cachedKey = this.computeKey();
    }
    return this.cachedKey;
  }

  equals(other: Expr): boolean {
    return this === other || this.key === other.key;
  }
}

/**
 * Numeric literal
 */
export class NumberExpr extends Expr {
  constructor(readonly value: number) {
    super();
  }

  asNumber(): NumberExpr { return this; }
  children(): readonly Expr[] { return []; }
  withChildren(): Expr { return this; }

  protected computeKey(): string {
    return `n(${Object.is(this.value, -0) ? 0 : this.value})`;
  }

  toString(): string {
    return String(this.value);
  }
}

/**
 * Symbol - interned, so symbols with equal identity are the same object
 */
export class SymbolExpr extends Expr {
  constructor(
    readonly name: string,
    readonly assumptions: Assumptions,
    readonly identity: string
  ) {
    super();
  }

  asSymbol(): SymbolExpr { return this; }
  children(): readonly Expr[] { return []; }
  withChildren(): Expr { return this; }

  protected computeKey(): string {
    return `s(${this.identity})`;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Sum of two or more terms
 */
export class AddExpr extends Expr {
  constructor(readonly terms: readonly Expr[]) {
    super();
  }

  asAdd(): AddExpr { return this; }
  children(): readonly Expr[] { return this.terms; }
  withChildren(children: readonly Expr[]): Expr { return makeAdd(...children); }

  protected computeKey(): string {
    return `add(${this.terms.map(t => t.key).join(',')})`;
  }

  toString(): string {
    return `(+ ${this.terms.join(' ')})`;
  }
}

/**
 * Product of two or more factors
 */
export class MulExpr extends Expr {
  constructor(readonly factors: readonly Expr[]) {
    super();
  }

  asMul(): MulExpr { return this; }
  children(): readonly Expr[] { return this.factors; }
  withChildren(children: readonly Expr[]): Expr { return makeMul(...children); }

  protected computeKey(): string {
    return `mul(${this.factors.map(f => f.key).join(',')})`;
  }

  toString(): string {
    return `(* ${this.factors.join(' ')})`;
  }
}

/**
 * Power `base ^ exponent`
 */
export class PowExpr extends Expr {
  constructor(
    readonly base: Expr,
    readonly exponent: Expr
  ) {
    super();
  }

  asPow(): PowExpr { return this; }
  children(): readonly Expr[] { return [this.base, this.exponent]; }
  withChildren(children: readonly Expr[]): Expr { return makePow(children[0], children[1]); }

  protected computeKey(): string {
    return `pow(${this.base.key},${this.exponent.key})`;
  }

  toString(): string {
    return `(^ ${this.base} ${this.exponent})`;
  }
}

/**
 * Function application `f(args...)`
 */
export class ApplyExpr extends Expr {
  constructor(
    readonly fn: FunctionDef,
    readonly args: readonly Expr[]
  ) {
    super();
  }

  asApply(): ApplyExpr { return this; }
  children(): readonly Expr[] { return this.args; }
  withChildren(children: readonly Expr[]): Expr { return makeApply(this.fn, children); }

  protected computeKey(): string {
    return `${this.fn.key}(${this.args.map(a => a.key).join(',')})`;
  }

  toString(): string {
    return `(${this.fn.name}${this.args.map(a => ` ${a}`).join('')})`;
  }
}

function compareExprs(a: Expr, b: Expr): number {
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

export function makeNumber(value: number): NumberExpr {
  return new NumberExpr(value);
}

/**
 * Symbol table for interning symbols
 * Symbols with the same name and assumptions are the same object (for === and Map keys)
 */
const symbolTable = new Map<string, SymbolExpr>();

function symbolIdentity(name: string, assumptions: Assumptions): string {
  const flags = Object.keys(assumptions)
    .sort()
    .map(k => (assumptions[k] ? k : `!${k}`));
  const quoted = JSON.stringify(name);
  return flags.length === 0 ? quoted : `${quoted}{${flags.join(',')}}`;
}

/**
 * Create or retrieve an interned symbol
 */
export function makeSymbol(name: string, assumptions: Assumptions = {}): SymbolExpr {
  const identity = symbolIdentity(name, assumptions);
  let sym = symbolTable.get(identity);
  if (!sym) {
    sym = new SymbolExpr(name, Object.freeze({ ...assumptions }), identity);
    symbolTable.set(identity, sym);
  }
  return sym;
}

/**
 * Create several symbols from a whitespace or comma separated list
 */
export function makeSymbols(names: string, assumptions: Assumptions = {}): SymbolExpr[] {
  return names
    .split(/[\s,]+/)
    .filter(n => n.length > 0)
    .map(n => makeSymbol(n, assumptions));
}

export function makeAdd(...terms: Expr[]): Expr {
  const rest: Expr[] = [];
  let constant = 0;

  for (const term of terms) {
    const parts = term.asAdd()?.terms ?? [term];
    for (const part of parts) {
      const num = part.asNumber();
      if (num) {
        constant += num.value;
      } else {
        rest.push(part);
      }
    }
  }

  if (constant !== 0 || rest.length === 0) {
    rest.push(makeNumber(constant));
  }
  if (rest.length === 1) {
    return rest[0];
  }
  return new AddExpr(rest.sort(compareExprs));
}

export function makeMul(...factors: Expr[]): Expr {
  const rest: Expr[] = [];
  let coefficient = 1;

  for (const factor of factors) {
    const parts = factor.asMul()?.factors ?? [factor];
    for (const part of parts) {
      const num = part.asNumber();
      if (num) {
        coefficient *= num.value;
      } else {
        rest.push(part);
      }
    }
  }

  if (coefficient === 0) {
    return makeNumber(0);
  }
  if (coefficient !== 1 || rest.length === 0) {
    rest.push(makeNumber(coefficient));
  }
  if (rest.length === 1) {
    return rest[0];
  }
  return new MulExpr(rest.sort(compareExprs));
}

export function makePow(base: Expr, exponent: Expr): Expr {
  const exp = exponent.asNumber();
  if (exp && exp.value === 0) {
    return makeNumber(1);
  }
  if (exp && exp.value === 1) {
    return base;
  }
  const num = base.asNumber();
  if (num && exp) {
    return makeNumber(Math.pow(num.value, exp.value));
  }
  return new PowExpr(base, exponent);
}

export function makeNeg(expr: Expr): Expr {
  return makeMul(makeNumber(-1), expr);
}

export function makeSub(a: Expr, b: Expr): Expr {
  return makeAdd(a, makeNeg(b));
}

export function makeDiv(a: Expr, b: Expr): Expr {
  return makeMul(a, makePow(b, makeNumber(-1)));
}

export function makeApply(fn: FunctionDef, args: readonly Expr[]): ApplyExpr {
  if (fn.arity !== undefined && args.length !== fn.arity) {
    throw new Error(`${fn.name} requires exactly ${fn.arity} argument(s), got ${args.length}`);
  }
  return new ApplyExpr(fn, [...args]);
}

/**
 * Accept a number wherever an expression is expected
 */
export function toExpr(value: Expr | number): Expr {
  return typeof value === 'number' ? makeNumber(value) : value;
}
