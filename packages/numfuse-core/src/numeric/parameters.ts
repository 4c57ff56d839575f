/**
 * Parameter store
 *
 * A mutable ParameterContext for dynamic variables. Values are looked up by
 * symbol, falling back to the symbol's display name, so a value set under
 * 'omega' serves every symbol named omega that has no value of its own.
 */

import type { SymbolExpr } from '../algebra/expr.js';
import { type NumericValue, toNumericValue } from '../ndarray/ndarray.js';
import { InvalidBindingError } from './errors.js';
import type { ParameterContext } from './numeric-function.js';

export type ParameterKey = SymbolExpr | string;

export class ParameterStore implements ParameterContext {
  private readonly bySymbol = new Map<SymbolExpr, NumericValue>();
  private readonly byName = new Map<string, NumericValue>();

  constructor(initial: Iterable<readonly [ParameterKey, unknown]> = []) {
    for (const [key, value] of initial) {
      this.set(key, value);
    }
  }

  set(key: ParameterKey, value: unknown): this {
    const numeric = toNumericValue(value);
    if (numeric === null) {
      const name = typeof key === 'string' ? key : key.name;
      throw new InvalidBindingError(`Parameter ${name} must be numeric`);
    }
    if (typeof key === 'string') {
      this.byName.set(key, numeric);
    } else {
      this.bySymbol.set(key, numeric);
    }
    return this;
  }

  get(key: ParameterKey): NumericValue | undefined {
    if (typeof key === 'string') {
      return this.byName.get(key);
    }
    return this.bySymbol.get(key) ?? this.byName.get(key.name);
  }

  has(key: ParameterKey): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: ParameterKey): boolean {
    return typeof key === 'string' ? this.byName.delete(key) : this.bySymbol.delete(key);
  }

  get size(): number {
    return this.bySymbol.size + this.byName.size;
  }

  /**
   * Current values keyed by display name; symbol entries win over name entries
   */
  snapshot(): Record<string, NumericValue> {
    const result: Record<string, NumericValue> = Object.fromEntries(this.byName);
    for (const [sym, value] of this.bySymbol) {
      result[sym.name] = value;
    }
    return result;
  }
}
