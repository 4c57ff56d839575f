/**
 * NumericFunction - calling convention over a compiled artifact
 *
 * Every declared variable is in one of three states:
 *
 *   free      supplied by the caller (by position, or by name for named slots)
 *   frozen    a value captured by freeze()
 *   dynamic   read from the attached parameter context on every call
 *
 * freeze(), unfreeze() and the context setters return new wrappers over the
 * same artifact; nothing here recompiles.
 *
 * @example
 * const f = compiler.compile(makeMul(a, x), { vars: [x, a] });
 * f.call(3, 4);                        // 12
 * const g = f.freeze({ a: 2 });
 * g.call(3);                           // 6
 * g.unfreeze(a).call(3, 4);            // 12
 */

import type { Expr, SymbolExpr } from '../algebra/expr.js';
import type { NumericCallable } from '../algebra/functions.js';
import { type NumericInput, type NumericValue, NDArray, toNumericValue } from '../ndarray/ndarray.js';
import { type CompiledArtifact, artifactFromCallable } from './codegen.js';
import {
  CallArityMismatchError,
  InvalidBindingError,
  MissingContextSymbolError,
  MissingDynamicContextError,
} from './errors.js';
import type { CallSignature } from './identifiers.js';
import { type VarSpec, type VarSpecInput, normalizeVarSpec } from './var-spec.js';

/** Freeze marker: resolve the variable from the parameter context at call time */
export const DYNAMIC_PARAMETER: unique symbol = Symbol('DYNAMIC_PARAMETER');

/** Freeze marker: make the variable free again */
export const UNFREEZE: unique symbol = Symbol('UNFREEZE');

export type VariableState =
  | { readonly kind: 'free' }
  | { readonly kind: 'frozen'; readonly value: NumericValue }
  | { readonly kind: 'dynamic' };

export type FreezeValue = NumericInput | typeof DYNAMIC_PARAMETER | typeof UNFREEZE;

/**
 * Values to freeze, keyed by symbol, or by slot name or display name
 */
export type FreezeInput = ReadonlyMap<SymbolExpr, FreezeValue> | { readonly [name: string]: FreezeValue };

/**
 * Externally owned source of values for dynamic variables
 */
export interface ParameterContext {
  get(symbol: SymbolExpr): NumericInput | undefined;
}

export type KeywordArguments = { readonly [name: string]: NumericInput };

export type CallArgument = NumericInput | KeywordArguments;

const FREE: VariableState = Object.freeze({ kind: 'free' });
const DYNAMIC: VariableState = Object.freeze({ kind: 'dynamic' });

function isKeywordArguments(value: CallArgument): value is KeywordArguments {
  return (
    typeof value === 'object' &&
    !Array.isArray(value) &&
    !(value instanceof NDArray) &&
    !(value instanceof Float64Array)
  );
}

function isFreezeMap(values: FreezeInput): values is ReadonlyMap<SymbolExpr, FreezeValue> {
  return values instanceof Map;
}

export class NumericFunction {
  private readonly stateMap: ReadonlyMap<SymbolExpr, VariableState>;

  constructor(
    readonly artifact: CompiledArtifact,
    states?: ReadonlyMap<SymbolExpr, VariableState>,
    private readonly context: ParameterContext | null = null
  ) {
    this.stateMap = new Map(artifact.vars.all.map(sym => [sym, states?.get(sym) ?? FREE] as const));
  }

  /**
   * Wrap a hand-written callable taking one argument per variable
   */
  static fromCallable(fn: NumericCallable, vars: VarSpecInput | VarSpec): NumericFunction {
    return new NumericFunction(artifactFromCallable(fn, normalizeVarSpec(vars)));
  }

  get varSpec(): VarSpec {
    return this.artifact.vars;
  }

  get vars(): readonly SymbolExpr[] {
    return this.artifact.vars.all;
  }

  get varNames(): string[] {
    return this.vars.map(s => s.name);
  }

  get symbolic(): Expr | null {
    return this.artifact.expr;
  }

  get source(): string | null {
    return this.artifact.source;
  }

  get callSignature(): CallSignature {
    return this.artifact.callSignature;
  }

  get states(): ReadonlyMap<SymbolExpr, VariableState> {
    return this.stateMap;
  }

  get parameterContext(): ParameterContext | null {
    return this.context;
  }

  get freeVars(): SymbolExpr[] {
    return this.vars.filter(s => this.stateOf(s).kind === 'free');
  }

  get freeVarSignature(): CallSignature {
    return this.callSignature.filter(([s]) => this.stateOf(s).kind === 'free');
  }

  /**
   * Free parameters as a call would take them, e.g. `(x, { scale })`
   */
  get signature(): string {
    const positional: string[] = [];
    const named: string[] = [];
    for (const [sym, id] of this.freeVarSignature) {
      const slot = this.varSpec.slotOf(sym);
      if (slot?.kind === 'named') {
        named.push(slot.name);
      } else {
        positional.push(id);
      }
    }
    if (named.length > 0) {
      positional.push(`{ ${named.join(', ')} }`);
    }
    return `(${positional.join(', ')})`;
  }

  stateOf(symbol: SymbolExpr): VariableState {
    const state = this.stateMap.get(symbol);
    if (!state) {
      throw new InvalidBindingError(`${symbol.name} is not a variable of this function`);
    }
    return state;
  }

  /**
   * Freeze variables to values, mark them dynamic, or free them again
   *
   * Record keys match a named slot first, then a variable's display name.
   */
  freeze(values: FreezeInput): NumericFunction {
    const states = new Map(this.stateMap);
    const entries: [SymbolExpr, FreezeValue][] = isFreezeMap(values)
      ? Array.from(values, ([sym, value]) => [this.requireVariable(sym), value])
      : Object.entries(values).map(([name, value]) => [this.resolveName(name), value]);

    for (const [sym, value] of entries) {
      if (value === UNFREEZE) {
        states.set(sym, FREE);
      } else if (value === DYNAMIC_PARAMETER) {
        states.set(sym, DYNAMIC);
      } else {
        const numeric = toNumericValue(value);
        if (numeric === null) {
          throw new InvalidBindingError(`Frozen value for ${sym.name} must be numeric`);
        }
        states.set(sym, Object.freeze({ kind: 'frozen', value: numeric }));
      }
    }

    return new NumericFunction(this.artifact, states, this.context);
  }

  /**
   * Free the given variables, or every non-free variable when none are given
   */
  unfreeze(...targets: (SymbolExpr | string)[]): NumericFunction {
    const states = new Map(this.stateMap);
    const symbols =
      targets.length === 0
        ? this.vars.filter(s => this.stateOf(s).kind !== 'free')
        : targets.map(t => (typeof t === 'string' ? this.resolveName(t) : this.requireVariable(t)));

    for (const sym of symbols) {
      states.set(sym, FREE);
    }
    return new NumericFunction(this.artifact, states, this.context);
  }

  /**
   * Attach the context dynamic variables read from; held by reference
   */
  setParameterContext(context: ParameterContext): NumericFunction {
    return new NumericFunction(this.artifact, this.stateMap, context);
  }

  removeParameterContext(): NumericFunction {
    return new NumericFunction(this.artifact, this.stateMap, null);
  }

  /**
   * Variable name for messages, with its identifier when another variable
   * shares the name
   */
  private displayName(symbol: SymbolExpr, id: string): string {
    const shared = this.vars.filter(s => s.name === symbol.name).length > 1;
    return shared ? `${symbol.name} (${id})` : symbol.name;
  }

  /**
   * Call with positional arguments; a trailing plain object holds keyed
   * arguments for named slots
   */
  call(...args: CallArgument[]): NumericValue {
    const positional: NumericInput[] = [];
    let keyed: KeywordArguments = {};

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (isKeywordArguments(arg)) {
        if (i !== args.length - 1) {
          throw new CallArityMismatchError('Keyed arguments must be passed last', [], []);
        }
        keyed = arg;
      } else {
        positional.push(arg);
      }
    }

    return this.invoke(positional, keyed);
  }

  invoke(positional: readonly NumericInput[], keyed: KeywordArguments = {}): NumericValue {
    const dynamic = this.vars.filter(s => this.stateOf(s).kind === 'dynamic');
    if (dynamic.length > 0 && !this.context) {
      throw new MissingDynamicContextError(dynamic.map(s => s.name));
    }

    const args: NumericInput[] = [];
    const missing: string[] = [];
    const missingKeyed: string[] = [];
    const usedKeys = new Set<string>();
    let next = 0;

    for (const [sym, id] of this.callSignature) {
      const state = this.stateOf(sym);
      const slot = this.varSpec.slotOf(sym);

      if (state.kind === 'frozen') {
        args.push(state.value);
      } else if (state.kind === 'dynamic') {
        const value = this.context?.get(sym);
        if (value === undefined) {
          throw new MissingContextSymbolError(sym.name);
        }
        args.push(value);
      } else if (slot?.kind === 'named') {
        if (Object.hasOwn(keyed, slot.name)) {
          args.push(keyed[slot.name]);
          usedKeys.add(slot.name);
        } else {
          missingKeyed.push(slot.name);
        }
      } else if (next < positional.length) {
        args.push(positional[next++]);
      } else {
        missing.push(this.displayName(sym, id));
      }
    }

    const unexpectedKeys = Object.keys(keyed).filter(k => !usedKeys.has(k));
    const extra = positional.length - next;

    if (missing.length > 0 || missingKeyed.length > 0 || extra > 0 || unexpectedKeys.length > 0) {
      const problems: string[] = [];
      if (missing.length > 0) {
        problems.push(`Missing argument(s) for: ${missing.join(', ')}`);
      }
      if (missingKeyed.length > 0) {
        problems.push(`Missing keyed argument(s): ${missingKeyed.join(', ')}`);
      }
      if (extra > 0) {
        problems.push(`Unexpected positional argument(s): expected ${next}, got ${positional.length}`);
      }
      if (unexpectedKeys.length > 0) {
        problems.push(`Unexpected keyed argument(s): ${unexpectedKeys.join(', ')}`);
      }
      const unexpected = [
        ...Array.from({ length: extra }, (_, i) => `#${next + i}`),
        ...unexpectedKeys,
      ];
      throw new CallArityMismatchError(
        `${problems.join('; ')} (signature ${this.signature})`,
        [...missing, ...missingKeyed],
        unexpected
      );
    }

    return this.artifact.call(args);
  }

  toString(): string {
    const body = this.artifact.expr ? String(this.artifact.expr) : '<callable>';
    return `NumericFunction${this.signature} ${body}`;
  }

  private requireVariable(symbol: SymbolExpr): SymbolExpr {
    if (!this.stateMap.has(symbol)) {
      throw new InvalidBindingError(`${symbol.name} is not a variable of this function`);
    }
    return symbol;
  }

  /**
   * Variable for a slot name or a unique display name
   */
  private resolveName(name: string): SymbolExpr {
    for (const [slotName, sym] of this.varSpec.keyed) {
      if (slotName === name) return sym;
    }
    const matches = this.vars.filter(s => s.name === name);
    if (matches.length === 1) {
      return matches[0];
    }
    if (matches.length > 1) {
      throw new InvalidBindingError(`Variable name ${name} is ambiguous; key the values by symbol instead`);
    }
    throw new InvalidBindingError(`${name} is not a variable of this function`);
  }
}
