/**
 * Variable specifications
 *
 * A variable spec declares which symbols become parameters of a compiled
 * function, in which order, and which of them are passed by name. Accepted
 * forms:
 *
 *   x                          one positional variable
 *   [x, y, { scale: s }]       positional variables plus named slots
 *   { 0: x, 1: y, gain: g }    integer keys (contiguous from 0) and names
 *   new Map([[0, x], ['gain', g]])
 *
 * Every form normalizes to a VarSpec: an ordered list of VarSlot. Everything
 * downstream of normalization consumes only that canonical form.
 */

import { SymbolExpr } from '../algebra/expr.js';
import { InvalidSpecError } from './errors.js';

export type VarSlot =
  | { readonly kind: 'positional'; readonly symbol: SymbolExpr }
  | { readonly kind: 'named'; readonly name: string; readonly symbol: SymbolExpr };

/**
 * Named slots, e.g. `{ scale: s }`
 */
export type NamedSlots = { readonly [name: string]: SymbolExpr };

export type VarSpecInput =
  | SymbolExpr
  | readonly (SymbolExpr | NamedSlots)[]
  | ReadonlyMap<number | string, SymbolExpr>
  | NamedSlots;

const SLOT_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const INTEGER_KEY = /^\d+$/;

export class VarSpec {
  /** Every symbol, in slot order */
  readonly all: readonly SymbolExpr[];
  /** Named slots as [name, symbol] pairs, in slot order */
  readonly keyed: readonly (readonly [string, SymbolExpr])[];
  /** Symbols passed by position, in order */
  readonly positional: readonly SymbolExpr[];

  private readonly bySymbol: ReadonlyMap<SymbolExpr, VarSlot>;

  constructor(
    readonly slots: readonly VarSlot[],
    private readonly form: 'sequence' | 'mapping' = 'sequence'
  ) {
    const bySymbol = new Map<SymbolExpr, VarSlot>();
    const names = new Set<string>();
    for (const slot of slots) {
      if (bySymbol.has(slot.symbol)) {
        throw new InvalidSpecError(`Duplicate symbol in vars: ${slot.symbol.name}`);
      }
      bySymbol.set(slot.symbol, slot);
      if (slot.kind === 'named') {
        if (names.has(slot.name)) {
          throw new InvalidSpecError(`Duplicate slot name in vars: ${slot.name}`);
        }
        names.add(slot.name);
      }
    }

    this.bySymbol = bySymbol;
    this.all = slots.map(s => s.symbol);
    this.keyed = slots.flatMap(s => (s.kind === 'named' ? [[s.name, s.symbol] as const] : []));
    this.positional = slots.flatMap(s => (s.kind === 'positional' ? [s.symbol] : []));
  }

  slotOf(symbol: SymbolExpr): VarSlot | null {
    return this.bySymbol.get(symbol) ?? null;
  }

  has(symbol: SymbolExpr): boolean {
    return this.bySymbol.has(symbol);
  }

  /**
   * Canonical key, part of the compilation cache fingerprint
   */
  get key(): string {
    return this.slots
      .map(s => (s.kind === 'named' ? `${JSON.stringify(s.name)}=${s.symbol.key}` : s.symbol.key))
      .join(';');
  }

  /**
   * Input form that normalizes back to this spec
   */
  toInput(): VarSpecInput {
    if (this.form === 'mapping') {
      const record: { [key: string]: SymbolExpr } = {};
      let index = 0;
      for (const slot of this.slots) {
        record[slot.kind === 'named' ? slot.name : String(index++)] = slot.symbol;
      }
      return record;
    }

    const items: (SymbolExpr | NamedSlots)[] = [];
    let group: { [name: string]: SymbolExpr } | null = null;
    for (const slot of this.slots) {
      if (slot.kind === 'positional') {
        items.push(slot.symbol);
        group = null;
        continue;
      }
      if (!group) {
        group = {};
        items.push(group);
      }
      group[slot.name] = slot.symbol;
    }
    return items;
  }

  toString(): string {
    return `[${this.slots.map(s => (s.kind === 'named' ? `${s.name}=${s.symbol.name}` : s.symbol.name)).join(', ')}]`;
  }
}

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

function checkSlotName(name: string): string {
  if (!SLOT_NAME.test(name)) {
    throw new InvalidSpecError(`Slot names in vars must be identifiers, got ${JSON.stringify(name)}`);
  }
  return name;
}

function requireSymbol(value: unknown, where: string): SymbolExpr {
  if (!(value instanceof SymbolExpr)) {
    throw new InvalidSpecError(`${where} must be a symbol, got ${describe(value)}`);
  }
  return value;
}

/**
 * Build a spec from keyed entries: integer keys first in key order, then
 * named slots in insertion order
 */
function fromEntries(entries: Iterable<readonly [unknown, unknown]>): VarSpec {
  const indexed: [number, SymbolExpr][] = [];
  const named: VarSlot[] = [];

  for (const [key, value] of entries) {
    const symbol = requireSymbol(value, `vars[${String(key)}]`);
    if (typeof key === 'number' || (typeof key === 'string' && INTEGER_KEY.test(key))) {
      const index = Number(key);
      if (!Number.isInteger(index) || index < 0) {
        throw new InvalidSpecError(`Integer keys in vars must be non-negative integers, got ${String(key)}`);
      }
      indexed.push([index, symbol]);
    } else if (typeof key === 'string') {
      named.push({ kind: 'named', name: checkSlotName(key), symbol });
    } else {
      throw new InvalidSpecError(`Keys in vars must be integers or names, got ${describe(key)}`);
    }
  }

  indexed.sort((a, b) => a[0] - b[0]);
  if (indexed.some(([index], i) => index !== i)) {
    throw new InvalidSpecError(
      `Integer keys in vars must be contiguous and start at 0; got ${indexed.map(([i]) => i).join(', ')}`
    );
  }

  const positional: VarSlot[] = indexed.map(([, symbol]) => ({ kind: 'positional', symbol }));
  return new VarSpec([...positional, ...named], 'mapping');
}

function fromSequence(items: readonly unknown[]): VarSpec {
  const slots: VarSlot[] = [];
  items.forEach((item, i) => {
    if (item instanceof SymbolExpr) {
      slots.push({ kind: 'positional', symbol: item });
      return;
    }
    if (!isPlainObject(item)) {
      throw new InvalidSpecError(`vars[${i}] must be a symbol or a { name: symbol } slot, got ${describe(item)}`);
    }
    for (const [name, value] of Object.entries(item)) {
      slots.push({ kind: 'named', name: checkSlotName(name), symbol: requireSymbol(value, `vars[${i}].${name}`) });
    }
  });
  return new VarSpec(slots, 'sequence');
}

/**
 * Normalize a variable spec
 */
export function normalizeVarSpec(input: VarSpecInput | VarSpec): VarSpec {
  return readVarSpec(input);
}

/**
 * Normalize a variable spec from untyped input
 */
export function readVarSpec(input: unknown): VarSpec {
  if (input instanceof VarSpec) {
    return input;
  }
  if (input instanceof SymbolExpr) {
    return new VarSpec([{ kind: 'positional', symbol: input }]);
  }
  if (Array.isArray(input)) {
    return fromSequence(input);
  }
  if (input instanceof Map) {
    return fromEntries(input.entries());
  }
  if (isPlainObject(input)) {
    return fromEntries(Object.entries(input));
  }
  throw new InvalidSpecError(
    `vars must be a symbol, an array of symbols and named slots, or a mapping; got ${describe(input)}`
  );
}
