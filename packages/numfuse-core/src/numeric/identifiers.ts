/**
 * Identifier allocation
 *
 * Maps symbols to identifiers for the generated function text. Identifiers
 * are valid, unique within one allocation, and never one of the reserved
 * names (keywords, global builtins and the names the generated code itself
 * uses).
 */

import type { SymbolExpr } from '../algebra/expr.js';

/**
 * Reserved words, including those reserved only in strict mode
 */
export const JS_KEYWORDS: ReadonlySet<string> = new Set([
  'await', 'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger',
  'default', 'delete', 'do', 'else', 'enum', 'export', 'extends', 'false',
  'finally', 'for', 'function', 'if', 'implements', 'import', 'in',
  'instanceof', 'interface', 'let', 'new', 'null', 'package', 'private',
  'protected', 'public', 'return', 'static', 'super', 'switch', 'this',
  'throw', 'true', 'try', 'typeof', 'var', 'void', 'while', 'with', 'yield',
]);

const GLOBAL_NAMES = [
  'Math', 'Number', 'Array', 'Object', 'NaN', 'Infinity', 'undefined',
  'globalThis', 'arguments', 'eval',
];

/**
 * Names the generated function text uses for its own purposes
 */
export const RUNTIME_NAMES: readonly string[] = ['np', '_bindings', '_shape', '_generated'];

export const RESERVED_NAMES: ReadonlySet<string> = new Set([...JS_KEYWORDS, ...GLOBAL_NAMES, ...RUNTIME_NAMES]);

/**
 * Ordered [symbol, identifier] pairs, one per declared variable
 */
export type CallSignature = readonly (readonly [SymbolExpr, string])[];

export function isValidIdentifier(name: string): boolean {
  return /^[\p{ID_Start}_$][\p{ID_Continue}$]*$/u.test(name) && !JS_KEYWORDS.has(name);
}

/**
 * Identifier derived from a display name, before collision handling
 *
 * @example
 * baseIdentifier('x-y')   // 'x_y'
 * baseIdentifier('2x')    // '_2x'
 * baseIdentifier('class') // 'class_'
 */
export function baseIdentifier(name: string): string {
  let id = name.replace(/[^\p{ID_Continue}$]/gu, '_');
  if (id.length === 0) {
    id = '_';
  }
  if (!/^[\p{ID_Start}_$]/u.test(id)) {
    id = `_${id}`;
  }
  if (JS_KEYWORDS.has(id)) {
    id = `${id}_`;
  }
  return id;
}

export class IdentifierAllocator {
  private readonly taken: Set<string>;

  constructor(reserved: Iterable<string> = RESERVED_NAMES) {
    this.taken = new Set(reserved);
  }

  /**
   * Allocate an identifier for a display name, appending _1, _2, ... on collision
   */
  allocate(name: string): string {
    const base = baseIdentifier(name);
    let candidate = base;
    for (let n = 1; this.taken.has(candidate); n++) {
      candidate = `${base}_${n}`;
    }
    this.taken.add(candidate);
    return candidate;
  }

  isTaken(name: string): boolean {
    return this.taken.has(name);
  }
}

/**
 * Build the call signature for a list of symbols
 */
export function allocateIdentifiers(
  symbols: readonly SymbolExpr[],
  reserved: Iterable<string> = RESERVED_NAMES
): CallSignature {
  const allocator = new IdentifierAllocator(reserved);
  return symbols.map(sym => [sym, allocator.allocate(sym.name)] as const);
}
