/**
 * Compilation cache
 *
 * In-memory LRU memoization of compiled artifacts, owned by whoever creates
 * it. Keys are fingerprints of the whole compile request; an artifact is
 * inserted only after it is fully built.
 *
 * Usage:
 *   const cache = new CompilationCache(64);
 *   const artifact = cache.getOrCompile(fingerprint(request), () => build(request));
 */

import { type Expr, SymbolExpr } from '../algebra/expr.js';
import { NDArray, toNumericValue } from '../ndarray/ndarray.js';
import { functionOfKey, type BindingsInput } from './bindings.js';
import type { CompiledArtifact } from './codegen.js';
import type { VarSpec } from './var-spec.js';

export const DEFAULT_CACHE_CAPACITY = 256;

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  capacity: number;
}

/**
 * Capacity from the argument, else NUMFUSE_CACHE_SIZE, else the default
 */
export function resolveCacheCapacity(capacity?: number): number {
  if (capacity !== undefined) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Cache capacity must be a positive integer, got ${capacity}`);
    }
    return capacity;
  }

  const env = process.env.NUMFUSE_CACHE_SIZE;
  if (env === undefined || env === '') {
    return DEFAULT_CACHE_CAPACITY;
  }
  const parsed = Number(env);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`NUMFUSE_CACHE_SIZE must be a positive integer, got ${JSON.stringify(env)}`);
  }
  return parsed;
}

export class CompilationCache {
  private readonly entries = new Map<string, CompiledArtifact>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  readonly capacity: number;

  constructor(capacity?: number) {
    this.capacity = resolveCacheCapacity(capacity);
  }

  /**
   * Cached artifact for the key, or the factory's result inserted as the
   * most recently used entry
   */
  getOrCompile(key: string, factory: () => CompiledArtifact): CompiledArtifact {
    const cached = this.entries.get(key);
    if (cached) {
      this.hits++;
      this.entries.delete(key);
      this.entries.set(key, cached);
      this.log('hit', key);
      return cached;
    }

    this.misses++;
    this.log('miss', key);
    const artifact = factory();
    this.entries.set(key, artifact);

    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.capacity) break;
      this.entries.delete(oldest);
      this.evictions++;
      this.log('evict', oldest);
    }

    return artifact;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Drop every entry and reset the counters
   */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      capacity: this.capacity,
    };
  }

  private log(event: string, key: string): void {
    if (process.env.DEBUG_CACHE) {
      const shown = key.length > 80 ? `${key.slice(0, 77)}...` : key;
      console.error(`[CompilationCache] ${event} ${shown} (size=${this.entries.size})`);
    }
  }
}

const objectIds = new WeakMap<object, number>();
let nextObjectId = 0;

function objectId(value: object): number {
  let id = objectIds.get(value);
  if (id === undefined) {
    id = nextObjectId++;
    objectIds.set(value, id);
  }
  return id;
}

/**
 * Marker for a bound value
 *
 * Numbers, and the arrays that binding resolution copies, are marked by
 * content. An NDArray is bound by reference and marked by identity, so a
 * mutated NDArray stays the same cache entry and the cached artifact sees
 * the mutation. Functions are marked by identity.
 */
export function valueMarker(value: unknown): string {
  if (typeof value === 'number') {
    return `H:${numberMarker(value)}`;
  }
  if (Array.isArray(value) || value instanceof Float64Array) {
    const copied = toNumericValue(value);
    if (copied instanceof NDArray) {
      return `A:${copied.shape.join('x')}:${Array.from(copied.data, numberMarker).join(',')}`;
    }
  }
  if ((typeof value === 'object' && value !== null) || typeof value === 'function') {
    return `ID:${objectId(value)}`;
  }
  return `H:${typeof value}:${String(value)}`;
}

function numberMarker(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

export interface CompileRequest {
  expr: Expr;
  /** null when the variables default to the expression's free symbols */
  vars: VarSpec | null;
  bindings: BindingsInput;
  vectorize: boolean;
  expandDefinition: boolean;
}

/**
 * Cache key for a compile request
 */
export function fingerprint(request: CompileRequest): string {
  const bindings: [string, string][] = [];
  for (const [key, value] of request.bindings) {
    const fn = functionOfKey(key);
    const keyPart = key instanceof SymbolExpr ? `S:${key.key}` : fn ? `F:${fn.key}` : `K:${key.key}`;
    bindings.push([keyPart, valueMarker(value)]);
  }
  bindings.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));

  return JSON.stringify([
    request.expr.key,
    request.vars ? request.vars.key : null,
    bindings,
    request.vectorize,
    request.expandDefinition,
  ]);
}
