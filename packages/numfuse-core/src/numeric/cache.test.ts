import { describe, it, expect, afterEach } from 'vitest';
import { makeSymbol, makeMul } from '../algebra/expr.js';
import { defineFunction } from '../algebra/functions.js';
import { asarray } from '../ndarray/ndarray.js';
import type { BindingKey } from './bindings.js';
import { CompilationCache, DEFAULT_CACHE_CAPACITY, fingerprint, resolveCacheCapacity, valueMarker } from './cache.js';
import { artifactFromCallable, type CompiledArtifact } from './codegen.js';
import { normalizeVarSpec } from './var-spec.js';

const x = makeSymbol('x');
const a = makeSymbol('a');

function dummyArtifact(): CompiledArtifact {
  return artifactFromCallable(v => v, normalizeVarSpec([x]));
}

describe('CompilationCache - Capacity', () => {
  afterEach(() => {
    delete process.env.NUMFUSE_CACHE_SIZE;
  });

  it('should default to the built-in capacity', () => {
    expect(resolveCacheCapacity()).toBe(DEFAULT_CACHE_CAPACITY);
  });

  it('should read the capacity from the environment', () => {
    process.env.NUMFUSE_CACHE_SIZE = '8';
    expect(new CompilationCache().capacity).toBe(8);
  });

  it('should reject invalid capacities', () => {
    expect(() => new CompilationCache(0)).toThrow('Cache capacity must be a positive integer, got 0');
    process.env.NUMFUSE_CACHE_SIZE = 'abc';
    expect(() => resolveCacheCapacity()).toThrow('NUMFUSE_CACHE_SIZE must be a positive integer, got "abc"');
  });
});

describe('CompilationCache - LRU', () => {
  it('should return the cached artifact on a hit', () => {
    const cache = new CompilationCache(4);
    const first = cache.getOrCompile('k', dummyArtifact);
    const second = cache.getOrCompile('k', dummyArtifact);
    expect(second).toBe(first);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, evictions: 0, size: 1, capacity: 4 });
  });

  it('should evict the least recently used entry', () => {
    const cache = new CompilationCache(2);
    cache.getOrCompile('a', dummyArtifact);
    cache.getOrCompile('b', dummyArtifact);
    cache.getOrCompile('a', dummyArtifact);
    cache.getOrCompile('c', dummyArtifact);
    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
    expect(cache.stats().evictions).toBe(1);
  });

  it('should insert nothing when the factory throws', () => {
    const cache = new CompilationCache(2);
    expect(() =>
      cache.getOrCompile('bad', () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(cache.has('bad')).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('should clear entries and counters', () => {
    const cache = new CompilationCache(2);
    cache.getOrCompile('a', dummyArtifact);
    cache.clear();
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, evictions: 0, size: 0, capacity: 2 });
  });
});

describe('CompilationCache - Fingerprints', () => {
  const base = {
    expr: makeMul(a, x),
    vars: normalizeVarSpec([x]),
    vectorize: true,
    expandDefinition: true,
  };

  it('should mark numbers and copied arrays by value', () => {
    expect(valueMarker(2)).toBe('H:2');
    expect(valueMarker(-0)).toBe('H:-0');
    expect(valueMarker([1, 2])).toBe('A:2:1,2');
    expect(valueMarker([[1, 2]])).toBe('A:1x2:1,2');
    expect(valueMarker(Float64Array.of(1, 2))).toBe('A:2:1,2');
  });

  it('should mark arrays bound by reference by identity', () => {
    const array = asarray([1, 2]);
    expect(valueMarker(array)).toMatch(/^ID:\d+$/);
    expect(valueMarker(array)).toBe(valueMarker(array));
    expect(valueMarker(array)).not.toBe(valueMarker(asarray([1, 2])));
  });

  it('should ignore binding insertion order', () => {
    const G = defineFunction('G', { arity: 1 });
    const g = () => 0;
    const one = fingerprint({ ...base, bindings: new Map<BindingKey, unknown>([[a, 2], [G, g]]) });
    const two = fingerprint({ ...base, bindings: new Map<BindingKey, unknown>([[G, g], [a, 2]]) });
    expect(one).toBe(two);
  });

  it('should distinguish binding values and flags', () => {
    const bound = fingerprint({ ...base, bindings: new Map<BindingKey, unknown>([[a, 2]]) });
    expect(fingerprint({ ...base, bindings: new Map<BindingKey, unknown>([[a, 3]]) })).not.toBe(bound);
    expect(fingerprint({ ...base, vectorize: false, bindings: new Map<BindingKey, unknown>([[a, 2]]) })).not.toBe(bound);
  });

  it('should distinguish same-named functions', () => {
    const first = defineFunction('G', { arity: 1 });
    const second = defineFunction('G', { arity: 1 });
    const g = () => 0;
    expect(fingerprint({ ...base, bindings: new Map<BindingKey, unknown>([[first, g]]) })).not.toBe(
      fingerprint({ ...base, bindings: new Map<BindingKey, unknown>([[second, g]]) })
    );
  });

  it('should distinguish default variables from an empty declaration', () => {
    const bindings = new Map<BindingKey, unknown>();
    expect(fingerprint({ ...base, vars: null, bindings })).not.toBe(
      fingerprint({ ...base, vars: normalizeVarSpec([]), bindings })
    );
  });
});
