/**
 * numfuse-core - compile symbolic expressions to vectorized numeric functions
 */

export * from './ndarray/index.js';
export * from './algebra/index.js';
export * from './numeric/index.js';
