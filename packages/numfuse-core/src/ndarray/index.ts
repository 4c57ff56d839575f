export * from './ndarray.js';
export * from './ufuncs.js';
