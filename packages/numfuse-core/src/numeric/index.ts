export * from './errors.js';
export * from './var-spec.js';
export * from './bindings.js';
export * from './identifiers.js';
export * from './printer.js';
export * from './validate.js';
export * from './insn.js';
export * from './vm.js';
export * from './codegen.js';
export * from './cache.js';
export * from './numeric-function.js';
export * from './compiler.js';
export * from './parameters.js';
export * from './operations.js';
