export * from './expr.js';
export * from './functions.js';
export * from './rewrite.js';
export * from './evaluate.js';
export { Parser, parseExpression, parseExpressions } from './parser.js';
export type { ParseOptions } from './parser.js';
