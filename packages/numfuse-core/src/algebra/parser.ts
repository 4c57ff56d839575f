/**
 * Expression reader - S-expression syntax for formulas
 *
 *   (+ x (* a (sin y)))      sum of x and a*sin(y)
 *   (^ x 2)  (expt x 2)      powers
 *   (- x) (- x y)  (/ x y)   negation, difference, quotient
 *   (G x)                    application of a user function passed in options
 *
 * Reading happens in two steps: the source is read into located datums, then
 * each datum is converted to an expression. Errors from either step carry the
 * file, line and column of the offending datum.
 */

import {
  type Expr,
  type SymbolExpr,
  makeNumber,
  makeSymbol,
  makeAdd,
  makeMul,
  makePow,
  makeNeg,
  makeSub,
  makeDiv,
  makeApply,
} from './expr.js';
import { type FunctionDef, builtinFunction } from './functions.js';

/**
 * Location in source
 */
interface Location {
  file: string;
  line: number;
  column: number;
}

/**
 * Datum read from source, before conversion
 */
type Datum =
  | { kind: 'number'; value: number; location: Location }
  | { kind: 'identifier'; name: string; location: Location }
  | { kind: 'list'; items: Datum[]; location: Location };

export interface ParseOptions {
  /** User functions the source may apply, by name */
  functions?: Iterable<FunctionDef> | ReadonlyMap<string, FunctionDef>;
  /** Pre-made symbols (e.g. with assumptions) to use for matching names */
  symbols?: Iterable<SymbolExpr>;
  /** File name reported in errors */
  file?: string;
}

function isFunctionMap(
  functions: Iterable<FunctionDef> | ReadonlyMap<string, FunctionDef>
): functions is ReadonlyMap<string, FunctionDef> {
  return functions instanceof Map;
}

/**
 * S-expression reader
 */
export class Parser {
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private readonly functions = new Map<string, FunctionDef>();
  private readonly symbols = new Map<string, SymbolExpr>();
  private readonly file: string;

  constructor(
    private readonly input: string,
    options: ParseOptions = {}
  ) {
    this.file = options.file ?? '<unknown>';
    if (options.functions) {
      const fns = isFunctionMap(options.functions) ? options.functions.values() : options.functions;
      for (const fn of fns) {
        this.functions.set(fn.name, fn);
      }
    }
    for (const sym of options.symbols ?? []) {
      this.symbols.set(sym.name, sym);
    }
  }

  /**
   * Read every expression in the input
   */
  parse(): Expr[] {
    const exprs: Expr[] = [];

    while (!this.isAtEnd()) {
      this.skipWhitespaceAndComments();
      if (this.isAtEnd()) break;

      exprs.push(this.convert(this.parseDatum()));
    }

    return exprs;
  }

  // ============ Reading ============

  private parseDatum(): Datum {
    this.skipWhitespaceAndComments();

    if (this.isAtEnd()) {
      throw this.error('Unexpected end of input');
    }

    const c = this.peek();

    if (this.isDigit(c) || ((c === '-' || c === '.') && this.isDigit(this.peekAhead(1)))) {
      return this.parseNumber();
    }

    if (c === '(') {
      return this.parseList();
    }

    if (c === ')') {
      throw this.error('Unexpected )');
    }

    if (this.isIdentifierStart(c)) {
      return this.parseIdentifier();
    }

    throw this.error(`Unexpected character: ${c}`);
  }

  private parseNumber(): Datum {
    const location = this.currentLocation();
    let numStr = '';

    if (this.peek() === '-') {
      numStr += this.advance();
    }

    while (this.isDigit(this.peek())) {
      numStr += this.advance();
    }

    if (this.peek() === '.') {
      numStr += this.advance();
      while (this.isDigit(this.peek())) {
        numStr += this.advance();
      }
    }

    if (this.peek() === 'e' || this.peek() === 'E') {
      numStr += this.advance();
      if (this.peek() === '+' || this.peek() === '-') {
        numStr += this.advance();
      }
      while (this.isDigit(this.peek())) {
        numStr += this.advance();
      }
    }

    if (!this.isAtEnd() && this.isIdentifierChar(this.peek())) {
      throw this.error(`Invalid number: ${numStr}${this.peek()}`);
    }

    const value = Number(numStr);
    if (Number.isNaN(value)) {
      throw this.error(`Invalid number: ${numStr}`);
    }
    return { kind: 'number', value, location };
  }

  private parseList(): Datum {
    const location = this.currentLocation();
    this.expect('(');
    const items: Datum[] = [];

    while (true) {
      this.skipWhitespaceAndComments();

      if (this.isAtEnd()) {
        throw this.error('Unterminated list');
      }

      if (this.peek() === ')') {
        this.advance();
        break;
      }

      items.push(this.parseDatum());
    }

    return { kind: 'list', items, location };
  }

  private parseIdentifier(): Datum {
    const location = this.currentLocation();
    let name = '';

    while (!this.isAtEnd() && this.isIdentifierChar(this.peek())) {
      name += this.advance();
    }

    return { kind: 'identifier', name, location };
  }

  // ============ Conversion ============

  private convert(datum: Datum): Expr {
    switch (datum.kind) {
      case 'number':
        return makeNumber(datum.value);
      case 'identifier':
        return this.symbols.get(datum.name) ?? makeSymbol(datum.name);
      case 'list':
        return this.convertApplication(datum.items, datum.location);
    }
  }

  private convertApplication(items: Datum[], location: Location): Expr {
    if (items.length === 0) {
      throw this.errorAt(location, 'Empty application');
    }

    const [head, ...rest] = items;
    if (head.kind !== 'identifier') {
      throw this.errorAt(head.location, 'Application head must be an operator or function name');
    }

    const args = rest.map(d => this.convert(d));
    const op = head.name;

    switch (op) {
      case '+':
        return makeAdd(...args);
      case '*':
        return makeMul(...args);
      case '-':
        if (args.length === 0) {
          throw this.errorAt(location, '- requires at least 1 argument');
        }
        return args.length === 1 ? makeNeg(args[0]) : args.slice(1).reduce(makeSub, args[0]);
      case '/':
        if (args.length === 0) {
          throw this.errorAt(location, '/ requires at least 1 argument');
        }
        return args.length === 1 ? makeDiv(makeNumber(1), args[0]) : args.slice(1).reduce(makeDiv, args[0]);
      case '^':
      case 'expt':
        if (args.length !== 2) {
          throw this.errorAt(location, `${op} requires exactly 2 arguments, got ${args.length}`);
        }
        return makePow(args[0], args[1]);
    }

    const fn = this.functions.get(op) ?? builtinFunction(op);
    if (!fn) {
      throw this.errorAt(head.location, `Unknown function: ${op}`);
    }
    if (fn.arity !== undefined && args.length !== fn.arity) {
      throw this.errorAt(location, `${op} requires exactly ${fn.arity} argument(s), got ${args.length}`);
    }
    return makeApply(fn, args);
  }

  // ============ Tokenizer helpers ============

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const c = this.peek();

      if (c === ' ' || c === '\t' || c === '\r' || c === '\n' || c === '\f') {
        this.advance();
      } else if (c === ';') {
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private isDigit(c: string): boolean {
    return c >= '0' && c <= '9';
  }

  private isIdentifierStart(c: string): boolean {
    return /\p{L}/u.test(c) || '_$+-*/^'.includes(c);
  }

  private isIdentifierChar(c: string): boolean {
    return this.isIdentifierStart(c) || this.isDigit(c) || c === '.';
  }

  private isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.pos];
  }

  private peekAhead(n: number): string {
    if (this.pos + n >= this.input.length) return '\0';
    return this.input[this.pos + n];
  }

  private advance(): string {
    const c = this.input[this.pos++];
    if (c === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private expect(expected: string): void {
    const c = this.peek();
    if (c !== expected) {
      throw this.error(`Expected '${expected}', got '${c}'`);
    }
    this.advance();
  }

  private currentLocation(): Location {
    return { file: this.file, line: this.line, column: this.column };
  }

  private error(message: string): Error {
    return this.errorAt(this.currentLocation(), message);
  }

  private errorAt(loc: Location, message: string): Error {
    return new Error(`Parse error in ${loc.file} at ${loc.line}:${loc.column}: ${message}`);
  }
}

/**
 * Read every expression in the source
 */
export function parseExpressions(source: string, options: ParseOptions = {}): Expr[] {
  return new Parser(source, options).parse();
}

/**
 * Read exactly one expression
 */
export function parseExpression(source: string, options: ParseOptions = {}): Expr {
  const exprs = parseExpressions(source, options);
  if (exprs.length === 0) {
    throw new Error('No expression to parse');
  }
  if (exprs.length > 1) {
    throw new Error('Multiple expressions found, expected one');
  }
  return exprs[0];
}
