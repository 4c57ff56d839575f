/**
 * Numeric printer - renders expressions as array-code text
 *
 * Output is JavaScript syntax over the `np` array namespace: operators for
 * arithmetic, `np.<name>(...)` for builtins and bare `name(...)` calls for
 * bound user functions. The text documents what a compiled function computes;
 * execution goes through the lowered instruction chain instead.
 */

import { type Expr, makeNumber, makeNeg, makePow } from '../algebra/expr.js';

export interface PrinterOptions {
  /** Print unknown functions as bare calls instead of throwing (default false) */
  allowUnknownFunctions?: boolean;
  /** Identifier for each symbol; unlisted symbols print by name */
  identifiers?: ReadonlyMap<Expr, string>;
}

const PREC_ADD = 10;
const PREC_MUL = 20;
const PREC_UNARY = 25;
const PREC_POW = 30;
const PREC_ATOM = 40;

type Rendered = [text: string, precedence: number];

function isNegativeTerm(term: Expr): boolean {
  const num = term.asNumber();
  if (num) {
    return num.value < 0;
  }
  const mul = term.asMul();
  return mul !== null && mul.factors.some(f => {
    const n = f.asNumber();
    return n !== null && n.value < 0;
  });
}

function negativeExponent(expr: Expr): number | null {
  const pow = expr.asPow();
  const exp = pow?.exponent.asNumber();
  return exp && exp.value < 0 ? -exp.value : null;
}

function formatNumber(value: number): string {
  if (Object.is(value, -0)) return '0';
  return String(value);
}

export class NumericPrinter {
  private readonly allowUnknownFunctions: boolean;
  private readonly identifiers: ReadonlyMap<Expr, string>;

  constructor(options: PrinterOptions = {}) {
    this.allowUnknownFunctions = options.allowUnknownFunctions ?? false;
    this.identifiers = options.identifiers ?? new Map();
  }

  doprint(expr: Expr): string {
    return this.render(expr)[0];
  }

  private print(expr: Expr, parent: number): string {
    const [text, precedence] = this.render(expr);
    return precedence < parent ? `(${text})` : text;
  }

  private render(expr: Expr): Rendered {
    const num = expr.asNumber();
    if (num) {
      return [formatNumber(num.value), num.value < 0 ? PREC_UNARY : PREC_ATOM];
    }

    const sym = expr.asSymbol();
    if (sym) {
      return [this.identifiers.get(sym) ?? sym.name, PREC_ATOM];
    }

    const add = expr.asAdd();
    if (add) {
      return this.renderAdd(add.terms);
    }

    const mul = expr.asMul();
    if (mul) {
      return this.renderMul(mul.factors);
    }

    const pow = expr.asPow();
    if (pow) {
      const k = negativeExponent(pow);
      if (k !== null) {
        const denominator = makePow(pow.base, makeNumber(k));
        return [`1 / ${this.print(denominator, PREC_MUL + 1)}`, PREC_MUL];
      }
      return [`${this.print(pow.base, PREC_POW + 1)} ** ${this.print(pow.exponent, PREC_POW)}`, PREC_POW];
    }

    const app = expr.asApply();
    if (app) {
      const args = app.args.map(a => this.print(a, 0)).join(', ');
      if (app.fn.builtin) {
        return [`np.${app.fn.name}(${args})`, PREC_ATOM];
      }
      if (!this.allowUnknownFunctions) {
        throw new Error(`Unsupported function in numeric printer: ${app.fn.name}`);
      }
      return [`${app.fn.name}(${args})`, PREC_ATOM];
    }

    throw new Error(`Cannot print expression: ${expr}`);
  }

  /**
   * Positive terms first, then ` - ` for each negative one
   */
  private renderAdd(terms: readonly Expr[]): Rendered {
    const positive = terms.filter(t => !isNegativeTerm(t));
    const negative = terms.filter(t => isNegativeTerm(t));

    let text = '';
    if (positive.length === 0) {
      text = this.print(negative[0], PREC_ADD);
      negative.shift();
    } else {
      text = positive.map(t => this.print(t, PREC_ADD)).join(' + ');
    }
    for (const term of negative) {
      text += ` - ${this.print(makeNeg(term), PREC_ADD + 1)}`;
    }
    return [text, PREC_ADD];
  }

  /**
   * Coefficient first, factors with negative numeric exponents below a `/`
   */
  private renderMul(factors: readonly Expr[]): Rendered {
    let coefficient = 1;
    const numerator: string[] = [];
    const denominator: Expr[] = [];

    for (const factor of factors) {
      const num = factor.asNumber();
      const pow = factor.asPow();
      const k = negativeExponent(factor);
      if (num) {
        coefficient *= num.value;
      } else if (pow && k !== null) {
        denominator.push(makePow(pow.base, makeNumber(k)));
      } else {
        numerator.push(this.print(factor, PREC_MUL));
      }
    }

    const magnitude = Math.abs(coefficient);
    if (magnitude !== 1 || numerator.length === 0) {
      numerator.unshift(formatNumber(magnitude));
    }

    let text = numerator.join(' * ');
    if (denominator.length === 1) {
      text += ` / ${this.print(denominator[0], PREC_MUL + 1)}`;
    } else if (denominator.length > 1) {
      text += ` / (${denominator.map(d => this.print(d, PREC_MUL)).join(' * ')})`;
    }

    return coefficient < 0 ? [`-${text}`, PREC_UNARY] : [text, PREC_MUL];
  }
}
