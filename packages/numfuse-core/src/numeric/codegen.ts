/**
 * Code generation
 *
 * A compiled artifact carries two renderings of the same expression:
 * - the function text, built with the numeric printer, for inspection
 * - the instruction chain the VM runs
 *
 * Both follow the call signature: parameters in order, optional array
 * coercion at entry, constant bindings read from a captured table, and the
 * broadcast of constant results to the argument shape.
 */

import type { Expr, SymbolExpr } from '../algebra/expr.js';
import type { NumericCallable } from '../algebra/functions.js';
import { freeSymbols } from '../algebra/rewrite.js';
import { type NumericInput, type NumericValue, asarray } from '../ndarray/ndarray.js';
import {
  type Insn,
  ConstantInsn,
  ArgRefInsn,
  BindingRefInsn,
  PrimitiveInsn,
  CallInsn,
  BroadcastInsn,
  VectorizeInsn,
  type Primitive,
} from './insn.js';
import { VM } from './vm.js';
import { type CallSignature, RESERVED_NAMES, allocateIdentifiers } from './identifiers.js';
import type { NumericPrinter } from './printer.js';
import type { VarSpec } from './var-spec.js';

/**
 * Immutable result of compiling one expression against one signature
 */
export interface CompiledArtifact {
  /** Expression after definition expansion; null for wrapped callables */
  readonly expr: Expr | null;
  readonly vars: VarSpec;
  readonly callSignature: CallSignature;
  /** Generated function text; null for wrapped callables */
  readonly source: string | null;
  readonly vectorize: boolean;
  /** Entry of the instruction chain; null for wrapped callables */
  readonly program: Insn | null;
  /** Run with one argument per signature entry, in signature order */
  call(args: readonly NumericInput[]): NumericValue;
}

/**
 * A constant expression is one in which every free symbol is a constant
 * binding; vectorized calls with parameters broadcast its value
 */
export function isConstantExpression(expr: Expr, constants: ReadonlyMap<SymbolExpr, unknown>): boolean {
  return freeSymbols(expr).every(s => constants.has(s));
}

export interface SourceRequest {
  expr: Expr;
  signature: CallSignature;
  /** [symbol, identifier] per constant binding, in injection order */
  constants: CallSignature;
  printer: NumericPrinter;
  vectorize: boolean;
  broadcast: boolean;
}

/**
 * Function text for an expression
 *
 * @example
 * function _generated(x, y) {
 *   x = np.asarray(x);
 *   y = np.asarray(y);
 *   const a = _bindings["a"];
 *   return a * x + y;
 * }
 */
export function generateSource(request: SourceRequest): string {
  const params = request.signature.map(([, id]) => id);
  const lines: string[] = [`function _generated(${params.join(', ')}) {`];

  if (request.vectorize) {
    for (const id of params) {
      lines.push(`  ${id} = np.asarray(${id});`);
    }
  }

  for (const [, id] of request.constants) {
    lines.push(`  const ${id} = _bindings[${JSON.stringify(id)}];`);
  }

  const code = request.printer.doprint(request.expr);
  if (request.broadcast) {
    lines.push(`  const _shape = np.broadcastShape(${params.join(', ')});`);
    lines.push(`  return np.add(${code}, np.zeros(_shape));`);
  } else {
    lines.push(`  return ${code};`);
  }

  lines.push('}');
  return lines.join('\n');
}

export interface LoweringContext {
  /** Argument index per variable */
  args: ReadonlyMap<SymbolExpr, number>;
  /** Table index and identifier per constant binding */
  constants: ReadonlyMap<SymbolExpr, readonly [number, string]>;
}

/**
 * Lower an expression to an instruction chain ending in `next`
 *
 * Operands are lowered right to left so they execute left to right.
 */
export function lowerExpression(expr: Expr, context: LoweringContext, next: Insn | null): Insn {
  const num = expr.asNumber();
  if (num) {
    return new ConstantInsn(num.value, next);
  }

  const sym = expr.asSymbol();
  if (sym) {
    const index = context.args.get(sym);
    if (index !== undefined) {
      return new ArgRefInsn(index, next);
    }
    const binding = context.constants.get(sym);
    if (binding) {
      return new BindingRefInsn(binding[0], binding[1], next);
    }
    throw new Error(`Cannot lower unbound symbol ${sym.name}`);
  }

  const lowerCall = (operands: readonly Expr[], call: Insn): Insn => {
    let result = call;
    for (let i = operands.length - 1; i >= 0; i--) {
      result = lowerExpression(operands[i], context, result);
    }
    return result;
  };

  const primitive = (p: Primitive, operands: readonly Expr[]): Insn =>
    lowerCall(operands, new PrimitiveInsn(p, operands.length, next));

  const add = expr.asAdd();
  if (add) {
    return primitive({ kind: 'add' }, add.terms);
  }

  const mul = expr.asMul();
  if (mul) {
    return primitive({ kind: 'multiply' }, mul.factors);
  }

  const pow = expr.asPow();
  if (pow) {
    return primitive({ kind: 'power' }, [pow.base, pow.exponent]);
  }

  const app = expr.asApply();
  if (app) {
    if (app.fn.ufunc) {
      return primitive({ kind: 'ufunc', ufunc: app.fn.ufunc }, app.args);
    }
    return lowerCall(app.args, new CallInsn(app.fn.name, app.args.length, next));
  }

  throw new Error(`Cannot lower expression: ${expr}`);
}

export interface ProgramRequest {
  expr: Expr;
  signature: CallSignature;
  constants: CallSignature;
  vectorize: boolean;
  broadcast: boolean;
}

/**
 * Full instruction chain: coercion, expression, broadcast
 */
export function lowerProgram(request: ProgramRequest): Insn {
  const args = new Map(request.signature.map(([sym], i) => [sym, i] as const));
  const constants = new Map(request.constants.map(([sym, id], i) => [sym, [i, id] as const] as const));

  const tail = request.broadcast ? new BroadcastInsn(null) : null;
  const body = lowerExpression(request.expr, { args, constants }, tail);
  return request.vectorize ? new VectorizeInsn(body) : body;
}

export interface ArtifactParts {
  expr: Expr;
  vars: VarSpec;
  callSignature: CallSignature;
  source: string;
  vectorize: boolean;
  program: Insn;
  constantValues: readonly NumericValue[];
  functions: ReadonlyMap<string, NumericCallable>;
}

export function buildArtifact(parts: ArtifactParts): CompiledArtifact {
  const namespace = { bindings: [...parts.constantValues], functions: new Map(parts.functions) };
  const program = parts.program;
  const arity = parts.callSignature.length;

  return Object.freeze({
    expr: parts.expr,
    vars: parts.vars,
    callSignature: parts.callSignature,
    source: parts.source,
    vectorize: parts.vectorize,
    program,
    call(args: readonly NumericInput[]): NumericValue {
      if (args.length !== arity) {
        throw new Error(`Compiled function takes ${arity} argument(s), got ${args.length}`);
      }
      return new VM(namespace).eval(program, args);
    },
  });
}

/**
 * Artifact around a hand-written callable taking one argument per variable
 */
export function artifactFromCallable(fn: NumericCallable, vars: VarSpec): CompiledArtifact {
  const callSignature = allocateIdentifiers(vars.all, RESERVED_NAMES);
  const arity = callSignature.length;

  return Object.freeze({
    expr: null,
    vars,
    callSignature,
    source: null,
    vectorize: true,
    program: null,
    call(args: readonly NumericInput[]): NumericValue {
      if (args.length !== arity) {
        throw new Error(`Compiled function takes ${arity} argument(s), got ${args.length}`);
      }
      return asarray(fn(...args.map(asarray)));
    },
  });
}
