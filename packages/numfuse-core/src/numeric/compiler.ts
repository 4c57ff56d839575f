/**
 * Expression compiler
 *
 * Turns an expression plus a variable declaration into a NumericFunction:
 *
 *   expand definitions -> resolve bindings -> validate -> allocate
 *   identifiers -> generate source -> lower to instructions -> artifact
 *
 * Artifacts are memoized in the compiler's CompilationCache. A compile either
 * returns a fully built artifact or throws; nothing partial is cached.
 */

import { type Expr, type SymbolExpr, toExpr } from '../algebra/expr.js';
import { expandDefinitions, freeSymbols } from '../algebra/rewrite.js';
import type { NumericValue } from '../ndarray/ndarray.js';
import { type BindingsInput, resolveBindings } from './bindings.js';
import { type CacheStats, type CompileRequest, CompilationCache, fingerprint } from './cache.js';
import {
  type CompiledArtifact,
  buildArtifact,
  generateSource,
  isConstantExpression,
  lowerProgram,
} from './codegen.js';
import { type CallSignature, IdentifierAllocator, RESERVED_NAMES } from './identifiers.js';
import { NumericFunction } from './numeric-function.js';
import { NumericPrinter } from './printer.js';
import { checkOverlap, checkUnboundSymbols, requireBoundFunctions } from './validate.js';
import { type VarSpecInput, VarSpec, normalizeVarSpec } from './var-spec.js';

export interface CompileOptions {
  /** Variables of the compiled function; default: free symbols without a binding, sorted by name */
  vars?: VarSpecInput | VarSpec;
  /** Constant values for symbols, callables for functions */
  bindings?: BindingsInput;
  /** Coerce arguments to arrays at entry (default true) */
  vectorize?: boolean;
  /** Expand function definitions before compiling (default true) */
  expandDefinition?: boolean;
  /** Use the compilation cache (default true) */
  cache?: boolean;
}

function byName(a: SymbolExpr, b: SymbolExpr): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function debugCompile(message: string): void {
  if (process.env.DEBUG_COMPILE) {
    console.error(`[compile] ${message}`);
  }
}

/**
 * Free symbols with no constant binding, sorted by display name
 */
function defaultVarSpec(expr: Expr, constants: ReadonlyMap<SymbolExpr, NumericValue>): VarSpec {
  const symbols = freeSymbols(expr)
    .filter(s => !constants.has(s))
    .sort(byName);
  return new VarSpec(symbols.map(symbol => ({ kind: 'positional', symbol })));
}

export class ExpressionCompiler {
  constructor(readonly cache: CompilationCache = new CompilationCache()) {}

  compile(expr: Expr | number, options: CompileOptions = {}): NumericFunction {
    return new NumericFunction(this.compileArtifact(expr, options));
  }

  compileArtifact(expr: Expr | number, options: CompileOptions = {}): CompiledArtifact {
    const request: CompileRequest = {
      expr: toExpr(expr),
      vars: options.vars === undefined ? null : normalizeVarSpec(options.vars),
      bindings: options.bindings ?? new Map(),
      vectorize: options.vectorize ?? true,
      expandDefinition: options.expandDefinition ?? true,
    };

    if (options.cache === false) {
      return this.build(request);
    }
    return this.cache.getOrCompile(fingerprint(request), () => this.build(request));
  }

  cacheClear(): void {
    this.cache.clear();
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  private build(request: CompileRequest): CompiledArtifact {
    const { expr: raw, vars: declared, bindings, vectorize, expandDefinition } = request;
    const start = performance.now();

    const expr = expandDefinition ? expandDefinitions(raw) : raw;
    const expanded = performance.now();

    const resolved = resolveBindings(expr, bindings);
    const vars = declared ?? defaultVarSpec(expr, resolved.symbols);
    debugCompile(`vars ${vars}`);

    checkUnboundSymbols(expr, vars, resolved.symbols);
    checkOverlap(vars, resolved.symbols);
    requireBoundFunctions(expr, new NumericPrinter({ allowUnknownFunctions: true }), resolved.functions);
    const validated = performance.now();

    // Constant bindings the expression reads, injected in name order
    const used = freeSymbols(expr)
      .filter(s => resolved.symbols.has(s))
      .sort(byName);
    const constantValues: NumericValue[] = [];
    for (const sym of used) {
      const value = resolved.symbols.get(sym);
      if (value !== undefined) {
        constantValues.push(value);
      }
    }

    const allocator = new IdentifierAllocator([...RESERVED_NAMES, ...resolved.functions.keys()]);
    const callSignature: CallSignature = vars.all.map(sym => [sym, allocator.allocate(sym.name)] as const);
    const constants: CallSignature = used.map(sym => [sym, allocator.allocate(sym.name)] as const);

    const printer = new NumericPrinter({
      allowUnknownFunctions: true,
      identifiers: new Map<Expr, string>([...callSignature, ...constants]),
    });
    const broadcast = vectorize && callSignature.length > 0 && isConstantExpression(expr, resolved.symbols);

    const source = generateSource({ expr, signature: callSignature, constants, printer, vectorize, broadcast });
    const program = lowerProgram({ expr, signature: callSignature, constants, vectorize, broadcast });
    const generated = performance.now();

    debugCompile(
      `${raw} expand=${(expanded - start).toFixed(2)}ms ` +
        `validate=${(validated - expanded).toFixed(2)}ms ` +
        `generate=${(generated - validated).toFixed(2)}ms`
    );

    return buildArtifact({
      expr,
      vars,
      callSignature,
      source,
      vectorize,
      program,
      constantValues,
      functions: resolved.functions,
    });
  }
}
