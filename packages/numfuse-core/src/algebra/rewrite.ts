/**
 * Tree traversal and rewriting
 *
 * All rewrites are functional: they return the input node itself when
 * nothing changed and never mutate a tree.
 */

import type { Expr, SymbolExpr, ApplyExpr } from './expr.js';

/**
 * Pass budget for expanding definitions; a self-referential definition
 * stops here instead of growing forever
 */
export const DEFAULT_MAX_PASSES = 10;

/**
 * Free symbols in order of first appearance (depth-first, left to right)
 */
export function freeSymbols(expr: Expr): SymbolExpr[] {
  const seen = new Set<SymbolExpr>();
  const visit = (node: Expr): void => {
    const sym = node.asSymbol();
    if (sym) {
      seen.add(sym);
      return;
    }
    for (const child of node.children()) {
      visit(child);
    }
  };
  visit(expr);
  return Array.from(seen);
}

/**
 * Distinct function applications, outermost first
 */
export function applications(expr: Expr): ApplyExpr[] {
  const found = new Map<string, ApplyExpr>();
  const visit = (node: Expr): void => {
    const app = node.asApply();
    if (app && !found.has(app.key)) {
      found.set(app.key, app);
    }
    for (const child of node.children()) {
      visit(child);
    }
  };
  visit(expr);
  return Array.from(found.values());
}

/**
 * Rebuild a tree bottom-up, applying `fn` to every node after its children
 */
export function transform(expr: Expr, fn: (node: Expr) => Expr): Expr {
  const children = expr.children();
  if (children.length === 0) {
    return fn(expr);
  }

  let changed = false;
  const rebuilt = children.map(child => {
    const next = transform(child, fn);
    if (next !== child) changed = true;
    return next;
  });

  return fn(changed ? expr.withChildren(rebuilt) : expr);
}

/**
 * Replace symbols by expressions
 */
export function substitute(expr: Expr, replacements: ReadonlyMap<SymbolExpr, Expr>): Expr {
  if (replacements.size === 0) {
    return expr;
  }
  return transform(expr, node => {
    const sym = node.asSymbol();
    return sym ? replacements.get(sym) ?? node : node;
  });
}

/**
 * Expand every application whose function has a symbolic definition, once
 */
export function expandDefinitionOnce(expr: Expr): Expr {
  return transform(expr, node => {
    const app = node.asApply();
    if (!app) {
      return node;
    }
    return app.fn.expand(app) ?? node;
  });
}

/**
 * Expand definitions until the tree stops changing or the pass budget runs out
 */
export function expandDefinitions(expr: Expr, maxPasses: number = DEFAULT_MAX_PASSES): Expr {
  let current = expr;
  for (let pass = 0; pass < maxPasses; pass++) {
    const next = expandDefinitionOnce(current);
    if (next.equals(current)) {
      return current;
    }
    current = next;
  }

  if (process.env.DEBUG_COMPILE) {
    console.error(`[expandDefinitions] stopped after ${maxPasses} passes without reaching a fixed point`);
  }
  return current;
}
