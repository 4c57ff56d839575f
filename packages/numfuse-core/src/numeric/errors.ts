/**
 * Compiler and calling-convention errors
 *
 * Every error carries a stable `code` alongside the offending names, so
 * callers can branch without matching on message text.
 */

export type NumfuseErrorCode =
  | 'INVALID_SPEC'
  | 'UNBOUND_SYMBOL'
  | 'OVERLAPPING_BINDING'
  | 'INVALID_BINDING'
  | 'UNBOUND_FUNCTION'
  | 'CALL_ARITY_MISMATCH'
  | 'MISSING_DYNAMIC_CONTEXT'
  | 'MISSING_CONTEXT_SYMBOL';

/**
 * Base class for all compiler errors.
 */
export class NumfuseError extends Error {
  constructor(
    message: string,
    public readonly code: NumfuseErrorCode,
  ) {
    super(message);
    this.name = 'NumfuseError';
  }
}

/**
 * Malformed variable declaration.
 */
export class InvalidSpecError extends NumfuseError {
  constructor(message: string) {
    super(message, 'INVALID_SPEC');
    this.name = 'InvalidSpecError';
  }
}

/**
 * Free symbols covered by neither a variable nor a constant binding.
 */
export class UnboundSymbolError extends NumfuseError {
  constructor(
    public readonly symbols: readonly string[],
    variables: readonly string[],
  ) {
    super(
      `Expression contains unbound symbols: ${symbols.join(', ')}. ` +
        `Declare them in vars=(${variables.join(', ')}) or bind them to constant values.`,
      'UNBOUND_SYMBOL',
    );
    this.name = 'UnboundSymbolError';
  }
}

export class OverlappingBindingError extends NumfuseError {
  constructor(public readonly symbols: readonly string[]) {
    super(
      `Symbol bindings overlap with vars (would overwrite argument values): ${symbols.join(', ')}`,
      'OVERLAPPING_BINDING',
    );
    this.name = 'OverlappingBindingError';
  }
}

export class InvalidBindingError extends NumfuseError {
  constructor(message: string) {
    super(message, 'INVALID_BINDING');
    this.name = 'InvalidBindingError';
  }
}

/**
 * Function applications that would print as bare calls with nothing bound
 * to them. Lists every such function, sorted.
 */
export class UnboundFunctionError extends NumfuseError {
  constructor(public readonly functions: readonly string[]) {
    super(
      `Expression contains unknown function(s) that require a numeric implementation: ${functions.join(', ')}. ` +
        `Give the definition a numeric implementation or bind the function to a callable.`,
      'UNBOUND_FUNCTION',
    );
    this.name = 'UnboundFunctionError';
  }
}

/**
 * Arguments at call time do not line up with the free variables.
 */
export class CallArityMismatchError extends NumfuseError {
  constructor(
    message: string,
    public readonly missing: readonly string[],
    public readonly unexpected: readonly string[],
  ) {
    super(message, 'CALL_ARITY_MISMATCH');
    this.name = 'CallArityMismatchError';
  }
}

export class MissingDynamicContextError extends NumfuseError {
  constructor(public readonly symbols: readonly string[]) {
    super(
      `Dynamic variable(s) ${symbols.join(', ')} require a parameter context; ` +
        `attach one with setParameterContext().`,
      'MISSING_DYNAMIC_CONTEXT',
    );
    this.name = 'MissingDynamicContextError';
  }
}

export class MissingContextSymbolError extends NumfuseError {
  constructor(public readonly symbol: string) {
    super(`Parameter context has no value for dynamic variable ${symbol}`, 'MISSING_CONTEXT_SYMBOL');
    this.name = 'MissingContextSymbolError';
  }
}
