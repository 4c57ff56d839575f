/**
 * numfuse command line
 *
 * Compiles one S-expression and either prints the generated source or
 * evaluates the compiled function.
 *
 *   numfuse '(+ x (* a (sin y)))' --vars x y --bind a=2 --eval 1 0.5
 *   numfuse '(* g x)' --vars x --keyed gain=g --eval 1,2,3 --kw gain=10
 */

import { Command, CommanderError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import {
  type BindingKey,
  type KeywordArguments,
  type NamedSlots,
  type NumericInput,
  type SymbolExpr,
  type VarSpecInput,
  ExpressionCompiler,
  makeSymbol,
  parseExpression,
} from 'numfuse-core';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
};

interface CliOptions {
  file?: string;
  vars?: string[];
  keyed?: string[];
  bind?: string[];
  freeze?: string[];
  vectorize: boolean;
  expand: boolean;
  source?: boolean;
  eval?: string[];
  kw?: string[];
}

/**
 * A number, or a comma-separated list of numbers as a 1-d array
 */
export function parseValue(text: string): NumericInput {
  const parts = text.split(',').map(part => {
    const trimmed = part.trim();
    const value = Number(trimmed);
    if (trimmed === '' || Number.isNaN(value)) {
      throw new Error(`Invalid number: ${JSON.stringify(part)}`);
    }
    return value;
  });
  return text.includes(',') ? parts : parts[0];
}

/**
 * Split `name=value`
 */
export function parseAssignment(text: string): [string, string] {
  const eq = text.indexOf('=');
  if (eq <= 0 || eq === text.length - 1) {
    throw new Error(`Expected name=value, got ${JSON.stringify(text)}`);
  }
  return [text.slice(0, eq), text.slice(eq + 1)];
}

function buildVars(options: CliOptions): VarSpecInput | undefined {
  if (!options.vars && !options.keyed) {
    return undefined;
  }
  const items: (SymbolExpr | NamedSlots)[] = (options.vars ?? []).map(name => makeSymbol(name));
  if (options.keyed) {
    const named: { [name: string]: SymbolExpr } = {};
    for (const entry of options.keyed) {
      const [slot, symbol] = parseAssignment(entry);
      named[slot] = makeSymbol(symbol);
    }
    items.push(named);
  }
  return items;
}

function execute(expression: string | undefined, options: CliOptions, io: CliIO): void {
  let source: string;
  let file: string;
  if (options.file) {
    file = path.resolve(options.file);
    source = fs.readFileSync(file, 'utf-8');
  } else if (expression !== undefined) {
    file = '<expression>';
    source = expression;
  } else {
    throw new Error('An expression or --file is required');
  }

  const expr = parseExpression(source, { file });

  const bindings = new Map<BindingKey, unknown>();
  for (const entry of options.bind ?? []) {
    const [name, value] = parseAssignment(entry);
    bindings.set(makeSymbol(name), parseValue(value));
  }

  const compiler = new ExpressionCompiler();
  let fn = compiler.compile(expr, {
    vars: buildVars(options),
    bindings,
    vectorize: options.vectorize,
    expandDefinition: options.expand,
  });

  if (options.freeze) {
    const frozen: { [name: string]: NumericInput } = {};
    for (const entry of options.freeze) {
      const [name, value] = parseAssignment(entry);
      frozen[name] = parseValue(value);
    }
    fn = fn.freeze(frozen);
  }

  if (process.env.DEBUG) {
    io.stderr(`signature ${fn.signature}\n`);
  }

  if (options.source) {
    io.stdout(`${fn.source ?? ''}\n`);
    return;
  }

  const keyed: { [name: string]: NumericInput } = {};
  for (const entry of options.kw ?? []) {
    const [name, value] = parseAssignment(entry);
    keyed[name] = parseValue(value);
  }
  const kw: KeywordArguments = keyed;

  const result = fn.invoke((options.eval ?? []).map(parseValue), kw);
  io.stdout(`${String(result)}\n`);
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('numfuse')
    .description('Compile a symbolic expression to a vectorized numeric function')
    .version('0.1.0')
    .argument('[expression]', 'S-expression, e.g. "(+ x (* a (sin y)))"')
    .option('-f, --file <path>', 'Read the expression from a file')
    .option('--vars <names...>', 'Positional variables, in order')
    .option('--keyed <slot=symbol...>', 'Named slots, passed with --kw')
    .option('--bind <symbol=value...>', 'Bind symbols to constant values')
    .option('--freeze <name=value...>', 'Freeze variables after compiling')
    .option('--no-vectorize', 'Do not coerce arguments to arrays')
    .option('--no-expand', 'Do not expand function definitions')
    .option('--source', 'Print the generated source instead of evaluating')
    .option('--eval <values...>', 'Positional arguments; a comma list is an array')
    .option('--kw <slot=value...>', 'Keyed arguments for named slots')
    .exitOverride()
    .configureOutput({
      writeOut: text => io.stdout(text),
      writeErr: text => io.stderr(text),
    })
    .action((expression: string | undefined) => {
      execute(expression, program.opts<CliOptions>(), io);
    });

  return program;
}

/**
 * Run the command line and return the exit status
 */
export function run(argv: readonly string[], io: CliIO = processIO): number {
  const program = createProgram(io);
  try {
    program.parse([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    io.stderr(`Error: ${message}\n`);
    if (process.env.DEBUG && error instanceof Error && error.stack) {
      io.stderr(`${error.stack}\n`);
    }
    return 1;
  }
}
