import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { run, parseValue, parseAssignment, type CliIO } from './program.js';

let out: string;
let err: string;
const io: CliIO = {
  stdout: text => {
    out += text;
  },
  stderr: text => {
    err += text;
  },
};

beforeEach(() => {
  out = '';
  err = '';
});

describe('CLI - Evaluation', () => {
  it('should evaluate with default variables', () => {
    expect(run(['(+ x y)', '--eval', '2', '3'], io)).toBe(0);
    expect(out).toBe('5\n');
    expect(err).toBe('');
  });

  it('should broadcast constants over array arguments', () => {
    expect(run(['5', '--vars', 'x', '--eval', '1,2,3'], io)).toBe(0);
    expect(out).toBe('[5, 5, 5]\n');
  });

  it('should freeze variables', () => {
    expect(run(['(* a x)', '--vars', 'x', 'a', '--freeze', 'a=2', '--eval', '3'], io)).toBe(0);
    expect(out).toBe('6\n');
  });

  it('should pass keyed arguments to named slots', () => {
    const argv = ['(+ x y g)', '--vars', 'x', 'y', '--keyed', 'gain=g', '--eval', '2', '3', '--kw', 'gain=4'];
    expect(run(argv, io)).toBe(0);
    expect(out).toBe('9\n');
  });

  describe('with an expression file', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'numfuse-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should read the expression from the file', () => {
      const file = path.join(dir, 'triple.sexp');
      fs.writeFileSync(file, '; triple\n(* 3 x)\n');
      expect(run(['--file', file, '--eval', '2'], io)).toBe(0);
      expect(out).toBe('6\n');
    });
  });
});

describe('CLI - Source', () => {
  it('should print the generated source', () => {
    expect(run(['(* a x)', '--bind', 'a=2', '--source'], io)).toBe(0);
    expect(out).toBe(
      [
        'function _generated(x) {',
        '  x = np.asarray(x);',
        '  const a = _bindings["a"];',
        '  return a * x;',
        '}',
        '',
      ].join('\n')
    );
  });

  it('should omit coercion with --no-vectorize', () => {
    expect(run(['(* 2 x)', '--no-vectorize', '--source'], io)).toBe(0);
    expect(out).toBe('function _generated(x) {\n  return 2 * x;\n}\n');
  });
});

describe('CLI - Errors', () => {
  it('should report parse errors', () => {
    expect(run(['(foo x)'], io)).toBe(1);
    expect(err).toBe('Error: Parse error in <expression> at 1:2: Unknown function: foo\n');
  });

  it('should report unbound symbols', () => {
    expect(run(['(* a x)', '--vars', 'x'], io)).toBe(1);
    expect(err).toBe(
      'Error: Expression contains unbound symbols: a. Declare them in vars=(x) or bind them to constant values.\n'
    );
  });

  it('should report missing arguments', () => {
    expect(run(['(+ x y)', '--eval', '1'], io)).toBe(1);
    expect(err).toBe('Error: Missing argument(s) for: y (signature (x, y))\n');
  });

  it('should report invalid numbers', () => {
    expect(run(['x', '--eval', 'abc'], io)).toBe(1);
    expect(err).toBe('Error: Invalid number: "abc"\n');
  });

  it('should require an expression', () => {
    expect(run([], io)).toBe(1);
    expect(err).toBe('Error: An expression or --file is required\n');
  });

  it('should reject unknown options', () => {
    expect(run(['x', '--bogus'], io)).toBe(1);
    expect(out).toBe('');
  });

  it('should print the version', () => {
    expect(run(['--version'], io)).toBe(0);
    expect(out).toBe('0.1.0\n');
  });
});

describe('CLI - Value parsing', () => {
  it('should parse numbers and comma lists', () => {
    expect(parseValue('2.5')).toBe(2.5);
    expect(parseValue('1, 2,3')).toEqual([1, 2, 3]);
    expect(() => parseValue('1,,2')).toThrow('Invalid number: ""');
  });

  it('should split assignments at the first equals sign', () => {
    expect(parseAssignment('a=2')).toEqual(['a', '2']);
    expect(parseAssignment('x=1,2')).toEqual(['x', '1,2']);
    expect(() => parseAssignment('a')).toThrow('Expected name=value, got "a"');
    expect(() => parseAssignment('=2')).toThrow('Expected name=value, got "=2"');
  });
});
