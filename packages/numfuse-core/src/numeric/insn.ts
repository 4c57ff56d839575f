/**
 * Instruction chain for compiled expressions
 *
 * An expression lowers to a linked chain of instructions over a value stack.
 * Each instruction returns the next instruction to execute; the chain ends
 * with null and leaves the result on top of the stack.
 */

import type { VM } from './vm.js';
import { type NumericValue, asarray, broadcastShape, zeros } from '../ndarray/ndarray.js';
import { type Ufunc, add, multiply, power, applyUfunc } from '../ndarray/ufuncs.js';

/**
 * Base class for all instructions
 */
export abstract class Insn {
  constructor(readonly next: Insn | null) {}

  /**
   * Execute this instruction
   *
   * @returns The next instruction to execute, or null if done
   */
  abstract execute(vm: VM): Insn | null;

  /** One-line listing, as shown by disassemble() */
  abstract toString(): string;
}

/**
 * Pop n values, returned in push order
 */
function popArgs(vm: VM, n: number): NumericValue[] {
  const args = new Array<NumericValue>(n);
  for (let i = n - 1; i >= 0; i--) {
    args[i] = vm.pop();
  }
  return args;
}

/**
 * Push a constant value onto the stack
 */
export class ConstantInsn extends Insn {
  constructor(
    private readonly value: NumericValue,
    next: Insn | null
  ) {
    super(next);
  }

  execute(vm: VM): Insn | null {
    vm.push(this.value);
    return this.next;
  }

  toString(): string {
    return `const ${this.value}`;
  }
}

/**
 * Push a call argument
 */
export class ArgRefInsn extends Insn {
  constructor(
    private readonly index: number,
    next: Insn | null
  ) {
    super(next);
  }

  execute(vm: VM): Insn | null {
    vm.push(vm.getFrame(this.index));
    return this.next;
  }

  toString(): string {
    return `arg ${this.index}`;
  }
}

/**
 * Push a value from the captured constant-bindings table
 */
export class BindingRefInsn extends Insn {
  constructor(
    private readonly index: number,
    private readonly name: string,
    next: Insn | null
  ) {
    super(next);
  }

  execute(vm: VM): Insn | null {
    vm.push(vm.getBinding(this.index));
    return this.next;
  }

  toString(): string {
    return `binding ${this.index} ${this.name}`;
  }
}

/**
 * Array primitive the VM can apply
 */
export type Primitive =
  | { readonly kind: 'add' }
  | { readonly kind: 'multiply' }
  | { readonly kind: 'power' }
  | { readonly kind: 'ufunc'; readonly ufunc: Ufunc };

function primitiveName(primitive: Primitive): string {
  return primitive.kind === 'ufunc' ? primitive.ufunc.name : primitive.kind;
}

function applyPrimitive(primitive: Primitive, args: NumericValue[]): NumericValue {
  switch (primitive.kind) {
    case 'add':
      return add(...args);
    case 'multiply':
      return multiply(...args);
    case 'power':
      return power(args[0], args[1]);
    case 'ufunc':
      return applyUfunc(primitive.ufunc, args);
  }
}

/**
 * Apply an array primitive to the top nArgs values
 */
export class PrimitiveInsn extends Insn {
  constructor(
    private readonly primitive: Primitive,
    private readonly nArgs: number,
    next: Insn | null
  ) {
    super(next);
  }

  execute(vm: VM): Insn | null {
    const args = popArgs(vm, this.nArgs);
    vm.push(applyPrimitive(this.primitive, args));
    return this.next;
  }

  toString(): string {
    return `primitive ${primitiveName(this.primitive)}/${this.nArgs}`;
  }
}

/**
 * Call a bound function by name with the top nArgs values
 */
export class CallInsn extends Insn {
  constructor(
    private readonly name: string,
    private readonly nArgs: number,
    next: Insn | null
  ) {
    super(next);
  }

  execute(vm: VM): Insn | null {
    const fn = vm.getFunction(this.name);
    const args = popArgs(vm, this.nArgs);
    vm.push(asarray(fn(...args)));
    return this.next;
  }

  toString(): string {
    return `call ${this.name}/${this.nArgs}`;
  }
}

/**
 * Broadcast the top value to the common shape of all arguments
 */
export class BroadcastInsn extends Insn {
  execute(vm: VM): Insn | null {
    const value = vm.pop();
    const shape = broadcastShape(...vm.frameValues());
    vm.push(add(value, zeros(shape)));
    return this.next;
  }

  toString(): string {
    return 'broadcast';
  }
}

/**
 * Coerce every argument to an array value
 */
export class VectorizeInsn extends Insn {
  execute(vm: VM): Insn | null {
    for (let i = 0; i < vm.frameSize(); i++) {
      vm.setFrame(i, asarray(vm.getFrameInput(i)));
    }
    return this.next;
  }

  toString(): string {
    return 'vectorize';
  }
}

/**
 * Listing of an instruction chain, one instruction per line
 */
export function disassemble(insn: Insn | null): string[] {
  const lines: string[] = [];
  for (let current = insn; current; current = current.next) {
    lines.push(current.toString());
  }
  return lines;
}
