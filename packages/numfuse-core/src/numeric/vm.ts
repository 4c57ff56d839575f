/**
 * Virtual machine for compiled expressions
 *
 * The VM executes an instruction chain. It maintains:
 * - a value stack for computation
 * - the argument frame of the current call
 * - the namespace the chain may read: the constant-bindings table and the
 *   bound callables
 *
 * A VM is cheap; compiled functions create one per call.
 */

import type { Insn } from './insn.js';
import type { NumericCallable } from '../algebra/functions.js';
import { type NumericInput, type NumericValue, isNumericValue } from '../ndarray/ndarray.js';

export interface Namespace {
  readonly bindings: readonly NumericValue[];
  readonly functions: ReadonlyMap<string, NumericCallable>;
}

const EMPTY_NAMESPACE: Namespace = { bindings: [], functions: new Map() };

export class VM {
  /** Value stack pointer - points to next free slot */
  private sp: number = 0;

  private stack: NumericValue[] = [];

  private readonly stackLimit: number = 10000;

  /** Arguments of the current call */
  private frame: NumericInput[] = [];

  constructor(private readonly namespace: Namespace = EMPTY_NAMESPACE) {}

  push(value: NumericValue): void {
    if (this.sp >= this.stackLimit) {
      throw new Error('Stack overflow');
    }
    this.stack[this.sp++] = value;
  }

  pop(): NumericValue {
    if (this.sp <= 0) {
      throw new Error('Stack underflow');
    }
    return this.stack[--this.sp];
  }

  peek(): NumericValue {
    if (this.sp <= 0) {
      throw new Error('Stack underflow');
    }
    return this.stack[this.sp - 1];
  }

  stackSize(): number {
    return this.sp;
  }

  frameSize(): number {
    return this.frame.length;
  }

  /**
   * Raw argument as passed by the caller
   */
  getFrameInput(index: number): NumericInput {
    if (index < 0 || index >= this.frame.length) {
      throw new Error(`Frame index ${index} out of bounds`);
    }
    return this.frame[index];
  }

  /**
   * Argument as an array value; without vectorization, arguments must
   * already be numbers or arrays
   */
  getFrame(index: number): NumericValue {
    const value = this.getFrameInput(index);
    if (!isNumericValue(value)) {
      throw new Error(`Argument ${index} must be a number or NDArray when not vectorizing`);
    }
    return value;
  }

  setFrame(index: number, value: NumericValue): void {
    if (index < 0 || index >= this.frame.length) {
      throw new Error(`Frame index ${index} out of bounds`);
    }
    this.frame[index] = value;
  }

  frameValues(): NumericValue[] {
    return this.frame.map((_, i) => this.getFrame(i));
  }

  getBinding(index: number): NumericValue {
    if (index < 0 || index >= this.namespace.bindings.length) {
      throw new Error(`Binding index ${index} out of bounds`);
    }
    return this.namespace.bindings[index];
  }

  getFunction(name: string): NumericCallable {
    const fn = this.namespace.functions.get(name);
    if (!fn) {
      throw new Error(`No callable bound for ${name}`);
    }
    return fn;
  }

  /**
   * Evaluate an instruction chain against a list of arguments
   *
   * The inner loop: `while (insn) insn = insn.execute(vm)`
   */
  eval(insn: Insn | null, args: readonly NumericInput[] = []): NumericValue {
    this.sp = 0;
    this.stack = [];
    this.frame = [...args];

    const trace = Boolean(process.env.DEBUG_VM);
    while (insn) {
      if (trace) {
        console.error(`[VM] ${insn} sp=${this.sp}`);
      }
      insn = insn.execute(this);
    }

    if (this.sp > 0) {
      const result = this.pop();
      if (this.sp !== 0) {
        throw new Error('Stack not empty after evaluation');
      }
      return result;
    }

    throw new Error('No result on stack');
  }
}
