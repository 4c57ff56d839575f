/**
 * N-dimensional numeric arrays
 *
 * The array layer compiled code sees. Values are either plain numbers (the
 * 0-d case) or NDArray instances holding a dense row-major Float64Array.
 * Binary operations follow the usual broadcasting rules: shapes are aligned
 * from the right and every dimension must match or be 1.
 */

/**
 * Nested JavaScript arrays of numbers
 */
export type NestedNumbers = number | readonly NestedNumbers[];

/**
 * A value flowing through compiled code
 */
export type NumericValue = number | NDArray;

/**
 * Anything asarray() accepts
 */
export type NumericInput = NestedNumbers | Float64Array | NDArray;

/**
 * Dense row-major array with a fixed shape
 */
export class NDArray {
  readonly size: number;

  constructor(
    readonly data: Float64Array,
    readonly shape: readonly number[]
  ) {
    this.size = shapeSize(shape);
    if (data.length !== this.size) {
      throw new Error(`NDArray data has ${data.length} elements but shape ${formatShape(shape)} needs ${this.size}`);
    }
  }

  get ndim(): number {
    return this.shape.length;
  }

  /**
   * Read one element by its multi-index
   */
  get(...index: number[]): number {
    if (index.length !== this.shape.length) {
      throw new Error(`Expected ${this.shape.length} indices, got ${index.length}`);
    }
    let flat = 0;
    for (let d = 0; d < index.length; d++) {
      const i = index[d];
      if (!Number.isInteger(i) || i < 0 || i >= this.shape[d]) {
        throw new Error(`Index ${i} out of bounds for axis ${d} with size ${this.shape[d]}`);
      }
      flat = flat * this.shape[d] + i;
    }
    return this.data[flat];
  }

  /**
   * Convert back to nested JavaScript arrays
   */
  toArray(): NestedNumbers {
    return nest(this.data, this.shape, 0, 0);
  }

  toString(): string {
    return formatNested(this.toArray());
  }
}

function shapeSize(shape: readonly number[]): number {
  let size = 1;
  for (const dim of shape) {
    if (!Number.isInteger(dim) || dim < 0) {
      throw new Error(`Invalid array dimension: ${dim}`);
    }
    size *= dim;
  }
  return size;
}

function nest(data: Float64Array, shape: readonly number[], depth: number, offset: number): NestedNumbers {
  if (depth === shape.length) {
    return data[offset];
  }
  const stride = shapeSize(shape.slice(depth + 1));
  const out: NestedNumbers[] = [];
  for (let i = 0; i < shape[depth]; i++) {
    out.push(nest(data, shape, depth + 1, offset + i * stride));
  }
  return out;
}

function formatNested(value: NestedNumbers): string {
  if (typeof value === 'number') {
    return String(value);
  }
  return `[${value.map(formatNested).join(', ')}]`;
}

export function formatShape(shape: readonly number[]): string {
  return `(${shape.join(',')})`;
}

export function isNDArray(value: unknown): value is NDArray {
  return value instanceof NDArray;
}

export function isNumericValue(value: unknown): value is NumericValue {
  return typeof value === 'number' || value instanceof NDArray;
}

/**
 * Wrap data in an array, collapsing the 0-d case to a plain number
 */
export function fromData(data: Float64Array, shape: readonly number[]): NumericValue {
  if (shape.length === 0) {
    return data[0];
  }
  return new NDArray(data, shape);
}

/**
 * Coerce an untyped value to a numeric value, or null if it is not numeric
 */
export function toNumericValue(value: unknown): NumericValue | null {
  if (typeof value === 'number' || value instanceof NDArray) {
    return value;
  }
  if (value instanceof Float64Array) {
    return new NDArray(Float64Array.from(value), [value.length]);
  }
  if (!Array.isArray(value)) {
    return null;
  }

  const shape: number[] = [];
  let level: unknown = value;
  while (Array.isArray(level)) {
    shape.push(level.length);
    if (level.length === 0) break;
    level = level[0];
  }

  const out: number[] = [];
  if (!flatten(value, shape, 0, out)) {
    return null;
  }
  return fromData(Float64Array.from(out), shape);
}

function flatten(value: unknown, shape: readonly number[], depth: number, out: number[]): boolean {
  if (depth === shape.length) {
    if (typeof value !== 'number') return false;
    out.push(value);
    return true;
  }
  if (!Array.isArray(value) || value.length !== shape[depth]) {
    return false;
  }
  for (const item of value) {
    if (!flatten(item, shape, depth + 1, out)) return false;
  }
  return true;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'ragged or non-numeric array';
  return typeof value;
}

/**
 * Convert input to an array value, as generated code does for every
 * vectorized parameter at function entry
 */
export function asarray(input: NumericInput): NumericValue {
  const value = toNumericValue(input);
  if (value === null) {
    throw new Error(`asarray: expected numbers or a rectangular array of numbers, got ${describe(input)}`);
  }
  return value;
}

export function shapeOf(value: NumericValue): readonly number[] {
  return typeof value === 'number' ? [] : value.shape;
}

/**
 * Shape of the result of broadcasting the given shapes together
 */
export function broadcastShapes(...shapes: (readonly number[])[]): number[] {
  const ndim = Math.max(0, ...shapes.map(s => s.length));
  const result = new Array<number>(ndim).fill(1);

  for (const shape of shapes) {
    const offset = ndim - shape.length;
    for (let i = 0; i < shape.length; i++) {
      const dim = shape[i];
      const current = result[i + offset];
      if (dim === current || dim === 1) continue;
      if (current === 1) {
        result[i + offset] = dim;
        continue;
      }
      throw new Error(`operands could not be broadcast together with shapes ${shapes.map(formatShape).join(' ')}`);
    }
  }

  return result;
}

/**
 * Broadcast shape of a set of values
 */
export function broadcastShape(...values: NumericValue[]): number[] {
  return broadcastShapes(...values.map(shapeOf));
}

export function zeros(shape: readonly number[]): NumericValue {
  return fromData(new Float64Array(shapeSize(shape)), shape);
}

export function zerosLike(value: NumericValue): NumericValue {
  return zeros(shapeOf(value));
}

export function full(shape: readonly number[], fill: number): NumericValue {
  return fromData(new Float64Array(shapeSize(shape)).fill(fill), shape);
}

/**
 * Per-axis strides for reading an operand of `shape` while iterating `outShape`
 * (zero along broadcast axes)
 */
function broadcastStrides(shape: readonly number[], outShape: readonly number[]): number[] {
  const offset = outShape.length - shape.length;
  const strides = new Array<number>(outShape.length).fill(0);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i + offset] = shape[i] === 1 ? 0 : stride;
    stride *= shape[i];
  }
  return strides;
}

function sourceIndex(flat: number, outShape: readonly number[], strides: readonly number[]): number {
  let index = 0;
  let rest = flat;
  for (let d = outShape.length - 1; d >= 0; d--) {
    const coord = rest % outShape[d];
    rest = (rest - coord) / outShape[d];
    index += coord * strides[d];
  }
  return index;
}

/**
 * Apply a scalar function element-wise
 */
export function map(value: NumericValue, fn: (x: number) => number): NumericValue {
  if (typeof value === 'number') {
    return fn(value);
  }
  const out = new Float64Array(value.size);
  for (let i = 0; i < value.size; i++) {
    out[i] = fn(value.data[i]);
  }
  return new NDArray(out, value.shape);
}

/**
 * Apply a scalar binary function element-wise with broadcasting
 */
export function zipWith(a: NumericValue, b: NumericValue, fn: (x: number, y: number) => number): NumericValue {
  if (typeof a === 'number' && typeof b === 'number') {
    return fn(a, b);
  }

  const outShape = broadcastShapes(shapeOf(a), shapeOf(b));
  const aData = typeof a === 'number' ? Float64Array.of(a) : a.data;
  const bData = typeof b === 'number' ? Float64Array.of(b) : b.data;
  const aStrides = broadcastStrides(shapeOf(a), outShape);
  const bStrides = broadcastStrides(shapeOf(b), outShape);

  const out = new Float64Array(shapeSize(outShape));
  for (let i = 0; i < out.length; i++) {
    out[i] = fn(aData[sourceIndex(i, outShape, aStrides)], bData[sourceIndex(i, outShape, bStrides)]);
  }
  return fromData(out, outShape);
}
