import { InvalidConstructionError } from "./errors";
import {
  allocate,
  bufferFrom,
  dtypeOf,
  flattenNested,
  isFloatDType,
  normalizeAxis,
  sizeOf,
  sliceIndices,
  stridesOf,
  takeAlongAxis,
  toNested,
  transposeBuffer,
  type DType,
  type NestedNumbers,
  type NumericBuffer,
  type Shape,
} from "./ndarray";
import { toUnit, type Unit, type UnitLike } from "./unit";
import { baseUnitFor, resolveUnitSystem, type UnitSystemLike } from "./unit-system";

export type QuantityInput = NestedNumbers | NumericBuffer | ArrayLike<number> | Quantity;

export interface QuantityOptions {
  dtype?: DType;
  shape?: Shape;
  /** When false, a typed-array input of matching dtype is used as the buffer directly. */
  copy?: boolean;
}

/** `[dtype, shape, units, values]`; values stay numbers, callers encode non-finite ones. */
export type QuantityState = [DType, number[], string, number[]];

const isBuffer = (value: unknown): value is NumericBuffer =>
  value instanceof Float64Array ||
  value instanceof Float32Array ||
  value instanceof Int32Array ||
  value instanceof Uint8Array;

const isArrayLike = (value: unknown): value is ArrayLike<number> =>
  typeof value === "object" && value !== null && "length" in value && !Array.isArray(value);

/**
 * N-dimensional numeric array with units. Values live in a flat row-major
 * typed array; `shape` describes how to read it.
 */
export class Quantity {
  buffer: NumericBuffer;
  shape: number[];
  units: Unit;

  constructor(input: QuantityInput, units?: UnitLike, options: QuantityOptions = {}) {
    if (input instanceof Quantity) {
      const target = units === undefined ? input.units : toUnit(units);
      const factor = input.units.conversionFactorTo(target);
      const dtype = options.dtype ?? input.dtype;
      this.buffer = bufferFrom(dtype, factor === 1 ? input.buffer : Array.from(input.buffer, (v) => v * factor));
      this.shape = [...(options.shape ?? input.shape)];
      this.units = target;
    } else if (isBuffer(input)) {
      const dtype = options.dtype ?? dtypeOf(input);
      this.buffer = options.copy === false && dtype === dtypeOf(input) ? input : bufferFrom(dtype, input);
      this.shape = [...(options.shape ?? [input.length])];
      this.units = toUnit(units);
    } else if (typeof input === "number" || typeof input === "boolean" || Array.isArray(input)) {
      const { values, shape } = flattenNested(input);
      this.buffer = bufferFrom(options.dtype ?? "float64", values);
      this.shape = [...(options.shape ?? shape)];
      this.units = toUnit(units);
    } else if (isArrayLike(input)) {
      this.buffer = bufferFrom(options.dtype ?? "float64", Array.from(input));
      this.shape = [...(options.shape ?? [input.length])];
      this.units = toUnit(units);
    } else {
      throw new InvalidConstructionError("Quantity input must be numeric data");
    }
    if (sizeOf(this.shape) !== this.buffer.length) {
      throw new InvalidConstructionError(
        `cannot shape ${this.buffer.length} values as (${this.shape.join(",")})`,
      );
    }
  }

  /** Wrap an existing buffer without copying. */
  static fromBuffer(buffer: NumericBuffer, shape: Shape, units: Unit): Quantity {
    return new Quantity(buffer, units, { shape, copy: false });
  }

  get dtype(): DType {
    return dtypeOf(this.buffer);
  }

  get size(): number {
    return this.buffer.length;
  }

  get ndim(): number {
    return this.shape.length;
  }

  /** Flat numeric values (no units). */
  get values(): NumericBuffer {
    return this.buffer;
  }

  toArray(): NestedNumbers {
    return toNested(this.buffer, this.shape);
  }

  item(...indices: number[]): number {
    if (indices.length === 0) {
      if (this.size !== 1) throw new RangeError("item() without indices needs a single-element array");
      return this.buffer[0];
    }
    if (indices.length !== this.ndim) {
      throw new RangeError(`expected ${this.ndim} indices, got ${indices.length}`);
    }
    const strides = stridesOf(this.shape);
    const offset = indices.reduce((acc, idx, axis) => {
      const n = this.shape[axis];
      const i = idx < 0 ? idx + n : idx;
      if (i < 0 || i >= n) throw new RangeError(`index ${idx} is out of bounds for axis ${axis} with size ${n}`);
      return acc + i * strides[axis];
    }, 0);
    return this.buffer[offset];
  }

  private derive(buffer: NumericBuffer, shape: Shape, units: Unit = this.units): Quantity {
    return Quantity.fromBuffer(buffer, shape, units);
  }

  copy(): Quantity {
    return this.derive(this.buffer.slice(), this.shape);
  }

  /** Ints and bools cannot hold scaled values; move them to float64 first. */
  private promoteToFloat() {
    if (!isFloatDType(this.dtype)) {
      this.buffer = bufferFrom("float64", this.buffer);
    }
  }

  /** Multiply every value in place. */
  scaleInPlace(factor: number): void {
    if (factor === 1) return;
    this.promoteToFloat();
    const buffer = this.buffer;
    for (let i = 0; i < buffer.length; i += 1) buffer[i] *= factor;
  }

  divideInPlace(divisor: number): void {
    if (divisor === 1) return;
    this.promoteToFloat();
    const buffer = this.buffer;
    for (let i = 0; i < buffer.length; i += 1) buffer[i] /= divisor;
  }

  convertToUnits(units: UnitLike): void {
    const target = toUnit(units);
    this.scaleInPlace(this.units.conversionFactorTo(target));
    this.units = target;
  }

  inUnits(units: UnitLike): Quantity {
    const out = this.copy();
    out.convertToUnits(units);
    return out;
  }

  convertToBase(system: UnitSystemLike = "cgs"): void {
    this.convertToUnits(baseUnitFor(resolveUnitSystem(system), this.units.dimensions));
  }

  inBase(system: UnitSystemLike = "cgs"): Quantity {
    const out = this.copy();
    out.convertToBase(system);
    return out;
  }

  /** Numeric values expressed in `units`. */
  to(units: UnitLike): NumericBuffer {
    return this.inUnits(units).buffer;
  }

  astype(dtype: DType): Quantity {
    return this.derive(bufferFrom(dtype, this.buffer), this.shape);
  }

  view(): Quantity {
    return this.derive(this.buffer, this.shape);
  }

  reshape(...shape: number[]): Quantity {
    const unknown = shape.filter((n) => n === -1).length;
    if (unknown > 1) throw new RangeError("can only specify one unknown dimension");
    const known = sizeOf(shape.filter((n) => n !== -1));
    const resolved = shape.map((n) => (n === -1 ? (known === 0 ? 0 : this.size / known) : n));
    if (sizeOf(resolved) !== this.size || resolved.some((n) => !Number.isInteger(n))) {
      throw new RangeError(`cannot reshape array of size ${this.size} into shape (${shape.join(",")})`);
    }
    return this.derive(this.buffer, resolved);
  }

  ravel(): Quantity {
    return this.derive(this.buffer, [this.size]);
  }

  flatten(): Quantity {
    return this.derive(this.buffer.slice(), [this.size]);
  }

  transpose(axes?: readonly number[]): Quantity {
    const order = axes
      ? axes.map((axis) => normalizeAxis(axis, this.ndim))
      : this.shape.map((_, i) => this.ndim - 1 - i);
    if (order.length !== this.ndim || new Set(order).size !== this.ndim) {
      throw new RangeError("axes don't match array");
    }
    const { buffer, shape } = transposeBuffer(this.buffer, this.shape, order);
    return this.derive(buffer, shape);
  }

  swapaxes(axis1: number, axis2: number): Quantity {
    const order = this.shape.map((_, i) => i);
    const a = normalizeAxis(axis1, this.ndim);
    const b = normalizeAxis(axis2, this.ndim);
    [order[a], order[b]] = [order[b], order[a]];
    return this.transpose(order);
  }

  /** Sub-array at `index` along the first axis. */
  index(index: number): Quantity {
    if (this.ndim === 0) throw new RangeError("cannot index a 0-d array");
    const { buffer, shape } = takeAlongAxis(this.buffer, this.shape, [index], 0);
    return this.derive(buffer, shape.slice(1));
  }

  slice(start?: number, stop?: number, step?: number): Quantity {
    if (this.ndim === 0) throw new RangeError("cannot slice a 0-d array");
    return this.take(sliceIndices(this.shape[0], start, stop, step), 0);
  }

  take(indices: readonly number[], axis?: number): Quantity {
    if (axis === undefined) {
      const { buffer, shape } = takeAlongAxis(this.buffer, [this.size], indices, 0);
      return this.derive(buffer, shape);
    }
    const { buffer, shape } = takeAlongAxis(this.buffer, this.shape, indices, normalizeAxis(axis, this.ndim));
    return this.derive(buffer, shape);
  }

  compress(condition: readonly boolean[], axis?: number): Quantity {
    const indices = condition.flatMap((keep, i) => (keep ? [i] : []));
    return this.take(indices, axis);
  }

  repeat(repeats: number, axis?: number): Quantity {
    if (!Number.isInteger(repeats) || repeats < 0) throw new RangeError("repeats must be a non-negative integer");
    const source = axis === undefined ? this.ravel() : this;
    const resolvedAxis = axis === undefined ? 0 : normalizeAxis(axis, this.ndim);
    const length = source.shape[resolvedAxis];
    const indices: number[] = [];
    for (let i = 0; i < length; i += 1) {
      for (let r = 0; r < repeats; r += 1) indices.push(i);
    }
    return source.take(indices, resolvedAxis);
  }

  diagonal(offset = 0): Quantity {
    if (this.ndim !== 2) throw new RangeError("diagonal requires a 2-d array");
    const [rows, cols] = this.shape;
    const values: number[] = [];
    for (let r = Math.max(0, -offset); r < rows && r + offset < cols; r += 1) {
      values.push(this.buffer[r * cols + r + offset]);
    }
    return this.derive(bufferFrom(this.dtype, values), [values.length]);
  }

  /** Copy with the bytes of every element reversed. */
  byteswap(): Quantity {
    const out = this.buffer.slice();
    const width = out.BYTES_PER_ELEMENT;
    if (width > 1) {
      const bytes = new Uint8Array(out.buffer, out.byteOffset, out.byteLength);
      for (let start = 0; start < bytes.length; start += width) {
        bytes.subarray(start, start + width).reverse();
      }
    }
    return this.derive(out, this.shape);
  }

  onesLike(): Quantity {
    const out = allocate(this.dtype, this.size);
    out.fill(1);
    return this.derive(out, this.shape);
  }

  getState(): QuantityState {
    return [this.dtype, [...this.shape], this.units.expr, Array.from(this.buffer)];
  }

  static fromState(state: QuantityState): Quantity {
    const [dtype, shape, units, values] = state;
    return new Quantity(values, units, { dtype, shape });
  }

  toString(): string {
    return `${JSON.stringify(this.toArray())} ${this.units.expr}`;
  }
}
