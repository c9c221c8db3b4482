export const DTYPES = ["float64", "float32", "int32", "bool"] as const;

export type DType = typeof DTYPES[number];

export type NumericBuffer = Float64Array | Float32Array | Int32Array | Uint8Array;

export type Shape = readonly number[];

export const allocate = (dtype: DType, length: number): NumericBuffer => {
  switch (dtype) {
    case "float64":
      return new Float64Array(length);
    case "float32":
      return new Float32Array(length);
    case "int32":
      return new Int32Array(length);
    case "bool":
      return new Uint8Array(length);
  }
};

export const bufferFrom = (dtype: DType, values: ArrayLike<number>): NumericBuffer => {
  const out = allocate(dtype, values.length);
  if (dtype === "bool") {
    for (let i = 0; i < values.length; i += 1) out[i] = values[i] ? 1 : 0;
  } else if (dtype === "int32") {
    // Truncate toward zero like a C cast.
    for (let i = 0; i < values.length; i += 1) out[i] = Math.trunc(values[i]);
  } else {
    out.set(values);
  }
  return out;
};

export const dtypeOf = (buffer: NumericBuffer): DType => {
  if (buffer instanceof Float64Array) return "float64";
  if (buffer instanceof Float32Array) return "float32";
  if (buffer instanceof Int32Array) return "int32";
  return "bool";
};

export const isFloatDType = (dtype: DType) => dtype === "float64" || dtype === "float32";

export const sizeOf = (shape: Shape): number => shape.reduce((acc, n) => acc * n, 1);

export const stridesOf = (shape: Shape): number[] => {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let axis = shape.length - 1; axis >= 0; axis -= 1) {
    strides[axis] = stride;
    stride *= shape[axis];
  }
  return strides;
};

export const sameShape = (a: Shape, b: Shape) =>
  a.length === b.length && a.every((n, i) => n === b[i]);

export const normalizeAxis = (axis: number, ndim: number): number => {
  const resolved = axis < 0 ? axis + ndim : axis;
  if (resolved < 0 || resolved >= ndim) {
    throw new RangeError(`axis ${axis} is out of bounds for array of dimension ${ndim}`);
  }
  return resolved;
};

/** Broadcast shapes right-aligned; size-1 axes stretch. */
export const broadcastShapes = (...shapes: Shape[]): number[] => {
  const ndim = Math.max(0, ...shapes.map((s) => s.length));
  const out = new Array<number>(ndim).fill(1);
  for (const shape of shapes) {
    const offset = ndim - shape.length;
    shape.forEach((n, i) => {
      const current = out[offset + i];
      if (n === current || n === 1) return;
      if (current !== 1) {
        throw new RangeError(
          `operands could not be broadcast together with shapes ${shapes
            .map((s) => `(${s.join(",")})`)
            .join(" ")}`,
        );
      }
      out[offset + i] = n;
    });
  }
  return out;
};

/**
 * Flat source offsets for every element of `target` when `source` is
 * broadcast against it.
 */
export const broadcastOffsets = (source: Shape, target: Shape): Int32Array => {
  const total = sizeOf(target);
  const offsets = new Int32Array(total);
  if (sameShape(source, target)) {
    for (let i = 0; i < total; i += 1) offsets[i] = i;
    return offsets;
  }
  const pad = target.length - source.length;
  const srcStrides = stridesOf(source);
  const strides = target.map((_, axis) => {
    const srcAxis = axis - pad;
    if (srcAxis < 0 || source[srcAxis] === 1) return 0;
    return srcStrides[srcAxis];
  });
  const index = new Array<number>(target.length).fill(0);
  let offset = 0;
  for (let i = 0; i < total; i += 1) {
    offsets[i] = offset;
    for (let axis = target.length - 1; axis >= 0; axis -= 1) {
      index[axis] += 1;
      offset += strides[axis];
      if (index[axis] < target[axis]) break;
      offset -= strides[axis] * index[axis];
      index[axis] = 0;
    }
  }
  return offsets;
};

/** Row-major copy of `buffer` with its axes permuted. */
export const transposeBuffer = (
  buffer: NumericBuffer,
  shape: Shape,
  axes: readonly number[],
): { buffer: NumericBuffer; shape: number[] } => {
  const outShape = axes.map((axis) => shape[axis]);
  const srcStrides = stridesOf(shape);
  const permutedStrides = axes.map((axis) => srcStrides[axis]);
  const out = allocate(dtypeOf(buffer), buffer.length);
  const index = new Array<number>(outShape.length).fill(0);
  let offset = 0;
  for (let i = 0; i < out.length; i += 1) {
    out[i] = buffer[offset];
    for (let axis = outShape.length - 1; axis >= 0; axis -= 1) {
      index[axis] += 1;
      offset += permutedStrides[axis];
      if (index[axis] < outShape[axis]) break;
      offset -= permutedStrides[axis] * index[axis];
      index[axis] = 0;
    }
  }
  return { buffer: out, shape: outShape };
};

/** Select `indices` along `axis`. Negative indices count from the end. */
export const takeAlongAxis = (
  buffer: NumericBuffer,
  shape: Shape,
  indices: readonly number[],
  axis: number,
): { buffer: NumericBuffer; shape: number[] } => {
  const length = shape[axis];
  const resolved = indices.map((idx) => {
    const i = idx < 0 ? idx + length : idx;
    if (i < 0 || i >= length) {
      throw new RangeError(`index ${idx} is out of bounds for axis ${axis} with size ${length}`);
    }
    return i;
  });
  const outer = sizeOf(shape.slice(0, axis));
  const inner = sizeOf(shape.slice(axis + 1));
  const outShape = [...shape];
  outShape[axis] = resolved.length;
  const out = allocate(dtypeOf(buffer), outer * resolved.length * inner);
  let cursor = 0;
  for (let o = 0; o < outer; o += 1) {
    for (const i of resolved) {
      const start = (o * length + i) * inner;
      out.set(buffer.subarray(start, start + inner), cursor);
      cursor += inner;
    }
  }
  return { buffer: out, shape: outShape };
};

/** Slice bounds (negative indices count from the end) for an axis of `length`. */
export const sliceIndices = (
  length: number,
  start?: number,
  stop?: number,
  step = 1,
): number[] => {
  if (step === 0) throw new RangeError("slice step cannot be zero");
  const clamp = (value: number, lo: number, hi: number) => Math.min(Math.max(value, lo), hi);
  const resolve = (value: number) => (value < 0 ? value + length : value);
  const out: number[] = [];
  if (step > 0) {
    const from = start === undefined ? 0 : clamp(resolve(start), 0, length);
    const to = stop === undefined ? length : clamp(resolve(stop), 0, length);
    for (let i = from; i < to; i += step) out.push(i);
  } else {
    const from = start === undefined ? length - 1 : clamp(resolve(start), -1, length - 1);
    const to = stop === undefined ? -1 : clamp(resolve(stop), -1, length - 1);
    for (let i = from; i > to; i += step) out.push(i);
  }
  return out;
};

/** Nested arrays of numbers (any depth) flattened with their shape. */
export type NestedNumbers = number | boolean | readonly NestedNumbers[];

export const flattenNested = (input: NestedNumbers): { values: number[]; shape: number[] } => {
  if (!Array.isArray(input)) {
    return { values: [Number(input)], shape: [] };
  }
  if (input.length === 0) return { values: [], shape: [0] };
  const parts = input.map((item) => flattenNested(item));
  const inner = parts[0].shape;
  for (const part of parts) {
    if (!sameShape(part.shape, inner)) {
      throw new RangeError("nested input is ragged; every row must have the same shape");
    }
  }
  return {
    values: parts.flatMap((part) => part.values),
    shape: [input.length, ...inner],
  };
};

/** Rebuild nested arrays from a flat buffer. */
export const toNested = (buffer: ArrayLike<number>, shape: Shape): NestedNumbers => {
  if (shape.length === 0) return buffer[0];
  const build = (offset: number, depth: number): NestedNumbers[] => {
    const n = shape[depth];
    const stride = sizeOf(shape.slice(depth + 1));
    const row: NestedNumbers[] = [];
    for (let i = 0; i < n; i += 1) {
      row.push(depth === shape.length - 1 ? buffer[offset + i] : build(offset + i * stride, depth + 1));
    }
    return row;
  };
  return build(0, 0);
};
