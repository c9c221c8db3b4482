import { UnitIncompatibleError } from "./errors";
import {
  allocate,
  broadcastOffsets,
  broadcastShapes,
  normalizeAxis,
  sizeOf,
  type DType,
  type NestedNumbers,
  type NumericBuffer,
} from "./ndarray";
import { Quantity } from "./quantity";
import { DIMENSIONLESS_UNIT, type Unit } from "./unit";

export const UFUNC_NAMES = [
  "add",
  "subtract",
  "multiply",
  "divide",
  "true_divide",
  "floor_divide",
  "logaddexp",
  "logaddexp2",
  "negative",
  "positive",
  "power",
  "remainder",
  "mod",
  "fmod",
  "divmod",
  "absolute",
  "fabs",
  "rint",
  "sign",
  "conj",
  "exp",
  "exp2",
  "log",
  "log2",
  "log10",
  "expm1",
  "log1p",
  "sqrt",
  "square",
  "reciprocal",
  "sin",
  "cos",
  "tan",
  "sinh",
  "cosh",
  "tanh",
  "arcsin",
  "arccos",
  "arctan",
  "arctan2",
  "arcsinh",
  "arccosh",
  "arctanh",
  "hypot",
  "deg2rad",
  "rad2deg",
  "greater",
  "greater_equal",
  "less",
  "less_equal",
  "not_equal",
  "equal",
  "logical_and",
  "logical_or",
  "logical_xor",
  "logical_not",
  "maximum",
  "minimum",
  "fmax",
  "fmin",
  "isreal",
  "iscomplex",
  "isfinite",
  "isinf",
  "isnan",
  "signbit",
  "copysign",
  "nextafter",
  "spacing",
  "modf",
  "frexp",
  "floor",
  "ceil",
  "trunc",
  "heaviside",
  "ones_like",
  "matmul",
  "clip",
] as const;

export type UfuncName = typeof UFUNC_NAMES[number];

export const MULTI_OUTPUT_UFUNCS = ["modf", "frexp", "divmod"] as const;
export type MultiOutputUfunc = typeof MULTI_OUTPUT_UFUNCS[number];
export type SingleOutputUfunc = Exclude<UfuncName, MultiOutputUfunc>;

export const REDUCIBLE_UFUNCS = [
  "add",
  "multiply",
  "maximum",
  "minimum",
  "fmax",
  "fmin",
  "logical_and",
  "logical_or",
] as const;
export type ReducibleUfunc = typeof REDUCIBLE_UFUNCS[number];

/** Anything a ufunc accepts: a quantity, or plain numbers taken as dimensionless. */
export type UfuncOperand = Quantity | NestedNumbers;

// --- scalar kernels -------------------------------------------------------

const scratch = new DataView(new ArrayBuffer(8));

const nextAfter = (x: number, y: number): number => {
  if (Number.isNaN(x) || Number.isNaN(y)) return NaN;
  if (x === y) return y;
  if (x === 0) return y > 0 ? Number.MIN_VALUE : -Number.MIN_VALUE;
  scratch.setFloat64(0, x);
  const bits = scratch.getBigUint64(0);
  scratch.setBigUint64(0, (y > x) === (x > 0) ? bits + 1n : bits - 1n);
  return scratch.getFloat64(0);
};

const spacing = (x: number): number => {
  if (!Number.isFinite(x)) return NaN;
  const away = x < 0 || Object.is(x, -0) ? -Infinity : Infinity;
  return nextAfter(x, away) - x;
};

// Round half to even.
const rint = (x: number): number =>
  Math.abs(x % 1) === 0.5 ? 2 * Math.round(x / 2) : Math.round(x);

// Result takes the sign of the divisor.
const floorMod = (x: number, y: number): number => {
  if (y === 0) return NaN;
  const r = x % y;
  return r !== 0 && r < 0 !== y < 0 ? r + y : r;
};

const nanMax = (x: number, y: number) => (Number.isNaN(x) || Number.isNaN(y) ? NaN : Math.max(x, y));
const nanMin = (x: number, y: number) => (Number.isNaN(x) || Number.isNaN(y) ? NaN : Math.min(x, y));
const fmax = (x: number, y: number) => (Number.isNaN(x) ? y : Number.isNaN(y) ? x : Math.max(x, y));
const fmin = (x: number, y: number) => (Number.isNaN(x) ? y : Number.isNaN(y) ? x : Math.min(x, y));

const logAddExp = (x: number, y: number): number => {
  if (x === y) return x + Math.LN2;
  const hi = Math.max(x, y);
  return hi + Math.log1p(Math.exp(-Math.abs(x - y)));
};

const logAddExp2 = (x: number, y: number): number => {
  if (x === y) return x + 1;
  const hi = Math.max(x, y);
  return hi + Math.log2(1 + Math.pow(2, -Math.abs(x - y)));
};

const copySign = (x: number, y: number): number => {
  const negative = y < 0 || Object.is(y, -0);
  return negative ? -Math.abs(x) : Math.abs(x);
};

const heaviside = (x: number, h0: number): number => {
  if (Number.isNaN(x)) return NaN;
  if (x === 0) return h0;
  return x < 0 ? 0 : 1;
};

const frexp = (x: number): [number, number] => {
  if (x === 0 || !Number.isFinite(x)) return [x, 0];
  let exponent = Math.max(-1073, Math.floor(Math.log2(Math.abs(x))) + 1);
  let mantissa = x / Math.pow(2, exponent);
  while (Math.abs(mantissa) < 0.5) {
    mantissa *= 2;
    exponent -= 1;
  }
  while (Math.abs(mantissa) >= 1) {
    mantissa /= 2;
    exponent += 1;
  }
  return [mantissa, exponent];
};

const bool = (value: boolean) => (value ? 1 : 0);
const truthy = (x: number) => x !== 0 && !Number.isNaN(x);

// --- unit rules -----------------------------------------------------------

type UnaryUnits = "keep" | "dimensionless" | "bool" | { pow: number };

/**
 * How operand units combine.
 * - match: second operand converted to the first's units, result in those units
 * - match-dimensionless / match-bool: as match, result dimensionless / boolean
 * - first: result carries the first operand's units, the second is read as-is
 */
type BinaryUnits =
  | "match"
  | "match-dimensionless"
  | "match-bool"
  | "bool"
  | "first"
  | "multiply"
  | "divide"
  | "power";

type UnaryKernel = { arity: 1; fn: (x: number) => number; units: UnaryUnits };
type BinaryKernel = { arity: 2; fn: (x: number, y: number) => number; units: BinaryUnits };
type ClipKernel = { arity: 3 };
type MatmulKernel = { arity: "matmul" };

type SingleKernel = UnaryKernel | BinaryKernel | ClipKernel | MatmulKernel;

const unary = (fn: (x: number) => number, units: UnaryUnits = "keep"): UnaryKernel => ({ arity: 1, fn, units });
const binary = (fn: (x: number, y: number) => number, units: BinaryUnits = "match"): BinaryKernel => ({
  arity: 2,
  fn,
  units,
});

const KERNELS: Readonly<Record<SingleOutputUfunc, SingleKernel>> = {
  add: binary((x, y) => x + y),
  subtract: binary((x, y) => x - y),
  multiply: binary((x, y) => x * y, "multiply"),
  divide: binary((x, y) => x / y, "divide"),
  true_divide: binary((x, y) => x / y, "divide"),
  floor_divide: binary((x, y) => Math.floor(x / y), "divide"),
  logaddexp: binary(logAddExp, "match-dimensionless"),
  logaddexp2: binary(logAddExp2, "match-dimensionless"),
  negative: unary((x) => -x),
  positive: unary((x) => x),
  power: binary(Math.pow, "power"),
  remainder: binary(floorMod),
  mod: binary(floorMod),
  fmod: binary((x, y) => x % y),
  absolute: unary(Math.abs),
  fabs: unary(Math.abs),
  rint: unary(rint),
  sign: unary((x) => (Number.isNaN(x) ? NaN : Math.sign(x)), "dimensionless"),
  conj: unary((x) => x),
  exp: unary(Math.exp, "dimensionless"),
  exp2: unary((x) => Math.pow(2, x), "dimensionless"),
  log: unary(Math.log, "dimensionless"),
  log2: unary(Math.log2, "dimensionless"),
  log10: unary(Math.log10, "dimensionless"),
  expm1: unary(Math.expm1, "dimensionless"),
  log1p: unary(Math.log1p, "dimensionless"),
  sqrt: unary(Math.sqrt, { pow: 0.5 }),
  square: unary((x) => x * x, { pow: 2 }),
  reciprocal: unary((x) => 1 / x, { pow: -1 }),
  sin: unary(Math.sin, "dimensionless"),
  cos: unary(Math.cos, "dimensionless"),
  tan: unary(Math.tan, "dimensionless"),
  sinh: unary(Math.sinh, "dimensionless"),
  cosh: unary(Math.cosh, "dimensionless"),
  tanh: unary(Math.tanh, "dimensionless"),
  arcsin: unary(Math.asin, "dimensionless"),
  arccos: unary(Math.acos, "dimensionless"),
  arctan: unary(Math.atan, "dimensionless"),
  arctan2: binary(Math.atan2, "match-dimensionless"),
  arcsinh: unary(Math.asinh, "dimensionless"),
  arccosh: unary(Math.acosh, "dimensionless"),
  arctanh: unary(Math.atanh, "dimensionless"),
  hypot: binary(Math.hypot),
  deg2rad: unary((x) => (x * Math.PI) / 180, "dimensionless"),
  rad2deg: unary((x) => (x * 180) / Math.PI, "dimensionless"),
  greater: binary((x, y) => bool(x > y), "match-bool"),
  greater_equal: binary((x, y) => bool(x >= y), "match-bool"),
  less: binary((x, y) => bool(x < y), "match-bool"),
  less_equal: binary((x, y) => bool(x <= y), "match-bool"),
  not_equal: binary((x, y) => bool(x !== y), "match-bool"),
  equal: binary((x, y) => bool(x === y), "match-bool"),
  logical_and: binary((x, y) => bool(truthy(x) && truthy(y)), "bool"),
  logical_or: binary((x, y) => bool(truthy(x) || truthy(y)), "bool"),
  logical_xor: binary((x, y) => bool(truthy(x) !== truthy(y)), "bool"),
  logical_not: unary((x) => bool(x === 0), "bool"),
  maximum: binary(nanMax),
  minimum: binary(nanMin),
  fmax: binary(fmax),
  fmin: binary(fmin),
  isreal: unary(() => 1, "bool"),
  iscomplex: unary(() => 0, "bool"),
  isfinite: unary((x) => bool(Number.isFinite(x)), "bool"),
  isinf: unary((x) => bool(x === Infinity || x === -Infinity), "bool"),
  isnan: unary((x) => bool(Number.isNaN(x)), "bool"),
  signbit: unary((x) => bool(x < 0 || Object.is(x, -0)), "bool"),
  copysign: binary(copySign, "first"),
  nextafter: binary(nextAfter),
  spacing: unary(spacing),
  floor: unary(Math.floor),
  ceil: unary(Math.ceil),
  trunc: unary(Math.trunc),
  heaviside: binary(heaviside, "first"),
  ones_like: unary(() => 1),
  matmul: { arity: "matmul" },
  clip: { arity: 3 },
};

// --- evaluation -----------------------------------------------------------

const asQuantity = (operand: UfuncOperand): Quantity =>
  operand instanceof Quantity ? operand : new Quantity(operand);

/** Plain numbers are read in the units of the quantity they meet. */
const inUnitsOf = (operand: UfuncOperand, units: Unit): Quantity =>
  operand instanceof Quantity ? operand.inUnits(units) : new Quantity(operand, units);

const outDType = (units: "bool" | "value"): DType => (units === "bool" ? "bool" : "float64");

const mapBinary = (
  x: Quantity,
  y: Quantity,
  fn: (a: number, b: number) => number,
  dtype: DType,
  units: Unit,
): Quantity => {
  const shape = broadcastShapes(x.shape, y.shape);
  const xi = broadcastOffsets(x.shape, shape);
  const yi = broadcastOffsets(y.shape, shape);
  const out = allocate(dtype, sizeOf(shape));
  const xs = x.buffer;
  const ys = y.buffer;
  for (let i = 0; i < out.length; i += 1) out[i] = fn(xs[xi[i]], ys[yi[i]]);
  return Quantity.fromBuffer(out, shape, units);
};

const mapUnary = (x: Quantity, fn: (a: number) => number, dtype: DType, units: Unit): Quantity => {
  const out = allocate(dtype, x.size);
  const xs = x.buffer;
  for (let i = 0; i < out.length; i += 1) out[i] = fn(xs[i]);
  return Quantity.fromBuffer(out, x.shape, units);
};

/** A single exponent value, or undefined when the array holds several. */
const uniformValue = (values: NumericBuffer): number | undefined => {
  if (values.length === 0) return undefined;
  const first = values[0];
  for (let i = 1; i < values.length; i += 1) if (values[i] !== first) return undefined;
  return first;
};

const applyPower = (base: Quantity, exponentOperand: UfuncOperand): Quantity => {
  const exponent = asQuantity(exponentOperand);
  if (!exponent.units.isDimensionless) {
    throw new UnitIncompatibleError(exponent.units.expr, "dimensionless", "exponents must be dimensionless");
  }
  const exponentValues = exponent.inUnits(DIMENSIONLESS_UNIT);
  const p = uniformValue(exponentValues.buffer);
  let units = base.units;
  if (base.units !== DIMENSIONLESS_UNIT) {
    if (p === undefined) {
      throw new UnitIncompatibleError(
        base.units.expr,
        "dimensionless",
        "an array-valued exponent needs a dimensionless base",
      );
    }
    units = base.units.pow(p);
  }
  return mapBinary(base, exponentValues, Math.pow, "float64", units);
};

const applyMatmul = (a: Quantity, b: Quantity): Quantity => {
  if (a.ndim === 0 || b.ndim === 0) throw new RangeError("matmul: operands must not be scalars");
  if (a.ndim > 2 || b.ndim > 2) throw new RangeError("matmul supports 1-d and 2-d operands");
  const [rows, inner] = a.ndim === 1 ? [1, a.shape[0]] : [a.shape[0], a.shape[1]];
  const [innerB, cols] = b.ndim === 1 ? [b.shape[0], 1] : [b.shape[0], b.shape[1]];
  if (inner !== innerB) {
    throw new RangeError(`matmul: mismatch in core dimension (${inner} vs ${innerB})`);
  }
  const out = allocate("float64", rows * cols);
  for (let r = 0; r < rows; r += 1) {
    for (let c = 0; c < cols; c += 1) {
      let sum = 0;
      for (let k = 0; k < inner; k += 1) sum += a.buffer[r * inner + k] * b.buffer[k * cols + c];
      out[r * cols + c] = sum;
    }
  }
  const shape: number[] = [];
  if (a.ndim === 2) shape.push(rows);
  if (b.ndim === 2) shape.push(cols);
  return Quantity.fromBuffer(out, shape, a.units.multiply(b.units));
};

const unaryUnits = (rule: UnaryUnits, units: Unit): Unit => {
  if (rule === "keep") return units;
  if (rule === "dimensionless" || rule === "bool") return DIMENSIONLESS_UNIT;
  return units.pow(rule.pow);
};

const applyBinary = (kernel: BinaryKernel, lhs: UfuncOperand, rhs: UfuncOperand): Quantity => {
  switch (kernel.units) {
    case "power":
      return applyPower(asQuantity(lhs), rhs);
    case "multiply":
    case "divide": {
      const x = asQuantity(lhs);
      const y = asQuantity(rhs);
      const units = kernel.units === "multiply" ? x.units.multiply(y.units) : x.units.divide(y.units);
      return mapBinary(x, y, kernel.fn, "float64", units);
    }
    case "bool":
      return mapBinary(asQuantity(lhs), asQuantity(rhs), kernel.fn, "bool", DIMENSIONLESS_UNIT);
    case "first": {
      const x = asQuantity(lhs);
      return mapBinary(x, asQuantity(rhs), kernel.fn, "float64", x.units);
    }
    case "match":
    case "match-dimensionless":
    case "match-bool": {
      // A plain number adopts the units of the quantity it meets.
      const units = lhs instanceof Quantity ? lhs.units : rhs instanceof Quantity ? rhs.units : DIMENSIONLESS_UNIT;
      const x = inUnitsOf(lhs, units);
      const y = inUnitsOf(rhs, units);
      if (kernel.units === "match-bool") return mapBinary(x, y, kernel.fn, "bool", DIMENSIONLESS_UNIT);
      const outUnits = kernel.units === "match" ? units : DIMENSIONLESS_UNIT;
      return mapBinary(x, y, kernel.fn, "float64", outUnits);
    }
  }
};

const expectArity = (name: string, operands: readonly UfuncOperand[], expected: number) => {
  if (operands.length !== expected) {
    throw new TypeError(`${name}() takes ${expected} operand(s) but ${operands.length} were given`);
  }
};

/** Evaluate a single-output ufunc on quantities, deriving the output units. */
export const applyQuantityUfunc = (name: SingleOutputUfunc, ...operands: UfuncOperand[]): Quantity => {
  const kernel = KERNELS[name];
  switch (kernel.arity) {
    case 1: {
      expectArity(name, operands, 1);
      const x = asQuantity(operands[0]);
      const dtype = outDType(kernel.units === "bool" ? "bool" : "value");
      return mapUnary(x, kernel.fn, dtype, unaryUnits(kernel.units, x.units));
    }
    case 2:
      expectArity(name, operands, 2);
      return applyBinary(kernel, operands[0], operands[1]);
    case 3: {
      expectArity(name, operands, 3);
      const x = asQuantity(operands[0]);
      const lo = inUnitsOf(operands[1], x.units);
      const hi = inUnitsOf(operands[2], x.units);
      const lower = mapBinary(x, lo, (v, bound) => (v < bound ? bound : v), "float64", x.units);
      return mapBinary(lower, hi, (v, bound) => (v > bound ? bound : v), "float64", x.units);
    }
    case "matmul": {
      expectArity(name, operands, 2);
      return applyMatmul(asQuantity(operands[0]), asQuantity(operands[1]));
    }
  }
};

/** Evaluate a two-output ufunc (`modf`, `frexp`, `divmod`). */
export const applyQuantityUfunc2 = (
  name: MultiOutputUfunc,
  ...operands: UfuncOperand[]
): [Quantity, Quantity] => {
  switch (name) {
    case "modf": {
      expectArity(name, operands, 1);
      const x = asQuantity(operands[0]);
      const fraction = (v: number) => {
        if (Number.isNaN(v)) return NaN;
        return Number.isFinite(v) ? v - Math.trunc(v) : copySign(0, v);
      };
      const fractional = mapUnary(x, fraction, "float64", x.units);
      const integral = mapUnary(x, Math.trunc, "float64", x.units);
      return [fractional, integral];
    }
    case "frexp": {
      expectArity(name, operands, 1);
      const x = asQuantity(operands[0]);
      const mantissa = mapUnary(x, (v) => frexp(v)[0], "float64", DIMENSIONLESS_UNIT);
      const exponent = mapUnary(x, (v) => frexp(v)[1], "int32", DIMENSIONLESS_UNIT);
      return [mantissa, exponent];
    }
    case "divmod": {
      expectArity(name, operands, 2);
      const x = asQuantity(operands[0]);
      const y = asQuantity(operands[1]);
      const quotient = mapBinary(x, y, (a, b) => Math.floor(a / b), "float64", x.units.divide(y.units));
      const remainder = mapBinary(x, y.inUnits(x.units), floorMod, "float64", x.units);
      return [quotient, remainder];
    }
  }
};

const REDUCERS: Readonly<Record<ReducibleUfunc, { identity?: number; fn: (acc: number, v: number) => number }>> = {
  add: { identity: 0, fn: (acc, v) => acc + v },
  multiply: { identity: 1, fn: (acc, v) => acc * v },
  maximum: { fn: nanMax },
  minimum: { fn: nanMin },
  fmax: { fn: fmax },
  fmin: { fn: fmin },
  logical_and: { identity: 1, fn: (acc, v) => bool(truthy(acc) && truthy(v)) },
  logical_or: { identity: 0, fn: (acc, v) => bool(truthy(acc) || truthy(v)) },
};

/**
 * `ufunc.reduce` over one axis, or over every element when `axis` is
 * omitted. Products raise the units to the number of reduced elements.
 */
export const reduceQuantity = (name: ReducibleUfunc, x: Quantity, axis?: number): Quantity => {
  const reducer = REDUCERS[name];
  const shape = axis === undefined ? [x.size] : x.shape;
  const resolvedAxis = axis === undefined ? 0 : normalizeAxis(axis, x.ndim);
  const length = shape[resolvedAxis];
  if (length === 0 && reducer.identity === undefined) {
    throw new RangeError(`zero-size array to reduction operation ${name} which has no identity`);
  }
  const outer = sizeOf(shape.slice(0, resolvedAxis));
  const inner = sizeOf(shape.slice(resolvedAxis + 1));
  const logical = name === "logical_and" || name === "logical_or";
  const out = allocate(logical ? "bool" : "float64", outer * inner);
  for (let o = 0; o < outer; o += 1) {
    for (let i = 0; i < inner; i += 1) {
      const base = o * length * inner + i;
      let acc = reducer.identity ?? x.buffer[base];
      for (let k = reducer.identity === undefined ? 1 : 0; k < length; k += 1) {
        acc = reducer.fn(acc, x.buffer[base + k * inner]);
      }
      out[o * inner + i] = acc;
    }
  }
  const outShape = axis === undefined ? [] : shape.filter((_, i) => i !== resolvedAxis);
  let units = x.units;
  if (logical) units = DIMENSIONLESS_UNIT;
  else if (name === "multiply") units = x.units.pow(length);
  return Quantity.fromBuffer(out, outShape, units);
};
