import {
  MagnitudeUnitsRecord,
  ValueUnitRecord,
  type TCosmoRecord,
  type TMagnitudeUnitsRecord,
  type TValueUnitRecord,
} from "@shared/cosmo-schema";
import { flattenNested, normalizeAxis, type DType, type NumericBuffer, type Shape } from "../units/ndarray";
import { Quantity, type QuantityInput, type QuantityState } from "../units/quantity";
import type { Unit, UnitLike } from "../units/unit";
import type { UnitSystemLike } from "../units/unit-system";
import {
  applyQuantityUfunc,
  applyQuantityUfunc2,
  reduceQuantity,
  type MultiOutputUfunc,
  type ReducibleUfunc,
  type SingleOutputUfunc,
  type UfuncName,
  type UfuncOperand,
} from "../units/ufuncs";
import { CosmoFactor } from "./cosmo-factor";
import { InvalidConstructionError, MissingCosmoFactorError } from "./errors";
import { reduceCosmoFactor, resolveCosmoFactor } from "./ufunc-registry";

/** The small record every cosmo array carries beside its values. */
export interface CosmoTag {
  comoving: boolean;
  cosmoFactor: CosmoFactor | null;
  compression: string | null;
}

export interface CosmoMeta {
  /** Defaults to true: data is comoving unless told otherwise. */
  comoving?: boolean;
  cosmoFactor?: CosmoFactor | null;
  /** Description of the on-disk compression filters; informational only. */
  compression?: string | null;
}

export interface CosmoArrayOptions extends CosmoMeta {
  dtype?: DType;
  shape?: Shape;
  copy?: boolean;
}

export type CosmoArrayState = [TCosmoRecord, ...QuantityState];

export type CosmoOperand = CosmoArray | UfuncOperand;

/**
 * A unit-bearing array that also knows whether its values are comoving or
 * physical, and how they scale with the cosmological scale factor:
 *
 *   physical = comoving × cosmoFactor.aFactor
 *
 * Shape accessors share or copy the values like `Quantity` does, but always
 * give the result its own copy of the tag.
 */
export class CosmoArray {
  readonly quantity: Quantity;
  comoving: boolean;
  cosmoFactor: CosmoFactor | null;
  compression: string | null;

  constructor(input: QuantityInput | CosmoArray, units?: UnitLike, options: CosmoArrayOptions = {}) {
    const source = input instanceof CosmoArray ? input.quantity : input;
    const inherited = input instanceof CosmoArray ? input.tag() : undefined;
    this.quantity = new Quantity(source, units, {
      dtype: options.dtype,
      shape: options.shape,
      copy: options.copy,
    });
    this.comoving = options.comoving ?? inherited?.comoving ?? true;
    this.cosmoFactor = options.cosmoFactor === undefined ? inherited?.cosmoFactor ?? null : options.cosmoFactor;
    this.compression = options.compression === undefined ? inherited?.compression ?? null : options.compression;
  }

  /** Attach `tag` to `quantity` without copying its values. */
  static wrap(quantity: Quantity, tag: CosmoTag): CosmoArray {
    return new CosmoArray(quantity.buffer, quantity.units, { shape: quantity.shape, copy: false, ...tag });
  }

  static fromQuantity(quantity: Quantity, meta: CosmoMeta = {}): CosmoArray {
    return new CosmoArray(quantity, undefined, meta);
  }

  /** Foreign quantity record of the form `{ value, unit }`. */
  static fromValueUnit(record: unknown, meta: CosmoMeta = {}): CosmoArray {
    const parsed = ValueUnitRecord.safeParse(record);
    if (!parsed.success) {
      throw new InvalidConstructionError(`Expected a { value, unit } quantity: ${parsed.error.issues[0]?.message}`);
    }
    const { value, unit }: TValueUnitRecord = parsed.data;
    return new CosmoArray(value, unit, meta);
  }

  /** Foreign quantity record of the form `{ magnitude, units }`. */
  static fromMagnitudeUnits(record: unknown, meta: CosmoMeta = {}): CosmoArray {
    const parsed = MagnitudeUnitsRecord.safeParse(record);
    if (!parsed.success) {
      throw new InvalidConstructionError(`Expected a { magnitude, units } quantity: ${parsed.error.issues[0]?.message}`);
    }
    const { magnitude, units }: TMagnitudeUnitsRecord = parsed.data;
    return new CosmoArray(magnitude, units, meta);
  }

  tag(): CosmoTag {
    return { comoving: this.comoving, cosmoFactor: this.cosmoFactor, compression: this.compression };
  }

  get units(): Unit {
    return this.quantity.units;
  }

  get values(): NumericBuffer {
    return this.quantity.values;
  }

  get shape(): number[] {
    return this.quantity.shape;
  }

  get dtype(): DType {
    return this.quantity.dtype;
  }

  get size(): number {
    return this.quantity.size;
  }

  get ndim(): number {
    return this.quantity.ndim;
  }

  toArray() {
    return this.quantity.toArray();
  }

  item(...indices: number[]): number {
    return this.quantity.item(...indices);
  }

  // --- comoving / physical ------------------------------------------------

  private requireFactor(action: string): CosmoFactor {
    if (!this.cosmoFactor) throw new MissingCosmoFactorError(action);
    return this.cosmoFactor;
  }

  convertToComoving(): void {
    if (this.comoving) return;
    this.quantity.divideInPlace(this.requireFactor("convert to comoving").aFactor);
    this.comoving = true;
  }

  convertToPhysical(): void {
    if (!this.comoving) return;
    this.quantity.scaleInPlace(this.requireFactor("convert to physical").aFactor);
    this.comoving = false;
  }

  toComoving(): CosmoArray {
    const out = this.copy();
    out.convertToComoving();
    return out;
  }

  toPhysical(): CosmoArray {
    const out = this.copy();
    out.convertToPhysical();
    return out;
  }

  compatibleWithComoving(): boolean {
    return this.comoving || this.requireFactor("check comoving compatibility").aFactor === 1;
  }

  compatibleWithPhysical(): boolean {
    return !this.comoving || this.requireFactor("check physical compatibility").aFactor === 1;
  }

  // --- tag-propagating accessors -----------------------------------------

  private withTag(quantity: Quantity): CosmoArray {
    return CosmoArray.wrap(quantity, this.tag());
  }

  copy(): CosmoArray {
    return this.withTag(this.quantity.copy());
  }

  view(): CosmoArray {
    return this.withTag(this.quantity.view());
  }

  reshape(...shape: number[]): CosmoArray {
    return this.withTag(this.quantity.reshape(...shape));
  }

  ravel(): CosmoArray {
    return this.withTag(this.quantity.ravel());
  }

  flatten(): CosmoArray {
    return this.withTag(this.quantity.flatten());
  }

  transpose(axes?: readonly number[]): CosmoArray {
    return this.withTag(this.quantity.transpose(axes));
  }

  get T(): CosmoArray {
    return this.transpose();
  }

  swapaxes(axis1: number, axis2: number): CosmoArray {
    return this.withTag(this.quantity.swapaxes(axis1, axis2));
  }

  index(index: number): CosmoArray {
    return this.withTag(this.quantity.index(index));
  }

  slice(start?: number, stop?: number, step?: number): CosmoArray {
    return this.withTag(this.quantity.slice(start, stop, step));
  }

  take(indices: readonly number[], axis?: number): CosmoArray {
    return this.withTag(this.quantity.take(indices, axis));
  }

  compress(condition: readonly boolean[], axis?: number): CosmoArray {
    return this.withTag(this.quantity.compress(condition, axis));
  }

  repeat(repeats: number, axis?: number): CosmoArray {
    return this.withTag(this.quantity.repeat(repeats, axis));
  }

  diagonal(offset = 0): CosmoArray {
    return this.withTag(this.quantity.diagonal(offset));
  }

  astype(dtype: DType): CosmoArray {
    return this.withTag(this.quantity.astype(dtype));
  }

  byteswap(): CosmoArray {
    return this.withTag(this.quantity.byteswap());
  }

  inUnits(units: UnitLike): CosmoArray {
    return this.withTag(this.quantity.inUnits(units));
  }

  inBase(system: UnitSystemLike = "cgs"): CosmoArray {
    return this.withTag(this.quantity.inBase(system));
  }

  convertToUnits(units: UnitLike): void {
    this.quantity.convertToUnits(units);
  }

  convertToBase(system: UnitSystemLike = "cgs"): void {
    this.quantity.convertToBase(system);
  }

  /** Numeric values expressed in `units`. */
  to(units: UnitLike): NumericBuffer {
    return this.quantity.to(units);
  }

  /** Ones in this array's units, carrying its tag. */
  get unitArray(): CosmoArray {
    return this.withTag(this.quantity.onesLike());
  }

  get ua(): CosmoArray {
    return this.unitArray;
  }

  // --- operations ---------------------------------------------------------

  add(other: CosmoOperand): CosmoArray {
    return applyUfunc("add", this, other);
  }

  subtract(other: CosmoOperand): CosmoArray {
    return applyUfunc("subtract", this, other);
  }

  multiply(other: CosmoOperand): CosmoArray {
    return applyUfunc("multiply", this, other);
  }

  divide(other: CosmoOperand): CosmoArray {
    return applyUfunc("divide", this, other);
  }

  pow(exponent: number): CosmoArray {
    return applyUfunc("power", this, exponent);
  }

  negative(): CosmoArray {
    return applyUfunc("negative", this);
  }

  abs(): CosmoArray {
    return applyUfunc("absolute", this);
  }

  greater(other: CosmoOperand): CosmoArray {
    return applyUfunc("greater", this, other);
  }

  greaterEqual(other: CosmoOperand): CosmoArray {
    return applyUfunc("greater_equal", this, other);
  }

  less(other: CosmoOperand): CosmoArray {
    return applyUfunc("less", this, other);
  }

  lessEqual(other: CosmoOperand): CosmoArray {
    return applyUfunc("less_equal", this, other);
  }

  equal(other: CosmoOperand): CosmoArray {
    return applyUfunc("equal", this, other);
  }

  notEqual(other: CosmoOperand): CosmoArray {
    return applyUfunc("not_equal", this, other);
  }

  sum(axis?: number): CosmoArray {
    return reduce("add", this, axis);
  }

  prod(axis?: number): CosmoArray {
    return reduce("multiply", this, axis);
  }

  max(axis?: number): CosmoArray {
    return reduce("maximum", this, axis);
  }

  min(axis?: number): CosmoArray {
    return reduce("minimum", this, axis);
  }

  // --- state --------------------------------------------------------------

  /** The cosmo record first, then the plain quantity state. */
  getState(): CosmoArrayState {
    const record: TCosmoRecord = {
      cosmoFactor: this.cosmoFactor ? this.cosmoFactor.snapshot() : null,
      comoving: this.comoving,
      compression: this.compression,
    };
    return [record, ...this.quantity.getState()];
  }

  static fromState(state: CosmoArrayState): CosmoArray {
    const [record, ...quantityState] = state;
    const quantity = Quantity.fromState(quantityState);
    return CosmoArray.wrap(quantity, {
      comoving: record.comoving,
      cosmoFactor: record.cosmoFactor ? CosmoFactor.fromSnapshot(record.cosmoFactor) : null,
      compression: record.compression,
    });
  }

  toString(): string {
    return `${this.quantity.toString()} ${this.comoving ? "(Comoving)" : "(Physical)"}`;
  }
}

// --- ufunc dispatch -------------------------------------------------------

const toQuantityOperand = (operand: CosmoOperand): UfuncOperand =>
  operand instanceof CosmoArray ? operand.quantity : operand;

const factorOf = (operand: CosmoOperand) => (operand instanceof CosmoArray ? operand.cosmoFactor : undefined);

/** A single number held by `operand`, if it holds exactly one. */
const scalarOf = (operand: CosmoOperand | undefined): number | undefined => {
  if (operand === undefined) return undefined;
  if (typeof operand === "number") return operand;
  if (operand instanceof CosmoArray || operand instanceof Quantity) {
    return operand.size === 1 ? operand.values[0] : undefined;
  }
  const { values } = flattenNested(operand);
  return values.length === 1 ? values[0] : undefined;
};

interface ResolvedOperands {
  operands: CosmoOperand[];
  tag: Omit<CosmoTag, "cosmoFactor">;
}

/**
 * Common frame and compression of the operands. When frames are mixed the
 * physical operands are replaced by comoving copies.
 */
const resolveOperands = (operands: readonly CosmoOperand[]): ResolvedOperands => {
  const tagged = operands.filter((op): op is CosmoArray => op instanceof CosmoArray);
  const allComoving = tagged.every((op) => op.comoving);
  const allPhysical = tagged.length > 0 && tagged.every((op) => !op.comoving);
  // plain operands carry no label, so they clear it
  const compressions = new Set(operands.map((op) => (op instanceof CosmoArray ? op.compression : null)));
  const compression = compressions.size === 1 ? [...compressions][0] : null;

  if (allComoving || allPhysical) {
    return { operands: [...operands], tag: { comoving: allComoving, compression } };
  }
  return {
    operands: operands.map((op) => (op instanceof CosmoArray && !op.comoving ? op.toComoving() : op)),
    tag: { comoving: true, compression },
  };
};

const resolveFactor = (name: UfuncName, operands: readonly CosmoOperand[]) =>
  resolveCosmoFactor(name, operands.map(factorOf), name === "power" ? scalarOf(operands[1]) : undefined);

/**
 * Apply a single-output ufunc. Plain numbers, nested arrays and plain
 * quantities take no part in the frame or cosmo factor of the result, and
 * count as unlabelled for compression.
 */
export const applyUfunc = (name: SingleOutputUfunc, ...inputs: CosmoOperand[]): CosmoArray => {
  const { operands, tag } = resolveOperands(inputs);
  const cosmoFactor = resolveFactor(name, operands);
  const result = applyQuantityUfunc(name, ...operands.map(toQuantityOperand));
  return CosmoArray.wrap(result, { ...tag, cosmoFactor });
};

/** Apply a two-output ufunc; both outputs carry the same tag. */
export const applyUfunc2 = (name: MultiOutputUfunc, ...inputs: CosmoOperand[]): [CosmoArray, CosmoArray] => {
  const { operands, tag } = resolveOperands(inputs);
  const cosmoFactor = resolveFactor(name, operands);
  const [first, second] = applyQuantityUfunc2(name, ...operands.map(toQuantityOperand));
  return [CosmoArray.wrap(first, { ...tag, cosmoFactor }), CosmoArray.wrap(second, { ...tag, cosmoFactor })];
};

/** `ufunc.reduce` over `axis`, or over every element when it is omitted. */
export const reduce = (name: ReducibleUfunc, array: CosmoArray, axis?: number): CosmoArray => {
  const count = axis === undefined ? array.size : array.shape[normalizeAxis(axis, array.ndim)];
  const result = reduceQuantity(name, array.quantity, axis);
  return CosmoArray.wrap(result, {
    comoving: array.comoving,
    compression: array.compression,
    cosmoFactor: reduceCosmoFactor(name, array.cosmoFactor, count),
  });
};
