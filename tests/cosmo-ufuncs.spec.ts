import { describe, expect, it } from "vitest";
import {
  applyUfunc,
  applyUfunc2,
  cosmoRuleFor,
  CosmoArray,
  CosmoFactor,
  InvalidScaleFactorError,
  MissingCosmoFactorError,
  reduce,
  UfuncUnsupportedError,
} from "../modules/cosmo";
import { Quantity } from "../modules/units/quantity";
import { UFUNC_NAMES, type SingleOutputUfunc } from "../modules/units/ufuncs";

const linear = new CosmoFactor("a", 0.5);

const comoving = (values: number[], compression: string | null = null) =>
  new CosmoArray(values, "Mpc", { cosmoFactor: linear, compression });

const physical = (values: number[], compression: string | null = null) =>
  new CosmoArray(values, "Mpc", { comoving: false, cosmoFactor: linear, compression });

const STRIPPED_UNARY: SingleOutputUfunc[] = [
  "rint",
  "sign",
  "exp",
  "exp2",
  "log",
  "log2",
  "log10",
  "expm1",
  "log1p",
  "sin",
  "cos",
  "tan",
  "sinh",
  "cosh",
  "tanh",
  "arcsin",
  "arccos",
  "arctan",
  "arcsinh",
  "arccosh",
  "arctanh",
  "deg2rad",
  "rad2deg",
  "logical_not",
  "isreal",
  "iscomplex",
  "isfinite",
  "isinf",
  "isnan",
  "signbit",
];

const STRIPPED_BINARY: SingleOutputUfunc[] = ["logaddexp", "logaddexp2", "arctan2"];

describe("frame resolution", () => {
  it("converts physical operands to comoving when frames are mixed", () => {
    const left = comoving([1, 2, 3]);
    const right = physical([0.5, 1, 1.5]);
    const sum = left.add(right);
    expect(sum.comoving).toBe(true);
    expect(Array.from(sum.values)).toEqual([2, 4, 6]);
    expect(sum.cosmoFactor?.expr).toBe(linear.expr);
  });

  it("never mutates the operands of a mixed-frame operation", () => {
    const right = physical([0.5, 1, 1.5]);
    comoving([1, 2, 3]).add(right);
    expect(right.comoving).toBe(false);
    expect(Array.from(right.values)).toEqual([0.5, 1, 1.5]);
  });

  it("keeps a common physical frame", () => {
    const sum = physical([1, 2]).add(physical([3, 4]));
    expect(sum.comoving).toBe(false);
    expect(Array.from(sum.values)).toEqual([4, 6]);
  });

  it("keeps the frame and factor when combined with plain numbers and quantities", () => {
    const scaled = physical([1, 2], "gzip").multiply(3);
    expect(scaled.comoving).toBe(false);
    expect(scaled.cosmoFactor).toBe(linear);
    expect(Array.from(scaled.values)).toEqual([3, 6]);

    const shifted = physical([1, 2]).add(new Quantity([1, 1], "Mpc"));
    expect(shifted.comoving).toBe(false);
    expect(shifted.cosmoFactor?.expr).toBe(linear.expr);
    expect(Array.from(shifted.values)).toEqual([2, 3]);
  });

  it("needs a cosmo factor to merge frames", () => {
    const bare = new CosmoArray([1, 2], "Mpc", { comoving: false });
    expect(() => comoving([1, 2]).add(bare)).toThrow(MissingCosmoFactorError);
  });
});

describe("compression", () => {
  it("keeps a shared label", () => {
    expect(comoving([1], "gzip").add(comoving([2], "gzip")).compression).toBe("gzip");
  });

  it("clears the label when a plain operand takes part", () => {
    expect(comoving([1, 2], "gzip").multiply(3).compression).toBeNull();
    expect(comoving([1, 2], "gzip").add(1).compression).toBeNull();
    expect(comoving([1], "gzip").add(new Quantity([1], "Mpc")).compression).toBeNull();
    expect(applyUfunc("clip", comoving([1, 5], "gzip"), 0, 2).compression).toBeNull();
  });

  it("clears mixed labels", () => {
    expect(comoving([1], "gzip").add(comoving([2], "lzf")).compression).toBeNull();
    expect(comoving([1], "gzip").add(comoving([2])).compression).toBeNull();
  });
});

describe("cosmo factor rules", () => {
  it("preserves the factor of additive operations", () => {
    const diff = comoving([5, 7]).subtract(comoving([1, 2]));
    expect(diff.cosmoFactor?.expr).toBe(linear.expr);
    expect(Array.from(diff.values)).toEqual([4, 5]);
    expect(applyUfunc("maximum", comoving([1, 9]), comoving([4, 2])).cosmoFactor?.expr).toBe(linear.expr);
  });

  it("rejects additive operations across dependences", () => {
    const squared = new CosmoArray([1], "Mpc^2", { cosmoFactor: new CosmoFactor("a^2", 0.5) });
    const areas = new CosmoArray([1], "Mpc^2", { cosmoFactor: new CosmoFactor("a", 0.5) });
    expect(() => squared.add(areas)).toThrow(InvalidScaleFactorError);

    const later = new CosmoArray([1], "Mpc", { cosmoFactor: new CosmoFactor("a", 0.25) });
    expect(() => comoving([1]).subtract(later)).toThrow(InvalidScaleFactorError);
  });

  it("names the operation that failed to combine", () => {
    const later = new CosmoArray([1], "Mpc", { cosmoFactor: new CosmoFactor("a", 0.25) });
    expect(() => applyUfunc("maximum", comoving([1]), later)).toThrow(
      "Attempting to maximum two cosmo_factors with different scale factors 0.5 and 0.25",
    );
    expect(() => applyUfunc("fmod", comoving([1]), later)).toThrow(/^Attempting to fmod /);
  });

  it("multiplies factors", () => {
    const area = comoving([2, 3]).multiply(comoving([4, 5]));
    expect(area.cosmoFactor?.aFactor).toBeCloseTo(0.25, 15);
    expect(area.units.expr).toBe("Mpc*Mpc");
    expect(Array.from(area.values)).toEqual([8, 15]);
  });

  it("divides factors", () => {
    const ratio = comoving([4]).divide(comoving([2]));
    expect(ratio.cosmoFactor?.aFactor).toBeCloseTo(1, 15);
    expect(ratio.item()).toBe(2);

    const inverse = applyUfunc("divide", 1, comoving([1, 2]));
    expect(inverse.cosmoFactor?.aFactor).toBeCloseTo(2, 15);
    expect(inverse.units.expr).toBe("1/Mpc");
    expect(Array.from(inverse.values)).toEqual([1, 0.5]);

    const halved = comoving([1, 2]).divide(2);
    expect(halved.cosmoFactor).toBe(linear);
  });

  it("raises the factor to a scalar power", () => {
    const squared = comoving([2, 3]).pow(2);
    expect(squared.cosmoFactor?.aFactor).toBeCloseTo(0.25, 15);
    expect(squared.units.expr).toBe("Mpc^2");
    expect(Array.from(squared.values)).toEqual([4, 9]);
  });

  it("rejects array-valued exponents", () => {
    expect(() => applyUfunc("power", comoving([2, 3]), [1, 2])).toThrow(UfuncUnsupportedError);
  });

  it("rejects exponents that scale with the scale factor", () => {
    const exponent = new CosmoArray([2], "dimensionless", { cosmoFactor: linear });
    expect(() => applyUfunc("power", comoving([2, 3]), exponent)).toThrow(UfuncUnsupportedError);

    const invariant = new CosmoArray([2], "dimensionless", { cosmoFactor: new CosmoFactor("1", 0.5) });
    const squared = applyUfunc("power", comoving([2, 3]), invariant);
    expect(squared.cosmoFactor?.aFactor).toBeCloseTo(0.25, 15);
    expect(Array.from(squared.values)).toEqual([4, 9]);
  });

  it("passes the first operand's factor through sign and rounding operations", () => {
    const x = comoving([-1.5, 2.5]);
    expect(x.negative().cosmoFactor).toBe(linear);
    expect(Array.from(x.abs().values)).toEqual([1.5, 2.5]);
    expect(applyUfunc("floor", x).cosmoFactor).toBe(linear);
    expect(applyUfunc("copysign", x, [1, -1]).cosmoFactor).toBe(linear);
    expect(Array.from(applyUfunc("clip", x, 0, 2).values)).toEqual([0, 2]);
  });

  it("multiplies factors through matmul", () => {
    const matrix = new CosmoArray([[1, 2], [3, 4]], "Mpc", { cosmoFactor: linear });
    const product = applyUfunc("matmul", matrix, comoving([1, 1]));
    expect(Array.from(product.values)).toEqual([3, 7]);
    expect(product.cosmoFactor?.aFactor).toBeCloseTo(0.25, 15);
  });

  it("strips the factor from transcendental and predicate operations", () => {
    const x = new CosmoArray([0.25, 0.5], "dimensionless", { cosmoFactor: linear, compression: "gzip" });
    for (const name of STRIPPED_UNARY) {
      const result = applyUfunc(name, x);
      expect(result.cosmoFactor, name).toBeNull();
      expect(result.comoving, name).toBe(true);
      expect(result.compression, name).toBe("gzip");
    }
    for (const name of STRIPPED_BINARY) {
      expect(applyUfunc(name, x, x).cosmoFactor, name).toBeNull();
    }
    const [mantissa, exponent] = applyUfunc2("frexp", x);
    expect(mantissa.cosmoFactor).toBeNull();
    expect(exponent.cosmoFactor).toBeNull();
    expect(Array.from(mantissa.values)).toEqual([0.5, 0.5]);
    expect(Array.from(exponent.values)).toEqual([-1, 0]);
  });

  it("classifies exactly the expected operations as stripping", () => {
    const stripped = UFUNC_NAMES.filter((name) => cosmoRuleFor(name) === "strip");
    expect([...stripped].sort()).toEqual([...STRIPPED_UNARY, ...STRIPPED_BINARY, "frexp"].sort());
  });

  it("returns plain boolean arrays from comparisons", () => {
    const result = comoving([1, 2, 3]).greater(2);
    expect(result.dtype).toBe("bool");
    expect(result.cosmoFactor).toBeNull();
    expect(Array.from(result.values)).toEqual([0, 0, 1]);
    expect(Array.from(comoving([1, 2]).equal(comoving([1, 3])).values)).toEqual([1, 0]);
    expect(applyUfunc("logical_and", comoving([1, 0]), comoving([1, 1])).cosmoFactor).toBeNull();
  });

  it("shares the output tag between both results of modf", () => {
    const [fraction, whole] = applyUfunc2("modf", physical([1.5, 2.25], "gzip"));
    expect(Array.from(fraction.values)).toEqual([0.5, 0.25]);
    expect(Array.from(whole.values)).toEqual([1, 2]);
    for (const part of [fraction, whole]) {
      expect(part.comoving).toBe(false);
      expect(part.compression).toBe("gzip");
      expect(part.cosmoFactor).toBe(linear);
    }
  });

  it("fails loudly for operations without a derived rule", () => {
    const x = comoving([4, 9]);
    expect(() => applyUfunc("sqrt", x)).toThrow(UfuncUnsupportedError);
    expect(() => applyUfunc("square", x)).toThrow(UfuncUnsupportedError);
    expect(() => applyUfunc("reciprocal", x)).toThrow(UfuncUnsupportedError);
    expect(() => applyUfunc2("divmod", x, x)).toThrow(UfuncUnsupportedError);
  });

  it("lets arrays exempt from scaling combine without a factor", () => {
    const ids = new CosmoArray([1, 2], "dimensionless");
    const shifted = ids.add(new CosmoArray([10, 10], "dimensionless"));
    expect(shifted.cosmoFactor).toBeNull();
    expect(Array.from(shifted.values)).toEqual([11, 12]);
    expect(() => ids.add(new CosmoArray([1, 1], "dimensionless", { cosmoFactor: linear }))).toThrow(
      MissingCosmoFactorError,
    );
  });
});

describe("reductions", () => {
  it("keeps the factor of sums and extrema", () => {
    const x = physical([1, 2, 3], "gzip");
    const total = x.sum();
    expect(total.shape).toEqual([]);
    expect(total.item()).toBe(6);
    expect(total.cosmoFactor).toBe(linear);
    expect(total.comoving).toBe(false);
    expect(total.compression).toBe("gzip");
    expect(x.max().item()).toBe(3);
    expect(x.min().cosmoFactor).toBe(linear);
  });

  it("raises the factor to the number of multiplied elements", () => {
    const product = comoving([1, 2, 3]).prod();
    expect(product.item()).toBe(6);
    expect(product.cosmoFactor?.aFactor).toBeCloseTo(0.125, 15);
  });

  it("reduces along an axis", () => {
    const grid = new CosmoArray([[1, 2], [3, 4]], "Mpc", { cosmoFactor: linear });
    expect(Array.from(grid.sum(0).values)).toEqual([4, 6]);
    const rows = grid.prod(1);
    expect(Array.from(rows.values)).toEqual([2, 12]);
    expect(rows.cosmoFactor?.aFactor).toBeCloseTo(0.25, 15);
  });

  it("drops the factor from logical reductions", () => {
    const flags = new CosmoArray([1, 1, 0], "dimensionless", { cosmoFactor: linear });
    const all = reduce("logical_and", flags);
    expect(all.item()).toBe(0);
    expect(all.cosmoFactor).toBeNull();
  });
});
