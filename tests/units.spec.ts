import { describe, expect, it } from "vitest";
import { LENGTH, VELOCITY, sameDimensions } from "../modules/units/dimensions";
import { InvalidConstructionError, UnitIncompatibleError } from "../modules/units/errors";
import { Quantity } from "../modules/units/quantity";
import { applyQuantityUfunc, reduceQuantity } from "../modules/units/ufuncs";
import { parseUnit } from "../modules/units/unit";
import { baseUnitFor, resolveUnitSystem } from "../modules/units/unit-system";
import { COSMO_UNITS } from "@shared/unit-system";
import { MEGAPARSEC_CM } from "@shared/physics-const";

describe("unit parsing", () => {
  it("reads products, quotients and powers", () => {
    const density = parseUnit("g/cm**3");
    expect(density.dimensions).toEqual({ mass: 1, length: -3, time: 0, temperature: 0, current: 0 });
    expect(density.expr).toBe("g/cm**3");
    expect(parseUnit("g/cm^3").scale).toBe(density.scale);
    expect(parseUnit("cm^(-1/2)").dimensions.length).toBe(-0.5);
  });

  it("converts between compatible units", () => {
    expect(parseUnit("km/s").conversionFactorTo(parseUnit("cm/s"))).toBe(1e5);
    expect(parseUnit("Mpc").scale).toBe(MEGAPARSEC_CM);
  });

  it("refuses to convert across dimensions", () => {
    try {
      parseUnit("km").conversionFactorTo(parseUnit("s"));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnitIncompatibleError);
      if (!(err instanceof UnitIncompatibleError)) return;
      expect(err.from).toBe("km");
      expect(err.to).toBe("s");
    }
  });

  it("rejects unknown symbols and malformed expressions", () => {
    expect(() => parseUnit("parsnip")).toThrow(InvalidConstructionError);
    expect(() => parseUnit("cm^")).toThrow(InvalidConstructionError);
    expect(() => parseUnit("(cm")).toThrow(InvalidConstructionError);
  });
});

describe("unit systems", () => {
  it("resolves named systems and rejects unknown ones", () => {
    expect(resolveUnitSystem("CGS").length).toBe("cm");
    expect(() => resolveUnitSystem("imperial")).toThrow(InvalidConstructionError);
    expect(() => resolveUnitSystem({ ...COSMO_UNITS, mass: "" })).toThrow(InvalidConstructionError);
  });

  it("builds base units for derived dimensions", () => {
    const velocity = baseUnitFor(COSMO_UNITS, VELOCITY);
    expect(sameDimensions(velocity.dimensions, VELOCITY)).toBe(true);
    expect(velocity.scale).toBeCloseTo(1e5, 6);
    expect(baseUnitFor(COSMO_UNITS, LENGTH).expr).toBe("Mpc");
  });
});

describe("Quantity", () => {
  it("converts units and base systems", () => {
    expect(Array.from(new Quantity([1, 2], "km").inUnits("m").values)).toEqual([1000, 2000]);
    const inCgs = new Quantity([3], "km/s").inBase("cgs");
    expect(inCgs.units.expr).toBe("cm*s^(-1)");
    expect(inCgs.item(0)).toBe(3e5);
  });

  it("reshapes with one inferred dimension", () => {
    const q = new Quantity([1, 2, 3, 4, 5, 6], "g");
    expect(q.reshape(-1, 2).shape).toEqual([3, 2]);
    expect(() => q.reshape(4, -1)).toThrow(RangeError);
    expect(() => q.reshape(-1, -1)).toThrow(RangeError);
  });

  it("rejects ragged input", () => {
    expect(() => new Quantity([[1, 2], [3]], "g")).toThrow(RangeError);
  });

  it("broadcasts binary operations", () => {
    const column = new Quantity([[1], [2]], "cm");
    const row = new Quantity([10, 20], "cm");
    const sum = applyQuantityUfunc("add", column, row);
    expect(sum.shape).toEqual([2, 2]);
    expect(Array.from(sum.values)).toEqual([11, 21, 12, 22]);
  });

  it("converts the second operand of an addition into the first's units", () => {
    const sum = applyQuantityUfunc("add", new Quantity([1], "m"), new Quantity([50], "cm"));
    expect(sum.units.expr).toBe("m");
    expect(sum.item(0)).toBe(1.5);
    expect(() => applyQuantityUfunc("add", new Quantity([1], "m"), new Quantity([1], "s"))).toThrow(
      UnitIncompatibleError,
    );
  });

  it("reduces with the identity of the operation", () => {
    const empty = new Quantity([], "g");
    expect(reduceQuantity("add", empty).item()).toBe(0);
    expect(reduceQuantity("multiply", empty).item()).toBe(1);
    expect(() => reduceQuantity("maximum", empty)).toThrow(RangeError);
  });

  it("raises units to the number of multiplied elements", () => {
    const product = reduceQuantity("multiply", new Quantity([2, 3], "cm"));
    expect(product.item()).toBe(6);
    expect(sameDimensions(product.units.dimensions, parseUnit("cm^2").dimensions)).toBe(true);
  });
});
