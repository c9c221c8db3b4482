import {
  NAMED_UNIT_SYSTEMS,
  UnitSystemSpec,
  type TUnitSystem,
} from "@shared/unit-system";
import { BASE_DIMENSIONS, type BaseDimension, type Dimensions } from "./dimensions";
import { InvalidConstructionError } from "./errors";
import { DIMENSIONLESS_UNIT, parseUnit, type Unit } from "./unit";

export type UnitSystemLike = string | TUnitSystem;

export const resolveUnitSystem = (system: UnitSystemLike): TUnitSystem => {
  if (typeof system !== "string") {
    const parsed = UnitSystemSpec.safeParse(system);
    if (!parsed.success) {
      throw new InvalidConstructionError(
        `Invalid unit system: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
      );
    }
    return parsed.data;
  }
  const named = NAMED_UNIT_SYSTEMS[system.trim().toLowerCase()];
  if (!named) {
    throw new InvalidConstructionError(
      `Unknown unit system "${system}" (expected one of ${Object.keys(NAMED_UNIT_SYSTEMS).join(", ")})`,
    );
  }
  return named;
};

export const baseUnitOf = (system: TUnitSystem, dim: BaseDimension): Unit => {
  const unit = parseUnit(system[dim]);
  if (unit.dimensions[dim] !== 1) {
    throw new InvalidConstructionError(
      `Unit system "${system.system}" maps ${dim} to "${system[dim]}", which is not a ${dim} unit`,
    );
  }
  return unit;
};

/** The unit of `system` carrying `dimensions`, e.g. g/cm^3 for density in cgs. */
export const baseUnitFor = (system: TUnitSystem, dimensions: Dimensions): Unit =>
  BASE_DIMENSIONS.reduce<Unit>((unit, dim) => {
    const power = dimensions[dim];
    return power === 0 ? unit : unit.multiply(baseUnitOf(system, dim).pow(power));
  }, DIMENSIONLESS_UNIT);

/** cgs value of one base unit of `dim` in `system`. */
export const cgsConversion = (system: TUnitSystem, dim: BaseDimension): number =>
  baseUnitOf(system, dim).scale;
