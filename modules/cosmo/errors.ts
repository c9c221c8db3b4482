export { InvalidConstructionError, UnitIncompatibleError } from "../units/errors";

export interface CosmoFactorSnapshot {
  expr: string;
  scaleFactor: number;
}

/** Two scale-factor dependences that cannot be combined additively. */
export class InvalidScaleFactorError extends Error {
  readonly operation: string;
  readonly left: CosmoFactorSnapshot;
  readonly right: CosmoFactorSnapshot;

  constructor(
    operation: string,
    left: CosmoFactorSnapshot,
    right: CosmoFactorSnapshot,
    reason: "scale factor" | "dependence",
  ) {
    const detail =
      reason === "scale factor"
        ? `different scale factors ${left.scaleFactor} and ${right.scaleFactor}`
        : `different scale factor dependence, ${left.expr} and ${right.expr}`;
    super(`Attempting to ${operation} two cosmo_factors with ${detail}`);
    this.name = "InvalidScaleFactorError";
    this.operation = operation;
    this.left = left;
    this.right = right;
  }
}

export class UfuncUnsupportedError extends Error {
  readonly ufunc: string;
  readonly reason: string;

  constructor(ufunc: string, reason: string) {
    super(`Cosmo factor propagation for ${ufunc} is not implemented: ${reason}`);
    this.name = "UfuncUnsupportedError";
    this.ufunc = ufunc;
    this.reason = reason;
  }
}

export class MissingCosmoFactorError extends Error {
  constructor(action: string) {
    super(`Cannot ${action}: the array has no cosmo_factor`);
    this.name = "MissingCosmoFactorError";
  }
}
