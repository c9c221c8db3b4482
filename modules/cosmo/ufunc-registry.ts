import type { ReducibleUfunc, UfuncName } from "../units/ufuncs";
import { CosmoFactor } from "./cosmo-factor";
import { MissingCosmoFactorError, UfuncUnsupportedError } from "./errors";

export type CosmoRule =
  | "preserve"
  | "passthrough"
  | "multiply"
  | "divide"
  | "power"
  | "strip"
  | "comparison"
  | "unsupported";

/**
 * Factor of one operand: a CosmoFactor, `null` for a cosmo array without one,
 * `undefined` for a plain operand that takes no part in the tag.
 */
export type OperandFactor = CosmoFactor | null | undefined;

export const cosmoRuleFor = (name: UfuncName): CosmoRule => {
  switch (name) {
    case "add":
    case "subtract":
    case "remainder":
    case "mod":
    case "fmod":
    case "hypot":
    case "maximum":
    case "minimum":
    case "fmax":
    case "fmin":
    case "nextafter":
    case "heaviside":
    case "ones_like":
      return "preserve";
    case "negative":
    case "positive":
    case "absolute":
    case "fabs":
    case "conj":
    case "floor":
    case "ceil":
    case "trunc":
    case "spacing":
    case "copysign":
    case "clip":
    case "modf":
      return "passthrough";
    case "multiply":
    case "matmul":
      return "multiply";
    case "divide":
    case "true_divide":
    case "floor_divide":
      return "divide";
    case "power":
      return "power";
    case "logaddexp":
    case "logaddexp2":
    case "rint":
    case "sign":
    case "exp":
    case "exp2":
    case "log":
    case "log2":
    case "log10":
    case "expm1":
    case "log1p":
    case "sin":
    case "cos":
    case "tan":
    case "sinh":
    case "cosh":
    case "tanh":
    case "arcsin":
    case "arccos":
    case "arctan":
    case "arctan2":
    case "arcsinh":
    case "arccosh":
    case "arctanh":
    case "deg2rad":
    case "rad2deg":
    case "logical_not":
    case "isreal":
    case "iscomplex":
    case "isfinite":
    case "isinf":
    case "isnan":
    case "signbit":
    case "frexp":
      return "strip";
    case "greater":
    case "greater_equal":
    case "less":
    case "less_equal":
    case "not_equal":
    case "equal":
    case "logical_and":
    case "logical_or":
    case "logical_xor":
      return "comparison";
    case "sqrt":
    case "square":
    case "reciprocal":
    case "divmod":
      return "unsupported";
  }
};

const UNSUPPORTED_REASONS: Partial<Record<UfuncName, string>> = {
  sqrt: "fractional powers of the scale factor dependence are not derived",
  square: "use power with an explicit exponent",
  reciprocal: "use divide with an explicit numerator",
  divmod: "the quotient and remainder would need different factors",
};

/**
 * Factors of the operands that are cosmo arrays. All-null means every tagged
 * operand is exempt from scaling; a mix of null and non-null cannot combine.
 */
const taggedFactors = (name: UfuncName, factors: readonly OperandFactor[]): CosmoFactor[] | null => {
  const tagged = factors.filter((f): f is CosmoFactor | null => f !== undefined);
  const present = tagged.filter((f): f is CosmoFactor => f !== null);
  if (present.length === 0) return null;
  if (present.length !== tagged.length) throw new MissingCosmoFactorError(`apply ${name}`);
  return present;
};

/**
 * Output cosmo factor of ufunc `name` given the operands' factors.
 * `exponent` is the scalar exponent of `power`, when it has one.
 */
export const resolveCosmoFactor = (
  name: UfuncName,
  factors: readonly OperandFactor[],
  exponent?: number,
): CosmoFactor | null => {
  switch (cosmoRuleFor(name)) {
    case "unsupported":
      throw new UfuncUnsupportedError(name, UNSUPPORTED_REASONS[name] ?? "no propagation rule");
    case "strip":
    case "comparison":
      return null;
    case "passthrough":
      return factors[0] ?? null;
    case "preserve": {
      const present = taggedFactors(name, factors);
      if (!present) return null;
      return present.reduce((acc, f) => {
        const combined = acc.combineAdditive(f, name);
        if (!combined.ok) throw combined.error;
        return combined.value;
      });
    }
    case "multiply": {
      const present = taggedFactors(name, factors);
      if (!present) return null;
      return present.reduce((acc, f) => acc.multiply(f));
    }
    case "divide": {
      const [numerator, denominator] = factors;
      const present = taggedFactors(name, factors);
      if (!present) return null;
      if (numerator instanceof CosmoFactor && denominator instanceof CosmoFactor) {
        return numerator.divide(denominator);
      }
      // one side is plain: x / n keeps x's factor, n / x inverts it
      return numerator instanceof CosmoFactor ? numerator : present[0].raiseToPower(-1);
    }
    case "power": {
      const [base, exponentFactor] = factors;
      if (exponentFactor && exponentFactor.aFactor !== 1) {
        throw new UfuncUnsupportedError(name, "the exponent must not scale with the scale factor");
      }
      if (!base) return null;
      if (exponent === undefined) {
        throw new UfuncUnsupportedError(name, "the exponent of a cosmo array must be a single scalar");
      }
      return base.raiseToPower(exponent);
    }
  }
};

/** Cosmo factor of `reduce(name)` over `count` elements. */
export const reduceCosmoFactor = (
  name: ReducibleUfunc,
  factor: CosmoFactor | null,
  count: number,
): CosmoFactor | null => {
  if (!factor) return null;
  switch (name) {
    case "add":
    case "maximum":
    case "minimum":
    case "fmax":
    case "fmin":
      return factor;
    case "multiply":
      return factor.raiseToPower(count);
    case "logical_and":
    case "logical_or":
      return null;
  }
};
