import nerdamer from "nerdamer";
import {
  InvalidConstructionError,
  InvalidScaleFactorError,
  type CosmoFactorSnapshot,
} from "./errors";

/** The symbol standing for the cosmological scale factor in expressions. */
export const SCALE_FACTOR_SYMBOL = "a";

export type CosmoFactorResult =
  | { ok: true; value: CosmoFactor }
  | { ok: false; error: InvalidScaleFactorError };

const parseExpression = (expr: string | number): nerdamer.Expression => {
  const source = String(expr).trim().replace(/\*\*/g, "^");
  if (!source) throw new InvalidConstructionError("cosmo_factor expression is empty");
  let parsed: nerdamer.Expression;
  try {
    parsed = nerdamer(source);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidConstructionError(`Cannot parse cosmo_factor expression "${source}": ${message}`);
  }
  // nerdamer() records every parsed expression in a global history
  nerdamer.clear("last");
  const foreign = parsed.variables().filter((name) => name !== SCALE_FACTOR_SYMBOL);
  if (foreign.length > 0) {
    throw new InvalidConstructionError(
      `cosmo_factor expression "${source}" may only depend on ${SCALE_FACTOR_SYMBOL}, found ${foreign.join(", ")}`,
    );
  }
  return parsed;
};

/**
 * How a quantity scales with the cosmological scale factor, pinned to the
 * scale factor of the data: physical = comoving × expr(a = scaleFactor).
 *
 * e.g. comoving positions scale as `a`, densities as `a^(-3)`:
 *
 * ```ts
 * const density = new CosmoFactor("a^(-3)", 0.97);
 * ```
 */
export class CosmoFactor {
  readonly expr: string;
  readonly scaleFactor: number;
  private readonly expression: nerdamer.Expression;
  private cachedAFactor?: number;

  constructor(expr: string | number | nerdamer.Expression, scaleFactor: number) {
    if (!Number.isFinite(scaleFactor) || scaleFactor <= 0) {
      throw new InvalidConstructionError(`scale factor must be a positive finite number, got ${scaleFactor}`);
    }
    this.expression = typeof expr === "object" ? expr : parseExpression(expr);
    this.expr = this.expression.toString();
    this.scaleFactor = scaleFactor;
  }

  /** `a^exponent` at the given scale factor. */
  static fromExponent(exponent: number, scaleFactor: number): CosmoFactor {
    return new CosmoFactor(`${SCALE_FACTOR_SYMBOL}^(${exponent})`, scaleFactor);
  }

  static fromSnapshot(snapshot: CosmoFactorSnapshot): CosmoFactor {
    return new CosmoFactor(snapshot.expr, snapshot.scaleFactor);
  }

  /** Comoving → physical conversion factor: expr evaluated at the scale factor. */
  get aFactor(): number {
    if (this.cachedAFactor === undefined) {
      const evaluate = this.expression.buildFunction([SCALE_FACTOR_SYMBOL]);
      this.cachedAFactor = Number(evaluate(this.scaleFactor));
    }
    return this.cachedAFactor;
  }

  /** z = 1/a - 1 */
  get redshift(): number {
    return 1 / this.scaleFactor - 1;
  }

  snapshot(): CosmoFactorSnapshot {
    return { expr: this.expr, scaleFactor: this.scaleFactor };
  }

  /** Same expression and same scale factor. */
  sameAs(other: CosmoFactor): boolean {
    return this.scaleFactor === other.scaleFactor && this.expr === other.expr;
  }

  combineAdditive(other: CosmoFactor, operation = "add"): CosmoFactorResult {
    if (this.scaleFactor !== other.scaleFactor) {
      return {
        ok: false,
        error: new InvalidScaleFactorError(operation, this.snapshot(), other.snapshot(), "scale factor"),
      };
    }
    if (this.expr !== other.expr) {
      return {
        ok: false,
        error: new InvalidScaleFactorError(operation, this.snapshot(), other.snapshot(), "dependence"),
      };
    }
    return { ok: true, value: new CosmoFactor(this.expression, this.scaleFactor) };
  }

  combineMultiplicative(other: CosmoFactor, operation: "multiply" | "divide" = "multiply"): CosmoFactorResult {
    if (this.scaleFactor !== other.scaleFactor) {
      return {
        ok: false,
        error: new InvalidScaleFactorError(operation, this.snapshot(), other.snapshot(), "scale factor"),
      };
    }
    const combined =
      operation === "multiply"
        ? this.expression.multiply(other.expression)
        : this.expression.divide(other.expression);
    return { ok: true, value: new CosmoFactor(combined, this.scaleFactor) };
  }

  raiseToPower(power: number): CosmoFactor {
    return new CosmoFactor(this.expression.pow(`(${power})`), this.scaleFactor);
  }

  add(other: CosmoFactor): CosmoFactor {
    return unwrap(this.combineAdditive(other, "add"));
  }

  subtract(other: CosmoFactor): CosmoFactor {
    return unwrap(this.combineAdditive(other, "subtract"));
  }

  multiply(other: CosmoFactor): CosmoFactor {
    return unwrap(this.combineMultiplicative(other, "multiply"));
  }

  divide(other: CosmoFactor): CosmoFactor {
    return unwrap(this.combineMultiplicative(other, "divide"));
  }

  pow(power: number): CosmoFactor {
    return this.raiseToPower(power);
  }

  /** Orders by conversion factor, not by expression. */
  compare(other: CosmoFactor): -1 | 0 | 1 {
    const lhs = this.aFactor;
    const rhs = other.aFactor;
    if (lhs < rhs) return -1;
    if (lhs > rhs) return 1;
    return 0;
  }

  lessThan(other: CosmoFactor): boolean {
    return this.aFactor < other.aFactor;
  }

  greaterThan(other: CosmoFactor): boolean {
    return this.aFactor > other.aFactor;
  }

  lessOrEqual(other: CosmoFactor): boolean {
    return this.aFactor <= other.aFactor;
  }

  greaterOrEqual(other: CosmoFactor): boolean {
    return this.aFactor >= other.aFactor;
  }

  equals(other: CosmoFactor): boolean {
    return this.aFactor === other.aFactor;
  }

  notEquals(other: CosmoFactor): boolean {
    return this.aFactor !== other.aFactor;
  }

  toString(): string {
    return `${this.expr} at a=${this.scaleFactor}`;
  }
}

const unwrap = (result: CosmoFactorResult): CosmoFactor => {
  if (!result.ok) throw result.error;
  return result.value;
};
