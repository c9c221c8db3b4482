import {
  AU_CM,
  GIGAYEAR_S,
  KILOPARSEC_CM,
  MEGAPARSEC_CM,
  MEGAYEAR_S,
  PARSEC_CM,
  SOLAR_MASS_G,
  YEAR_S,
} from "@shared/physics-const";
import {
  DIMENSIONLESS,
  dimension,
  divideDimensions,
  formatDimensions,
  isDimensionless,
  multiplyDimensions,
  powDimensions,
  sameDimensions,
  type Dimensions,
} from "./dimensions";
import { InvalidConstructionError, UnitIncompatibleError } from "./errors";

interface UnitSymbol {
  scale: number;
  dimensions: Dimensions;
}

const L = dimension("length");
const M = dimension("mass");
const T = dimension("time");
const ENERGY = divideDimensions(multiplyDimensions(M, powDimensions(L, 2)), powDimensions(T, 2));
const FORCE = divideDimensions(multiplyDimensions(M, L), powDimensions(T, 2));

/** Unit symbols, scaled to cgs base units. */
export const UNIT_SYMBOLS: Readonly<Record<string, UnitSymbol>> = {
  dimensionless: { scale: 1, dimensions: DIMENSIONLESS },
  rad: { scale: 1, dimensions: DIMENSIONLESS },
  deg: { scale: Math.PI / 180, dimensions: DIMENSIONLESS },
  g: { scale: 1, dimensions: M },
  kg: { scale: 1e3, dimensions: M },
  Msun: { scale: SOLAR_MASS_G, dimensions: M },
  cm: { scale: 1, dimensions: L },
  m: { scale: 1e2, dimensions: L },
  km: { scale: 1e5, dimensions: L },
  AU: { scale: AU_CM, dimensions: L },
  pc: { scale: PARSEC_CM, dimensions: L },
  kpc: { scale: KILOPARSEC_CM, dimensions: L },
  Mpc: { scale: MEGAPARSEC_CM, dimensions: L },
  s: { scale: 1, dimensions: T },
  yr: { scale: YEAR_S, dimensions: T },
  Myr: { scale: MEGAYEAR_S, dimensions: T },
  Gyr: { scale: GIGAYEAR_S, dimensions: T },
  Hz: { scale: 1, dimensions: powDimensions(T, -1) },
  K: { scale: 1, dimensions: dimension("temperature") },
  A: { scale: 1, dimensions: dimension("current") },
  erg: { scale: 1, dimensions: ENERGY },
  J: { scale: 1e7, dimensions: ENERGY },
  dyn: { scale: 1, dimensions: FORCE },
  N: { scale: 1e5, dimensions: FORCE },
};

const needsParens = (expr: string) => /[*/]/.test(expr);
const wrap = (expr: string) => (needsParens(expr) ? `(${expr})` : expr);

export class Unit {
  readonly expr: string;
  /** Value of one of this unit in cgs base units. */
  readonly scale: number;
  readonly dimensions: Dimensions;

  constructor(expr: string, scale: number, dimensions: Dimensions) {
    this.expr = expr;
    this.scale = scale;
    this.dimensions = dimensions;
  }

  get isDimensionless(): boolean {
    return isDimensionless(this.dimensions);
  }

  multiply(other: Unit): Unit {
    if (other.expr === "dimensionless") return this;
    if (this.expr === "dimensionless") return other;
    return new Unit(
      `${this.expr}*${wrap(other.expr)}`,
      this.scale * other.scale,
      multiplyDimensions(this.dimensions, other.dimensions),
    );
  }

  divide(other: Unit): Unit {
    if (other.expr === "dimensionless") return this;
    const numerator = this.expr === "dimensionless" ? "1" : this.expr;
    return new Unit(
      `${numerator}/${wrap(other.expr)}`,
      this.scale / other.scale,
      divideDimensions(this.dimensions, other.dimensions),
    );
  }

  pow(power: number): Unit {
    if (power === 1 || this.expr === "dimensionless") return this;
    if (power === 0) return DIMENSIONLESS_UNIT;
    return new Unit(
      `${wrap(this.expr)}^${power < 0 ? `(${power})` : power}`,
      Math.pow(this.scale, power),
      powDimensions(this.dimensions, power),
    );
  }

  /** Factor f such that a value in this unit times f is the value in `target`. */
  conversionFactorTo(target: Unit): number {
    if (!sameDimensions(this.dimensions, target.dimensions)) {
      throw new UnitIncompatibleError(
        this.expr,
        target.expr,
        `${formatDimensions(this.dimensions)} vs ${formatDimensions(target.dimensions)}`,
      );
    }
    return this.scale / target.scale;
  }

  equals(other: Unit): boolean {
    return this.scale === other.scale && sameDimensions(this.dimensions, other.dimensions);
  }

  toString(): string {
    return this.expr;
  }
}

export const DIMENSIONLESS_UNIT = new Unit("dimensionless", 1, DIMENSIONLESS);

type Token =
  | { kind: "number"; text: string; value: number }
  | { kind: "symbol"; text: string }
  | { kind: "op"; text: "*" | "/" | "^" | "(" | ")" | "-" };

const TOKEN_RE = /\s*(?:(\d+(?:\.\d*)?(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?)|([A-Za-z_][A-Za-z0-9_]*)|(\*\*|[*/^()-]))/y;

const tokenize = (input: string): Token[] => {
  const tokens: Token[] = [];
  let pos = 0;
  while (pos < input.length) {
    if (/^\s*$/.test(input.slice(pos))) break;
    TOKEN_RE.lastIndex = pos;
    const match = TOKEN_RE.exec(input);
    if (!match) {
      throw new InvalidConstructionError(
        `Cannot parse unit "${input}" at position ${pos}`,
      );
    }
    pos = TOKEN_RE.lastIndex;
    const [, num, sym, op] = match;
    if (num !== undefined) {
      tokens.push({ kind: "number", text: num, value: Number(num) });
    } else if (sym !== undefined) {
      tokens.push({ kind: "symbol", text: sym });
    } else if (op === "**" || op === "^") {
      tokens.push({ kind: "op", text: "^" });
    } else if (op === "*" || op === "/" || op === "(" || op === ")" || op === "-") {
      tokens.push({ kind: "op", text: op });
    }
  }
  return tokens;
};

class UnitParser {
  private pos = 0;

  constructor(private readonly source: string, private readonly tokens: Token[]) {}

  parse(): Unit {
    const unit = this.product();
    if (this.pos < this.tokens.length) {
      throw this.fail(`unexpected "${this.tokens[this.pos].text}"`);
    }
    return unit;
  }

  private peekOp(): string | undefined {
    const token = this.tokens[this.pos];
    return token?.kind === "op" ? token.text : undefined;
  }

  private product(): Unit {
    let unit = this.power();
    for (let op = this.peekOp(); op === "*" || op === "/"; op = this.peekOp()) {
      this.pos += 1;
      const rhs = this.power();
      unit = op === "*" ? unit.multiply(rhs) : unit.divide(rhs);
    }
    return unit;
  }

  private power(): Unit {
    const base = this.atom();
    if (this.peekOp() !== "^") return base;
    this.pos += 1;
    return base.pow(this.exponent());
  }

  private exponent(): number {
    if (this.peekOp() === "(") {
      this.pos += 1;
      let value = this.signedNumber();
      if (this.peekOp() === "/") {
        this.pos += 1;
        value /= this.signedNumber();
      }
      this.expect(")");
      return value;
    }
    return this.signedNumber();
  }

  private signedNumber(): number {
    let sign = 1;
    if (this.peekOp() === "-") {
      sign = -1;
      this.pos += 1;
    }
    const token = this.tokens[this.pos];
    if (token?.kind !== "number") throw this.fail("expected a number");
    this.pos += 1;
    return sign * token.value;
  }

  private atom(): Unit {
    const token = this.tokens[this.pos];
    if (!token) throw this.fail("unexpected end of expression");
    this.pos += 1;
    if (token.kind === "number") {
      return token.value === 1
        ? DIMENSIONLESS_UNIT
        : new Unit(token.text, token.value, DIMENSIONLESS);
    }
    if (token.kind === "symbol") {
      const symbol = UNIT_SYMBOLS[token.text];
      if (!symbol) throw this.fail(`unknown unit symbol "${token.text}"`);
      return token.text === "dimensionless"
        ? DIMENSIONLESS_UNIT
        : new Unit(token.text, symbol.scale, symbol.dimensions);
    }
    if (token.text === "(") {
      const inner = this.product();
      this.expect(")");
      return inner;
    }
    throw this.fail(`unexpected "${token.text}"`);
  }

  private expect(op: string) {
    if (this.peekOp() !== op) throw this.fail(`expected "${op}"`);
    this.pos += 1;
  }

  private fail(reason: string) {
    return new InvalidConstructionError(`Cannot parse unit "${this.source}": ${reason}`);
  }
}

const parsed = new Map<string, Unit>();

/**
 * Parse a unit expression such as `g/cm**3`, `km/s` or `1e10*Msun`.
 * `**` and `^` both denote powers; an empty string is dimensionless.
 */
export const parseUnit = (input: string): Unit => {
  const source = input.trim();
  if (!source) return DIMENSIONLESS_UNIT;
  const cached = parsed.get(source);
  if (cached) return cached;
  const unit = new UnitParser(source, tokenize(source)).parse();
  // Keep what the caller wrote as the display form.
  const result = unit === DIMENSIONLESS_UNIT ? unit : new Unit(source, unit.scale, unit.dimensions);
  parsed.set(source, result);
  return result;
};

export type UnitLike = Unit | string;

export const toUnit = (units: UnitLike | undefined): Unit => {
  if (units === undefined) return DIMENSIONLESS_UNIT;
  return typeof units === "string" ? parseUnit(units) : units;
};
