export const BASE_DIMENSIONS = ["mass", "length", "time", "temperature", "current"] as const;

export type BaseDimension = typeof BASE_DIMENSIONS[number];

export type Dimensions = Readonly<Record<BaseDimension, number>>;

export const DIMENSIONLESS: Dimensions = {
  mass: 0,
  length: 0,
  time: 0,
  temperature: 0,
  current: 0,
};

const build = (fn: (dim: BaseDimension) => number): Dimensions => ({
  mass: fn("mass"),
  length: fn("length"),
  time: fn("time"),
  temperature: fn("temperature"),
  current: fn("current"),
});

export const dimension = (base: BaseDimension, power = 1): Dimensions =>
  build((dim) => (dim === base ? power : 0));

export const multiplyDimensions = (a: Dimensions, b: Dimensions): Dimensions =>
  build((dim) => a[dim] + b[dim]);

export const divideDimensions = (a: Dimensions, b: Dimensions): Dimensions =>
  build((dim) => a[dim] - b[dim]);

// Rounded to absorb float noise from fractional powers such as (cm^3)^(1/3).
export const powDimensions = (a: Dimensions, power: number): Dimensions =>
  build((dim) => Math.round(a[dim] * power * 1e12) / 1e12);

export const sameDimensions = (a: Dimensions, b: Dimensions): boolean =>
  BASE_DIMENSIONS.every((dim) => a[dim] === b[dim]);

export const isDimensionless = (a: Dimensions): boolean => sameDimensions(a, DIMENSIONLESS);

const SYMBOLS: Record<BaseDimension, string> = {
  mass: "M",
  length: "L",
  time: "T",
  temperature: "Θ",
  current: "I",
};

export const formatDimensions = (a: Dimensions): string => {
  const parts = BASE_DIMENSIONS.filter((dim) => a[dim] !== 0).map((dim) =>
    a[dim] === 1 ? SYMBOLS[dim] : `${SYMBOLS[dim]}^${a[dim]}`,
  );
  return parts.length ? parts.join("·") : "1";
};

export const LENGTH = dimension("length");
export const MASS = dimension("mass");
export const TIME = dimension("time");
export const VELOCITY = divideDimensions(LENGTH, TIME);
export const SPECIFIC_ENERGY = powDimensions(VELOCITY, 2);
