import { z } from "zod";

/**
 * Wire contracts for cosmo arrays.
 *
 * A serialized array is its state tuple, `[cosmo, dtype, shape, units, values]`,
 * inside a versioned envelope. JSON has no NaN or Infinity, so non-finite
 * values travel as the strings "NaN", "Infinity" and "-Infinity".
 */

export const NonFiniteToken = z.enum(["NaN", "Infinity", "-Infinity"]);

export const SerializedNumber = z.union([z.number(), NonFiniteToken]);

export type TSerializedNumber = z.infer<typeof SerializedNumber>;

export const CosmoFactorRecord = z.object({
  expr: z.string().min(1),
  scaleFactor: z.number().positive(),
});

export const CosmoRecord = z.object({
  cosmoFactor: CosmoFactorRecord.nullable(),
  comoving: z.boolean(),
  compression: z.string().nullable().default(null),
});

export type TCosmoRecord = z.infer<typeof CosmoRecord>;

export const DTypeName = z.enum(["float64", "float32", "int32", "bool"]);

export const SerializedCosmoArray = z.object({
  schema_version: z.literal("cosmo_array/1"),
  state: z.tuple([
    CosmoRecord,
    DTypeName,
    z.array(z.number().int().nonnegative()),
    z.string(),
    z.array(SerializedNumber),
  ]),
});

export type TSerializedCosmoArray = z.infer<typeof SerializedCosmoArray>;

type NumericTree = number | boolean | NumericTree[];

export const NumericTreeSchema: z.ZodType<NumericTree> = z.lazy(() =>
  z.union([z.number(), z.boolean(), z.array(NumericTreeSchema)]),
);

/** Foreign quantity shaped as `{ value, unit }`. */
export const ValueUnitRecord = z.object({
  value: NumericTreeSchema,
  unit: z.string(),
});

export type TValueUnitRecord = z.infer<typeof ValueUnitRecord>;

/** Foreign quantity shaped as `{ magnitude, units }`. */
export const MagnitudeUnitsRecord = z.object({
  magnitude: NumericTreeSchema,
  units: z.string(),
});

export type TMagnitudeUnitsRecord = z.infer<typeof MagnitudeUnitsRecord>;
