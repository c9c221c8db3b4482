import { z } from "zod";
import type { CosmoArray } from "../modules/cosmo/cosmo-array";
import { cosmoArrayFromJSON, cosmoArrayToJSON } from "../modules/cosmo/serialization";

export const CosmoConvertParams = z.object({
  to: z.enum(["physical", "comoving"]),
  units: z.string().min(1).optional(),
  pretty: z.boolean().default(false),
});

export type CosmoConvertParamsInput = z.input<typeof CosmoConvertParams>;

export interface CosmoConvertResult {
  array: CosmoArray;
  json: string;
  summary: {
    frame: "physical" | "comoving";
    units: string;
    shape: number[];
    cosmoFactor: string | null;
    aFactor: number | null;
    redshift: number | null;
  };
}

/** Read a serialized cosmo array, move it into the requested frame, and re-serialize it. */
export function runCosmoConvert(source: string, params: CosmoConvertParamsInput): CosmoConvertResult {
  const { to, units, pretty } = CosmoConvertParams.parse(params);
  const input = cosmoArrayFromJSON(source);
  const framed = to === "physical" ? input.toPhysical() : input.toComoving();
  const array = units ? framed.inUnits(units) : framed;
  const factor = array.cosmoFactor;
  return {
    array,
    json: cosmoArrayToJSON(array, pretty ? 2 : undefined),
    summary: {
      frame: array.comoving ? "comoving" : "physical",
      units: array.units.expr,
      shape: [...array.shape],
      cosmoFactor: factor ? factor.toString() : null,
      aFactor: factor ? factor.aFactor : null,
      redshift: factor ? factor.redshift : null,
    },
  };
}
