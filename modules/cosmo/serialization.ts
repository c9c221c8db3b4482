import {
  SerializedCosmoArray,
  type TSerializedCosmoArray,
  type TSerializedNumber,
} from "@shared/cosmo-schema";
import { CosmoArray } from "./cosmo-array";
import { InvalidConstructionError } from "./errors";

export const encodeNumber = (value: number): TSerializedNumber => {
  if (Number.isNaN(value)) return "NaN";
  if (value === Infinity) return "Infinity";
  if (value === -Infinity) return "-Infinity";
  return value;
};

export const decodeNumber = (value: TSerializedNumber): number => {
  switch (value) {
    case "NaN":
      return NaN;
    case "Infinity":
      return Infinity;
    case "-Infinity":
      return -Infinity;
    default:
      return value;
  }
};

export const serializeCosmoArray = (array: CosmoArray): TSerializedCosmoArray => {
  const [record, dtype, shape, units, values] = array.getState();
  return {
    schema_version: "cosmo_array/1",
    state: [record, dtype, shape, units, values.map(encodeNumber)],
  };
};

export const deserializeCosmoArray = (payload: unknown): CosmoArray => {
  const parsed = SerializedCosmoArray.safeParse(payload);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new InvalidConstructionError(`Invalid serialized cosmo array: ${detail}`);
  }
  const [record, dtype, shape, units, values] = parsed.data.state;
  return CosmoArray.fromState([record, dtype, shape, units, values.map(decodeNumber)]);
};

export const cosmoArrayToJSON = (array: CosmoArray, space?: number): string =>
  JSON.stringify(serializeCosmoArray(array), null, space);

export const cosmoArrayFromJSON = (text: string): CosmoArray => {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidConstructionError(`Serialized cosmo array is not valid JSON: ${message}`);
  }
  return deserializeCosmoArray(payload);
};
