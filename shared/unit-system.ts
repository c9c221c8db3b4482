import { z } from "zod";

/**
 * Unit-system contract.
 *
 * A unit system names one base unit per base dimension. Quantities handed to
 * the snapshot writer are converted into these base units before they are
 * stored, and the writer records the cgs value of each base unit.
 */
export const UnitSystemSpec = z.object({
  schema_version: z.literal("units/1"),
  system: z.string().min(1),
  mass: z.string().min(1),
  length: z.string().min(1),
  time: z.string().min(1),
  temperature: z.string().min(1),
  current: z.string().min(1),
});

export type TUnitSystem = z.infer<typeof UnitSystemSpec>;

export const CGS_UNITS: TUnitSystem = {
  schema_version: "units/1",
  system: "cgs",
  mass: "g",
  length: "cm",
  time: "s",
  temperature: "K",
  current: "A",
};

export const MKS_UNITS: TUnitSystem = {
  schema_version: "units/1",
  system: "mks",
  mass: "kg",
  length: "m",
  time: "s",
  temperature: "K",
  current: "A",
};

// Gadget-style internal units: 1e10 Msun, Mpc, and the time unit that makes
// velocities come out in km/s.
export const COSMO_UNITS: TUnitSystem = {
  schema_version: "units/1",
  system: "cosmo",
  mass: "1e10*Msun",
  length: "Mpc",
  time: "Mpc/(km/s)",
  temperature: "K",
  current: "A",
};

export const NAMED_UNIT_SYSTEMS: Record<string, TUnitSystem> = {
  cgs: CGS_UNITS,
  mks: MKS_UNITS,
  cosmo: COSMO_UNITS,
};
