import {
  LENGTH,
  MASS,
  SPECIFIC_ENERGY,
  VELOCITY,
  type Dimensions,
} from "../units/dimensions";

export const PARTICLE_TYPES = [
  { id: 0, name: "gas" },
  { id: 1, name: "dark_matter" },
  { id: 2, name: "boundary" },
  { id: 4, name: "stars" },
  { id: 5, name: "black_holes" },
] as const;

export type ParticleTypeName = typeof PARTICLE_TYPES[number]["name"];

/** Slots in the per-type particle-count header arrays. */
export const PARTICLE_TYPE_SLOTS = 6;

export type FieldName =
  | "coordinates"
  | "velocities"
  | "masses"
  | "smoothing_length"
  | "internal_energy"
  | "particle_ids";

export interface FieldSpec {
  /** Dataset name inside the particle group. */
  dataset: string;
  /** Required dimensions, or null when the field is not checked. */
  dimensions: Dimensions | null;
}

export const FIELD_SPECS: Readonly<Record<FieldName, FieldSpec>> = {
  coordinates: { dataset: "Coordinates", dimensions: LENGTH },
  velocities: { dataset: "Velocities", dimensions: VELOCITY },
  masses: { dataset: "Masses", dimensions: MASS },
  smoothing_length: { dataset: "SmoothingLength", dimensions: LENGTH },
  internal_energy: { dataset: "InternalEnergy", dimensions: SPECIFIC_ENERGY },
  particle_ids: { dataset: "ParticleIDs", dimensions: null },
};

/** Fields a simulation needs to start, per particle type. */
export const REQUIRED_FIELDS = {
  gas: ["coordinates", "velocities", "masses", "smoothing_length", "internal_energy", "particle_ids"],
  dark_matter: ["coordinates", "velocities", "masses", "particle_ids"],
  boundary: ["coordinates", "velocities", "masses", "particle_ids"],
  stars: ["coordinates", "velocities", "masses", "smoothing_length", "particle_ids"],
  black_holes: ["coordinates", "velocities", "masses", "particle_ids"],
} as const satisfies Record<ParticleTypeName, readonly FieldName[]>;

export type FieldsOf<K extends ParticleTypeName> = typeof REQUIRED_FIELDS[K][number];

export const particleGroupName = (id: number) => `PartType${id}`;
