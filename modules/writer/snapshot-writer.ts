import type { TUnitSystem } from "@shared/unit-system";
import { COSMO_WRITER_COMPRESS, COSMO_WRITER_UNIT_SYSTEM, COSMO_WRITER_VERBOSE } from "../core/env";
import { CosmoArray } from "../cosmo/cosmo-array";
import { formatDimensions, LENGTH, sameDimensions } from "../units/dimensions";
import { InvalidConstructionError, UnitIncompatibleError } from "../units/errors";
import { Quantity } from "../units/quantity";
import { baseUnitFor, cgsConversion, resolveUnitSystem, type UnitSystemLike } from "../units/unit-system";
import { SnapshotConsistencyError } from "./errors";
import {
  FIELD_SPECS,
  PARTICLE_TYPE_SLOTS,
  PARTICLE_TYPES,
  REQUIRED_FIELDS,
  particleGroupName,
  type FieldName,
  type FieldsOf,
  type ParticleTypeName,
} from "./particle-fields";
import type { AttributeValue, SnapshotDataset, SnapshotSink } from "./sink";

export type WriterValue = Quantity | CosmoArray;

const COMPRESSION_FILTER = "gzip";

type Logger = (...args: unknown[]) => void;

const makeLogger = (verbose: boolean): Logger =>
  verbose ? (...args) => console.log("[SnapshotWriter]", ...args) : () => undefined;

const datasetAttributes = (value: WriterValue): Record<string, AttributeValue> => {
  if (!(value instanceof CosmoArray)) return {};
  const attributes: Record<string, AttributeValue> = { Comoving: value.comoving ? 1 : 0 };
  if (value.cosmoFactor) {
    attributes["Cosmological factor expression"] = value.cosmoFactor.expr;
    attributes["Scale factor"] = value.cosmoFactor.scaleFactor;
  }
  return attributes;
};

/**
 * The required arrays of one particle type. Values are converted into the
 * writer's unit system as they are assigned.
 */
export class ParticleDataset<K extends ParticleTypeName> {
  readonly particleType: K;
  readonly id: number;
  readonly groupName: string;
  nPart = 0;
  requiresParticleIdsBeforeWrite = false;
  private readonly fields = new Map<FieldName, WriterValue>();
  private readonly unitSystem: TUnitSystem;
  private readonly log: Logger;

  constructor(particleType: K, id: number, unitSystem: TUnitSystem, log: Logger = makeLogger(false)) {
    this.particleType = particleType;
    this.id = id;
    this.groupName = particleGroupName(id);
    this.unitSystem = unitSystem;
    this.log = log;
  }

  get requiredFields(): readonly FieldName[] {
    return REQUIRED_FIELDS[this.particleType];
  }

  get(field: FieldsOf<K>): WriterValue | undefined {
    return this.fields.get(field);
  }

  set(field: FieldsOf<K>, value: WriterValue): void {
    if (!(value instanceof Quantity || value instanceof CosmoArray)) {
      throw new InvalidConstructionError(`${this.particleType}.${field} must be a unit-bearing array`);
    }
    const expected = FIELD_SPECS[field].dimensions;
    if (expected && !sameDimensions(value.units.dimensions, expected)) {
      throw new UnitIncompatibleError(
        value.units.expr,
        baseUnitFor(this.unitSystem, expected).expr,
        `${this.particleType}.${field} needs dimensions of ${formatDimensions(expected)}`,
      );
    }
    const frame = value instanceof CosmoArray && !value.compatibleWithComoving() ? value.toComoving() : value;
    const stored = frame.inBase(this.unitSystem);
    this.fields.set(field, stored);
    this.log(`${this.particleType}.${field} <- ${stored.size} values in ${stored.units.expr}`);
  }

  delete(field: FieldsOf<K>): void {
    this.fields.delete(field);
  }

  assignParticleIds(ids: Quantity): void {
    this.fields.set("particle_ids", ids);
  }

  /** True when none of the required arrays has been assigned. */
  checkEmpty(): boolean {
    return this.requiredFields.every((field) => !this.fields.has(field));
  }

  /**
   * Every required array except the particle IDs must be present, and all
   * present arrays must hold the same number of particles. Sets `nPart` and
   * `requiresParticleIdsBeforeWrite`.
   */
  checkConsistent(): boolean {
    this.requiresParticleIdsBeforeWrite = false;
    const sizes: Array<[FieldName, number]> = [];
    for (const field of this.requiredFields) {
      const value = this.fields.get(field);
      if (value) {
        sizes.push([field, value.ndim === 0 ? 1 : value.shape[0]]);
      } else if (field === "particle_ids") {
        this.requiresParticleIdsBeforeWrite = true;
      } else {
        throw new SnapshotConsistencyError(this.particleType, `required dataset ${field} is missing`, field);
      }
    }
    const [, first] = sizes[0];
    if (sizes.some(([, n]) => n !== first)) {
      const detail = sizes.map(([field, n]) => `${field}=${n}`).join(", ");
      throw new SnapshotConsistencyError(this.particleType, `arrays are not of the same size (${detail})`);
    }
    this.nPart = first;
    return true;
  }

  writeGroup(sink: SnapshotSink, compression: string | null): void {
    const group = sink.createGroup(this.groupName);
    for (const field of this.requiredFields) {
      const value = this.fields.get(field);
      if (!value) {
        throw new SnapshotConsistencyError(this.particleType, `required dataset ${field} is missing`, field);
      }
      const dataset: SnapshotDataset = {
        dtype: value.dtype,
        shape: [...value.shape],
        values: Array.from(value.values),
        units: value.units.expr,
        compression,
        attributes: datasetAttributes(value),
      };
      group.writeDataset(FIELD_SPECS[field].dataset, dataset);
    }
  }
}

export type ParticleDatasets = { [K in ParticleTypeName]: ParticleDataset<K> };

export interface SnapshotWriterOptions {
  unitSystem?: UnitSystemLike;
  compress?: boolean;
  verbose?: boolean;
}

export interface SnapshotWriteSummary {
  groups: string[];
  numPartTotal: number[];
  generatedIds: boolean;
}

/**
 * Collects particle arrays for an initial-conditions snapshot and writes
 * them, with header and unit metadata, into a sink.
 *
 * ```ts
 * const writer = new SnapshotWriter(100, { unitSystem: "cosmo" });
 * writer.particles.gas.set("coordinates", positions);
 * writer.write(sink);
 * ```
 */
export class SnapshotWriter {
  readonly unitSystem: TUnitSystem;
  readonly boxSize: number | number[];
  readonly compress: boolean;
  readonly particles: ParticleDatasets;
  private readonly log: Logger;

  constructor(boxSize: number | readonly number[] | Quantity, options: SnapshotWriterOptions = {}) {
    this.unitSystem = resolveUnitSystem(options.unitSystem ?? COSMO_WRITER_UNIT_SYSTEM);
    this.compress = options.compress ?? COSMO_WRITER_COMPRESS;
    this.log = makeLogger(options.verbose ?? COSMO_WRITER_VERBOSE);
    this.boxSize = this.resolveBoxSize(boxSize);
    this.particles = {
      gas: new ParticleDataset("gas", 0, this.unitSystem, this.log),
      dark_matter: new ParticleDataset("dark_matter", 1, this.unitSystem, this.log),
      boundary: new ParticleDataset("boundary", 2, this.unitSystem, this.log),
      stars: new ParticleDataset("stars", 4, this.unitSystem, this.log),
      black_holes: new ParticleDataset("black_holes", 5, this.unitSystem, this.log),
    };
  }

  private resolveBoxSize(boxSize: number | readonly number[] | Quantity): number | number[] {
    if (!(boxSize instanceof Quantity)) return typeof boxSize === "number" ? boxSize : [...boxSize];
    if (!sameDimensions(boxSize.units.dimensions, LENGTH)) {
      throw new UnitIncompatibleError(boxSize.units.expr, this.unitSystem.length, "box size must be a length");
    }
    const values = Array.from(boxSize.inBase(this.unitSystem).values);
    return values.length === 1 ? values[0] : values;
  }

  /** Datasets in particle-type order. */
  datasets(): ParticleDataset<ParticleTypeName>[] {
    return PARTICLE_TYPES.map(({ name }) => this.particles[name]);
  }

  /** Number the particles 1, 2, ... contiguously across types, in type order. */
  private generateIds(datasets: readonly ParticleDataset<ParticleTypeName>[]): void {
    let next = 1;
    for (const dataset of datasets) {
      const start = next;
      const ids = Int32Array.from({ length: dataset.nPart }, (_, i) => start + i);
      dataset.assignParticleIds(new Quantity(ids, "dimensionless", { copy: false }));
      next += dataset.nPart;
    }
    this.log(`generated ${next - 1} particle IDs`);
  }

  private writeMetadata(sink: SnapshotSink, datasets: readonly ParticleDataset<ParticleTypeName>[]): number[] {
    const numPart = Array.from({ length: PARTICLE_TYPE_SLOTS }, () => 0);
    for (const dataset of datasets) numPart[dataset.id] = dataset.nPart;
    const header = sink.createGroup("Header");
    header.setAttribute("BoxSize", this.boxSize);
    header.setAttribute("NumPart_Total", numPart);
    header.setAttribute("NumPart_Total_HighWord", Array.from({ length: PARTICLE_TYPE_SLOTS }, () => 0));
    header.setAttribute("Flag_Entropy_ICs", 0);
    return numPart;
  }

  private writeUnits(sink: SnapshotSink): void {
    const units = sink.createGroup("Units");
    units.setAttribute("Unit mass in cgs (U_M)", cgsConversion(this.unitSystem, "mass"));
    units.setAttribute("Unit length in cgs (U_L)", cgsConversion(this.unitSystem, "length"));
    units.setAttribute("Unit time in cgs (U_t)", cgsConversion(this.unitSystem, "time"));
    units.setAttribute("Unit current in cgs (U_I)", 1);
    units.setAttribute("Unit temperature in cgs (U_T)", cgsConversion(this.unitSystem, "temperature"));
  }

  write(sink: SnapshotSink): SnapshotWriteSummary {
    const toWrite = this.datasets().filter((dataset) => !dataset.checkEmpty() && dataset.checkConsistent());
    const generatedIds = toWrite.some((dataset) => dataset.requiresParticleIdsBeforeWrite);
    if (generatedIds) this.generateIds(toWrite);

    const numPartTotal = this.writeMetadata(sink, toWrite);
    this.writeUnits(sink);
    const compression = this.compress ? COMPRESSION_FILTER : null;
    for (const dataset of toWrite) dataset.writeGroup(sink, compression);

    const groups = toWrite.map((dataset) => dataset.groupName);
    this.log(`wrote ${groups.join(", ") || "no particle groups"} in ${this.unitSystem.system} units`);
    return { groups, numPartTotal, generatedIds };
  }
}
