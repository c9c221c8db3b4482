import { describe, expect, it } from "vitest";
import { MEGAPARSEC_CM, SOLAR_MASS_G } from "@shared/physics-const";
import { CosmoArray, CosmoFactor } from "../modules/cosmo";
import { InvalidConstructionError, UnitIncompatibleError } from "../modules/units/errors";
import { Quantity } from "../modules/units/quantity";
import {
  MemorySnapshotSink,
  ParticleDataset,
  SnapshotConsistencyError,
  SnapshotWriter,
} from "../modules/writer";

const fillGas = (writer: SnapshotWriter, n = 2) => {
  const gas = writer.particles.gas;
  gas.set("coordinates", new Quantity(Array.from({ length: n }, () => [0, 0, 0]), "cm"));
  gas.set("velocities", new Quantity(Array.from({ length: n }, () => [0, 0, 0]), "cm/s"));
  gas.set("masses", new Quantity(Array.from({ length: n }, () => 1), "g"));
  gas.set("smoothing_length", new Quantity(Array.from({ length: n }, () => 1), "cm"));
  gas.set("internal_energy", new Quantity(Array.from({ length: n }, () => 1), "cm^2/s^2"));
};

const fillDarkMatter = (writer: SnapshotWriter, n = 3) => {
  const dm = writer.particles.dark_matter;
  dm.set("coordinates", new Quantity(Array.from({ length: n }, () => [1, 1, 1]), "cm"));
  dm.set("velocities", new Quantity(Array.from({ length: n }, () => [0, 0, 0]), "cm/s"));
  dm.set("masses", new Quantity(Array.from({ length: n }, () => 2), "g"));
};

describe("ParticleDataset", () => {
  it("stores assigned arrays in the writer's base units", () => {
    const writer = new SnapshotWriter(1, { unitSystem: "cgs", compress: false });
    const gas = writer.particles.gas;
    gas.set("coordinates", new Quantity([1, 2], "km"));
    gas.set("velocities", new Quantity([3], "km/s"));

    const coordinates = gas.get("coordinates");
    expect(coordinates?.units.expr).toBe("cm");
    expect(Array.from(coordinates?.values ?? [])).toEqual([1e5, 2e5]);
    expect(gas.get("velocities")?.units.expr).toBe("cm*s^(-1)");
  });

  it("rejects arrays with the wrong dimensions", () => {
    const writer = new SnapshotWriter(1, { unitSystem: "cgs" });
    try {
      writer.particles.dark_matter.set("masses", new Quantity([1], "cm"));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnitIncompatibleError);
      if (!(err instanceof UnitIncompatibleError)) return;
      expect(err.from).toBe("cm");
      expect(err.to).toBe("g");
    }
  });

  it("rejects values that carry no units", () => {
    const gas = new SnapshotWriter(1).particles.gas;
    expect(() => Reflect.apply(gas.set, gas, ["coordinates", [1, 2, 3]])).toThrow(InvalidConstructionError);
  });

  it("stores cosmo arrays in the comoving frame", () => {
    const writer = new SnapshotWriter(1, { unitSystem: "cosmo" });
    const physical = new CosmoArray([1, 2], "Mpc", { comoving: false, cosmoFactor: new CosmoFactor("a", 0.5) });
    writer.particles.stars.set("coordinates", physical);

    const stored = writer.particles.stars.get("coordinates");
    expect(stored).toBeInstanceOf(CosmoArray);
    if (!(stored instanceof CosmoArray)) return;
    expect(stored.comoving).toBe(true);
    expect(stored.units.expr).toBe("Mpc");
    expect(Array.from(stored.values)).toEqual([2, 4]);
    expect(physical.comoving).toBe(false);
  });

  it("reports empty and inconsistent particle types", () => {
    const writer = new SnapshotWriter(1);
    const dm = writer.particles.dark_matter;
    expect(dm.checkEmpty()).toBe(true);

    dm.set("coordinates", new Quantity([[0, 0, 0]], "cm"));
    expect(dm.checkEmpty()).toBe(false);
    expect(() => dm.checkConsistent()).toThrow(
      new SnapshotConsistencyError("dark_matter", "required dataset velocities is missing", "velocities"),
    );

    dm.set("velocities", new Quantity([[0, 0, 0], [0, 0, 0]], "cm/s"));
    dm.set("masses", new Quantity([1], "g"));
    expect(() => dm.checkConsistent()).toThrow(
      "dark_matter: arrays are not of the same size (coordinates=1, velocities=2, masses=1)",
    );
  });

  it("asks for particle IDs only when none were assigned", () => {
    const dataset = new ParticleDataset("black_holes", 5, new SnapshotWriter(1).unitSystem);
    dataset.set("coordinates", new Quantity([[0, 0, 0]], "cm"));
    dataset.set("velocities", new Quantity([[0, 0, 0]], "cm/s"));
    dataset.set("masses", new Quantity([1], "g"));
    expect(dataset.checkConsistent()).toBe(true);
    expect(dataset.requiresParticleIdsBeforeWrite).toBe(true);
    expect(dataset.nPart).toBe(1);
    expect(dataset.groupName).toBe("PartType5");

    dataset.set("particle_ids", new Quantity([42], "dimensionless"));
    dataset.checkConsistent();
    expect(dataset.requiresParticleIdsBeforeWrite).toBe(false);
  });
});

describe("SnapshotWriter", () => {
  it("writes header, units and one group per populated particle type", () => {
    const writer = new SnapshotWriter([10, 20, 30], { unitSystem: "cgs", compress: true });
    fillGas(writer);
    fillDarkMatter(writer);
    const sink = new MemorySnapshotSink();

    const summary = writer.write(sink);
    expect(summary).toEqual({
      groups: ["PartType0", "PartType1"],
      numPartTotal: [2, 3, 0, 0, 0, 0],
      generatedIds: true,
    });
    expect([...sink.groups.keys()]).toEqual(["Header", "Units", "PartType0", "PartType1"]);

    expect(sink.group("Header").attributes).toEqual({
      BoxSize: [10, 20, 30],
      NumPart_Total: [2, 3, 0, 0, 0, 0],
      NumPart_Total_HighWord: [0, 0, 0, 0, 0, 0],
      Flag_Entropy_ICs: 0,
    });
    expect(sink.group("Units").attributes).toEqual({
      "Unit mass in cgs (U_M)": 1,
      "Unit length in cgs (U_L)": 1,
      "Unit time in cgs (U_t)": 1,
      "Unit current in cgs (U_I)": 1,
      "Unit temperature in cgs (U_T)": 1,
    });

    const gas = sink.group("PartType0").datasets;
    expect(Object.keys(gas)).toEqual([
      "Coordinates",
      "Velocities",
      "Masses",
      "SmoothingLength",
      "InternalEnergy",
      "ParticleIDs",
    ]);
    expect(gas.ParticleIDs).toEqual({
      dtype: "int32",
      shape: [2],
      values: [1, 2],
      units: "dimensionless",
      compression: "gzip",
      attributes: {},
    });
    expect(gas.Coordinates.shape).toEqual([2, 3]);
    expect(sink.group("PartType1").datasets.ParticleIDs.values).toEqual([3, 4, 5]);
  });

  it("records the frame and cosmo factor of cosmo arrays", () => {
    const writer = new SnapshotWriter(1, { unitSystem: "cosmo", compress: false });
    const factor = new CosmoFactor("a", 0.5);
    const dm = writer.particles.dark_matter;
    dm.set("coordinates", new CosmoArray([[1, 2, 3]], "Mpc", { cosmoFactor: factor }));
    dm.set("velocities", new Quantity([[0, 0, 0]], "km/s"));
    dm.set("masses", new Quantity([1], "1e10*Msun"));
    const sink = new MemorySnapshotSink();
    writer.write(sink);

    const datasets = sink.group("PartType1").datasets;
    expect(datasets.Coordinates.attributes).toEqual({
      Comoving: 1,
      "Cosmological factor expression": factor.expr,
      "Scale factor": 0.5,
    });
    expect(datasets.Coordinates.compression).toBeNull();
    expect(datasets.Velocities.attributes).toEqual({});

    const units = sink.group("Units").attributes;
    expect(units["Unit length in cgs (U_L)"]).toBe(MEGAPARSEC_CM);
    expect(units["Unit mass in cgs (U_M)"]).toBe(1e10 * SOLAR_MASS_G);
  });

  it("keeps assigned particle IDs when every type has them", () => {
    const writer = new SnapshotWriter(1);
    fillDarkMatter(writer, 2);
    writer.particles.dark_matter.set("particle_ids", new Quantity([7, 9], "dimensionless", { dtype: "int32" }));
    const sink = new MemorySnapshotSink();
    expect(writer.write(sink).generatedIds).toBe(false);
    expect(sink.group("PartType1").datasets.ParticleIDs.values).toEqual([7, 9]);
  });

  it("converts a box size quantity into the unit system", () => {
    const writer = new SnapshotWriter(new Quantity([2], "km"), { unitSystem: "cgs" });
    expect(writer.boxSize).toBe(2e5);
    expect(() => new SnapshotWriter(new Quantity([2], "s"))).toThrow(UnitIncompatibleError);
  });

  it("writes only metadata when no particles were assigned", () => {
    const sink = new MemorySnapshotSink();
    const summary = new SnapshotWriter(1).write(sink);
    expect(summary.groups).toEqual([]);
    expect(summary.numPartTotal).toEqual([0, 0, 0, 0, 0, 0]);
    expect([...sink.groups.keys()]).toEqual(["Header", "Units"]);
  });
});
