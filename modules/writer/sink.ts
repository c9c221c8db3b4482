import type { DType } from "../units/ndarray";

export type AttributeValue = number | string | readonly number[];

export interface SnapshotDataset {
  dtype: DType;
  shape: number[];
  values: number[];
  units: string;
  /** Compression filter requested for the dataset, if any. */
  compression: string | null;
  attributes: Record<string, AttributeValue>;
}

export interface SnapshotGroupSink {
  setAttribute(name: string, value: AttributeValue): void;
  writeDataset(name: string, dataset: SnapshotDataset): void;
}

/** Destination of a snapshot: named groups holding attributes and datasets. */
export interface SnapshotSink {
  createGroup(name: string): SnapshotGroupSink;
}

export interface MemoryGroup {
  attributes: Record<string, AttributeValue>;
  datasets: Record<string, SnapshotDataset>;
}

export class MemorySnapshotSink implements SnapshotSink {
  readonly groups = new Map<string, MemoryGroup>();

  createGroup(name: string): SnapshotGroupSink {
    if (this.groups.has(name)) throw new Error(`Group ${name} already exists`);
    const group: MemoryGroup = { attributes: {}, datasets: {} };
    this.groups.set(name, group);
    return {
      setAttribute: (attr, value) => {
        group.attributes[attr] = value;
      },
      writeDataset: (dataset, data) => {
        group.datasets[dataset] = data;
      },
    };
  }

  group(name: string): MemoryGroup {
    const group = this.groups.get(name);
    if (!group) throw new Error(`No group named ${name}`);
    return group;
  }
}
