export class SnapshotConsistencyError extends Error {
  readonly particleType: string;
  readonly field?: string;

  constructor(particleType: string, message: string, field?: string) {
    super(`${particleType}: ${message}`);
    this.name = "SnapshotConsistencyError";
    this.particleType = particleType;
    this.field = field;
  }
}
