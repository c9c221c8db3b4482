export class UnitIncompatibleError extends Error {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, detail?: string) {
    super(
      `Unit "${from}" is not compatible with "${to}"${detail ? ` (${detail})` : ""}`,
    );
    this.name = "UnitIncompatibleError";
    this.from = from;
    this.to = to;
  }
}

export class InvalidConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConstructionError";
  }
}
