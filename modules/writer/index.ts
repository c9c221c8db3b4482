export * from "./errors";
export * from "./particle-fields";
export * from "./sink";
export * from "./snapshot-writer";
