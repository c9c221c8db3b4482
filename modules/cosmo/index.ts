export * from "./errors";
export * from "./cosmo-factor";
export * from "./cosmo-array";
export * from "./ufunc-registry";
export * from "./serialization";
