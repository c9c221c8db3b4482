// Centralized environment switches for the snapshot writer
export const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

export const COSMO_WRITER_UNIT_SYSTEM = (process.env.COSMO_WRITER_UNIT_SYSTEM ?? "cgs").trim() || "cgs";
export const COSMO_WRITER_COMPRESS = flagEnabled(process.env.COSMO_WRITER_COMPRESS, true);
export const COSMO_WRITER_VERBOSE = flagEnabled(process.env.COSMO_WRITER_VERBOSE, false);
