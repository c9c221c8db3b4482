import { describe, expect, it } from "vitest";
import { flagEnabled } from "../modules/core/env";

describe("flagEnabled", () => {
  it("falls back to the default when unset or unrecognized", () => {
    expect(flagEnabled(undefined, true)).toBe(true);
    expect(flagEnabled(undefined, false)).toBe(false);
    expect(flagEnabled("maybe", true)).toBe(true);
  });

  it("reads common truthy and falsy spellings", () => {
    for (const value of ["1", "true", " YES ", "on"]) expect(flagEnabled(value, false)).toBe(true);
    for (const value of ["0", "False", "no", "off"]) expect(flagEnabled(value, true)).toBe(false);
  });
});
