import { describe, expect, it } from "vitest";

import {
  formatZoneDesignation,
  isWellFormedZoneCode,
  parseZoneCode,
} from "../src/designation/parseZoneCode.js";

describe("parseZoneCode", () => {
  it("splits base zone, suffix and special provision regardless of case", () => {
    expect(parseZoneCode("rl2-0 sp:1")).toEqual({
      raw: "rl2-0 sp:1",
      baseZone: "RL2",
      suffix: "-0",
      specialProvision: "SP:1",
    });
  });

  it("handles a special provision without a suffix", () => {
    const designation = parseZoneCode("RL2 SP:14");

    expect(designation.baseZone).toBe("RL2");
    expect(designation.suffix).toBeNull();
    expect(designation.specialProvision).toBe("SP:14");
  });

  it("returns a bare zone with no suffix or special provision", () => {
    expect(parseZoneCode("  rm3 ")).toEqual({
      raw: "  rm3 ",
      baseZone: "RM3",
      suffix: null,
      specialProvision: null,
    });
  });

  it("keeps only the segment after the first delimiter", () => {
    expect(parseZoneCode("XYZ-1-2").suffix).toBe("-1");
    expect(parseZoneCode("XYZ-1-2").baseZone).toBe("XYZ");
    expect(parseZoneCode("RL2 SP:3 SP:4").specialProvision).toBe("SP:3");
  });

  it("never throws on malformed input", () => {
    expect(parseZoneCode("").baseZone).toBe("");
    expect(parseZoneCode("RL2-").suffix).toBeNull();
    expect(parseZoneCode("not a zone").baseZone).toBe("NOT A ZONE");
  });

  it("returns a frozen value", () => {
    expect(Object.isFrozen(parseZoneCode("RL2-0"))).toBe(true);
  });
});

describe("isWellFormedZoneCode", () => {
  it("accepts canonical codes", () => {
    expect(isWellFormedZoneCode("rl2-0 sp:1")).toBe(true);
    expect(isWellFormedZoneCode("RL10")).toBe(true);
    expect(isWellFormedZoneCode("RUC SP:7")).toBe(true);
    expect(isWellFormedZoneCode("RH")).toBe(true);
  });

  it("rejects codes outside the by-law", () => {
    expect(isWellFormedZoneCode("RL12")).toBe(false);
    expect(isWellFormedZoneCode("RM5")).toBe(false);
    expect(isWellFormedZoneCode("R L2")).toBe(false);
    expect(isWellFormedZoneCode("RL2-")).toBe(false);
  });
});

describe("formatZoneDesignation", () => {
  it("renders the canonical form", () => {
    expect(formatZoneDesignation(parseZoneCode("rl2-0 sp:1"))).toBe("RL2-0 SP:1");
    expect(formatZoneDesignation(parseZoneCode("rl7"))).toBe("RL7");
  });
});
