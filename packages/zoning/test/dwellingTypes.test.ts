import { describe, expect, it } from "vitest";

import {
  getDwellingRequirements,
  getPermittedDwellingTypes,
  getZonesForDwellingType,
  validateDevelopmentProposal,
  validateDwellingType,
} from "../src/validators/dwellingTypes.js";
import { bundledRepository } from "./helpers.js";

const repository = bundledRepository();

describe("getPermittedDwellingTypes", () => {
  it("lists dwelling uses only, ignoring suffix and provision", () => {
    expect(getPermittedDwellingTypes("RL10-0 SP:1", repository)).toEqual([
      "detached_dwelling",
      "duplex_dwelling",
    ]);
    expect(getPermittedDwellingTypes("RM3", repository)).toEqual([
      "apartment_dwelling",
      "stacked_townhouse_dwelling",
    ]);
  });

  it("is empty for an unknown zone", () => {
    expect(getPermittedDwellingTypes("RX1", repository)).toEqual([]);
  });
});

describe("validateDwellingType", () => {
  it("accepts a permitted type", () => {
    expect(validateDwellingType("RUC", "townhouse_dwelling", repository)).toEqual({
      valid: true,
      message: "'townhouse_dwelling' is permitted in zone 'RUC'",
    });
  });

  it("lists the permitted types when rejecting", () => {
    expect(validateDwellingType("RL2", "duplex_dwelling", repository)).toEqual({
      valid: false,
      message: "'duplex_dwelling' is NOT permitted in zone 'RL2'. Permitted types: detached_dwelling",
    });
  });

  it("reports an unrecognized zone", () => {
    expect(validateDwellingType("RX1-0", "detached_dwelling", repository)).toEqual({
      valid: false,
      message: "Zone 'RX1' is not recognized in the zoning by-law",
    });
  });
});

describe("getZonesForDwellingType", () => {
  it("lists zones in table order", () => {
    expect(getZonesForDwellingType("semi_detached_dwelling", repository)).toEqual([
      "RL7",
      "RL8",
      "RL9",
      "RUC",
    ]);
    expect(getZonesForDwellingType("townhouse_dwelling", repository)).toEqual(["RUC", "RM1"]);
    expect(getZonesForDwellingType("duplex_dwelling", repository)).toEqual(["RL10"]);
  });
});

describe("validateDevelopmentProposal", () => {
  it("splits compliant and non-compliant dwellings and warns about exclusive types", () => {
    const result = validateDevelopmentProposal(
      "RL2",
      ["detached_dwelling", "townhouse_dwelling", "duplex_dwelling"],
      repository,
    );

    expect(result.isCompliant).toBe(false);
    expect(result.baseZone).toBe("RL2");
    expect(result.permittedDwellingTypes).toEqual(["detached_dwelling"]);
    expect(result.compliantDwellings).toEqual(["detached_dwelling"]);
    expect(result.nonCompliantDwellings).toEqual(["townhouse_dwelling", "duplex_dwelling"]);
    expect(result.violations).toEqual([
      "'townhouse_dwelling' is NOT permitted in zone 'RL2'. Permitted types: detached_dwelling",
      "'duplex_dwelling' is NOT permitted in zone 'RL2'. Permitted types: detached_dwelling",
    ]);
    expect(result.warnings).toEqual([
      "Duplex dwellings are ONLY permitted in RL10 zones",
      "Townhouse dwellings are ONLY permitted in RUC and RM1 zones",
    ]);
  });

  it("has no warnings inside the exclusive zone", () => {
    const result = validateDevelopmentProposal(
      "RL10",
      ["detached_dwelling", "duplex_dwelling"],
      repository,
    );

    expect(result.isCompliant).toBe(true);
    expect(result.violations).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("titles multi-word dwelling types in warnings", () => {
    const result = validateDevelopmentProposal(
      "RL2",
      ["back_to_back_townhouse_dwelling"],
      repository,
    );

    expect(result.warnings).toEqual([
      "Back To Back Townhouse dwellings are ONLY permitted in RM2 zones",
    ]);
  });
});

describe("getDwellingRequirements", () => {
  it("returns the dwelling-specific figures", () => {
    expect(getDwellingRequirements("RL10", "duplex_dwelling", repository)).toEqual({
      minLotArea: 743,
      minLotFrontage: 21,
      maxLotCoverage: 0.25,
      note: "Duplex dwellings have different requirements than detached dwellings in RL10",
    });
  });

  it("returns null when the zone has none", () => {
    expect(getDwellingRequirements("RL2", "detached_dwelling", repository)).toBeNull();
    expect(getDwellingRequirements("RX1", "detached_dwelling", repository)).toBeNull();
  });
});
