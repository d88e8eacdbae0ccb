import { describe, expect, it } from "vitest";

import {
  capFloorAreaByFar,
  DEFAULT_FLOOR_AREA_RATIO,
  lookupFarBand,
  resolveFloorAreaRatio,
} from "../src/far/resolveFloorAreaRatio.js";
import { bundledRepository } from "./helpers.js";

describe("resolveFloorAreaRatio with the -0 band table", () => {
  const suffixed = bundledRepository().resolve("RL2-0");
  const far = (lotArea: number) => resolveFloorAreaRatio(suffixed, lotArea);

  it("returns the band for representative lot areas", () => {
    expect(far(500)).toBe(0.43);
    expect(far(600)).toBe(0.42);
    expect(far(900)).toBe(0.39);
    expect(far(1500)).toBe(0.29);
  });

  it("treats 557.5 as the start of the second band", () => {
    expect(far(557.49)).toBe(0.43);
    expect(far(557.5)).toBe(0.42);
  });

  it("keeps the .99 upper bounds inclusive", () => {
    expect(far(649.99)).toBe(0.42);
    expect(far(650)).toBe(0.41);
    expect(far(1207.99)).toBe(0.35);
    expect(far(1208)).toBe(0.32);
    expect(far(1300.99)).toBe(0.32);
    expect(far(1301)).toBe(0.29);
  });

  it("never increases as lot area grows", () => {
    let previous = far(0);
    for (let area = 0; area <= 2000; area += 0.5) {
      const current = far(area);
      expect(current).toBeLessThanOrEqual(previous);
      previous = current;
    }
  });
});

describe("resolveFloorAreaRatio precedence", () => {
  const repository = bundledRepository();

  it("prefers a zone's explicit FAR, even under a suffix", () => {
    expect(resolveFloorAreaRatio(repository.resolve("RL6"), 400)).toBe(0.75);
    expect(resolveFloorAreaRatio(repository.resolve("RL6-0"), 400)).toBe(0.75);
  });

  it("falls back to coverage times storeys", () => {
    expect(resolveFloorAreaRatio(repository.resolve("RL7"), 600)).toBeCloseTo(0.7, 10);
    expect(resolveFloorAreaRatio(repository.resolve("RM1"), 900)).toBeCloseTo(1.2, 10);
  });

  it("uses the default when storeys are unknown", () => {
    expect(resolveFloorAreaRatio(repository.resolve("RL2"), 900)).toBe(DEFAULT_FLOOR_AREA_RATIO);
    expect(resolveFloorAreaRatio(repository.resolve("RUC"), 300)).toBe(DEFAULT_FLOOR_AREA_RATIO);
  });
});

describe("lookupFarBand", () => {
  it("returns null when no band fits", () => {
    expect(lookupFarBand([{ upTo: 10, inclusive: false, far: 0.5 }], 20)).toBeNull();
    expect(lookupFarBand([], 20)).toBeNull();
  });
});

describe("capFloorAreaByFar", () => {
  it("applies the absolute residential floor area ceiling", () => {
    const rl6 = bundledRepository().resolve("RL6");

    expect(capFloorAreaByFar(rl6, 600, 0.75)).toBe(355);
    expect(capFloorAreaByFar(rl6, 400, 0.75)).toBe(300);
  });

  it("applies a detached-dwelling ceiling and ignores absent caps", () => {
    expect(
      capFloorAreaByFar(
        {
          maxResidentialFloorAreaAbsolute: null,
          dwellingTypes: { detached_dwelling: { maxResidentialFloorArea: 280 } },
        },
        1000,
        0.4,
      ),
    ).toBe(280);
    expect(
      capFloorAreaByFar({ maxResidentialFloorAreaAbsolute: null, dwellingTypes: {} }, 1000, 0.4),
    ).toBeCloseTo(400, 10);
  });
});
