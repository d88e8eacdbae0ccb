import { describe, expect, it } from "vitest";

import { calculateSetbacks, DEFAULT_FLANKAGE_YARD } from "../src/setbacks/calculateSetbacks.js";
import { bundledRepository } from "./helpers.js";

const repository = bundledRepository();

describe("calculateSetbacks", () => {
  it("uses a symmetric interior side on both sides", () => {
    expect(calculateSetbacks(repository.resolve("RL2"))).toEqual({
      frontYard: 9,
      rearYard: 7.5,
      interiorSideLeft: 2.4,
      interiorSideRight: 2.4,
      flankageYard: null,
    });
  });

  it("puts the stricter side on the left for asymmetric zones", () => {
    const setbacks = calculateSetbacks(repository.resolve("RL3"));

    expect(setbacks.interiorSideLeft).toBe(2.4);
    expect(setbacks.interiorSideRight).toBe(1.2);
  });

  it("reduces one side for a garage where the zone allows one", () => {
    const setbacks = calculateSetbacks(repository.resolve("RL2"), { hasGarage: true });

    expect(setbacks.interiorSideLeft).toBe(2.4);
    expect(setbacks.interiorSideRight).toBe(1.2);
    expect(setbacks.rearYard).toBe(7.5);
  });

  it("reduces both sides for a garage where the zone allows both", () => {
    const setbacks = calculateSetbacks(repository.resolve("RL4"), { hasGarage: true });

    expect(setbacks.interiorSideLeft).toBe(1.2);
    expect(setbacks.interiorSideRight).toBe(1.2);
  });

  it("ignores a garage in zones without a garage rule", () => {
    const setbacks = calculateSetbacks(repository.resolve("RL7"), { hasGarage: true });

    expect(setbacks.interiorSideLeft).toBe(1.2);
    expect(setbacks.interiorSideRight).toBe(1.2);
  });

  it("reduces the rear yard and raises the left side together on corner lots", () => {
    expect(calculateSetbacks(repository.resolve("RL2"), { isCorner: true })).toEqual({
      frontYard: 9,
      rearYard: 3.5,
      interiorSideLeft: 3,
      interiorSideRight: 2.4,
      flankageYard: 3.5,
    });
  });

  it("keeps a left side already above the corner minimum", () => {
    const setbacks = calculateSetbacks(repository.resolve("RL1"), { isCorner: true });

    expect(setbacks.rearYard).toBe(3.5);
    expect(setbacks.interiorSideLeft).toBe(4.2);
    expect(setbacks.flankageYard).toBe(4.2);
  });

  it("applies the corner rule after the garage rule", () => {
    expect(
      calculateSetbacks(repository.resolve("RL2"), { isCorner: true, hasGarage: true }),
    ).toEqual({
      frontYard: 9,
      rearYard: 3.5,
      interiorSideLeft: 3,
      interiorSideRight: 1.2,
      flankageYard: 3.5,
    });

    const bothSides = calculateSetbacks(repository.resolve("RL3"), {
      isCorner: true,
      hasGarage: true,
    });
    expect(bothSides.interiorSideLeft).toBe(3);
    expect(bothSides.interiorSideRight).toBe(1.2);
  });

  it("adds only the flankage yard on corner lots without corner adjustments", () => {
    expect(calculateSetbacks(repository.resolve("RL6"), { isCorner: true })).toEqual({
      frontYard: 3,
      rearYard: 7,
      interiorSideLeft: 1.2,
      interiorSideRight: 0.6,
      flankageYard: 3,
    });
  });

  it("defaults the flankage yard when the zone has none", () => {
    const setbacks = calculateSetbacks(
      {
        setbacks: { frontYard: 6, rearYard: 7, interiorSide: 1.5, flankageYard: null },
        cornerLotAdjustments: null,
        garageAdjustments: null,
      },
      { isCorner: true },
    );

    expect(setbacks.flankageYard).toBe(DEFAULT_FLANKAGE_YARD);
  });
});
