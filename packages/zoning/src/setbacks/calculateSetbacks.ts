import type { Setbacks } from "../schemas/developmentPotential.js";
import type { ZoneRegulations } from "../schemas/regulations.js";

export type SetbackConditions = {
  isCorner?: boolean;
  hasGarage?: boolean;
};

export const DEFAULT_FLANKAGE_YARD = 3.5;

type SetbackRegulations = Pick<
  ZoneRegulations,
  "setbacks" | "cornerLotAdjustments" | "garageAdjustments"
>;

/**
 * Required yards for a lot in the zone.
 *
 * Asymmetric interior sides put the stricter `min` on the left and the
 * relaxed `max` on the right. An attached garage reduces the right side (or
 * both sides, per zone) first; the corner-lot rule then reduces the rear yard
 * and raises the left side, always together. Values are not clamped.
 */
export function calculateSetbacks(
  regulations: SetbackRegulations,
  conditions: SetbackConditions = {},
): Setbacks {
  const { setbacks, cornerLotAdjustments, garageAdjustments } = regulations;
  const isCorner = conditions.isCorner ?? false;
  const hasGarage = conditions.hasGarage ?? false;

  let rearYard = setbacks.rearYard;
  let interiorSideLeft: number;
  let interiorSideRight: number;
  if (typeof setbacks.interiorSide === "number") {
    interiorSideLeft = setbacks.interiorSide;
    interiorSideRight = setbacks.interiorSide;
  } else {
    interiorSideLeft = setbacks.interiorSide.min;
    interiorSideRight = setbacks.interiorSide.max;
  }

  if (hasGarage && garageAdjustments) {
    interiorSideRight = garageAdjustments.reducedInteriorSide;
    if (garageAdjustments.sides === "both") {
      interiorSideLeft = garageAdjustments.reducedInteriorSide;
    }
  }

  if (isCorner && cornerLotAdjustments) {
    rearYard = cornerLotAdjustments.rearYard;
    interiorSideLeft = Math.max(interiorSideLeft, cornerLotAdjustments.minInteriorSide);
  }

  return {
    frontYard: setbacks.frontYard,
    rearYard,
    interiorSideLeft,
    interiorSideRight,
    flankageYard: isCorner ? (setbacks.flankageYard ?? DEFAULT_FLANKAGE_YARD) : null,
  };
}
