/**
 * Floor area ratio resolution.
 *
 * First match wins: the zone's own FAR, then the suffix zone's lot-area band
 * table, then coverage × storeys, then a conservative default.
 */

import type { FarBand, ZoneRegulations, SuffixZoneRule } from "../schemas/regulations.js";

export const DEFAULT_FLOOR_AREA_RATIO = 0.7;

type FarRegulations = Pick<
  ZoneRegulations,
  "maxFloorAreaRatio" | "maxLotCoverage" | "maxStoreys"
> & {
  suffixRule?: SuffixZoneRule | null;
};

type FloorAreaCapRegulations = Pick<
  ZoneRegulations,
  "maxResidentialFloorAreaAbsolute" | "dwellingTypes"
>;

function fitsBand(band: FarBand, lotArea: number): boolean {
  if (band.upTo === null) return true;
  return band.inclusive ? lotArea <= band.upTo : lotArea < band.upTo;
}

/** FAR of the first band the lot area falls in, or null when none does. */
export function lookupFarBand(bands: readonly FarBand[], lotArea: number): number | null {
  const band = bands.find((candidate) => fitsBand(candidate, lotArea));
  return band ? band.far : null;
}

export function resolveFloorAreaRatio(regulations: FarRegulations, lotArea: number): number {
  if (regulations.maxFloorAreaRatio !== null) {
    return regulations.maxFloorAreaRatio;
  }

  const farTable = regulations.suffixRule?.farTable;
  if (farTable) {
    const far = lookupFarBand(farTable, lotArea);
    if (far !== null) return far;
  }

  if (regulations.maxLotCoverage !== null && regulations.maxStoreys !== null) {
    return regulations.maxLotCoverage * regulations.maxStoreys;
  }

  return DEFAULT_FLOOR_AREA_RATIO;
}

/**
 * Floor area permitted by `far`, capped by the zone's absolute ceiling and the
 * detached-dwelling ceiling where either is set.
 */
export function capFloorAreaByFar(
  regulations: FloorAreaCapRegulations,
  lotArea: number,
  far: number,
): number {
  const caps = [
    regulations.maxResidentialFloorAreaAbsolute,
    regulations.dwellingTypes.detached_dwelling?.maxResidentialFloorArea,
  ].filter((cap): cap is number => typeof cap === "number");
  return Math.min(far * lotArea, ...caps);
}
