import type { ZoneRegulations } from "../schemas/regulations.js";

/** Estimated months per phase. */
export type DevelopmentTimeline = {
  planningDesign: number;
  permits: number;
  construction: number;
  total: number;
};

const BASE_PLANNING_MONTHS = 3;
const BASE_PERMIT_MONTHS = 4;
const CONSTRUCTION_MONTHS_PER_UNIT = 6;

/** Rough schedule; units are assumed to be built two at a time. */
export function estimateDevelopmentTimeline(
  regulations: Pick<ZoneRegulations, "category">,
  units: number,
): DevelopmentTimeline {
  let planningDesign = BASE_PLANNING_MONTHS;
  let permits = BASE_PERMIT_MONTHS;

  if (regulations.category === "residential_medium" || units > 1) {
    planningDesign += 2;
    permits += 2;
  }
  if (units > 4) {
    permits += 1;
  }

  const construction = Math.max(
    CONSTRUCTION_MONTHS_PER_UNIT,
    Math.floor((CONSTRUCTION_MONTHS_PER_UNIT * units) / 2),
  );

  return {
    planningDesign,
    permits,
    construction,
    total: planningDesign + permits + construction,
  };
}
