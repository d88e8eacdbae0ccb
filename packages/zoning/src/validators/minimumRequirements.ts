import type { ZoneRegulations } from "../schemas/regulations.js";
import type { LotGeometryInput } from "../schemas/lot.js";

/** Lot meets both the minimum area and the minimum frontage, inclusive. */
export function meetsMinimumRequirements(
  regulations: Pick<ZoneRegulations, "minLotArea" | "minLotFrontage">,
  lot: Pick<LotGeometryInput, "area" | "frontage">,
): boolean {
  return lot.area >= regulations.minLotArea && lot.frontage >= regulations.minLotFrontage;
}
