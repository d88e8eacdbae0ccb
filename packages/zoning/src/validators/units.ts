import type { ZoneRegulations } from "../schemas/regulations.js";

/** Minimum lot area for a duplex when the zone's duplex record omits one. */
export const DEFAULT_DUPLEX_MIN_LOT_AREA = 743.0;

type UnitRegulations = Pick<
  ZoneRegulations,
  "minLotAreaPerUnit" | "permittedUses" | "dwellingTypes"
>;

/**
 * Dwelling units the lot could support. One by default; per-unit lot area
 * divides the lot in multi-unit zones; a duplex zone allows two once the
 * duplex minimum is met; a townhouse per-unit area divides the lot.
 */
export function calculatePotentialUnits(regulations: UnitRegulations, lotArea: number): number {
  if (regulations.minLotAreaPerUnit !== null) {
    return Math.max(1, Math.floor(lotArea / regulations.minLotAreaPerUnit));
  }

  const duplex = regulations.dwellingTypes.duplex_dwelling;
  if (duplex && regulations.permittedUses.includes("duplex_dwelling")) {
    if (lotArea >= (duplex.minLotArea ?? DEFAULT_DUPLEX_MIN_LOT_AREA)) return 2;
  }

  const townhousePerUnit = regulations.dwellingTypes.townhouse_dwelling?.minLotAreaPerUnit;
  if (townhousePerUnit !== undefined) {
    return Math.max(1, Math.floor(lotArea / townhousePerUnit));
  }

  return 1;
}
