/**
 * Constraint and opportunity wording. These strings are shown to end users
 * verbatim; changing them changes user-facing output.
 */

import type { ResolvedZoneRegulations } from "../regulations/resolve.js";
import type { LotGeometryInput } from "../schemas/lot.js";

export function identifyConstraints(
  regulations: ResolvedZoneRegulations,
  lot: Pick<LotGeometryInput, "area" | "frontage">,
): string[] {
  const constraints: string[] = [];

  if (lot.area < regulations.minLotArea) {
    constraints.push(`Lot area below minimum (${regulations.minLotArea.toFixed(1)} m² required)`);
  }
  if (lot.frontage < regulations.minLotFrontage) {
    constraints.push(
      `Lot frontage below minimum (${regulations.minLotFrontage.toFixed(1)} m required)`,
    );
  }

  const { suffixRule, designation } = regulations;
  if (suffixRule && designation.suffix) {
    constraints.push(`Subject to ${designation.suffix} suffix zone restrictions`);
    const height = `${regulations.maxHeight.toFixed(1)}m`;
    constraints.push(
      regulations.maxStoreys === null
        ? `Height limited to ${height}`
        : `Height limited to ${height} and ${regulations.maxStoreys} storeys`,
    );
    if (suffixRule.frontYardAveraging) {
      constraints.push("Front yard averaging may apply");
    }
  }

  return constraints;
}

export function identifyOpportunities(
  regulations: Pick<ResolvedZoneRegulations, "permittedUses" | "category">,
  potentialUnits: number,
): string[] {
  const opportunities: string[] = [];
  const uses = regulations.permittedUses;

  if (potentialUnits > 1) {
    opportunities.push(`Potential for ${potentialUnits} dwelling units`);
  }
  if (uses.includes("additional_residential_unit")) {
    opportunities.push("Additional residential unit (ADU) permitted");
  }
  if (uses.includes("home_occupation")) {
    opportunities.push("Home occupation permitted");
  }
  if (uses.includes("bed_and_breakfast")) {
    opportunities.push("Bed and breakfast use permitted");
  }

  switch (regulations.category) {
    case "residential_medium":
      opportunities.push("Medium density residential development permitted");
      break;
    case "residential_high":
      opportunities.push("High density residential development permitted");
      break;
    case "residential_uptown_core":
      opportunities.push("Mixed-use development potential in Uptown Core");
      break;
    case "residential_low":
      break;
  }

  return opportunities;
}
