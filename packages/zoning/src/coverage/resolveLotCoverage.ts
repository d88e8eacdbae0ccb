import type { LotCoverageRule } from "../schemas/regulations.js";
import type { ResolvedZoneRegulations } from "../regulations/resolve.js";

export const DEFAULT_LOT_COVERAGE = 0.35;
export const DEFAULT_BUILDING_HEIGHT = 7.0;

type CoverageRegulations = Pick<
  ResolvedZoneRegulations,
  "zoneCode" | "maxLotCoverage" | "suffixRule" | "overriddenFields"
>;

function applyCoverageRule(
  rule: LotCoverageRule,
  baseCoverage: number,
  buildingHeight: number,
): number {
  if ("maxCoverage" in rule) return rule.maxCoverage;
  return buildingHeight <= rule.heightThreshold ? baseCoverage : rule.coverageAboveThreshold;
}

/**
 * Maximum lot coverage for a proposed building height. A special provision's
 * coverage wins; then a suffix-zone rule naming the base zone; then the
 * zone's own coverage.
 */
export function resolveLotCoverage(
  regulations: CoverageRegulations,
  buildingHeight: number = DEFAULT_BUILDING_HEIGHT,
): number {
  const baseCoverage = regulations.maxLotCoverage ?? DEFAULT_LOT_COVERAGE;
  if (regulations.overriddenFields.includes("maxLotCoverage")) {
    return baseCoverage;
  }

  const rule = regulations.suffixRule?.lotCoverage.find((candidate) =>
    candidate.zones.includes(regulations.zoneCode),
  );
  if (rule) {
    return applyCoverageRule(rule, baseCoverage, buildingHeight);
  }

  return baseCoverage;
}
