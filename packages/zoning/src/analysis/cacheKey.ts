import { hashJsonSha256 } from "@oakville-zoning/shared";

import { DEFAULT_BUILDING_HEIGHT } from "../coverage/resolveLotCoverage.js";
import type { AnalysisRequest } from "./analyze.js";

export const ANALYSIS_CACHE_PREFIX = "zoning-analysis/";

/**
 * Key for caching one analysis result. Covers the raw zone string and every
 * geometry field, since results differ whenever any of them does.
 */
export function buildAnalysisCacheKey(request: AnalysisRequest): string {
  const { lot } = request;
  const zone = typeof request.zoneCode === "string" ? request.zoneCode : request.zoneCode.raw;
  const digest = hashJsonSha256({
    zone,
    area: lot.area,
    frontage: lot.frontage,
    depth: lot.depth ?? null,
    isCorner: lot.isCorner ?? false,
    hasGarage: lot.hasGarage ?? false,
    buildingHeight: request.buildingHeight ?? DEFAULT_BUILDING_HEIGHT,
  });
  return `${ANALYSIS_CACHE_PREFIX}${digest}`;
}
