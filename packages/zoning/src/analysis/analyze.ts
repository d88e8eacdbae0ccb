/**
 * Development potential analysis: one pass from a zone string and lot
 * geometry to the buildable envelope, floor area, unit count and narratives.
 */

import { logger } from "@oakville-zoning/shared";

import { resolveLotCoverage, DEFAULT_BUILDING_HEIGHT } from "../coverage/resolveLotCoverage.js";
import { parseZoneCode, type ZoneDesignation } from "../designation/parseZoneCode.js";
import { UnknownZoneError } from "../errors.js";
import { capFloorAreaByFar, resolveFloorAreaRatio } from "../far/resolveFloorAreaRatio.js";
import {
  getDefaultRegulationRepository,
  type RegulationRepository,
} from "../regulations/repository.js";
import type { ResolvedZoneRegulations } from "../regulations/resolve.js";
import type { DevelopmentPotential, Setbacks } from "../schemas/developmentPotential.js";
import { resolveLotDepth, type LotGeometryInput } from "../schemas/lot.js";
import { calculateSetbacks } from "../setbacks/calculateSetbacks.js";
import { meetsMinimumRequirements } from "../validators/minimumRequirements.js";
import { calculatePotentialUnits } from "../validators/units.js";
import { identifyConstraints, identifyOpportunities } from "./narratives.js";

export type AnalysisRequest = {
  zoneCode: string | ZoneDesignation;
  lot: LotGeometryInput;
  /** Proposed building height (m); drives height-dependent coverage. */
  buildingHeight?: number;
};

export const UNKNOWN_ZONE_NAME = "Unknown Zone";
export const UNKNOWN_ZONE_CONSTRAINT = "Unknown zone code";

function unknownZoneResult(zoneCode: string): DevelopmentPotential {
  return {
    zoneCode,
    zoneName: UNKNOWN_ZONE_NAME,
    meetsMinimumRequirements: false,
    buildableArea: 0,
    maxBuildingFootprint: 0,
    maxFloorArea: 0,
    maxHeight: 0,
    maxStoreys: null,
    potentialUnits: 0,
    permittedUses: [],
    constraints: [UNKNOWN_ZONE_CONSTRAINT],
    opportunities: [],
    setbacks: null,
    floorAreaRatio: 0,
  };
}

/** Setback-derived building rectangle, clamped at zero in each dimension. */
export function calculateBuildableArea(
  frontage: number,
  depth: number,
  setbacks: Setbacks,
): number {
  const width = Math.max(0, frontage - setbacks.interiorSideLeft - setbacks.interiorSideRight);
  const length = Math.max(0, depth - setbacks.frontYard - setbacks.rearYard);
  return width * length;
}

function analyzeResolved(
  zoneCode: string,
  regulations: ResolvedZoneRegulations,
  lot: LotGeometryInput,
  buildingHeight: number,
): DevelopmentPotential {
  const depth = resolveLotDepth(lot);
  const setbacks = calculateSetbacks(regulations, {
    isCorner: lot.isCorner,
    hasGarage: lot.hasGarage,
  });

  const buildableArea = calculateBuildableArea(lot.frontage, depth, setbacks);
  const coverageCap = lot.area * resolveLotCoverage(regulations, buildingHeight);
  const maxBuildingFootprint = Math.min(buildableArea, coverageCap);

  const floorAreaRatio = resolveFloorAreaRatio(regulations, lot.area);
  const floorAreaByFar = capFloorAreaByFar(regulations, lot.area, floorAreaRatio);
  const maxFloorArea =
    regulations.maxStoreys === null
      ? floorAreaByFar
      : Math.min(floorAreaByFar, maxBuildingFootprint * regulations.maxStoreys);

  const potentialUnits = calculatePotentialUnits(regulations, lot.area);

  return {
    zoneCode,
    zoneName: regulations.name,
    meetsMinimumRequirements: meetsMinimumRequirements(regulations, lot),
    buildableArea,
    maxBuildingFootprint,
    maxFloorArea,
    maxHeight: regulations.maxHeight,
    maxStoreys: regulations.maxStoreys,
    potentialUnits,
    permittedUses: [...regulations.permittedUses],
    constraints: identifyConstraints(regulations, lot),
    opportunities: identifyOpportunities(regulations, potentialUnits),
    setbacks,
    floorAreaRatio,
  };
}

/**
 * Analyze a lot against its zone. An unknown base zone yields a flagged
 * result (no units, "Unknown zone code") instead of an error; any other
 * failure propagates.
 */
export function analyzeDevelopmentPotential(
  request: AnalysisRequest,
  repository: RegulationRepository = getDefaultRegulationRepository(),
): DevelopmentPotential {
  const designation =
    typeof request.zoneCode === "string" ? parseZoneCode(request.zoneCode) : request.zoneCode;
  const buildingHeight = request.buildingHeight ?? DEFAULT_BUILDING_HEIGHT;

  let regulations: ResolvedZoneRegulations;
  try {
    regulations = repository.resolve(designation);
  } catch (error) {
    if (!(error instanceof UnknownZoneError)) throw error;
    logger.warn("Unknown zone code", {
      zoneCode: designation.raw,
      baseZone: designation.baseZone,
    });
    return unknownZoneResult(designation.raw);
  }

  const result = analyzeResolved(designation.raw, regulations, request.lot, buildingHeight);
  logger.debug("Analyzed development potential", {
    zoneCode: designation.raw,
    lotArea: request.lot.area,
    lotFrontage: request.lot.frontage,
    meetsMinimumRequirements: result.meetsMinimumRequirements,
    maxFloorArea: result.maxFloorArea,
    potentialUnits: result.potentialUnits,
  });
  return result;
}

/** Share of the footprint the setback envelope offers; 0 with no footprint. */
export function efficiencyRatio(
  potential: Pick<DevelopmentPotential, "buildableArea" | "maxBuildingFootprint">,
): number {
  if (potential.maxBuildingFootprint <= 0) return 0;
  return potential.buildableArea / potential.maxBuildingFootprint;
}
