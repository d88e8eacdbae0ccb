/**
 * Dwelling-type permissions per zone, read from each zone's permitted uses.
 */

import { DWELLING_TYPES, isDwellingType, type BaseZone, type DwellingType } from "../enums.js";
import { parseZoneCode, type ZoneDesignation } from "../designation/parseZoneCode.js";
import {
  getDefaultRegulationRepository,
  type RegulationRepository,
} from "../regulations/repository.js";
import type { DwellingRequirements } from "../schemas/regulations.js";

/** Dwelling types permitted in this few zones or fewer get an exclusivity warning. */
const EXCLUSIVE_ZONE_LIMIT = 2;

export type DwellingTypeValidation = {
  valid: boolean;
  message: string;
};

export type DevelopmentProposalValidation = {
  zoneCode: string;
  baseZone: string;
  permittedDwellingTypes: DwellingType[];
  proposedDwellings: DwellingType[];
  isCompliant: boolean;
  violations: string[];
  warnings: string[];
  compliantDwellings: DwellingType[];
  nonCompliantDwellings: DwellingType[];
};

function toDesignation(zone: ZoneDesignation | string): ZoneDesignation {
  return typeof zone === "string" ? parseZoneCode(zone) : zone;
}

/** `back_to_back_townhouse_dwelling` → `Back To Back Townhouse`. */
function dwellingLabel(dwellingType: DwellingType): string {
  return dwellingType
    .replace(/_dwelling$/, "")
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function getPermittedDwellingTypes(
  zone: ZoneDesignation | string,
  repository: RegulationRepository = getDefaultRegulationRepository(),
): DwellingType[] {
  const regulations = repository.tryResolve(toDesignation(zone));
  return regulations ? regulations.permittedUses.filter(isDwellingType) : [];
}

export function validateDwellingType(
  zone: ZoneDesignation | string,
  dwellingType: DwellingType,
  repository: RegulationRepository = getDefaultRegulationRepository(),
): DwellingTypeValidation {
  const designation = toDesignation(zone);
  const { baseZone } = designation;
  if (!repository.has(baseZone)) {
    return { valid: false, message: `Zone '${baseZone}' is not recognized in the zoning by-law` };
  }

  const permitted = getPermittedDwellingTypes(designation, repository);
  if (permitted.includes(dwellingType)) {
    return { valid: true, message: `'${dwellingType}' is permitted in zone '${baseZone}'` };
  }
  return {
    valid: false,
    message: `'${dwellingType}' is NOT permitted in zone '${baseZone}'. Permitted types: ${permitted.join(", ")}`,
  };
}

/** Zones whose base regulations permit the dwelling type, in table order. */
export function getZonesForDwellingType(
  dwellingType: DwellingType,
  repository: RegulationRepository = getDefaultRegulationRepository(),
): BaseZone[] {
  return repository
    .knownZones()
    .filter((code) => repository.resolve(code).permittedUses.includes(dwellingType));
}

export function validateDevelopmentProposal(
  zone: ZoneDesignation | string,
  proposedDwellings: readonly DwellingType[],
  repository: RegulationRepository = getDefaultRegulationRepository(),
): DevelopmentProposalValidation {
  const designation = toDesignation(zone);
  const result: DevelopmentProposalValidation = {
    zoneCode: designation.raw,
    baseZone: designation.baseZone,
    permittedDwellingTypes: getPermittedDwellingTypes(designation, repository),
    proposedDwellings: [...proposedDwellings],
    isCompliant: true,
    violations: [],
    warnings: [],
    compliantDwellings: [],
    nonCompliantDwellings: [],
  };

  for (const dwelling of proposedDwellings) {
    const { valid, message } = validateDwellingType(designation, dwelling, repository);
    if (valid) {
      result.compliantDwellings.push(dwelling);
    } else {
      result.nonCompliantDwellings.push(dwelling);
      result.violations.push(message);
      result.isCompliant = false;
    }
  }

  // One warning per distinct type, in canonical order.
  for (const dwelling of DWELLING_TYPES) {
    if (!proposedDwellings.includes(dwelling)) continue;
    const zones = getZonesForDwellingType(dwelling, repository);
    const isExclusive = zones.length > 0 && zones.length <= EXCLUSIVE_ZONE_LIMIT;
    if (isExclusive && !zones.some((code) => code === designation.baseZone)) {
      result.warnings.push(
        `${dwellingLabel(dwelling)} dwellings are ONLY permitted in ${zones.join(" and ")} zones`,
      );
    }
  }

  return result;
}

/** Dwelling-type-specific figures for the zone, or null when it has none. */
export function getDwellingRequirements(
  zone: ZoneDesignation | string,
  dwellingType: DwellingType,
  repository: RegulationRepository = getDefaultRegulationRepository(),
): DwellingRequirements | null {
  const regulations = repository.tryResolve(toDesignation(zone));
  return regulations?.dwellingTypes[dwellingType] ?? null;
}
