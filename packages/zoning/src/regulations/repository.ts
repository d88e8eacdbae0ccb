import { loadZoningDataDir, logger } from "@oakville-zoning/shared";

import { parseZoneCode, type ZoneDesignation } from "../designation/parseZoneCode.js";
import { isBaseZone, type BaseZone } from "../enums.js";
import { UnknownZoneError } from "../errors.js";
import type { SpecialProvisionRule, SuffixZoneRule } from "../schemas/regulations.js";
import { DEFAULT_DATA_DIR, loadRegulationConfig, type RegulationConfig } from "./loadConfig.js";
import { resolveZoneRegulations, type ResolvedZoneRegulations } from "./resolve.js";

function toDesignation(zone: ZoneDesignation | string): ZoneDesignation {
  return typeof zone === "string" ? parseZoneCode(zone) : zone;
}

/**
 * Read-only view over the loaded by-law tables. Records are frozen, so one
 * instance can be shared by every caller in the process.
 */
export class RegulationRepository {
  private readonly config: RegulationConfig;

  constructor(config: RegulationConfig) {
    this.config = config;
  }

  /** Resolve a designation (or raw zone string). Throws UnknownZoneError. */
  resolve(zone: ZoneDesignation | string): ResolvedZoneRegulations {
    return resolveZoneRegulations(toDesignation(zone), this.config);
  }

  /** Like resolve(), but returns null for an unknown base zone. */
  tryResolve(zone: ZoneDesignation | string): ResolvedZoneRegulations | null {
    try {
      return this.resolve(zone);
    } catch (error) {
      if (error instanceof UnknownZoneError) return null;
      throw error;
    }
  }

  knownZones(): BaseZone[] {
    return [...this.config.zones.keys()];
  }

  has(baseZone: string): boolean {
    const code = baseZone.trim().toUpperCase();
    return isBaseZone(code) && this.config.zones.has(code);
  }

  getSuffixRule(suffix: string): SuffixZoneRule | null {
    return this.config.suffixZones.get(suffix) ?? null;
  }

  getSpecialProvision(id: string): SpecialProvisionRule | null {
    return this.config.specialProvisions.get(id) ?? null;
  }
}

let defaultRepository: RegulationRepository | null = null;

/**
 * Process-wide repository over `ZONING_DATA_DIR`, or the bundled tables when
 * unset. Loaded on first use.
 */
export function getDefaultRegulationRepository(): RegulationRepository {
  if (!defaultRepository) {
    const dir = loadZoningDataDir() ?? DEFAULT_DATA_DIR;
    defaultRepository = new RegulationRepository(loadRegulationConfig(dir));
    logger.debug("Initialized default regulation repository", { dir });
  }
  return defaultRepository;
}
