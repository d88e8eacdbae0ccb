/**
 * Loads the by-law tables (zones, suffix zones, special provisions) from JSON
 * and validates them. Any malformed file fails the whole load with a
 * ConfigurationError; a zone that is simply absent is only reported when it
 * is requested.
 */

import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { z } from "zod";

import { ConfigurationError, logger } from "@oakville-zoning/shared";

import { isBaseZone, type BaseZone } from "../enums.js";
import {
  SpecialProvisionsFileSchema,
  SuffixZonesFileSchema,
  ZoneRegulationsFileSchema,
  type SpecialProvisionRule,
  type SuffixZoneRule,
  type ZoneRegulations,
} from "../schemas/regulations.js";
import { deepFreeze } from "./freeze.js";

export const ZONE_REGULATIONS_FILE = "zone-regulations.json";
export const SUFFIX_ZONES_FILE = "suffix-zones.json";
export const SPECIAL_PROVISIONS_FILE = "special-provisions.json";

/** Bundled tables shipped with the package. */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

export type RegulationConfig = {
  zones: ReadonlyMap<BaseZone, ZoneRegulations>;
  suffixZones: ReadonlyMap<string, SuffixZoneRule>;
  specialProvisions: ReadonlyMap<string, SpecialProvisionRule>;
};

/** Unvalidated table contents, as parsed from JSON or written inline in tests. */
export type RawRegulationConfig = {
  zones: unknown;
  suffixZones?: unknown;
  specialProvisions?: unknown;
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseTable<T extends z.ZodTypeAny>(source: string, schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

/** Validate raw table contents and freeze them into lookup maps. */
export function buildRegulationConfig(raw: RawRegulationConfig): RegulationConfig {
  const zoneTable = parseTable(ZONE_REGULATIONS_FILE, ZoneRegulationsFileSchema, raw.zones);
  const suffixTable = parseTable(SUFFIX_ZONES_FILE, SuffixZonesFileSchema, raw.suffixZones ?? {});
  const provisionTable = parseTable(
    SPECIAL_PROVISIONS_FILE,
    SpecialProvisionsFileSchema,
    raw.specialProvisions ?? {},
  );

  const zones = new Map<BaseZone, ZoneRegulations>();
  for (const [code, fields] of Object.entries(zoneTable)) {
    if (!isBaseZone(code)) {
      throw new ConfigurationError(ZONE_REGULATIONS_FILE, `unknown base zone '${code}'`);
    }
    zones.set(code, deepFreeze({ zoneCode: code, ...fields }));
  }

  return {
    zones,
    suffixZones: new Map(Object.entries(suffixTable).map(([key, rule]) => [key, deepFreeze(rule)])),
    specialProvisions: new Map(
      Object.entries(provisionTable).map(([key, rule]) => [key, deepFreeze(rule)]),
    ),
  };
}

function readJsonFile(dir: string, fileName: string, required: boolean): unknown {
  const filePath = path.join(dir, fileName);
  let text: string;
  try {
    text = readFileSync(filePath, "utf8");
  } catch (error) {
    if (!required && error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(fileName, `cannot read ${filePath} (${reason})`);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(fileName, `invalid JSON (${reason})`);
  }
}

/**
 * Read and validate the three tables from `dir`. The zone table is required;
 * a missing suffix or special-provision table is treated as empty.
 */
export function loadRegulationConfig(dir: string = DEFAULT_DATA_DIR): RegulationConfig {
  const config = buildRegulationConfig({
    zones: readJsonFile(dir, ZONE_REGULATIONS_FILE, true),
    suffixZones: readJsonFile(dir, SUFFIX_ZONES_FILE, false),
    specialProvisions: readJsonFile(dir, SPECIAL_PROVISIONS_FILE, false),
  });

  logger.debug("Loaded zoning regulation tables", {
    dir,
    zones: config.zones.size,
    suffixZones: config.suffixZones.size,
    specialProvisions: config.specialProvisions.size,
  });

  return config;
}
