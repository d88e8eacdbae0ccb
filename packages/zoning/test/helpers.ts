import {
  buildRegulationConfig,
  loadRegulationConfig,
  RegulationRepository,
  type ZoneRegulationsInput,
} from "../src/index.js";

let bundled: RegulationRepository | null = null;

/** Repository over the tables shipped in packages/zoning/data. */
export function bundledRepository(): RegulationRepository {
  bundled ??= new RegulationRepository(loadRegulationConfig());
  return bundled;
}

/** A small RL2-like zone for inline configurations. */
export function makeZone(overrides: Partial<ZoneRegulationsInput> = {}): ZoneRegulationsInput {
  return {
    name: "Residential Low 2",
    category: "residential_low",
    minLotArea: 836,
    minLotFrontage: 22.5,
    setbacks: { frontYard: 9, rearYard: 7.5, interiorSide: 2.4, flankageYard: 3.5 },
    maxHeight: 12,
    maxLotCoverage: 0.3,
    permittedUses: ["detached_dwelling"],
    ...overrides,
  };
}

export const TEST_SUFFIX_RULE = {
  name: "Test suffix",
  maxHeight: 9,
  maxStoreys: 2,
  farTable: [
    { upTo: 600, far: 0.45 },
    { upTo: null, far: 0.3 },
  ],
  lotCoverage: [{ zones: ["RL2"], heightThreshold: 7, coverageAboveThreshold: 0.25 }],
};

export function inlineRepository(raw: {
  zones?: Record<string, ZoneRegulationsInput>;
  suffixZones?: unknown;
  specialProvisions?: unknown;
}): RegulationRepository {
  return new RegulationRepository(
    buildRegulationConfig({
      zones: raw.zones ?? { RL2: makeZone() },
      suffixZones: raw.suffixZones ?? { "-0": TEST_SUFFIX_RULE },
      specialProvisions: raw.specialProvisions ?? {},
    }),
  );
}
