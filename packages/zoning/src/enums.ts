export const BASE_ZONES = [
  "RL1",
  "RL2",
  "RL3",
  "RL4",
  "RL5",
  "RL6",
  "RL7",
  "RL8",
  "RL9",
  "RL10",
  "RL11",
  "RUC",
  "RM1",
  "RM2",
  "RM3",
  "RM4",
  "RH",
] as const;
export type BaseZone = (typeof BASE_ZONES)[number];

const BASE_ZONE_SET: ReadonlySet<string> = new Set(BASE_ZONES);

export function isBaseZone(code: string): code is BaseZone {
  return BASE_ZONE_SET.has(code);
}

export const ZONE_CATEGORIES = [
  "residential_low",
  "residential_medium",
  "residential_high",
  "residential_uptown_core",
] as const;
export type ZoneCategory = (typeof ZONE_CATEGORIES)[number];

export const DWELLING_TYPES = [
  "detached_dwelling",
  "semi_detached_dwelling",
  "duplex_dwelling",
  "townhouse_dwelling",
  "back_to_back_townhouse_dwelling",
  "stacked_townhouse_dwelling",
  "apartment_dwelling",
  "linked_dwelling",
] as const;
export type DwellingType = (typeof DWELLING_TYPES)[number];

const DWELLING_TYPE_SET: ReadonlySet<string> = new Set(DWELLING_TYPES);

export function isDwellingType(use: string): use is DwellingType {
  return DWELLING_TYPE_SET.has(use);
}

export const PERMITTED_USES = [
  ...DWELLING_TYPES,
  "additional_residential_unit",
  "home_occupation",
  "bed_and_breakfast",
  "day_care",
  "conservation_use",
  "park_public",
] as const;
export type PermittedUse = (typeof PERMITTED_USES)[number];

export const GARAGE_REDUCTION_SIDES = ["one", "both"] as const;
export type GarageReductionSides = (typeof GARAGE_REDUCTION_SIDES)[number];
