/**
 * Regulation resolution in three stages, each returning a new frozen record:
 *
 * 1. base record lookup by base zone;
 * 2. suffix-zone overrides (height and storeys replaced, rule attached for the
 *    FAR and coverage resolvers, setbacks untouched);
 * 3. special-provision overrides, field by field, with the highest precedence.
 *
 * A suffix or special provision without a matching rule stays on the
 * designation but changes no figure.
 */

import type { ZoneDesignation } from "../designation/parseZoneCode.js";
import { isBaseZone } from "../enums.js";
import { UnknownZoneError } from "../errors.js";
import {
  isZoneRegulationField,
  type SpecialProvisionRule,
  type SuffixZoneRule,
  type ZoneRegulationField,
  type ZoneRegulations,
} from "../schemas/regulations.js";
import { deepFreeze } from "./freeze.js";
import type { RegulationConfig } from "./loadConfig.js";

export type ResolvedZoneRegulations = ZoneRegulations & {
  designation: ZoneDesignation;
  /** Suffix rule that matched the designation's suffix, if any. */
  suffixRule: SuffixZoneRule | null;
  /** Special provision id whose overrides were applied, if any. */
  appliedSpecialProvision: string | null;
  /** Fields replaced by the special provision. */
  overriddenFields: readonly ZoneRegulationField[];
};

export function lookupBaseRegulations(
  designation: ZoneDesignation,
  zones: RegulationConfig["zones"],
): ResolvedZoneRegulations {
  const base = isBaseZone(designation.baseZone) ? zones.get(designation.baseZone) : undefined;
  if (!base) {
    throw new UnknownZoneError(designation);
  }
  return deepFreeze({
    ...base,
    designation: { ...designation },
    suffixRule: null,
    appliedSpecialProvision: null,
    overriddenFields: [],
  });
}

export function applySuffixRule(
  regulations: ResolvedZoneRegulations,
  rule: SuffixZoneRule | undefined,
): ResolvedZoneRegulations {
  if (!rule) return regulations;
  return deepFreeze({
    ...regulations,
    maxHeight: rule.maxHeight,
    maxStoreys: rule.maxStoreys,
    suffixRule: rule,
  });
}

export function applySpecialProvision(
  regulations: ResolvedZoneRegulations,
  id: string,
  rule: SpecialProvisionRule | undefined,
): ResolvedZoneRegulations {
  if (!rule) return regulations;
  const overriddenFields = Object.keys(rule.overrides).filter(isZoneRegulationField);
  return deepFreeze({
    ...regulations,
    ...rule.overrides,
    appliedSpecialProvision: id,
    overriddenFields,
  });
}

/** Resolve a parsed designation against loaded tables. Throws UnknownZoneError. */
export function resolveZoneRegulations(
  designation: ZoneDesignation,
  config: RegulationConfig,
): ResolvedZoneRegulations {
  let regulations = lookupBaseRegulations(designation, config.zones);

  if (designation.suffix) {
    regulations = applySuffixRule(regulations, config.suffixZones.get(designation.suffix));
  }

  if (designation.specialProvision) {
    regulations = applySpecialProvision(
      regulations,
      designation.specialProvision,
      config.specialProvisions.get(designation.specialProvision),
    );
  }

  return regulations;
}
