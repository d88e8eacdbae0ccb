/**
 * Zone designation parsing.
 *
 * A designation string carries up to three parts: the base zone, an optional
 * suffix zone (`-0`) and an optional site-specific special provision (`SP:1`),
 * e.g. `"RL2-0 SP:1"`. Parsing is permissive: any string yields a designation,
 * and an unrecognized base zone only surfaces when the regulations are looked up.
 */

export type ZoneDesignation = {
  /** Input exactly as given. */
  raw: string;
  /** Uppercased base zone, stripped of suffix and special provision. */
  baseZone: string;
  /** Suffix zone such as `-0`, or null. */
  suffix: string | null;
  /** Special provision such as `SP:1`, or null. */
  specialProvision: string | null;
};

const SPECIAL_PROVISION_DELIMITER = " SP:";
const SUFFIX_DELIMITER = "-";

const WELL_FORMED_ZONE_CODE = /^(RL(1[01]|[1-9])|RM[1-4]|RH|RUC)(-\d+)?( +SP:\d+)?$/;

/**
 * Split `value` at the first `delimiter`. The tail is the segment between the
 * first and second occurrence, so `"A-1-2"` yields head `"A"` and tail `"1"`.
 */
function splitFirst(value: string, delimiter: string): { head: string; tail: string } | null {
  const index = value.indexOf(delimiter);
  if (index === -1) return null;
  const rest = value.slice(index + delimiter.length);
  const next = rest.indexOf(delimiter);
  return {
    head: value.slice(0, index).trim(),
    tail: (next === -1 ? rest : rest.slice(0, next)).trim(),
  };
}

/**
 * Parse a raw zone string into its base zone, suffix and special provision.
 * The special provision is split off before the suffix. Never throws.
 */
export function parseZoneCode(raw: string): ZoneDesignation {
  let remainder = raw.trim().toUpperCase();

  let specialProvision: string | null = null;
  const sp = splitFirst(remainder, SPECIAL_PROVISION_DELIMITER);
  if (sp) {
    remainder = sp.head;
    specialProvision = sp.tail ? `SP:${sp.tail}` : null;
  }

  let suffix: string | null = null;
  const suffixSplit = splitFirst(remainder, SUFFIX_DELIMITER);
  if (suffixSplit) {
    remainder = suffixSplit.head;
    suffix = suffixSplit.tail ? `-${suffixSplit.tail}` : null;
  }

  return Object.freeze({
    raw,
    baseZone: remainder,
    suffix,
    specialProvision,
  });
}

/** True when `raw` has the canonical shape of a by-law zone code. Advisory only. */
export function isWellFormedZoneCode(raw: string): boolean {
  return WELL_FORMED_ZONE_CODE.test(raw.trim().toUpperCase());
}

/** Canonical display form, e.g. `RL2-0 SP:1`. */
export function formatZoneDesignation(designation: ZoneDesignation): string {
  let text = designation.baseZone;
  if (designation.suffix) text += designation.suffix;
  if (designation.specialProvision) text += ` ${designation.specialProvision}`;
  return text;
}
