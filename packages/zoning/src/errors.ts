import { NotFoundError } from "@oakville-zoning/shared";

import type { ZoneDesignation } from "./designation/parseZoneCode.js";

/** The designation's base zone has no regulations in the loaded configuration. */
export class UnknownZoneError extends NotFoundError {
  public readonly designation: ZoneDesignation;

  constructor(designation: ZoneDesignation) {
    super("Zone", designation.baseZone, "UNKNOWN_ZONE");
    this.name = "UnknownZoneError";
    this.designation = designation;
  }
}
