import { z } from "zod";

import { PERMITTED_USES } from "../enums.js";

const SquareMetres = z.number().finite().nonnegative();

export const SetbacksSchema = z.object({
  frontYard: z.number().finite(),
  rearYard: z.number().finite(),
  interiorSideLeft: z.number().finite(),
  interiorSideRight: z.number().finite(),
  flankageYard: z.number().finite().nullable(),
});

export const DevelopmentPotentialSchema = z.object({
  /** Zone string as supplied by the caller. */
  zoneCode: z.string(),
  zoneName: z.string(),
  meetsMinimumRequirements: z.boolean(),
  buildableArea: SquareMetres,
  maxBuildingFootprint: SquareMetres,
  maxFloorArea: SquareMetres,
  maxHeight: z.number().finite().nonnegative(),
  maxStoreys: z.number().int().positive().nullable(),
  /** 0 only when the zone is unknown. */
  potentialUnits: z.number().int().nonnegative(),
  permittedUses: z.array(z.enum(PERMITTED_USES)),
  constraints: z.array(z.string()),
  opportunities: z.array(z.string()),
  setbacks: SetbacksSchema.nullable(),
  floorAreaRatio: z.number().finite().nonnegative(),
});

export type Setbacks = z.infer<typeof SetbacksSchema>;
export type DevelopmentPotential = z.infer<typeof DevelopmentPotentialSchema>;
