import { z } from "zod";

import {
  BASE_ZONES,
  GARAGE_REDUCTION_SIDES,
  PERMITTED_USES,
  ZONE_CATEGORIES,
  type BaseZone,
} from "../enums.js";

// All lengths are metres and all areas square metres, as in By-law 2014-014.

const Metres = z.number().finite().nonnegative();
const PositiveMetres = z.number().finite().positive();
const Ratio = z.number().finite().gt(0).max(1);

export const InteriorSideSchema = z.union([
  Metres,
  z
    .object({
      /** Yard required on one side. */
      min: Metres,
      /** Reduced yard permitted on the other side. */
      max: Metres,
    })
    .strict(),
]);

export const SetbacksConfigSchema = z
  .object({
    frontYard: Metres,
    rearYard: Metres,
    interiorSide: InteriorSideSchema,
    flankageYard: Metres.nullable().default(null),
  })
  .strict();

export const DwellingRequirementsSchema = z
  .object({
    minLotArea: PositiveMetres.optional(),
    minLotFrontage: PositiveMetres.optional(),
    minLotAreaPerUnit: PositiveMetres.optional(),
    maxLotCoverage: Ratio.optional(),
    maxResidentialFloorArea: PositiveMetres.optional(),
    note: z.string().optional(),
  })
  .strict();

export const DwellingTypesSchema = z
  .object({
    detached_dwelling: DwellingRequirementsSchema.optional(),
    semi_detached_dwelling: DwellingRequirementsSchema.optional(),
    duplex_dwelling: DwellingRequirementsSchema.optional(),
    townhouse_dwelling: DwellingRequirementsSchema.optional(),
    back_to_back_townhouse_dwelling: DwellingRequirementsSchema.optional(),
    stacked_townhouse_dwelling: DwellingRequirementsSchema.optional(),
    apartment_dwelling: DwellingRequirementsSchema.optional(),
    linked_dwelling: DwellingRequirementsSchema.optional(),
  })
  .strict();

export const CornerLotAdjustmentsSchema = z
  .object({
    rearYard: Metres,
    minInteriorSide: Metres,
  })
  .strict();

export const GarageAdjustmentsSchema = z
  .object({
    sides: z.enum(GARAGE_REDUCTION_SIDES),
    reducedInteriorSide: Metres,
  })
  .strict();

export const ZoneRegulationsSchema = z
  .object({
    name: z.string().min(1),
    category: z.enum(ZONE_CATEGORIES),
    minLotArea: PositiveMetres,
    minLotFrontage: PositiveMetres,
    setbacks: SetbacksConfigSchema,
    maxHeight: PositiveMetres,
    maxStoreys: z.number().int().positive().nullable().default(null),
    maxLotCoverage: Ratio.nullable().default(null),
    maxFloorAreaRatio: z.number().finite().positive().nullable().default(null),
    maxResidentialFloorAreaAbsolute: PositiveMetres.nullable().default(null),
    maxDwellingDepth: PositiveMetres.nullable().default(null),
    minLotAreaPerUnit: PositiveMetres.nullable().default(null),
    permittedUses: z.array(z.enum(PERMITTED_USES)),
    dwellingTypes: DwellingTypesSchema.default({}),
    cornerLotAdjustments: CornerLotAdjustmentsSchema.nullable().default(null),
    garageAdjustments: GarageAdjustmentsSchema.nullable().default(null),
  })
  .strict();

/** Fields a special provision may replace; anything but the zone code. */
export const ZoneRegulationOverridesSchema = ZoneRegulationsSchema.partial().strict();

export const FarBandSchema = z
  .object({
    /** Upper lot-area bound of the band; null for the open last band. */
    upTo: PositiveMetres.nullable(),
    /** Whether a lot exactly at `upTo` falls in this band. */
    inclusive: z.boolean().default(false),
    far: z.number().finite().positive(),
  })
  .strict();

export const FarTableSchema = z
  .array(FarBandSchema)
  .min(1)
  .superRefine((bands, ctx) => {
    let previous = -Infinity;
    bands.forEach((band, index) => {
      const isLast = index === bands.length - 1;
      if (band.upTo === null) {
        if (!isLast) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, "upTo"],
            message: "Only the last band may be open-ended",
          });
        }
        return;
      }
      if (isLast) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "upTo"],
          message: "The last band must be open-ended (upTo: null)",
        });
      }
      if (band.upTo <= previous) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "upTo"],
          message: "Band upper bounds must be strictly ascending",
        });
      }
      previous = band.upTo;
    });
  });

export const LotCoverageRuleSchema = z.union([
  z
    .object({
      zones: z.array(z.enum(BASE_ZONES)).min(1),
      maxCoverage: Ratio,
    })
    .strict(),
  z
    .object({
      zones: z.array(z.enum(BASE_ZONES)).min(1),
      /** Proposed building height (m) up to which the zone's own coverage holds. */
      heightThreshold: PositiveMetres,
      coverageAboveThreshold: Ratio,
    })
    .strict(),
]);

export const SuffixZoneRuleSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(""),
    maxHeight: PositiveMetres,
    maxStoreys: z.number().int().positive(),
    farTable: FarTableSchema.nullable().default(null),
    lotCoverage: z.array(LotCoverageRuleSchema).default([]),
    balconyProhibition: z.boolean().default(false),
    frontYardAveraging: z.boolean().default(false),
  })
  .strict();

export const SpecialProvisionRuleSchema = z
  .object({
    description: z.string().default(""),
    overrides: ZoneRegulationOverridesSchema.default({}),
  })
  .strict();

export const ZoneRegulationsFileSchema = z.record(z.string(), ZoneRegulationsSchema);
export const SuffixZonesFileSchema = z.record(
  z.string().regex(/^-\d+$/, "Suffix keys look like -0"),
  SuffixZoneRuleSchema,
);
export const SpecialProvisionsFileSchema = z.record(
  z.string().regex(/^SP:\d+$/, "Special provision keys look like SP:1"),
  SpecialProvisionRuleSchema,
);

export type DwellingRequirements = z.infer<typeof DwellingRequirementsSchema>;
export type ZoneRegulationFields = z.infer<typeof ZoneRegulationsSchema>;
export type ZoneRegulationField = keyof ZoneRegulationFields;
export type FarBand = z.infer<typeof FarBandSchema>;
export type LotCoverageRule = z.infer<typeof LotCoverageRuleSchema>;
export type SuffixZoneRule = z.infer<typeof SuffixZoneRuleSchema>;
export type SpecialProvisionRule = z.infer<typeof SpecialProvisionRuleSchema>;

/** Raw (pre-validation) zone record, as written in the JSON table or by callers. */
export type ZoneRegulationsInput = z.input<typeof ZoneRegulationsSchema>;

export type ZoneRegulations = ZoneRegulationFields & {
  zoneCode: BaseZone;
};

const REGULATION_FIELDS: ReadonlySet<string> = new Set(Object.keys(ZoneRegulationsSchema.shape));

export function isZoneRegulationField(key: string): key is ZoneRegulationField {
  return REGULATION_FIELDS.has(key);
}
