import { z } from "zod";

import { ValidationError } from "@oakville-zoning/shared";

const Dimension = z.number().finite().nonnegative();

export const LotGeometrySchema = z
  .object({
    /** Lot area, m². */
    area: Dimension,
    /** Lot frontage, m. */
    frontage: Dimension,
    /** Lot depth, m. Derived as area / frontage when absent. */
    depth: Dimension.optional(),
    isCorner: z.boolean().default(false),
    hasGarage: z.boolean().default(false),
  })
  .strict();

export type LotGeometry = z.infer<typeof LotGeometrySchema>;
export type LotGeometryInput = z.input<typeof LotGeometrySchema>;

/** Validate untrusted lot dimensions. Throws ValidationError. */
export function parseLotGeometry(input: unknown): LotGeometry {
  const parsed = LotGeometrySchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      "Invalid lot geometry",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "lot"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/** Given depth, or area / frontage; 0 when frontage is 0. */
export function resolveLotDepth(lot: Pick<LotGeometryInput, "area" | "frontage" | "depth">): number {
  if (lot.depth !== undefined) return lot.depth;
  return lot.frontage > 0 ? lot.area / lot.frontage : 0;
}
