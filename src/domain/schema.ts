import { z } from "zod";

export const PoolTypeSchema = z.enum(["chlorine", "saltwater", "mineral"]);
export const SurfaceTypeSchema = z.enum(["plaster", "pebble", "vinyl", "fiberglass", "painted"]);

export const AcidTypeSchema = z.enum([
  "muriatic_14_5",
  "muriatic_28_3",
  "muriatic_31_45",
  "muriatic_34_6",
  "dry_acid"
]);

export const ChlorineTypeSchema = z.enum([
  "bleach_6",
  "bleach_8_25",
  "bleach_10",
  "bleach_12_5",
  "cal_hypo_65",
  "cal_hypo_73",
  "dichlor",
  "trichlor"
]);

const ppm = z.number().finite().nonnegative();

// TA and CH feed a logarithm when target indices are computed
export const PoolTargetsSchema = z.object({
  ph: z.number().min(0).max(14),
  freeChlorinePpm: ppm,
  totalAlkalinityPpm: z.number().finite().positive(),
  calciumHardnessPpm: z.number().finite().positive(),
  cyanuricAcidPpm: ppm,
  saltPpm: ppm,
  boratesPpm: ppm
});

export const EnabledDosesSchema = z.object({
  acid: z.boolean(),
  chlorine: z.boolean(),
  alkalinity: z.boolean(),
  calcium: z.boolean(),
  cyanuricAcid: z.boolean(),
  salt: z.boolean(),
  borates: z.boolean()
});

export const PoolProfileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  updatedAt: z.string().datetime(),
  volumeGallons: z.number().finite().positive(),
  poolType: PoolTypeSchema,
  surfaceType: SurfaceTypeSchema,
  targets: PoolTargetsSchema,
  acidType: AcidTypeSchema,
  chlorineType: ChlorineTypeSchema,
  enabledDoses: EnabledDosesSchema
});

/** What a caller supplies at configuration time; everything else defaults. */
export const PoolProfileInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().trim().min(1).optional(),
  volumeGallons: z.number().finite().positive(),
  poolType: PoolTypeSchema.optional(),
  surfaceType: SurfaceTypeSchema.optional(),
  targets: PoolTargetsSchema.partial().optional(),
  acidType: AcidTypeSchema.optional(),
  chlorineType: ChlorineTypeSchema.optional(),
  enabledDoses: EnabledDosesSchema.partial().optional()
});

/** Fields editable after creation. */
export const PoolOptionsSchema = z
  .object({
    targets: PoolTargetsSchema.partial().optional(),
    acidType: AcidTypeSchema.optional(),
    chlorineType: ChlorineTypeSchema.optional(),
    enabledDoses: EnabledDosesSchema.partial().optional()
  })
  .strict();

export type PoolProfileInput = z.infer<typeof PoolProfileInputSchema>;
export type PoolOptionsUpdate = z.infer<typeof PoolOptionsSchema>;
