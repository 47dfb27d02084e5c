import { DEFAULT_ENABLED_DOSES, DEFAULT_TARGETS, defaultPoolProfile } from "./defaults";
import {
  PoolOptionsSchema,
  PoolProfileInputSchema,
  type PoolOptionsUpdate,
  type PoolProfileInput
} from "./schema";
import type { PoolProfile } from "./types";

function freezeProfile(profile: PoolProfile): PoolProfile {
  return Object.freeze({
    ...profile,
    targets: Object.freeze({ ...profile.targets }),
    enabledDoses: Object.freeze({ ...profile.enabledDoses })
  });
}

/**
 * Builds a profile from configuration input, filling unspecified targets,
 * chemicals and dose toggles with the defaults. Salt dosing defaults to on
 * for saltwater pools only. Throws a ZodError on invalid input.
 */
export function createPoolProfile(input: PoolProfileInput, now: Date = new Date()): PoolProfile {
  const parsed = PoolProfileInputSchema.parse(input);
  const poolType = parsed.poolType ?? defaultPoolProfile.poolType;

  return freezeProfile({
    id: parsed.id ?? crypto.randomUUID(),
    name: parsed.name ?? defaultPoolProfile.name,
    updatedAt: now.toISOString(),
    volumeGallons: parsed.volumeGallons,
    poolType,
    surfaceType: parsed.surfaceType ?? defaultPoolProfile.surfaceType,
    targets: { ...DEFAULT_TARGETS, ...parsed.targets },
    acidType: parsed.acidType ?? defaultPoolProfile.acidType,
    chlorineType: parsed.chlorineType ?? defaultPoolProfile.chlorineType,
    enabledDoses: {
      ...DEFAULT_ENABLED_DOSES,
      salt: poolType === "saltwater",
      ...parsed.enabledDoses
    }
  });
}

/**
 * The only way a profile changes after creation. Returns a new profile; the
 * one passed in is left as it was.
 */
export function updatePoolProfileOptions(
  profile: PoolProfile,
  update: PoolOptionsUpdate,
  now: Date = new Date()
): PoolProfile {
  const parsed = PoolOptionsSchema.parse(update);

  return freezeProfile({
    ...profile,
    updatedAt: now.toISOString(),
    targets: { ...profile.targets, ...parsed.targets },
    acidType: parsed.acidType ?? profile.acidType,
    chlorineType: parsed.chlorineType ?? profile.chlorineType,
    enabledDoses: { ...profile.enabledDoses, ...parsed.enabledDoses }
  });
}
