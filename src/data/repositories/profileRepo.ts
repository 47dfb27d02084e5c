import { db } from "../db";
import { updatePoolProfileOptions } from "../../domain/profile";
import { PoolProfileSchema, type PoolOptionsUpdate } from "../../domain/schema";
import type { PoolProfile } from "../../domain/types";

export class ProfileNotFoundError extends Error {
  constructor(readonly profileId: string) {
    super(`Pool profile not found: ${profileId}`);
    this.name = "ProfileNotFoundError";
  }
}

// Records written by an older version or edited by hand are skipped, not returned
function readStored(record: PoolProfile | undefined): PoolProfile | undefined {
  if (record === undefined) {
    return undefined;
  }
  const parsed = PoolProfileSchema.safeParse(record);
  if (!parsed.success) {
    console.warn(
      `Profile repo: skipping invalid stored profile ${record.id}:`,
      parsed.error.issues.map((entry) => entry.path.join(".")).join(", ")
    );
    return undefined;
  }
  return parsed.data;
}

export const profileRepo = {
  load: async (id: string): Promise<PoolProfile | undefined> => {
    return readStored(await db.profiles.get(id));
  },

  list: async (): Promise<PoolProfile[]> => {
    const records = await db.profiles.orderBy("name").toArray();
    return records
      .map(readStored)
      .filter((profile): profile is PoolProfile => profile !== undefined);
  },

  save: async (profile: PoolProfile): Promise<void> => {
    await db.profiles.put(PoolProfileSchema.parse(profile));
  },

  updateOptions: async (id: string, update: PoolOptionsUpdate): Promise<PoolProfile> => {
    const current = await profileRepo.load(id);
    if (current === undefined) {
      throw new ProfileNotFoundError(id);
    }
    const updated = updatePoolProfileOptions(current, update);
    await db.profiles.put(updated);
    return updated;
  },

  remove: async (id: string): Promise<void> => {
    await db.profiles.delete(id);
  }
};
