import Dexie, { type Table } from "dexie";
import type { PoolProfile } from "../domain/types";

class PoolChemDatabase extends Dexie {
  profiles!: Table<PoolProfile, string>;

  constructor(name: string) {
    super(name);

    this.version(1).stores({
      profiles: "id, name, updatedAt"
    });
  }
}

export const db = new PoolChemDatabase("poolchemDB");
