import { GEOCODE_CACHE_PREFIX } from "../utils/constants";
import type { KeyValueStorage } from "./keyValueStorage";

/** Coordinate key → resolved region name. Entries never expire. */
export interface GeocodeCache {
  get(key: string): Promise<string | null>;
  set(key: string, name: string): Promise<void>;
}

export class MemoryGeocodeCache implements GeocodeCache {
  private readonly entries = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, name: string): Promise<void> {
    this.entries.set(key, name);
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Memory layer in front of a durable key-value backend. */
export class PersistentGeocodeCache implements GeocodeCache {
  private readonly memory = new MemoryGeocodeCache();

  constructor(
    private readonly storage: KeyValueStorage,
    private readonly prefix: string = GEOCODE_CACHE_PREFIX,
  ) {}

  async get(key: string): Promise<string | null> {
    const hit = await this.memory.get(key);
    if (hit !== null) return hit;
    const stored = await this.storage.getItem(`${this.prefix}_${key}`);
    if (stored !== null) {
      await this.memory.set(key, stored);
    }
    return stored;
  }

  async set(key: string, name: string): Promise<void> {
    await this.memory.set(key, name);
    await this.storage.setItem(`${this.prefix}_${key}`, name);
  }
}
