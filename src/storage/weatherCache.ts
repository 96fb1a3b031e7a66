import type { StorageError } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import { cityWeatherBundleSchema } from "../domain/weather/schema";
import { type CityWeatherBundle, isValidBundle } from "../domain/weather/types";
import { WEATHER_CACHE_PREFIX } from "../utils/constants";
import { safeStorage } from "./dbSafe";
import type { KeyValueStorage } from "./keyValueStorage";

/**
 * Per-city bundle store. No TTL: an entry stays authoritative until the
 * next successful fetch for the same city overwrites it.
 */
export class WeatherCache {
  constructor(
    private readonly storage: KeyValueStorage,
    private readonly prefix: string = WEATHER_CACHE_PREFIX,
  ) {}

  keyFor(city: string): string {
    return `${this.prefix}_${city}`;
  }

  async get(city: string): Promise<Result<CityWeatherBundle | null, StorageError>> {
    const raw = await safeStorage(() => this.storage.getItem(this.keyFor(city)));
    if (!raw.ok) return raw;
    if (raw.value === null) return ok(null);
    const bundle = this.decode(raw.value);
    if (!bundle) {
      console.warn("Ignoring corrupt cached weather for", city);
      return ok(null);
    }
    return ok(bundle);
  }

  async set(
    city: string,
    bundle: CityWeatherBundle,
  ): Promise<Result<void, StorageError>> {
    if (!isValidBundle(bundle)) {
      return err({
        type: "Corrupt",
        message: `Refusing to cache incomplete weather for ${city}.`,
      });
    }
    return safeStorage(() =>
      this.storage.setItem(this.keyFor(city), JSON.stringify(bundle)),
    );
  }

  async remove(city: string): Promise<Result<void, StorageError>> {
    return safeStorage(() => this.storage.removeItem(this.keyFor(city)));
  }

  async getAll(): Promise<Result<Map<string, CityWeatherBundle>, StorageError>> {
    const keys = await safeStorage(() => this.storage.keys());
    if (!keys.ok) return keys;

    const keyPrefix = `${this.prefix}_`;
    const bundles = new Map<string, CityWeatherBundle>();
    for (const key of keys.value) {
      if (!key.startsWith(keyPrefix)) continue;
      const city = key.slice(keyPrefix.length);
      const entry = await this.get(city);
      if (!entry.ok) return entry;
      if (entry.value) bundles.set(city, entry.value);
    }
    return ok(bundles);
  }

  private decode(raw: string): CityWeatherBundle | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return null;
    }
    const result = cityWeatherBundleSchema.safeParse(parsed);
    if (!result.success || !isValidBundle(result.data)) return null;
    return result.data;
  }
}
