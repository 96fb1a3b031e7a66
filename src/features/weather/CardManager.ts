import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { StorageError } from "../../domain/errors";
import { err, ok, type Result } from "../../domain/result";
import {
  currentConditionsSchema,
  dailyForecastSchema,
} from "../../domain/weather/schema";
import type {
  CityWeatherBundle,
  CurrentConditions,
  DailyForecast,
} from "../../domain/weather/types";
import { safeStorage } from "../../storage/dbSafe";
import type { KeyValueStorage } from "../../storage/keyValueStorage";
import { SAVED_CARDS_KEY } from "../../utils/constants";

export interface WeatherCardEntry {
  id: string;
  adcode: string;
  city: string;
  cityName: string;
  temperature: string;
  weatherCondition: string;
  highTemperature: string | null;
  lowTemperature: string | null;
  currentWeather: CurrentConditions[];
  futureWeather: DailyForecast[];
}

const cardListSchema = z.array(
  z.object({
    id: z.string().min(1),
    adcode: z.string().min(1),
    city: z.string(),
    cityName: z.string(),
    temperature: z.string(),
    weatherCondition: z.string(),
    highTemperature: z.string().nullable(),
    lowTemperature: z.string().nullable(),
    currentWeather: z.array(currentConditionsSchema),
    futureWeather: z.array(dailyForecastSchema),
  }),
) satisfies z.ZodType<WeatherCardEntry[]>;

export function createCardEntry(
  bundle: CityWeatherBundle,
  adcode: string,
  id: string = randomUUID(),
): WeatherCardEntry {
  const current = bundle.current[0];
  const today = bundle.forecast[0];
  const city = current?.city ?? bundle.cityNames[0] ?? "";
  return {
    id,
    adcode,
    city,
    cityName: bundle.cityNames[0] ?? city,
    temperature: current?.temperature ?? "",
    weatherCondition: current?.weather ?? "",
    highTemperature: today?.dayTemp ?? null,
    lowTemperature: today?.nightTemp ?? null,
    currentWeather: bundle.current,
    futureWeather: bundle.forecast,
  };
}

/**
 * List move with "insert before destination" semantics: `to` is an index
 * into the list as it was before the moved items were taken out.
 */
export function moveItems<T>(items: readonly T[], from: number[], to: number): T[] {
  const indices = [...new Set(from)]
    .filter((index) => index >= 0 && index < items.length)
    .sort((a, b) => a - b);
  if (indices.length === 0) return [...items];

  const moving = indices.map((index) => items[index]);
  const remaining = items.filter((_, index) => !indices.includes(index));
  const shift = indices.filter((index) => index < to).length;
  const insertAt = Math.min(Math.max(to - shift, 0), remaining.length);
  remaining.splice(insertAt, 0, ...moving);
  return remaining;
}

type CardsListener = (cards: readonly WeatherCardEntry[]) => void;

export class CardManager {
  private cards: WeatherCardEntry[] = [];
  private readonly listeners = new Set<CardsListener>();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly storage: KeyValueStorage,
    private readonly key: string = SAVED_CARDS_KEY,
  ) {}

  getCards(): readonly WeatherCardEntry[] {
    return this.cards;
  }

  subscribe(listener: CardsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async load(): Promise<Result<readonly WeatherCardEntry[], StorageError>> {
    return this.serialize(async (): Promise<
      Result<readonly WeatherCardEntry[], StorageError>
    > => {
      const raw = await safeStorage(() => this.storage.getItem(this.key));
      if (!raw.ok) return raw;
      if (raw.value === null) {
        this.replace([]);
        return ok(this.cards);
      }

      let json: unknown;
      try {
        json = JSON.parse(raw.value);
      } catch {
        return err({ type: "Corrupt", message: "Saved cards are not valid JSON." });
      }
      const parsed = cardListSchema.safeParse(json);
      if (!parsed.success) {
        return err({ type: "Corrupt", message: "Saved cards have an unexpected shape." });
      }
      this.replace(parsed.data);
      return ok(this.cards);
    });
  }

  /** Newest first. A card for an adcode already on the list is not added twice. */
  addCard(entry: WeatherCardEntry): Promise<Result<boolean, StorageError>> {
    return this.serialize(async (): Promise<Result<boolean, StorageError>> => {
      if (this.cards.some((card) => card.adcode === entry.adcode)) {
        return ok(false);
      }
      const saved = await this.commit([entry, ...this.cards]);
      return saved.ok ? ok(true) : saved;
    });
  }

  removeCard(id: string): Promise<Result<boolean, StorageError>> {
    return this.serialize(async (): Promise<Result<boolean, StorageError>> => {
      const next = this.cards.filter((card) => card.id !== id);
      if (next.length === this.cards.length) return ok(false);
      const saved = await this.commit(next);
      return saved.ok ? ok(true) : saved;
    });
  }

  removeAt(indices: number[]): Promise<Result<number, StorageError>> {
    return this.serialize(async (): Promise<Result<number, StorageError>> => {
      const doomed = new Set(indices);
      const next = this.cards.filter((_, index) => !doomed.has(index));
      const removed = this.cards.length - next.length;
      if (removed === 0) return ok(0);
      const saved = await this.commit(next);
      return saved.ok ? ok(removed) : saved;
    });
  }

  moveCards(from: number[], to: number): Promise<Result<void, StorageError>> {
    return this.serialize(() => this.commit(moveItems(this.cards, from, to)));
  }

  private async commit(
    next: WeatherCardEntry[],
  ): Promise<Result<void, StorageError>> {
    const saved = await safeStorage(() =>
      this.storage.setItem(this.key, JSON.stringify(next)),
    );
    if (!saved.ok) {
      console.warn("Failed to save cards:", saved.error.message);
      return saved;
    }
    this.replace(next);
    return ok(undefined);
  }

  private replace(next: WeatherCardEntry[]): void {
    this.cards = next;
    this.listeners.forEach((listener) => listener(next));
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}
