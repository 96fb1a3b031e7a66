import { type Actor, createActor } from "xstate";
import {
  isNetworkClassError,
  type StorageError,
  type WeatherError,
  weatherError,
} from "../../domain/errors";
import { err, ok, type Result } from "../../domain/result";
import {
  isWeatherFetchPhase,
  type WeatherFetchEvent,
  type WeatherFetchPhase,
  weatherFetchMachine,
} from "../../domain/weather/fetchMachine";
import type {
  CityWeatherBundle,
  CurrentConditions,
  LocationFix,
} from "../../domain/weather/types";
import type { Coordinate } from "../../services/geocodingService";
import type { AuthorizationStatus } from "../../services/locationService";
import type { ForecastReport } from "../../services/weatherProvider";
import type { WeatherCache } from "../../storage/weatherCache";
import { sleep as defaultSleep, type Sleep } from "../../utils/asyncHelpers";
import {
  BATCH_CONCURRENCY,
  DEFAULT_CITY,
  FETCH_RETRY,
  GATEWAY,
  LOCATION,
} from "../../utils/constants";
import type { RegionLookupService } from "./RegionLookupService";

export interface WeatherSource {
  fetchCurrent(adcode: string): Promise<Result<CurrentConditions[], WeatherError>>;
  fetchForecast(adcode: string): Promise<Result<ForecastReport[], WeatherError>>;
}

export interface ReverseGeocoder {
  reverseGeocode(coordinate: Coordinate): Promise<Result<string, WeatherError>>;
}

export interface DeviceLocation {
  authorizationStatus(): AuthorizationStatus;
  requestAuthorization(): void;
  requestLocation(): Promise<Result<LocationFix, WeatherError>>;
}

export interface NetworkStability {
  isStable(): boolean;
  subscribe(listener: (stable: boolean) => void): () => void;
}

export interface WeatherSnapshot {
  activeBundle: CityWeatherBundle | null;
  currentCity: string | null;
  bundles: ReadonlyMap<string, CityWeatherBundle>;
  isLoading: boolean;
  lastError: WeatherError | null;
  phase: WeatherFetchPhase;
}

export interface WeatherCoordinatorOptions {
  cache: WeatherCache;
  regions: RegionLookupService;
  provider: WeatherSource;
  geocoder: ReverseGeocoder;
  location: DeviceLocation;
  network: NetworkStability;
  defaultCity?: string;
  sleep?: Sleep;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Wait before re-sending a throttled provider request. */
  throttleRetryDelayMs?: number;
  batchConcurrency?: number;
  authorizationPollAttempts?: number;
  authorizationPollIntervalMs?: number;
}

type Listener = () => void;

interface FetchTask {
  controller: AbortController;
  city: string | null;
}

type Track = (event: WeatherFetchEvent) => void;

type ProviderResults = [
  Result<CurrentConditions[], WeatherError>,
  Result<ForecastReport[], WeatherError>,
];

function isThrottled(result: Result<unknown, WeatherError>): boolean {
  return !result.ok && result.error.type === "Throttled";
}

const CANCELLED = weatherError("Cancelled", "Superseded by a newer request.");

const untracked: Track = () => {};

/** Keeps decode and credential failures; anything else is a network failure. */
function toFetchError(error: WeatherError): WeatherError {
  switch (error.type) {
    case "DataParsingError":
    case "MissingCredentials":
    case "ApiError":
      return error;
    default:
      return { type: "NetworkError", message: error.message };
  }
}

function lookupFailure(city: string, error: StorageError): WeatherError {
  return {
    type: "CityNotFound",
    message: `Region table unavailable while resolving ${city}: ${error.message}`,
  };
}

/**
 * Orchestrates location, region lookup, provider requests and the cache, and
 * publishes the outcome as a snapshot. Single-city fetches are single-flight:
 * starting one cancels the previous one.
 */
export class WeatherCoordinator {
  private snapshot: WeatherSnapshot = {
    activeBundle: null,
    currentCity: null,
    bundles: new Map(),
    isLoading: false,
    lastError: null,
    phase: "idle",
  };
  private readonly listeners = new Set<Listener>();
  private readonly actor: Actor<typeof weatherFetchMachine>;
  private readonly lifetime = new AbortController();
  private activeTask: FetchTask | null = null;
  private failedRequest: { city: string | null } | null = null;
  private readonly unsubscribeNetwork: () => void;

  private readonly cache: WeatherCache;
  private readonly regions: RegionLookupService;
  private readonly provider: WeatherSource;
  private readonly geocoder: ReverseGeocoder;
  private readonly location: DeviceLocation;
  private readonly network: NetworkStability;
  private readonly defaultCity: string;
  private readonly sleep: Sleep;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly throttleRetryDelayMs: number;
  private readonly batchConcurrency: number;
  private readonly authorizationPollAttempts: number;
  private readonly authorizationPollIntervalMs: number;

  constructor(options: WeatherCoordinatorOptions) {
    this.cache = options.cache;
    this.regions = options.regions;
    this.provider = options.provider;
    this.geocoder = options.geocoder;
    this.location = options.location;
    this.network = options.network;
    this.defaultCity = options.defaultCity ?? DEFAULT_CITY;
    this.sleep = options.sleep ?? defaultSleep;
    this.maxRetries = options.maxRetries ?? FETCH_RETRY.MAX_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? FETCH_RETRY.BACKOFF_MS;
    this.throttleRetryDelayMs =
      options.throttleRetryDelayMs ?? GATEWAY.MIN_REQUEST_INTERVAL_MS;
    this.batchConcurrency = options.batchConcurrency ?? BATCH_CONCURRENCY;
    this.authorizationPollAttempts =
      options.authorizationPollAttempts ?? LOCATION.AUTHORIZATION_POLL_ATTEMPTS;
    this.authorizationPollIntervalMs =
      options.authorizationPollIntervalMs ??
      LOCATION.AUTHORIZATION_POLL_INTERVAL_MS;

    this.actor = createActor(weatherFetchMachine);
    this.actor.subscribe((state) => {
      if (isWeatherFetchPhase(state.value) && state.value !== this.snapshot.phase) {
        this.setSnapshot({ phase: state.value });
      }
    });
    this.actor.start();

    this.unsubscribeNetwork = this.network.subscribe((stable) => {
      if (!stable) return;
      this.retryLastRequest()
        .then((result) => {
          if (result && !result.ok && result.error.type !== "Cancelled") {
            console.warn("Retry after network recovery failed:", result.error.type);
          }
        })
        .catch((error: unknown) => {
          console.error("Retry after network recovery threw:", error);
        });
    });
  }

  getSnapshot = (): WeatherSnapshot => this.snapshot;

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Fetches weather for `city`, or for the device location when omitted.
   * Resolves `Cancelled` when a newer fetch supersedes this one.
   */
  async fetchWeather(city?: string): Promise<Result<CityWeatherBundle, WeatherError>> {
    const requested = city?.trim() || null;
    const task = this.claim(requested);
    const track: Track = (event) => {
      if (this.activeTask === task) this.actor.send(event);
    };

    if (requested) {
      const result = await this.runPipeline(requested, task.controller.signal, track);
      return this.settle(task, requested, result, null);
    }

    const resolved = await this.resolveCurrentCity(task.controller.signal);
    if (task.controller.signal.aborted) return err(CANCELLED);
    if (resolved.ok) {
      const result = await this.runPipeline(resolved.value, task.controller.signal, track);
      return this.settle(task, resolved.value, result, null);
    }

    console.warn(
      `Location lookup failed (${resolved.error.type}), showing ${this.defaultCity}`,
    );
    const fallback = await this.runPipeline(
      this.defaultCity,
      task.controller.signal,
      track,
    );
    return this.settle(task, this.defaultCity, fallback, resolved.error);
  }

  /**
   * Refreshes several cities, at most `batchConcurrency` at a time. Results
   * land in the per-city map only; the active bundle is left alone.
   */
  async fetchWeatherBatch(cities: string[]): Promise<Result<void, WeatherError>> {
    const queue = [...new Set(cities.map((city) => city.trim()).filter(Boolean))];
    const errors: Record<string, WeatherError> = {};
    let next = 0;

    const worker = async () => {
      while (next < queue.length) {
        const city = queue[next];
        next += 1;
        const result = await this.runPipeline(city, this.lifetime.signal, untracked);
        if (this.lifetime.signal.aborted) return;
        if (result.ok) {
          this.setSnapshot({ bundles: this.withBundle(city, result.value) });
        } else {
          errors[city] = result.error;
        }
      }
    };

    const workers = Math.min(this.batchConcurrency, queue.length);
    await Promise.all(Array.from({ length: workers }, worker));

    const failed = Object.keys(errors);
    if (failed.length === 0) return ok(undefined);

    const error: WeatherError = {
      type: "MultipleErrors",
      message: `Failed to refresh ${failed.join(", ")}.`,
      errors,
    };
    console.error("Batch weather refresh failed for", failed);
    this.setSnapshot({ lastError: error });
    return err(error);
  }

  /** Loads every persisted bundle into the per-city map. */
  async loadCachedCities(): Promise<Result<number, StorageError>> {
    const cached = await this.cache.getAll();
    if (!cached.ok) return cached;
    const bundles = new Map(this.snapshot.bundles);
    for (const [city, bundle] of cached.value) {
      if (!bundles.has(city)) bundles.set(city, bundle);
    }
    this.setSnapshot({ bundles });
    return ok(cached.value.size);
  }

  async searchCities(query: string, limit?: number): Promise<string[]> {
    const result = await this.regions.search(query, limit);
    if (!result.ok) {
      console.warn("City search failed:", result.error.message);
      return [];
    }
    return result.value;
  }

  /**
   * Re-runs the last fetch that failed for a network reason. Returns null when
   * there is nothing to retry or a fetch is already running.
   */
  async retryLastRequest(): Promise<Result<CityWeatherBundle, WeatherError> | null> {
    const failed = this.failedRequest;
    if (!failed || this.activeTask) return null;
    this.failedRequest = null;
    console.info("Network recovered, retrying", failed.city ?? "current location");
    return this.fetchWeather(failed.city ?? undefined);
  }

  dismissError(): void {
    this.setSnapshot({ lastError: null });
    if (!this.activeTask) this.actor.send({ type: "RESET" });
  }

  dispose(): void {
    this.unsubscribeNetwork();
    this.activeTask?.controller.abort();
    this.activeTask = null;
    this.lifetime.abort();
    this.actor.stop();
    this.listeners.clear();
  }

  private claim(city: string | null): FetchTask {
    this.activeTask?.controller.abort();
    const task: FetchTask = { controller: new AbortController(), city };
    this.activeTask = task;
    this.actor.send({ type: "FETCH", city });
    this.setSnapshot({ isLoading: true });
    return task;
  }

  private settle(
    task: FetchTask,
    city: string,
    result: Result<CityWeatherBundle, WeatherError>,
    locationError: WeatherError | null,
  ): Result<CityWeatherBundle, WeatherError> {
    if (this.activeTask !== task || task.controller.signal.aborted) {
      return err(CANCELLED);
    }
    this.activeTask = null;

    if (result.ok) {
      this.actor.send({ type: "PUBLISHED" });
      this.failedRequest = null;
      this.setSnapshot({
        activeBundle: result.value,
        currentCity: city,
        bundles: this.withBundle(city, result.value),
        isLoading: false,
        lastError: locationError,
      });
      return result;
    }

    console.error(`Weather fetch for ${city} failed:`, result.error.message);
    this.actor.send({ type: "FAILED", error: result.error });
    if (isNetworkClassError(result.error)) {
      this.failedRequest = { city: task.city };
    }
    this.setSnapshot({
      isLoading: false,
      lastError: locationError ?? result.error,
    });
    return result;
  }

  private async runPipeline(
    city: string,
    signal: AbortSignal,
    track: Track,
  ): Promise<Result<CityWeatherBundle, WeatherError>> {
    const cached = await this.readCache(city);
    if (signal.aborted) return err(CANCELLED);
    if (cached) {
      track({ type: "CACHE_HIT", city });
      return ok(cached);
    }

    let attempts = 0;
    while (!this.network.isStable()) {
      if (attempts >= this.maxRetries) {
        const fallback = await this.readCache(city);
        if (signal.aborted) return err(CANCELLED);
        if (fallback) {
          track({ type: "CACHE_HIT", city });
          return ok(fallback);
        }
        return err({
          type: "NetworkUnavailable",
          message: `Network still unstable after ${attempts} retries.`,
        });
      }
      attempts += 1;
      console.warn(`Network unstable, retry ${attempts}/${this.maxRetries} for ${city}`);
      await this.sleep(this.retryDelayMs, signal);
      if (signal.aborted) return err(CANCELLED);
    }

    const lookup = await this.regions.getAdcode(city);
    if (signal.aborted) return err(CANCELLED);
    if (!lookup.ok) return err(lookupFailure(city, lookup.error));
    const adcode = lookup.value;
    if (!adcode) {
      return err({ type: "CityNotFound", message: `Unknown region: ${city}` });
    }
    track({ type: "RESOLVED", city, adcode });

    const responses = await this.requestProvider(city, adcode, signal);
    if (signal.aborted || responses === null) return err(CANCELLED);
    const [current, forecast] = responses;
    if (isThrottled(current) || isThrottled(forecast)) {
      const fallback = await this.readCache(city);
      if (signal.aborted) return err(CANCELLED);
      if (fallback) {
        track({ type: "CACHE_HIT", city });
        return ok(fallback);
      }
    }
    if (!current.ok) return err(toFetchError(current.error));
    if (!forecast.ok) return err(toFetchError(forecast.error));
    track({ type: "RESPONSES_RECEIVED" });

    const casts = forecast.value[0]?.casts ?? [];
    if (current.value.length === 0 || casts.length === 0) {
      return err({
        type: "DataParsingError",
        message: `Incomplete weather data for ${city}.`,
      });
    }

    const bundle: CityWeatherBundle = {
      cityNames: [city],
      current: current.value,
      forecast: casts,
    };
    const saved = await this.cache.set(city, bundle);
    if (signal.aborted) return err(CANCELLED);
    if (!saved.ok) {
      console.warn(`Failed to cache weather for ${city}:`, saved.error.message);
    }
    return ok(bundle);
  }

  /**
   * Issues both provider requests, re-sending only the throttled ones after
   * the throttle window. Resolves null when cancelled while waiting.
   */
  private async requestProvider(
    city: string,
    adcode: string,
    signal: AbortSignal,
  ): Promise<ProviderResults | null> {
    let results: ProviderResults = await Promise.all([
      this.provider.fetchCurrent(adcode),
      this.provider.fetchForecast(adcode),
    ]);
    let attempts = 0;
    while (
      (isThrottled(results[0]) || isThrottled(results[1])) &&
      attempts < this.maxRetries
    ) {
      if (signal.aborted) return null;
      attempts += 1;
      console.warn(`Provider throttled, retry ${attempts}/${this.maxRetries} for ${city}`);
      await this.sleep(this.throttleRetryDelayMs, signal);
      if (signal.aborted) return null;
      const [current, forecast] = results;
      results = await Promise.all([
        isThrottled(current) ? this.provider.fetchCurrent(adcode) : current,
        isThrottled(forecast) ? this.provider.fetchForecast(adcode) : forecast,
      ]);
    }
    return results;
  }

  private async resolveCurrentCity(
    signal: AbortSignal,
  ): Promise<Result<string, WeatherError>> {
    const authorized = await this.ensureAuthorized(signal);
    if (!authorized.ok) return authorized;

    const fix = await this.location.requestLocation();
    if (signal.aborted) return err(CANCELLED);
    if (!fix.ok) return fix;

    return this.geocoder.reverseGeocode(fix.value);
  }

  private async ensureAuthorized(
    signal: AbortSignal,
  ): Promise<Result<void, WeatherError>> {
    let status = this.location.authorizationStatus();
    if (status === "notDetermined") {
      this.location.requestAuthorization();
      for (
        let attempt = 0;
        attempt < this.authorizationPollAttempts && status === "notDetermined";
        attempt += 1
      ) {
        await this.sleep(this.authorizationPollIntervalMs, signal);
        if (signal.aborted) return err(CANCELLED);
        status = this.location.authorizationStatus();
      }
    }

    switch (status) {
      case "authorized":
        return ok(undefined);
      case "notDetermined":
        return err({
          type: "LocationAuthorizationTimeout",
          message: "Location permission was not answered in time.",
        });
      case "denied":
      case "restricted":
        return err({
          type: "LocationAuthorizationDenied",
          message: "Location access is not permitted.",
        });
    }
  }

  private async readCache(city: string): Promise<CityWeatherBundle | null> {
    const cached = await this.cache.get(city);
    if (!cached.ok) {
      console.warn(`Cache read failed for ${city}:`, cached.error.message);
      return null;
    }
    return cached.value;
  }

  private withBundle(
    city: string,
    bundle: CityWeatherBundle,
  ): Map<string, CityWeatherBundle> {
    const bundles = new Map(this.snapshot.bundles);
    bundles.set(city, bundle);
    return bundles;
  }

  private setSnapshot(patch: Partial<WeatherSnapshot>): void {
    this.snapshot = { ...this.snapshot, ...patch };
    this.listeners.forEach((listener) => listener());
  }
}
