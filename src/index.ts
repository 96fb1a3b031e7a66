import path from "node:path";
import { loadConfig, type WeatherClientConfig } from "./config";
import { CardManager } from "./features/weather/CardManager";
import { RegionLookupService } from "./features/weather/RegionLookupService";
import { WeatherCoordinator } from "./features/weather/WeatherCoordinator";
import { GeocodingService } from "./services/geocodingService";
import { FetchTransport, type HttpTransport } from "./services/httpTransport";
import {
  type GeolocationSource,
  LocationService,
  unavailableGeolocationSource,
} from "./services/locationService";
import { NetworkGateway } from "./services/networkGateway";
import {
  type ConnectivityProbe,
  createFetchProbe,
  NetworkMonitor,
} from "./services/networkMonitor";
import { WeatherProvider } from "./services/weatherProvider";
import { PersistentGeocodeCache } from "./storage/geocodeCache";
import {
  FileKeyValueStorage,
  type KeyValueStorage,
} from "./storage/keyValueStorage";
import { fileRegionDataset } from "./storage/regionDataset";
import { MemoryRegionStore, type RegionStore } from "./storage/regionStore";
import { WeatherCache } from "./storage/weatherCache";

export interface WeatherClientOptions {
  config?: WeatherClientConfig;
  geolocation?: GeolocationSource;
  storage?: KeyValueStorage;
  regionStore?: RegionStore;
  transport?: HttpTransport;
  probe?: ConnectivityProbe;
}

export interface WeatherClient {
  coordinator: WeatherCoordinator;
  cards: CardManager;
  regions: RegionLookupService;
  gateway: NetworkGateway;
  monitor: NetworkMonitor;
  location: LocationService;
  /** Starts background timers and warms state from disk. */
  start(): Promise<void>;
  dispose(): void;
}

export function createWeatherClient(options: WeatherClientOptions = {}): WeatherClient {
  const config = options.config ?? loadConfig();
  const storage =
    options.storage ??
    new FileKeyValueStorage(path.join(config.dataDir, "store.json"));

  const gateway = new NetworkGateway({
    transport: options.transport ?? new FetchTransport(),
  });
  const monitor = new NetworkMonitor({
    probe: options.probe ?? createFetchProbe(config.probeUrl),
  });
  const location = new LocationService({
    source: options.geolocation ?? unavailableGeolocationSource,
  });
  const regions = new RegionLookupService(
    options.regionStore ?? new MemoryRegionStore(),
    fileRegionDataset(config.regionDatasetPath),
  );
  const cards = new CardManager(storage);

  const coordinator = new WeatherCoordinator({
    cache: new WeatherCache(storage),
    regions,
    provider: new WeatherProvider({
      gateway,
      apiKey: config.apiKey,
      baseUrl: config.weatherUrl,
    }),
    geocoder: new GeocodingService({
      gateway,
      cache: new PersistentGeocodeCache(storage),
      apiKey: config.apiKey,
      baseUrl: config.geocodeUrl,
    }),
    location,
    network: monitor,
    defaultCity: config.defaultCity,
  });

  return {
    coordinator,
    cards,
    regions,
    gateway,
    monitor,
    location,
    async start() {
      gateway.start();
      monitor.start();
      await monitor.checkNow();
      const [seeded, cached, loadedCards] = await Promise.all([
        regions.ensureSeeded(),
        coordinator.loadCachedCities(),
        cards.load(),
      ]);
      if (!seeded.ok) console.error("Region table unavailable:", seeded.error.message);
      if (!cached.ok) console.warn("Could not read cached weather:", cached.error.message);
      if (!loadedCards.ok) console.warn("Could not read saved cards:", loadedCards.error.message);
    },
    dispose() {
      coordinator.dispose();
      location.dispose();
      monitor.stop();
      gateway.dispose();
    },
  };
}

export { loadConfig, ConfigError } from "./config";
export type { WeatherClientConfig } from "./config";
export type { WeatherError, StorageError } from "./domain/errors";
export type { Result } from "./domain/result";
export type {
  CityWeatherBundle,
  CurrentConditions,
  DailyForecast,
  LocationFix,
} from "./domain/weather/types";
export {
  CardManager,
  createCardEntry,
  type WeatherCardEntry,
} from "./features/weather/CardManager";
export { RegionLookupService, type SeedReport } from "./features/weather/RegionLookupService";
export {
  WeatherCoordinator,
  type WeatherSnapshot,
} from "./features/weather/WeatherCoordinator";
export {
  calculateDewPoint,
  formatTemperature,
  formatWeatherLabel,
  weatherIcon,
  weekdayLabel,
} from "./features/weather/weatherLabel";
export { useWeatherCoordinator } from "./hooks/useWeatherCoordinator";
export type {
  AuthorizationStatus,
  GeolocationDelegate,
  GeolocationSource,
} from "./services/locationService";
export { MemoryKeyValueStorage, FileKeyValueStorage } from "./storage/keyValueStorage";
export type { KeyValueStorage } from "./storage/keyValueStorage";
export { formatWeatherError } from "./utils/weatherError";
