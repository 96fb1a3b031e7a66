import { useCallback, useSyncExternalStore } from "react";
import type {
  WeatherCoordinator,
  WeatherSnapshot,
} from "../features/weather/WeatherCoordinator";

export interface WeatherCoordinatorBinding extends WeatherSnapshot {
  fetchWeather: (city?: string) => void;
  refreshCities: (cities: string[]) => void;
  dismissError: () => void;
}

/**
 * Live coordinator snapshot plus fire-and-forget actions. Outcomes surface
 * through the snapshot, so the actions do not return the results.
 */
export function useWeatherCoordinator(
  coordinator: WeatherCoordinator,
): WeatherCoordinatorBinding {
  const snapshot = useSyncExternalStore(
    coordinator.subscribe,
    coordinator.getSnapshot,
  );

  const fetchWeather = useCallback(
    (city?: string) => {
      coordinator.fetchWeather(city).catch((error: unknown) => {
        console.error("Weather fetch threw:", error);
      });
    },
    [coordinator],
  );

  const refreshCities = useCallback(
    (cities: string[]) => {
      coordinator.fetchWeatherBatch(cities).catch((error: unknown) => {
        console.error("Weather refresh threw:", error);
      });
    },
    [coordinator],
  );

  const dismissError = useCallback(() => coordinator.dismissError(), [coordinator]);

  return { ...snapshot, fetchWeather, refreshCities, dismissError };
}
