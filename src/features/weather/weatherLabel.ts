import type { CurrentConditions } from "../../domain/weather/types";
import weatherIcons from "./weatherIcons.json";

const WEATHER_ICONS: Record<string, string> = weatherIcons;
const FALLBACK_ICON = "🌡️";

const WEEKDAYS: Record<string, string> = {
  "1": "星期一",
  "2": "星期二",
  "3": "星期三",
  "4": "星期四",
  "5": "星期五",
  "6": "星期六",
  "7": "星期日",
};

export function weatherIcon(phrase: string): string {
  return WEATHER_ICONS[phrase.trim()] ?? FALLBACK_ICON;
}

/** Provider weekday ("1" = Monday) to its Chinese label; unknown values pass through. */
export function weekdayLabel(week: string): string {
  return WEEKDAYS[week] ?? week;
}

export function formatTemperature(value: string | number): string {
  return `${value}°`;
}

/**
 * Approximate dew point in °C. Null when either reading is missing or the
 * humidity is too low for the approximation.
 */
export function calculateDewPoint(
  conditions: Pick<CurrentConditions, "temperatureFloat" | "humidityFloat">,
): number | null {
  const temperature = Number.parseFloat(conditions.temperatureFloat);
  const humidity = Number.parseFloat(conditions.humidityFloat);
  if (!Number.isFinite(temperature) || !Number.isFinite(humidity) || humidity <= 1) {
    return null;
  }
  const dewPoint = temperature - (1 - humidity / 100) / 0.05;
  return Math.round(dewPoint * 10) / 10;
}

/** e.g. "番禺区, 23° ⛅" */
export function formatWeatherLabel(city: string, conditions: CurrentConditions): string {
  const label = `${formatTemperature(conditions.temperature)} ${weatherIcon(conditions.weather)}`;
  return city ? `${city}, ${label}` : label;
}
