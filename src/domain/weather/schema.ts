import { z } from "zod";
import type { CityWeatherBundle } from "./types";

export const currentConditionsSchema = z.object({
  province: z.string(),
  city: z.string(),
  adcode: z.string(),
  weather: z.string(),
  temperature: z.string(),
  windDirection: z.string(),
  windPower: z.string(),
  humidity: z.string(),
  reportTime: z.string(),
  temperatureFloat: z.string(),
  humidityFloat: z.string(),
});

export const dailyForecastSchema = z.object({
  date: z.string(),
  week: z.string(),
  dayWeather: z.string(),
  nightWeather: z.string(),
  dayTemp: z.string(),
  nightTemp: z.string(),
  dayWind: z.string(),
  nightWind: z.string(),
  dayPower: z.string(),
  nightPower: z.string(),
  dayTempFloat: z.string(),
  nightTempFloat: z.string(),
});

export const cityWeatherBundleSchema = z.object({
  cityNames: z.array(z.string()),
  current: z.array(currentConditionsSchema),
  forecast: z.array(dailyForecastSchema),
}) satisfies z.ZodType<CityWeatherBundle>;
