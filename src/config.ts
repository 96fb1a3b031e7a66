import path from "node:path";
import { z } from "zod";
import { DEFAULT_REGION_DATASET_PATH } from "./storage/regionDataset";
import {
  DEFAULT_CITY,
  GEOCODE_URL,
  PROBE_URL,
  WEATHER_URL,
} from "./utils/constants";

export interface WeatherClientConfig {
  apiKey: string | undefined;
  weatherUrl: string;
  geocodeUrl: string;
  probeUrl: string;
  defaultCity: string;
  dataDir: string;
  regionDatasetPath: string;
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => value || undefined);

const envSchema = z.object({
  CITYWEATHER_API_KEY: optionalText,
  CITYWEATHER_WEATHER_URL: z.string().url().default(WEATHER_URL),
  CITYWEATHER_GEOCODE_URL: z.string().url().default(GEOCODE_URL),
  CITYWEATHER_PROBE_URL: z.string().url().default(PROBE_URL),
  CITYWEATHER_DEFAULT_CITY: optionalText,
  CITYWEATHER_DATA_DIR: optionalText,
  CITYWEATHER_REGION_DATASET: optionalText,
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): WeatherClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const values = parsed.data;
  if (!values.CITYWEATHER_API_KEY) {
    console.warn("CITYWEATHER_API_KEY is not set; weather requests will fail.");
  }
  return {
    apiKey: values.CITYWEATHER_API_KEY,
    weatherUrl: values.CITYWEATHER_WEATHER_URL,
    geocodeUrl: values.CITYWEATHER_GEOCODE_URL,
    probeUrl: values.CITYWEATHER_PROBE_URL,
    defaultCity: values.CITYWEATHER_DEFAULT_CITY ?? DEFAULT_CITY,
    dataDir: path.resolve(cwd, values.CITYWEATHER_DATA_DIR ?? ".cityweather"),
    regionDatasetPath: values.CITYWEATHER_REGION_DATASET
      ? path.resolve(cwd, values.CITYWEATHER_REGION_DATASET)
      : DEFAULT_REGION_DATASET_PATH,
  };
}
