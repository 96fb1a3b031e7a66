import { z } from "zod";
import type { WeatherError } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import type { CurrentConditions, DailyForecast } from "../domain/weather/types";
import { WEATHER_URL } from "../utils/constants";
import type { NetworkGateway } from "./networkGateway";
import {
  decodeProviderPayload,
  envelopeSchema,
  type ProviderEnvelope,
} from "./providerPayload";

const liveSchema = z.object({
  province: z.string(),
  city: z.string(),
  adcode: z.string(),
  weather: z.string(),
  temperature: z.string(),
  winddirection: z.string(),
  windpower: z.string(),
  humidity: z.string(),
  reporttime: z.string(),
  temperature_float: z.string().optional(),
  humidity_float: z.string().optional(),
});

const castSchema = z.object({
  date: z.string(),
  week: z.string(),
  dayweather: z.string(),
  nightweather: z.string(),
  daytemp: z.string(),
  nighttemp: z.string(),
  daywind: z.string(),
  nightwind: z.string(),
  daypower: z.string(),
  nightpower: z.string(),
  daytemp_float: z.string().optional(),
  nighttemp_float: z.string().optional(),
});

const currentResponseSchema = envelopeSchema.extend({
  lives: z.array(liveSchema).default([]),
});

const forecastResponseSchema = envelopeSchema.extend({
  forecasts: z
    .array(
      z.object({
        city: z.string(),
        adcode: z.string(),
        province: z.string(),
        reporttime: z.string(),
        casts: z.array(castSchema).default([]),
      }),
    )
    .default([]),
});

type Live = z.infer<typeof liveSchema>;
type Cast = z.infer<typeof castSchema>;

export interface ForecastReport {
  city: string;
  adcode: string;
  province: string;
  reportTime: string;
  casts: DailyForecast[];
}

export interface WeatherProviderOptions {
  gateway: NetworkGateway;
  apiKey: string | undefined;
  baseUrl?: string;
}

function toCurrentConditions(live: Live): CurrentConditions {
  return {
    province: live.province,
    city: live.city,
    adcode: live.adcode,
    weather: live.weather,
    temperature: live.temperature,
    windDirection: live.winddirection,
    windPower: live.windpower,
    humidity: live.humidity,
    reportTime: live.reporttime,
    temperatureFloat: live.temperature_float ?? live.temperature,
    humidityFloat: live.humidity_float ?? live.humidity,
  };
}

function toDailyForecast(cast: Cast): DailyForecast {
  return {
    date: cast.date,
    week: cast.week,
    dayWeather: cast.dayweather,
    nightWeather: cast.nightweather,
    dayTemp: cast.daytemp,
    nightTemp: cast.nighttemp,
    dayWind: cast.daywind,
    nightWind: cast.nightwind,
    dayPower: cast.daypower,
    nightPower: cast.nightpower,
    dayTempFloat: cast.daytemp_float ?? cast.daytemp,
    nightTempFloat: cast.nighttemp_float ?? cast.nighttemp,
  };
}

export class WeatherProvider {
  private readonly gateway: NetworkGateway;
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;

  constructor(options: WeatherProviderOptions) {
    this.gateway = options.gateway;
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? WEATHER_URL;
  }

  buildUrl(adcode: string, extensions: "base" | "all"): string | null {
    if (!this.apiKey) return null;
    const params = new URLSearchParams({
      key: this.apiKey,
      city: adcode,
      extensions,
    });
    return `${this.baseUrl}?${params.toString()}`;
  }

  async fetchCurrent(
    adcode: string,
  ): Promise<Result<CurrentConditions[], WeatherError>> {
    const payload = await this.fetchPayload(adcode, "base", currentResponseSchema);
    if (!payload.ok) return payload;
    return ok(payload.value.lives.map(toCurrentConditions));
  }

  async fetchForecast(
    adcode: string,
  ): Promise<Result<ForecastReport[], WeatherError>> {
    const payload = await this.fetchPayload(adcode, "all", forecastResponseSchema);
    if (!payload.ok) return payload;
    return ok(
      payload.value.forecasts.map((forecast) => ({
        city: forecast.city,
        adcode: forecast.adcode,
        province: forecast.province,
        reportTime: forecast.reporttime,
        casts: forecast.casts.map(toDailyForecast),
      })),
    );
  }

  private async fetchPayload<T extends ProviderEnvelope>(
    adcode: string,
    extensions: "base" | "all",
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<Result<T, WeatherError>> {
    const url = this.buildUrl(adcode, extensions);
    if (!url) {
      return err({
        type: "MissingCredentials",
        message: "Weather API key is not configured.",
      });
    }

    const response = await this.gateway.request(url);
    if (!response.ok) return response;

    const { status, body } = response.value;
    if (status < 200 || status >= 300) {
      console.warn("Weather API returned error:", status);
      return err({
        type: "NetworkError",
        message: `Weather API responded with HTTP ${status}.`,
      });
    }
    return decodeProviderPayload(body, schema, "Weather API");
  }
}
