import { z } from "zod";
import type { WeatherError } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import type { GeocodeCache } from "../storage/geocodeCache";
import { GEOCODE_URL } from "../utils/constants";
import type { NetworkGateway } from "./networkGateway";
import { decodeProviderPayload, envelopeSchema } from "./providerPayload";

export interface Coordinate {
  latitude: number;
  longitude: number;
}

// Empty address components come back as [] rather than "".
const addressField = z
  .union([z.string(), z.array(z.unknown())])
  .optional()
  .transform((value) => (typeof value === "string" ? value : ""));

const regeoResponseSchema = envelopeSchema.extend({
  regeocode: z
    .object({
      formatted_address: addressField,
      addressComponent: z.object({
        province: addressField,
        city: addressField,
        district: addressField,
      }),
    })
    .optional(),
});

const SUCCESS_INFOCODE = "10000";

export function coordinateKey({ latitude, longitude }: Coordinate): string {
  return `${longitude.toFixed(6)},${latitude.toFixed(6)}`;
}

function statusError(status: number): WeatherError | null {
  if (status === 200) return null;
  if (status === 401) {
    return { type: "InvalidCredentials", message: "Geocoding key was rejected." };
  }
  if (status === 429) {
    return { type: "RateLimited", message: "Geocoding quota exceeded." };
  }
  if (status >= 500) {
    return {
      type: "ServerError",
      message: `Geocoding server error (HTTP ${status}).`,
      status,
    };
  }
  return {
    type: "HttpError",
    message: `Geocoding request failed (HTTP ${status}).`,
    status,
  };
}

export interface GeocodingServiceOptions {
  gateway: NetworkGateway;
  cache: GeocodeCache;
  apiKey: string | undefined;
  baseUrl?: string;
}

export class GeocodingService {
  private readonly gateway: NetworkGateway;
  private readonly cache: GeocodeCache;
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;

  constructor(options: GeocodingServiceOptions) {
    this.gateway = options.gateway;
    this.cache = options.cache;
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? GEOCODE_URL;
  }

  /** Resolves a coordinate to its district, or its province when no district. */
  async reverseGeocode(
    coordinate: Coordinate,
  ): Promise<Result<string, WeatherError>> {
    const key = coordinateKey(coordinate);
    const cached = await this.readCache(key);
    if (cached) return ok(cached);

    if (!this.apiKey) {
      return err({
        type: "MissingCredentials",
        message: "Geocoding API key is not configured.",
      });
    }

    const params = new URLSearchParams({
      key: this.apiKey,
      location: key,
      output: "JSON",
      extensions: "base",
    });
    const response = await this.gateway.request(`${this.baseUrl}?${params.toString()}`);
    if (!response.ok) return response;

    const httpError = statusError(response.value.status);
    if (httpError) {
      console.warn("Geocoding API returned error:", response.value.status);
      return err(httpError);
    }

    const payload = decodeProviderPayload(
      response.value.body,
      regeoResponseSchema,
      "Geocoding API",
    );
    if (!payload.ok) return payload;
    if (payload.value.infocode !== SUCCESS_INFOCODE) {
      return err({
        type: "ApiError",
        message: payload.value.info || "Geocoding API rejected the request.",
      });
    }

    const address = payload.value.regeocode?.addressComponent;
    const name = address?.district || address?.province || "";
    if (!name) {
      return err({
        type: "LocationNotFound",
        message: `No region found at ${key}.`,
      });
    }

    this.cache.set(key, name).catch((error: unknown) => {
      console.warn("Failed to cache geocoding result:", error);
    });
    return ok(name);
  }

  private async readCache(key: string): Promise<string | null> {
    try {
      return await this.cache.get(key);
    } catch (error) {
      console.warn("Geocoding cache read failed:", error);
      return null;
    }
  }
}
