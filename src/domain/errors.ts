export type StorageError =
  | { type: "NotFound"; message: string }
  | { type: "Corrupt"; message: string }
  | { type: "IO"; message: string }
  | { type: "Unknown"; message: string };

export type WeatherError =
  | { type: "LocationNotFound"; message: string }
  | { type: "InvalidAdministrativeCode"; message: string }
  | { type: "NetworkError"; message: string }
  | { type: "DataParsingError"; message: string }
  | { type: "CityNotFound"; message: string }
  | { type: "LocationAuthorizationDenied"; message: string }
  | { type: "LocationAuthorizationTimeout"; message: string }
  | { type: "LocationServiceFailed"; message: string }
  | { type: "NetworkUnavailable"; message: string }
  | { type: "Throttled"; message: string }
  | { type: "ApiError"; message: string }
  | { type: "MissingCredentials"; message: string }
  | { type: "InvalidCredentials"; message: string }
  | { type: "RateLimited"; message: string }
  | { type: "ServerError"; message: string; status: number }
  | { type: "HttpError"; message: string; status: number }
  | { type: "Cancelled"; message: string }
  | {
      type: "MultipleErrors";
      message: string;
      errors: Record<string, WeatherError>;
    };

export type WeatherErrorType = WeatherError["type"];

type SimpleWeatherErrorType = Exclude<
  WeatherErrorType,
  "ServerError" | "HttpError" | "MultipleErrors"
>;

export function weatherError(
  type: SimpleWeatherErrorType,
  message: string,
): WeatherError {
  return { type, message };
}

/**
 * Errors that a stable network could make go away. The coordinator retries
 * the last request once connectivity recovers after one of these.
 */
export function isNetworkClassError(error: WeatherError): boolean {
  switch (error.type) {
    case "NetworkError":
    case "NetworkUnavailable":
    case "ServerError":
    case "Throttled":
      return true;
    default:
      return false;
  }
}
