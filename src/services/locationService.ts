import type { WeatherError } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";
import type { Connectivity } from "../domain/runtime/connectivity";
import type { LocationFix } from "../domain/weather/types";
import { LOCATION } from "../utils/constants";

export type AuthorizationStatus =
  | "notDetermined"
  | "authorized"
  | "denied"
  | "restricted";

export interface GeolocationSourceError {
  code: "denied" | "unavailable";
  message: string;
}

export interface GeolocationDelegate {
  onLocation(fix: LocationFix): void;
  onError(error: GeolocationSourceError): void;
  onAuthorizationChange(status: AuthorizationStatus): void;
}

/**
 * Platform positioning adapter. Results arrive through the delegate, never
 * as return values.
 */
export interface GeolocationSource {
  authorizationStatus(): AuthorizationStatus;
  requestAuthorization(): void;
  requestLocation(): void;
  setDelegate(delegate: GeolocationDelegate | null): void;
}

export type LocationUpdateListener = (
  location: LocationFix | null,
  error: WeatherError | null,
) => void;

export interface LocationServiceOptions {
  source: GeolocationSource;
  connectivity?: Connectivity;
  timeoutMs?: number;
  duplicateFixWindowMs?: number;
}

interface PendingRequest {
  promise: Promise<Result<LocationFix, WeatherError>>;
  settle: (result: Result<LocationFix, WeatherError>) => void;
}

function isDenied(status: AuthorizationStatus): boolean {
  return status === "denied" || status === "restricted";
}

export class LocationService implements GeolocationDelegate {
  /** Single update slot; every fix and failure is reported here. */
  onLocationUpdate: LocationUpdateListener | null = null;

  private readonly source: GeolocationSource;
  private readonly connectivity: Connectivity | null;
  private readonly timeoutMs: number;
  private readonly duplicateFixWindowMs: number;
  private pending: PendingRequest | null = null;
  private lastFixTimestamp: number | null = null;

  constructor(options: LocationServiceOptions) {
    this.source = options.source;
    this.connectivity = options.connectivity ?? null;
    this.timeoutMs = options.timeoutMs ?? LOCATION.TIMEOUT_MS;
    this.duplicateFixWindowMs =
      options.duplicateFixWindowMs ?? LOCATION.DUPLICATE_FIX_WINDOW_MS;
    this.source.setDelegate(this);
  }

  authorizationStatus(): AuthorizationStatus {
    return this.source.authorizationStatus();
  }

  requestAuthorization(): void {
    this.source.requestAuthorization();
  }

  /**
   * One fix per call. Concurrent callers share the request already in
   * progress.
   */
  requestLocation(): Promise<Result<LocationFix, WeatherError>> {
    if (this.pending) return this.pending.promise;

    if (this.connectivity && !this.connectivity.isOnline()) {
      const offline: WeatherError = {
        type: "NetworkUnavailable",
        message: "Device is offline.",
      };
      return Promise.resolve(err(offline));
    }

    const status = this.source.authorizationStatus();
    if (isDenied(status)) {
      const denied: WeatherError = {
        type: "LocationAuthorizationDenied",
        message: "Location access is not permitted.",
      };
      return Promise.resolve(err(denied));
    }

    const pending = this.createPending();
    this.pending = pending;
    if (status === "authorized") {
      this.source.requestLocation();
    } else {
      this.source.requestAuthorization();
    }
    return pending.promise;
  }

  /** Fixes taken within the duplicate window of the last accepted one are dropped. */
  onLocation(fix: LocationFix): void {
    if (
      this.lastFixTimestamp !== null &&
      Math.abs(fix.timestamp - this.lastFixTimestamp) < this.duplicateFixWindowMs
    ) {
      return;
    }
    this.lastFixTimestamp = fix.timestamp;
    this.onLocationUpdate?.(fix, null);
    this.pending?.settle(ok(fix));
  }

  onError(error: GeolocationSourceError): void {
    const failure: WeatherError =
      error.code === "denied"
        ? { type: "LocationAuthorizationDenied", message: error.message }
        : { type: "LocationServiceFailed", message: error.message };
    this.fail(failure);
  }

  onAuthorizationChange(status: AuthorizationStatus): void {
    if (!this.pending) return;
    if (status === "authorized") {
      this.source.requestLocation();
    } else if (isDenied(status)) {
      this.fail({
        type: "LocationAuthorizationDenied",
        message: "Location access was denied.",
      });
    }
  }

  dispose(): void {
    this.source.setDelegate(null);
    this.pending?.settle(
      err({ type: "Cancelled", message: "Location service disposed." }),
    );
    this.onLocationUpdate = null;
  }

  private fail(error: WeatherError): void {
    this.onLocationUpdate?.(null, error);
    this.pending?.settle(err(error));
  }

  private createPending(): PendingRequest {
    let resolvePromise: (result: Result<LocationFix, WeatherError>) => void = () => {};
    const promise = new Promise<Result<LocationFix, WeatherError>>((resolve) => {
      resolvePromise = resolve;
    });
    const timer = setTimeout(() => {
      this.fail({
        type: "LocationServiceFailed",
        message: `No location fix within ${this.timeoutMs}ms.`,
      });
    }, this.timeoutMs);

    const request: PendingRequest = {
      promise,
      settle: (result) => {
        clearTimeout(timer);
        if (this.pending === request) this.pending = null;
        resolvePromise(result);
      },
    };
    return request;
  }
}

/** Source for hosts without positioning; every request falls back to the default city. */
export const unavailableGeolocationSource: GeolocationSource = {
  authorizationStatus: () => "restricted",
  requestAuthorization: () => {},
  requestLocation: () => {},
  setDelegate: () => {},
};
