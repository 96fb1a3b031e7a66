import type { LocationFix } from "../../domain/weather/types";
import type {
  AuthorizationStatus,
  GeolocationDelegate,
  GeolocationSource,
} from "../../services/locationService";

export class FakeGeolocationSource implements GeolocationSource {
  status: AuthorizationStatus;
  delegate: GeolocationDelegate | null = null;
  locationRequests = 0;
  authorizationRequests = 0;

  constructor(status: AuthorizationStatus = "authorized") {
    this.status = status;
  }

  authorizationStatus(): AuthorizationStatus {
    return this.status;
  }

  requestAuthorization(): void {
    this.authorizationRequests += 1;
  }

  requestLocation(): void {
    this.locationRequests += 1;
  }

  setDelegate(delegate: GeolocationDelegate | null): void {
    this.delegate = delegate;
  }

  emitFix(fix: LocationFix): void {
    this.delegate?.onLocation(fix);
  }

  changeAuthorization(status: AuthorizationStatus): void {
    this.status = status;
    this.delegate?.onAuthorizationChange(status);
  }
}

export const PANYU_FIX: LocationFix = {
  latitude: 22.937976,
  longitude: 113.384129,
  timestamp: 1_714_528_800_000,
};
