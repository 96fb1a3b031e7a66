import type {
  CityWeatherBundle,
  CurrentConditions,
  DailyForecast,
} from "../../domain/weather/types";
import type { HttpResponse, HttpTransport } from "../../services/httpTransport";

export const TEST_API_KEY = "test-secret";

export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 50; i++) {
    await Promise.resolve();
  }
}

export function makeCurrent(
  overrides: Partial<CurrentConditions> = {},
): CurrentConditions {
  return {
    province: "广东",
    city: "番禺区",
    adcode: "440113",
    weather: "多云",
    temperature: "23",
    windDirection: "东南",
    windPower: "≤3",
    humidity: "80",
    reportTime: "2024-05-01 10:00:00",
    temperatureFloat: "23.0",
    humidityFloat: "80.0",
    ...overrides,
  };
}

export function makeForecast(
  overrides: Partial<DailyForecast> = {},
): DailyForecast {
  return {
    date: "2024-05-01",
    week: "3",
    dayWeather: "多云",
    nightWeather: "小雨",
    dayTemp: "28",
    nightTemp: "21",
    dayWind: "东南",
    nightWind: "东南",
    dayPower: "1-3",
    nightPower: "1-3",
    dayTempFloat: "28.0",
    nightTempFloat: "21.0",
    ...overrides,
  };
}

export function makeBundle(
  city = "番禺区",
  overrides: Partial<CityWeatherBundle> = {},
): CityWeatherBundle {
  return {
    cityNames: [city],
    current: [makeCurrent({ city })],
    forecast: [makeForecast()],
    ...overrides,
  };
}

/** Provider-shaped live entry, snake_case keys as on the wire. */
export function liveJson(city = "番禺区", adcode = "440113") {
  return {
    province: "广东",
    city,
    adcode,
    weather: "多云",
    temperature: "23",
    winddirection: "东南",
    windpower: "≤3",
    humidity: "80",
    reporttime: "2024-05-01 10:00:00",
    temperature_float: "23.0",
    humidity_float: "80.0",
  };
}

export function castJson(date = "2024-05-01", week = "3") {
  return {
    date,
    week,
    dayweather: "多云",
    nightweather: "小雨",
    daytemp: "28",
    nighttemp: "21",
    daywind: "东南",
    nightwind: "东南",
    daypower: "1-3",
    nightpower: "1-3",
    daytemp_float: "28.0",
    nighttemp_float: "21.0",
  };
}

export function currentBody(lives: unknown[] = [liveJson()]): string {
  return JSON.stringify({
    status: "1",
    count: String(lives.length),
    info: "OK",
    infocode: "10000",
    lives,
  });
}

export function forecastBody(casts: unknown[] = [castJson()]): string {
  return JSON.stringify({
    status: "1",
    count: "1",
    info: "OK",
    infocode: "10000",
    forecasts: [
      {
        city: "番禺区",
        adcode: "440113",
        province: "广东",
        reporttime: "2024-05-01 10:00:00",
        casts,
      },
    ],
  });
}

type Handler = (url: string) => Promise<HttpResponse>;

/** Transport double that records URLs and answers through `handler`. */
export class StubTransport implements HttpTransport {
  readonly urls: string[] = [];
  resets = 0;
  closes = 0;

  constructor(private handler: Handler) {}

  respondWith(handler: Handler): void {
    this.handler = handler;
  }

  get(url: string): Promise<HttpResponse> {
    this.urls.push(url);
    return this.handler(url);
  }

  reset(): void {
    this.resets += 1;
  }

  close(): void {
    this.closes += 1;
  }
}

export function respond(status: number, body: string): Handler {
  return async (url) => ({ url, status, body });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/** Waits until every promise chain not blocked on a timer or I/O has run. */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
