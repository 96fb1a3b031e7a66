export interface CurrentConditions {
  readonly province: string;
  readonly city: string;
  readonly adcode: string;
  readonly weather: string;
  readonly temperature: string;
  readonly windDirection: string;
  readonly windPower: string;
  readonly humidity: string;
  /** Provider report time, `yyyy-MM-dd HH:mm:ss`. */
  readonly reportTime: string;
  readonly temperatureFloat: string;
  readonly humidityFloat: string;
}

export interface DailyForecast {
  /** `yyyy-MM-dd` */
  readonly date: string;
  /** "1" (Monday) through "7" (Sunday). */
  readonly week: string;
  readonly dayWeather: string;
  readonly nightWeather: string;
  readonly dayTemp: string;
  readonly nightTemp: string;
  readonly dayWind: string;
  readonly nightWind: string;
  readonly dayPower: string;
  readonly nightPower: string;
  readonly dayTempFloat: string;
  readonly nightTempFloat: string;
}

export interface CityWeatherBundle {
  cityNames: string[];
  current: CurrentConditions[];
  forecast: DailyForecast[];
}

export interface LocationFix {
  latitude: number;
  longitude: number;
  timestamp: number;
}

/** A bundle missing either half never reaches the cache or the caller. */
export function isValidBundle(bundle: CityWeatherBundle): boolean {
  return bundle.current.length > 0 && bundle.forecast.length > 0;
}
