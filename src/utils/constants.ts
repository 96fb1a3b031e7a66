export const STORAGE_PREFIX = "cityweather";
export const WEATHER_CACHE_PREFIX = `${STORAGE_PREFIX}_weather`;
export const SAVED_CARDS_KEY = `${STORAGE_PREFIX}_saved_cards_v1`;
export const GEOCODE_CACHE_PREFIX = `${STORAGE_PREFIX}_geocode`;

export const DEFAULT_CITY = "番禺区";
export const COUNTRY_SENTINEL = "中华人民共和国";

export const WEATHER_URL = "https://restapi.amap.com/v3/weather/weatherInfo";
export const GEOCODE_URL = "https://restapi.amap.com/v3/geocode/regeo";
export const PROBE_URL = "https://www.baidu.com";

export const FETCH_RETRY = {
  MAX_ATTEMPTS: 5,
  BACKOFF_MS: 1000,
} as const;

export const BATCH_CONCURRENCY = 3;

export const GATEWAY = {
  MIN_REQUEST_INTERVAL_MS: 2000,
  MAX_CONCURRENT_REQUESTS: 4,
  PURGE_INTERVAL_MS: 5 * 60 * 1000,
  SESSION_RECYCLE_INTERVAL_MS: 60 * 60 * 1000,
  REQUEST_TIMEOUT_MS: 15_000,
  RESOURCE_TIMEOUT_MS: 30_000,
} as const;

export const LOCATION = {
  TIMEOUT_MS: 30_000,
  DUPLICATE_FIX_WINDOW_MS: 1000,
  AUTHORIZATION_POLL_ATTEMPTS: 3,
  AUTHORIZATION_POLL_INTERVAL_MS: 1000,
} as const;

export const NETWORK_CHECK_INTERVAL_MS = 1000;
