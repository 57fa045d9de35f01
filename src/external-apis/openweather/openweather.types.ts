/**
 * OpenWeather API Types
 *
 * Documentation:
 * - https://openweathermap.org/current
 * - https://openweathermap.org/forecast5
 * - https://openweathermap.org/api/geocoding-api
 */

export interface OpenWeatherCondition {
  id?: number;
  main?: string;
  description: string;
  icon: string;
}

/**
 * GET /data/2.5/weather
 */
export interface OpenWeatherCurrentResponse {
  dt: number; // unix seconds
  name: string;
  main: {
    temp: number;
    feels_like: number;
    humidity: number;
  };
  wind: {
    speed: number;
  };
  weather: OpenWeatherCondition[];
}

/**
 * One 3-hour step of GET /data/2.5/forecast
 */
export interface OpenWeatherForecastItem {
  dt: number;
  main: {
    temp: number;
    feels_like?: number;
    humidity?: number;
  };
  wind?: {
    speed: number;
  };
  weather: OpenWeatherCondition[];
  pop?: number; // probability of precipitation, 0..1
}

/**
 * GET /data/2.5/forecast
 */
export interface OpenWeatherForecastResponse {
  city: {
    name: string;
  };
  list: OpenWeatherForecastItem[];
}

export interface OpenWeatherGeocodingResult {
  lat: number;
  lon: number;
  name?: string;
  country?: string;
  state?: string;
}

/**
 * `/geo/1.0/direct` answers with an ordered array of candidates,
 * `/geo/1.0/zip` with a single object.
 */
export type OpenWeatherGeocodingResponse =
  | OpenWeatherGeocodingResult[]
  | Partial<OpenWeatherGeocodingResult>;
