/**
 * A single point-in-time reading from the weather provider.
 * Units are metric (°C, m/s, %).
 */
export interface WeatherSample {
  timestamp: string; // ISO 8601
  temperature: number;
  feelsLike: number | null;
  humidity: number | null;
  windSpeed: number | null;
  condition: string;
  icon: string | null;
}

/**
 * One 3-hour forecast step; `pop` is the precipitation probability (0..1).
 */
export interface ForecastSample extends WeatherSample {
  pop: number;
}

export interface ForecastSeries {
  cityName: string;
  samples: ForecastSample[];
}

/**
 * Current conditions for a resolved location.
 */
export interface CurrentWeather extends WeatherSample {
  locationName: string;
  latitude: number;
  longitude: number;
}

/**
 * Summary of all forecast samples sharing one calendar date.
 */
export interface DailyForecast {
  date: string; // YYYY-MM-DD
  tempMin: number;
  tempMax: number;
  tempAvg: number;
  /** Most frequent (condition, icon) pair of the day */
  condition: string;
  icon: string | null;
  /** Highest `pop` seen during the day, not an average */
  precipitationProb: number;
  sampleCount: number;
}
