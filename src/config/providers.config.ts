import { ConfigService } from "@nestjs/config";

/**
 * Settings shared by the outbound provider clients.
 */
export interface ProvidersConfig {
  openWeatherApiKey: string;
  youtubeApiKey: string;
  googleMapsApiKey: string;
  /** Per-request timeout for every outbound HTTP call */
  httpTimeoutMs: number;
  /** Retries on HTTP 429 from OpenWeather (0 disables) */
  openWeatherMaxRetries: number;
  openWeatherRetryBaseMs: number;
}

function readInt(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const parsed = parseInt(configService.get<string>(key) ?? "", 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export const getProvidersConfig = (
  configService: ConfigService,
): ProvidersConfig => ({
  openWeatherApiKey: configService.get<string>("OPENWEATHER_API_KEY") || "",
  youtubeApiKey: configService.get<string>("YOUTUBE_API_KEY") || "",
  googleMapsApiKey: configService.get<string>("GOOGLE_MAPS_API_KEY") || "",
  httpTimeoutMs: readInt(configService, "HTTP_TIMEOUT_MS", 10000),
  openWeatherMaxRetries: readInt(configService, "OPENWEATHER_MAX_RETRIES", 2),
  openWeatherRetryBaseMs: readInt(
    configService,
    "OPENWEATHER_RETRY_BASE_MS",
    500,
  ),
});
