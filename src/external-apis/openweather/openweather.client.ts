import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import axios, { AxiosInstance } from "axios";
import { ExternalApiError } from "../../common/errors/api-errors";
import { delay, RateLimiter } from "../../common/utils/rate-limiter";
import { unixToIso } from "../../common/utils/date.util";
import { getProvidersConfig } from "../../config/providers.config";
import {
  CurrentWeather,
  ForecastSample,
  ForecastSeries,
} from "../../weather/weather.types";
import {
  OpenWeatherCondition,
  OpenWeatherCurrentResponse,
  OpenWeatherForecastResponse,
  OpenWeatherGeocodingResponse,
} from "./openweather.types";

const SERVICE_NAME = "OpenWeather";

type QueryParams = Record<string, string | number>;

/**
 * OpenWeather API Client
 *
 * Documentation: https://openweathermap.org/api
 *
 * Endpoints used:
 * - /data/2.5/weather   current conditions
 * - /data/2.5/forecast  5-day forecast in 3-hour steps
 * - /geo/1.0/direct     free-text geocoding (cities, landmarks)
 * - /geo/1.0/zip        ZIP code geocoding
 *
 * All calls use metric units. HTTP 429 is retried with exponential
 * backoff (OPENWEATHER_MAX_RETRIES); every other failure surfaces as an
 * ExternalApiError (502) straight away.
 */
@Injectable()
export class OpenWeatherClient {
  private readonly logger = new Logger(OpenWeatherClient.name);
  private readonly client: AxiosInstance;
  private readonly baseUrl = "https://api.openweathermap.org";
  private readonly apiKey: string;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;

  // Free tier allows 60 calls/minute
  private readonly geocodingLimiter = new RateLimiter(60);

  constructor(private readonly configService: ConfigService) {
    const config = getProvidersConfig(this.configService);
    this.apiKey = config.openWeatherApiKey;
    this.maxRetries = config.openWeatherMaxRetries;
    this.retryBaseMs = config.openWeatherRetryBaseMs;

    if (!this.apiKey) {
      this.logger.warn(
        "OPENWEATHER_API_KEY not found in environment variables. Weather lookups will fail.",
      );
    }

    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: config.httpTimeoutMs,
    });
  }

  /**
   * Fetch current conditions for a coordinate pair
   */
  async getCurrentWeather(
    latitude: number,
    longitude: number,
  ): Promise<CurrentWeather> {
    const data = await this.request<OpenWeatherCurrentResponse>(
      "/data/2.5/weather",
      { lat: latitude, lon: longitude, units: "metric" },
    );

    const condition = this.primaryCondition(data.weather);

    return {
      timestamp: unixToIso(data.dt),
      temperature: data.main.temp,
      feelsLike: data.main.feels_like,
      humidity: data.main.humidity,
      windSpeed: data.wind.speed,
      condition: condition.description,
      icon: condition.icon,
      locationName: data.name,
      latitude,
      longitude,
    };
  }

  /**
   * Fetch forecast samples (3-hour steps, ordered by time)
   *
   * @param count - Number of samples (`cnt`); 8 per day
   */
  async getForecastSamples(
    latitude: number,
    longitude: number,
    count: number,
  ): Promise<ForecastSeries> {
    const data = await this.request<OpenWeatherForecastResponse>(
      "/data/2.5/forecast",
      { lat: latitude, lon: longitude, units: "metric", cnt: count },
    );

    const samples: ForecastSample[] = (data.list ?? []).map((item) => {
      const condition = this.primaryCondition(item.weather);
      return {
        timestamp: unixToIso(item.dt),
        temperature: item.main.temp,
        feelsLike: item.main.feels_like ?? null,
        humidity: item.main.humidity ?? null,
        windSpeed: item.wind?.speed ?? null,
        condition: condition.description,
        icon: condition.icon,
        pop: item.pop ?? 0,
      };
    });

    return { cityName: data.city?.name ?? "", samples };
  }

  /**
   * Free-text geocoding (city names, landmarks)
   */
  async geocodeDirect(
    query: string,
    limit: number = 1,
  ): Promise<OpenWeatherGeocodingResponse> {
    await this.geocodingLimiter.waitIfNeeded();
    return this.request<OpenWeatherGeocodingResponse>("/geo/1.0/direct", {
      q: query,
      limit,
    });
  }

  /**
   * ZIP code geocoding
   */
  async geocodeZip(zip: string): Promise<OpenWeatherGeocodingResponse> {
    await this.geocodingLimiter.waitIfNeeded();
    return this.request<OpenWeatherGeocodingResponse>("/geo/1.0/zip", {
      zip,
    });
  }

  private primaryCondition(weather: OpenWeatherCondition[] | undefined): {
    description: string;
    icon: string | null;
  } {
    const first = weather?.[0];
    return {
      description: first?.description ?? "unknown",
      icon: first?.icon ?? null,
    };
  }

  private async request<T>(
    path: string,
    params: QueryParams,
    attempt = 0,
  ): Promise<T> {
    try {
      const response = await this.client.get<T>(path, {
        params: { ...params, appid: this.apiKey },
      });
      return response.data;
    } catch (error: unknown) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;

        if (status === 429 && attempt < this.maxRetries) {
          const wait = this.retryBaseMs * Math.pow(2, attempt);
          this.logger.warn(
            `⏸️  OpenWeather rate limited (HTTP 429) on ${path}. Retrying in ${wait}ms (Attempt ${
              attempt + 1
            }/${this.maxRetries})`,
          );
          await delay(wait);
          return this.request<T>(path, params, attempt + 1);
        }

        const details = {
          path,
          ...(status !== undefined && { status }),
          ...(error.code && { code: error.code }),
        };

        this.logger.error(
          `OpenWeather request failed: ${JSON.stringify(details)}`,
        );

        if (error.code === "ENOTFOUND" || error.code === "EAI_AGAIN") {
          throw new ExternalApiError(
            "OpenWeather API: DNS resolution failed",
            SERVICE_NAME,
            details,
          );
        }
        if (error.code === "ETIMEDOUT" || error.code === "ECONNABORTED") {
          throw new ExternalApiError(
            "OpenWeather API: Request timeout",
            SERVICE_NAME,
            details,
          );
        }
        if (status !== undefined) {
          throw new ExternalApiError(
            `OpenWeather API: HTTP ${status} ${error.response?.statusText ?? ""}`.trim(),
            SERVICE_NAME,
            details,
          );
        }
        throw new ExternalApiError(
          `OpenWeather API: ${error.message}`,
          SERVICE_NAME,
          details,
        );
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Unexpected OpenWeather failure on ${path}: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new ExternalApiError(`OpenWeather API: ${message}`, SERVICE_NAME, {
        path,
      });
    }
  }
}
