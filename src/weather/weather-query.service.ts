import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import { errorMessage, ValidationError } from "../common/errors/api-errors";
import { CLOCK, Clock, systemClock } from "../common/utils/clock";
import { toIsoDate } from "../common/utils/date.util";
import { OpenWeatherClient } from "../external-apis/openweather/openweather.client";
import { GeoResolver } from "../location/geo-resolver.service";
import { LocationClassifier } from "../location/location-classifier";
import {
  LocationMedia,
  LocationMediaService,
} from "../location/location-media.service";
import { LocationDisplay, LocationQuery, LocationType } from "../location/location.types";
import { DateRangeValidator, DATE_FORMAT } from "./date-range.validator";
import { WeatherRecord } from "./entities/weather-record.entity";
import { WeatherReport } from "./export/weather-export.service";
import {
  DEFAULT_FORECAST_DAYS,
  ForecastAggregator,
  SAMPLES_PER_DAY,
} from "./forecast-aggregator";
import {
  WeatherRecordInput,
  WeatherRecordsService,
} from "./weather-records.service";
import { CurrentWeather, DailyForecast } from "./weather.types";

export const MAX_FORECAST_DAYS = DEFAULT_FORECAST_DAYS;

export interface ResolvedQuery {
  query: string;
  type: LocationType;
  normalized: string;
  latitude: number;
  longitude: number;
  resolvedName: string | null;
}

/**
 * Outcome of storing fetched data. A failed write never hides the data
 * that was fetched; it is reported here instead.
 */
export interface PersistenceOutcome {
  persisted: boolean;
  recordIds: number[];
  persistenceError?: string;
}

export interface CurrentWeatherResult extends PersistenceOutcome {
  location: ResolvedQuery;
  weather: CurrentWeather;
}

export interface ForecastResult extends PersistenceOutcome {
  location: ResolvedQuery;
  forecast: DailyForecast[];
}

export interface CreateWeatherQuery {
  location: string;
  dateRangeStart: string;
  dateRangeEnd: string;
}

export type OverviewPart = "current" | "forecast" | "media";

export interface WeatherOverview {
  location: LocationDisplay;
  current: CurrentWeatherResult | null;
  forecast: ForecastResult | null;
  media: LocationMedia | null;
  errors: Partial<Record<OverviewPart, string>>;
}

/**
 * Weather Query Service
 *
 * classify → resolve → fetch → aggregate → persist.
 *
 * Input problems (location format, date range, forecast days) are rejected
 * before any outbound call. Provider failures propagate and nothing is
 * stored. Storage runs after the fetch in its own transaction.
 */
@Injectable()
export class WeatherQueryService {
  private readonly logger = new Logger(WeatherQueryService.name);

  constructor(
    private readonly locationClassifier: LocationClassifier,
    private readonly geoResolver: GeoResolver,
    private readonly openWeatherClient: OpenWeatherClient,
    private readonly forecastAggregator: ForecastAggregator,
    private readonly dateRangeValidator: DateRangeValidator,
    private readonly weatherRecordsService: WeatherRecordsService,
    private readonly locationMediaService: LocationMediaService,
    @Optional() @Inject(CLOCK) private readonly clock: Clock = systemClock,
  ) {}

  async getCurrentWeather(location: string): Promise<CurrentWeatherResult> {
    const query = this.locationClassifier.toQuery(location);
    return this.fetchCurrent(await this.resolve(query));
  }

  async getForecast(
    location: string,
    days: number = DEFAULT_FORECAST_DAYS,
  ): Promise<ForecastResult> {
    this.assertForecastDays(days);
    const query = this.locationClassifier.toQuery(location);
    return this.fetchForecast(await this.resolve(query), days);
  }

  /**
   * Store a current-weather snapshot tagged with a date range
   *
   * Unlike the read operations, a storage failure here is the operation
   * failing and propagates.
   */
  async createQuery(input: CreateWeatherQuery): Promise<WeatherRecord> {
    const query = this.locationClassifier.toQuery(input.location);

    const validation = this.dateRangeValidator.validate(
      input.dateRangeStart,
      input.dateRangeEnd,
    );
    if (!validation.valid || !validation.range) {
      throw new ValidationError(validation.message, {
        dateRangeStart: input.dateRangeStart,
        dateRangeEnd: input.dateRangeEnd,
      });
    }

    const resolved = await this.resolve(query);
    const weather = await this.openWeatherClient.getCurrentWeather(
      resolved.latitude,
      resolved.longitude,
    );
    if (resolved.resolvedName === null && weather.locationName) {
      resolved.resolvedName = weather.locationName;
    }

    const [record] = await this.weatherRecordsService.saveRecords([
      {
        ...this.recordInput(resolved, weather),
        dateRangeStart: toIsoDate(validation.range.startDate),
        dateRangeEnd: toIsoDate(validation.range.endDate),
      },
    ]);

    this.logger.log(
      `Stored weather query #${record.id} for "${resolved.normalized}" (${input.dateRangeStart}..${input.dateRangeEnd})`,
    );
    return record;
  }

  /**
   * Current weather, forecast and media fetched concurrently. Resolves
   * once all three have settled; failed parts are null and listed under
   * `errors`.
   *
   * The location is geocoded once up front, so an invalid or unknown
   * location fails the whole call before any part starts.
   */
  async getOverview(location: string): Promise<WeatherOverview> {
    const query = this.locationClassifier.toQuery(location);
    const resolved = await this.resolve(query);

    const [current, forecast, media] = await Promise.allSettled([
      this.fetchCurrent({ ...resolved }),
      this.fetchForecast({ ...resolved }, DEFAULT_FORECAST_DAYS),
      this.locationMediaService.getLocationMedia(location),
    ]);

    const errors: Partial<Record<OverviewPart, string>> = {};
    if (current.status === "rejected") {
      errors.current = errorMessage(current.reason);
    }
    if (forecast.status === "rejected") {
      errors.forecast = errorMessage(forecast.reason);
    }
    if (media.status === "rejected") {
      errors.media = errorMessage(media.reason);
    }

    const failed = Object.keys(errors);
    if (failed.length > 0) {
      this.logger.warn(
        `Overview for "${query.normalized}" incomplete: ${failed.join(", ")} failed`,
      );
    }

    return {
      location: this.locationClassifier.formatForDisplay(query.raw, query.type),
      current: current.status === "fulfilled" ? current.value : null,
      forecast: forecast.status === "fulfilled" ? forecast.value : null,
      media: media.status === "fulfilled" ? media.value : null,
      errors,
    };
  }

  /**
   * Data for a report export: current conditions plus the daily forecast
   */
  async getReport(location: string): Promise<WeatherReport> {
    const query = this.locationClassifier.toQuery(location);
    const resolved = await this.resolve(query);

    const current = await this.fetchCurrent({ ...resolved });
    const forecast = await this.fetchForecast(
      { ...resolved },
      DEFAULT_FORECAST_DAYS,
    );

    return {
      location: current.location.normalized,
      current: current.weather,
      forecast: forecast.forecast,
    };
  }

  /**
   * Stored records for a location, optionally limited to a date range.
   * Unlike new queries, history isn't bound to the lookup window.
   */
  async getHistory(
    location: string,
    startDate?: string,
    endDate?: string,
  ): Promise<WeatherRecord[]> {
    const query = this.locationClassifier.toQuery(location);

    if (startDate === undefined && endDate === undefined) {
      return this.weatherRecordsService.getHistory(query.normalized);
    }
    if (startDate === undefined || endDate === undefined) {
      throw new ValidationError(
        "Both start and end dates are required to filter history",
        { startDate: startDate ?? null, endDate: endDate ?? null },
      );
    }

    const start = this.dateRangeValidator.parseDate(startDate);
    const end = this.dateRangeValidator.parseDate(endDate);
    if (!start || !end) {
      throw new ValidationError(
        `Invalid date format. Use ${DATE_FORMAT.toUpperCase()}`,
        { startDate, endDate },
      );
    }
    if (start > end) {
      throw new ValidationError(
        "Start date must be before or equal to end date",
        { startDate, endDate },
      );
    }

    return this.weatherRecordsService.getHistory(
      query.normalized,
      toIsoDate(start),
      toIsoDate(end),
    );
  }

  private assertForecastDays(days: number): void {
    if (!Number.isInteger(days) || days < 1 || days > MAX_FORECAST_DAYS) {
      throw new ValidationError(
        `Forecast days must be between 1 and ${MAX_FORECAST_DAYS}`,
        { days },
      );
    }
  }

  /**
   * Fetch and store current conditions for an already resolved location.
   * Fills `resolvedName` from the provider when geocoding had none.
   */
  private async fetchCurrent(
    resolved: ResolvedQuery,
  ): Promise<CurrentWeatherResult> {
    const weather = await this.openWeatherClient.getCurrentWeather(
      resolved.latitude,
      resolved.longitude,
    );
    if (resolved.resolvedName === null && weather.locationName) {
      resolved.resolvedName = weather.locationName;
    }

    const outcome = await this.persist([
      this.recordInput(resolved, weather),
    ]);

    return { location: resolved, weather, ...outcome };
  }

  private async fetchForecast(
    resolved: ResolvedQuery,
    days: number,
  ): Promise<ForecastResult> {
    const series = await this.openWeatherClient.getForecastSamples(
      resolved.latitude,
      resolved.longitude,
      days * SAMPLES_PER_DAY,
    );
    if (resolved.resolvedName === null && series.cityName) {
      resolved.resolvedName = series.cityName;
    }

    const forecast = this.forecastAggregator.aggregate(series.samples, days);
    const fetchedAt = this.clock();

    const outcome = await this.persist(
      forecast.map((day) => ({
        locationName: resolved.normalized,
        locationType: resolved.type,
        resolvedName: resolved.resolvedName,
        latitude: resolved.latitude,
        longitude: resolved.longitude,
        timestamp: fetchedAt,
        temperature: (day.tempMin + day.tempMax) / 2,
        condition: day.condition,
        dateRangeStart: day.date,
        dateRangeEnd: day.date,
      })),
    );

    return { location: resolved, forecast, ...outcome };
  }

  private async resolve(query: LocationQuery): Promise<ResolvedQuery> {
    const resolved = await this.geoResolver.resolve(
      query.normalized,
      query.type,
      query.raw,
    );
    return {
      query: query.raw,
      type: query.type,
      normalized: query.normalized,
      latitude: resolved.latitude,
      longitude: resolved.longitude,
      resolvedName: resolved.name,
    };
  }

  private recordInput(
    resolved: ResolvedQuery,
    weather: CurrentWeather,
  ): WeatherRecordInput {
    return {
      locationName: resolved.normalized,
      locationType: resolved.type,
      resolvedName: resolved.resolvedName,
      latitude: resolved.latitude,
      longitude: resolved.longitude,
      timestamp: new Date(weather.timestamp),
      temperature: weather.temperature,
      feelsLike: weather.feelsLike,
      humidity: weather.humidity,
      windSpeed: weather.windSpeed,
      condition: weather.condition,
    };
  }

  private async persist(
    inputs: WeatherRecordInput[],
  ): Promise<PersistenceOutcome> {
    try {
      const records = await this.weatherRecordsService.saveRecords(inputs);
      return {
        persisted: true,
        recordIds: records.map((record) => record.id),
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(
        `Failed to store weather records for "${inputs[0]?.locationName}": ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      return { persisted: false, recordIds: [], persistenceError: message };
    }
  }
}
