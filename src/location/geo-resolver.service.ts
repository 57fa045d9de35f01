import { Inject, Injectable, Logger } from "@nestjs/common";
import { Redis } from "ioredis";
import {
  errorMessage,
  LocationNotFoundError,
  ValidationError,
} from "../common/errors/api-errors";
import { REDIS_CLIENT } from "../common/redis/redis.module";
import { OpenWeatherClient } from "../external-apis/openweather/openweather.client";
import { OpenWeatherGeocodingResponse } from "../external-apis/openweather/openweather.types";
import { LocationClassifier } from "./location-classifier";
import { LocationHistoryService } from "./location-history.service";
import { LocationType, ResolvedLocation } from "./location.types";

function isResolvedLocation(value: unknown): value is ResolvedLocation {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.latitude === "number" &&
    typeof candidate.longitude === "number" &&
    (candidate.name === null || typeof candidate.name === "string")
  );
}

/**
 * Geo Resolver
 *
 * Turns a classified location into coordinates. Raw coordinates are parsed
 * locally; everything else goes through OpenWeather geocoding.
 *
 * Coordinates of a place don't move, so network results are cached in
 * Redis for 30 days. Redis being down only costs an extra geocoding call.
 */
@Injectable()
export class GeoResolver {
  private readonly logger = new Logger(GeoResolver.name);
  private readonly TTL_GEOCODING = 30 * 24 * 60 * 60;

  constructor(
    private readonly openWeatherClient: OpenWeatherClient,
    private readonly locationClassifier: LocationClassifier,
    private readonly locationHistoryService: LocationHistoryService,
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
  ) {}

  /**
   * @param location - normalized location, used for geocoding and the cache key
   * @param typedQuery - the input as the user typed it, kept in the lookup history
   */
  async resolve(
    location: string,
    type: LocationType,
    typedQuery: string = location,
  ): Promise<ResolvedLocation> {
    if (type === "coordinates") {
      return this.parseCoordinates(location);
    }

    const cacheKey = `geocoding:${type}:${location.trim().toLowerCase()}`;
    const cached = await this.readCache(cacheKey);
    if (cached) {
      return cached;
    }

    const response =
      type === "zip"
        ? await this.openWeatherClient.geocodeZip(location)
        : await this.openWeatherClient.geocodeDirect(location, 1);

    const resolved = this.pickResult(response);
    if (!resolved) {
      throw new LocationNotFoundError(location);
    }

    this.logger.debug(
      `Geocoded "${location}" (${type}) to ${resolved.latitude}, ${resolved.longitude}`,
    );

    await this.writeCache(cacheKey, resolved);
    await this.recordLookup(typedQuery, resolved);

    return resolved;
  }

  private parseCoordinates(location: string): ResolvedLocation {
    const numbers = this.locationClassifier.extractNumbers(location);
    if (!numbers) {
      throw new ValidationError("Invalid coordinates format", { location });
    }

    const [latitude, longitude] = numbers;
    if (latitude < -90 || latitude > 90) {
      throw new ValidationError("Latitude must be between -90 and 90 degrees", {
        latitude,
      });
    }
    if (longitude < -180 || longitude > 180) {
      throw new ValidationError(
        "Longitude must be between -180 and 180 degrees",
        { longitude },
      );
    }

    return { latitude, longitude, name: null };
  }

  /**
   * Direct geocoding answers with a candidate list (first one wins),
   * ZIP geocoding with a single object
   */
  private pickResult(
    response: OpenWeatherGeocodingResponse | null | undefined,
  ): ResolvedLocation | null {
    if (!response) {
      return null;
    }

    const candidate = Array.isArray(response) ? response[0] : response;
    if (
      !candidate ||
      typeof candidate.lat !== "number" ||
      typeof candidate.lon !== "number"
    ) {
      return null;
    }

    return {
      latitude: candidate.lat,
      longitude: candidate.lon,
      name: candidate.name ?? null,
    };
  }

  private async readCache(key: string): Promise<ResolvedLocation | null> {
    try {
      const cached = await this.redis.get(key);
      if (!cached) {
        return null;
      }
      const parsed: unknown = JSON.parse(cached);
      return isResolvedLocation(parsed) ? parsed : null;
    } catch (error) {
      this.logger.warn(`Geocoding cache read failed for ${key}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async writeCache(key: string, value: ResolvedLocation): Promise<void> {
    try {
      await this.redis.set(key, JSON.stringify(value), "EX", this.TTL_GEOCODING);
    } catch (error) {
      this.logger.warn(`Geocoding cache write failed for ${key}: ${errorMessage(error)}`);
    }
  }

  private async recordLookup(
    query: string,
    resolved: ResolvedLocation,
  ): Promise<void> {
    try {
      await this.locationHistoryService.add({
        query,
        resolvedName: resolved.name,
        latitude: resolved.latitude,
        longitude: resolved.longitude,
      });
    } catch (error) {
      this.logger.warn(`Failed to record location lookup "${query}": ${errorMessage(error)}`);
    }
  }
}
