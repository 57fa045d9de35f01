import { ApiProperty } from "@nestjs/swagger";
import { LOCATION_TYPES, LocationType } from "../../location/location.types";
import { WeatherRecord } from "../entities/weather-record.entity";

/**
 * Weather Record DTO
 *
 * Plain shape of a stored record. This is the only record shape that
 * leaves the service, in API responses and in exports alike.
 */
export class WeatherRecordDto {
  @ApiProperty({ example: 42 })
  id!: number;

  @ApiProperty({
    description: "Normalized location query",
    example: "10001",
  })
  locationName!: string;

  @ApiProperty({ enum: LOCATION_TYPES, nullable: true })
  locationType!: LocationType | null;

  @ApiProperty({
    description: "Name reported by the weather provider",
    example: "New York",
    nullable: true,
  })
  resolvedName!: string | null;

  @ApiProperty({ example: 40.75 })
  latitude!: number;

  @ApiProperty({ example: -73.99 })
  longitude!: number;

  @ApiProperty({ description: "Observation time (ISO 8601)" })
  timestamp!: string;

  @ApiProperty({ description: "Temperature (Celsius)", nullable: true })
  temperature!: number | null;

  @ApiProperty({ description: "Feels-like temperature (Celsius)", nullable: true })
  feelsLike!: number | null;

  @ApiProperty({ description: "Relative humidity (%)", nullable: true })
  humidity!: number | null;

  @ApiProperty({ description: "Wind speed (m/s)", nullable: true })
  windSpeed!: number | null;

  @ApiProperty({ example: "light rain", nullable: true })
  condition!: string | null;

  @ApiProperty({ example: "2024-01-05", nullable: true })
  dateRangeStart!: string | null;

  @ApiProperty({ example: "2024-01-07", nullable: true })
  dateRangeEnd!: string | null;

  @ApiProperty()
  createdAt!: string;

  @ApiProperty()
  updatedAt!: string;

  static fromEntity(record: WeatherRecord): WeatherRecordDto {
    const dto = new WeatherRecordDto();
    dto.id = record.id;
    dto.locationName = record.locationName;
    dto.locationType = record.locationType;
    dto.resolvedName = record.resolvedName;
    dto.latitude = record.latitude;
    dto.longitude = record.longitude;
    dto.timestamp = new Date(record.timestamp).toISOString();
    dto.temperature = record.temperature;
    dto.feelsLike = record.feelsLike;
    dto.humidity = record.humidity;
    dto.windSpeed = record.windSpeed;
    dto.condition = record.condition;
    dto.dateRangeStart = record.dateRangeStart;
    dto.dateRangeEnd = record.dateRangeEnd;
    dto.createdAt = new Date(record.createdAt).toISOString();
    dto.updatedAt = new Date(record.updatedAt).toISOString();
    return dto;
  }
}
