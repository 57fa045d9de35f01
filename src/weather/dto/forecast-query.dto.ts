import { ApiProperty } from "@nestjs/swagger";
import { Type } from "class-transformer";
import { IsInt, IsOptional, Max, Min } from "class-validator";
import { DEFAULT_FORECAST_DAYS } from "../forecast-aggregator";
import { LocationQueryDto } from "../../location/dto/location-query.dto";

const DAYS_MESSAGE = `Forecast days must be between 1 and ${DEFAULT_FORECAST_DAYS}`;

export class ForecastQueryDto extends LocationQueryDto {
  @ApiProperty({
    description: "Number of forecast days",
    required: false,
    default: DEFAULT_FORECAST_DAYS,
    minimum: 1,
    maximum: DEFAULT_FORECAST_DAYS,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: DAYS_MESSAGE })
  @Min(1, { message: DAYS_MESSAGE })
  @Max(DEFAULT_FORECAST_DAYS, { message: DAYS_MESSAGE })
  days?: number = DEFAULT_FORECAST_DAYS;
}
