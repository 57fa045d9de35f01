import { ApiProperty } from "@nestjs/swagger";
import { Type } from "class-transformer";
import { IsInt, IsOptional, IsString, Max, Min } from "class-validator";

export class LocationQueryDto {
  @ApiProperty({
    description:
      "City (`London, UK`), ZIP (`10001`), coordinates (`40.71, -74.00`) or landmark",
    example: "10001",
  })
  @IsString({ message: "Location must be a non-empty string" })
  location!: string;
}

export class MediaQueryDto extends LocationQueryDto {
  @ApiProperty({
    description: "Max travel videos",
    required: false,
    default: 3,
    minimum: 1,
    maximum: 10,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10)
  videos?: number = 3;
}

export class HistoryLimitQueryDto {
  @ApiProperty({ required: false, default: 10, minimum: 1, maximum: 100 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number = 10;
}
