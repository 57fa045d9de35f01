import { ApiProperty } from "@nestjs/swagger";
import { IsNumber, IsOptional, IsString, MinLength } from "class-validator";

/**
 * Only temperature and condition can be corrected; omitted fields stay as stored
 */
export class UpdateWeatherRecordDto {
  @ApiProperty({ description: "Temperature (Celsius)", required: false })
  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  temperature?: number;

  @ApiProperty({ example: "scattered clouds", required: false })
  @IsOptional()
  @IsString()
  @MinLength(1)
  condition?: string;
}
