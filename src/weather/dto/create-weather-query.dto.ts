import { ApiProperty } from "@nestjs/swagger";
import { IsString } from "class-validator";

export class CreateWeatherQueryDto {
  @ApiProperty({ example: "London, UK" })
  @IsString({ message: "Location must be a non-empty string" })
  location!: string;

  @ApiProperty({
    description: "First day (YYYY-MM-DD), at most 7 days back",
    example: "2024-01-05",
  })
  @IsString()
  dateRangeStart!: string;

  @ApiProperty({
    description: "Last day (YYYY-MM-DD), at most 5 days ahead and 5 days after the start",
    example: "2024-01-07",
  })
  @IsString()
  dateRangeEnd!: string;
}
