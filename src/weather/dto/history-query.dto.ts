import { ApiProperty } from "@nestjs/swagger";
import { IsOptional, IsString } from "class-validator";
import { LocationQueryDto } from "../../location/dto/location-query.dto";

export class HistoryQueryDto extends LocationQueryDto {
  @ApiProperty({
    description: "Range start (YYYY-MM-DD), requires `end`",
    required: false,
    example: "2024-01-01",
  })
  @IsOptional()
  @IsString()
  start?: string;

  @ApiProperty({
    description: "Range end (YYYY-MM-DD), requires `start`",
    required: false,
    example: "2024-01-05",
  })
  @IsOptional()
  @IsString()
  end?: string;
}
