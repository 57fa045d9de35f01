import { ApiProperty } from "@nestjs/swagger";
import { IsString } from "class-validator";

export class DateRangeQueryDto {
  @ApiProperty({ example: "2024-01-05" })
  @IsString()
  start!: string;

  @ApiProperty({ example: "2024-01-07" })
  @IsString()
  end!: string;
}
