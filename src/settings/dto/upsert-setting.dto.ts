import { ApiProperty } from "@nestjs/swagger";
import { IsString, MaxLength } from "class-validator";

export class UpsertSettingDto {
  @ApiProperty({ example: "metric" })
  @IsString()
  @MaxLength(10000)
  value!: string;
}
