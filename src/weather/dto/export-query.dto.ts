import { ApiProperty } from "@nestjs/swagger";
import { IsOptional, IsString } from "class-validator";
import {
  RECORD_EXPORT_FORMATS,
  REPORT_FORMATS,
} from "../export/weather-export.service";
import { LocationQueryDto } from "../../location/dto/location-query.dto";

// Formats are checked by the export service so unknown ones get its message
export class ExportQueryDto {
  @ApiProperty({
    enum: RECORD_EXPORT_FORMATS,
    required: false,
    default: "json",
  })
  @IsOptional()
  @IsString()
  format?: string = "json";
}

export class ReportQueryDto extends LocationQueryDto {
  @ApiProperty({ enum: REPORT_FORMATS, required: false, default: "json" })
  @IsOptional()
  @IsString()
  format?: string = "json";
}
