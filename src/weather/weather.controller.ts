import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  StreamableFile,
} from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import {
  MessageResponse,
  success,
  SuccessResponse,
} from "../common/dto/api-response.dto";
import { ValidationError } from "../common/errors/api-errors";
import { toIsoDate } from "../common/utils/date.util";
import {
  DateRangeBounds,
  DateRangeValidator,
  DisplayDate,
} from "./date-range.validator";
import { CreateWeatherQueryDto } from "./dto/create-weather-query.dto";
import { DateRangeQueryDto } from "./dto/date-range-query.dto";
import { ExportQueryDto, ReportQueryDto } from "./dto/export-query.dto";
import { ForecastQueryDto } from "./dto/forecast-query.dto";
import { HistoryQueryDto } from "./dto/history-query.dto";
import { LocationQueryDto } from "../location/dto/location-query.dto";
import { UpdateWeatherRecordDto } from "./dto/update-weather-record.dto";
import { WeatherRecordDto } from "./dto/weather-record.dto";
import {
  ExportedFile,
  WeatherExportService,
} from "./export/weather-export.service";
import {
  CurrentWeatherResult,
  ForecastResult,
  WeatherOverview,
  WeatherQueryService,
} from "./weather-query.service";
import { WeatherRecordsService } from "./weather-records.service";

interface DateRangeResponse {
  startDate: string;
  endDate: string;
  rangeDays: number;
  dates: DisplayDate[];
}

function toFile(file: ExportedFile): StreamableFile {
  const content =
    typeof file.content === "string"
      ? Buffer.from(file.content, "utf-8")
      : file.content;
  return new StreamableFile(content, {
    type: file.contentType,
    disposition: `attachment; filename="${file.filename}"`,
  });
}

/**
 * Weather Controller
 *
 * Live lookups (current, forecast, overview, report) plus CRUD over the
 * stored weather records.
 */
@ApiTags("weather")
@Controller("weather")
export class WeatherController {
  constructor(
    private readonly weatherQueryService: WeatherQueryService,
    private readonly weatherRecordsService: WeatherRecordsService,
    private readonly weatherExportService: WeatherExportService,
    private readonly dateRangeValidator: DateRangeValidator,
  ) {}

  /**
   * GET /v1/weather/current?location=
   */
  @Get("current")
  @ApiOperation({ summary: "Current weather for a location" })
  @ApiResponse({ status: 200, description: "Current conditions" })
  @ApiResponse({ status: 400, description: "Invalid location" })
  @ApiResponse({ status: 404, description: "Location not found" })
  @ApiResponse({ status: 502, description: "Weather provider failure" })
  async getCurrent(
    @Query() query: LocationQueryDto,
  ): Promise<SuccessResponse<CurrentWeatherResult>> {
    return success(
      await this.weatherQueryService.getCurrentWeather(query.location),
    );
  }

  /**
   * GET /v1/weather/forecast?location=&days=
   */
  @Get("forecast")
  @ApiOperation({
    summary: "Daily forecast",
    description: "3-hour provider samples grouped into up to 5 daily summaries",
  })
  @ApiResponse({ status: 200, description: "Daily forecast" })
  async getForecast(
    @Query() query: ForecastQueryDto,
  ): Promise<SuccessResponse<ForecastResult>> {
    return success(
      await this.weatherQueryService.getForecast(query.location, query.days),
    );
  }

  /**
   * GET /v1/weather/overview?location=
   */
  @Get("overview")
  @ApiOperation({
    summary: "Current weather, forecast and media in one call",
    description: "Parts that fail are null and listed under `errors`",
  })
  async getOverview(
    @Query() query: LocationQueryDto,
  ): Promise<SuccessResponse<WeatherOverview>> {
    return success(await this.weatherQueryService.getOverview(query.location));
  }

  /**
   * GET /v1/weather/history?location=&start=&end=
   */
  @Get("history")
  @ApiOperation({ summary: "Stored records for a location, newest first" })
  async getHistory(
    @Query() query: HistoryQueryDto,
  ): Promise<SuccessResponse<WeatherRecordDto[]>> {
    const records = await this.weatherQueryService.getHistory(
      query.location,
      query.start,
      query.end,
    );
    return success(records.map((record) => WeatherRecordDto.fromEntity(record)));
  }

  /**
   * GET /v1/weather/export?format=json|csv
   */
  @Get("export")
  @ApiOperation({ summary: "Download all stored records" })
  async exportRecords(@Query() query: ExportQueryDto): Promise<StreamableFile> {
    const records = await this.weatherRecordsService.findAll();
    return toFile(
      this.weatherExportService.exportRecords(
        records.map((record) => WeatherRecordDto.fromEntity(record)),
        query.format ?? "json",
      ),
    );
  }

  /**
   * GET /v1/weather/report?location=&format=json|csv|pdf
   */
  @Get("report")
  @ApiOperation({ summary: "Download a weather report (current + forecast)" })
  async exportReport(@Query() query: ReportQueryDto): Promise<StreamableFile> {
    const report = await this.weatherQueryService.getReport(query.location);
    return toFile(
      await this.weatherExportService.exportReport(report, query.format ?? "json"),
    );
  }

  /**
   * GET /v1/weather/date-range/bounds
   */
  @Get("date-range/bounds")
  @ApiOperation({ summary: "Earliest and latest selectable dates" })
  getDateRangeBounds(): SuccessResponse<DateRangeBounds> {
    return success(this.dateRangeValidator.getValidRangeBounds());
  }

  /**
   * GET /v1/weather/date-range?start=&end=
   */
  @Get("date-range")
  @ApiOperation({ summary: "Validate a date range and list its days" })
  validateDateRange(
    @Query() query: DateRangeQueryDto,
  ): SuccessResponse<DateRangeResponse> {
    const result = this.dateRangeValidator.validate(query.start, query.end);
    if (!result.valid || !result.range) {
      throw new ValidationError(result.message, {
        start: query.start,
        end: query.end,
      });
    }

    const { startDate, endDate, rangeDays } = result.range;
    return success({
      startDate: toIsoDate(startDate),
      endDate: toIsoDate(endDate),
      rangeDays,
      dates: this.dateRangeValidator.generateDateRange(startDate, endDate),
    });
  }

  /**
   * GET /v1/weather
   */
  @Get()
  @ApiOperation({ summary: "All stored records, newest first" })
  async findAll(): Promise<SuccessResponse<WeatherRecordDto[]>> {
    const records = await this.weatherRecordsService.findAll();
    return success(records.map((record) => WeatherRecordDto.fromEntity(record)));
  }

  /**
   * GET /v1/weather/:id
   */
  @Get(":id")
  @ApiOperation({ summary: "One stored record" })
  @ApiResponse({ status: 404, description: "Record not found" })
  async findOne(
    @Param("id", ParseIntPipe) id: number,
  ): Promise<SuccessResponse<WeatherRecordDto>> {
    return success(
      WeatherRecordDto.fromEntity(await this.weatherRecordsService.findById(id)),
    );
  }

  /**
   * POST /v1/weather
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: "Store a weather snapshot for a location and date range",
  })
  @ApiResponse({ status: 201, description: "Record created" })
  async create(
    @Body() body: CreateWeatherQueryDto,
  ): Promise<SuccessResponse<WeatherRecordDto> & { id: number }> {
    const record = await this.weatherQueryService.createQuery(body);
    return {
      ...success(
        WeatherRecordDto.fromEntity(record),
        "Weather data created successfully",
      ),
      id: record.id,
    };
  }

  /**
   * PUT /v1/weather/:id
   */
  @Put(":id")
  @ApiOperation({ summary: "Correct temperature or condition of a record" })
  async update(
    @Param("id", ParseIntPipe) id: number,
    @Body() body: UpdateWeatherRecordDto,
  ): Promise<SuccessResponse<WeatherRecordDto>> {
    const record = await this.weatherRecordsService.update(id, body);
    return success(
      WeatherRecordDto.fromEntity(record),
      "Weather data updated successfully",
    );
  }

  /**
   * DELETE /v1/weather/:id
   */
  @Delete(":id")
  @ApiOperation({ summary: "Delete a record" })
  async remove(@Param("id", ParseIntPipe) id: number): Promise<MessageResponse> {
    await this.weatherRecordsService.remove(id);
    return { status: "success", message: "Weather data deleted successfully" };
  }
}
