import { Controller, Delete, Get, Query } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { success, SuccessResponse } from "../common/dto/api-response.dto";
import {
  HistoryLimitQueryDto,
  LocationQueryDto,
  MediaQueryDto,
} from "./dto/location-query.dto";
import { LocationHistory } from "./entities/location-history.entity";
import { LocationClassifier } from "./location-classifier";
import { LocationHistoryService } from "./location-history.service";
import {
  LocationMedia,
  LocationMediaService,
} from "./location-media.service";
import { LocationDisplay } from "./location.types";

/**
 * Location Controller
 *
 * Location parsing, media (maps, travel videos) and recent lookups.
 */
@ApiTags("location")
@Controller("location")
export class LocationController {
  constructor(
    private readonly locationClassifier: LocationClassifier,
    private readonly locationMediaService: LocationMediaService,
    private readonly locationHistoryService: LocationHistoryService,
  ) {}

  /**
   * GET /v1/location/classify?location=
   *
   * Detects the input type and returns its normalized display form.
   * Nothing is geocoded.
   */
  @Get("classify")
  @ApiOperation({ summary: "Classify and normalize a location string" })
  @ApiResponse({ status: 400, description: "Unrecognized location format" })
  classify(@Query() query: LocationQueryDto): SuccessResponse<LocationDisplay> {
    const { raw, type } = this.locationClassifier.toQuery(query.location);
    return success(this.locationClassifier.formatForDisplay(raw, type));
  }

  /**
   * GET /v1/location/media?location=&videos=
   */
  @Get("media")
  @ApiOperation({ summary: "Map links and travel videos for a location" })
  @ApiResponse({ status: 502, description: "Video search failed" })
  async getMedia(
    @Query() query: MediaQueryDto,
  ): Promise<SuccessResponse<LocationMedia>> {
    return success(
      await this.locationMediaService.getLocationMedia(
        query.location,
        query.videos,
      ),
    );
  }

  /**
   * GET /v1/location/history?limit=
   */
  @Get("history")
  @ApiOperation({ summary: "Recently geocoded locations, newest first" })
  async getHistory(
    @Query() query: HistoryLimitQueryDto,
  ): Promise<SuccessResponse<LocationHistory[]>> {
    return success(await this.locationHistoryService.recent(query.limit));
  }

  /**
   * DELETE /v1/location/history
   */
  @Delete("history")
  @ApiOperation({ summary: "Clear the lookup history" })
  async clearHistory(): Promise<SuccessResponse<{ cleared: number }>> {
    const cleared = await this.locationHistoryService.clear();
    return success({ cleared }, "Location history cleared");
  }
}
