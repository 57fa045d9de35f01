import { Injectable, Logger } from "@nestjs/common";
import { StaticMapsClient } from "../external-apis/google-maps/static-maps.client";
import { YouTubeClient } from "../external-apis/youtube/youtube.client";
import { TravelVideo } from "../external-apis/youtube/youtube.types";
import { LocationClassifier } from "./location-classifier";
import { LocationDisplay } from "./location.types";

export interface LocationMedia {
  location: LocationDisplay;
  mapsUrl: string;
  staticMapUrl: string | null;
  videos: TravelVideo[];
}

/**
 * Location Media Service
 *
 * Map links and travel videos shown next to the weather of a location.
 */
@Injectable()
export class LocationMediaService {
  private readonly logger = new Logger(LocationMediaService.name);

  constructor(
    private readonly locationClassifier: LocationClassifier,
    private readonly youtubeClient: YouTubeClient,
    private readonly staticMapsClient: StaticMapsClient,
  ) {}

  /**
   * @throws ValidationError if the location can't be classified
   * @throws ExternalApiError if the video search fails
   */
  async getLocationMedia(
    location: string,
    maxVideos: number = 3,
  ): Promise<LocationMedia> {
    const query = this.locationClassifier.toQuery(location);
    const display = this.locationClassifier.formatForDisplay(
      query.raw,
      query.type,
    );

    const staticMapUrl = await this.staticMapsClient.getStaticMapUrl(
      query.normalized,
    );

    let videos: TravelVideo[] = [];
    if (this.youtubeClient.isConfigured()) {
      videos = await this.youtubeClient.searchTravelVideos(
        query.normalized,
        maxVideos,
      );
    } else {
      this.logger.warn(
        `Skipping video search for "${query.normalized}": YouTube is not configured`,
      );
    }

    return {
      location: display,
      mapsUrl: this.staticMapsClient.getSearchUrl(query.normalized),
      staticMapUrl,
      videos,
    };
  }
}
