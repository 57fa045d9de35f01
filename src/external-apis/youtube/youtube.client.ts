import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import axios, { AxiosInstance } from "axios";
import { ExternalApiError } from "../../common/errors/api-errors";
import { RateLimiter } from "../../common/utils/rate-limiter";
import { getProvidersConfig } from "../../config/providers.config";
import {
  TravelVideo,
  YouTubeSearchItem,
  YouTubeSearchResponse,
} from "./youtube.types";

/**
 * YouTube Data API Client
 *
 * Searches travel videos for a location. The search endpoint costs 100
 * quota units per call (10,000/day), so calls are spaced to 30/minute.
 */
@Injectable()
export class YouTubeClient {
  private readonly logger = new Logger(YouTubeClient.name);
  private readonly httpClient: AxiosInstance;
  private readonly apiKey: string;
  private readonly baseUrl = "https://www.googleapis.com/youtube/v3";
  private readonly limiter = new RateLimiter(30);

  constructor(private readonly configService: ConfigService) {
    const config = getProvidersConfig(this.configService);
    this.apiKey = config.youtubeApiKey;

    if (!this.apiKey) {
      this.logger.warn(
        "YOUTUBE_API_KEY not found in environment variables. Location videos are disabled.",
      );
    }

    this.httpClient = axios.create({
      baseURL: this.baseUrl,
      timeout: config.httpTimeoutMs,
    });
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * Most viewed "<location> travel" videos
   */
  async searchTravelVideos(
    location: string,
    maxResults: number = 3,
  ): Promise<TravelVideo[]> {
    await this.limiter.waitIfNeeded();

    try {
      const response = await this.httpClient.get<YouTubeSearchResponse>(
        "/search",
        {
          params: {
            part: "snippet",
            q: `${location} travel`,
            type: "video",
            maxResults,
            order: "viewCount",
            key: this.apiKey,
          },
        },
      );

      return (response.data.items ?? []).flatMap((item) => {
        const video = this.toVideo(item);
        return video ? [video] : [];
      });
    } catch (error: unknown) {
      const status = axios.isAxiosError(error)
        ? error.response?.status
        : undefined;
      const message = error instanceof Error ? error.message : String(error);

      this.logger.error(
        `YouTube search failed for "${location}": ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new ExternalApiError(
        `Failed to fetch location videos: ${message}`,
        "YouTube",
        status !== undefined ? { status } : undefined,
      );
    }
  }

  private toVideo(item: YouTubeSearchItem): TravelVideo | null {
    // Channels and playlists can slip into results without a videoId
    if (!item.id.videoId) {
      return null;
    }

    const thumbnails = item.snippet.thumbnails;
    return {
      videoId: item.id.videoId,
      title: item.snippet.title,
      thumbnailUrl:
        thumbnails.medium?.url ?? thumbnails.default?.url ?? null,
      publishedAt: item.snippet.publishedAt,
    };
  }
}
