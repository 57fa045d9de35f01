import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { RateLimiter } from "../../common/utils/rate-limiter";
import { getProvidersConfig } from "../../config/providers.config";

export interface StaticMapOptions {
  zoom?: number;
  width?: number;
  height?: number;
}

/**
 * Google Maps URL builder
 *
 * Static map images are fetched by the client straight from Google, so this
 * only signs the URL with the key. Handing out a URL still spends quota when
 * it is loaded, hence the 60/minute spacing.
 *
 * API Docs: https://developers.google.com/maps/documentation/maps-static
 */
@Injectable()
export class StaticMapsClient {
  private readonly logger = new Logger(StaticMapsClient.name);
  private readonly apiKey: string;
  private readonly staticMapUrl =
    "https://maps.googleapis.com/maps/api/staticmap";
  private readonly searchUrl = "https://www.google.com/maps/search/";
  private readonly limiter = new RateLimiter(60);

  constructor(private readonly configService: ConfigService) {
    this.apiKey = getProvidersConfig(this.configService).googleMapsApiKey;

    if (!this.apiKey) {
      this.logger.warn(
        "GOOGLE_MAPS_API_KEY not found in environment variables. Static maps are disabled.",
      );
    }
  }

  /**
   * Static map image URL centred on the location, or null without a key
   */
  async getStaticMapUrl(
    location: string,
    options: StaticMapOptions = {},
  ): Promise<string | null> {
    if (!this.apiKey) {
      return null;
    }

    await this.limiter.waitIfNeeded();

    const { zoom = 12, width = 400, height = 300 } = options;
    const params = new URLSearchParams({
      center: location,
      zoom: String(zoom),
      size: `${width}x${height}`,
      key: this.apiKey,
    });
    return `${this.staticMapUrl}?${params.toString()}`;
  }

  /**
   * Keyless Google Maps search link
   */
  getSearchUrl(location: string): string {
    const params = new URLSearchParams({ api: "1", query: location });
    return `${this.searchUrl}?${params.toString()}`;
  }
}
