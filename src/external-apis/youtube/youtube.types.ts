/**
 * YouTube Data API v3 Types
 *
 * Documentation: https://developers.google.com/youtube/v3/docs/search/list
 */

export interface YouTubeThumbnail {
  url: string;
  width?: number;
  height?: number;
}

export interface YouTubeSearchItem {
  id: {
    kind?: string;
    videoId?: string;
  };
  snippet: {
    title: string;
    publishedAt: string; // ISO 8601
    thumbnails: {
      default?: YouTubeThumbnail;
      medium?: YouTubeThumbnail;
      high?: YouTubeThumbnail;
    };
  };
}

export interface YouTubeSearchResponse {
  items?: YouTubeSearchItem[];
}

/**
 * Simplified video data for our needs
 */
export interface TravelVideo {
  videoId: string;
  title: string;
  thumbnailUrl: string | null;
  publishedAt: string;
}
