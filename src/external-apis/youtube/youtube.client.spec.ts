import { Test, TestingModule } from "@nestjs/testing";
import { ExternalApiError } from "../../common/errors/api-errors";
import { configServiceWith } from "../../../test/helpers/config.helper";
import {
  axiosError,
  mockAxiosCreate,
  MockAxiosInstance,
} from "../../../test/helpers/axios.helper";
import { YouTubeClient } from "./youtube.client";

async function createClient(apiKey: string): Promise<YouTubeClient> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [YouTubeClient, configServiceWith({ YOUTUBE_API_KEY: apiKey })],
  }).compile();
  return module.get<YouTubeClient>(YouTubeClient);
}

describe("YouTubeClient", () => {
  let mockAxiosInstance: MockAxiosInstance;

  beforeEach(() => {
    mockAxiosInstance = mockAxiosCreate();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should report whether a key is configured", async () => {
    expect((await createClient("test-secret")).isConfigured()).toBe(true);
    expect((await createClient("")).isConfigured()).toBe(false);
  });

  it("should search most viewed travel videos and map them", async () => {
    const client = await createClient("test-secret");
    mockAxiosInstance.get.mockResolvedValue({
      data: {
        items: [
          {
            id: { kind: "youtube#video", videoId: "vid-1" },
            snippet: {
              title: "Paris in 4K",
              publishedAt: "2023-05-01T10:00:00Z",
              thumbnails: {
                default: { url: "https://img.example/vid-1/default.jpg" },
                medium: { url: "https://img.example/vid-1/medium.jpg" },
              },
            },
          },
          {
            id: { kind: "youtube#channel", channelId: "chan-1" },
            snippet: {
              title: "Some channel",
              publishedAt: "2020-01-01T00:00:00Z",
              thumbnails: {},
            },
          },
          {
            id: { kind: "youtube#video", videoId: "vid-2" },
            snippet: {
              title: "Paris walking tour",
              publishedAt: "2022-08-15T08:30:00Z",
              thumbnails: {
                default: { url: "https://img.example/vid-2/default.jpg" },
              },
            },
          },
        ],
      },
    });

    const videos = await client.searchTravelVideos("Paris,Fr", 2);

    expect(mockAxiosInstance.get).toHaveBeenCalledWith("/search", {
      params: {
        part: "snippet",
        q: "Paris,Fr travel",
        type: "video",
        maxResults: 2,
        order: "viewCount",
        key: "test-secret",
      },
    });
    expect(videos).toEqual([
      {
        videoId: "vid-1",
        title: "Paris in 4K",
        thumbnailUrl: "https://img.example/vid-1/medium.jpg",
        publishedAt: "2023-05-01T10:00:00Z",
      },
      {
        videoId: "vid-2",
        title: "Paris walking tour",
        thumbnailUrl: "https://img.example/vid-2/default.jpg",
        publishedAt: "2022-08-15T08:30:00Z",
      },
    ]);
  });

  it("should return an empty list when there are no items", async () => {
    const client = await createClient("test-secret");
    mockAxiosInstance.get.mockResolvedValue({ data: {} });

    await expect(client.searchTravelVideos("Nowhere")).resolves.toEqual([]);
  });

  it("should wrap failures in an ExternalApiError for YouTube", async () => {
    const client = await createClient("test-secret");
    mockAxiosInstance.get.mockRejectedValue(
      axiosError({ status: 403, statusText: "Forbidden" }, "quotaExceeded"),
    );

    const error = await client
      .searchTravelVideos("Paris")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalApiError);
    if (error instanceof ExternalApiError) {
      expect(error.message).toBe("Failed to fetch location videos: quotaExceeded");
      expect(error.service).toBe("YouTube");
      expect(error.details).toEqual({ service: "YouTube", status: 403 });
    }
  });
});
