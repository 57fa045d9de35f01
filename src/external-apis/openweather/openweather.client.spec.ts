import { Test, TestingModule } from "@nestjs/testing";
import { ExternalApiError } from "../../common/errors/api-errors";
import { configServiceWith } from "../../../test/helpers/config.helper";
import {
  axiosError,
  mockAxiosCreate,
  MockAxiosInstance,
} from "../../../test/helpers/axios.helper";
import { OpenWeatherClient } from "./openweather.client";

describe("OpenWeatherClient", () => {
  let client: OpenWeatherClient;
  let mockAxiosInstance: MockAxiosInstance;

  beforeEach(async () => {
    mockAxiosInstance = mockAxiosCreate();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OpenWeatherClient,
        configServiceWith({
          OPENWEATHER_API_KEY: "test-secret",
          OPENWEATHER_MAX_RETRIES: "2",
          OPENWEATHER_RETRY_BASE_MS: "1",
        }),
      ],
    }).compile();

    client = module.get<OpenWeatherClient>(OpenWeatherClient);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("getCurrentWeather", () => {
    it("should fetch and map current conditions", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: {
          dt: 1704456000,
          name: "New York",
          main: { temp: 20.5, feels_like: 19.8, humidity: 55 },
          wind: { speed: 3.6 },
          weather: [{ main: "Clear", description: "clear sky", icon: "01d" }],
        },
      });

      const weather = await client.getCurrentWeather(40.75, -73.99);

      expect(weather).toEqual({
        timestamp: "2024-01-05T12:00:00.000Z",
        temperature: 20.5,
        feelsLike: 19.8,
        humidity: 55,
        windSpeed: 3.6,
        condition: "clear sky",
        icon: "01d",
        locationName: "New York",
        latitude: 40.75,
        longitude: -73.99,
      });
      expect(mockAxiosInstance.get).toHaveBeenCalledWith("/data/2.5/weather", {
        params: { lat: 40.75, lon: -73.99, units: "metric", appid: "test-secret" },
      });
    });

    it("should report an unknown condition when the provider sends none", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: {
          dt: 1704456000,
          name: "Nowhere",
          main: { temp: 1, feels_like: 0, humidity: 90 },
          wind: { speed: 0 },
          weather: [],
        },
      });

      const weather = await client.getCurrentWeather(0, 0);

      expect(weather.condition).toBe("unknown");
      expect(weather.icon).toBeNull();
    });
  });

  describe("getForecastSamples", () => {
    it("should request cnt samples and fill missing fields", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: {
          city: { name: "New York" },
          list: [
            {
              dt: 1704456000,
              main: { temp: 5, feels_like: 2, humidity: 80 },
              wind: { speed: 4 },
              weather: [{ description: "light rain", icon: "10d" }],
              pop: 0.4,
            },
            {
              dt: 1704466800,
              main: { temp: 3 },
              weather: [{ description: "overcast clouds", icon: "04n" }],
            },
          ],
        },
      });

      const series = await client.getForecastSamples(40.75, -73.99, 16);

      expect(mockAxiosInstance.get).toHaveBeenCalledWith("/data/2.5/forecast", {
        params: {
          lat: 40.75,
          lon: -73.99,
          units: "metric",
          cnt: 16,
          appid: "test-secret",
        },
      });
      expect(series.cityName).toBe("New York");
      expect(series.samples).toEqual([
        {
          timestamp: "2024-01-05T12:00:00.000Z",
          temperature: 5,
          feelsLike: 2,
          humidity: 80,
          windSpeed: 4,
          condition: "light rain",
          icon: "10d",
          pop: 0.4,
        },
        {
          timestamp: "2024-01-05T15:00:00.000Z",
          temperature: 3,
          feelsLike: null,
          humidity: null,
          windSpeed: null,
          condition: "overcast clouds",
          icon: "04n",
          pop: 0,
        },
      ]);
    });
  });

  describe("geocoding", () => {
    it("should geocode ZIP codes through /geo/1.0/zip", async () => {
      mockAxiosInstance.get.mockResolvedValue({
        data: { zip: "10001", name: "New York", lat: 40.75, lon: -73.99 },
      });

      const result = await client.geocodeZip("10001");

      expect(result).toEqual({
        zip: "10001",
        name: "New York",
        lat: 40.75,
        lon: -73.99,
      });
      expect(mockAxiosInstance.get).toHaveBeenCalledWith("/geo/1.0/zip", {
        params: { zip: "10001", appid: "test-secret" },
      });
    });

    it("should geocode free text through /geo/1.0/direct", async () => {
      mockAxiosInstance.get.mockResolvedValue({ data: [] });

      await client.geocodeDirect("London,Uk");

      expect(mockAxiosInstance.get).toHaveBeenCalledWith("/geo/1.0/direct", {
        params: { q: "London,Uk", limit: 1, appid: "test-secret" },
      });
    });
  });

  describe("error handling", () => {
    it("should retry HTTP 429 and return the later success", async () => {
      mockAxiosInstance.get
        .mockRejectedValueOnce(
          axiosError({ status: 429, statusText: "Too Many Requests" }),
        )
        .mockResolvedValueOnce({ data: [] });

      await expect(client.geocodeDirect("Paris")).resolves.toEqual([]);
      expect(mockAxiosInstance.get).toHaveBeenCalledTimes(2);
    });

    it("should give up on 429 after the configured retries", async () => {
      mockAxiosInstance.get.mockRejectedValue(
        axiosError({ status: 429, statusText: "Too Many Requests" }),
      );

      await expect(client.getCurrentWeather(1, 2)).rejects.toThrow(
        "OpenWeather API: HTTP 429 Too Many Requests",
      );
      // 1 attempt + 2 retries
      expect(mockAxiosInstance.get).toHaveBeenCalledTimes(3);
    });

    it("should not retry other HTTP errors", async () => {
      mockAxiosInstance.get.mockRejectedValue(
        axiosError({ status: 401, statusText: "Unauthorized" }),
      );

      const error = await client.getCurrentWeather(1, 2).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExternalApiError);
      expect(mockAxiosInstance.get).toHaveBeenCalledTimes(1);
      if (error instanceof ExternalApiError) {
        expect(error.message).toBe("OpenWeather API: HTTP 401 Unauthorized");
        expect(error.getStatus()).toBe(502);
        expect(error.details).toEqual({
          service: "OpenWeather",
          path: "/data/2.5/weather",
          status: 401,
        });
      }
    });

    it("should report DNS failures", async () => {
      mockAxiosInstance.get.mockRejectedValue(axiosError({ code: "ENOTFOUND" }));

      await expect(client.getCurrentWeather(1, 2)).rejects.toThrow(
        "OpenWeather API: DNS resolution failed",
      );
    });

    it("should report timeouts", async () => {
      mockAxiosInstance.get.mockRejectedValue(
        axiosError({ code: "ECONNABORTED" }, "timeout of 10000ms exceeded"),
      );

      await expect(client.getForecastSamples(1, 2, 8)).rejects.toThrow(
        "OpenWeather API: Request timeout",
      );
    });

    it("should wrap non-axios failures", async () => {
      mockAxiosInstance.get.mockRejectedValue(new Error("boom"));

      await expect(client.getCurrentWeather(1, 2)).rejects.toThrow(
        "OpenWeather API: boom",
      );
    });
  });
});
