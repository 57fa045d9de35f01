import { Test, TestingModule } from "@nestjs/testing";
import { getRepositoryToken } from "@nestjs/typeorm";
import { DataSource } from "typeorm";
import { NotFoundError } from "../common/errors/api-errors";
import {
  createInMemoryDatabase,
  InMemoryDatabase,
} from "../../test/fixtures/repositories";
import { WeatherRecord } from "./entities/weather-record.entity";
import {
  isRecordInRange,
  WeatherRecordInput,
  WeatherRecordsService,
} from "./weather-records.service";

function input(overrides: Partial<WeatherRecordInput> = {}): WeatherRecordInput {
  return {
    locationName: "10001",
    locationType: "zip",
    latitude: 40.75,
    longitude: -73.99,
    timestamp: new Date("2024-01-05T12:00:00Z"),
    temperature: 20.5,
    condition: "clear sky",
    ...overrides,
  };
}

describe("WeatherRecordsService", () => {
  let service: WeatherRecordsService;
  let db: InMemoryDatabase;

  beforeEach(async () => {
    db = createInMemoryDatabase();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WeatherRecordsService,
        {
          provide: getRepositoryToken(WeatherRecord),
          useValue: db.weatherRecords,
        },
        { provide: DataSource, useValue: db.dataSource },
      ],
    }).compile();

    service = module.get<WeatherRecordsService>(WeatherRecordsService);
  });

  describe("saveRecords", () => {
    it("should insert all records in one transaction", async () => {
      const saved = await service.saveRecords([
        input(),
        input({ temperature: 18 }),
      ]);

      expect(saved.map((record) => record.id)).toEqual([1, 2]);
      expect(db.dataSource.transactionCount).toBe(1);
      expect(db.weatherRecords.rows).toHaveLength(2);
      expect(saved[0]).toMatchObject({
        locationName: "10001",
        resolvedName: null,
        feelsLike: null,
        humidity: null,
        windSpeed: null,
        dateRangeStart: null,
        dateRangeEnd: null,
      });
    });

    it("should skip the transaction for an empty batch", async () => {
      await expect(service.saveRecords([])).resolves.toEqual([]);
      expect(db.dataSource.transactionCount).toBe(0);
    });

    it("should roll back and rethrow when the write fails", async () => {
      db.weatherRecords.saveError = new Error("disk full");

      await expect(service.saveRecords([input()])).rejects.toThrow("disk full");
      expect(db.weatherRecords.rows).toHaveLength(0);
    });
  });

  describe("queries", () => {
    beforeEach(async () => {
      await service.saveRecords([
        input({ timestamp: new Date("2024-01-05T12:00:00Z") }),
        input({
          timestamp: new Date("2024-01-01T12:00:00Z"),
          dateRangeStart: "2024-01-08",
          dateRangeEnd: "2024-01-09",
        }),
        input({ timestamp: new Date("2024-01-03T00:00:00Z") }),
        input({
          locationName: "London,Uk",
          locationType: "city",
          timestamp: new Date("2024-01-05T12:00:00Z"),
        }),
      ]);
    });

    it("should list all records newest first", async () => {
      const records = await service.findAll();
      expect(records.map((record) => record.id)).toEqual([4, 3, 2, 1]);
    });

    it("should find a record by id", async () => {
      await expect(service.findById(4)).resolves.toMatchObject({
        locationName: "London,Uk",
      });
    });

    it("should throw NotFoundError for an unknown id", async () => {
      await expect(service.findById(99)).rejects.toThrow(
        new NotFoundError("Weather record not found"),
      );
    });

    it("should return history for an exact location name by timestamp", async () => {
      const records = await service.getHistory("10001");
      expect(records.map((record) => record.id)).toEqual([1, 3, 2]);
    });

    it("should not match location names loosely", async () => {
      await expect(service.getHistory("london,uk")).resolves.toEqual([]);
    });

    it("should filter history by date range", async () => {
      const records = await service.getHistory(
        "10001",
        "2024-01-05",
        "2024-01-08",
      );
      expect(records.map((record) => record.id)).toEqual([1, 2]);
    });
  });

  describe("update", () => {
    it("should only change the fields given", async () => {
      await service.saveRecords([input()]);

      const updated = await service.update(1, { temperature: 22 });

      expect(updated.temperature).toBe(22);
      expect(updated.condition).toBe("clear sky");
      expect(db.weatherRecords.rows[0].temperature).toBe(22);
    });

    it("should throw NotFoundError for an unknown id", async () => {
      await expect(service.update(7, { condition: "snow" })).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });

  describe("remove", () => {
    it("should delete the record", async () => {
      await service.saveRecords([input(), input()]);

      await service.remove(1);

      expect(db.weatherRecords.rows.map((record) => record.id)).toEqual([2]);
    });

    it("should throw NotFoundError for an unknown id", async () => {
      await service.saveRecords([input()]);

      await expect(service.remove(5)).rejects.toBeInstanceOf(NotFoundError);
      expect(db.weatherRecords.rows).toHaveLength(1);
    });
  });
});

describe("isRecordInRange", () => {
  const record = (
    timestamp: string,
    dateRangeStart: string | null = null,
    dateRangeEnd: string | null = null,
  ) => ({ timestamp: new Date(timestamp), dateRangeStart, dateRangeEnd });

  it("should match records by the UTC date of their timestamp", () => {
    expect(
      isRecordInRange(record("2024-01-05T23:30:00Z"), "2024-01-05", "2024-01-05"),
    ).toBe(true);
    expect(
      isRecordInRange(record("2024-01-06T00:30:00Z"), "2024-01-01", "2024-01-05"),
    ).toBe(false);
  });

  it("should match records whose own range overlaps", () => {
    const tagged = record("2023-12-01T00:00:00Z", "2024-01-04", "2024-01-06");

    expect(isRecordInRange(tagged, "2024-01-06", "2024-01-10")).toBe(true);
    expect(isRecordInRange(tagged, "2024-01-01", "2024-01-04")).toBe(true);
    expect(isRecordInRange(tagged, "2024-01-07", "2024-01-10")).toBe(false);
  });
});
