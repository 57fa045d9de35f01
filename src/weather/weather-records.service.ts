import { Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { DataSource, Repository } from "typeorm";
import { NotFoundError } from "../common/errors/api-errors";
import { toCalendarDate } from "../common/utils/date.util";
import { LocationType } from "../location/location.types";
import { WeatherRecord } from "./entities/weather-record.entity";

export interface WeatherRecordInput {
  locationName: string;
  locationType?: LocationType | null;
  resolvedName?: string | null;
  latitude: number;
  longitude: number;
  timestamp: Date;
  temperature: number | null;
  feelsLike?: number | null;
  humidity?: number | null;
  windSpeed?: number | null;
  condition: string | null;
  dateRangeStart?: string | null;
  dateRangeEnd?: string | null;
}

/**
 * Only temperature and condition are editable after the fact.
 * Omitted fields keep their stored value.
 */
export interface WeatherRecordUpdate {
  temperature?: number;
  condition?: string;
}

/**
 * True if the record belongs to [start, end] (YYYY-MM-DD, inclusive).
 *
 * Records carrying an explicit date range match when the ranges overlap;
 * the others match on the UTC date of their timestamp.
 */
export function isRecordInRange(
  record: Pick<WeatherRecord, "dateRangeStart" | "dateRangeEnd" | "timestamp">,
  start: string,
  end: string,
): boolean {
  if (record.dateRangeStart && record.dateRangeEnd) {
    return record.dateRangeStart <= end && record.dateRangeEnd >= start;
  }
  const day = toCalendarDate(new Date(record.timestamp));
  return day >= start && day <= end;
}

/**
 * Weather Records Service
 *
 * CRUD over `weather_records`. Every write runs in its own transaction:
 * commit on success, rollback and rethrow on failure, connection released
 * either way.
 */
@Injectable()
export class WeatherRecordsService {
  private readonly logger = new Logger(WeatherRecordsService.name);

  constructor(
    @InjectRepository(WeatherRecord)
    private readonly weatherRecordRepository: Repository<WeatherRecord>,
    private readonly dataSource: DataSource,
  ) {}

  /**
   * Insert records atomically: either all rows land or none do
   */
  async saveRecords(inputs: WeatherRecordInput[]): Promise<WeatherRecord[]> {
    if (inputs.length === 0) {
      return [];
    }

    const saved = await this.dataSource.transaction(async (manager) => {
      const repository = manager.getRepository(WeatherRecord);
      const records = inputs.map((input) =>
        repository.create({
          locationType: null,
          resolvedName: null,
          feelsLike: null,
          humidity: null,
          windSpeed: null,
          dateRangeStart: null,
          dateRangeEnd: null,
          ...input,
        }),
      );
      return repository.save(records);
    });

    this.logger.debug(
      `Saved ${saved.length} weather record(s) for "${inputs[0].locationName}"`,
    );
    return saved;
  }

  async findAll(): Promise<WeatherRecord[]> {
    return this.weatherRecordRepository.find({
      order: { createdAt: "DESC" },
    });
  }

  async findById(id: number): Promise<WeatherRecord> {
    const record = await this.weatherRecordRepository.findOneBy({ id });
    if (!record) {
      throw new NotFoundError("Weather record not found", { id });
    }
    return record;
  }

  /**
   * Records for an exact location name, newest first, optionally limited
   * to a date range
   */
  async getHistory(
    locationName: string,
    startDate?: string,
    endDate?: string,
  ): Promise<WeatherRecord[]> {
    const records = await this.weatherRecordRepository.find({
      where: { locationName },
      order: { timestamp: "DESC" },
    });

    if (!startDate || !endDate) {
      return records;
    }
    return records.filter((record) =>
      isRecordInRange(record, startDate, endDate),
    );
  }

  async update(
    id: number,
    changes: WeatherRecordUpdate,
  ): Promise<WeatherRecord> {
    return this.dataSource.transaction(async (manager) => {
      const repository = manager.getRepository(WeatherRecord);
      const record = await repository.findOneBy({ id });
      if (!record) {
        throw new NotFoundError("Weather record not found", { id });
      }

      if (changes.temperature !== undefined) {
        record.temperature = changes.temperature;
      }
      if (changes.condition !== undefined) {
        record.condition = changes.condition;
      }
      return repository.save(record);
    });
  }

  async remove(id: number): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      const result = await manager.getRepository(WeatherRecord).delete({ id });
      if (!result.affected) {
        throw new NotFoundError("Weather record not found", { id });
      }
    });
  }
}
