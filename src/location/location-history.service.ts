import { Injectable } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { DataSource, Repository } from "typeorm";
import { LocationHistory } from "./entities/location-history.entity";

export interface LocationHistoryInput {
  query: string;
  resolvedName: string | null;
  latitude: number | null;
  longitude: number | null;
}

export const DEFAULT_HISTORY_LIMIT = 10;

/**
 * Location History Service
 *
 * Recent geocoded lookups, newest first.
 */
@Injectable()
export class LocationHistoryService {
  constructor(
    @InjectRepository(LocationHistory)
    private readonly locationHistoryRepository: Repository<LocationHistory>,
    private readonly dataSource: DataSource,
  ) {}

  async add(entry: LocationHistoryInput): Promise<LocationHistory> {
    return this.dataSource.transaction(async (manager) => {
      const repository = manager.getRepository(LocationHistory);
      return repository.save(repository.create(entry));
    });
  }

  async recent(limit: number = DEFAULT_HISTORY_LIMIT): Promise<LocationHistory[]> {
    return this.locationHistoryRepository.find({
      order: { timestamp: "DESC" },
      take: limit,
    });
  }

  /**
   * Remove every entry
   *
   * @returns Number of entries removed
   */
  async clear(): Promise<number> {
    return this.dataSource.transaction(async (manager) => {
      const repository = manager.getRepository(LocationHistory);
      const count = await repository.count();
      await repository.clear();
      return count;
    });
  }
}
