import { Injectable } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { DataSource, Repository } from "typeorm";
import { NotFoundError } from "../common/errors/api-errors";
import { UserSetting } from "./entities/user-setting.entity";

/**
 * Settings Service
 *
 * String key/value settings (preferred units, last location, ...).
 */
@Injectable()
export class SettingsService {
  constructor(
    @InjectRepository(UserSetting)
    private readonly userSettingRepository: Repository<UserSetting>,
    private readonly dataSource: DataSource,
  ) {}

  async findAll(): Promise<UserSetting[]> {
    return this.userSettingRepository.find({ order: { settingKey: "ASC" } });
  }

  async get(key: string): Promise<UserSetting> {
    const setting = await this.userSettingRepository.findOneBy({
      settingKey: key,
    });
    if (!setting) {
      throw new NotFoundError(`Setting "${key}" not found`, { key });
    }
    return setting;
  }

  /**
   * Create or overwrite a setting
   */
  async set(key: string, value: string): Promise<UserSetting> {
    return this.dataSource.transaction(async (manager) => {
      const repository = manager.getRepository(UserSetting);
      const existing = await repository.findOneBy({ settingKey: key });

      if (existing) {
        existing.settingValue = value;
        return repository.save(existing);
      }
      return repository.save(
        repository.create({ settingKey: key, settingValue: value }),
      );
    });
  }

  async remove(key: string): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      const result = await manager
        .getRepository(UserSetting)
        .delete({ settingKey: key });
      if (!result.affected) {
        throw new NotFoundError(`Setting "${key}" not found`, { key });
      }
    });
  }
}
