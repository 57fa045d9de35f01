import { TypeOrmModuleAsyncOptions } from "@nestjs/typeorm";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { LocationHistory } from "../location/entities/location-history.entity";
import { UserSetting } from "../settings/entities/user-setting.entity";
import { WeatherRecord } from "../weather/entities/weather-record.entity";
import { getDatabaseConfig } from "./database.config";

export const typeOrmConfig: TypeOrmModuleAsyncOptions = {
  imports: [ConfigModule],
  inject: [ConfigService],
  useFactory: (configService: ConfigService) => {
    const db = getDatabaseConfig(configService);

    return {
      type: "postgres" as const,
      host: db.host,
      port: db.port,
      username: db.username,
      password: db.password,
      database: db.database,
      entities: [WeatherRecord, LocationHistory, UserSetting],
      synchronize: db.synchronize, // dev only
      logging: db.logging,
      extra: {
        max: db.poolSize,
        connectionTimeoutMillis: 2000,
      },
    };
  },
};
