import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import { typeOrmConfig } from "./config/typeorm.config";
import { RedisModule } from "./common/redis/redis.module";
import { HealthModule } from "./health/health.module";
import { LocationModule } from "./location/location.module";
import { WeatherModule } from "./weather/weather.module";
import { SettingsModule } from "./settings/settings.module";

@Module({
  imports: [
    // Global config module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      cache: true,
    }),

    // Redis (geocoding cache)
    RedisModule,

    // TypeORM with async config
    TypeOrmModule.forRootAsync(typeOrmConfig),

    HealthModule,

    // Feature modules
    LocationModule,
    WeatherModule,
    SettingsModule,
  ],
})
export class AppModule {}
