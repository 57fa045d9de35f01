import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { OpenWeatherModule } from "../external-apis/openweather/openweather.module";
import { LocationModule } from "../location/location.module";
import { DateRangeValidator } from "./date-range.validator";
import { WeatherRecord } from "./entities/weather-record.entity";
import { WeatherExportService } from "./export/weather-export.service";
import { ForecastAggregator } from "./forecast-aggregator";
import { WeatherQueryService } from "./weather-query.service";
import { WeatherRecordsService } from "./weather-records.service";
import { WeatherController } from "./weather.controller";

@Module({
  imports: [
    TypeOrmModule.forFeature([WeatherRecord]),
    OpenWeatherModule,
    LocationModule,
  ],
  controllers: [WeatherController],
  providers: [
    WeatherQueryService,
    WeatherRecordsService,
    WeatherExportService,
    ForecastAggregator,
    DateRangeValidator,
  ],
})
export class WeatherModule {}
