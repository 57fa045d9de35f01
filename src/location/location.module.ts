import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { GoogleMapsModule } from "../external-apis/google-maps/google-maps.module";
import { OpenWeatherModule } from "../external-apis/openweather/openweather.module";
import { YouTubeModule } from "../external-apis/youtube/youtube.module";
import { LocationHistory } from "./entities/location-history.entity";
import { GeoResolver } from "./geo-resolver.service";
import { LocationClassifier } from "./location-classifier";
import { LocationHistoryService } from "./location-history.service";
import { LocationMediaService } from "./location-media.service";
import { LocationController } from "./location.controller";

/**
 * Location Module
 *
 * Classification, geocoding and media of user-entered locations.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([LocationHistory]),
    OpenWeatherModule,
    YouTubeModule,
    GoogleMapsModule,
  ],
  controllers: [LocationController],
  providers: [
    LocationClassifier,
    GeoResolver,
    LocationHistoryService,
    LocationMediaService,
  ],
  exports: [LocationClassifier, GeoResolver, LocationMediaService],
})
export class LocationModule {}
