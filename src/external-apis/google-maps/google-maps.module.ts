import { Module } from "@nestjs/common";
import { StaticMapsClient } from "./static-maps.client";

/**
 * Google Maps Module
 *
 * Builds map links and static map image URLs for location media.
 */
@Module({
  providers: [StaticMapsClient],
  exports: [StaticMapsClient],
})
export class GoogleMapsModule {}
