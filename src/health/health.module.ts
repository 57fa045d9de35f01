import { Module } from "@nestjs/common";
import { HealthController } from "./health.controller";

/**
 * Health Module
 *
 * Liveness and connectivity checks (database, Redis).
 */
@Module({
  controllers: [HealthController],
})
export class HealthModule {}
