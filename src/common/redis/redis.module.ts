import {
  Module,
  Global,
  Inject,
  Logger,
  OnApplicationShutdown,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import Redis from "ioredis";

export const REDIS_CLIENT = "REDIS_CLIENT";

/**
 * Redis connection used as a lookup cache (geocoding results).
 *
 * The cache is optional at runtime: callers treat every Redis error as a
 * cache miss, and the offline queue is disabled so a missing Redis fails
 * fast instead of stalling requests.
 */
@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      useFactory: (configService: ConfigService) => {
        return new Redis({
          host: configService.get<string>("REDIS_HOST") || "localhost",
          port: parseInt(configService.get<string>("REDIS_PORT") || "6379", 10),
          password: configService.get<string>("REDIS_PASSWORD") || undefined,
          enableReadyCheck: true,
          maxRetriesPerRequest: 1,
          enableOfflineQueue: false, // Fail fast if Redis is down
          connectTimeout: 10000,
          retryStrategy: (times: number) => {
            // Exponential backoff: 50ms, 100ms, 200ms, ..., max 2s
            return Math.min(times * 50, 2000);
          },
        });
      },
      inject: [ConfigService],
    },
  ],
  exports: [REDIS_CLIENT],
})
export class RedisModule implements OnApplicationShutdown {
  private readonly logger = new Logger(RedisModule.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  async onApplicationShutdown(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      this.logger.warn(`Redis shutdown failed: ${error}`);
      this.redis.disconnect();
    }
  }
}
