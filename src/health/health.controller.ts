import { Controller, Get, Inject } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { InjectDataSource } from "@nestjs/typeorm";
import { DataSource } from "typeorm";
import { Redis } from "ioredis";
import { REDIS_CLIENT } from "../common/redis/redis.module";
import * as packageJson from "../../package.json";

interface HealthStatus {
  status: "ok" | "degraded";
  timestamp: string;
  uptime: number;
  version: string;
  services: {
    database: {
      status: "connected" | "disconnected";
      type: string;
    };
    redis: {
      status: "connected" | "disconnected";
    };
  };
}

@ApiTags("health")
@Controller("health")
export class HealthController {
  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
  ) {}

  @Get()
  @ApiOperation({
    summary: "System health check",
    description:
      "Liveness plus database and Redis connectivity. Redis is only a cache, so losing it degrades but doesn't fail the service.",
  })
  @ApiResponse({
    status: 200,
    description: "System health status retrieved successfully",
    schema: {
      type: "object",
      properties: {
        status: { type: "string", example: "ok" },
        timestamp: { type: "string", format: "date-time" },
        uptime: { type: "number" },
        version: { type: "string" },
        services: { type: "object" },
      },
    },
  })
  async getHealth(): Promise<HealthStatus> {
    const [dbConnected, redisConnected] = await Promise.all([
      this.checkDatabaseConnection(),
      this.checkRedisConnection(),
    ]);

    return {
      status: dbConnected && redisConnected ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
      version: packageJson.version,
      services: {
        database: {
          status: dbConnected ? "connected" : "disconnected",
          type: "PostgreSQL",
        },
        redis: {
          status: redisConnected ? "connected" : "disconnected",
        },
      },
    };
  }

  @Get("ping")
  ping(): { message: string; timestamp: string } {
    return {
      message: "pong",
      timestamp: new Date().toISOString(),
    };
  }

  private async checkDatabaseConnection(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }
    try {
      await this.dataSource.query("SELECT 1");
      return true;
    } catch {
      return false;
    }
  }

  private async checkRedisConnection(): Promise<boolean> {
    try {
      await this.redis.ping();
      return true;
    } catch {
      return false;
    }
  }
}
