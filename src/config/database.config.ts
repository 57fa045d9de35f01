import { ConfigService } from "@nestjs/config";

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
  logging: boolean;
  poolSize: number;
}

/**
 * Postgres connection settings (DB_* variables)
 *
 * @throws Error when NODE_ENV=test points at a database whose name lacks "test"
 */
export const getDatabaseConfig = (
  configService: ConfigService,
): DatabaseConfig => {
  const database = configService.get<string>("DB_DATABASE") || "weatherlens";

  if (
    configService.get<string>("NODE_ENV") === "test" &&
    !database.includes("test")
  ) {
    throw new Error(
      `Refusing to use DB_DATABASE="${database}" with NODE_ENV=test. Set DB_DATABASE=weatherlens_test.`,
    );
  }

  return {
    host: configService.get<string>("DB_HOST") || "localhost",
    port: parseInt(configService.get<string>("DB_PORT") || "5432", 10),
    username: configService.get<string>("DB_USERNAME") || "weatherlens",
    password: configService.get<string>("DB_PASSWORD") || "",
    database,
    synchronize: configService.get<string>("DB_SYNCHRONIZE") === "true",
    logging: configService.get<string>("DB_LOGGING") === "true",
    poolSize: parseInt(configService.get<string>("DB_POOL_SIZE") || "10", 10),
  };
};
