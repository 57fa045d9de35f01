import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { NestExpressApplication } from "@nestjs/platform-express";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import * as packageJson from "../package.json";

async function bootstrap(): Promise<void> {
  const logger = new Logger("Bootstrap");
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: ["log", "error", "warn"],
  });

  app.disable("x-powered-by");
  configureApp(app);

  // Closes the DataSource and Redis on SIGTERM/SIGINT
  app.enableShutdownHooks();

  // Swagger/OpenAPI Documentation
  const config = new DocumentBuilder()
    .setTitle("WeatherLens API")
    .setDescription(
      "Current weather and daily forecasts for cities, ZIP codes, coordinates and landmarks, " +
        "with stored query history, exports and location media.",
    )
    .setVersion(packageJson.version)
    .addTag("health", "Liveness, database and Redis connectivity")
    .addTag("weather", "Current weather, forecasts, stored records and exports")
    .addTag("location", "Location classification, media and lookup history")
    .addTag("settings", "Key/value user settings")
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup("api", app, document, {
    customSiteTitle: "WeatherLens API Documentation",
  });

  const port = process.env.PORT || 3000;
  await app.listen(port);

  logger.log(`WeatherLens API running on: http://localhost:${port}/v1`);
  logger.log(`API Documentation: http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(
    "Failed to start application",
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
