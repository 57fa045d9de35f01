import { INestApplication } from "@nestjs/common";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";
import { LoggingInterceptor } from "./common/interceptors/logging.interceptor";
import { createValidationPipe } from "./common/pipes/validation.pipe";

/**
 * Global pipes, filters, interceptors and the route prefix.
 * Applied by main.ts and by the e2e tests.
 */
export function configureApp(app: INestApplication): void {
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());

  app.enableCors({
    origin: process.env.NODE_ENV === "production" ? false : "*",
  });

  app.setGlobalPrefix("v1");
}
