import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  Logger,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { Request, Response } from "express";

const SLOW_REQUEST_MS = 1000;

/**
 * Request log for the interesting cases only: failed requests, slow
 * requests (mostly provider latency), writes and file downloads.
 * Plain successful lookups are not logged.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger("HTTP");

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const { method, originalUrl } = request;
    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const elapsed = Date.now() - startTime;
          const isSlow = elapsed > SLOW_REQUEST_MS;
          const isWriteOrDownload =
            method !== "GET" ||
            originalUrl.includes("/export") ||
            originalUrl.includes("/report");

          if (isSlow || isWriteOrDownload) {
            this.logger.log(
              `${isSlow ? "🐌" : "📝"} ${method} ${originalUrl} ${response.statusCode} - ${elapsed}ms`,
            );
          }
        },
        error: (error: unknown) => {
          const status =
            error instanceof HttpException ? error.getStatus() : 500;
          this.logger.log(
            `❌ ${method} ${originalUrl} ${status} - ${Date.now() - startTime}ms`,
          );
        },
      }),
    );
  }
}
