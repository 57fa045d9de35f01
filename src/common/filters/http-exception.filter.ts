import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { Request, Response } from "express";
import { ApiError, ErrorDetails } from "../errors/api-errors";

export interface ErrorResponseBody {
  status: "error";
  message: string;
  details?: ErrorDetails;
  code: number;
  stack?: string;
}

/**
 * Global exception filter rendering the `{ status: "error", ... }` envelope.
 * - 4xx: the error's own message and details
 * - 5xx from unknown errors: opaque message, only the error type is exposed
 * - Stack traces only in development
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);
  private readonly isDevelopment = process.env.NODE_ENV === "development";

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toBody(exception);

    if (body.code >= 500) {
      this.logger.error(
        `${request.method} ${request.url} - Status: ${body.code}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(
        `${request.method} ${request.url} - Status: ${body.code} - Message: ${body.message}`,
      );
    }

    if (this.isDevelopment && exception instanceof Error) {
      body.stack = exception.stack;
    }

    response.status(body.code).json(body);
  }

  toBody(exception: unknown): ErrorResponseBody {
    if (exception instanceof ApiError) {
      return {
        status: "error",
        message: exception.message,
        ...(exception.details && { details: exception.details }),
        code: exception.getStatus(),
      };
    }

    if (exception instanceof HttpException) {
      const exceptionResponse = exception.getResponse();
      let message = exception.message;

      if (typeof exceptionResponse === "string") {
        message = exceptionResponse;
      } else if (
        typeof exceptionResponse === "object" &&
        "message" in exceptionResponse
      ) {
        const raw = exceptionResponse.message;
        if (Array.isArray(raw)) {
          message = raw.join(", ");
        } else if (typeof raw === "string") {
          message = raw;
        }
      }

      return { status: "error", message, code: exception.getStatus() };
    }

    return {
      status: "error",
      message: "An unexpected error occurred",
      details: {
        type: exception instanceof Error ? exception.name : typeof exception,
      },
      code: HttpStatus.INTERNAL_SERVER_ERROR,
    };
  }
}
