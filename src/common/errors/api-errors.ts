import { HttpException, HttpStatus } from "@nestjs/common";

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for errors that map onto the API error envelope.
 *
 * `details` ends up verbatim in the response body, so keep it to
 * plain JSON-serializable values.
 */
export class ApiError extends HttpException {
  readonly details?: ErrorDetails;

  constructor(message: string, status: HttpStatus, details?: ErrorDetails) {
    super({ message, ...(details && { details }) }, status);
    this.details = details;
  }
}

/**
 * Bad input shape or range. Client fault, never retried.
 */
export class ValidationError extends ApiError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, HttpStatus.BAD_REQUEST, details);
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, HttpStatus.NOT_FOUND, details);
  }
}

/**
 * Geocoding returned nothing usable for the query.
 */
export class LocationNotFoundError extends NotFoundError {
  constructor(location: string) {
    super(`Location not found: ${location}`, { location });
  }
}

/**
 * Network or third-party failure (transport error, non-2xx status).
 * `details.service` names the provider.
 */
export class ExternalApiError extends ApiError {
  readonly service: string;

  constructor(message: string, service: string, details?: ErrorDetails) {
    super(message, HttpStatus.BAD_GATEWAY, { service, ...details });
    this.service = service;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
