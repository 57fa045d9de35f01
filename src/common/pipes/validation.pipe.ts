import { ValidationError as ClassValidatorError, ValidationPipe } from "@nestjs/common";
import { ValidationError } from "../errors/api-errors";

function collectMessages(errors: ClassValidatorError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectMessages(error.children ?? []),
  ]);
}

/**
 * Global validation pipe for DTOs.
 *
 * Shared by main.ts and the e2e tests so both reject input the same way:
 * the first constraint message becomes the error message, all of them
 * are listed under `details.errors`.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true, // Strip unknown properties
    forbidNonWhitelisted: true, // Throw error on unknown properties
    transform: true, // Auto-transform payloads to DTO instances
    transformOptions: {
      enableImplicitConversion: true,
    },
    exceptionFactory: (errors) => {
      const messages = collectMessages(errors);
      return new ValidationError(messages[0] ?? "Validation failed", {
        errors: messages,
      });
    },
  });
}
