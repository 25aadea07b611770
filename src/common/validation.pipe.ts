import { BadRequestException, ValidationError, ValidationPipe } from '@nestjs/common';
import { ErrorKind, errorBody } from './errors';

function flattenConstraints(errors: ValidationError[]): string[] {
  return errors.flatMap(error => [
    ...Object.values(error.constraints ?? {}),
    ...flattenConstraints(error.children ?? []),
  ]);
}

/**
 * DTO validation reporting failures as a VALIDATION_ERROR body. Unknown
 * properties are stripped, and rejected only when `forbidUnknown` is set.
 */
export function createValidationPipe(forbidUnknown: boolean): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: forbidUnknown,
    transform: true,
    exceptionFactory: errors =>
      new BadRequestException(
        errorBody(ErrorKind.VALIDATION_ERROR, flattenConstraints(errors).join('; ')),
      ),
  });
}

// Request bodies are strict; query strings tolerate extras such as cache-busters.
export const bodyValidationPipe = createValidationPipe(true);
export const queryValidationPipe = createValidationPipe(false);
