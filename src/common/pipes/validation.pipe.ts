import { ValidationError, ValidationPipe } from '@nestjs/common';
import { FieldErrors, ValidationFailedException } from '../exceptions/app.exception';

/**
 * Flattens nested class-validator errors into one message per property path,
 * keeping the first failed constraint of each.
 */
export function flattenValidationErrors(errors: ValidationError[], parentPath = ''): FieldErrors {
  const result: FieldErrors = {};

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const messages = Object.values(error.constraints ?? {});
    if (messages.length > 0) {
      result[path] = messages[0];
    }
    if (error.children && error.children.length > 0) {
      Object.assign(result, flattenValidationErrors(error.children, path));
    }
  }

  return result;
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: (errors) => new ValidationFailedException(flattenValidationErrors(errors)),
  });
}
