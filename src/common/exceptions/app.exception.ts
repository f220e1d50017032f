import { HttpException } from '@nestjs/common';
import { ERROR_CODE_DETAILS, ErrorCode } from './error-code.enum';

export type FieldErrors = Record<string, string>;

/** Base for exceptions that carry a machine-readable {@link ErrorCode}. */
export class AppException extends HttpException {
  constructor(
    readonly errorCode: ErrorCode,
    message: string,
    readonly errors?: FieldErrors,
  ) {
    super(
      { errorCode, message, error: ERROR_CODE_DETAILS[errorCode].defaultMessage, errors },
      ERROR_CODE_DETAILS[errorCode].status,
    );
  }
}

export class ResourceNotFoundException extends AppException {
  constructor(message: string) {
    super(ErrorCode.RESOURCE_NOT_FOUND, message);
  }
}

export class UserAlreadyExistsException extends AppException {
  constructor(message: string) {
    super(ErrorCode.USER_ALREADY_EXISTS, message);
  }
}

/** A single request parameter is unusable; `field` names it in the response. */
export class InvalidRequestException extends AppException {
  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(ErrorCode.BAD_REQUEST, `Invalid request: ${message}`, field ? { [field]: message } : undefined);
  }
}

export class ValidationFailedException extends AppException {
  constructor(errors: FieldErrors) {
    super(ErrorCode.VALIDATION_ERROR, 'Validation failed. Please check your input.', errors);
  }
}
