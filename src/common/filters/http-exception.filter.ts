import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { QueryFailedError } from 'typeorm';
import { AppException, FieldErrors } from '../exceptions/app.exception';
import { ERROR_CODE_DETAILS, ErrorCode, errorCodeForStatus } from '../exceptions/error-code.enum';

export interface ErrorResponseBody {
  success: false;
  statusCode: number;
  errorCode: ErrorCode;
  message: string;
  error: string;
  errors?: FieldErrors;
  path: string;
  timestamp: string;
}

interface ResolvedError {
  status: number;
  errorCode: ErrorCode;
  message: string;
  errors?: FieldErrors;
}

// Postgres and SQLite report unique violations differently
const UNIQUE_VIOLATION = /unique|duplicate key/i;

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const resolved = this.resolve(exception);

    const isOperationalError = resolved.status < HttpStatus.INTERNAL_SERVER_ERROR;
    const stack = exception instanceof Error ? exception.stack : undefined;

    if (isOperationalError) {
      this.logger.warn(`Client Error: ${resolved.message} Path: ${request.url}`);
    } else {
      this.logger.error(`Server Error: ${this.describe(exception)} Path: ${request.url}`, stack);
    }

    const body: ErrorResponseBody = {
      success: false,
      statusCode: resolved.status,
      errorCode: resolved.errorCode,
      message: resolved.message,
      error: ERROR_CODE_DETAILS[resolved.errorCode].defaultMessage,
      path: request.url,
      timestamp: new Date().toISOString(),
    };
    if (resolved.errors && Object.keys(resolved.errors).length > 0) {
      body.errors = resolved.errors;
    }

    if (process.env.NODE_ENV === 'production' && !isOperationalError) {
      body.message = ERROR_CODE_DETAILS[resolved.errorCode].defaultMessage;
    }

    response.status(resolved.status).json(body);
  }

  private resolve(exception: unknown): ResolvedError {
    if (exception instanceof AppException) {
      return {
        status: exception.getStatus(),
        errorCode: exception.errorCode,
        message: exception.message,
        errors: exception.errors,
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return { status, errorCode: errorCodeForStatus(status), message: this.httpMessage(exception) };
    }

    if (exception instanceof QueryFailedError) {
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        errorCode: ErrorCode.DATABASE_ERROR,
        message: UNIQUE_VIOLATION.test(exception.message)
          ? 'A record with this value already exists.'
          : 'Database constraint violation. Please check your data.',
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      errorCode: ErrorCode.INTERNAL_SERVER_ERROR,
      message: 'An unexpected error occurred. Please try again later.',
    };
  }

  private httpMessage(exception: HttpException): string {
    const payload = exception.getResponse();
    if (typeof payload === 'string') return payload;

    const message: unknown = 'message' in payload ? payload.message : undefined;
    if (Array.isArray(message)) return message.join(', ');
    if (typeof message === 'string') return message;
    return exception.message;
  }

  private describe(exception: unknown): string {
    return exception instanceof Error ? exception.message : String(exception);
  }
}
