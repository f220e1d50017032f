import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { AuditLogService } from '../audit/audit-log.service';

const SENSITIVE_FIELDS = ['password', 'token', 'authorization'];
const MASK = '*****';

/** Masks sensitive top-level fields of a request body before it is logged. */
export function sanitizeBody(body: unknown): unknown {
  if (!body || typeof body !== 'object' || Array.isArray(body)) return body;

  const sanitized: Record<string, unknown> = Object.fromEntries(Object.entries(body));
  for (const field of SENSITIVE_FIELDS) {
    if (sanitized[field] !== undefined) {
      sanitized[field] = MASK;
    }
  }
  return sanitized;
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  constructor(private readonly auditLogService: AuditLogService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();
    const { method, originalUrl, body } = request;
    const operation = `${method} ${originalUrl}`;
    const startedAt = Date.now();

    this.logger.log(`→ ${operation}`);
    const sanitizedBody = sanitizeBody(body);
    if (sanitizedBody && typeof sanitizedBody === 'object' && Object.keys(sanitizedBody).length > 0) {
      this.logger.debug(`Body: ${JSON.stringify(sanitizedBody)}`);
    }

    return next.handle().pipe(
      tap({
        next: () => {
          const duration = Date.now() - startedAt;
          this.logger.log(`← ${operation} ${response.statusCode} - ${duration}ms`);
          this.auditLogService.logPerformanceMetric(operation, duration);
        },
        error: (error: unknown) => {
          const duration = Date.now() - startedAt;
          const message = error instanceof Error ? error.message : String(error);
          this.logger.warn(`✕ ${operation} - ${duration}ms - ${message}`);
          this.auditLogService.logPerformanceMetric(operation, duration);
        },
      }),
    );
  }
}
