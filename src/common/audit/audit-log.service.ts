import { Injectable, Logger } from '@nestjs/common';

export const SLOW_OPERATION_THRESHOLD_MS = 1000;

type AuditValue = string | number | boolean | null | undefined;

/**
 * Business-event log. Every line is a `key=value | key=value` record written
 * under the `AUDIT` context so it can be filtered out of the application log.
 */
@Injectable()
export class AuditLogService {
  private readonly logger = new Logger('AUDIT');

  logTaskCreated(taskId: string, userId: string, title: string): void {
    this.logger.log(this.format('TASK_CREATED', { taskId, userId, title }));
  }

  logTaskUpdated(taskId: string, changes: Record<string, unknown>): void {
    this.logger.log(this.format('TASK_UPDATED', { taskId, changes: JSON.stringify(changes) }));
  }

  logTaskDeleted(taskId: string, hard: boolean): void {
    this.logger.log(this.format('TASK_DELETED', { taskId, hard }));
  }

  logUserCreated(userId: string, username: string): void {
    this.logger.log(this.format('USER_CREATED', { userId, username }));
  }

  logUserDeleted(userId: string, hard: boolean): void {
    this.logger.log(this.format('USER_DELETED', { userId, hard }));
  }

  logPerformanceMetric(operation: string, durationMs: number): void {
    const line = this.format('PERFORMANCE', { operation, durationMs });
    if (durationMs > SLOW_OPERATION_THRESHOLD_MS) {
      this.logger.warn(`${line} | slow=true`);
    } else {
      this.logger.debug(line);
    }
  }

  private format(event: string, fields: Record<string, AuditValue>): string {
    const pairs = Object.entries(fields)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${value}`);
    return [`event=${event}`, ...pairs].join(' | ');
  }
}
