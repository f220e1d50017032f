import { ApiProperty } from '@nestjs/swagger';
import { TaskPriority } from '../enums/task-priority.enum';
import { TaskStatus } from '../enums/task-status.enum';

export class TaskStatisticsDto {
  @ApiProperty({ description: 'Total number of tasks', example: 12 })
  totalTasks!: number;

  @ApiProperty({
    description: 'Tasks grouped by status',
    example: { PENDING: 6, IN_PROGRESS: 3, COMPLETED: 2, CANCELLED: 1 },
  })
  byStatus!: Record<TaskStatus, number>;

  @ApiProperty({
    description: 'Tasks grouped by priority',
    example: { LOW: 4, MEDIUM: 5, HIGH: 3 },
  })
  byPriority!: Record<TaskPriority, number>;
}
