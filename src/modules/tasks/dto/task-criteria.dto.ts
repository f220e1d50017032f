import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsBoolean, IsDate, IsEnum, IsOptional, IsString, IsUUID, MaxLength } from 'class-validator';
import { ToBoolean } from '../../../common/utils/transform.util';
import { TaskPriority } from '../enums/task-priority.enum';
import { TaskStatus } from '../enums/task-status.enum';

/** Filter fields shared by the query-string listing and the JSON search body. */
export class TaskCriteriaDto {
  @ApiPropertyOptional({ description: 'Case-insensitive text matched against title and description' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  searchQuery?: string;

  @ApiPropertyOptional({ enum: TaskStatus })
  @IsOptional()
  @IsEnum(TaskStatus)
  status?: TaskStatus;

  @ApiPropertyOptional({ enum: TaskPriority })
  @IsOptional()
  @IsEnum(TaskPriority)
  priority?: TaskPriority;

  @ApiPropertyOptional({ format: 'uuid', description: 'Owner of the task' })
  @IsOptional()
  @IsUUID()
  userId?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  isActive?: boolean;

  @ApiPropertyOptional({ type: String, format: 'date-time', description: 'Due date lower bound (inclusive)' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  dueDateFrom?: Date;

  @ApiPropertyOptional({ type: String, format: 'date-time', description: 'Due date upper bound (inclusive)' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  dueDateTo?: Date;

  @ApiPropertyOptional({ type: String, format: 'date-time', description: 'Creation time lower bound (inclusive)' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  createdAtFrom?: Date;

  @ApiPropertyOptional({ type: String, format: 'date-time', description: 'Creation time upper bound (inclusive)' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  createdAtTo?: Date;
}
