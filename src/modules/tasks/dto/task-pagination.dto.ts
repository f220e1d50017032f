import { ApiProperty } from '@nestjs/swagger';
import { IsIn, IsOptional } from 'class-validator';
import { PaginationDto } from '../../../common/dto/pagination.dto';
import { PageRequest } from '../../../types/pagination.interface';
import { TASK_SORT_FIELDS, TaskSortField } from '../repositories/task.repository';

export class TaskPaginationDto extends PaginationDto {
  @ApiProperty({
    required: false,
    enum: TASK_SORT_FIELDS,
    default: 'createdAt',
    description: 'Sort field; priority sorts LOW to HIGH and status follows the task lifecycle',
  })
  @IsOptional()
  @IsIn(TASK_SORT_FIELDS)
  sortBy?: TaskSortField = 'createdAt';
}

export function toPageRequest(dto: TaskPaginationDto): PageRequest<TaskSortField> {
  return {
    page: dto.page ?? 1,
    limit: dto.limit ?? 10,
    sortBy: dto.sortBy ?? 'createdAt',
    sortOrder: dto.sortOrder ?? 'DESC',
  };
}
