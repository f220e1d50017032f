import { IntersectionType } from '@nestjs/swagger';
import { TaskPaginationDto } from './task-pagination.dto';
import { TaskCriteriaDto } from './task-criteria.dto';

export class TaskFilterDto extends IntersectionType(TaskPaginationDto, TaskCriteriaDto) {}
