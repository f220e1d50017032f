import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsOptional } from 'class-validator';
import { TaskPaginationDto } from './task-pagination.dto';
import { ToBoolean } from '../../../common/utils/transform.util';

export class OwnerTasksQueryDto extends TaskPaginationDto {
  @ApiPropertyOptional({ default: false, description: 'Only return tasks that have not been deactivated' })
  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  activeOnly?: boolean = false;
}
