import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsUUID } from 'class-validator';

export class TaskStatsQueryDto {
  @ApiPropertyOptional({ format: 'uuid', description: 'Restrict the counts to one owner' })
  @IsOptional()
  @IsUUID()
  userId?: string;
}
