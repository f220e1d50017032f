import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { TaskPaginationDto } from './task-pagination.dto';

export class TaskSearchQueryDto extends TaskPaginationDto {
  @ApiProperty({ description: 'Text matched against title and description' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  query!: string;
}
