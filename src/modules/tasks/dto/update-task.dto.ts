import { ApiProperty, OmitType, PartialType } from '@nestjs/swagger';
import { IsBoolean, IsOptional } from 'class-validator';
import { ToBoolean } from '../../../common/utils/transform.util';
import { CreateTaskDto } from './create-task.dto';

// Ownership cannot change after creation.
export class UpdateTaskDto extends PartialType(OmitType(CreateTaskDto, ['userId'] as const)) {
  @ApiProperty({ required: false })
  @IsOptional()
  @ToBoolean()
  @IsBoolean()
  isActive?: boolean;
}
