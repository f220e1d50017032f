import { Task } from '../entities/task.entity';
import { TaskResponseDto } from '../dto/task-response.dto';
import { TaskCriteriaDto } from '../dto/task-criteria.dto';
import { createFilterCriteria, FilterCriteria } from '../specifications/filter-criteria';

export class TaskMapper {
  static toDto(task: Task): TaskResponseDto {
    return {
      id: task.id,
      title: task.title,
      description: task.description,
      status: task.status,
      priority: task.priority,
      userId: task.userId,
      isActive: task.isActive,
      dueDate: task.dueDate,
      createdAt: task.createdAt,
      updatedAt: task.updatedAt,
    };
  }

  /** The HTTP layer calls the owner `userId`; criteria call it `ownerId`. */
  static toCriteria(dto: TaskCriteriaDto): FilterCriteria {
    return createFilterCriteria({
      searchQuery: dto.searchQuery,
      status: dto.status,
      priority: dto.priority,
      ownerId: dto.userId,
      isActive: dto.isActive,
      dueDateFrom: dto.dueDateFrom,
      dueDateTo: dto.dueDateTo,
      createdAtFrom: dto.createdAtFrom,
      createdAtTo: dto.createdAtTo,
    });
  }
}
