import { Injectable, Logger } from '@nestjs/common';
import { AuditLogService } from '../../common/audit/audit-log.service';
import { TaskPaginationDto, toPageRequest } from './dto/task-pagination.dto';
import { InvalidRequestException, ResourceNotFoundException } from '../../common/exceptions/app.exception';
import { PaginatedResponse } from '../../types/pagination.interface';
import { UsersService } from '../users/users.service';
import { CreateTaskDto } from './dto/create-task.dto';
import { TaskCriteriaDto } from './dto/task-criteria.dto';
import { TaskFilterDto } from './dto/task-filter.dto';
import { TaskResponseDto } from './dto/task-response.dto';
import { TaskStatisticsDto } from './dto/task-statistics.dto';
import { UpdateTaskDto } from './dto/update-task.dto';
import { Task } from './entities/task.entity';
import { TaskPriority } from './enums/task-priority.enum';
import { TaskStatus } from './enums/task-status.enum';
import { TaskMapper } from './mappers/task.mapper';
import { TaskRepository } from './repositories/task.repository';
import { createFilterCriteria, FilterCriteria } from './specifications/filter-criteria';
import { TaskPredicate } from './specifications/task-predicate';
import { TaskSpecification } from './specifications/task.specification';

type TaskChanges = Record<string, { from: unknown; to: unknown }>;

const UPDATABLE_FIELDS = ['title', 'description', 'status', 'priority', 'isActive', 'dueDate'] as const;

@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);

  constructor(
    private readonly taskRepository: TaskRepository,
    private readonly usersService: UsersService,
    private readonly auditLogService: AuditLogService,
  ) {}

  async create(createTaskDto: CreateTaskDto): Promise<TaskResponseDto> {
    if (!(await this.usersService.exists(createTaskDto.userId))) {
      throw new ResourceNotFoundException(`User not found with id: ${createTaskDto.userId}`);
    }

    const task = this.taskRepository.create({
      title: createTaskDto.title,
      description: createTaskDto.description ?? null,
      status: createTaskDto.status ?? TaskStatus.PENDING,
      priority: createTaskDto.priority ?? TaskPriority.MEDIUM,
      dueDate: createTaskDto.dueDate ?? null,
      userId: createTaskDto.userId,
      isActive: true,
    });
    const saved = await this.taskRepository.save(task);

    this.logger.log(`Created task ${saved.id} for user ${saved.userId}`);
    this.auditLogService.logTaskCreated(saved.id, saved.userId, saved.title);
    return TaskMapper.toDto(saved);
  }

  async findOne(id: string): Promise<TaskResponseDto> {
    return TaskMapper.toDto(await this.getEntity(id));
  }

  /** Lists tasks matching every criterion present in the query. */
  async findAll(filter: TaskFilterDto): Promise<PaginatedResponse<TaskResponseDto>> {
    return this.findByCriteria(TaskMapper.toCriteria(filter), filter);
  }

  async search(criteria: TaskCriteriaDto, pagination: TaskPaginationDto): Promise<PaginatedResponse<TaskResponseDto>> {
    return this.findByCriteria(TaskMapper.toCriteria(criteria), pagination);
  }

  async searchByQuery(query: string, pagination: TaskPaginationDto): Promise<PaginatedResponse<TaskResponseDto>> {
    return this.findPage(TaskSpecification.byTextSearch(query), pagination);
  }

  async findActive(pagination: TaskPaginationDto): Promise<PaginatedResponse<TaskResponseDto>> {
    return this.findPage(TaskSpecification.byActive(true), pagination);
  }

  async findByOwner(
    userId: string,
    pagination: TaskPaginationDto,
    activeOnly = false,
  ): Promise<PaginatedResponse<TaskResponseDto>> {
    if (!(await this.usersService.exists(userId))) {
      throw new ResourceNotFoundException(`User not found with id: ${userId}`);
    }

    return this.findByCriteria(createFilterCriteria({ ownerId: userId, isActive: activeOnly ? true : null }), pagination);
  }

  async update(id: string, updateTaskDto: UpdateTaskDto): Promise<TaskResponseDto> {
    const task = await this.getEntity(id);
    const changes = this.applyChanges(task, updateTaskDto);

    if (Object.keys(changes).length === 0) {
      return TaskMapper.toDto(task);
    }

    const saved = await this.taskRepository.save(task);
    this.logger.log(`Updated task ${id}: ${Object.keys(changes).join(', ')}`);
    this.auditLogService.logTaskUpdated(id, changes);
    return TaskMapper.toDto(saved);
  }

  /** Deactivates the task; it stays queryable with `isActive=false`. */
  async remove(id: string): Promise<void> {
    const task = await this.getEntity(id);
    task.isActive = false;
    await this.taskRepository.save(task);
    this.auditLogService.logTaskDeleted(id, false);
  }

  async hardRemove(id: string): Promise<void> {
    const task = await this.getEntity(id);
    await this.taskRepository.remove(task);
    this.auditLogService.logTaskDeleted(id, true);
  }

  async existsByTitle(title: string): Promise<boolean> {
    return this.taskRepository.existsByTitle(title);
  }

  async getStats(userId?: string): Promise<TaskStatisticsDto> {
    const rows = await this.taskRepository.countByStatusAndPriority(TaskSpecification.byOwner(userId));

    const stats: TaskStatisticsDto = {
      totalTasks: 0,
      byStatus: {
        [TaskStatus.PENDING]: 0,
        [TaskStatus.IN_PROGRESS]: 0,
        [TaskStatus.COMPLETED]: 0,
        [TaskStatus.CANCELLED]: 0,
      },
      byPriority: { [TaskPriority.LOW]: 0, [TaskPriority.MEDIUM]: 0, [TaskPriority.HIGH]: 0 },
    };
    for (const row of rows) {
      stats.totalTasks += row.total;
      stats.byStatus[row.status] += row.total;
      stats.byPriority[row.priority] += row.total;
    }
    return stats;
  }

  private async findByCriteria(
    criteria: FilterCriteria,
    pagination: TaskPaginationDto,
  ): Promise<PaginatedResponse<TaskResponseDto>> {
    this.assertOrderedRange('dueDateFrom', criteria.dueDateFrom, criteria.dueDateTo);
    this.assertOrderedRange('createdAtFrom', criteria.createdAtFrom, criteria.createdAtTo);
    return this.findPage(TaskSpecification.combine(criteria), pagination);
  }

  private async findPage(
    predicate: TaskPredicate,
    pagination: TaskPaginationDto,
  ): Promise<PaginatedResponse<TaskResponseDto>> {
    const page = toPageRequest(pagination);
    const [tasks, total] = await this.taskRepository.findBySpecification(predicate, page);

    return {
      data: tasks.map(TaskMapper.toDto),
      meta: {
        total,
        page: page.page,
        limit: page.limit,
        totalPages: Math.ceil(total / page.limit),
      },
    };
  }

  private assertOrderedRange(field: string, from?: Date, to?: Date): void {
    if (from && to && from.getTime() > to.getTime()) {
      throw new InvalidRequestException(`${field} must not be after the end of the range`, field);
    }
  }

  private async getEntity(id: string): Promise<Task> {
    const task = await this.taskRepository.findOneBy({ id });
    if (!task) {
      throw new ResourceNotFoundException(`Task not found with id: ${id}`);
    }
    return task;
  }

  private applyChanges(task: Task, dto: UpdateTaskDto): TaskChanges {
    const changes: TaskChanges = {};

    for (const field of UPDATABLE_FIELDS) {
      const next = dto[field];
      if (next === undefined) continue;

      const previous = task[field];
      const same =
        previous instanceof Date && next instanceof Date ? previous.getTime() === next.getTime() : previous === next;
      if (same) continue;

      changes[field] = { from: previous, to: next };
      this.assign(task, field, next);
    }

    return changes;
  }

  private assign<K extends (typeof UPDATABLE_FIELDS)[number]>(task: Task, field: K, value: Task[K]): void {
    task[field] = value;
  }
}
