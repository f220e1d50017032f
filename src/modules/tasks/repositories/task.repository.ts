import { Injectable } from '@nestjs/common';
import { DataSource, Repository } from 'typeorm';
import { Task } from '../entities/task.entity';
import { TaskPriority } from '../enums/task-priority.enum';
import { TaskStatus } from '../enums/task-status.enum';
import { TaskPredicate } from '../specifications/task-predicate';
import { compilePredicate } from '../specifications/task-predicate.compiler';
import { PageRequest } from '../../../types/pagination.interface';

export const TASK_SORT_FIELDS = ['createdAt', 'updatedAt', 'dueDate', 'priority', 'status', 'title'] as const;
export type TaskSortField = (typeof TASK_SORT_FIELDS)[number];

export interface TaskCountRow {
  status: TaskStatus;
  priority: TaskPriority;
  total: number;
}

const ALIAS = 'task';

// Enum columns sort by rank, not by their stored names.
const SORT_RANKS: Partial<Record<TaskSortField, readonly string[]>> = {
  priority: [TaskPriority.LOW, TaskPriority.MEDIUM, TaskPriority.HIGH],
  status: [TaskStatus.PENDING, TaskStatus.IN_PROGRESS, TaskStatus.COMPLETED, TaskStatus.CANCELLED],
};

function rankExpression(field: TaskSortField, ranks: readonly string[]): string {
  const cases = ranks.map((value, index) => `WHEN '${value}' THEN ${index}`).join(' ');
  return `CASE ${ALIAS}.${field} ${cases} END`;
}

@Injectable()
export class TaskRepository extends Repository<Task> {
  constructor(dataSource: DataSource) {
    super(Task, dataSource.createEntityManager());
  }

  async findBySpecification(predicate: TaskPredicate, page: PageRequest<TaskSortField>): Promise<[Task[], number]> {
    const { where, parameters } = compilePredicate(predicate, ALIAS);

    const query = this.createQueryBuilder(ALIAS).where(where, parameters);
    const ranks = SORT_RANKS[page.sortBy];
    if (ranks) {
      query.addSelect(rankExpression(page.sortBy, ranks), 'sort_rank').orderBy('sort_rank', page.sortOrder);
    } else {
      query.orderBy(`${ALIAS}.${page.sortBy}`, page.sortOrder);
    }

    return query
      .addOrderBy(`${ALIAS}.id`, 'ASC')
      .skip((page.page - 1) * page.limit)
      .take(page.limit)
      .getManyAndCount();
  }

  async countByStatusAndPriority(predicate: TaskPredicate): Promise<TaskCountRow[]> {
    const { where, parameters } = compilePredicate(predicate, ALIAS);

    const rows = await this.createQueryBuilder(ALIAS)
      .select(`${ALIAS}.status`, 'status')
      .addSelect(`${ALIAS}.priority`, 'priority')
      .addSelect('COUNT(*)', 'total')
      .where(where, parameters)
      .groupBy(`${ALIAS}.status`)
      .addGroupBy(`${ALIAS}.priority`)
      .getRawMany<{ status: TaskStatus; priority: TaskPriority; total: string | number }>();

    // pg returns COUNT(*) as a string
    return rows.map((row) => ({ status: row.status, priority: row.priority, total: Number(row.total) }));
  }

  async existsByTitle(title: string): Promise<boolean> {
    return this.existsBy({ title });
  }
}
