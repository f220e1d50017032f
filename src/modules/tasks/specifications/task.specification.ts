import { TaskPriority } from '../enums/task-priority.enum';
import { TaskStatus } from '../enums/task-status.enum';
import { FilterCriteria } from './filter-criteria';
import { TaskDateField, TaskPredicate } from './task-predicate';

const ALWAYS: TaskPredicate = { kind: 'always' };

const predicateKey = (predicate: TaskPredicate): string => JSON.stringify(predicate);

/**
 * Builds task predicates from optional criteria. Each builder returns the
 * always-true predicate when its input is missing, so unset criteria drop out
 * of a conjunction instead of excluding rows.
 */
export class TaskSpecification {
  static always(): TaskPredicate {
    return ALWAYS;
  }

  /**
   * Conjunction that flattens nested `and`s, drops tautologies and repeated
   * operands. `and()` is always-true and `and(p)` is `p`.
   */
  static and(...predicates: TaskPredicate[]): TaskPredicate {
    const seen = new Set<string>();
    const operands: TaskPredicate[] = [];

    for (const predicate of predicates.flatMap((p) => (p.kind === 'and' ? p.operands : [p]))) {
      if (predicate.kind === 'always') continue;
      const key = predicateKey(predicate);
      if (seen.has(key)) continue;
      seen.add(key);
      operands.push(predicate);
    }

    if (operands.length === 0) return ALWAYS;
    if (operands.length === 1) return operands[0];
    return { kind: 'and', operands };
  }

  /** Case-insensitive substring match on title or description. */
  static byTextSearch(query?: string | null): TaskPredicate {
    const text = query?.trim().toLowerCase();
    if (!text) return ALWAYS;
    return { kind: 'contains', fields: ['title', 'description'], text };
  }

  static byStatus(status?: TaskStatus | null): TaskPredicate {
    return status == null ? ALWAYS : { kind: 'equals', field: 'status', value: status };
  }

  static byPriority(priority?: TaskPriority | null): TaskPredicate {
    return priority == null ? ALWAYS : { kind: 'equals', field: 'priority', value: priority };
  }

  static byOwner(ownerId?: string | null): TaskPredicate {
    return ownerId == null ? ALWAYS : { kind: 'equals', field: 'userId', value: ownerId };
  }

  static byActive(isActive?: boolean | null): TaskPredicate {
    return isActive == null ? ALWAYS : { kind: 'equals', field: 'isActive', value: isActive };
  }

  /** Inclusive range; either bound may be left out. */
  static byDateRange(field: TaskDateField, from?: Date | null, to?: Date | null): TaskPredicate {
    return TaskSpecification.and(
      from == null ? ALWAYS : { kind: 'atLeast', field, value: from },
      to == null ? ALWAYS : { kind: 'atMost', field, value: to },
    );
  }

  static combine(criteria: FilterCriteria): TaskPredicate {
    return TaskSpecification.and(
      TaskSpecification.byTextSearch(criteria.searchQuery),
      TaskSpecification.byStatus(criteria.status),
      TaskSpecification.byPriority(criteria.priority),
      TaskSpecification.byOwner(criteria.ownerId),
      TaskSpecification.byActive(criteria.isActive),
      TaskSpecification.byDateRange('dueDate', criteria.dueDateFrom, criteria.dueDateTo),
      TaskSpecification.byDateRange('createdAt', criteria.createdAtFrom, criteria.createdAtTo),
    );
  }
}
