import { TaskPriority } from '../enums/task-priority.enum';
import { TaskStatus } from '../enums/task-status.enum';

/**
 * Every criterion a task listing can be narrowed by. A property that is not
 * present places no constraint on the result; `isActive: false` is a value,
 * not an absence.
 */
export interface FilterCriteria {
  readonly searchQuery?: string;
  readonly status?: TaskStatus;
  readonly priority?: TaskPriority;
  readonly ownerId?: string;
  readonly isActive?: boolean;
  readonly dueDateFrom?: Date;
  readonly dueDateTo?: Date;
  readonly createdAtFrom?: Date;
  readonly createdAtTo?: Date;
}

/** Loose shape accepted from callers: `null` counts as absent. */
export type FilterCriteriaInput = {
  [K in keyof FilterCriteria]?: FilterCriteria[K] | null;
};

type MutableFilterCriteria = {
  -readonly [K in keyof FilterCriteria]: FilterCriteria[K];
};

/**
 * Normalizes raw input into a frozen {@link FilterCriteria}: text is trimmed,
 * blank text and `null` are dropped so they read as "unset".
 */
export function createFilterCriteria(input: FilterCriteriaInput = {}): FilterCriteria {
  const criteria: MutableFilterCriteria = {};

  const searchQuery = input.searchQuery?.trim();
  if (searchQuery) criteria.searchQuery = searchQuery;

  const ownerId = input.ownerId?.trim();
  if (ownerId) criteria.ownerId = ownerId;

  if (input.status != null) criteria.status = input.status;
  if (input.priority != null) criteria.priority = input.priority;
  if (input.isActive != null) criteria.isActive = input.isActive;
  if (input.dueDateFrom != null) criteria.dueDateFrom = input.dueDateFrom;
  if (input.dueDateTo != null) criteria.dueDateTo = input.dueDateTo;
  if (input.createdAtFrom != null) criteria.createdAtFrom = input.createdAtFrom;
  if (input.createdAtTo != null) criteria.createdAtTo = input.createdAtTo;

  return Object.freeze(criteria);
}
