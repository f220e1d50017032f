import { Task } from '../entities/task.entity';
import { TaskPriority } from '../enums/task-priority.enum';
import { TaskStatus } from '../enums/task-status.enum';

export type TaskTextField = 'title' | 'description';
export type TaskDateField = 'dueDate' | 'createdAt';

interface TaskEqualityValues {
  status: TaskStatus;
  priority: TaskPriority;
  userId: string;
  isActive: boolean;
}

export type TaskEqualityField = keyof TaskEqualityValues;

/** The part of a task a predicate can look at. */
export type FilterableTask = Pick<Task, TaskTextField | TaskDateField | TaskEqualityField>;

type EqualsPredicate = {
  [F in TaskEqualityField]: { readonly kind: 'equals'; readonly field: F; readonly value: TaskEqualityValues[F] };
}[TaskEqualityField];

/**
 * Storage-independent boolean condition over task fields. `always` is the
 * identity of `and`; `contains` carries its text already lower-cased.
 */
export type TaskPredicate =
  | { readonly kind: 'always' }
  | EqualsPredicate
  | { readonly kind: 'atLeast'; readonly field: TaskDateField; readonly value: Date }
  | { readonly kind: 'atMost'; readonly field: TaskDateField; readonly value: Date }
  | { readonly kind: 'contains'; readonly fields: readonly TaskTextField[]; readonly text: string }
  | { readonly kind: 'and'; readonly operands: readonly TaskPredicate[] };

/**
 * Checks a task against a predicate in memory. A null field never satisfies
 * a comparison.
 */
export function evaluate(predicate: TaskPredicate, task: FilterableTask): boolean {
  switch (predicate.kind) {
    case 'always':
      return true;
    case 'equals':
      return task[predicate.field] === predicate.value;
    case 'atLeast': {
      const value = task[predicate.field];
      return value !== null && value.getTime() >= predicate.value.getTime();
    }
    case 'atMost': {
      const value = task[predicate.field];
      return value !== null && value.getTime() <= predicate.value.getTime();
    }
    case 'contains':
      return predicate.fields.some((field) => {
        const value = task[field];
        return value !== null && value.toLowerCase().includes(predicate.text);
      });
    case 'and':
      return predicate.operands.every((operand) => evaluate(operand, task));
  }
}
