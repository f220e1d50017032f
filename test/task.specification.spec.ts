import { TaskPriority } from '../src/modules/tasks/enums/task-priority.enum';
import { TaskStatus } from '../src/modules/tasks/enums/task-status.enum';
import { createFilterCriteria, FilterCriteriaInput } from '../src/modules/tasks/specifications/filter-criteria';
import { evaluate, FilterableTask, TaskPredicate } from '../src/modules/tasks/specifications/task-predicate';
import { TaskSpecification } from '../src/modules/tasks/specifications/task.specification';

const OWNER_A = '4f6a9c2e-1b3d-4e5f-8a7b-9c0d1e2f3a4b';
const OWNER_B = '7d8e9f0a-2b3c-4d5e-9f6a-7b8c9d0e1f2a';

function task(overrides: Partial<FilterableTask> = {}): FilterableTask {
  return {
    title: 'Untitled',
    description: null,
    status: TaskStatus.PENDING,
    priority: TaskPriority.MEDIUM,
    userId: OWNER_A,
    isActive: true,
    dueDate: null,
    createdAt: new Date('2024-01-10T08:00:00.000Z'),
    ...overrides,
  };
}

const tasks: FilterableTask[] = [
  task({ title: 'Buy milk', status: TaskStatus.COMPLETED, priority: TaskPriority.HIGH }),
  task({ title: 'Errands', description: 'remember to buy bread', dueDate: new Date('2024-01-15T00:00:00.000Z') }),
  task({ title: 'Clean house', status: TaskStatus.COMPLETED, priority: TaskPriority.LOW, userId: OWNER_B }),
  task({ title: 'File taxes', isActive: false, dueDate: new Date('2024-02-01T00:00:00.000Z') }),
  task({ title: 'Call plumber', status: TaskStatus.IN_PROGRESS, createdAt: new Date('2024-03-05T12:00:00.000Z') }),
];

const matching = (predicate: TaskPredicate): string[] =>
  tasks.filter((candidate) => evaluate(predicate, candidate)).map((candidate) => candidate.title);

const allTitles = tasks.map((candidate) => candidate.title);

describe('TaskSpecification', () => {
  describe('and', () => {
    it('returns the tautology when given no operands', () => {
      expect(TaskSpecification.and()).toEqual({ kind: 'always' });
    });

    it('returns a lone operand unchanged', () => {
      const byStatus = TaskSpecification.byStatus(TaskStatus.COMPLETED);
      expect(TaskSpecification.and(byStatus)).toBe(byStatus);
    });

    it('treats the tautology as its identity', () => {
      const byStatus = TaskSpecification.byStatus(TaskStatus.COMPLETED);
      expect(TaskSpecification.and(byStatus, TaskSpecification.always())).toEqual(byStatus);
      expect(TaskSpecification.and(TaskSpecification.always(), byStatus)).toEqual(byStatus);
    });

    it('flattens nested conjunctions so grouping does not matter', () => {
      const a = TaskSpecification.byStatus(TaskStatus.COMPLETED);
      const b = TaskSpecification.byPriority(TaskPriority.HIGH);
      const c = TaskSpecification.byOwner(OWNER_A);

      const left = TaskSpecification.and(TaskSpecification.and(a, b), c);
      const right = TaskSpecification.and(a, TaskSpecification.and(b, c));

      expect(left).toEqual({ kind: 'and', operands: [a, b, c] });
      expect(right).toEqual(left);
    });

    it('drops repeated operands', () => {
      const a = TaskSpecification.byStatus(TaskStatus.COMPLETED);
      expect(TaskSpecification.and(a, TaskSpecification.byStatus(TaskStatus.COMPLETED))).toEqual(a);
    });
  });

  describe('single criteria', () => {
    it.each([
      ['byTextSearch', TaskSpecification.byTextSearch(undefined)],
      ['byTextSearch with null', TaskSpecification.byTextSearch(null)],
      ['byTextSearch with blank text', TaskSpecification.byTextSearch('   ')],
      ['byStatus', TaskSpecification.byStatus(undefined)],
      ['byPriority', TaskSpecification.byPriority(null)],
      ['byOwner', TaskSpecification.byOwner(undefined)],
      ['byActive', TaskSpecification.byActive(null)],
      ['byDateRange', TaskSpecification.byDateRange('dueDate', undefined, null)],
    ])('%s without input is the tautology', (_name, predicate) => {
      expect(predicate).toEqual({ kind: 'always' });
    });

    it('lower-cases and trims the search text', () => {
      expect(TaskSpecification.byTextSearch('  Buy ')).toEqual({
        kind: 'contains',
        fields: ['title', 'description'],
        text: 'buy',
      });
    });

    it('keeps an explicit false for the active flag', () => {
      const predicate = TaskSpecification.byActive(false);
      expect(predicate).toEqual({ kind: 'equals', field: 'isActive', value: false });
      expect(matching(predicate)).toEqual(['File taxes']);
    });

    it('bounds only the side that is given', () => {
      const from = new Date('2024-01-20T00:00:00.000Z');
      expect(TaskSpecification.byDateRange('dueDate', from)).toEqual({ kind: 'atLeast', field: 'dueDate', value: from });
      expect(matching(TaskSpecification.byDateRange('dueDate', from))).toEqual(['File taxes']);
      expect(matching(TaskSpecification.byDateRange('dueDate', undefined, from))).toEqual(['Errands']);
    });

    it('filters on creation time', () => {
      const predicate = TaskSpecification.byDateRange('createdAt', new Date('2024-03-01T00:00:00.000Z'));
      expect(matching(predicate)).toEqual(['Call plumber']);
    });
  });

  describe('combine', () => {
    it('matches every task when all criteria are absent', () => {
      const predicate = TaskSpecification.combine(createFilterCriteria());
      expect(predicate).toEqual({ kind: 'always' });
      expect(matching(predicate)).toEqual(allTitles);
    });

    it.each<[string, FilterCriteriaInput, TaskPredicate]>([
      ['searchQuery', { searchQuery: 'milk' }, TaskSpecification.byTextSearch('milk')],
      ['status', { status: TaskStatus.COMPLETED }, TaskSpecification.byStatus(TaskStatus.COMPLETED)],
      ['priority', { priority: TaskPriority.LOW }, TaskSpecification.byPriority(TaskPriority.LOW)],
      ['ownerId', { ownerId: OWNER_B }, TaskSpecification.byOwner(OWNER_B)],
      ['isActive', { isActive: false }, TaskSpecification.byActive(false)],
      [
        'dueDateFrom',
        { dueDateFrom: new Date('2024-01-01T00:00:00.000Z') },
        TaskSpecification.byDateRange('dueDate', new Date('2024-01-01T00:00:00.000Z')),
      ],
      [
        'createdAtTo',
        { createdAtTo: new Date('2024-02-01T00:00:00.000Z') },
        TaskSpecification.byDateRange('createdAt', undefined, new Date('2024-02-01T00:00:00.000Z')),
      ],
    ])('with only %s set behaves like its single criterion', (_name, input, expected) => {
      const predicate = TaskSpecification.combine(createFilterCriteria(input));
      expect(predicate).toEqual(expected);
      expect(matching(predicate)).toEqual(matching(expected));
    });

    it('never widens the match set as criteria are added', () => {
      const steps: FilterCriteriaInput[] = [
        {},
        { isActive: true },
        { isActive: true, ownerId: OWNER_A },
        { isActive: true, ownerId: OWNER_A, status: TaskStatus.COMPLETED },
        { isActive: true, ownerId: OWNER_A, status: TaskStatus.COMPLETED, searchQuery: 'buy' },
        { isActive: true, ownerId: OWNER_A, status: TaskStatus.COMPLETED, searchQuery: 'buy', priority: TaskPriority.LOW },
      ];

      const results = steps.map((input) => matching(TaskSpecification.combine(createFilterCriteria(input))));
      for (let i = 1; i < results.length; i++) {
        expect(results[i - 1]).toEqual(expect.arrayContaining(results[i]));
      }
      expect(results.map((titles) => titles.length)).toEqual([5, 4, 3, 1, 1, 0]);
    });

    it('applying the same criterion twice equals applying it once', () => {
      const once = TaskSpecification.byPriority(TaskPriority.HIGH);
      const twice = TaskSpecification.and(once, TaskSpecification.byPriority(TaskPriority.HIGH));
      expect(twice).toEqual(once);
    });

    it('includes both ends of a date range', () => {
      const from = new Date('2024-01-15T00:00:00.000Z');
      const to = new Date('2024-02-01T00:00:00.000Z');
      const predicate = TaskSpecification.combine(createFilterCriteria({ dueDateFrom: from, dueDateTo: to }));
      expect(matching(predicate)).toEqual(['Errands', 'File taxes']);
    });

    it('finds "Buy" in titles and descriptions regardless of case', () => {
      const predicate = TaskSpecification.combine(createFilterCriteria({ searchQuery: 'Buy' }));
      expect(matching(predicate)).toEqual(['Buy milk', 'Errands']);
    });

    it('requires status and priority to both match', () => {
      const predicate = TaskSpecification.combine(
        createFilterCriteria({ status: TaskStatus.COMPLETED, priority: TaskPriority.HIGH }),
      );
      expect(matching(predicate)).toEqual(['Buy milk']);
    });

    it('keeps January due dates and drops later or missing ones', () => {
      const predicate = TaskSpecification.combine(
        createFilterCriteria({
          dueDateFrom: new Date('2024-01-01T00:00:00.000Z'),
          dueDateTo: new Date('2024-01-31T00:00:00.000Z'),
        }),
      );
      expect(evaluate(predicate, task({ dueDate: new Date('2024-01-15T00:00:00.000Z') }))).toBe(true);
      expect(evaluate(predicate, task({ dueDate: new Date('2024-02-01T00:00:00.000Z') }))).toBe(false);
      expect(evaluate(predicate, task({ dueDate: null }))).toBe(false);
    });

    it('treats an empty search query as absent', () => {
      expect(TaskSpecification.combine(createFilterCriteria({ searchQuery: '' }))).toEqual(
        TaskSpecification.combine(createFilterCriteria()),
      );
    });
  });

  describe('evaluate', () => {
    it('matches a title even when the description is null', () => {
      expect(evaluate(TaskSpecification.byTextSearch('milk'), task({ title: 'Buy MILK', description: null }))).toBe(true);
    });

    it('treats % and _ in the query as literal characters', () => {
      const predicate = TaskSpecification.byTextSearch('50%');
      expect(evaluate(predicate, task({ title: 'Discount 50% off' }))).toBe(true);
      expect(evaluate(predicate, task({ title: 'Discount 500 off' }))).toBe(false);
    });
  });
});
