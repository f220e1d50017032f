import { DataSource } from 'typeorm';
import { Task } from '../src/modules/tasks/entities/task.entity';
import { TaskPriority } from '../src/modules/tasks/enums/task-priority.enum';
import { TaskStatus } from '../src/modules/tasks/enums/task-status.enum';
import { TaskRepository } from '../src/modules/tasks/repositories/task.repository';
import { createFilterCriteria, FilterCriteriaInput } from '../src/modules/tasks/specifications/filter-criteria';
import { evaluate } from '../src/modules/tasks/specifications/task-predicate';
import { TaskSpecification } from '../src/modules/tasks/specifications/task.specification';
import { User } from '../src/modules/users/entities/user.entity';
import { PageRequest } from '../src/types/pagination.interface';
import { TaskSortField } from '../src/modules/tasks/repositories/task.repository';

const page: PageRequest<TaskSortField> = { page: 1, limit: 100, sortBy: 'title', sortOrder: 'ASC' };

describe('TaskRepository', () => {
  let dataSource: DataSource;
  let repository: TaskRepository;
  let alice: User;
  let bob: User;
  let seeded: Task[];

  beforeAll(async () => {
    dataSource = new DataSource({
      type: 'better-sqlite3',
      database: ':memory:',
      entities: [Task, User],
      synchronize: true,
    });
    await dataSource.initialize();
    repository = new TaskRepository(dataSource);

    const users = dataSource.getRepository(User);
    alice = await users.save(
      users.create({ username: 'alice', email: 'alice@example.com', firstName: 'Alice', lastName: 'A', password: 'x' }),
    );
    bob = await users.save(
      users.create({ username: 'bob', email: 'bob@example.com', firstName: 'Bob', lastName: 'B', password: 'x' }),
    );

    await repository.save([
      repository.create({
        title: 'Buy milk',
        status: TaskStatus.COMPLETED,
        priority: TaskPriority.HIGH,
        userId: alice.id,
      }),
      repository.create({
        title: 'Errands',
        description: 'Remember to buy bread',
        dueDate: new Date('2024-01-15T00:00:00.000Z'),
        userId: alice.id,
      }),
      repository.create({
        title: 'Clean house',
        status: TaskStatus.COMPLETED,
        priority: TaskPriority.LOW,
        dueDate: new Date('2024-01-31T00:00:00.000Z'),
        userId: bob.id,
      }),
      repository.create({
        title: 'File taxes',
        isActive: false,
        dueDate: new Date('2024-02-01T00:00:00.000Z'),
        userId: bob.id,
      }),
      repository.create({
        title: 'Sale: 50% off',
        description: null,
        userId: alice.id,
      }),
      repository.create({
        title: 'Sale: 500 off',
        userId: alice.id,
      }),
    ]);
    seeded = await repository.find();
  });

  afterAll(async () => {
    await dataSource.destroy();
  });

  const scenarios: Array<[string, FilterCriteriaInput, string[]]> = [
    ['no criteria', {}, ['Buy milk', 'Clean house', 'Errands', 'File taxes', 'Sale: 50% off', 'Sale: 500 off']],
    ['text in title or description', { searchQuery: 'Buy' }, ['Buy milk', 'Errands']],
    ['literal percent sign', { searchQuery: '50%' }, ['Sale: 50% off']],
    ['status and priority', { status: TaskStatus.COMPLETED, priority: TaskPriority.HIGH }, ['Buy milk']],
    ['inactive tasks', { isActive: false }, ['File taxes']],
    ['default status and priority', { status: TaskStatus.PENDING, priority: TaskPriority.MEDIUM, isActive: true }, [
      'Errands',
      'Sale: 50% off',
      'Sale: 500 off',
    ]],
    [
      'inclusive due date range',
      { dueDateFrom: new Date('2024-01-15T00:00:00.000Z'), dueDateTo: new Date('2024-01-31T00:00:00.000Z') },
      ['Clean house', 'Errands'],
    ],
  ];

  it.each(scenarios)('filters by %s', async (_name, input, expected) => {
    const predicate = TaskSpecification.combine(createFilterCriteria(input));
    const [tasks, total] = await repository.findBySpecification(predicate, page);

    expect(tasks.map((task) => task.title)).toEqual(expected);
    expect(total).toBe(expected.length);

    const inMemory = seeded
      .filter((task) => evaluate(predicate, task))
      .map((task) => task.title)
      .sort();
    expect(inMemory).toEqual(expected);
  });

  it('filters by owner', async () => {
    const predicate = TaskSpecification.combine(createFilterCriteria({ ownerId: bob.id }));
    const [tasks] = await repository.findBySpecification(predicate, page);
    expect(tasks.map((task) => task.title)).toEqual(['Clean house', 'File taxes']);
  });

  it('pages through the ordered result', async () => {
    const [tasks, total] = await repository.findBySpecification(TaskSpecification.always(), {
      page: 2,
      limit: 4,
      sortBy: 'title',
      sortOrder: 'DESC',
    });
    expect(total).toBe(6);
    expect(tasks.map((task) => task.title)).toEqual(['Clean house', 'Buy milk']);
  });

  it('counts tasks by status and priority', async () => {
    const rows = await repository.countByStatusAndPriority(TaskSpecification.byOwner(alice.id));
    const sorted = [...rows].sort((a, b) => `${a.status}${a.priority}`.localeCompare(`${b.status}${b.priority}`));
    expect(sorted).toEqual([
      { status: TaskStatus.COMPLETED, priority: TaskPriority.HIGH, total: 1 },
      { status: TaskStatus.PENDING, priority: TaskPriority.MEDIUM, total: 3 },
    ]);
  });

  it('sorts priority by rank rather than by name', async () => {
    const [tasks] = await repository.findBySpecification(TaskSpecification.always(), {
      ...page,
      sortBy: 'priority',
      sortOrder: 'ASC',
    });
    expect(tasks.map((task) => task.priority)).toEqual([
      TaskPriority.LOW,
      TaskPriority.MEDIUM,
      TaskPriority.MEDIUM,
      TaskPriority.MEDIUM,
      TaskPriority.MEDIUM,
      TaskPriority.HIGH,
    ]);
  });

  it('sorts status by lifecycle order', async () => {
    const [tasks] = await repository.findBySpecification(TaskSpecification.always(), {
      ...page,
      sortBy: 'status',
      sortOrder: 'DESC',
    });
    expect(tasks.map((task) => task.status)).toEqual([
      TaskStatus.COMPLETED,
      TaskStatus.COMPLETED,
      TaskStatus.PENDING,
      TaskStatus.PENDING,
      TaskStatus.PENDING,
      TaskStatus.PENDING,
    ]);
  });

  it('checks titles for an exact match', async () => {
    await expect(repository.existsByTitle('Errands')).resolves.toBe(true);
    await expect(repository.existsByTitle('errands')).resolves.toBe(false);
  });

  describe('created-at bounds equal to a stored value', () => {
    let stampedAt: Date;
    let stamped: Task;
    let all: Task[];

    beforeAll(async () => {
      const saved = await repository.save(repository.create({ title: 'Boundary check', userId: bob.id }));
      stampedAt = saved.createdAt;
      stamped = await repository.findOneByOrFail({ id: saved.id });
      all = await repository.find();
    });

    it('stores the creation time to the millisecond', () => {
      expect(stamped.createdAt.toISOString()).toBe(stampedAt.toISOString());
      expect(stamped.updatedAt.toISOString()).toBe(stampedAt.toISOString());
    });

    it.each([
      ['both ends', (at: Date): FilterCriteriaInput => ({ createdAtFrom: at, createdAtTo: at })],
      ['lower end only', (at: Date): FilterCriteriaInput => ({ createdAtFrom: at })],
      ['upper end only', (at: Date): FilterCriteriaInput => ({ createdAtTo: at })],
    ])('includes the task at %s', async (_name, bounds) => {
      const predicate = TaskSpecification.combine(createFilterCriteria(bounds(stamped.createdAt)));
      const [tasks, total] = await repository.findBySpecification(predicate, page);
      const titles = tasks.map((task) => task.title);

      expect(titles).toContain('Boundary check');
      expect(total).toBe(titles.length);

      const inMemory = all
        .filter((task) => evaluate(predicate, task))
        .map((task) => task.title)
        .sort();
      expect(titles).toEqual(inMemory);
    });
  });
});
