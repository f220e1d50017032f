// test-utils.ts
import { INestApplication } from '@nestjs/common';
import supertest from 'supertest';
import { v4 as uuidv4 } from 'uuid';

export interface CreatedUser {
  id: string;
  username: string;
  email: string;
}

export interface CreatedTask {
  id: string;
  title: string;
  description: string | null;
  status: string;
  priority: string;
  userId: string;
  isActive: boolean;
  dueDate: string | null;
  createdAt: string;
}

export async function createTestUser(
  app: INestApplication,
  overrides: Record<string, unknown> = {},
): Promise<CreatedUser> {
  const uniqueId = uuidv4().substring(0, 8);
  const response = await supertest(app.getHttpServer())
    .post('/users')
    .send({
      username: `user_${uniqueId}`,
      email: `user+${uniqueId}@example.com`,
      firstName: 'Test',
      lastName: 'User',
      password: 'test-password',
      ...overrides,
    });

  if (response.status !== 201) {
    throw new Error(`User creation failed: ${JSON.stringify(response.body)}`);
  }
  return response.body.data;
}

export async function createTestTask(
  app: INestApplication,
  userId: string,
  overrides: Record<string, unknown> = {},
): Promise<CreatedTask> {
  const response = await supertest(app.getHttpServer())
    .post('/tasks')
    .send({ title: `Task ${uuidv4().substring(0, 8)}`, userId, ...overrides });

  if (response.status !== 201) {
    throw new Error(`Task creation failed: ${JSON.stringify(response.body)}`);
  }
  return response.body.data;
}
