import { registerAs } from '@nestjs/config';

export const DATABASE_TYPES = ['postgres', 'better-sqlite3'] as const;
export type DatabaseType = (typeof DATABASE_TYPES)[number];

export interface DatabaseConfig {
  type: DatabaseType;
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
  logging: boolean;
}

function parseDatabaseType(value: string | undefined): DatabaseType {
  const type = DATABASE_TYPES.find((candidate) => candidate === (value || 'postgres'));
  if (!type) {
    throw new Error(`Unsupported DB_TYPE "${value}". Expected one of: ${DATABASE_TYPES.join(', ')}`);
  }
  return type;
}

export default registerAs('database', (): DatabaseConfig => {
  const nodeEnv = process.env.NODE_ENV || 'development';

  return {
    type: parseDatabaseType(process.env.DB_TYPE),
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    database: process.env.DB_DATABASE || 'task_manager',
    synchronize: process.env.DB_SYNCHRONIZE ? process.env.DB_SYNCHRONIZE === 'true' : nodeEnv !== 'production',
    logging: process.env.DB_LOGGING === 'true',
  };
});
