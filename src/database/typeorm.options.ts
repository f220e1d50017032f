import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DatabaseConfig } from '../config/database.config';

export function buildTypeOrmOptions(config: DatabaseConfig): TypeOrmModuleOptions {
  if (config.type === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: config.database,
      autoLoadEntities: true,
      synchronize: config.synchronize,
      logging: config.logging,
    };
  }

  return {
    type: 'postgres',
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password,
    database: config.database,
    autoLoadEntities: true,
    synchronize: config.synchronize,
    logging: config.logging,
  };
}
