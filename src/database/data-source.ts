import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import { INCIDENCIAS_ENTITIES } from './entities';

config();

/**
 * DataSource used by the TypeORM CLI for migrations.
 */
export const AppDataSource = new DataSource({
  type: 'postgres',
  host: process.env.DATABASE_HOST || 'localhost',
  port: parseInt(process.env.DATABASE_PORT || '5432', 10),
  username: process.env.DATABASE_USER || 'postgres',
  password: process.env.DATABASE_PASSWORD || 'postgres',
  database: process.env.DATABASE_NAME || 'incidencias_db',
  entities: INCIDENCIAS_ENTITIES,
  migrations: [__dirname + '/migrations/*.{ts,js}'],
  synchronize: false, // Always false - use migrations
  logging: process.env.NODE_ENV === 'development',
});
