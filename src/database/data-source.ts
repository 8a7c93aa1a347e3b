import 'reflect-metadata';
import 'dotenv/config';
import { DataSource } from 'typeorm';
import { loadDatabaseConfig } from './config/database.config';
import { buildDataSourceOptions } from './typeorm-config.service';

// Entry point for the TypeORM CLI (migration:run / migration:revert)
export const AppDataSource = new DataSource(
  buildDataSourceOptions(loadDatabaseConfig()),
);
