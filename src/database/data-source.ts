// src/database/data-source.ts
import 'reflect-metadata';
import 'dotenv/config';

import { DataSource } from 'typeorm';
import path from 'path';

const isProd = process.env.NODE_ENV === 'production';

const migrationsGlob = isProd
  ? path.join(__dirname, 'migrations', '*.js')
  : path.join(__dirname, 'migrations', '*.ts');

const entitiesArr: string[] = [
  path.join(__dirname, '..', 'github', '**', '*.entity.{ts,js}'),
  path.join(__dirname, '..', 'pipeline', '**', '*.entity.{ts,js}'),
];

export const postgresOptions = {
  type: 'postgres' as const,
  url: process.env.DATABASE_URL,
  ssl: isProd ? { rejectUnauthorized: false } : false,

  entities: entitiesArr,

  migrations: [migrationsGlob],
  migrationsTableName: 'typeorm_migrations',
  schema: 'public',
  logging: false,
};

const dataSource = new DataSource(postgresOptions);

export default dataSource;
