import { PoolConfig } from 'pg';
import { parseInteger } from './app.config';

export const dbConfig: PoolConfig = {
  host: process.env.DB_HOST || 'localhost',
  port: parseInteger(process.env.DB_PORT, 5432),
  database: process.env.DB_NAME || 'product_catalog',
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD || 'postgres',
  max: parseInteger(process.env.DB_POOL_MAX, 10),
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
};
