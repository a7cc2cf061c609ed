import type { Knex } from 'knex';
import dotenv from 'dotenv';
dotenv.config();

const connection = process.env.DATABASE_URL || {
  host: process.env.DB_HOST || '127.0.0.1',
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD || 'postgres',
  database: process.env.DB_NAME || 'vetclinic',
  port: +(process.env.DB_PORT || 5432)
};

const config: Knex.Config = {
  client: 'pg',
  connection,
  migrations: {
    extension: 'ts',
    directory: './migrations',
    tableName: 'vetclinic_migrations'
  },
  seeds: {
    extension: 'ts',
    directory: './seeds'
  },
  // the API and the job worker each open their own pool
  pool: { min: 0, max: +(process.env.DB_POOL_MAX || 10) },
  // stock movements wait on the lot row lock while holding a connection
  acquireConnectionTimeout: +(process.env.DB_ACQUIRE_TIMEOUT_MS || 15000)
};

export default config;
