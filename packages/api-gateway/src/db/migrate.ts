import { Logger } from '@nestjs/common';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { envSchema } from '../config/schemas/env.schema';

// SQL files are produced by `npm run db:generate` and are not copied into dist
const MIGRATIONS_FOLDER = path.resolve(__dirname, '../../src/db/migrations');

async function runMigrations(): Promise<void> {
  const logger = new Logger('Migrations');
  dotenv.config();

  const env = envSchema
    .pick({
      POSTGRES_HOST: true,
      POSTGRES_PORT: true,
      POSTGRES_USER: true,
      POSTGRES_PASSWORD: true,
      POSTGRES_DB: true,
    })
    .parse(process.env);

  const pool = new Pool({
    host: env.POSTGRES_HOST,
    port: env.POSTGRES_PORT,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    database: env.POSTGRES_DB,
  });

  try {
    logger.log(`Running database migrations from ${MIGRATIONS_FOLDER}`);
    await migrate(drizzle(pool), { migrationsFolder: MIGRATIONS_FOLDER });
    logger.log('Migrations complete');
  } finally {
    await pool.end();
  }
}

runMigrations().catch((error: unknown) => {
  new Logger('Migrations').error('Migration failed', error instanceof Error ? error.stack : error);
  process.exitCode = 1;
});
