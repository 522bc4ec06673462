import type { Config } from 'drizzle-kit';

export default {
  schema: './src/db/schema',
  out: './src/db/migrations',
  dialect: 'postgresql',
  dbCredentials: {
    host: process.env.POSTGRES_HOST || 'localhost',
    port: Number(process.env.POSTGRES_PORT) || 5432,
    user: process.env.POSTGRES_USER || 'careport',
    password: process.env.POSTGRES_PASSWORD || 'careport_password',
    database: process.env.POSTGRES_DB || 'careport_dev',
  },
} satisfies Config;
