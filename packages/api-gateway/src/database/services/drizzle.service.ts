import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { drizzle, NodePgDatabase, NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { PgDatabase } from 'drizzle-orm/pg-core';
import { Pool, QueryResult, QueryResultRow } from 'pg';
import * as schema from '../../db/schema';
import { ConfigService } from '../../config/services/config.service';

export type Schema = typeof schema;
export type Database = NodePgDatabase<Schema>;

/**
 * Anything queries can run against: the pooled database or an open transaction
 */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, Schema>;

@Injectable()
export class DrizzleService implements OnModuleInit, OnModuleDestroy {
  private readonly pool: Pool;
  private readonly db: Database;
  private readonly logger = new Logger(DrizzleService.name);

  constructor(configService: ConfigService) {
    const { host, port, user, password, database } = configService.settings.database;
    this.pool = new Pool({ host, port, user, password, database });
    this.pool.on('error', error => {
      this.logger.error(`Idle PostgreSQL client error: ${error.message}`);
    });

    this.db = drizzle(this.pool, { schema });
  }

  get database(): Database {
    return this.db;
  }

  // Raw SQL, used by health checks
  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<QueryResult<R>> {
    return this.pool.query<R>(text, params);
  }

  async onModuleInit(): Promise<void> {
    try {
      await this.pool.query('SELECT 1');
      this.logger.log('Database connection established');
    } catch (error) {
      this.logger.error('Failed to connect to database', error instanceof Error ? error.stack : error);
      throw error;
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
    this.logger.log('Database connection closed');
  }
}
