import { sql } from 'drizzle-orm';
import {
  pgTable,
  uuid,
  timestamp,
  varchar,
  text,
  unique,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';
import { users } from './users';

/**
 * One row per way a user can sign in: the password method or a linked OAuth
 * provider identity.
 */
export const accounts = pgTable(
  'accounts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    providerId: varchar('provider_id', { length: 50 }).notNull(),
    accountId: varchar('account_id', { length: 255 }).notNull(),
    password: text('password'),
    accessToken: text('access_token'),
    refreshToken: text('refresh_token'),
    idToken: text('id_token'),
    accessTokenExpiresAt: timestamp('access_token_expires_at', { withTimezone: true }),
    refreshTokenExpiresAt: timestamp('refresh_token_expires_at', { withTimezone: true }),
    scope: text('scope'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  table => ({
    userProviderUnique: unique('accounts_user_provider_unique').on(table.userId, table.providerId),
    // The password method shares one sentinel account id across users
    providerAccountUnique: uniqueIndex('accounts_provider_account_unique')
      .on(table.providerId, table.accountId)
      .where(sql`${table.providerId} <> 'credentials'`),
    userIdIdx: index('idx_accounts_user_id').on(table.userId),
  }),
);
