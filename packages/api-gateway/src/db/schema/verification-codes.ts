import { pgTable, pgEnum, uuid, timestamp, varchar, unique, index } from 'drizzle-orm/pg-core';
import { VERIFICATION_INTENTS } from '../../modules/auth/constants/auth.constants';
import { users } from './users';

export const verificationIntent = pgEnum('verification_intent', VERIFICATION_INTENTS);

export const verificationCodes = pgTable(
  'verification_codes',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    intent: verificationIntent('intent').notNull(),
    value: varchar('value', { length: 16 }).notNull(),
    token: varchar('token', { length: 128 }).notNull().unique('verification_codes_token_unique'),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  table => ({
    // At most one live code per user and intent
    userIntentUnique: unique('verification_codes_user_intent_unique').on(table.userId, table.intent),
    expiresAtIdx: index('idx_verification_codes_expires_at').on(table.expiresAt),
  }),
);
