import { eq, lt } from 'drizzle-orm';
import { DbExecutor } from '../../../database/services/drizzle.service';
import { sessions } from '../../../db/schema';
import { SessionStore } from '../interfaces/identity-stores.interface';
import { NewSession, Session } from '../interfaces/identity.types';
import { firstRow } from './repository.utils';

export class SessionsRepository implements SessionStore {
  constructor(private readonly db: DbExecutor) {}

  async create(data: NewSession): Promise<Session> {
    const rows = await this.db.insert(sessions).values(data).returning();
    return firstRow(rows, 'sessions');
  }

  async findById(id: string): Promise<Session | null> {
    const [session] = await this.db.select().from(sessions).where(eq(sessions.id, id)).limit(1);
    return session ?? null;
  }

  async extend(id: string, expiresAt: Date): Promise<Session | null> {
    const [session] = await this.db
      .update(sessions)
      .set({ expiresAt, updatedAt: new Date() })
      .where(eq(sessions.id, id))
      .returning();
    return session ?? null;
  }

  async delete(id: string): Promise<void> {
    await this.db.delete(sessions).where(eq(sessions.id, id));
  }

  async deleteByUserId(userId: string): Promise<number> {
    const deleted = await this.db
      .delete(sessions)
      .where(eq(sessions.userId, userId))
      .returning({ id: sessions.id });
    return deleted.length;
  }

  async deleteExpired(now: Date): Promise<number> {
    const deleted = await this.db
      .delete(sessions)
      .where(lt(sessions.expiresAt, now))
      .returning({ id: sessions.id });
    return deleted.length;
  }
}
