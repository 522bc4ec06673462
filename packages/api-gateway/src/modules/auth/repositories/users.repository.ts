import { eq } from 'drizzle-orm';
import { DbExecutor } from '../../../database/services/drizzle.service';
import { users } from '../../../db/schema';
import { UserStore } from '../interfaces/identity-stores.interface';
import { NewUser, User, UserPatch } from '../interfaces/identity.types';
import { firstRow, translateWriteError } from './repository.utils';

export class UsersRepository implements UserStore {
  constructor(private readonly db: DbExecutor) {}

  async create(data: NewUser): Promise<User> {
    try {
      const rows = await this.db
        .insert(users)
        .values({
          name: data.name,
          email: data.email,
          emailVerified: data.emailVerified,
          image: data.image ?? null,
        })
        .returning();
      return firstRow(rows, 'users');
    } catch (error) {
      throw translateWriteError(error);
    }
  }

  async findById(id: string): Promise<User | null> {
    const [user] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return user ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const [user] = await this.db.select().from(users).where(eq(users.email, email)).limit(1);
    return user ?? null;
  }

  async update(id: string, patch: UserPatch): Promise<User | null> {
    // drizzle skips undefined keys, so absent patch fields stay untouched
    const [user] = await this.db
      .update(users)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(users.id, id))
      .returning();
    return user ?? null;
  }
}
