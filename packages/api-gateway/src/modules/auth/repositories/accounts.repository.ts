import { and, eq } from 'drizzle-orm';
import { DbExecutor } from '../../../database/services/drizzle.service';
import { accounts } from '../../../db/schema';
import { AccountStore } from '../interfaces/identity-stores.interface';
import { Account, AccountPatch, NewAccount } from '../interfaces/identity.types';
import { firstRow, translateWriteError } from './repository.utils';

export class AccountsRepository implements AccountStore {
  constructor(private readonly db: DbExecutor) {}

  async create(data: NewAccount): Promise<Account> {
    try {
      const rows = await this.db.insert(accounts).values(data).returning();
      return firstRow(rows, 'accounts');
    } catch (error) {
      throw translateWriteError(error);
    }
  }

  async findByUserId(userId: string): Promise<Account[]> {
    return this.db.select().from(accounts).where(eq(accounts.userId, userId));
  }

  async findByUserAndProvider(userId: string, providerId: string): Promise<Account | null> {
    const [account] = await this.db
      .select()
      .from(accounts)
      .where(and(eq(accounts.userId, userId), eq(accounts.providerId, providerId)))
      .limit(1);
    return account ?? null;
  }

  async findByProviderAccount(providerId: string, accountId: string): Promise<Account | null> {
    const [account] = await this.db
      .select()
      .from(accounts)
      .where(and(eq(accounts.providerId, providerId), eq(accounts.accountId, accountId)))
      .limit(1);
    return account ?? null;
  }

  async update(id: string, patch: AccountPatch): Promise<Account | null> {
    const [account] = await this.db
      .update(accounts)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(accounts.id, id))
      .returning();
    return account ?? null;
  }
}
