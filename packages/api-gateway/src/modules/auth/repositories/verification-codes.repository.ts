import { and, eq, lt } from 'drizzle-orm';
import { DbExecutor } from '../../../database/services/drizzle.service';
import { verificationCodes } from '../../../db/schema';
import { VerificationCodeStore } from '../interfaces/identity-stores.interface';
import {
  NewVerificationCode,
  VerificationCode,
  VerificationIntent,
} from '../interfaces/identity.types';
import { firstRow, translateWriteError } from './repository.utils';

export class VerificationCodesRepository implements VerificationCodeStore {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Single upsert on (user_id, intent): a concurrent issuer waits for the other
   * insert to commit and then overwrites it instead of failing.
   */
  async replace(data: NewVerificationCode): Promise<VerificationCode> {
    try {
      const rows = await this.db
        .insert(verificationCodes)
        .values(data)
        .onConflictDoUpdate({
          target: [verificationCodes.userId, verificationCodes.intent],
          set: {
            value: data.value,
            token: data.token,
            expiresAt: data.expiresAt,
            createdAt: new Date(),
          },
        })
        .returning();
      return firstRow(rows, 'verification_codes');
    } catch (error) {
      throw translateWriteError(error);
    }
  }

  async findByToken(token: string): Promise<VerificationCode | null> {
    const [code] = await this.db
      .select()
      .from(verificationCodes)
      .where(eq(verificationCodes.token, token))
      .limit(1);
    return code ?? null;
  }

  async findByUserAndIntent(
    userId: string,
    intent: VerificationIntent,
  ): Promise<VerificationCode | null> {
    const [code] = await this.db
      .select()
      .from(verificationCodes)
      .where(and(eq(verificationCodes.userId, userId), eq(verificationCodes.intent, intent)))
      .limit(1);
    return code ?? null;
  }

  async consume(id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(verificationCodes)
      .where(eq(verificationCodes.id, id))
      .returning({ id: verificationCodes.id });
    return deleted.length > 0;
  }

  async deleteExpired(now: Date): Promise<number> {
    const deleted = await this.db
      .delete(verificationCodes)
      .where(lt(verificationCodes.expiresAt, now))
      .returning({ id: verificationCodes.id });
    return deleted.length;
  }
}
