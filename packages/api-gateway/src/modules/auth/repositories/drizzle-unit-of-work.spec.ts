import { Test, TestingModule } from '@nestjs/testing';
import { DrizzleService } from '../../../database/services/drizzle.service';
import { fail, ok } from '../interfaces/auth-result.interface';
import { UniqueConstraintError } from '../interfaces/identity-stores.interface';
import { User, VerificationCode } from '../interfaces/identity.types';
import { DrizzleUnitOfWork } from './drizzle-unit-of-work';

describe('DrizzleUnitOfWork', () => {
  let unitOfWork: DrizzleUnitOfWork;
  let rollbacks: number;

  const mockTransaction = {
    insert: jest.fn().mockReturnThis(),
    delete: jest.fn().mockReturnThis(),
    values: jest.fn().mockReturnThis(),
    where: jest.fn().mockReturnThis(),
    onConflictDoUpdate: jest.fn().mockReturnThis(),
    returning: jest.fn().mockResolvedValue([]),
  };

  // Mirrors drizzle: a callback that throws rolls the transaction back and rethrows
  const mockDrizzleService = {
    database: {
      transaction: jest.fn(async (callback: (tx: typeof mockTransaction) => Promise<unknown>) => {
        try {
          return await callback(mockTransaction);
        } catch (error) {
          rollbacks += 1;
          throw error;
        }
      }),
    },
  };

  beforeEach(async () => {
    rollbacks = 0;
    mockTransaction.returning.mockResolvedValue([]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [DrizzleUnitOfWork, { provide: DrizzleService, useValue: mockDrizzleService }],
    }).compile();

    unitOfWork = module.get<DrizzleUnitOfWork>(DrizzleUnitOfWork);
  });

  describe('run', () => {
    it('commits and returns a successful result', async () => {
      const result = await unitOfWork.run<string>(async () => ok('done'));

      expect(result).toEqual({ ok: true, value: 'done' });
      expect(mockDrizzleService.database.transaction).toHaveBeenCalledTimes(1);
      expect(rollbacks).toBe(0);
    });

    it('rolls back a failure result and hands it back unchanged', async () => {
      const failure = fail('NotFound', 'Verification code not found');

      const result = await unitOfWork.run<void>(async stores => {
        await stores.verificationCodes.consume('code-1');
        return failure;
      });

      expect(result).toBe(failure);
      expect(rollbacks).toBe(1);
    });

    it('rolls back and rethrows an unexpected error', async () => {
      await expect(
        unitOfWork.run<void>(async () => {
          throw new Error('deadlock detected');
        }),
      ).rejects.toThrow('deadlock detected');

      expect(rollbacks).toBe(1);
    });
  });

  describe('repositories bound to the transaction', () => {
    it('reports a verification code deleted by someone else as not consumed', async () => {
      mockTransaction.returning.mockResolvedValueOnce([]);

      const result = await unitOfWork.run<boolean>(async stores =>
        ok(await stores.verificationCodes.consume('code-1')),
      );

      expect(result).toEqual({ ok: true, value: false });
      expect(mockTransaction.delete).toHaveBeenCalledTimes(1);
    });

    it('reports a deleted verification code as consumed', async () => {
      mockTransaction.returning.mockResolvedValueOnce([{ id: 'code-1' }]);

      const result = await unitOfWork.run<boolean>(async stores =>
        ok(await stores.verificationCodes.consume('code-1')),
      );

      expect(result).toEqual({ ok: true, value: true });
    });

    it('upserts a replacement code in a single statement', async () => {
      const expiresAt = new Date('2026-03-01T12:15:00Z');
      const row = {
        id: 'code-2',
        userId: 'user-1',
        intent: 'verify_email',
        value: '654321',
        token: 'token-2',
        expiresAt,
        createdAt: new Date('2026-03-01T12:00:00Z'),
      };
      mockTransaction.returning.mockResolvedValueOnce([row]);

      const result = await unitOfWork.run<VerificationCode>(async stores =>
        ok(
          await stores.verificationCodes.replace({
            userId: 'user-1',
            intent: 'verify_email',
            value: '654321',
            token: 'token-2',
            expiresAt,
          }),
        ),
      );

      expect(result).toEqual({ ok: true, value: row });
      expect(mockTransaction.delete).not.toHaveBeenCalled();
      expect(mockTransaction.onConflictDoUpdate).toHaveBeenCalledWith(
        expect.objectContaining({
          set: expect.objectContaining({ value: '654321', token: 'token-2', expiresAt }),
        }),
      );
    });

    it('translates a wrapped unique violation into UniqueConstraintError', async () => {
      mockTransaction.returning.mockRejectedValueOnce(
        Object.assign(new Error('insert failed'), {
          cause: { code: '23505', constraint: 'users_email_unique' },
        }),
      );

      const error = await unitOfWork
        .run<User>(async stores =>
          ok(
            await stores.users.create({
              name: 'Ada',
              email: 'ada@example.com',
              emailVerified: false,
            }),
          ),
        )
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(UniqueConstraintError);
      expect(error).toHaveProperty('constraint', 'users_email_unique');
      expect(rollbacks).toBe(1);
    });

    it('lets other write errors through untouched', async () => {
      const foreignKey = Object.assign(new Error('insert or update violates foreign key'), {
        code: '23503',
      });
      mockTransaction.returning.mockRejectedValueOnce(foreignKey);

      const error = await unitOfWork
        .run<User>(async stores =>
          ok(
            await stores.users.create({
              name: 'Ada',
              email: 'ada@example.com',
              emailVerified: false,
            }),
          ),
        )
        .catch((caught: unknown) => caught);

      expect(error).toBe(foreignKey);
    });
  });
});
