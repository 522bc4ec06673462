import { Injectable } from '@nestjs/common';
import { DbExecutor, DrizzleService } from '../../../database/services/drizzle.service';
import { AuthFailure, AuthResult } from '../interfaces/auth-result.interface';
import { IdentityStores, UnitOfWork } from '../interfaces/identity-stores.interface';
import { AccountsRepository } from './accounts.repository';
import { RolesRepository } from './roles.repository';
import { SessionsRepository } from './sessions.repository';
import { UsersRepository } from './users.repository';
import { VerificationCodesRepository } from './verification-codes.repository';

// Thrown inside the transaction callback so drizzle issues ROLLBACK for a failure result
class RollbackSignal extends Error {
  constructor(readonly failure: AuthFailure) {
    super('Unit of work rolled back');
  }
}

export function createStores(executor: DbExecutor): IdentityStores {
  return {
    users: new UsersRepository(executor),
    accounts: new AccountsRepository(executor),
    roles: new RolesRepository(executor),
    verificationCodes: new VerificationCodesRepository(executor),
    sessions: new SessionsRepository(executor),
  };
}

@Injectable()
export class DrizzleUnitOfWork implements UnitOfWork {
  constructor(private readonly drizzle: DrizzleService) {}

  async run<T>(work: (stores: IdentityStores) => Promise<AuthResult<T>>): Promise<AuthResult<T>> {
    try {
      return await this.drizzle.database.transaction(async tx => {
        const result = await work(createStores(tx));
        if (!result.ok) {
          throw new RollbackSignal(result);
        }
        return result;
      });
    } catch (error) {
      if (error instanceof RollbackSignal) {
        return error.failure;
      }
      throw error;
    }
  }
}
