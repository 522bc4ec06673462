import { AuthResult } from './auth-result.interface';
import {
  Account,
  AccountPatch,
  NewAccount,
  NewSession,
  NewUser,
  NewVerificationCode,
  Role,
  Session,
  User,
  UserPatch,
  VerificationCode,
  VerificationIntent,
} from './identity.types';

export interface UserStore {
  create(data: NewUser): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  update(id: string, patch: UserPatch): Promise<User | null>;
}

export interface AccountStore {
  create(data: NewAccount): Promise<Account>;
  findByUserId(userId: string): Promise<Account[]>;
  findByUserAndProvider(userId: string, providerId: string): Promise<Account | null>;
  findByProviderAccount(providerId: string, accountId: string): Promise<Account | null>;
  update(id: string, patch: AccountPatch): Promise<Account | null>;
}

export interface RoleStore {
  findByName(name: string): Promise<Role | null>;
  findByNames(names: readonly string[]): Promise<Role[]>;
  /** Inserts any missing role names; returns how many were created */
  ensureSeeded(names: readonly string[]): Promise<number>;
  addUserRole(userId: string, roleId: string): Promise<void>;
  userHasRole(userId: string, roleId: string): Promise<boolean>;
  listRoleNames(userId: string): Promise<string[]>;
}

export interface VerificationCodeStore {
  /** Drops any existing code for the same user and intent, then inserts */
  replace(data: NewVerificationCode): Promise<VerificationCode>;
  findByToken(token: string): Promise<VerificationCode | null>;
  findByUserAndIntent(userId: string, intent: VerificationIntent): Promise<VerificationCode | null>;
  /** Deletes the code; false when another request already consumed it */
  consume(id: string): Promise<boolean>;
  deleteExpired(now: Date): Promise<number>;
}

export interface SessionStore {
  create(data: NewSession): Promise<Session>;
  findById(id: string): Promise<Session | null>;
  extend(id: string, expiresAt: Date): Promise<Session | null>;
  delete(id: string): Promise<void>;
  deleteByUserId(userId: string): Promise<number>;
  deleteExpired(now: Date): Promise<number>;
}

export interface IdentityStores {
  users: UserStore;
  accounts: AccountStore;
  roles: RoleStore;
  verificationCodes: VerificationCodeStore;
  sessions: SessionStore;
}

/**
 * Runs work against one transactional scope. A failure result or a thrown
 * error rolls back every write made through the provided stores.
 */
export interface UnitOfWork {
  run<T>(work: (stores: IdentityStores) => Promise<AuthResult<T>>): Promise<AuthResult<T>>;
}

export class UniqueConstraintError extends Error {
  constructor(
    readonly constraint: string | undefined,
    message = `Unique constraint violated${constraint ? `: ${constraint}` : ''}`,
  ) {
    super(message);
    this.name = 'UniqueConstraintError';
  }
}
