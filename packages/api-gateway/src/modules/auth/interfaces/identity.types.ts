import type { VerificationIntent } from '../constants/auth.constants';

export type { VerificationIntent };

export interface User {
  id: string;
  name: string;
  email: string;
  emailVerified: boolean;
  image: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewUser {
  name: string;
  email: string;
  emailVerified: boolean;
  image?: string | null;
}

/**
 * Absent fields are left untouched; `null` clears a nullable column
 */
export interface UserPatch {
  name?: string;
  emailVerified?: boolean;
  image?: string | null;
}

export interface Account {
  id: string;
  userId: string;
  providerId: string;
  accountId: string;
  password: string | null;
  accessToken: string | null;
  refreshToken: string | null;
  idToken: string | null;
  accessTokenExpiresAt: Date | null;
  refreshTokenExpiresAt: Date | null;
  scope: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewAccount {
  userId: string;
  providerId: string;
  accountId: string;
  password?: string | null;
  accessToken?: string | null;
  refreshToken?: string | null;
  idToken?: string | null;
  accessTokenExpiresAt?: Date | null;
  refreshTokenExpiresAt?: Date | null;
  scope?: string | null;
}

export type AccountPatch = Partial<Omit<NewAccount, 'userId' | 'providerId' | 'accountId'>>;

export interface Role {
  id: string;
  name: string;
  createdAt: Date;
}

export interface Session {
  id: string;
  userId: string;
  expiresAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewSession {
  userId: string;
  expiresAt: Date;
}

export interface VerificationCode {
  id: string;
  userId: string;
  intent: VerificationIntent;
  value: string;
  token: string;
  expiresAt: Date;
  createdAt: Date;
}

export interface NewVerificationCode {
  userId: string;
  intent: VerificationIntent;
  value: string;
  token: string;
  expiresAt: Date;
}

/**
 * What the API returns for a user. Never includes credentials.
 */
export interface PublicUser {
  id: string;
  name: string;
  email: string;
  emailVerified: boolean;
  image: string | null;
  roles: string[];
  createdAt: string;
}

export function toPublicUser(user: User, roles: readonly string[]): PublicUser {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    emailVerified: user.emailVerified,
    image: user.image,
    roles: [...roles].sort(),
    createdAt: user.createdAt.toISOString(),
  };
}
