import { Inject, Injectable, Logger } from '@nestjs/common';
import { maskEmail } from '../../../common/utils/mask-email.util';
import { sanitizeEmail } from '../../../common/validation/auth.schema';
import {
  CREDENTIALS_ACCOUNT_ID,
  CREDENTIALS_PROVIDER_ID,
  EMAIL_SENDER,
  UNIT_OF_WORK,
} from '../constants/auth.constants';
import { AuthResult, fail, ok } from '../interfaces/auth-result.interface';
import { EmailSender } from '../interfaces/email-sender.interface';
import {
  IdentityStores,
  UniqueConstraintError,
  UnitOfWork,
} from '../interfaces/identity-stores.interface';
import { PublicUser, VerificationCode, toPublicUser } from '../interfaces/identity.types';
import { AuthMetricsService } from './auth-metrics.service';
import { PasswordService } from './password.service';
import { SessionIssuerService } from './session-issuer.service';
import {
  RefreshTokenClaims,
  TokenResponse,
  TokenService,
  TokenVerificationError,
} from './token.service';
import { VerificationCodeService } from './verification-code.service';

export const INVALID_CREDENTIALS_MESSAGE = 'Incorrect email or password';
export const USER_EXISTS_MESSAGE = 'A user with this email already exists';

export interface SignUpInput {
  email: string;
  password: string;
  name: string;
  roles: string[];
}

export interface SignInInput {
  email: string;
  password: string;
}

export interface VerifyEmailInput {
  token: string;
  code?: string;
}

export interface ResetPasswordInput {
  token: string;
  password: string;
  code?: string;
}

interface PendingEmail {
  email: string;
  code: VerificationCode;
}

/**
 * Password-based flows: sign-up, sign-in, refresh, sign-out, email
 * verification and password reset. Each operation runs in one unit of work;
 * emails go out only after it commits.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork,
    @Inject(EMAIL_SENDER) private readonly emailSender: EmailSender,
    private readonly passwordService: PasswordService,
    private readonly tokenService: TokenService,
    private readonly sessionIssuer: SessionIssuerService,
    private readonly verificationCodes: VerificationCodeService,
    private readonly metrics: AuthMetricsService,
  ) {}

  async signUp(input: SignUpInput): Promise<AuthResult<PublicUser>> {
    return this.metrics.track<PublicUser>('sign_up', CREDENTIALS_PROVIDER_ID, async () => {
      const email = sanitizeEmail(input.email);
      const requestedRoles = [...new Set(input.roles.map(role => role.trim().toLowerCase()))];
      const passwordHash = await this.passwordService.hashPassword(input.password);

      let result: AuthResult<{ user: PublicUser; pending: PendingEmail }>;
      try {
        result = await this.unitOfWork.run<{ user: PublicUser; pending: PendingEmail }>(async stores => {
          if (await stores.users.findByEmail(email)) {
            return fail('Conflict', USER_EXISTS_MESSAGE);
          }

          // Resolve every role before writing anything
          const roles = await stores.roles.findByNames(requestedRoles);
          const unknown = requestedRoles.filter(name => !roles.some(role => role.name === name));
          if (unknown.length > 0) {
            return fail('NotFound', `Unknown role: ${unknown.join(', ')}`);
          }

          const user = await stores.users.create({
            name: input.name.trim(),
            email,
            emailVerified: false,
          });
          await stores.accounts.create({
            userId: user.id,
            providerId: CREDENTIALS_PROVIDER_ID,
            accountId: CREDENTIALS_ACCOUNT_ID,
            password: passwordHash,
          });
          for (const role of roles) {
            await stores.roles.addUserRole(user.id, role.id);
          }
          const code = await this.verificationCodes.issue(stores, user.id, 'verify_email');

          return ok({
            user: toPublicUser(user, roles.map(role => role.name)),
            pending: { email: user.email, code },
          });
        });
      } catch (error) {
        // Two concurrent sign-ups for one email: the loser hits the unique index
        if (error instanceof UniqueConstraintError) {
          return fail('Conflict', USER_EXISTS_MESSAGE);
        }
        throw error;
      }

      if (!result.ok) {
        return result;
      }

      this.metrics.recordNewUser(CREDENTIALS_PROVIDER_ID);
      this.logger.log(`User ${result.value.user.id} signed up`);
      await this.dispatchVerificationEmail(result.value.pending);
      return ok(result.value.user);
    });
  }

  async signIn(input: SignInInput): Promise<AuthResult<TokenResponse>> {
    return this.metrics.track<TokenResponse>('sign_in', CREDENTIALS_PROVIDER_ID, async () => {
      const email = sanitizeEmail(input.email);

      const result = await this.unitOfWork.run<TokenResponse>(async stores => {
        const user = await stores.users.findByEmail(email);
        if (!user) {
          return fail('Unauthorized', INVALID_CREDENTIALS_MESSAGE);
        }

        const accounts = await stores.accounts.findByUserId(user.id);
        const credentials = accounts.find(account => account.providerId === CREDENTIALS_PROVIDER_ID);
        if (!credentials?.password) {
          return fail('Unauthorized', INVALID_CREDENTIALS_MESSAGE);
        }

        const valid = await this.passwordService.verifyPassword(input.password, credentials.password);
        if (!valid) {
          return fail('Unauthorized', INVALID_CREDENTIALS_MESSAGE);
        }

        const { session, tokens } = await this.sessionIssuer.start(stores, user.id);
        this.logger.log(`User ${user.id} signed in (session ${session.id})`);
        return ok(tokens);
      });

      if (!result.ok) {
        this.logger.warn(`Failed sign-in for ${maskEmail(email)}`);
      }
      return result;
    });
  }

  async refresh(refreshToken: string): Promise<AuthResult<TokenResponse>> {
    return this.metrics.track<TokenResponse>('refresh', CREDENTIALS_PROVIDER_ID, async () => {
      let claims: RefreshTokenClaims;
      try {
        claims = this.tokenService.verifyRefreshToken(refreshToken);
      } catch (error) {
        if (error instanceof TokenVerificationError) {
          return fail('Unauthorized', 'Invalid refresh token');
        }
        throw error;
      }
      const { sub: userId, sessionId } = claims;

      return this.unitOfWork.run<TokenResponse>(async stores => {
        const session = await stores.sessions.findById(sessionId);
        if (!session || session.userId !== userId || this.sessionIssuer.isExpired(session)) {
          return fail('NotFound', 'Session not found');
        }

        const renewed = await this.sessionIssuer.renew(stores, session);
        if (!renewed) {
          return fail('NotFound', 'Session not found');
        }
        return ok(renewed.tokens);
      });
    });
  }

  /**
   * Deletes the session. Signing out of an already-deleted session succeeds.
   */
  async signOut(sessionId: string): Promise<AuthResult<void>> {
    return this.metrics.track<void>('sign_out', CREDENTIALS_PROVIDER_ID, () =>
      this.unitOfWork.run<void>(async stores => {
        await stores.sessions.delete(sessionId);
        return ok(undefined);
      }),
    );
  }

  async verifyEmail(input: VerifyEmailInput): Promise<AuthResult<void>> {
    return this.metrics.track<void>('verify_email', CREDENTIALS_PROVIDER_ID, () =>
      this.unitOfWork.run<void>(async stores => {
        const record = await stores.verificationCodes.findByToken(input.token);
        if (!record) {
          return fail('NotFound', 'Verification code not found');
        }
        if (record.intent !== 'verify_email') {
          return fail('BadRequest', 'Invalid verification code type');
        }
        if (input.code !== undefined && !this.verificationCodes.matchesValue(record, input.code)) {
          return fail('Unauthorized', 'Invalid verification code');
        }
        if (this.verificationCodes.isExpired(record)) {
          return fail('Unauthorized', 'Verification code has expired');
        }

        // Whoever deletes the row first wins; a concurrent redeemer sees NotFound
        if (!(await stores.verificationCodes.consume(record.id))) {
          return fail('NotFound', 'Verification code not found');
        }
        await stores.users.update(record.userId, { emailVerified: true });

        this.logger.log(`User ${record.userId} verified their email`);
        return ok(undefined);
      }),
    );
  }

  /**
   * Always succeeds so that callers cannot probe which emails are registered
   */
  async resendVerification(rawEmail: string): Promise<AuthResult<void>> {
    const email = sanitizeEmail(rawEmail);

    const pending = await this.issueQuietly(async stores => {
      const user = await stores.users.findByEmail(email);
      if (!user || user.emailVerified) {
        return ok(null);
      }
      const code = await this.verificationCodes.issue(stores, user.id, 'verify_email');
      return ok({ email: user.email, code });
    });

    if (pending) {
      await this.dispatchVerificationEmail(pending);
    } else {
      this.logger.warn(`Verification resend skipped for ${maskEmail(email)}`);
    }
    return ok(undefined);
  }

  /**
   * Always succeeds so that callers cannot probe which emails are registered
   */
  async forgotPassword(rawEmail: string): Promise<AuthResult<void>> {
    const email = sanitizeEmail(rawEmail);

    const pending = await this.issueQuietly(async stores => {
      const user = await stores.users.findByEmail(email);
      if (!user) {
        return ok(null);
      }
      const credentials = await stores.accounts.findByUserAndProvider(
        user.id,
        CREDENTIALS_PROVIDER_ID,
      );
      if (!credentials) {
        return ok(null);
      }
      const code = await this.verificationCodes.issue(stores, user.id, 'forgot_password');
      return ok({ email: user.email, code });
    });

    if (pending) {
      await this.dispatchPasswordResetEmail(pending.email, pending.code);
    } else {
      this.logger.warn(`Password reset skipped for ${maskEmail(email)}`);
    }
    return ok(undefined);
  }

  /**
   * Sets a new password and signs the user out of every session
   */
  async resetPassword(input: ResetPasswordInput): Promise<AuthResult<void>> {
    return this.metrics.track<void>('reset_password', CREDENTIALS_PROVIDER_ID, () =>
      this.unitOfWork.run<void>(async stores => {
        const record = await stores.verificationCodes.findByToken(input.token);
        if (!record) {
          return fail('NotFound', 'Reset token not found');
        }
        if (record.intent !== 'forgot_password') {
          return fail('BadRequest', 'Invalid reset token');
        }
        if (input.code !== undefined && !this.verificationCodes.matchesValue(record, input.code)) {
          return fail('BadRequest', 'Invalid reset code');
        }
        if (this.verificationCodes.isExpired(record)) {
          return fail('BadRequest', 'Reset token has expired');
        }

        const credentials = await stores.accounts.findByUserAndProvider(
          record.userId,
          CREDENTIALS_PROVIDER_ID,
        );
        if (!credentials) {
          return fail('NotFound', 'No password is set for this account');
        }

        if (!(await stores.verificationCodes.consume(record.id))) {
          return fail('NotFound', 'Reset token not found');
        }

        const passwordHash = await this.passwordService.hashPassword(input.password);
        await stores.accounts.update(credentials.id, { password: passwordHash });
        const revoked = await stores.sessions.deleteByUserId(record.userId);

        this.logger.log(`User ${record.userId} reset their password (${revoked} sessions revoked)`);
        return ok(undefined);
      }),
    );
  }

  async getProfile(userId: string): Promise<AuthResult<PublicUser>> {
    return this.unitOfWork.run<PublicUser>(async stores => {
      const user = await stores.users.findById(userId);
      if (!user) {
        return fail('NotFound', 'User not found');
      }
      return ok(toPublicUser(user, await stores.roles.listRoleNames(userId)));
    });
  }

  /**
   * Code issuance for the always-succeeding flows. Losing a race with a
   * concurrent issuance for the same user yields null; the other code stands.
   */
  private async issueQuietly(
    work: (stores: IdentityStores) => Promise<AuthResult<PendingEmail | null>>,
  ): Promise<PendingEmail | null> {
    try {
      const result = await this.unitOfWork.run<PendingEmail | null>(work);
      return result.ok ? result.value : null;
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        this.logger.warn(`Concurrent code issuance collided on ${error.constraint}`);
        return null;
      }
      throw error;
    }
  }

  private async dispatchPasswordResetEmail(email: string, code: VerificationCode): Promise<void> {
    const link = this.verificationCodes.buildLink('forgot_password', code.token);
    try {
      const sent = await this.emailSender.sendPasswordResetEmail(email, link);
      if (!sent) {
        this.logger.warn(`Password reset email could not be sent to ${maskEmail(email)}`);
      }
    } catch (error) {
      this.logger.error(
        `Password reset email to ${maskEmail(email)} failed`,
        error instanceof Error ? error.stack : error,
      );
    }
  }

  private async dispatchVerificationEmail({ email, code }: PendingEmail): Promise<void> {
    const link = this.verificationCodes.buildLink('verify_email', code.token);
    try {
      const sent = await this.emailSender.sendVerificationEmail(email, code.value, link);
      if (!sent) {
        this.logger.warn(`Verification email could not be sent to ${maskEmail(email)}`);
      }
    } catch (error) {
      // The code is already committed; the user can ask for a resend
      this.logger.error(
        `Verification email to ${maskEmail(email)} failed`,
        error instanceof Error ? error.stack : error,
      );
    }
  }
}
