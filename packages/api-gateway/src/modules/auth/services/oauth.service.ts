import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import { ConfigService } from '../../../config/services/config.service';
import {
  DEFAULT_OAUTH_ROLE,
  OAUTH_STATE_KEY_PREFIX,
  STATE_CACHE,
  UNIT_OF_WORK,
} from '../constants/auth.constants';
import { AuthResult, fail, ok } from '../interfaces/auth-result.interface';
import {
  IdentityStores,
  UniqueConstraintError,
  UnitOfWork,
} from '../interfaces/identity-stores.interface';
import { AccountPatch } from '../interfaces/identity.types';
import {
  OAuthProfile,
  OAuthProvider,
  OAuthProviderError,
  OAuthProviderErrorCode,
  OAuthTokenSet,
} from '../interfaces/oauth-provider.interface';
import { StateCache } from '../interfaces/state-cache.interface';
import { OAuthProviderRegistry } from '../providers/oauth-provider.registry';
import { AuthMetricsService } from './auth-metrics.service';
import { SessionIssuerService } from './session-issuer.service';
import { TokenResponse } from './token.service';

const PendingStateSchema = z.object({
  provider: z.string(),
  role: z.string(),
});

type PendingState = z.infer<typeof PendingStateSchema>;

export interface OAuthInitiation {
  url: string;
}

export interface OAuthSignIn extends TokenResponse {
  isNewUser: boolean;
}

export interface OAuthCallbackInput {
  code: string;
  state: string;
}

type Resolution = { userId: string; isNewUser: boolean };

/**
 * Authorization-code federation: initiate hands out a provider URL bound to a
 * single-use state; the callback redeems the state, exchanges the code and
 * maps the provider identity onto a local user.
 */
@Injectable()
export class OAuthService {
  private readonly logger = new Logger(OAuthService.name);
  private readonly stateTtlSeconds: number;

  constructor(
    @Inject(UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork,
    @Inject(STATE_CACHE) private readonly stateCache: StateCache,
    private readonly registry: OAuthProviderRegistry,
    private readonly sessionIssuer: SessionIssuerService,
    private readonly metrics: AuthMetricsService,
    configService: ConfigService,
  ) {
    this.stateTtlSeconds = configService.settings.auth.oauthStateTtlSeconds;
  }

  async initiate(providerId: string, requestedRole?: string): Promise<AuthResult<OAuthInitiation>> {
    return this.metrics.track<OAuthInitiation>('oauth_initiate', providerId, async () => {
      const provider = this.registry.get(providerId);
      if (!provider) {
        return fail('BadRequest', `Unsupported OAuth provider: ${providerId}`);
      }

      // The role is checked now so that the callback never dead-ends on it
      const role = (requestedRole ?? DEFAULT_OAUTH_ROLE).trim().toLowerCase();
      const roleCheck = await this.unitOfWork.run<string>(async stores =>
        (await stores.roles.findByName(role)) ? ok(role) : fail('BadRequest', `Unknown role: ${role}`),
      );
      if (!roleCheck.ok) {
        return roleCheck;
      }

      const state = randomBytes(32).toString('base64url');
      const pending: PendingState = { provider: provider.id, role };
      await this.stateCache.put(
        `${OAUTH_STATE_KEY_PREFIX}${state}`,
        JSON.stringify(pending),
        this.stateTtlSeconds,
      );

      return ok({ url: provider.buildAuthorizationUrl(state) });
    });
  }

  async handleCallback(
    providerId: string,
    input: OAuthCallbackInput,
  ): Promise<AuthResult<OAuthSignIn>> {
    return this.metrics.track<OAuthSignIn>('oauth_callback', providerId, async () => {
      const provider = this.registry.get(providerId);
      if (!provider) {
        return fail('BadRequest', `Unsupported OAuth provider: ${providerId}`);
      }

      // Redeemed exactly once, whatever happens next
      const pending = this.parseState(
        await this.stateCache.take(`${OAUTH_STATE_KEY_PREFIX}${input.state}`),
      );
      if (!pending || pending.provider !== provider.id) {
        return fail('BadRequest', 'Invalid or expired OAuth state');
      }

      const federated = await this.fetchIdentity(provider, input.code);
      if (!federated.ok) {
        return federated;
      }
      const { tokens, profile } = federated.value;

      if (!profile.email) {
        return fail('Unauthorized', 'Provider did not return an email address');
      }
      if (!profile.emailVerified) {
        return fail('Unauthorized', 'Provider email address is not verified');
      }
      const email = profile.email;

      try {
        const result = await this.unitOfWork.run<OAuthSignIn>(async stores => {
          const resolution = await this.resolveUser(stores, provider.id, pending.role, {
            ...profile,
            email,
          }, tokens);
          if (!resolution.ok) {
            return resolution;
          }

          const { tokens: pair } = await this.sessionIssuer.start(stores, resolution.value.userId);
          return ok({ ...pair, isNewUser: resolution.value.isNewUser });
        });

        if (result.ok && result.value.isNewUser) {
          this.metrics.recordNewUser(provider.id);
        }
        return result;
      } catch (error) {
        // Two first-time callbacks for one identity raced; the loser is told to retry
        if (error instanceof UniqueConstraintError) {
          this.logger.warn(`Concurrent ${provider.id} sign-in collided on ${error.constraint}`);
          return fail('Conflict', 'Account is being linked by another request, please retry');
        }
        throw error;
      }
    });
  }

  private parseState(raw: string | null): PendingState | null {
    if (raw === null) {
      return null;
    }
    try {
      const parsed = PendingStateSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      this.logger.warn(
        `Discarding unreadable OAuth state: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }

  private async fetchIdentity(
    provider: OAuthProvider,
    code: string,
  ): Promise<AuthResult<{ tokens: OAuthTokenSet; profile: OAuthProfile }>> {
    try {
      const tokens = await provider.exchangeCode(code);
      const profile = await provider.fetchProfile(tokens.accessToken);
      return ok({ tokens, profile });
    } catch (error) {
      if (!(error instanceof OAuthProviderError)) {
        throw error;
      }
      this.logger.warn(`${provider.id} federation failed: ${error.code} ${error.message}`);
      return error.code === OAuthProviderErrorCode.PROVIDER_UNREACHABLE
        ? fail('ServiceUnavailable', 'OAuth provider is unavailable')
        : fail('Unauthorized', 'Failed to authenticate with provider');
    }
  }

  /**
   * Existing link -> refresh it; same email -> link to that user;
   * otherwise create a verified user with the requested role.
   */
  private async resolveUser(
    stores: IdentityStores,
    providerId: string,
    roleName: string,
    profile: OAuthProfile & { email: string },
    tokens: OAuthTokenSet,
  ): Promise<AuthResult<Resolution>> {
    const tokenFields = this.toAccountTokens(tokens);

    const linked = await stores.accounts.findByProviderAccount(providerId, profile.id);
    if (linked) {
      await stores.accounts.update(linked.id, tokenFields);
      await stores.users.update(linked.userId, {
        ...(profile.name ? { name: profile.name } : {}),
        ...(profile.picture ? { image: profile.picture } : {}),
      });
      return ok({ userId: linked.userId, isNewUser: false });
    }

    const existing = await stores.users.findByEmail(profile.email);
    if (existing) {
      const other = await stores.accounts.findByUserAndProvider(existing.id, providerId);
      if (other) {
        this.logger.warn(`User ${existing.id} already has a different ${providerId} identity`);
        return fail('Conflict', `A different ${providerId} account is already linked to this user`);
      }
      await stores.accounts.create({
        userId: existing.id,
        providerId,
        accountId: profile.id,
        ...tokenFields,
      });
      await stores.users.update(existing.id, { emailVerified: true });
      this.logger.log(`Linked ${providerId} identity to existing user ${existing.id}`);
      return ok({ userId: existing.id, isNewUser: false });
    }

    const role = await stores.roles.findByName(roleName);
    if (!role) {
      return fail('BadRequest', `Unknown role: ${roleName}`);
    }

    const user = await stores.users.create({
      name: profile.name || profile.email.split('@')[0],
      email: profile.email,
      emailVerified: true,
      image: profile.picture,
    });
    await stores.accounts.create({
      userId: user.id,
      providerId,
      accountId: profile.id,
      ...tokenFields,
    });
    await stores.roles.addUserRole(user.id, role.id);

    this.logger.log(`Created user ${user.id} from ${providerId} sign-in`);
    return ok({ userId: user.id, isNewUser: true });
  }

  private toAccountTokens(tokens: OAuthTokenSet): AccountPatch {
    return {
      accessToken: tokens.accessToken,
      // Providers usually send a refresh token only on first consent; keep the stored one
      ...(tokens.refreshToken ? { refreshToken: tokens.refreshToken } : {}),
      idToken: tokens.idToken,
      accessTokenExpiresAt:
        tokens.expiresIn === null ? null : new Date(Date.now() + tokens.expiresIn * 1000),
      scope: tokens.scope,
    };
  }
}
