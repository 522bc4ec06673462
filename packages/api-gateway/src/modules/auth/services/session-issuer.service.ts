import { Injectable } from '@nestjs/common';
import { ConfigService } from '../../../config/services/config.service';
import { IdentityStores } from '../interfaces/identity-stores.interface';
import { Session } from '../interfaces/identity.types';
import { TokenResponse, TokenService } from './token.service';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface IssuedSession {
  session: Session;
  tokens: TokenResponse;
}

/**
 * Creates and renews sessions and mints the token pair bound to them
 */
@Injectable()
export class SessionIssuerService {
  private readonly sessionTtlMs: number;

  constructor(
    private readonly tokenService: TokenService,
    configService: ConfigService,
  ) {
    this.sessionTtlMs = configService.settings.auth.sessionTtlDays * DAY_MS;
  }

  async start(stores: IdentityStores, userId: string): Promise<IssuedSession> {
    const session = await stores.sessions.create({ userId, expiresAt: this.nextExpiry() });
    const roles = await stores.roles.listRoleNames(userId);
    return {
      session,
      tokens: this.tokenService.issuePair({ userId, sessionId: session.id, roles }),
    };
  }

  /**
   * Pushes the session expiry forward and re-reads roles, so role changes
   * show up on the next refresh
   */
  async renew(stores: IdentityStores, session: Session): Promise<IssuedSession | null> {
    const extended = await stores.sessions.extend(session.id, this.nextExpiry());
    if (!extended) {
      return null;
    }
    const roles = await stores.roles.listRoleNames(extended.userId);
    return {
      session: extended,
      tokens: this.tokenService.issuePair({
        userId: extended.userId,
        sessionId: extended.id,
        roles,
      }),
    };
  }

  isExpired(session: Session, now: Date = new Date()): boolean {
    return now.getTime() > session.expiresAt.getTime();
  }

  private nextExpiry(): Date {
    return new Date(Date.now() + this.sessionTtlMs);
  }
}
