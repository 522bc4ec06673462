import { Injectable } from '@nestjs/common';
import { randomBytes, randomInt, timingSafeEqual } from 'crypto';
import { ConfigService } from '../../../config/services/config.service';
import { VERIFICATION_CODE_LENGTH } from '../constants/auth.constants';
import { IdentityStores } from '../interfaces/identity-stores.interface';
import { VerificationCode, VerificationIntent } from '../interfaces/identity.types';

/**
 * Creates single-use verification artifacts: a short numeric code for typing
 * and a long random token for links.
 */
@Injectable()
export class VerificationCodeService {
  private readonly ttlMs: number;
  private readonly apiBaseUrl: string;

  constructor(configService: ConfigService) {
    this.ttlMs = configService.settings.auth.verificationCodeTtlMinutes * 60 * 1000;
    this.apiBaseUrl = configService.settings.http.apiBaseUrl;
  }

  generateCode(): string {
    return randomInt(0, 10 ** VERIFICATION_CODE_LENGTH)
      .toString()
      .padStart(VERIFICATION_CODE_LENGTH, '0');
  }

  generateToken(): string {
    return randomBytes(32).toString('hex');
  }

  /**
   * Stores a fresh code for (user, intent), replacing any previous one
   */
  async issue(
    stores: IdentityStores,
    userId: string,
    intent: VerificationIntent,
  ): Promise<VerificationCode> {
    return stores.verificationCodes.replace({
      userId,
      intent,
      value: this.generateCode(),
      token: this.generateToken(),
      expiresAt: new Date(Date.now() + this.ttlMs),
    });
  }

  isExpired(code: VerificationCode, now: Date = new Date()): boolean {
    return now.getTime() > code.expiresAt.getTime();
  }

  matchesValue(code: VerificationCode, candidate: string): boolean {
    const expected = Buffer.from(code.value);
    const actual = Buffer.from(candidate);
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }

  buildLink(intent: VerificationIntent, token: string): string {
    const path = intent === 'verify_email' ? 'verify-email' : 'reset-password';
    return `${this.apiBaseUrl}/api/v1/auth/${path}?token=${encodeURIComponent(token)}`;
  }
}
