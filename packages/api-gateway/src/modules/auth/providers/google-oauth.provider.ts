import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { ConfigService } from '../../../config/services/config.service';
import { OAuthProfile, OAuthTokenSet } from '../interfaces/oauth-provider.interface';
import { BaseOAuthProvider } from './base-oauth.provider';

export const GOOGLE_AUTHORIZATION_URL = 'https://accounts.google.com/o/oauth2/v2/auth';
export const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const GOOGLE_USERINFO_URL = 'https://openidconnect.googleapis.com/v1/userinfo';

const GOOGLE_SCOPES = ['openid', 'email', 'profile'];

const GoogleTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('Bearer'),
  expires_in: z.number().int().positive().optional(),
  refresh_token: z.string().optional(),
  id_token: z.string().optional(),
  scope: z.string().optional(),
});

const GoogleUserInfoSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email().optional(),
  email_verified: z.boolean().optional(),
  name: z.string().optional(),
  given_name: z.string().optional(),
  family_name: z.string().optional(),
  picture: z.string().url().optional(),
});

@Injectable()
export class GoogleOAuthProvider extends BaseOAuthProvider {
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly redirectUri: string;

  constructor(configService: ConfigService) {
    const { google, httpTimeoutMs } = configService.settings.oauth;
    super('google', httpTimeoutMs);
    this.clientId = google.clientId;
    this.clientSecret = google.clientSecret;
    this.redirectUri = google.redirectUri;

    if (!this.isConfigured()) {
      this.logger.warn('Google OAuth client id/secret not configured');
    }
  }

  isConfigured(): boolean {
    return this.clientId.length > 0 && this.clientSecret.length > 0;
  }

  buildAuthorizationUrl(state: string): string {
    const url = new URL(GOOGLE_AUTHORIZATION_URL);
    url.search = new URLSearchParams({
      client_id: this.clientId,
      redirect_uri: this.redirectUri,
      response_type: 'code',
      scope: GOOGLE_SCOPES.join(' '),
      state,
      access_type: 'offline',
      prompt: 'select_account',
    }).toString();
    return url.toString();
  }

  async exchangeCode(code: string): Promise<OAuthTokenSet> {
    const body = await this.postForm(
      GOOGLE_TOKEN_URL,
      {
        code,
        client_id: this.clientId,
        client_secret: this.clientSecret,
        redirect_uri: this.redirectUri,
        grant_type: 'authorization_code',
      },
      GoogleTokenResponseSchema,
    );

    return {
      accessToken: body.access_token,
      tokenType: body.token_type,
      refreshToken: body.refresh_token ?? null,
      idToken: body.id_token ?? null,
      expiresIn: body.expires_in ?? null,
      scope: body.scope ?? null,
    };
  }

  async fetchProfile(accessToken: string): Promise<OAuthProfile> {
    const info = await this.getJson(GOOGLE_USERINFO_URL, accessToken, GoogleUserInfoSchema);
    const email = info.email ? info.email.toLowerCase() : null;

    return {
      id: info.sub,
      email,
      emailVerified: info.email_verified ?? false,
      name: info.name ?? [info.given_name, info.family_name].filter(Boolean).join(' '),
      firstName: info.given_name ?? null,
      lastName: info.family_name ?? null,
      picture: info.picture ?? null,
    };
  }
}
