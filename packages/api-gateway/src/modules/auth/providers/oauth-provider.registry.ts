import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '../../../config/services/config.service';
import { OAUTH_PROVIDERS } from '../constants/auth.constants';
import { OAuthProvider } from '../interfaces/oauth-provider.interface';

/**
 * Looks up OAuth providers that are both enabled and configured
 */
@Injectable()
export class OAuthProviderRegistry {
  private readonly logger = new Logger(OAuthProviderRegistry.name);
  private readonly providers = new Map<string, OAuthProvider>();

  constructor(
    @Inject(OAUTH_PROVIDERS) providers: OAuthProvider[],
    configService: ConfigService,
  ) {
    const enabled = new Set(configService.settings.oauth.enabledProviders);

    for (const provider of providers) {
      if (!enabled.has(provider.id)) {
        this.logger.log(`OAuth provider ${provider.id} is disabled`);
        continue;
      }
      if (!provider.isConfigured()) {
        this.logger.warn(`OAuth provider ${provider.id} is enabled but not configured`);
        continue;
      }
      this.providers.set(provider.id, provider);
    }

    this.logger.log(`Registered OAuth providers: ${this.list().join(', ') || 'none'}`);
  }

  get(id: string): OAuthProvider | null {
    return this.providers.get(id.toLowerCase()) ?? null;
  }

  list(): string[] {
    return [...this.providers.keys()];
  }
}
