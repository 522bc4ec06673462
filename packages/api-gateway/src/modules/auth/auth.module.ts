import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigService } from '../../config/services/config.service';
import { EMAIL_SENDER, OAUTH_PROVIDERS, STATE_CACHE, UNIT_OF_WORK } from './constants/auth.constants';
import { AuthMetricsController } from './controllers/auth-metrics.controller';
import { AuthController } from './controllers/auth.controller';
import { MaintenanceController } from './controllers/maintenance.controller';
import { OAuthController } from './controllers/oauth.controller';
import { RolesGuard } from './guards/roles.guard';
import { SessionAuthGuard } from './guards/session-auth.guard';
import { OAuthProvider } from './interfaces/oauth-provider.interface';
import { GoogleOAuthProvider } from './providers/google-oauth.provider';
import { OAuthProviderRegistry } from './providers/oauth-provider.registry';
import { DrizzleUnitOfWork } from './repositories/drizzle-unit-of-work';
import { AuthMetricsService } from './services/auth-metrics.service';
import { AuthService } from './services/auth.service';
import { EmailService } from './services/email.service';
import { OAuthService } from './services/oauth.service';
import { PasswordService } from './services/password.service';
import { RedisStateCache } from './services/redis-state-cache.service';
import { RoleSeederService } from './services/role-seeder.service';
import { SessionIssuerService } from './services/session-issuer.service';
import { SessionSweeperService } from './services/session-sweeper.service';
import { TokenService } from './services/token.service';
import { VerificationCodeService } from './services/verification-code.service';

@Module({
  controllers: [AuthController, OAuthController, AuthMetricsController, MaintenanceController],
  providers: [
    { provide: UNIT_OF_WORK, useClass: DrizzleUnitOfWork },
    { provide: STATE_CACHE, useClass: RedisStateCache },
    { provide: EMAIL_SENDER, useClass: EmailService },
    {
      provide: OAUTH_PROVIDERS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): OAuthProvider[] => [
        new GoogleOAuthProvider(configService),
      ],
    },
    OAuthProviderRegistry,
    AuthMetricsService,
    PasswordService,
    TokenService,
    VerificationCodeService,
    SessionIssuerService,
    AuthService,
    OAuthService,
    RoleSeederService,
    SessionSweeperService,
    // Every route requires a live session unless marked @Public()
    { provide: APP_GUARD, useClass: SessionAuthGuard },
    { provide: APP_GUARD, useClass: RolesGuard },
  ],
  exports: [AuthService, OAuthService, TokenService],
})
export class AuthModule {}
