import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ERROR_CODES } from '../../../common/constants/error-codes';
import { ZodValidationPipe } from '../../../common/pipes/zod-validation.pipe';
import {
  OAuthCallbackQuery,
  OAuthCallbackQuerySchema,
  OAuthInitiateQuery,
  OAuthInitiateQuerySchema,
} from '../../../common/validation/auth.schema';
import { Public } from '../decorators/public.decorator';
import { OAuthInitiation, OAuthService, OAuthSignIn } from '../services/oauth.service';
import { unwrapResult } from '../utils/auth-result.mapper';

@ApiTags('oauth')
@Controller('v1/auth/oauth')
export class OAuthController {
  constructor(private readonly oauthService: OAuthService) {}

  @Public()
  @Get(':provider')
  @ApiOperation({ summary: 'Start an OAuth sign-in; returns the provider authorization URL' })
  async initiate(
    @Param('provider') provider: string,
    @Query(new ZodValidationPipe(OAuthInitiateQuerySchema)) query: OAuthInitiateQuery,
  ): Promise<OAuthInitiation> {
    return unwrapResult(await this.oauthService.initiate(provider, query.role), {
      BadRequest: ERROR_CODES.AUTH_INVALID_REQUEST,
    });
  }

  @Public()
  @Get(':provider/callback')
  @ApiOperation({ summary: 'Complete an OAuth sign-in and issue a token pair' })
  async callback(
    @Param('provider') provider: string,
    @Query(new ZodValidationPipe(OAuthCallbackQuerySchema)) query: OAuthCallbackQuery,
  ): Promise<OAuthSignIn> {
    return unwrapResult(await this.oauthService.handleCallback(provider, query), {
      Unauthorized: ERROR_CODES.AUTH_OAUTH_FAILED,
      Conflict: ERROR_CODES.CONFLICT_RESOURCE_STATE,
    });
  }
}
