import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Query,
  Req,
  Res,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import type { CookieSerializeOptions } from '@fastify/cookie';
import { FastifyReply, FastifyRequest } from 'fastify';
import { ConfigService } from '../../../config/services/config.service';
import { ERROR_CODES } from '../../../common/constants/error-codes';
import { ZodValidationPipe } from '../../../common/pipes/zod-validation.pipe';
import {
  EmailVerification,
  EmailVerificationSchema,
  ForgotPassword,
  ForgotPasswordSchema,
  RefreshTokenRequest,
  RefreshTokenRequestSchema,
  ResendVerification,
  ResendVerificationSchema,
  ResetPassword,
  ResetPasswordSchema,
  SignInRequest,
  SignInRequestSchema,
  SignUpRequest,
  SignUpRequestSchema,
  TokenQuery,
  TokenQuerySchema,
} from '../../../common/validation/auth.schema';
import { CurrentPrincipal } from '../decorators/current-principal.decorator';
import { Public } from '../decorators/public.decorator';
import { ACCESS_TOKEN_COOKIE } from '../guards/session-auth.guard';
import { PublicUser } from '../interfaces/identity.types';
import { AuthenticatedPrincipal } from '../interfaces/principal.interface';
import { AuthService } from '../services/auth.service';
import { TokenResponse } from '../services/token.service';
import { unwrapResult } from '../utils/auth-result.mapper';

export interface MessageResponse {
  message: string;
}

@ApiTags('auth')
@Controller('v1/auth')
export class AuthController {
  private readonly logger = new Logger(AuthController.name);
  private readonly webAppUrl: string;
  private readonly cookieOptions: CookieSerializeOptions;

  constructor(
    private readonly authService: AuthService,
    configService: ConfigService,
  ) {
    this.webAppUrl = configService.settings.http.webAppUrl;
    this.cookieOptions = {
      httpOnly: true,
      secure: configService.isProduction(),
      sameSite: 'lax',
      path: '/',
      maxAge: configService.settings.auth.accessTokenTtlSeconds,
    };
  }

  @Public()
  @Post('sign-up')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a password account and send a verification email' })
  async signUp(
    @Body(new ZodValidationPipe(SignUpRequestSchema)) body: SignUpRequest,
  ): Promise<PublicUser> {
    return unwrapResult(await this.authService.signUp(body), {
      Conflict: ERROR_CODES.CONFLICT_DUPLICATE_EMAIL,
      NotFound: ERROR_CODES.NOT_FOUND_ROLE,
    });
  }

  @Public()
  @Post('sign-in')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange email and password for a token pair' })
  async signIn(
    @Body(new ZodValidationPipe(SignInRequestSchema)) body: SignInRequest,
    @Req() request: FastifyRequest,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<TokenResponse> {
    const tokens = unwrapResult(await this.authService.signIn(body), {
      Unauthorized: ERROR_CODES.AUTH_INVALID_CREDENTIALS,
    });
    this.setCookieIfWeb(request, reply, tokens.accessToken);
    return tokens;
  }

  @Public()
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Extend the session and issue a new token pair' })
  async refresh(
    @Body(new ZodValidationPipe(RefreshTokenRequestSchema)) body: RefreshTokenRequest,
    @Req() request: FastifyRequest,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<TokenResponse> {
    const tokens = unwrapResult(await this.authService.refresh(body.refreshToken), {
      Unauthorized: ERROR_CODES.AUTH_TOKEN_INVALID,
      NotFound: ERROR_CODES.NOT_FOUND_SESSION,
    });
    this.setCookieIfWeb(request, reply, tokens.accessToken);
    return tokens;
  }

  @Post('sign-out')
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'End the current session' })
  async signOut(
    @CurrentPrincipal() principal: AuthenticatedPrincipal,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<MessageResponse> {
    unwrapResult(await this.authService.signOut(principal.sessionId));
    reply.clearCookie(ACCESS_TOKEN_COOKIE, { path: '/' });
    return { message: 'Signed out' };
  }

  @Public()
  @Post('verify-email')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Verify an email address with the emailed token and code' })
  async verifyEmail(
    @Body(new ZodValidationPipe(EmailVerificationSchema)) body: EmailVerification,
  ): Promise<MessageResponse> {
    unwrapResult(await this.authService.verifyEmail(body), {
      NotFound: ERROR_CODES.NOT_FOUND_VERIFICATION_CODE,
      Unauthorized: ERROR_CODES.AUTH_VERIFICATION_FAILED,
    });
    return { message: 'Email verified' };
  }

  /**
   * Target of the emailed link; reports the outcome to the web app
   */
  @Public()
  @Get('verify-email')
  @ApiOperation({ summary: 'Verify an email address from the emailed link' })
  async verifyEmailFromLink(
    @Query(new ZodValidationPipe(TokenQuerySchema)) query: TokenQuery,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const result = await this.authService.verifyEmail({ token: query.token });
    const target = new URL(`${this.webAppUrl}/auth/email-verified`);
    target.searchParams.set('success', String(result.ok));
    if (!result.ok) {
      target.searchParams.set('error', result.error.message);
    }
    await reply.redirect(target.toString());
  }

  @Public()
  @Post('resend-verification')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Send a fresh verification email if the account needs one' })
  async resendVerification(
    @Body(new ZodValidationPipe(ResendVerificationSchema)) body: ResendVerification,
  ): Promise<MessageResponse> {
    unwrapResult(await this.authService.resendVerification(body.email));
    return { message: 'Verification email sent if the account exists' };
  }

  @Public()
  @Post('forgot-password')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Send a password reset email if the account exists' })
  async forgotPassword(
    @Body(new ZodValidationPipe(ForgotPasswordSchema)) body: ForgotPassword,
  ): Promise<MessageResponse> {
    unwrapResult(await this.authService.forgotPassword(body.email));
    return { message: 'Password reset email sent if the account exists' };
  }

  @Public()
  @Post('reset-password')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Set a new password with a reset token' })
  async resetPassword(
    @Body(new ZodValidationPipe(ResetPasswordSchema)) body: ResetPassword,
  ): Promise<MessageResponse> {
    unwrapResult(await this.authService.resetPassword(body), {
      NotFound: ERROR_CODES.NOT_FOUND_VERIFICATION_CODE,
    });
    return { message: 'Password has been reset successfully' };
  }

  /**
   * Target of the emailed reset link; the web app renders the form
   */
  @Public()
  @Get('reset-password')
  async resetPasswordFromLink(
    @Query(new ZodValidationPipe(TokenQuerySchema)) query: TokenQuery,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const target = new URL(`${this.webAppUrl}/auth/reset-password`);
    target.searchParams.set('token', query.token);
    await reply.redirect(target.toString());
  }

  @Get('me')
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Profile of the signed-in user' })
  async me(@CurrentPrincipal() principal: AuthenticatedPrincipal): Promise<PublicUser> {
    return unwrapResult(await this.authService.getProfile(principal.userId), {
      NotFound: ERROR_CODES.NOT_FOUND_USER,
    });
  }

  /**
   * Browsers get the access token as an HttpOnly cookie as well
   */
  private setCookieIfWeb(request: FastifyRequest, reply: FastifyReply, accessToken: string): void {
    const accept = request.headers.accept;
    if (accept?.includes('text/html')) {
      reply.setCookie(ACCESS_TOKEN_COOKIE, accessToken, this.cookieOptions);
      this.logger.debug('Access token cookie set for web client');
    }
  }
}
