import { Logger } from '@nestjs/common';
import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import { ZodType, ZodTypeDef } from 'zod';
import {
  OAuthProfile,
  OAuthProvider,
  OAuthProviderError,
  OAuthProviderErrorCode,
  OAuthTokenSet,
} from '../interfaces/oauth-provider.interface';

/**
 * HTTP plumbing shared by OAuth providers. 4xx answers become
 * PROVIDER_REJECTED; timeouts, connection failures and 5xx answers become
 * PROVIDER_UNREACHABLE; a 2xx body that fails its schema is INVALID_RESPONSE.
 */
export abstract class BaseOAuthProvider implements OAuthProvider {
  protected readonly logger: Logger;
  protected readonly httpClient: AxiosInstance;

  protected constructor(
    readonly id: string,
    timeoutMs: number,
  ) {
    this.logger = new Logger(`${id}OAuthProvider`);
    this.httpClient = axios.create({
      timeout: timeoutMs,
      headers: { Accept: 'application/json' },
      // 4xx answers are inspected below; 5xx are thrown by axios
      validateStatus: status => status < 500,
    });
  }

  abstract isConfigured(): boolean;
  abstract buildAuthorizationUrl(state: string): string;
  abstract exchangeCode(code: string): Promise<OAuthTokenSet>;
  abstract fetchProfile(accessToken: string): Promise<OAuthProfile>;

  protected async postForm<T>(
    url: string,
    form: Record<string, string>,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T> {
    const response = await this.send(() =>
      this.httpClient.post<unknown>(url, new URLSearchParams(form).toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      }),
    );
    return this.parseBody(response, schema);
  }

  protected async getJson<T>(
    url: string,
    accessToken: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T> {
    const response = await this.send(() =>
      this.httpClient.get<unknown>(url, {
        headers: { Authorization: `Bearer ${accessToken}` },
      }),
    );
    return this.parseBody(response, schema);
  }

  private async send(
    request: () => Promise<AxiosResponse<unknown>>,
  ): Promise<AxiosResponse<unknown>> {
    let response: AxiosResponse<unknown>;
    try {
      response = await request();
    } catch (error) {
      throw this.toProviderError(error);
    }

    if (response.status >= 400) {
      this.logger.warn(`Provider rejected request with HTTP ${response.status}`);
      throw new OAuthProviderError(
        `Provider rejected the request with HTTP ${response.status}`,
        OAuthProviderErrorCode.PROVIDER_REJECTED,
        this.id,
        response.status,
      );
    }
    return response;
  }

  private parseBody<T>(
    response: AxiosResponse<unknown>,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): T {
    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      this.logger.warn(`Provider returned an unexpected body: ${parsed.error.issues[0]?.message}`);
      throw new OAuthProviderError(
        'Provider returned an unexpected response',
        OAuthProviderErrorCode.INVALID_RESPONSE,
        this.id,
        response.status,
      );
    }
    return parsed.data;
  }

  private toProviderError(error: unknown): OAuthProviderError {
    if (error instanceof AxiosError) {
      const status = error.response?.status;
      this.logger.warn(
        `Provider request failed: ${status ? `HTTP ${status}` : (error.code ?? error.message)}`,
      );
      return new OAuthProviderError(
        status ? `Provider failed with HTTP ${status}` : 'Provider could not be reached',
        OAuthProviderErrorCode.PROVIDER_UNREACHABLE,
        this.id,
        status,
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Unexpected provider client failure: ${message}`);
    return new OAuthProviderError(
      'Provider could not be reached',
      OAuthProviderErrorCode.PROVIDER_UNREACHABLE,
      this.id,
    );
  }
}
