import { Inject, Injectable, Logger } from '@nestjs/common';
import { AUTHORIZATION_API_OPTIONS } from './authorization-api.constants';
import { AuthorizationApiModuleOptions } from './authorization-api.interfaces';
import { AuthorizationResponse } from './AuthorizationResponse';
import { parseAuthorizationResponse } from './response-codec';
import { AuthorizationRequest } from './types';

const DEFAULT_TIMEOUT_MS = 5000;
const MAX_LOG_BODY_LENGTH = 500;
const AUTHORIZATION_PATH = '/api/auth/authorization';

/**
 * The response handed out when the API cannot be reached or answers with
 * something unusable. `INTERNAL_SERVER_ERROR` tells the caller to answer 500.
 */
function failClosed(message: string): AuthorizationResponse {
  return new AuthorizationResponse({
    action: 'INTERNAL_SERVER_ERROR',
    resultMessage: message,
    responseContent: JSON.stringify({
      error: 'server_error',
      error_description: message,
    }),
  });
}

function truncate(body: string): string {
  return body.length > MAX_LOG_BODY_LENGTH ? body.substring(0, MAX_LOG_BODY_LENGTH) + '...' : body;
}

/** Names only: values such as `login_hint` or `id_token_hint` identify the end-user. */
function parameterNames(parameters: string): string {
  return [...new Set(new URLSearchParams(parameters).keys())].join(', ');
}

@Injectable()
export class AuthorizationApiService {
  private readonly logger = new Logger(AuthorizationApiService.name);
  private readonly timeoutMs: number;
  private readonly authorizationUrl: string;
  private readonly authorizationHeader: string | null;

  constructor(
    @Inject(AUTHORIZATION_API_OPTIONS)
    private readonly options: AuthorizationApiModuleOptions,
  ) {
    const parsedUrl = new URL(this.options.baseUrl);
    if (parsedUrl.protocol === 'http:') {
      if (!this.options.allowInsecureConnections) {
        throw new Error(
          `Authorization API base URL uses HTTP (${this.options.baseUrl}). ` +
          'Requests carry API credentials and end-user authorization parameters. ' +
          'Use HTTPS or set allowInsecureConnections: true to accept the risk.',
        );
      }
      this.logger.warn(
        'Authorization API connection uses unencrypted HTTP. API credentials and authorization ' +
        'parameters are transmitted in plaintext. Do not use HTTP in production.',
      );
    }
    this.authorizationHeader = this.buildAuthorizationHeader();
    this.authorizationUrl = new URL(AUTHORIZATION_PATH, this.options.baseUrl).toString();
    this.timeoutMs = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.logger.log(`Authorization API configured at ${this.options.baseUrl}`);
  }

  private buildAuthorizationHeader(): string | null {
    const { apiKey, apiSecret, token } = this.options;
    const hasBasic = apiKey !== undefined || apiSecret !== undefined;
    if (token !== undefined && hasBasic) {
      throw new Error('Configure either token or apiKey/apiSecret for the authorization API, not both.');
    }
    if (token !== undefined) {
      return `Bearer ${token}`;
    }
    if (hasBasic) {
      if (apiKey === undefined || apiSecret === undefined) {
        throw new Error('apiKey and apiSecret must be configured together.');
      }
      return `Basic ${Buffer.from(`${apiKey}:${apiSecret}`).toString('base64')}`;
    }
    return null;
  }

  /**
   * Call `/auth/authorization` with the query parameters of an end-user's
   * authorization request. Never rejects: transport and decoding failures
   * resolve to an `INTERNAL_SERVER_ERROR` response.
   */
  async authorization(request: AuthorizationRequest): Promise<AuthorizationResponse> {
    this.logger.debug(`Requesting authorization with parameters: ${parameterNames(request.parameters)}`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const headers: Record<string, string> = {
        'Content-Type': 'application/json',
        'Accept': 'application/json',
      };
      if (this.authorizationHeader) {
        headers['Authorization'] = this.authorizationHeader;
      }

      const response = await fetch(
        this.authorizationUrl,
        {
          method: 'POST',
          headers,
          body: JSON.stringify(request),
          signal: controller.signal,
        },
      );

      if (!response.ok) {
        let responseBody = '';
        try {
          responseBody = await response.text();
        } catch {
          /* body is only used for the log line */
        }
        this.logger.error(
          `Authorization API returned HTTP ${response.status} (${response.statusText}) ` +
            `for ${this.authorizationUrl}` +
            (responseBody ? ` -- body: ${truncate(responseBody)}` : ''),
        );
        return failClosed(`Authorization API returned HTTP ${response.status}`);
      }

      const body: unknown = await response.json();
      const result = parseAuthorizationResponse(body, this.logger);
      if (result.action === null) {
        this.logger.error(
          `Authorization API response from ${this.authorizationUrl} has no valid action: ${result.summarize()}`,
        );
        return failClosed('Authorization API response has no valid action');
      }
      this.logger.debug(`Authorization response: ${result.summarize()}`);
      return result;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        this.logger.error(
          `Authorization API request to ${this.authorizationUrl} timed out after ${this.timeoutMs}ms`,
        );
        return failClosed(`Authorization API request timed out after ${this.timeoutMs}ms`);
      }
      const msg = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Authorization API request to ${this.authorizationUrl} failed: ${msg}`,
      );
      return failClosed(`Authorization API request failed: ${msg}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}
