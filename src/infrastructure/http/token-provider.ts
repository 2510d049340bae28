import { ClientCredentials } from 'simple-oauth2';
import type { AccessToken } from 'simple-oauth2';
import { TransportError } from './errors.js';

/** Anything that can produce a bearer token for the agent API. */
export interface AccessTokenSource {
  getAccessToken(): Promise<string>;
}

export interface OAuthTokenProviderOptions {
  authUrl: string;
  clientId: string;
  clientSecret: string;
  audience?: string | undefined;
  tokenPath?: string | undefined;
}

/** Refresh this many seconds before the token actually expires. */
const EXPIRY_WINDOW_SECONDS = 60;

/**
 * OAuth 2.0 client-credentials tokens via simple-oauth2.
 *
 * The token is cached until it is about to expire. Callers that ask while
 * a token request is already on the wire share that request; the ack
 * fan-out would otherwise fetch one token per event.
 */
export class OAuthTokenProvider implements AccessTokenSource {
  private readonly oauth: ClientCredentials;
  private readonly audience: string | undefined;
  private cached: AccessToken | null = null;
  private pending: Promise<AccessToken> | null = null;

  constructor(options: OAuthTokenProviderOptions) {
    this.audience = options.audience;
    this.oauth = new ClientCredentials({
      client: { id: options.clientId, secret: options.clientSecret },
      auth: {
        tokenHost: options.authUrl,
        tokenPath: options.tokenPath ?? '/oauth/token',
      },
      options: {
        // Credentials go in a JSON body rather than a Basic auth header.
        authorizationMethod: 'body',
        bodyFormat: 'json',
      },
    });
  }

  async getAccessToken(): Promise<string> {
    let token = this.cached;
    if (!token || token.expired(EXPIRY_WINDOW_SECONDS)) {
      token = await this.requestToken();
      this.cached = token;
    }

    const accessToken: unknown = token.token['access_token'];
    if (typeof accessToken !== 'string') {
      throw new TransportError('OAuth token response is missing access_token', {
        operation: 'token',
        retryable: false,
      });
    }
    return accessToken;
  }

  private requestToken(): Promise<AccessToken> {
    if (!this.pending) {
      const params = this.audience ? { audience: this.audience } : {};
      this.pending = this.oauth
        .getToken(params)
        .catch((err: unknown) => {
          throw new TransportError('Failed to obtain access token', {
            operation: 'token',
            retryable: true,
            cause: err,
          });
        })
        .finally(() => {
          this.pending = null;
        });
    }
    return this.pending;
  }
}
