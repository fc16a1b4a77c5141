/**
 * GCP authentication provider for the registry scanner.
 * @module auth/provider
 */

import { GoogleAuth, OAuth2Client, type AuthClient } from 'google-auth-library';
import { SecretString } from './secret.js';
import { ScannerError, ScannerErrorKind } from '../errors.js';
import { CLOUD_PLATFORM_SCOPES } from '../types/common.js';
import type { AuthMethod } from '../config.js';

/**
 * OAuth2 token response.
 */
export interface TokenResponse {
  /** Access token */
  accessToken: string;
  /** Token expiration time */
  expiresAt: Date;
  /** Token type (usually "Bearer") */
  tokenType: string;
}

/**
 * Cached token with expiration.
 */
export interface CachedToken {
  /** Access token (wrapped) */
  token: SecretString;
  /** Expiration time */
  expiresAt: Date;
}

/**
 * Source of bearer tokens for API calls.
 */
export interface TokenProvider {
  getToken(): Promise<string>;
}

/**
 * Refresh threshold - refresh token when 20% of TTL remains.
 */
const REFRESH_THRESHOLD = 0.2;

const DEFAULT_TOKEN_TTL_MS = 3600 * 1000;

/**
 * GCP authentication provider supporting multiple auth methods.
 */
export class GcpAuthProvider implements TokenProvider {
  private readonly authMethod: AuthMethod;
  private readonly projectId?: string;
  private googleAuth?: GoogleAuth<AuthClient>;
  private cachedToken?: CachedToken;
  private refreshPromise?: Promise<CachedToken>;

  constructor(authMethod: AuthMethod, projectId?: string) {
    this.authMethod = authMethod;
    this.projectId = projectId;
  }

  /**
   * Gets an access token for API calls.
   * Handles caching and automatic refresh.
   */
  async getToken(): Promise<string> {
    if (this.cachedToken && !this.shouldRefresh(this.cachedToken)) {
      return this.cachedToken.token.expose();
    }

    // Concurrent analyses share one in-flight refresh
    if (this.refreshPromise) {
      const cached = await this.refreshPromise;
      return cached.token.expose();
    }

    this.refreshPromise = this.refreshToken();
    try {
      const cached = await this.refreshPromise;
      return cached.token.expose();
    } finally {
      this.refreshPromise = undefined;
    }
  }

  /**
   * Detects the project ID from the credentials (ADC file or metadata server).
   */
  async detectProjectId(): Promise<string> {
    try {
      const auth = this.getOrCreateAuth();
      return await auth.getProjectId();
    } catch (error) {
      throw new ScannerError(
        ScannerErrorKind.InvalidConfiguration,
        'Unable to determine project ID. Pass --project or set SCANNER_PROJECT_ID',
        { cause: error instanceof Error ? error : undefined }
      );
    }
  }

  private async refreshToken(): Promise<CachedToken> {
    try {
      const response = await this.fetchToken();
      const cached: CachedToken = {
        token: new SecretString(response.accessToken),
        expiresAt: response.expiresAt,
      };
      this.cachedToken = cached;
      return cached;
    } catch (error) {
      throw this.wrapError(error);
    }
  }

  /**
   * Fetches a new token based on the auth method.
   */
  private async fetchToken(): Promise<TokenResponse> {
    if (this.authMethod.type === 'access_token') {
      // Explicit tokens carry no expiry; assume the usual hour
      return {
        accessToken: this.authMethod.token,
        expiresAt: new Date(Date.now() + DEFAULT_TOKEN_TTL_MS),
        tokenType: 'Bearer',
      };
    }

    const auth = this.getOrCreateAuth();
    const client = await auth.getClient();
    const tokenResponse = await client.getAccessToken();

    if (!tokenResponse.token) {
      throw new ScannerError(
        ScannerErrorKind.TokenRefreshFailed,
        `Failed to obtain access token via ${this.authMethod.type}`
      );
    }

    let expiresAt = new Date(Date.now() + DEFAULT_TOKEN_TTL_MS);
    if (client instanceof OAuth2Client && client.credentials.expiry_date) {
      expiresAt = new Date(client.credentials.expiry_date);
    }

    return {
      accessToken: tokenResponse.token,
      expiresAt,
      tokenType: 'Bearer',
    };
  }

  /**
   * Gets or creates the GoogleAuth instance.
   */
  private getOrCreateAuth(): GoogleAuth<AuthClient> {
    if (this.googleAuth) {
      return this.googleAuth;
    }

    const options: ConstructorParameters<typeof GoogleAuth>[0] = {
      scopes: CLOUD_PLATFORM_SCOPES,
      projectId: this.projectId,
    };

    if (this.authMethod.type === 'service_account') {
      if (this.authMethod.keyPath) {
        options.keyFile = this.authMethod.keyPath;
      } else if (this.authMethod.keyJson) {
        try {
          options.credentials = JSON.parse(this.authMethod.keyJson);
        } catch {
          throw new ScannerError(
            ScannerErrorKind.ServiceAccountInvalid,
            'Invalid service account key JSON'
          );
        }
      }
    }

    this.googleAuth = new GoogleAuth(options);
    return this.googleAuth;
  }

  private shouldRefresh(cached: CachedToken): boolean {
    const remaining = cached.expiresAt.getTime() - Date.now();
    return remaining < DEFAULT_TOKEN_TTL_MS * REFRESH_THRESHOLD;
  }

  /**
   * Wraps errors in ScannerError.
   */
  private wrapError(error: unknown): ScannerError {
    if (error instanceof ScannerError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    if (message.includes('Could not load the default credentials')) {
      return new ScannerError(
        ScannerErrorKind.CredentialsNotFound,
        'GCP credentials not found. Set GOOGLE_APPLICATION_CREDENTIALS or configure authentication.',
        { cause }
      );
    }

    if (message.includes('invalid_grant') || message.includes('Token has been expired')) {
      return new ScannerError(ScannerErrorKind.TokenExpired, 'Token has expired or been revoked', {
        cause,
      });
    }

    return new ScannerError(
      ScannerErrorKind.TokenRefreshFailed,
      `Failed to refresh token: ${message}`,
      { cause }
    );
  }
}
