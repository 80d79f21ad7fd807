import { AuthError } from '../errors';
import type { FetchFn } from '../http';
import { tokenErrorSchema, tokenResponseSchema } from '../schemas';

export const GRAPH_SCOPES = ['Mail.ReadWrite', 'Mail.Send', 'offline_access', 'User.Read'];
const TOKEN_TIMEOUT_MS = 30_000;

export interface OAuthConfig {
  clientId: string;
  tenantId: string;
  scopes?: string[];
}

export interface TokenSet {
  accessToken: string;
  refreshToken?: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

/** Authorization code flow with PKCE against the Microsoft identity platform. */
export class OAuthClient {
  private readonly scopes: string[];

  constructor(
    private readonly config: OAuthConfig,
    private readonly fetchFn: FetchFn = fetch,
    private readonly now: () => number = Date.now
  ) {
    this.scopes = config.scopes ?? GRAPH_SCOPES;
  }

  private get authority(): string {
    return `https://login.microsoftonline.com/${encodeURIComponent(this.config.tenantId)}/oauth2/v2.0`;
  }

  authorizeUrl(params: { state: string; codeChallenge: string; redirectUri: string }): string {
    const url = new URL(`${this.authority}/authorize`);
    url.searchParams.set('client_id', this.config.clientId);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('redirect_uri', params.redirectUri);
    url.searchParams.set('response_mode', 'query');
    url.searchParams.set('scope', this.scopes.join(' '));
    url.searchParams.set('state', params.state);
    url.searchParams.set('code_challenge', params.codeChallenge);
    url.searchParams.set('code_challenge_method', 'S256');
    url.searchParams.set('prompt', 'select_account');
    return url.toString();
  }

  exchangeCode(code: string, codeVerifier: string, redirectUri: string): Promise<TokenSet> {
    return this.requestToken({
      grant_type: 'authorization_code',
      code,
      code_verifier: codeVerifier,
      redirect_uri: redirectUri,
    });
  }

  refresh(refreshToken: string): Promise<TokenSet> {
    return this.requestToken({ grant_type: 'refresh_token', refresh_token: refreshToken }, refreshToken);
  }

  private async requestToken(
    grant: Record<string, string>,
    previousRefreshToken?: string
  ): Promise<TokenSet> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.authority}/token`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          client_id: this.config.clientId,
          scope: this.scopes.join(' '),
          ...grant,
        }).toString(),
        signal: AbortSignal.timeout(TOKEN_TIMEOUT_MS),
      });
    } catch (err) {
      throw new AuthError(`Token request failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    const body: unknown = await response.json().catch(() => undefined);
    const token = tokenResponseSchema.safeParse(body);
    if (!response.ok || !token.success) {
      const error = tokenErrorSchema.safeParse(body);
      const detail = error.success
        ? (error.data.error_description ?? error.data.error)
        : `HTTP ${response.status}`;
      throw new AuthError(`Token request rejected: ${detail}`);
    }
    return {
      accessToken: token.data.access_token,
      refreshToken: token.data.refresh_token ?? previousRefreshToken,
      expiresAt: this.now() + token.data.expires_in * 1000,
    };
  }
}
