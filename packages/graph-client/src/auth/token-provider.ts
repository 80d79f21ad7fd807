import { silentLogger, type Logger } from '@termmail/shared';
import { AuthError } from '../errors';
import type { AccessTokenSource } from '../http';
import type { OAuthClient, TokenSet } from './oauth-client';
import type { TokenStore } from './token-store';

/** Refresh this long before the access token actually expires. */
export const EXPIRY_MARGIN_MS = 60_000;

/** Hands out a valid access token, refreshing and re-caching as needed. */
export class TokenProvider implements AccessTokenSource {
  private current: TokenSet | undefined;
  private refreshing: Promise<TokenSet> | undefined;

  constructor(
    private readonly store: TokenStore,
    private readonly oauth: OAuthClient,
    private readonly logger: Logger = silentLogger,
    private readonly now: () => number = Date.now
  ) {}

  async getAccessToken(): Promise<string> {
    const tokens = this.current ?? (await this.store.load());
    if (!tokens) {
      throw new AuthError('Not signed in; run "termmail login" first');
    }
    this.current = tokens;
    if (tokens.expiresAt - EXPIRY_MARGIN_MS > this.now()) {
      return tokens.accessToken;
    }
    if (!tokens.refreshToken) {
      throw new AuthError('Session expired; run "termmail login" again');
    }
    const refreshed = await this.refresh(tokens.refreshToken);
    return refreshed.accessToken;
  }

  private refresh(refreshToken: string): Promise<TokenSet> {
    this.refreshing ??= (async () => {
      this.logger.debug('Refreshing access token');
      try {
        const tokens = await this.oauth.refresh(refreshToken);
        await this.store.save(tokens);
        this.current = tokens;
        return tokens;
      } finally {
        this.refreshing = undefined;
      }
    })();
    return this.refreshing;
  }
}
