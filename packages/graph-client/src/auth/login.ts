import { v4 as uuidv4 } from 'uuid';
import { silentLogger, type Logger } from '@termmail/shared';
import { startCallbackServer } from './callback-server';
import type { OAuthClient, TokenSet } from './oauth-client';
import { codeChallenge, createCodeVerifier } from './pkce';
import type { TokenStore } from './token-store';

export interface LoginOptions {
  port: number;
  timeoutMs?: number;
  logger?: Logger;
  /** Show or open the sign-in page */
  onAuthorizeUrl: (url: string) => void;
}

/** Interactive sign-in: browser, loopback redirect, code exchange, cache. */
export async function login(
  oauth: OAuthClient,
  store: TokenStore,
  options: LoginOptions
): Promise<TokenSet> {
  const logger = options.logger ?? silentLogger;
  const state = uuidv4();
  const verifier = createCodeVerifier();
  const server = await startCallbackServer({
    port: options.port,
    expectedState: state,
    timeoutMs: options.timeoutMs,
  });

  try {
    options.onAuthorizeUrl(
      oauth.authorizeUrl({
        state,
        codeChallenge: codeChallenge(verifier),
        redirectUri: server.redirectUri,
      })
    );
    const code = await server.code;
    logger.debug('Authorization code received; exchanging for tokens');
    const tokens = await oauth.exchangeCode(code, verifier, server.redirectUri);
    await store.save(tokens);
    return tokens;
  } finally {
    await server.close();
  }
}
