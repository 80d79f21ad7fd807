export { GraphMailbox, toRawMessage } from './graph-mailbox';
export {
  GraphHttp,
  GRAPH_BASE_URL,
  type AccessTokenSource,
  type FetchFn,
  type GraphHttpOptions,
  type GraphRequest,
} from './http';
export { withRetry, isRetryable, type RetryOptions } from './retry';
export { AuthError, GraphApiError, GraphTransportError, toRemoteError } from './errors';
export { OAuthClient, GRAPH_SCOPES, type OAuthConfig, type TokenSet } from './auth/oauth-client';
export { TokenStore } from './auth/token-store';
export { TokenProvider, EXPIRY_MARGIN_MS } from './auth/token-provider';
export {
  startCallbackServer,
  CALLBACK_PATH,
  LOGIN_TIMEOUT_MS,
  type CallbackServer,
  type CallbackServerOptions,
} from './auth/callback-server';
export { login, type LoginOptions } from './auth/login';
export { codeChallenge, createCodeVerifier } from './auth/pkce';
