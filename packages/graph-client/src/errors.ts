import { ZodError } from 'zod';
import type { RemoteError } from '@termmail/shared';

/** Non-2xx answer from Graph. */
export class GraphApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: string,
    /** From the Retry-After header */
    readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = 'GraphApiError';
  }
}

/** The request never produced a usable answer. */
export class GraphTransportError extends Error {
  constructor(
    message: string,
    readonly kind: 'network' | 'timeout' | 'decode'
  ) {
    super(message);
    this.name = 'GraphTransportError';
  }
}

/** No usable credentials; the user has to sign in again. */
export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthError';
  }
}

export function toRemoteError(err: unknown): RemoteError {
  if (err instanceof GraphApiError) {
    const { status, message } = err;
    if (status === 401 || status === 403) return { kind: 'auth', message, status };
    if (status === 404) return { kind: 'not-found', message, status };
    if (status === 429) return { kind: 'throttled', message, status };
    return { kind: 'server', message, status };
  }
  if (err instanceof GraphTransportError) return { kind: err.kind, message: err.message };
  if (err instanceof AuthError) return { kind: 'auth', message: err.message };
  if (err instanceof ZodError) {
    return { kind: 'decode', message: `Unexpected response: ${err.issues[0]?.message ?? err.message}` };
  }
  return { kind: 'network', message: err instanceof Error ? err.message : String(err) };
}
