import { silentLogger, type Logger } from '@termmail/shared';
import type { z } from 'zod';
import { GraphApiError, GraphTransportError } from './errors';
import { withRetry, type RetryOptions } from './retry';
import { graphErrorSchema } from './schemas';

export const GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0/me';
const REQUEST_TIMEOUT_MS = 30_000;

export type FetchFn = typeof fetch;

export interface AccessTokenSource {
  getAccessToken(): Promise<string>;
}

export interface GraphHttpOptions {
  baseUrl?: string;
  fetchFn?: FetchFn;
  timeoutMs?: number;
  logger?: Logger;
  retry?: RetryOptions;
}

export interface GraphRequest {
  method?: 'GET' | 'POST' | 'PATCH' | 'DELETE';
  body?: unknown;
  headers?: Record<string, string>;
}

/** Authenticated JSON transport for Graph with timeouts and retries. */
export class GraphHttp {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly tokens: AccessTokenSource,
    private readonly options: GraphHttpOptions = {}
  ) {
    this.baseUrl = options.baseUrl ?? GRAPH_BASE_URL;
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /** Absolute URL for a path below the base, or the URL itself. */
  url(pathOrUrl: string): string {
    return /^https?:\/\//.test(pathOrUrl) ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`;
  }

  async json<S extends z.ZodTypeAny>(
    schema: S,
    pathOrUrl: string,
    request: GraphRequest = {}
  ): Promise<z.infer<S>> {
    const data = await this.send(pathOrUrl, request);
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new GraphTransportError(
        `Unexpected response from ${request.method ?? 'GET'} ${this.url(pathOrUrl)}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
        'decode'
      );
    }
    return parsed.data;
  }

  /** Request whose answer body is not needed. */
  async call(pathOrUrl: string, request: GraphRequest): Promise<void> {
    await this.send(pathOrUrl, request);
  }

  private send(pathOrUrl: string, request: GraphRequest): Promise<unknown> {
    return withRetry(() => this.once(pathOrUrl, request), {
      ...this.options.retry,
      onRetry: (err, attempt, delayMs) => {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.warn(`${reason}; retrying in ${delayMs}ms (attempt ${attempt})`);
        this.options.retry?.onRetry?.(err, attempt, delayMs);
      },
    });
  }

  private async once(pathOrUrl: string, request: GraphRequest): Promise<unknown> {
    const method = request.method ?? 'GET';
    const url = this.url(pathOrUrl);
    const token = await this.tokens.getAccessToken();
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      ...request.headers,
    };
    if (request.body !== undefined) headers['Content-Type'] = 'application/json';

    const started = Date.now();
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new GraphTransportError(`${method} ${url} timed out after ${this.timeoutMs}ms`, 'timeout');
      }
      throw new GraphTransportError(
        `${method} ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
        'network'
      );
    }
    this.logger.debug(`${method} ${new URL(url).pathname} ${response.status} (${Date.now() - started}ms)`);

    const text = await response.text();
    if (!response.ok) {
      throw apiError(response, text);
    }
    if (text === '') return undefined;
    const data = parseJson(text);
    if (data === undefined) {
      throw new GraphTransportError(`${method} ${url} returned invalid JSON`, 'decode');
    }
    return data;
  }
}

function apiError(response: Response, text: string): GraphApiError {
  const parsed = graphErrorSchema.safeParse(parseJson(text));
  const code = parsed.success ? parsed.data.error.code : undefined;
  const message = parsed.success
    ? `${parsed.data.error.message} (${response.status} ${parsed.data.error.code})`
    : `Graph API error ${response.status} ${response.statusText}`.trim();
  const retryAfter = Number(response.headers.get('Retry-After'));
  const retryAfterMs = Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : undefined;
  return new GraphApiError(message, response.status, code, retryAfterMs);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
