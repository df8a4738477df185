/**
 * HTTP client with an interceptor chain
 *
 * Interceptors wrap each request: the auth interceptor adds the bearer
 * token, the logging interceptor records request and response at debug
 * level. The final handler performs the fetch with a timeout and returns
 * the raw status and body text; classification happens in PlatformClient.
 */

import { TransportError } from './errors.js';
import type { Logger } from './logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RequestContext {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: unknown;
  form?: FormData;
}

export interface ResponseContext {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type InterceptorFn = (
  ctx: RequestContext,
  next: () => Promise<ResponseContext>
) => Promise<ResponseContext>;

export type FetchFn = typeof fetch;

export interface InterceptorOptions {
  apiKey: string;
  logger?: Logger;
}

export class InterceptorChain {
  private interceptors: InterceptorFn[] = [];

  constructor(private options: InterceptorOptions) {
    this.buildChain();
  }

  private buildChain(): void {
    if (this.options.logger) {
      this.interceptors.push(this.createLoggingInterceptor(this.options.logger));
    }
    this.interceptors.push(this.createAuthInterceptor());
  }

  private createAuthInterceptor(): InterceptorFn {
    const token = this.options.apiKey;

    return async (ctx, next) => {
      ctx.headers['Authorization'] = `Bearer ${token}`;
      return next();
    };
  }

  /**
   * Runs outermost, so the logged headers are the caller's (no token)
   */
  private createLoggingInterceptor(logger: Logger): InterceptorFn {
    return async (ctx, next) => {
      const started = Date.now();
      logger.debug('HTTP request', { method: ctx.method, url: ctx.url, headers: ctx.headers });

      try {
        const response = await next();
        logger.debug('HTTP response', {
          method: ctx.method,
          url: ctx.url,
          status: response.status,
          durationMs: Date.now() - started,
        });
        return response;
      } catch (error) {
        logger.debug('HTTP request failed', {
          method: ctx.method,
          url: ctx.url,
          durationMs: Date.now() - started,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
    };
  }

  async execute(ctx: RequestContext, finalHandler: () => Promise<ResponseContext>): Promise<ResponseContext> {
    let index = 0;

    const next = async (): Promise<ResponseContext> => {
      if (index >= this.interceptors.length) {
        return finalHandler();
      }

      const interceptor = this.interceptors[index++];
      return interceptor(ctx, next);
    };

    return next();
  }
}

export interface HttpClientOptions {
  timeoutMs: number;
  /** Replaces the global fetch, mainly for tests */
  fetch?: FetchFn;
}

export interface RequestOptions {
  params?: Record<string, string>;
  body?: unknown;
  form?: FormData;
  headers?: Record<string, string>;
}

function describeFetchFailure(error: unknown, timeoutMs: number): TransportError {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new TransportError(`Request timed out after ${timeoutMs}ms`);
  }

  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return new TransportError(`Network error: ${error.message}${cause}`);
  }

  return new TransportError(`Network error: ${String(error)}`);
}

export class HttpClient {
  constructor(
    private baseUrl: string,
    private interceptors: InterceptorChain,
    private options: HttpClientOptions
  ) {}

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<ResponseContext> {
    let url = this.baseUrl + path;

    if (options.params && Object.keys(options.params).length > 0) {
      url += '?' + new URLSearchParams(options.params).toString();
    }

    // fetch sets the multipart boundary itself
    const headers: Record<string, string> = options.form
      ? { ...options.headers }
      : { 'Content-Type': 'application/json', ...options.headers };

    const ctx: RequestContext = {
      method,
      url,
      headers,
      body: options.body,
      form: options.form,
    };

    return this.interceptors.execute(ctx, async () => {
      const init: RequestInit = {
        method: ctx.method,
        headers: ctx.headers,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      };

      if (ctx.form) {
        init.body = ctx.form;
      } else if (ctx.method !== 'GET' && ctx.body !== undefined) {
        init.body = JSON.stringify(ctx.body);
      }

      const fetchFn = this.options.fetch ?? fetch;
      let response: Response;
      try {
        response = await fetchFn(ctx.url, init);
      } catch (error) {
        throw describeFetchFailure(error, this.options.timeoutMs);
      }

      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        throw describeFetchFailure(error, this.options.timeoutMs);
      }

      return {
        status: response.status,
        headers: Object.fromEntries(response.headers.entries()),
        body,
      };
    });
  }
}
