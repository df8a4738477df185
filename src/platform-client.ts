/**
 * Client for the workbench platform REST API
 *
 * Owns URL construction (`/api/{version}/projects/{id}/...`) and the mapping
 * from raw HTTP outcomes to typed errors. Tools only ever see a decoded
 * body or one of the errors from errors.ts.
 */

import { basename } from 'path';
import type { Configuration } from './config.js';
import { DEFAULTS, HTTP_STATUS, MAX_ERROR_BODY_LENGTH } from './constants.js';
import { RemoteApplicationError, ResponseParseError, TransportError } from './errors.js';
import { normalizeHost } from './host.js';
import {
  HttpClient,
  InterceptorChain,
  type FetchFn,
  type HttpMethod,
  type ResponseContext,
} from './interceptors.js';
import type { Logger } from './logger.js';
import type { JsonValue } from './types/tool.js';

export type ApiVersion = 'v1' | 'v2';

export interface ApiResult {
  status: number;
  /** Undefined when the platform answered with an empty body */
  data?: JsonValue;
}

export interface CallOptions {
  params?: Record<string, string>;
  body?: unknown;
}

export interface PlatformClientOptions {
  logger?: Logger;
  fetch?: FetchFn;
}

function isSuccessStatus(status: number): boolean {
  return status >= HTTP_STATUS.OK && status < HTTP_STATUS.MULTIPLE_CHOICES;
}

function isRecord(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function remoteErrorMessage(error: JsonValue): string {
  if (typeof error === 'string' && error.length > 0) {
    return error;
  }
  if (isRecord(error) && typeof error.message === 'string' && error.message.length > 0) {
    return error.message;
  }
  return 'Unknown error';
}

/**
 * Classify a raw response.
 *
 * - body with an `error` field: RemoteApplicationError, whatever the status
 * - non-2xx JSON: RemoteApplicationError from `message` or the status
 * - non-2xx, not JSON: TransportError
 * - 2xx, not JSON: ResponseParseError carrying the raw text
 * - 2xx, empty: success without data
 */
export function interpretResponse(response: ResponseContext): ApiResult {
  const { status, body } = response;
  const success = isSuccessStatus(status);

  if (body.trim().length === 0) {
    if (success) {
      return { status };
    }
    throw new TransportError(`HTTP error ${status}`, status);
  }

  let parsed: JsonValue;
  try {
    parsed = JSON.parse(body);
  } catch {
    if (success) {
      throw new ResponseParseError('Failed to parse response', body, status);
    }
    throw new TransportError(`HTTP error ${status}: ${body.slice(0, MAX_ERROR_BODY_LENGTH)}`, status);
  }

  if (isRecord(parsed) && parsed.error !== undefined && parsed.error !== null && parsed.error !== false) {
    throw new RemoteApplicationError(`API error: ${remoteErrorMessage(parsed.error)}`, parsed.error, status);
  }

  if (!success) {
    const message = isRecord(parsed) && typeof parsed.message === 'string' && parsed.message.length > 0
      ? parsed.message
      : `HTTP ${status}`;
    throw new RemoteApplicationError(`API error: ${message}`, parsed, status);
  }

  return { status, data: parsed };
}

export class PlatformClient {
  readonly baseUrl: string;
  private http: HttpClient;

  constructor(config: Configuration, options: PlatformClientOptions = {}) {
    this.baseUrl = normalizeHost(config.host);
    const interceptors = new InterceptorChain({ apiKey: config.apiKey, logger: options.logger });
    this.http = new HttpClient(this.baseUrl, interceptors, {
      timeoutMs: config.requestTimeoutMs,
      fetch: options.fetch,
    });
  }

  /**
   * `/api/{version}/projects/{projectId}/{resource}`
   */
  projectPath(projectId: string, resource: string, version: ApiVersion = DEFAULTS.API_VERSION): string {
    const suffix = resource ? `/${resource}` : '';
    return `/api/${version}/projects/${encodeURIComponent(projectId)}${suffix}`;
  }

  /**
   * `/api/{version}/{resource}` for endpoints outside a project
   */
  globalPath(resource: string, version: ApiVersion = DEFAULTS.API_VERSION): string {
    return `/api/${version}/${resource}`;
  }

  async call(method: HttpMethod, path: string, options: CallOptions = {}): Promise<ApiResult> {
    const response = await this.http.request(method, path, options);
    return interpretResponse(response);
  }

  get(path: string, params?: Record<string, string>): Promise<ApiResult> {
    return this.call('GET', path, { params });
  }

  post(path: string, body?: unknown): Promise<ApiResult> {
    return this.call('POST', path, { body });
  }

  patch(path: string, body?: unknown, params?: Record<string, string>): Promise<ApiResult> {
    return this.call('PATCH', path, { body, params });
  }

  delete(path: string, body?: unknown, params?: Record<string, string>): Promise<ApiResult> {
    return this.call('DELETE', path, { body, params });
  }

  /**
   * Multipart PUT of one file to the project file store. The form field
   * name is the destination path inside the project.
   */
  async uploadFile(projectId: string, targetPath: string, content: Uint8Array): Promise<ApiResult> {
    const form = new FormData();
    form.append(targetPath, new Blob([content]), basename(targetPath));

    const response = await this.http.request('PUT', this.projectPath(projectId, 'files'), { form });
    return interpretResponse(response);
  }
}
