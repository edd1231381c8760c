/**
 * HTTP transport for the vendor API and the storage upload target.
 *
 * Vendor requests carry the API token and the organization id; the
 * storage upload carries only its presigned fields. Every request is
 * bounded by a timeout. Connection-level failures are thrown as
 * `connection` FlowErrors; status codes are returned to the caller, which
 * decides what it expected.
 */

import {
  FlowError,
  connectionError,
  maskSecretsInMessage,
  requestTimeoutError,
} from '../domain/errors';
import { Credentials } from '../domain/run';
import { Logger, logger as rootLogger } from '../logger';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Request init the transport hands to the fetch function. */
export interface FetchInit {
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string | FormData;
  signal: AbortSignal;
}

/** The part of a fetch Response the transport reads. */
export interface FetchResponseLike {
  status: number;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}

/** Fetch function type (injectable for testing). */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

/** Raw response: status, content type and the unparsed bytes. */
export interface HttpResponse {
  method: HttpMethod;
  url: string;
  status: number;
  contentType: string | null;
  bytes: Buffer;
}

export interface VendorRequest {
  method: HttpMethod;
  /** Path relative to the API base, e.g. `/linkpage/`. */
  path: string;
  query?: Record<string, string | number | undefined>;
  /** JSON body. */
  json?: unknown;
  /** Accept header; defaults to JSON. */
  accept?: string;
}

export interface HttpTransportOptions {
  credentials: Credentials;
  apiBaseUrl: string;
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
  fetchFn?: FetchLike;
  logger?: Logger;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
/** Largest delay a Node timer honours; longer delays fire after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export class HttpTransport {
  private readonly fetchFn: FetchLike;
  private readonly log: Logger;
  private readonly apiBaseUrl: string;

  constructor(private readonly options: HttpTransportOptions) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.log = options.logger ?? rootLogger.child({ module: 'transport' });
    this.apiBaseUrl = options.apiBaseUrl.replace(/\/+$/, '');
  }

  /** Build an absolute vendor URL; the organization id is always attached. */
  vendorUrl(path: string, query: Record<string, string | number | undefined> = {}): string {
    const params = new URLSearchParams();
    params.set('organization', String(this.options.credentials.organizationId));
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) params.set(key, String(value));
    }
    const normalizedPath = path.startsWith('/') ? path : `/${path}`;
    return `${this.apiBaseUrl}${normalizedPath}?${params.toString()}`;
  }

  /** Send an authenticated request to the vendor API. */
  async vendor(request: VendorRequest): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      Authorization: `Token ${this.options.credentials.apiKey}`,
      Accept: request.accept ?? 'application/json',
    };
    let body: string | undefined;
    if (request.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.json);
    }
    return this.send(request.method, this.vendorUrl(request.path, request.query), headers, body);
  }

  /**
   * POST a multipart form to a presigned storage target. The vendor token
   * is deliberately not sent.
   */
  async storageUpload(url: string, form: FormData): Promise<HttpResponse> {
    return this.send('POST', url, {}, form);
  }

  private async send(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body?: string | FormData,
  ): Promise<HttpResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    this.log.debug('HTTP request', { method, url: this.mask(url) });

    try {
      const res = await this.fetchFn(url, { method, headers, body, signal: controller.signal });
      const bytes = Buffer.from(await res.arrayBuffer());
      this.log.debug('HTTP response', { method, url: this.mask(url), status: res.status, bytes: bytes.length });
      return {
        method,
        url,
        status: res.status,
        contentType: res.headers.get('content-type'),
        bytes,
      };
    } catch (err) {
      if (err instanceof FlowError) throw err;
      if (timedOut) {
        throw new FlowError(requestTimeoutError(this.mask(url), this.options.timeoutMs));
      }
      const cause = err instanceof Error ? describeCause(err) : 'unknown error';
      throw new FlowError(connectionError(this.mask(url), this.mask(cause)));
    } finally {
      clearTimeout(timer);
    }
  }

  private mask(text: string): string {
    return maskSecretsInMessage(text, [this.options.credentials.apiKey]);
  }
}

/** Node's fetch wraps socket errors; surface the underlying code when there is one. */
function describeCause(err: Error): string {
  const cause: unknown = err.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? `${cause.code}: ` : '';
    return `${err.message} (${code}${cause.message})`;
  }
  return err.message;
}
