import http from 'http';
import { setTimeout as sleep } from 'timers/promises';
import { URL, URLSearchParams } from 'url';
import { TransportError } from '../types';

export const DEFAULT_HTTP_TIMEOUT_MS = 30000;
export const DEFAULT_HTTP_RETRIES = 3;
export const DEFAULT_HTTP_INTERVAL_MS = 500;

export interface TestServerRequest {
  route: string;
  params?: Record<string, string>;
}

export interface HttpRequestOptions {
  /** Per-try timeout. */
  timeoutMs?: number;
  /** Number of tries before giving up. */
  retries?: number;
  /** Delay between tries. */
  intervalMs?: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Talks to the test-server through the forwarded host port. Raises
 * {@link TransportError} on connection failure or a non-2xx status.
 */
export interface Transport {
  readonly endpoint: URL;
  get(request: TestServerRequest, options?: HttpRequestOptions): Promise<HttpResponse>;
  post(request: TestServerRequest, options?: HttpRequestOptions): Promise<HttpResponse>;
}

type Method = 'GET' | 'POST';

export function resolveRouteUrl(endpoint: URL, route: string): URL {
  const base = endpoint.href.endsWith('/') ? endpoint.href : `${endpoint.href}/`;
  return new URL(route.replace(/^\/+/, ''), base);
}

function classifyNetworkError(error: NodeJS.ErrnoException): TransportError {
  const kind = error.code === 'ECONNREFUSED' ? 'refused' : 'network';
  return new TransportError(kind, `Test-server request failed: ${error.message}`, {
    error: error.message,
    errno: error.code,
  });
}

function sendOnce(
  method: Method,
  url: URL,
  body: string | undefined,
  timeoutMs: number
): Promise<HttpResponse> {
  return new Promise((resolve, reject) => {
    let settled = false;
    const settle = (outcome: () => void) => {
      if (!settled) {
        settled = true;
        clearTimeout(deadline);
        outcome();
      }
    };
    const fail = (error: TransportError) => settle(() => reject(error));

    const headers: http.OutgoingHttpHeaders = {};
    if (body !== undefined) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      headers['Content-Length'] = Buffer.byteLength(body);
    }

    const request = http.request(url, { method, headers }, response => {
      const chunks: Buffer[] = [];
      response.on('data', (chunk: Buffer) => chunks.push(chunk));
      response.on('error', error => fail(classifyNetworkError(error)));
      response.on('end', () => {
        const status = response.statusCode ?? 0;
        const text = Buffer.concat(chunks).toString('utf-8');

        if (status < 200 || status >= 300) {
          fail(
            new TransportError('status', `Test-server responded with HTTP ${status}`, {
              status,
              url: url.toString(),
              body: text,
            })
          );
          return;
        }

        settle(() => resolve({ status, body: text }));
      });
    });

    // Bounds the whole exchange, including a body that trickles in
    const deadline = setTimeout(() => {
      fail(
        new TransportError('timeout', `Test-server did not answer within ${timeoutMs}ms`, {
          url: url.toString(),
          timeoutMs,
        })
      );
      request.destroy();
    }, timeoutMs);

    request.on('error', error => fail(classifyNetworkError(error)));

    if (body !== undefined) {
      request.write(body);
    }
    request.end();
  });
}

export class HttpTransport implements Transport {
  readonly endpoint: URL;

  constructor(endpoint: URL) {
    this.endpoint = endpoint;
  }

  get(request: TestServerRequest, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const url = resolveRouteUrl(this.endpoint, request.route);
    for (const [key, value] of Object.entries(request.params ?? {})) {
      url.searchParams.set(key, value);
    }
    return this.send('GET', url, undefined, options);
  }

  post(request: TestServerRequest, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const url = resolveRouteUrl(this.endpoint, request.route);
    const body = new URLSearchParams(request.params ?? {}).toString();
    return this.send('POST', url, body, options);
  }

  private async send(
    method: Method,
    url: URL,
    body: string | undefined,
    options: HttpRequestOptions
  ): Promise<HttpResponse> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    const retries = Math.max(1, options.retries ?? DEFAULT_HTTP_RETRIES);
    const intervalMs = options.intervalMs ?? DEFAULT_HTTP_INTERVAL_MS;

    let lastError: TransportError | undefined;
    for (let attempt = 1; attempt <= retries; attempt++) {
      try {
        return await sendOnce(method, url, body, timeoutMs);
      } catch (error) {
        if (!(error instanceof TransportError)) {
          throw error;
        }
        lastError = error;
      }

      if (attempt < retries && intervalMs > 0) {
        await sleep(intervalMs);
      }
    }

    throw lastError ?? new TransportError('network', `Request to ${url.toString()} was not sent`);
  }
}
