import { TriageHttpError, TriageTimeoutError } from './errors';
import { getLogger } from '../observability/logger';
import { withSpan } from '../observability/tracing';

export interface TransportOptions {
  timeoutMs?: number;
}

export interface TransportRequest {
  requestId?: string;
  method: string;
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export interface TransportMeta {
  durationMs: number;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  data: unknown;
  meta: TransportMeta;
}

export const DEFAULT_TIMEOUT_MS = 60_000;

function toLowerCaseMap(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key.toLowerCase()] = value;
  });
  return out;
}

async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return undefined;
  }

  const contentType = response.headers.get('content-type')?.toLowerCase() ?? '';
  if (contentType.includes('application/json')) {
    try {
      return JSON.parse(text) as unknown;
    } catch {
      return { message: text };
    }
  }

  return { message: text };
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Single-attempt JSON-over-HTTP transport. Failed calls are never retried; the caller
 * sees the first error.
 */
export class HttpTransport {
  private readonly timeoutMs: number;
  private readonly logger = getLogger();

  constructor(options: TransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    const started = Date.now();
    const requestId = request.requestId ?? 'none';
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;

    return withSpan(
      'triage.http.request',
      {
        'triage.request.id': requestId,
        'http.method': request.method,
        'http.url': request.url
      },
      async (span) => {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), timeoutMs);

        try {
          const response = await fetch(request.url, {
            method: request.method,
            headers: request.headers,
            body: request.body,
            signal: controller.signal
          });

          const parsed = await parseResponseBody(response);
          span.setAttribute('http.status_code', response.status);
          if (!response.ok) {
            throw new TriageHttpError({
              message: `HTTP ${response.status} ${response.statusText}`.trim(),
              status: response.status,
              statusText: response.statusText,
              details: parsed
            });
          }

          const meta: TransportMeta = { durationMs: Date.now() - started };
          this.logger.debug(
            {
              requestId,
              method: request.method,
              url: request.url,
              status: response.status,
              durationMs: meta.durationMs
            },
            'HTTP request completed'
          );

          return {
            status: response.status,
            headers: toLowerCaseMap(response.headers),
            data: parsed,
            meta
          };
        } catch (error) {
          const failure = isAbortError(error) ? new TriageTimeoutError(timeoutMs) : error;
          this.logger.debug(
            {
              requestId,
              method: request.method,
              url: request.url,
              durationMs: Date.now() - started,
              error: failure instanceof Error ? failure.message : String(failure)
            },
            'HTTP request failed'
          );
          throw failure;
        } finally {
          clearTimeout(timeout);
        }
      }
    );
  }
}
