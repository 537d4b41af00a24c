import * as http from 'http';
import * as https from 'https';
import type { OutboundRequest, RequestRecord, HeaderEntry } from '../types/request-record';
import { translateRequest, displayUrl, TranslationError } from './request-translator';
import { RequestTimer, type ReplayLogger, type ReplayLogEntry } from './replay-logger';

export interface DispatcherOptions {
  targetHost: string;
  logger: ReplayLogger;
  requestTimeout?: number;
}

/**
 * Convert the header list to Node's header object. Repeated names become
 * arrays so each value is sent on its own header line, in original order.
 */
export function toOutgoingHeaders(headers: readonly HeaderEntry[]): http.OutgoingHttpHeaders {
  const grouped = new Map<string, { name: string; values: string[] }>();

  for (const { name, value } of headers) {
    const key = name.toLowerCase();
    const existing = grouped.get(key);
    if (existing) {
      existing.values.push(value);
    } else {
      grouped.set(key, { name, values: [value] });
    }
  }

  const result: http.OutgoingHttpHeaders = {};
  for (const { name, values } of grouped.values()) {
    result[name] = values.length === 1 ? values[0] : values;
  }
  return result;
}

// Replays never carry a body, so the logged framing headers would announce
// bytes that are never sent
const BODY_FRAMING_HEADERS = new Set(['content-length', 'transfer-encoding']);
const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

/**
 * Headers as put on the wire: the logged headers without body framing, and
 * an empty body declared for methods that normally carry one
 */
export function toRequestHeaders(request: OutboundRequest): http.OutgoingHttpHeaders {
  const headers = toOutgoingHeaders(
    request.headers.filter((header) => !BODY_FRAMING_HEADERS.has(header.name.toLowerCase()))
  );
  if (BODY_METHODS.has(request.method.toUpperCase())) {
    headers['Content-Length'] = '0';
  }
  return headers;
}

/**
 * Sends replayed requests to the target host and reports each outcome.
 * Redirects are not followed: a 3xx from the target is what gets reported.
 */
export class Dispatcher {
  private targetHost: string;
  private logger: ReplayLogger;
  private requestTimeout?: number;

  constructor(options: DispatcherOptions) {
    this.targetHost = options.targetHost;
    this.logger = options.logger;
    this.requestTimeout = options.requestTimeout;
  }

  /**
   * Translate and send one completed record. Records that cannot be
   * translated are logged and dropped.
   */
  async replay(record: RequestRecord): Promise<ReplayLogEntry | null> {
    let request: OutboundRequest;
    try {
      request = translateRequest(record, this.targetHost);
    } catch (error) {
      if (error instanceof TranslationError) {
        this.logger.warn(`Skipping ${record.method ?? '?'} ${record.path ?? '?'}: ${error.message}`);
        return null;
      }
      throw error;
    }

    return this.dispatch(request);
  }

  /**
   * Send one request and log a single result line. Never rejects: transport
   * failures are reported in place of the status code.
   */
  async dispatch(request: OutboundRequest): Promise<ReplayLogEntry> {
    const timestamp = RequestTimer.now();
    const timer = new RequestTimer();

    let entry: ReplayLogEntry;
    try {
      const statusCode = await this.send(request);
      entry = {
        timestamp,
        method: request.method,
        url: displayUrl(request),
        target: request.url,
        status: 'success',
        statusCode,
        durationMs: timer.elapsed(),
      };
    } catch (error) {
      entry = {
        timestamp,
        method: request.method,
        url: displayUrl(request),
        target: request.url,
        status: 'error',
        error: error instanceof Error ? error.message : String(error),
        durationMs: timer.elapsed(),
      };
    }

    await this.logger.logResult(entry);
    return entry;
  }

  /**
   * Resolves with the status code once response headers arrive; the
   * response body is drained and discarded.
   */
  private send(request: OutboundRequest): Promise<number> {
    const url = new URL(request.url);
    const isHttps = request.scheme === 'https';

    const options: http.RequestOptions = {
      hostname: url.hostname.replace(/^\[(.*)\]$/, '$1'),
      port: url.port || (isHttps ? 443 : 80),
      path: url.pathname + url.search,
      method: request.method,
      headers: toRequestHeaders(request),
      timeout: this.requestTimeout,
    };

    return new Promise((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage) => {
        res.on('error', (error) => {
          this.logger.debug(`[replay] Response from ${request.url} aborted: ${error.message}`);
        });
        res.resume();
        resolve(res.statusCode ?? 0);
      };

      let req: http.ClientRequest;
      try {
        req = isHttps ? https.request(options, onResponse) : http.request(options, onResponse);
      } catch (error) {
        // invalid header names/values are rejected before anything is sent
        reject(error);
        return;
      }

      req.on('error', reject);

      req.on('timeout', () => {
        req.destroy(new Error(`Request timed out after ${this.requestTimeout}ms`));
      });

      req.end();
    });
  }
}
