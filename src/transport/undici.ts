import { request as undiciRequest, type Dispatcher } from 'undici';
import { performance } from 'node:perf_hooks';
import { WardenRequest, WardenResponse, Timings, Transport } from '../types/index.js';
import { HttpResponse } from '../core/response.js';
import { NetworkError } from '../core/errors.js';

export interface UndiciTransportOptions {
  /**
   * Connection pool / proxy to send requests through.
   * Defaults to undici's global dispatcher.
   */
  dispatcher?: Dispatcher;
}

// Statuses a Web Response refuses a body for
const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return errorCode(error.cause);
  return undefined;
}

export class UndiciTransport implements Transport {
  private readonly dispatcher?: Dispatcher;

  constructor(options: UndiciTransportOptions = {}) {
    this.dispatcher = options.dispatcher;
  }

  async dispatch(req: WardenRequest): Promise<WardenResponse> {
    const headers: Record<string, string> = {};
    req.headers.forEach((value, key) => {
      headers[key] = value;
    });

    const start = performance.now();

    try {
      const undiciResponse = await undiciRequest(req.url, {
        method: req.method,
        headers,
        body: req.body,
        signal: req.signal,
        dispatcher: this.dispatcher,
      });
      const firstByte = performance.now() - start;

      const responseHeaders = new Headers();
      for (const [key, value] of Object.entries(undiciResponse.headers)) {
        if (value === undefined) continue;
        if (Array.isArray(value)) {
          value.forEach((v) => responseHeaders.append(key, v));
        } else {
          responseHeaders.set(key, value);
        }
      }

      const payload = await undiciResponse.body.arrayBuffer();
      const timings: Timings = {
        firstByte,
        total: performance.now() - start,
      };

      const raw = new Response(NULL_BODY_STATUSES.has(undiciResponse.statusCode) ? null : payload, {
        status: undiciResponse.statusCode,
        headers: responseHeaders,
      });

      return new HttpResponse(raw, { timings, url: req.url });
    } catch (error: unknown) {
      // Cancellation belongs to the caller, don't disguise it
      if (req.signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(message, errorCode(error), req);
    }
  }
}
