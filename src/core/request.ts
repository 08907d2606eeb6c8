import { Method, WardenRequest, RequestOptions } from '../types/index.js';

export class HttpRequest implements WardenRequest {
  public readonly url: string;
  public readonly method: Method;
  public readonly headers: Headers;
  public readonly body: string | null;
  public readonly signal?: AbortSignal;

  constructor(url: string, options: RequestOptions = {}) {
    this.url = url;
    this.method = options.method || 'GET';
    this.headers = new Headers(options.headers);
    this.body = options.body ?? null;
    this.signal = options.signal;
  }

  withHeader(name: string, value: string): WardenRequest {
    const newHeaders = new Headers(this.headers);
    newHeaders.set(name, value);
    return new HttpRequest(this.url, {
      method: this.method,
      headers: newHeaders,
      body: this.body,
      signal: this.signal,
    });
  }

  withBody(body: string): WardenRequest {
    return new HttpRequest(this.url, {
      method: this.method,
      headers: this.headers,
      body: body,
      signal: this.signal,
    });
  }
}
