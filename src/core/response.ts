import { WardenResponse, Timings } from '../types/index.js';

export class HttpResponse implements WardenResponse {
  public readonly timings?: Timings;
  public readonly raw: Response; // Always a Web Response object
  private readonly requestUrl?: string;

  constructor(raw: Response, options: { timings?: Timings; url?: string } = {}) {
    this.raw = raw;
    this.timings = options.timings;
    this.requestUrl = options.url;
  }

  get status() {
    return this.raw.status;
  }

  get statusText() {
    return this.raw.statusText;
  }

  get headers() {
    return this.raw.headers;
  }

  get ok() {
    return this.raw.ok;
  }

  /**
   * Responses built by hand (transports, mocks) have no url of their own,
   * so fall back to the url of the request that produced them.
   */
  get url() {
    return this.raw.url || this.requestUrl || '';
  }

  async json<R = unknown>(): Promise<R> {
    return (await this.raw.json()) as R;
  }

  async text(): Promise<string> {
    return this.raw.text();
  }
}
