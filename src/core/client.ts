import { ClientOptions, HeadersLike, Method, Middleware, WardenRequest, WardenResponse, RequestOptions, Transport } from '../types/index.js';
import { HttpRequest } from './request.js';
import { UndiciTransport } from '../transport/undici.js';
import { ConfigurationError } from './errors.js';
import { Logger, debugFromEnv, getLogger } from '../utils/logger.js';

export class Client {
  private baseUrl: string;
  private middlewares: Middleware[];
  private transport: Transport;
  private defaultHeaders: HeadersLike;
  private handler: (req: WardenRequest) => Promise<WardenResponse>;
  private logger?: Logger;

  constructor(options: ClientOptions = {}) {
    this.baseUrl = options.baseUrl || '';
    this.middlewares = [...(options.middlewares || [])];
    this.defaultHeaders = options.headers || {};
    this.transport = options.transport || new UndiciTransport();

    // 1. Manual plugins
    if (options.plugins) {
      options.plugins.forEach((plugin) => plugin(this));
    }

    // 2. Debug logging middleware (if enabled)
    if (options.debug === true || debugFromEnv()) {
      const shared = getLogger();
      // `debug: true` prints even when the shared logger is quiet
      const logger = shared.enabled('debug') ? shared : new Logger({ level: 'debug' });
      this.logger = logger;
      this.middlewares.unshift(this.createLoggingMiddleware(logger));
    }

    // Pre-compose middleware chain
    this.handler = this.composeMiddlewares();
  }

  private createLoggingMiddleware(logger: Logger): Middleware {
    return async (req, next) => {
      const startTime = Date.now();

      logger.logRequest(req);

      try {
        const response = await next(req);
        logger.logResponse(req, response, startTime);
        return response;
      } catch (error) {
        if (error instanceof Error) logger.logError(req, error);
        throw error;
      }
    };
  }

  private composeMiddlewares(): (req: WardenRequest) => Promise<WardenResponse> {
    const transportDispatch = (req: WardenRequest) => this.transport.dispatch(req);

    // Last middleware calls transport, previous middleware calls last, etc.
    return this.middlewares.reduceRight<(req: WardenRequest) => Promise<WardenResponse>>(
      (next, middleware) => (req) => middleware(req, next),
      transportDispatch
    );
  }

  public use(middleware: Middleware) {
    this.middlewares.push(middleware);
    // Re-compose chain when new middleware is added
    this.handler = this.composeMiddlewares();
    return this;
  }

  get debugEnabled(): boolean {
    return this.logger !== undefined;
  }

  private buildUrl(path: string): string {
    if (path.startsWith('http://') || path.startsWith('https://')) {
      return new URL(path).toString();
    }
    if (!this.baseUrl) {
      throw new ConfigurationError(`Relative path "${path}" provided without a baseUrl.`, { configKey: 'baseUrl' });
    }
    return new URL(path, this.baseUrl).toString();
  }

  /**
   * Build a request against this client's base URL and default headers
   * without sending it. Invalid URLs throw here, before anything is sent.
   */
  newRequest(method: Method, path: string, options: Omit<RequestOptions, 'method'> = {}): WardenRequest {
    const url = this.buildUrl(path);

    const headers = new Headers(this.defaultHeaders);
    if (options.headers) {
      new Headers(options.headers).forEach((value, key) => headers.set(key, value));
    }

    return new HttpRequest(url, { ...options, method, headers });
  }

  /**
   * Send an already built request through the middleware chain.
   * Every status, 401 included, resolves as a response.
   */
  do(req: WardenRequest): Promise<WardenResponse> {
    return this.handler(req);
  }

  async request(path: string, options: RequestOptions = {}): Promise<WardenResponse> {
    const { method = 'GET', ...rest } = options;
    return this.do(this.newRequest(method, path, rest));
  }

  get(path: string, options: Omit<RequestOptions, 'method'> = {}) {
    return this.request(path, { ...options, method: 'GET' });
  }

  head(path: string, options: Omit<RequestOptions, 'method'> = {}) {
    return this.request(path, { ...options, method: 'HEAD' });
  }

  post(path: string, bodyType: string, body: string, options: Omit<RequestOptions, 'method' | 'body'> = {}) {
    const headers = new Headers(options.headers);
    headers.set('Content-Type', bodyType);
    return this.request(path, { ...options, method: 'POST', body, headers });
  }

  postForm(path: string, data: URLSearchParams | Record<string, string>, options: Omit<RequestOptions, 'method' | 'body'> = {}) {
    const form = data instanceof URLSearchParams ? data : new URLSearchParams(data);
    return this.post(path, 'application/x-www-form-urlencoded', form.toString(), options);
  }
}

export function createClient(options: ClientOptions = {}): Client {
  return new Client(options);
}
