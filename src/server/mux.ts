import { STATUS_CODES } from 'node:http';
import { ConfigurationError } from '../core/errors.js';
import { consoleLogger, type Logger } from '../types/logger.js';
import type { Handler, HandlerFunc, IncomingRequest, ResponseWriter, Router } from '../types/index.js';
import { toHandler } from './handler.js';

export interface ServeMuxOptions {
  /**
   * Where failures of registered handlers are reported by `listener()`
   * @default consoleLogger
   */
  logger?: Logger;
}

const NOT_FOUND_BODY = '404 page not found';

/**
 * Path-based request router.
 *
 * A pattern ending in `/` matches every path below it; any other pattern
 * matches only itself. When several patterns match, the longest wins.
 *
 * @example
 * ```typescript
 * const mux = new ServeMux();
 * mux.handleFunc('/health', (req, res) => res.end('ok'));
 * mux.handle('/static/', staticFiles);
 * http.createServer(mux.listener()).listen(8080);
 * ```
 */
export class ServeMux<Req extends IncomingRequest = IncomingRequest, Res extends ResponseWriter = ResponseWriter>
  implements Router<Req, Res>, Handler<Req, Res>
{
  private readonly routes = new Map<string, Handler<Req, Res>>();
  private readonly logger: Logger;

  constructor(options: ServeMuxOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
  }

  get patterns(): string[] {
    return [...this.routes.keys()];
  }

  handle(pattern: string, handler: Handler<Req, Res>): void {
    if (!pattern.startsWith('/')) {
      throw new ConfigurationError(`Invalid pattern "${pattern}": patterns must start with "/"`, {
        configKey: 'pattern',
      });
    }
    if (this.routes.has(pattern)) {
      throw new ConfigurationError(`Multiple registrations for pattern "${pattern}"`, {
        configKey: 'pattern',
      });
    }
    this.routes.set(pattern, handler);
  }

  handleFunc(pattern: string, fn: HandlerFunc<Req, Res>): void {
    this.handle(pattern, toHandler(fn));
  }

  /**
   * Find the handler registered for a path, if any.
   */
  match(path: string): Handler<Req, Res> | undefined {
    let best: string | undefined;

    for (const pattern of this.routes.keys()) {
      const matches = pattern.endsWith('/') ? path.startsWith(pattern) : path === pattern;
      if (matches && (best === undefined || pattern.length > best.length)) {
        best = pattern;
      }
    }

    return best === undefined ? undefined : this.routes.get(best);
  }

  serveHTTP(req: Req, res: Res): void | Promise<void> {
    const handler = this.match(pathOf(req.url));

    if (!handler) {
      res.statusCode = 404;
      res.setHeader('Content-Type', 'text/plain; charset=utf-8');
      res.end(NOT_FOUND_BODY);
      return;
    }

    return handler.serveHTTP(req, res);
  }

  /**
   * Request listener for `http.createServer`. Errors thrown or rejected by
   * a handler are logged and answered with 500 when nothing was sent yet.
   */
  listener(): (req: Req, res: Res) => void {
    return (req, res) => {
      void Promise.resolve()
        .then(() => this.serveHTTP(req, res))
        .catch((error: unknown) => this.fail(error, req, res));
    };
  }

  private fail(error: unknown, req: Req, res: Res): void {
    this.logger.error({ err: error, method: req.method, url: req.url }, 'handler failed');

    if (res.headersSent) return;
    res.statusCode = 500;
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.end(STATUS_CODES[500] ?? 'Internal Server Error');
  }
}

function pathOf(url: string | undefined): string {
  if (!url) return '/';
  const end = url.search(/[?#]/);
  return end === -1 ? url : url.slice(0, end);
}

/**
 * Process-wide mux used by the top-level `handle`/`handleFunc` helpers when
 * no router is passed.
 */
export const defaultServeMux = new ServeMux();
