import { STATUS_CODES } from 'node:http';
import { CredentialChecker } from '../auth/checker.js';
import { parseBasicAuth, WWW_AUTHENTICATE_HEADER } from '../auth/basic-header.js';
import type { Handler, HandlerFunc, IncomingRequest, ResponseWriter } from '../types/index.js';
import type { Logger } from '../types/logger.js';

export interface AuthHandlerOptions {
  /**
   * Receives a debug line for every rejected request.
   * Credentials are never logged.
   */
  logger?: Logger;
}

const UNAUTHORIZED = 401;
const UNAUTHORIZED_TEXT = STATUS_CODES[UNAUTHORIZED] ?? 'Unauthorized';

/**
 * Guards one downstream handler with one checker.
 *
 * Requests whose Basic credentials pass `check` reach the downstream handler
 * with the original request and response objects. Everything else gets
 * 401, `WWW-Authenticate: Basic` and the body `Unauthorized`.
 */
export class AuthenticatingHandler<Req extends IncomingRequest = IncomingRequest, Res extends ResponseWriter = ResponseWriter>
  implements Handler<Req, Res>
{
  constructor(
    private readonly checker: CredentialChecker,
    private readonly handler: Handler<Req, Res>,
    private readonly options: AuthHandlerOptions = {}
  ) {}

  serveHTTP(req: Req, res: Res): void | Promise<void> {
    const { username, password } = parseBasicAuth(req.headers.authorization);

    if (!this.checker.check(username, password)) {
      this.options.logger?.debug({ method: req.method, url: req.url }, 'basic auth rejected');
      res.setHeader(WWW_AUTHENTICATE_HEADER, 'Basic');
      res.statusCode = UNAUTHORIZED;
      res.end(UNAUTHORIZED_TEXT);
      return;
    }

    return this.handler.serveHTTP(req, res);
  }
}

/**
 * Adapts a plain function to the Handler interface.
 */
export function toHandler<Req extends IncomingRequest, Res extends ResponseWriter>(
  fn: HandlerFunc<Req, Res>
): Handler<Req, Res> {
  return { serveHTTP: fn };
}

/**
 * Wrap a Handler so it only runs for requests the checker accepts.
 *
 * @example
 * ```typescript
 * const guarded = newHandler(credentials({ admin: 'test-secret' }), adminHandler);
 * http.createServer((req, res) => guarded.serveHTTP(req, res));
 * ```
 */
export function newHandler<Req extends IncomingRequest, Res extends ResponseWriter>(
  checker: CredentialChecker,
  handler: Handler<Req, Res>,
  options?: AuthHandlerOptions
): Handler<Req, Res> {
  return new AuthenticatingHandler(checker, handler, options);
}

/**
 * Function form of {@link newHandler}: same checks, plain function in and out,
 * so the result can be handed straight to `http.createServer`.
 */
export function handlerFunc<Req extends IncomingRequest, Res extends ResponseWriter>(
  checker: CredentialChecker,
  fn: HandlerFunc<Req, Res>,
  options?: AuthHandlerOptions
): HandlerFunc<Req, Res> {
  const handler = newHandler(checker, toHandler(fn), options);
  return (req, res) => handler.serveHTTP(req, res);
}
