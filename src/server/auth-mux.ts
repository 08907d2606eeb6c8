import { CredentialChecker } from '../auth/checker.js';
import type { Handler, HandlerFunc, IncomingRequest, ResponseWriter, Router } from '../types/index.js';
import { newHandler, handlerFunc, toHandler, type AuthHandlerOptions } from './handler.js';
import { ServeMux, defaultServeMux } from './mux.js';

/**
 * Pairs one checker with a router: every route registered through it is
 * guarded before it reaches the router.
 *
 * @example
 * ```typescript
 * const mux = new ServeMux();
 * const admin = new AuthServeMux(credentials({ admin: 'test-secret' }), mux);
 * admin.handleFunc('/admin/', adminPage);
 * admin.handle('/metrics', metricsHandler);
 * ```
 */
export class AuthServeMux<Req extends IncomingRequest = IncomingRequest, Res extends ResponseWriter = ResponseWriter> {
  constructor(
    readonly checker: CredentialChecker,
    readonly router: Router<Req, Res>,
    private readonly options: AuthHandlerOptions = {}
  ) {}

  handle(pattern: string, handler: Handler<Req, Res>): void {
    this.router.handle(pattern, newHandler(this.checker, handler, this.options));
  }

  handleFunc(pattern: string, fn: HandlerFunc<Req, Res>): void {
    this.router.handle(pattern, toHandler(handlerFunc(this.checker, fn, this.options)));
  }
}

/**
 * Create an AuthServeMux; without a router a fresh ServeMux is used.
 */
export function newServeMux<Req extends IncomingRequest = IncomingRequest, Res extends ResponseWriter = ResponseWriter>(
  checker: CredentialChecker,
  router: Router<Req, Res> = new ServeMux<Req, Res>(),
  options?: AuthHandlerOptions
): AuthServeMux<Req, Res> {
  return new AuthServeMux(checker, router, options);
}

/**
 * Register a guarded handler on `router` (the default mux if omitted).
 */
export function handle(
  checker: CredentialChecker,
  pattern: string,
  handler: Handler,
  router: Router = defaultServeMux
): void {
  router.handle(pattern, newHandler(checker, handler));
}

/**
 * Register a guarded function on `router` (the default mux if omitted).
 */
export function handleFunc(
  checker: CredentialChecker,
  pattern: string,
  fn: HandlerFunc,
  router: Router = defaultServeMux
): void {
  router.handle(pattern, toHandler(handlerFunc(checker, fn)));
}
