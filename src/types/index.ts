import type { IncomingHttpHeaders } from 'node:http';

export type Method =
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'DELETE'
  | 'PATCH'
  | 'HEAD'
  | 'OPTIONS';

export type HeadersLike = Headers | Record<string, string> | Array<[string, string]>;

export interface RequestOptions {
  method?: Method;
  headers?: HeadersLike;
  body?: string | null;
  signal?: AbortSignal;
}

export interface WardenRequest {
  url: string;
  method: Method;
  headers: Headers;
  body: string | null;
  signal?: AbortSignal;

  // Helpers for immutability
  withHeader(name: string, value: string): WardenRequest;
  withBody(body: string): WardenRequest;
}

export interface Timings {
  firstByte?: number; // TTFB
  total?: number;
}

export interface WardenResponse {
  status: number;
  statusText: string;
  headers: Headers;
  ok: boolean;
  url: string;

  timings?: Timings;

  json<R = unknown>(): Promise<R>;
  text(): Promise<string>;

  raw: Response;
}

export type NextFunction = (req: WardenRequest) => Promise<WardenResponse>;
export type Middleware = (req: WardenRequest, next: NextFunction) => Promise<WardenResponse>;

export interface Transport {
  dispatch(req: WardenRequest): Promise<WardenResponse>;
}

/**
 * Anything a plugin may extend. Kept narrow so plugins don't reach into the
 * client internals.
 */
export interface PluginHost {
  use(middleware: Middleware): unknown;
}

export type Plugin = (client: PluginHost) => void;

export interface ClientOptions {
  baseUrl?: string;
  headers?: HeadersLike;
  middlewares?: Middleware[];
  plugins?: Plugin[];
  transport?: Transport;
  debug?: boolean; // Enable debug mode (can also use DEBUG=warden env var)
}

// ============================================
// Server side
// ============================================

/**
 * The parts of an inbound request the auth layer reads.
 * `node:http`'s IncomingMessage satisfies it.
 */
export interface IncomingRequest {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

/**
 * The parts of a response the auth layer and routers write.
 * `node:http`'s ServerResponse satisfies it.
 */
export interface ResponseWriter {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: string | number | readonly string[]): unknown;
  getHeader(name: string): string | number | string[] | undefined;
  write(chunk: string): unknown;
  end(chunk: string): unknown;
}

export type HandlerFunc<Req extends IncomingRequest = IncomingRequest, Res extends ResponseWriter = ResponseWriter> = (
  req: Req,
  res: Res
) => void | Promise<void>;

export interface Handler<Req extends IncomingRequest = IncomingRequest, Res extends ResponseWriter = ResponseWriter> {
  serveHTTP(req: Req, res: Res): void | Promise<void>;
}

/**
 * Route registration surface: "register handler for pattern".
 */
export interface Router<Req extends IncomingRequest = IncomingRequest, Res extends ResponseWriter = ResponseWriter> {
  handle(pattern: string, handler: Handler<Req, Res>): void;
}
