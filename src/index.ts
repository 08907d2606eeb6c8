/**
 * basic-warden
 *
 * HTTP Basic Authentication for node:http servers and outbound clients.
 *
 * @example
 * ```typescript
 * import { credentials, newServeMux, ServeMux } from 'basic-warden';
 *
 * const mux = new ServeMux();
 * newServeMux(credentials({ admin: 'test-secret' }), mux).handleFunc('/admin/', adminPage);
 * http.createServer(mux.listener()).listen(8080);
 * ```
 */

// Credentials
export {
  AllowAll,
  StaticCredentialStore,
  credentials,
  type CredentialChecker,
  type CredentialStore,
} from './auth/checker.js';
export {
  parseBasicAuth,
  encodeBasicAuth,
  AUTHORIZATION_HEADER,
  WWW_AUTHENTICATE_HEADER,
  type BasicCredentials,
} from './auth/basic-header.js';

// Server
export {
  AuthenticatingHandler,
  newHandler,
  handlerFunc,
  toHandler,
  type AuthHandlerOptions,
} from './server/handler.js';
export { ServeMux, defaultServeMux, type ServeMuxOptions } from './server/mux.js';
export { AuthServeMux, newServeMux, handle, handleFunc } from './server/auth-mux.js';

// Client
export { Client, createClient } from './core/client.js';
export { HttpRequest } from './core/request.js';
export { HttpResponse } from './core/response.js';
export { UndiciTransport, type UndiciTransportOptions } from './transport/undici.js';
export {
  BasicAuthSigner,
  basicAuth,
  basicAuthPlugin,
  signerMiddleware,
  signRequest,
  type BasicAuthOptions,
  type Signer,
} from './plugins/auth/basic.js';
export {
  SigningClient,
  newSigningClient,
  getDefaultClient,
  signedDo,
  signedGet,
  signedHead,
  signedPost,
  signedPostForm,
} from './client/signing-client.js';

// Errors & logging
export { WardenError, SigningError, NetworkError, ConfigurationError } from './core/errors.js';
export { consoleLogger, silentLogger, createLevelLogger } from './types/logger.js';
export { Logger as DebugLogger, getLogger, setLogger, debugFromEnv, type LogLevel, type LoggerOptions } from './utils/logger.js';

export type * from './types/index.js';
export type { Logger } from './types/logger.js';
