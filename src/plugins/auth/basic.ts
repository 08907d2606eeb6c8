/**
 * Basic Authentication (client side)
 * RFC 7617 - The 'Basic' HTTP Authentication Scheme
 */

import { Middleware, Plugin, WardenRequest } from '../../types/index.js';
import { encodeBasicAuth } from '../../auth/basic-header.js';
import { SigningError } from '../../core/errors.js';

/**
 * Attaches credentials to an outbound request.
 *
 * Resolves with the request to send; rejecting aborts the request before it
 * reaches the transport. Implementations backed by a token service or
 * directory lookup may fail, the Basic signer never does.
 */
export interface Signer {
  sign(req: WardenRequest): Promise<WardenRequest>;
}

export interface BasicAuthOptions {
  username: string;
  password: string;
}

export class BasicAuthSigner implements Signer {
  readonly username: string;
  readonly password: string;
  private readonly header: string;

  constructor(username: string, password: string) {
    this.username = username;
    this.password = password;
    this.header = encodeBasicAuth(username, password);
  }

  async sign(req: WardenRequest): Promise<WardenRequest> {
    return req.withHeader('Authorization', this.header);
  }
}

/**
 * Sign with `signer`, turning any failure into a SigningError.
 */
export async function signRequest(signer: Signer, req: WardenRequest): Promise<WardenRequest> {
  try {
    return await signer.sign(req);
  } catch (error) {
    throw error instanceof SigningError ? error : new SigningError(error, req);
  }
}

/**
 * Run every request through a signer before the rest of the chain
 */
export function signerMiddleware(signer: Signer): Middleware {
  return async (req, next) => next(await signRequest(signer, req));
}

/**
 * Basic Authentication Middleware
 * Adds Authorization header with Base64 encoded credentials
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   baseUrl: 'https://api.example.com',
 * });
 * client.use(basicAuth({ username: 'user', password: 'pass' }));
 * ```
 */
export function basicAuth(options: BasicAuthOptions): Middleware {
  return signerMiddleware(new BasicAuthSigner(options.username, options.password));
}

/**
 * Basic Authentication Plugin
 */
export function basicAuthPlugin(options: BasicAuthOptions): Plugin {
  return (client) => {
    client.use(basicAuth(options));
  };
}
