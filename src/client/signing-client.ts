import { Client } from '../core/client.js';
import { Signer, signRequest } from '../plugins/auth/basic.js';
import type { RequestOptions, WardenRequest, WardenResponse } from '../types/index.js';

type CallOptions = Omit<RequestOptions, 'method' | 'body'>;

/**
 * Wraps a Client so every request is signed right before it is sent.
 *
 * If the signer fails the call rejects with a SigningError and nothing is
 * dispatched. Otherwise the request goes through the wrapped client with
 * only the credentials added.
 *
 * @example
 * ```typescript
 * const api = new SigningClient(
 *   createClient({ baseUrl: 'https://api.example.com' }),
 *   new BasicAuthSigner('user', 'pass')
 * );
 * const res = await api.get('/reports');
 * ```
 */
export class SigningClient {
  constructor(
    readonly client: Client,
    readonly signer: Signer
  ) {}

  async do(req: WardenRequest): Promise<WardenResponse> {
    return this.client.do(await signRequest(this.signer, req));
  }

  async get(url: string, options: CallOptions = {}): Promise<WardenResponse> {
    return this.do(this.client.newRequest('GET', url, options));
  }

  async head(url: string, options: CallOptions = {}): Promise<WardenResponse> {
    return this.do(this.client.newRequest('HEAD', url, options));
  }

  async post(url: string, bodyType: string, body: string, options: CallOptions = {}): Promise<WardenResponse> {
    const headers = new Headers(options.headers);
    headers.set('Content-Type', bodyType);
    return this.do(this.client.newRequest('POST', url, { ...options, headers, body }));
  }

  async postForm(url: string, data: URLSearchParams | Record<string, string>, options: CallOptions = {}): Promise<WardenResponse> {
    const form = data instanceof URLSearchParams ? data : new URLSearchParams(data);
    return this.post(url, 'application/x-www-form-urlencoded', form.toString(), options);
  }
}

export function newSigningClient(client: Client, signer: Signer): SigningClient {
  return new SigningClient(client, signer);
}

// Shared client for the signer-first helpers below
let defaultClient: Client | null = null;

export function getDefaultClient(): Client {
  if (!defaultClient) {
    defaultClient = new Client();
  }
  return defaultClient;
}

/**
 * Sign `req` and send it with `client`, or the default client when omitted.
 */
export function signedDo(signer: Signer, client: Client | undefined, req: WardenRequest): Promise<WardenResponse> {
  return new SigningClient(client ?? getDefaultClient(), signer).do(req);
}

export function signedGet(signer: Signer, client: Client | undefined, url: string): Promise<WardenResponse> {
  return new SigningClient(client ?? getDefaultClient(), signer).get(url);
}

export function signedHead(signer: Signer, client: Client | undefined, url: string): Promise<WardenResponse> {
  return new SigningClient(client ?? getDefaultClient(), signer).head(url);
}

export function signedPost(
  signer: Signer,
  client: Client | undefined,
  url: string,
  bodyType: string,
  body: string
): Promise<WardenResponse> {
  return new SigningClient(client ?? getDefaultClient(), signer).post(url, bodyType, body);
}

export function signedPostForm(
  signer: Signer,
  client: Client | undefined,
  url: string,
  data: URLSearchParams | Record<string, string>
): Promise<WardenResponse> {
  return new SigningClient(client ?? getDefaultClient(), signer).postForm(url, data);
}
