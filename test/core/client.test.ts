import { describe, it, expect, afterEach, vi } from 'vitest';
import { Client, createClient } from '../../src/core/client.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { UndiciTransport } from '../../src/transport/undici.js';
import { basicAuthPlugin } from '../../src/plugins/auth/basic.js';
import { Logger, setLogger } from '../../src/utils/logger.js';
import type { Middleware } from '../../src/types/index.js';
import { MockTransport } from '../helpers/mock-transport.js';

describe('Client', () => {
  let transport: MockTransport;

  const setup = (options: ConstructorParameters<typeof Client>[0] = {}) => {
    transport = new MockTransport();
    return new Client({ baseUrl: 'https://api.example.com', transport, ...options });
  };

  afterEach(() => {
    setLogger(new Logger({ level: 'none' }));
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('should resolve paths against the baseUrl', async () => {
    const client = setup();
    transport.setMockResponse('GET', '/users', 200, '[]');

    const res = await client.get('/users');

    expect(res.status).toBe(200);
    expect(res.url).toBe('https://api.example.com/users');
    expect(await res.json()).toEqual([]);
  });

  it('should accept absolute URLs without a baseUrl', async () => {
    transport = new MockTransport();
    const client = createClient({ transport });
    transport.setMockResponse('GET', 'https://other.example.com/x', 200, 'x');

    expect(await (await client.get('https://other.example.com/x')).text()).toBe('x');
  });

  it('should reject relative paths without a baseUrl', () => {
    const client = new Client({ transport: new MockTransport() });

    expect(() => client.newRequest('GET', '/users')).toThrow(ConfigurationError);
  });

  it('should construct with the default transport', () => {
    const client = new Client();
    expect(client).toBeInstanceOf(Client);
    expect(new UndiciTransport()).toBeInstanceOf(UndiciTransport);
  });

  it('should resolve 401 responses instead of throwing', async () => {
    const client = setup();
    transport.setMockResponse('GET', '/secret', 401, 'Unauthorized', { 'WWW-Authenticate': 'Basic' });

    const res = await client.get('/secret');

    expect(res.status).toBe(401);
    expect(res.ok).toBe(false);
    expect(res.headers.get('www-authenticate')).toBe('Basic');
  });

  it('should merge default headers with per-request headers', () => {
    const client = setup({ headers: { Accept: 'application/json', 'X-Team': 'core' } });

    const req = client.newRequest('GET', '/users', { headers: { Accept: 'text/plain' } });

    expect(req.headers.get('accept')).toBe('text/plain');
    expect(req.headers.get('x-team')).toBe('core');
  });

  it('should run middlewares in registration order around the transport', async () => {
    const order: string[] = [];
    const tag = (name: string): Middleware => async (req, next) => {
      order.push(`${name}:before`);
      const res = await next(req.withHeader(`x-${name}`, '1'));
      order.push(`${name}:after`);
      return res;
    };

    const client = setup({ middlewares: [tag('a')] });
    client.use(tag('b'));
    transport.setMockResponse('GET', '/users', 200, '[]');

    await client.get('/users');

    expect(order).toEqual(['a:before', 'b:before', 'b:after', 'a:after']);
    expect(transport.requests[0]?.headers.get('x-a')).toBe('1');
    expect(transport.requests[0]?.headers.get('x-b')).toBe('1');
  });

  it('should install plugins from options', async () => {
    const client = setup({ plugins: [basicAuthPlugin({ username: 'user', password: 'pass' })] });
    transport.setMockResponse('GET', '/me', 200, '{}');

    await client.get('/me');

    expect(transport.requests[0]?.headers.get('authorization')).toBe('Basic dXNlcjpwYXNz');
  });

  it('should build form posts', async () => {
    const client = setup();
    transport.setMockResponse('POST', '/login', 200, 'ok');

    await client.postForm('/login', { user: 'a b' });

    const sent = transport.requests[0];
    expect(sent?.method).toBe('POST');
    expect(sent?.body).toBe('user=a+b');
    expect(sent?.headers.get('content-type')).toBe('application/x-www-form-urlencoded');
  });

  it('should log requests with redacted credentials in debug mode', async () => {
    const lines: string[] = [];
    setLogger(new Logger({ level: 'debug', timestamp: false, colors: false, sink: (line) => lines.push(line) }));

    const client = setup({ debug: true, plugins: [basicAuthPlugin({ username: 'user', password: 'pass' })] });
    transport.setMockResponse('HEAD', '/ping', 204, '');

    await client.head('/ping');

    expect(client.debugEnabled).toBe(true);
    expect(lines[0]).toBe('[warden] → HEAD https://api.example.com/ping');
    expect(lines.some((line) => line.includes('dXNlcjpwYXNz'))).toBe(false);
    expect(lines.find((line) => line.startsWith('[warden] ←'))).toMatch(/^\[warden\] ← 204 HEAD https:\/\/api\.example\.com\/ping \(\d+ms\)$/);
  });

  it('should print in debug mode even when the shared logger is quiet', async () => {
    vi.stubEnv('DEBUG', '');
    vi.stubEnv('NO_COLOR', '1');
    setLogger(new Logger({ level: 'none' }));
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const client = setup({ debug: true });
    transport.setMockResponse('GET', '/ping', 200, 'pong');

    await client.get('/ping');

    const lines = log.mock.calls.map(([line]) => String(line));
    expect(lines.some((line) => line.endsWith('[warden] → GET https://api.example.com/ping'))).toBe(true);
  });

  it.each(['warden', '*', 'app,warden:client'])('should enable debug mode for DEBUG=%s', (value) => {
    vi.stubEnv('DEBUG', value);
    expect(setup().debugEnabled).toBe(true);
  });

  it('should leave debug mode off for unrelated DEBUG values', () => {
    vi.stubEnv('DEBUG', 'express:router');
    expect(setup().debugEnabled).toBe(false);
  });
});
