/**
 * Basic Authentication header codec
 * RFC 7617 - The 'Basic' HTTP Authentication Scheme
 */

export const AUTHORIZATION_HEADER = 'authorization';
export const WWW_AUTHENTICATE_HEADER = 'WWW-Authenticate';

const SCHEME_PREFIX = 'basic ';

// Standard alphabet, padded
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export interface BasicCredentials {
  username: string;
  password: string;
  /** false when the header was missing or could not be parsed */
  present: boolean;
}

function absent(): BasicCredentials {
  return { username: '', password: '', present: false };
}

// Rejects invalid byte sequences instead of substituting U+FFFD; keeps a leading BOM
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) return undefined;
    throw error;
  }
}

/**
 * Extract credentials from an `Authorization` header value.
 *
 * A missing, malformed or non-Basic header, or one whose payload is not
 * valid UTF-8, is reported as absent with empty username and password
 * rather than as an error. The username ends at the
 * first colon; the password may contain colons.
 *
 * @example
 * ```typescript
 * parseBasicAuth('Basic dXNlcjpwYTpzcw==');
 * // { username: 'user', password: 'pa:ss', present: true }
 * ```
 */
export function parseBasicAuth(header: string | readonly string[] | undefined): BasicCredentials {
  if (typeof header !== 'string') return absent();
  if (header.length < SCHEME_PREFIX.length) return absent();
  if (header.slice(0, SCHEME_PREFIX.length).toLowerCase() !== SCHEME_PREFIX) return absent();

  const encoded = header.slice(SCHEME_PREFIX.length);
  if (!BASE64_PATTERN.test(encoded)) return absent();

  const decoded = decodeUtf8(Buffer.from(encoded, 'base64'));
  if (decoded === undefined) return absent();

  const separator = decoded.indexOf(':');
  if (separator === -1) return absent();

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
    present: true,
  };
}

/**
 * Build the `Authorization` header value for a username/password pair.
 */
export function encodeBasicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`;
}
