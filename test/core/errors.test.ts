import { describe, it, expect } from 'vitest';
import { WardenError, SigningError, NetworkError, ConfigurationError } from '../../src/core/errors.js';
import { HttpRequest } from '../../src/core/request.js';

describe('Error Classes', () => {
  describe('SigningError', () => {
    it('should describe the cause', () => {
      const cause = new Error('token expired');
      const error = new SigningError(cause);

      expect(error).toBeInstanceOf(WardenError);
      expect(error.name).toBe('SigningError');
      expect(error.message).toBe('Failed to sign request: token expired');
      expect(error.cause).toBe(cause);
      expect(error.retriable).toBe(false);
      expect(error.suggestions).toContain('Check the signer configuration (credentials, token endpoint).');
    });

    it('should accept non-Error causes', () => {
      const error = new SigningError('no key');
      expect(error.message).toBe('Failed to sign request: no key');
    });

    it('should keep the request it failed on', () => {
      const req = new HttpRequest('https://api.example.com');
      expect(new SigningError('x', req).request).toBe(req);
    });
  });

  describe('NetworkError', () => {
    it('should be retriable and carry the code', () => {
      const error = new NetworkError('connect ECONNREFUSED', 'ECONNREFUSED');
      expect(error.name).toBe('NetworkError');
      expect(error.code).toBe('ECONNREFUSED');
      expect(error.retriable).toBe(true);
    });
  });

  describe('ConfigurationError', () => {
    it('should carry the config key', () => {
      const error = new ConfigurationError('bad pattern', { configKey: 'pattern' });
      expect(error.name).toBe('ConfigurationError');
      expect(error.configKey).toBe('pattern');
      expect(error.suggestions).toContain('Check the options passed to the client or router.');
    });
  });
});
