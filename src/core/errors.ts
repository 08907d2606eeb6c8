import { WardenRequest, WardenResponse } from '../types/index.js';

export class WardenError extends Error {
  request?: WardenRequest;
  response?: WardenResponse;
  suggestions: string[];
  retriable: boolean;

  constructor(
    message: string,
    request?: WardenRequest,
    response?: WardenResponse,
    suggestions: string[] = [],
    retriable = false
  ) {
    super(message);
    this.name = 'WardenError';
    this.request = request;
    this.response = response;
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * Error thrown when a Signer could not attach credentials to a request.
 * The request was never dispatched.
 */
export class SigningError extends WardenError {
  constructor(cause: unknown, request?: WardenRequest) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to sign request: ${reason}`,
      request,
      undefined,
      [
        'Check the signer configuration (credentials, token endpoint).',
        'The request was not sent; it is safe to retry once the signer recovers.'
      ],
      false
    );
    this.name = 'SigningError';
    this.cause = cause;
  }
}

export class NetworkError extends WardenError {
  code?: string;

  constructor(message: string, code?: string, request?: WardenRequest) {
    const suggestions = [
      'Confirm the host and port are reachable from this environment.',
      'Check proxy/VPN/firewall settings that might block the request.',
      'Retry the request if this is transient.'
    ];
    super(message, request, undefined, suggestions, true);
    this.name = 'NetworkError';
    this.code = code;
  }
}

/**
 * Error thrown when the package is set up incorrectly
 */
export class ConfigurationError extends WardenError {
  configKey?: string;

  constructor(
    message: string,
    options?: {
      configKey?: string;
      request?: WardenRequest;
    }
  ) {
    super(
      message,
      options?.request,
      undefined,
      [
        'Check the options passed to the client or router.',
        'Ensure all required configuration keys are set.'
      ],
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
  }
}
