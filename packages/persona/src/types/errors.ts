/**
 * Error codes for the Persona codec and server shell.
 */

export enum ErrorCode {
  /** Generic/unspecified error */
  ERR_UNKNOWN = 1,

  /** Listen address already taken by another socket */
  ERR_ADDR_IN_USE = 2,

  /** Request bytes do not form an acceptable HTTP/1.1 request */
  ERR_MALFORMED = 3,

  /** Header with an empty name or value */
  ERR_INVALID_HEADER = 4,

  /** Version component outside 0-255 */
  ERR_INVALID_VERSION = 5,

  /** Timeout */
  ERR_TIMEOUT = 6,

  /** Connection closed */
  ERR_CONNECTION_CLOSED = 7,

  /** Server no longer accepting connections */
  ERR_SERVER_CLOSED = 8,
}

/**
 * Get human-readable description for error code
 */
export function getErrorMessage(code: ErrorCode): string {
  const messages: Record<ErrorCode, string> = {
    [ErrorCode.ERR_UNKNOWN]: 'Unknown error',
    [ErrorCode.ERR_ADDR_IN_USE]: 'Address already in use',
    [ErrorCode.ERR_MALFORMED]: 'Malformed request',
    [ErrorCode.ERR_INVALID_HEADER]: 'Invalid header',
    [ErrorCode.ERR_INVALID_VERSION]: 'Invalid HTTP version',
    [ErrorCode.ERR_TIMEOUT]: 'Operation timed out',
    [ErrorCode.ERR_CONNECTION_CLOSED]: 'Connection closed',
    [ErrorCode.ERR_SERVER_CLOSED]: 'Server closed',
  };
  return messages[code] ?? 'Unknown error';
}

/**
 * Custom error class for Persona errors
 */
export class PersonaError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message?: string
  ) {
    super(message ?? getErrorMessage(code));
    this.name = 'PersonaError';
  }
}

/**
 * Shorthand for the parser's single failure kind
 */
export function malformed(detail: string): PersonaError {
  return new PersonaError(ErrorCode.ERR_MALFORMED, `Malformed request: ${detail}`);
}

/**
 * Map an error raised while binding a listener.
 * Only the address-in-use condition has a Persona counterpart; anything else is returned as is.
 */
export function mapListenError(err: Error): Error {
  if ('code' in err && err.code === 'EADDRINUSE') {
    return new PersonaError(ErrorCode.ERR_ADDR_IN_USE, err.message);
  }
  return err;
}
