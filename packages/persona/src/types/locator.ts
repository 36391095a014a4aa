/**
 * Locator identifies where a server listens or where a client connects.
 */

export interface Locator {
  /** Host address (IP or hostname) */
  readonly host: string;
  /** Port number */
  readonly port: number;
}

/**
 * Parse a locator string (host:port)
 */
export function parseLocator(locator: string): Locator {
  const match = locator.match(/^([^:]+):(\d+)$/);
  if (!match) {
    throw new Error(`Invalid locator format: ${locator}`);
  }

  return createLocator(match[1], parseInt(match[2], 10));
}

/**
 * Format a Locator to string
 */
export function formatLocator(locator: Locator): string {
  return `${locator.host}:${locator.port}`;
}

/**
 * Create a Locator, checking the port range
 */
export function createLocator(host: string, port: number): Locator {
  if (port < 1 || port > 65535) {
    throw new Error(`Invalid port number: ${port}`);
  }
  return { host, port };
}
