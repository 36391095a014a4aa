/**
 * A single header line, `<name>: <value>`.
 */

import { ErrorCode, PersonaError } from './errors.js';

export interface Header {
  readonly name: string;
  readonly value: string;
}

export const CONTENT_LENGTH = 'Content-Length';

/**
 * Create a header. Name and value must both be non-empty after trimming.
 */
export function createHeader(name: string, value: string): Header {
  if (name.trim().length === 0 || value.trim().length === 0) {
    throw new PersonaError(ErrorCode.ERR_INVALID_HEADER, `Invalid header: "${name}: ${value}"`);
  }
  return { name, value };
}
